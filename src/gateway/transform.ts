/**
 * Gateway Module - Pure Transformations
 *
 * Credential assembly, request building and response decoding.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type { GatewayError } from "./errors.js";
import { configurationIncomplete, decodeFailed } from "./errors.js";
import type {
  GatewayPreferences,
  GatewayTarget,
  ProductionDocument,
} from "./schema.js";
import { PRODUCTION_PATH, ProductionDocumentSchema } from "./schema.js";

// =============================================================================
// Credentials
// =============================================================================

/**
 * Join the two stored token halves into one bearer token.
 *
 * Order matters and nothing about the token itself is validated; an expired
 * token only shows up later as an HTTP 401.
 *
 * @example
 * assembleToken(" abc", "def ") // "abcdef"
 */
export function assembleToken(
  part1: string | null | undefined,
  part2: string | null | undefined,
): string {
  return `${part1 ?? ""}${part2 ?? ""}`.trim();
}

/**
 * Turn stored preferences into a request target.
 *
 * @returns GatewayTarget, or CONFIGURATION_INCOMPLETE when the address or the
 * assembled token is empty
 */
export function resolveGatewayTarget(
  preferences: GatewayPreferences,
): Result<GatewayTarget, GatewayError> {
  const address = preferences.address.trim();
  const token = assembleToken(preferences.tokenPart1, preferences.tokenPart2);

  const missing: Array<"address" | "token"> = [];
  if (address === "") missing.push("address");
  if (token === "") missing.push("token");

  if (missing.length > 0) {
    return err(configurationIncomplete(missing));
  }

  return ok({ address, token });
}

// =============================================================================
// Request Building
// =============================================================================

/**
 * Build the telemetry URL for a gateway address.
 */
export function buildProductionUrl(address: string): string {
  return `https://${address}${PRODUCTION_PATH}`;
}

/**
 * Build the authenticated request headers.
 */
export function buildRequestHeaders(token: string): Record<string, string> {
  return {
    Accept: "application/json",
    Authorization: `Bearer ${token}`,
  };
}

// =============================================================================
// Response Decoding
// =============================================================================

/**
 * Decode a raw response body into a production document.
 *
 * @returns ProductionDocument, or DECODE_FAILED carrying the raw body
 */
export function decodeProductionDocument(
  body: string,
): Result<ProductionDocument, GatewayError> {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(decodeFailed(`Response is not valid JSON: ${reason}`, body));
  }

  const parsed = ProductionDocumentSchema.safeParse(data);
  if (!parsed.success) {
    return err(
      decodeFailed("Response does not match the production document", body),
    );
  }

  return ok(parsed.data);
}
