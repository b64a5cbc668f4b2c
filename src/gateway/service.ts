/**
 * Gateway Module - Service Layer
 *
 * Side effects happen here: the HTTPS call to the gateway.
 * Uses Result types for explicit error handling.
 */
import { type Result, err, ok } from "neverthrow";
import { Agent, fetch } from "undici";

import { createLogger } from "../logger.js";
import type { GatewayError } from "./errors.js";
import { fetchFailed } from "./errors.js";
import type { FetchOptions, GatewayTarget } from "./schema.js";
import { buildProductionUrl, buildRequestHeaders } from "./transform.js";

const log = createLogger("gateway");

/**
 * The gateway serves a self-signed certificate on the LAN; there is no CA
 * relationship to verify against.
 */
const localDeviceAgent = new Agent({
  connect: { rejectUnauthorized: false },
});

// =============================================================================
// Gateway API - Telemetry
// =============================================================================

/**
 * Fetch the raw production telemetry body.
 *
 * Only HTTP 200 counts as success. No retry: the next scheduled poll is the
 * retry.
 *
 * @param target - Gateway address and assembled bearer token
 * @param options - Request timeout
 * @returns Result with the raw body text or FETCH_FAILED
 */
export async function fetchProductionBody(
  target: GatewayTarget,
  options: FetchOptions,
): Promise<Result<string, GatewayError>> {
  const url = buildProductionUrl(target.address);

  log.debug({ url }, "Fetching gateway telemetry...");

  try {
    const response = await fetch(url, {
      method: "GET",
      headers: buildRequestHeaders(target.token),
      dispatcher: localDeviceAgent,
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    if (response.status !== 200) {
      const { status, statusText } = response;
      // Drain so undici can reuse the connection; the status stands either way
      await response.text().catch((error: unknown) => {
        log.debug({ status, error }, "Discarding unread error body");
      });
      return err(fetchFailed(status, `HTTP ${status}: ${statusText}`));
    }

    const body = await response.text();

    log.debug({ bytes: body.length }, "Gateway telemetry fetched");

    return ok(body);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));

    // Handle timeout specifically
    if (cause.name === "TimeoutError" || cause.name === "AbortError") {
      return err(fetchFailed(null, "Request timed out", cause));
    }

    return err(fetchFailed(null, "Failed to reach gateway", cause));
  }
}
