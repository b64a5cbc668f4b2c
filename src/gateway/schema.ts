/**
 * Gateway Module - Schemas and Types
 *
 * Shapes for the gateway preferences and the production telemetry document.
 * Only the top level is validated here; entries are decoded one by one in
 * the metrics module.
 */
import { z } from "zod";

// =============================================================================
// Endpoint
// =============================================================================

/**
 * The one telemetry resource this bridge reads.
 * The legacy `/api/v1/production` resource has a different, flatter shape
 * and is not supported.
 */
export const PRODUCTION_PATH = "/production.json";

// =============================================================================
// Preferences
// =============================================================================

/**
 * Externally stored gateway preferences.
 * The bearer token is stored as two halves because of a field-length limit
 * in the preference store.
 */
export const GatewayPreferencesSchema = z.object({
  address: z.string().describe("Gateway host or IP address"),
  tokenPart1: z.string().describe("First half of the bearer token"),
  tokenPart2: z.string().describe("Second half of the bearer token"),
});

export type GatewayPreferences = Readonly<
  z.infer<typeof GatewayPreferencesSchema>
>;

/**
 * Everything needed to issue one authenticated request.
 */
export type GatewayTarget = Readonly<{
  address: string;
  token: string;
}>;

export type FetchOptions = Readonly<{
  timeoutMs: number;
}>;

// =============================================================================
// Production Telemetry Document
// =============================================================================

/**
 * A collection that may be absent or null, which counts as empty.
 */
const entryCollection = z
  .array(z.unknown())
  .nullish()
  .transform((entries) => entries ?? []);

/**
 * Decoded `/production.json` response.
 *
 * @example
 * {
 *   production: [{ type: "eim", wNow: 4500, whToday: 12000 }],
 *   consumption: [{ measurementType: "net-consumption", wNow: -3300 }]
 * }
 */
export const ProductionDocumentSchema = z.object({
  production: entryCollection,
  consumption: entryCollection,
});

export type ProductionDocument = Readonly<
  z.infer<typeof ProductionDocumentSchema>
>;
