/**
 * Gateway Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  FetchOptions,
  GatewayPreferences,
  GatewayTarget,
  ProductionDocument,
} from "./schema.js";
export type { GatewayError } from "./errors.js";

// Schemas and constants
export { GatewayPreferencesSchema, PRODUCTION_PATH } from "./schema.js";

// Error utilities
export { formatGatewayError } from "./errors.js";

// Service functions (side effects)
export { fetchProductionBody } from "./service.js";

// Pure transformations
export {
  assembleToken,
  buildProductionUrl,
  buildRequestHeaders,
  decodeProductionDocument,
  resolveGatewayTarget,
} from "./transform.js";
