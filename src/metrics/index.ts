/**
 * Metrics Module - Public API
 */

// Types
export type {
  ConsumptionMetrics,
  ExtractedMetrics,
  GridFlow,
  NormalizedReading,
  ProductionMetrics,
} from "./schema.js";

// Constants
export {
  NET_CONSUMPTION_SELECTOR,
  PRODUCTION_SELECTOR,
  TOTAL_CONSUMPTION_SELECTOR,
} from "./schema.js";

// Pure transformations
export {
  deriveGridFlow,
  extractMetrics,
  formatEnergySummary,
  formatPowerSummary,
  gridDirectionLabel,
  normalizeReading,
  whToKwh,
} from "./transform.js";
