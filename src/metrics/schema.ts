/**
 * Metrics Module - Schemas and Types
 *
 * Entry shapes inside the production document and the normalized metric
 * types derived from them.
 */
import { z } from "zod";

// =============================================================================
// Category Selectors
// =============================================================================

/**
 * Production category read for solar output. The calibrated meter reading is
 * preferred over the per-inverter estimate ("inverters") because it includes
 * reactive power and true-RMS correction.
 */
export const PRODUCTION_SELECTOR = "eim";

export const TOTAL_CONSUMPTION_SELECTOR = "total-consumption";

/**
 * Signed balance between production and load. Negative means surplus is
 * being exported.
 */
export const NET_CONSUMPTION_SELECTOR = "net-consumption";

// =============================================================================
// Raw Entries
// =============================================================================

/**
 * A measurement that is not a finite number is treated as missing.
 */
const measurement = z.number().finite().optional().catch(undefined);

const discriminator = z.string().optional().catch(undefined);

/**
 * Entry of the `production` collection.
 */
export const ProductionEntrySchema = z.object({
  type: discriminator.describe("Category, e.g. eim or inverters"),
  wNow: measurement.describe("Instantaneous power in W"),
  whToday: measurement.describe("Energy today in Wh"),
  whLastSevenDays: measurement.describe("Energy over the last 7 days in Wh"),
  whLifetime: measurement.describe("Lifetime energy in Wh"),
});

export type ProductionEntry = z.infer<typeof ProductionEntrySchema>;

/**
 * Entry of the `consumption` collection.
 */
export const ConsumptionEntrySchema = z.object({
  measurementType: discriminator.describe(
    "Category, e.g. total-consumption or net-consumption",
  ),
  wNow: measurement.describe("Instantaneous power in W"),
  whToday: measurement.describe("Energy today in Wh"),
});

export type ConsumptionEntry = z.infer<typeof ConsumptionEntrySchema>;

// =============================================================================
// Classified Entries
// =============================================================================

/**
 * A production entry tagged by category. Anything but the metered category
 * is "ignored" and never contributes a value.
 */
export type ClassifiedProductionEntry =
  | { readonly kind: "metered"; readonly entry: ProductionEntry }
  | { readonly kind: "ignored" };

export type ClassifiedConsumptionEntry =
  | { readonly kind: "total"; readonly entry: ConsumptionEntry }
  | { readonly kind: "net"; readonly entry: ConsumptionEntry }
  | { readonly kind: "ignored" };

/**
 * Consumption buckets filled while folding over the collection.
 * First match wins per bucket.
 */
export type ConsumptionAccumulator = Readonly<{
  total: ConsumptionEntry | null;
  net: ConsumptionEntry | null;
}>;

// =============================================================================
// Normalized Metrics
// =============================================================================

export type ProductionMetrics = Readonly<{
  powerWatts: number;
  energyTodayWh: number;
  energyLastSevenDaysWh: number;
  energyLifetimeWh: number;
}>;

export type ConsumptionMetrics = Readonly<{
  powerWatts: number;
  energyTodayWh: number;
}>;

/**
 * Direction and size of the flow across the grid connection.
 */
export type GridFlow = Readonly<{
  magnitudeWatts: number;
  /** True only for a strictly negative net flow; zero counts as importing */
  exporting: boolean;
}>;

/**
 * Output of the extractor, before the grid flow is derived.
 */
export type ExtractedMetrics = Readonly<{
  production: ProductionMetrics;
  consumption: ConsumptionMetrics;
  /** Signed, never clamped */
  netFlowWatts: number;
  /** Fields that were expected but absent, e.g. "total-consumption.whToday" */
  missingFields: ReadonlyArray<string>;
}>;

/**
 * The pipeline's one output per successful poll.
 */
export type NormalizedReading = Readonly<{
  production: ProductionMetrics;
  consumption: ConsumptionMetrics;
  grid: GridFlow;
  netFlowWatts: number;
  observedAt: number;
}>;

export const ZERO_PRODUCTION: ProductionMetrics = {
  powerWatts: 0,
  energyTodayWh: 0,
  energyLastSevenDaysWh: 0,
  energyLifetimeWh: 0,
};

export const ZERO_CONSUMPTION: ConsumptionMetrics = {
  powerWatts: 0,
  energyTodayWh: 0,
};
