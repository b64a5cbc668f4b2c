/**
 * Metrics Module - Pure Transformations
 *
 * Metric extraction from the production document, grid-flow derivation and
 * log formatting. No side effects, no I/O - just data in, data out.
 */
import type { ProductionDocument } from "../gateway/index.js";
import type {
  ClassifiedConsumptionEntry,
  ClassifiedProductionEntry,
  ConsumptionAccumulator,
  ConsumptionEntry,
  ConsumptionMetrics,
  ExtractedMetrics,
  GridFlow,
  NormalizedReading,
  ProductionEntry,
  ProductionMetrics,
} from "./schema.js";
import {
  ConsumptionEntrySchema,
  NET_CONSUMPTION_SELECTOR,
  PRODUCTION_SELECTOR,
  ProductionEntrySchema,
  TOTAL_CONSUMPTION_SELECTOR,
  ZERO_CONSUMPTION,
  ZERO_PRODUCTION,
} from "./schema.js";

// =============================================================================
// Entry Classification
// =============================================================================

/**
 * Decode one production entry and tag it by category.
 * Non-object entries and unknown categories are ignored.
 */
export function classifyProductionEntry(
  raw: unknown,
): ClassifiedProductionEntry {
  const parsed = ProductionEntrySchema.safeParse(raw);
  if (!parsed.success) {
    return { kind: "ignored" };
  }

  if (parsed.data.type === PRODUCTION_SELECTOR) {
    return { kind: "metered", entry: parsed.data };
  }

  return { kind: "ignored" };
}

/**
 * Decode one consumption entry and tag it by category.
 */
export function classifyConsumptionEntry(
  raw: unknown,
): ClassifiedConsumptionEntry {
  const parsed = ConsumptionEntrySchema.safeParse(raw);
  if (!parsed.success) {
    return { kind: "ignored" };
  }

  switch (parsed.data.measurementType) {
    case TOTAL_CONSUMPTION_SELECTOR:
      return { kind: "total", entry: parsed.data };
    case NET_CONSUMPTION_SELECTOR:
      return { kind: "net", entry: parsed.data };
    default:
      return { kind: "ignored" };
  }
}

/**
 * Fold one classified entry into the consumption buckets.
 * A bucket that is already filled keeps its first entry.
 */
export function accumulateConsumption(
  acc: ConsumptionAccumulator,
  classified: ClassifiedConsumptionEntry,
): ConsumptionAccumulator {
  switch (classified.kind) {
    case "total":
      return acc.total === null ? { ...acc, total: classified.entry } : acc;
    case "net":
      return acc.net === null ? { ...acc, net: classified.entry } : acc;
    case "ignored":
      return acc;
  }
}

// =============================================================================
// Extraction
// =============================================================================

/**
 * Floor display values at zero. Small negative readings at night are meter
 * noise, not reverse flow.
 */
export function floorAtZero(value: number): number {
  return Math.max(value, 0);
}

/**
 * Read a measurement, defaulting to zero and recording the field when absent.
 */
function readMeasurement(
  value: number | undefined,
  field: string,
  missing: string[],
): number {
  if (value === undefined) {
    missing.push(field);
    return 0;
  }
  return value;
}

function toProductionMetrics(
  entry: ProductionEntry | null,
  missing: string[],
): ProductionMetrics {
  if (entry === null) {
    missing.push(PRODUCTION_SELECTOR);
    return ZERO_PRODUCTION;
  }

  const field = (name: string) => `${PRODUCTION_SELECTOR}.${name}`;

  return {
    powerWatts: floorAtZero(readMeasurement(entry.wNow, field("wNow"), missing)),
    energyTodayWh: floorAtZero(
      readMeasurement(entry.whToday, field("whToday"), missing),
    ),
    energyLastSevenDaysWh: floorAtZero(
      readMeasurement(entry.whLastSevenDays, field("whLastSevenDays"), missing),
    ),
    energyLifetimeWh: floorAtZero(
      readMeasurement(entry.whLifetime, field("whLifetime"), missing),
    ),
  };
}

function toConsumptionMetrics(
  entry: ConsumptionEntry | null,
  missing: string[],
): ConsumptionMetrics {
  if (entry === null) {
    missing.push(TOTAL_CONSUMPTION_SELECTOR);
    return ZERO_CONSUMPTION;
  }

  const field = (name: string) => `${TOTAL_CONSUMPTION_SELECTOR}.${name}`;

  return {
    powerWatts: floorAtZero(readMeasurement(entry.wNow, field("wNow"), missing)),
    energyTodayWh: floorAtZero(
      readMeasurement(entry.whToday, field("whToday"), missing),
    ),
  };
}

function toNetFlowWatts(
  entry: ConsumptionEntry | null,
  missing: string[],
): number {
  if (entry === null) {
    missing.push(NET_CONSUMPTION_SELECTOR);
    return 0;
  }

  // Sign carries the direction: never clamped
  return readMeasurement(entry.wNow, `${NET_CONSUMPTION_SELECTOR}.wNow`, missing);
}

/**
 * Extract production, consumption and net-flow metrics from a document.
 *
 * - Production: first `eim` entry, zeros if there is none.
 * - Consumption: one pass, first `total-consumption` and first
 *   `net-consumption` entry win.
 * - Missing measurements are zero and listed in `missingFields`.
 *
 * @example
 * extractMetrics({
 *   production: [{ type: "eim", wNow: 4500, whToday: 12000 }],
 *   consumption: [{ measurementType: "net-consumption", wNow: -3300 }],
 * }).netFlowWatts // -3300
 */
export function extractMetrics(document: ProductionDocument): ExtractedMetrics {
  const missing: string[] = [];

  let metered: ProductionEntry | null = null;
  for (const raw of document.production) {
    const classified = classifyProductionEntry(raw);
    if (classified.kind === "metered") {
      metered = classified.entry;
      break;
    }
  }

  const buckets = document.consumption
    .map(classifyConsumptionEntry)
    .reduce<ConsumptionAccumulator>(accumulateConsumption, {
      total: null,
      net: null,
    });

  return {
    production: toProductionMetrics(metered, missing),
    consumption: toConsumptionMetrics(buckets.total, missing),
    netFlowWatts: toNetFlowWatts(buckets.net, missing),
    missingFields: missing,
  };
}

// =============================================================================
// Derived Signals
// =============================================================================

/**
 * Derive grid flow from the signed net-flow value.
 *
 * @example
 * deriveGridFlow(-3300) // { magnitudeWatts: 3300, exporting: true }
 * deriveGridFlow(0)     // { magnitudeWatts: 0, exporting: false }
 */
export function deriveGridFlow(netFlowWatts: number): GridFlow {
  return {
    magnitudeWatts: Math.abs(netFlowWatts),
    exporting: netFlowWatts < 0,
  };
}

/**
 * Combine extracted metrics and derived grid flow into a reading.
 */
export function normalizeReading(
  metrics: ExtractedMetrics,
  observedAt: number,
): NormalizedReading {
  return {
    production: metrics.production,
    consumption: metrics.consumption,
    grid: deriveGridFlow(metrics.netFlowWatts),
    netFlowWatts: metrics.netFlowWatts,
    observedAt,
  };
}

// =============================================================================
// Units and Formatting
// =============================================================================

export function whToKwh(wh: number): number {
  return wh / 1000;
}

export function gridDirectionLabel(flow: GridFlow): string {
  return flow.exporting ? "Exporting to Grid" : "Importing from Grid";
}

/**
 * One-line power summary for logs.
 *
 * @example
 * "Solar: 4500W | Home: 1200W | Exporting to Grid: 3300W"
 */
export function formatPowerSummary(reading: NormalizedReading): string {
  return [
    `Solar: ${reading.production.powerWatts.toFixed(0)}W`,
    `Home: ${reading.consumption.powerWatts.toFixed(0)}W`,
    `${gridDirectionLabel(reading.grid)}: ${reading.grid.magnitudeWatts.toFixed(0)}W`,
  ].join(" | ");
}

/**
 * One-line energy summary for logs.
 *
 * @example
 * "Today → Solar: 12.00 kWh | Home: 8.00 kWh | 7-day: 0.0 kWh | Lifetime: 0.0 kWh"
 */
export function formatEnergySummary(reading: NormalizedReading): string {
  const { production, consumption } = reading;
  return [
    `Today → Solar: ${whToKwh(production.energyTodayWh).toFixed(2)} kWh`,
    `Home: ${whToKwh(consumption.energyTodayWh).toFixed(2)} kWh`,
    `7-day: ${whToKwh(production.energyLastSevenDaysWh).toFixed(1)} kWh`,
    `Lifetime: ${whToKwh(production.energyLifetimeWh).toFixed(1)} kWh`,
  ].join(" | ");
}
