/**
 * Metrics Transform Tests
 *
 * Tests for metric extraction, grid-flow derivation and formatting.
 */
import { describe, expect, it } from "vitest";

import type { NormalizedReading } from "../schema.js";
import {
  accumulateConsumption,
  classifyConsumptionEntry,
  classifyProductionEntry,
  deriveGridFlow,
  extractMetrics,
  formatEnergySummary,
  formatPowerSummary,
  normalizeReading,
  whToKwh,
} from "../transform.js";

describe("Metrics Transform", () => {
  // ===========================================================================
  // Entry Classification
  // ===========================================================================

  describe("classifyProductionEntry", () => {
    it("tags the metered category", () => {
      expect(classifyProductionEntry({ type: "eim", wNow: 10 })).toEqual({
        kind: "metered",
        entry: { type: "eim", wNow: 10 },
      });
    });

    it("ignores the per-inverter category", () => {
      expect(classifyProductionEntry({ type: "inverters", wNow: 10 })).toEqual(
        { kind: "ignored" },
      );
    });

    it("ignores entries that are not objects", () => {
      expect(classifyProductionEntry("eim")).toEqual({ kind: "ignored" });
      expect(classifyProductionEntry(null)).toEqual({ kind: "ignored" });
    });

    it("drops non-numeric measurements instead of failing", () => {
      expect(
        classifyProductionEntry({ type: "eim", wNow: "4500", whToday: 7 }),
      ).toEqual({ kind: "metered", entry: { type: "eim", whToday: 7 } });
    });
  });

  describe("classifyConsumptionEntry", () => {
    it("tags total and net consumption", () => {
      expect(
        classifyConsumptionEntry({ measurementType: "total-consumption" }).kind,
      ).toBe("total");
      expect(
        classifyConsumptionEntry({ measurementType: "net-consumption" }).kind,
      ).toBe("net");
    });

    it("ignores unknown categories", () => {
      expect(
        classifyConsumptionEntry({ measurementType: "backfeed", wNow: 1 }),
      ).toEqual({ kind: "ignored" });
    });
  });

  describe("accumulateConsumption", () => {
    it("keeps the first entry per bucket", () => {
      const first = { measurementType: "net-consumption", wNow: -10 };
      const second = { measurementType: "net-consumption", wNow: 99 };

      const acc = accumulateConsumption(
        accumulateConsumption(
          { total: null, net: null },
          { kind: "net", entry: first },
        ),
        { kind: "net", entry: second },
      );

      expect(acc).toEqual({ total: null, net: first });
    });
  });

  // ===========================================================================
  // Extraction
  // ===========================================================================

  describe("extractMetrics", () => {
    it("extracts the reference document", () => {
      const metrics = extractMetrics({
        production: [{ type: "eim", wNow: 4500, whToday: 12000 }],
        consumption: [
          { measurementType: "total-consumption", wNow: 1200, whToday: 8000 },
          { measurementType: "net-consumption", wNow: -3300 },
        ],
      });

      expect(metrics.production).toEqual({
        powerWatts: 4500,
        energyTodayWh: 12000,
        energyLastSevenDaysWh: 0,
        energyLifetimeWh: 0,
      });
      expect(metrics.consumption).toEqual({
        powerWatts: 1200,
        energyTodayWh: 8000,
      });
      expect(metrics.netFlowWatts).toBe(-3300);
      expect(metrics.missingFields).toEqual([
        "eim.whLastSevenDays",
        "eim.whLifetime",
      ]);
    });

    it("reads all four production fields from the eim entry", () => {
      const metrics = extractMetrics({
        production: [
          { type: "inverters", wNow: 100, whToday: 1 },
          {
            type: "eim",
            wNow: 3000,
            whToday: 9000,
            whLastSevenDays: 60000,
            whLifetime: 9_500_000,
          },
        ],
        consumption: [],
      });

      expect(metrics.production).toEqual({
        powerWatts: 3000,
        energyTodayWh: 9000,
        energyLastSevenDaysWh: 60000,
        energyLifetimeWh: 9_500_000,
      });
    });

    it("uses the first eim entry when there are several", () => {
      const metrics = extractMetrics({
        production: [
          { type: "eim", wNow: 1 },
          { type: "eim", wNow: 2 },
        ],
        consumption: [],
      });

      expect(metrics.production.powerWatts).toBe(1);
    });

    it("returns zero production without an eim entry", () => {
      const metrics = extractMetrics({
        production: [{ type: "inverters", wNow: 4200, whToday: 11000 }],
        consumption: [],
      });

      expect(metrics.production).toEqual({
        powerWatts: 0,
        energyTodayWh: 0,
        energyLastSevenDaysWh: 0,
        energyLifetimeWh: 0,
      });
      expect(metrics.missingFields).toEqual([
        "eim",
        "total-consumption",
        "net-consumption",
      ]);
    });

    it("floors negative production and consumption at zero", () => {
      const metrics = extractMetrics({
        production: [{ type: "eim", wNow: -3, whToday: -1 }],
        consumption: [
          { measurementType: "total-consumption", wNow: -2, whToday: 500 },
        ],
      });

      expect(metrics.production.powerWatts).toBe(0);
      expect(metrics.production.energyTodayWh).toBe(0);
      expect(metrics.consumption.powerWatts).toBe(0);
      expect(metrics.consumption.energyTodayWh).toBe(500);
    });

    it("never clamps the net flow", () => {
      const metrics = extractMetrics({
        production: [],
        consumption: [{ measurementType: "net-consumption", wNow: -750.5 }],
      });

      expect(metrics.netFlowWatts).toBe(-750.5);
    });

    it("uses the first entry per consumption category", () => {
      const metrics = extractMetrics({
        production: [],
        consumption: [
          { measurementType: "net-consumption", wNow: 400 },
          { measurementType: "total-consumption", wNow: 900, whToday: 1 },
          { measurementType: "net-consumption", wNow: -100 },
          { measurementType: "total-consumption", wNow: 50, whToday: 2 },
        ],
      });

      expect(metrics.netFlowWatts).toBe(400);
      expect(metrics.consumption).toEqual({ powerWatts: 900, energyTodayWh: 1 });
    });

    it("defaults missing fields of a matched entry to zero", () => {
      const metrics = extractMetrics({
        production: [{ type: "eim" }],
        consumption: [{ measurementType: "net-consumption" }],
      });

      expect(metrics.production.powerWatts).toBe(0);
      expect(metrics.netFlowWatts).toBe(0);
      expect(metrics.missingFields).toContain("eim.wNow");
      expect(metrics.missingFields).toContain("net-consumption.wNow");
    });
  });

  // ===========================================================================
  // Derived Signals
  // ===========================================================================

  describe("deriveGridFlow", () => {
    it.each([
      [-3300, 3300, true],
      [-0.5, 0.5, true],
      [0, 0, false],
      [250, 250, false],
    ])("net flow %d gives magnitude %d, exporting %s", (net, magnitude, exporting) => {
      expect(deriveGridFlow(net)).toEqual({ magnitudeWatts: magnitude, exporting });
    });

    it("classifies negative zero as importing", () => {
      expect(deriveGridFlow(-0).exporting).toBe(false);
    });
  });

  describe("normalizeReading", () => {
    it("attaches grid flow and observation time", () => {
      const reading = normalizeReading(
        {
          production: {
            powerWatts: 4500,
            energyTodayWh: 12000,
            energyLastSevenDaysWh: 0,
            energyLifetimeWh: 0,
          },
          consumption: { powerWatts: 1200, energyTodayWh: 8000 },
          netFlowWatts: -3300,
          missingFields: [],
        },
        1_700_000_000_000,
      );

      expect(reading.grid).toEqual({ magnitudeWatts: 3300, exporting: true });
      expect(reading.netFlowWatts).toBe(-3300);
      expect(reading.observedAt).toBe(1_700_000_000_000);
    });
  });

  // ===========================================================================
  // Formatting
  // ===========================================================================

  describe("formatting", () => {
    const reading: NormalizedReading = {
      production: {
        powerWatts: 4500,
        energyTodayWh: 12000,
        energyLastSevenDaysWh: 65400,
        energyLifetimeWh: 1_234_560,
      },
      consumption: { powerWatts: 1200, energyTodayWh: 8000 },
      grid: { magnitudeWatts: 3300, exporting: true },
      netFlowWatts: -3300,
      observedAt: 0,
    };

    it("converts Wh to kWh", () => {
      expect(whToKwh(12000)).toBe(12);
      expect(whToKwh(8000)).toBe(8);
    });

    it("formats the power summary", () => {
      expect(formatPowerSummary(reading)).toBe(
        "Solar: 4500W | Home: 1200W | Exporting to Grid: 3300W",
      );
    });

    it("labels zero flow as importing", () => {
      expect(
        formatPowerSummary({
          ...reading,
          grid: { magnitudeWatts: 0, exporting: false },
        }),
      ).toBe("Solar: 4500W | Home: 1200W | Importing from Grid: 0W");
    });

    it("formats the energy summary", () => {
      expect(formatEnergySummary(reading)).toBe(
        "Today → Solar: 12.00 kWh | Home: 8.00 kWh | 7-day: 65.4 kWh | Lifetime: 1234.6 kWh",
      );
    });
  });
});
