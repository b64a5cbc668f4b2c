/**
 * Emission Module - Pure Transformations
 *
 * Maps a normalized reading onto device events, per channel.
 */
import type { DeviceEvent } from "../device-state/index.js";
import type { NormalizedReading } from "../metrics/index.js";
import { whToKwh } from "../metrics/index.js";
import type { ChannelEvents, ChannelOptions } from "./schema.js";

function powerEvent(
  component: DeviceEvent["component"],
  watts: number,
): DeviceEvent {
  return {
    component,
    capability: "powerMeter",
    attribute: "power",
    value: watts,
    unit: "W",
  };
}

function energyEvent(
  component: DeviceEvent["component"],
  wattHours: number,
): DeviceEvent {
  return {
    component,
    capability: "energyMeter",
    attribute: "energy",
    value: whToKwh(wattHours),
    unit: "kWh",
  };
}

/**
 * Build the device events for every channel of a reading.
 *
 * The grid switch reads "on" while exporting and "off" while importing, so
 * automations can trigger on surplus.
 *
 * @example
 * buildChannelEvents(reading, { consumptionReport: false })
 * // [{ channel: "production", events: [power, energy] }, ...]
 */
export function buildChannelEvents(
  reading: NormalizedReading,
  options: ChannelOptions,
): ReadonlyArray<ChannelEvents> {
  const consumption: DeviceEvent[] = [
    powerEvent("consumed", reading.consumption.powerWatts),
    energyEvent("consumed", reading.consumption.energyTodayWh),
  ];

  if (options.consumptionReport) {
    consumption.push({
      component: "consumed",
      capability: "powerConsumptionReport",
      attribute: "powerConsumption",
      value: {
        energy: reading.consumption.energyTodayWh,
        power: reading.consumption.powerWatts,
        deltaEnergy: 0,
        powerEnergy: 0,
        persistedEnergy: 0,
        energySaved: 0,
      },
    });
  }

  return [
    {
      channel: "production",
      events: [
        powerEvent("main", reading.production.powerWatts),
        energyEvent("main", reading.production.energyTodayWh),
      ],
    },
    { channel: "consumption", events: consumption },
    {
      channel: "grid",
      events: [
        powerEvent("grid", reading.grid.magnitudeWatts),
        {
          component: "grid",
          capability: "switch",
          attribute: "switch",
          value: reading.grid.exporting ? "on" : "off",
        },
      ],
    },
  ];
}
