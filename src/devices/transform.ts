/**
 * Devices Module - Pure Transformations
 */
import type { DeviceStateSnapshot } from "../device-state/index.js";
import { describePreferences, summarizeOutcome } from "../poller/index.js";
import type { RegisteredDevice } from "./schema.js";

/**
 * JSON view of a device: definition, poller status and latest state.
 * The token halves are reduced to a configured flag.
 */
export function describeDevice(device: RegisteredDevice) {
  const pollerState = device.poller.getState();
  const state: DeviceStateSnapshot = device.sink.getState(device.id) ?? {};

  return {
    id: device.id,
    label: device.label,
    profile: device.profileName,
    registeredAt: new Date(device.registeredAt).toISOString(),
    preferences: describePreferences(device.poller.getPreferences()),
    poller: {
      isRunning: pollerState.isRunning,
      inFlight: pollerState.inFlight,
      queued: pollerState.queued,
      cycleCount: pollerState.cycleCount,
      lastPollTime:
        pollerState.lastPollTime === null
          ? null
          : new Date(pollerState.lastPollTime).toISOString(),
      lastOutcome:
        pollerState.lastOutcome === null
          ? null
          : summarizeOutcome(pollerState.lastOutcome),
    },
    state,
  };
}

export type DeviceView = ReturnType<typeof describeDevice>;
