/**
 * Device State Module - Service Layer
 *
 * The sink that readings are emitted to. It validates every event against
 * the device's capability profile, keeps the latest value per attribute and
 * fans accepted events out to listeners (SSE) and publishers (MQTT).
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { DeviceStateError } from "./errors.js";
import {
  formatDeviceStateError,
  unknownDevice,
  unsupportedCapability,
} from "./errors.js";
import type {
  Capability,
  ComponentId,
  DeviceEvent,
  DeviceProfile,
  DeviceStateSnapshot,
} from "./schema.js";
import { applyEvent, attributeKey, isCapabilityDeclared } from "./transform.js";

const log = createLogger("state");

/**
 * Forwards an accepted event to an external system. May fail.
 */
export type DeviceStatePublisher = (
  deviceId: string,
  event: DeviceEvent,
  timestamp: number,
) => Promise<Result<void, DeviceStateError>>;

/**
 * Observes accepted events. Must not throw.
 */
export type DeviceStateListener = (
  deviceId: string,
  event: DeviceEvent,
  timestamp: number,
) => void;

export type DeviceStateSinkOptions = Readonly<{
  publishers?: ReadonlyArray<DeviceStatePublisher>;
  listeners?: ReadonlyArray<DeviceStateListener>;
  now?: () => number;
}>;

export type DeviceStateSink = Readonly<{
  registerProfile: (deviceId: string, profile: DeviceProfile) => void;
  unregister: (deviceId: string) => void;
  supports: (
    deviceId: string,
    component: ComponentId,
    capability: Capability,
  ) => boolean;
  emit: (
    deviceId: string,
    event: DeviceEvent,
  ) => Promise<Result<void, DeviceStateError>>;
  getState: (deviceId: string) => DeviceStateSnapshot | null;
}>;

/**
 * Create a device-state sink.
 *
 * A rejected event leaves the stored state untouched. A publisher failure
 * does not undo the stored state; the first failure is returned.
 */
export function createDeviceStateSink(
  options: DeviceStateSinkOptions = {},
): DeviceStateSink {
  const publishers = options.publishers ?? [];
  const listeners = options.listeners ?? [];
  const now = options.now ?? Date.now;

  const profiles = new Map<string, DeviceProfile>();
  const states = new Map<string, DeviceStateSnapshot>();

  function supports(
    deviceId: string,
    component: ComponentId,
    capability: Capability,
  ): boolean {
    const profile = profiles.get(deviceId);
    return (
      profile !== undefined &&
      isCapabilityDeclared(profile, component, capability)
    );
  }

  async function emit(
    deviceId: string,
    event: DeviceEvent,
  ): Promise<Result<void, DeviceStateError>> {
    const profile = profiles.get(deviceId);
    if (!profile) {
      return err(unknownDevice(deviceId));
    }

    if (!isCapabilityDeclared(profile, event.component, event.capability)) {
      return err(unsupportedCapability(event.component, event.capability));
    }

    const timestamp = now();
    states.set(
      deviceId,
      applyEvent(states.get(deviceId) ?? {}, event, timestamp),
    );

    log.debug({ deviceId, attribute: attributeKey(event) }, "Device state updated");

    for (const listener of listeners) {
      listener(deviceId, event, timestamp);
    }

    let firstFailure: DeviceStateError | null = null;
    for (const publish of publishers) {
      const result = await publish(deviceId, event, timestamp);
      if (result.isErr()) {
        log.debug(
          { deviceId, error: formatDeviceStateError(result.error) },
          "Publisher rejected device event",
        );
        if (firstFailure === null) {
          firstFailure = result.error;
        }
      }
    }

    return firstFailure === null ? ok(undefined) : err(firstFailure);
  }

  return {
    registerProfile: (deviceId, profile) => {
      profiles.set(deviceId, profile);
      log.info({ deviceId, profile: profile.name }, "Device profile registered");
    },
    unregister: (deviceId) => {
      profiles.delete(deviceId);
      states.delete(deviceId);
    },
    supports,
    emit,
    getState: (deviceId) =>
      profiles.has(deviceId) ? (states.get(deviceId) ?? {}) : null,
  };
}
