/**
 * Devices Module - Service Layer
 *
 * Registry of gateway devices. Each device owns one poll context; the
 * registry registers its profile with the sink and controls its lifecycle.
 */
import { type Result, err, ok } from "neverthrow";

import { DEVICE_PROFILES } from "../device-state/index.js";
import { createLogger } from "../logger.js";
import { createDevicePoller } from "../poller/index.js";
import type { DevicesError } from "./errors.js";
import { deviceAlreadyRegistered, deviceNotFound } from "./errors.js";
import type {
  DeviceDefinition,
  RegisteredDevice,
  RegistryDependencies,
} from "./schema.js";

const log = createLogger("devices");

const devices = new Map<string, RegisteredDevice>();

/**
 * Register a device and create its poll context. Polling starts only when
 * `startDevice` is called.
 */
export function registerDevice(
  definition: DeviceDefinition,
  deps: RegistryDependencies,
): Result<RegisteredDevice, DevicesError> {
  if (devices.has(definition.id)) {
    return err(deviceAlreadyRegistered(definition.id));
  }

  deps.sink.registerProfile(definition.id, DEVICE_PROFILES[definition.profileName]);

  const poller = createDevicePoller(
    {
      deviceId: definition.id,
      preferences: definition.preferences,
      intervalMs: deps.intervalMs,
      timeoutMs: deps.timeoutMs,
    },
    {
      sink: deps.sink,
      fetchBody: deps.fetchBody,
      onCycleComplete: deps.onCycleComplete,
      now: deps.now,
    },
  );

  const device: RegisteredDevice = {
    id: definition.id,
    label: definition.label,
    profileName: definition.profileName,
    registeredAt: (deps.now ?? Date.now)(),
    poller,
    sink: deps.sink,
  };

  devices.set(definition.id, device);
  log.info(
    { deviceId: definition.id, profile: definition.profileName },
    `Device registered: ${definition.label}`,
  );

  return ok(device);
}

export function getDevice(deviceId: string): Result<RegisteredDevice, DevicesError> {
  const device = devices.get(deviceId);
  return device ? ok(device) : err(deviceNotFound(deviceId));
}

export function listDevices(): ReadonlyArray<RegisteredDevice> {
  return [...devices.values()];
}

/**
 * Run the startup cycle and arm the periodic timer.
 */
export function startDevice(deviceId: string): Result<void, DevicesError> {
  return getDevice(deviceId).map((device) => {
    device.poller.start();
  });
}

/**
 * Stop polling and drop the device with its stored state.
 */
export function unregisterDevice(deviceId: string): Result<void, DevicesError> {
  return getDevice(deviceId).map((device) => {
    if (device.poller.getState().isRunning) {
      device.poller.stop();
    }
    device.sink.unregister(deviceId);
    devices.delete(deviceId);
    log.info({ deviceId }, "Device unregistered");
  });
}

/**
 * Stop every running poller. Registrations are kept.
 */
export function stopAllDevices(): void {
  for (const device of devices.values()) {
    if (device.poller.getState().isRunning) {
      device.poller.stop();
    }
  }
  log.info({ count: devices.size }, "All device pollers stopped");
}
