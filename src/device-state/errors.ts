/**
 * Device State Module - Error Types
 *
 * Rejections from the device-state sink. None of them is fatal.
 */
import type { Capability, ComponentId } from "./schema.js";

export type DeviceStateError =
  | {
      readonly type: "UNKNOWN_DEVICE";
      readonly deviceId: string;
      readonly message: string;
    }
  | {
      readonly type: "UNSUPPORTED_CAPABILITY";
      readonly component: ComponentId;
      readonly capability: Capability;
      readonly message: string;
    }
  | {
      readonly type: "PUBLISH_FAILED";
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create an UNKNOWN_DEVICE error.
 */
export function unknownDevice(deviceId: string): DeviceStateError {
  return {
    type: "UNKNOWN_DEVICE",
    deviceId,
    message: `No profile registered for device ${deviceId}`,
  };
}

/**
 * Create an UNSUPPORTED_CAPABILITY error.
 */
export function unsupportedCapability(
  component: ComponentId,
  capability: Capability,
): DeviceStateError {
  return {
    type: "UNSUPPORTED_CAPABILITY",
    component,
    capability,
    message: `Capability ${capability} is not declared on component ${component}`,
  };
}

/**
 * Create a PUBLISH_FAILED error.
 */
export function publishFailed(message: string, cause?: Error): DeviceStateError {
  if (cause) {
    return { type: "PUBLISH_FAILED", message, cause };
  }
  return { type: "PUBLISH_FAILED", message };
}

/**
 * Format a DeviceStateError for logging.
 */
export function formatDeviceStateError(error: DeviceStateError): string {
  switch (error.type) {
    case "UNKNOWN_DEVICE":
      return `Unknown device: ${error.message}`;
    case "UNSUPPORTED_CAPABILITY":
      return `Unsupported capability: ${error.message}`;
    case "PUBLISH_FAILED":
      return `Publish failed: ${error.message}`;
  }
}
