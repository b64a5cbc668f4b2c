/**
 * Device State Module - Public API
 */

// Types
export type {
  AttributeState,
  Capability,
  ComponentId,
  DeviceEvent,
  DeviceProfile,
  DeviceStateSnapshot,
  PowerConsumptionReport,
  ProfileName,
} from "./schema.js";
export type { DeviceStateError } from "./errors.js";
export type {
  DeviceStateListener,
  DeviceStatePublisher,
  DeviceStateSink,
  DeviceStateSinkOptions,
} from "./service.js";

// Constants
export { DEVICE_PROFILES } from "./schema.js";

// Error utilities
export { formatDeviceStateError, publishFailed } from "./errors.js";

// Service functions
export { createDeviceStateSink } from "./service.js";

// Pure transformations
export { attributeKey, eventUnit } from "./transform.js";
