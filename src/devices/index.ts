/**
 * Devices Module - Public API
 */

// Types
export type {
  DeviceDefinition,
  RegisteredDevice,
  RegistryDependencies,
} from "./schema.js";
export type { DevicesError } from "./errors.js";
export type { DeviceView } from "./transform.js";

// Schemas
export { DeviceDefinitionSchema } from "./schema.js";

// Error utilities
export { formatDevicesError } from "./errors.js";

// Service functions
export {
  getDevice,
  listDevices,
  registerDevice,
  startDevice,
  stopAllDevices,
  unregisterDevice,
} from "./service.js";

// Pure transformations
export { describeDevice } from "./transform.js";
