/**
 * Poller Module - Public API
 */

// Types
export type {
  CycleOutcome,
  FetchBody,
  PollerDependencies,
  PollerOptions,
  PollerState,
  PollTrigger,
  PreferencesUpdate,
} from "./schema.js";
export type { PollCycleError } from "./errors.js";
export type { DevicePoller } from "./service.js";

// Schemas
export { PreferencesUpdateSchema } from "./schema.js";

// Error utilities
export { formatPollCycleError } from "./errors.js";

// Service functions
export { createDevicePoller, runPollCycle } from "./service.js";

// Pure transformations
export {
  describePreferences,
  mergePreferences,
  preferencesChanged,
  summarizeOutcome,
} from "./transform.js";
