/**
 * Emission Module - Public API
 */

// Types
export type {
  ChannelEvents,
  ChannelName,
  EmissionSummary,
  RejectedEvent,
} from "./schema.js";

// Service functions
export { emitReading } from "./service.js";

// Pure transformations
export { buildChannelEvents } from "./transform.js";
