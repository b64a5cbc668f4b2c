/**
 * MQTT Module - Public API
 *
 * Exports types, service functions, and transformations for the MQTT module.
 */

// Types
export type {
  MqttPublisherConfig,
  StateMessage,
  StatePayload,
} from "./schema.js";
export type { MqttError } from "./errors.js";

// Error utilities
export { formatMqttError } from "./errors.js";

// Service functions
export {
  createMqttStatePublisher,
  disconnectMqttClient,
  initializeMqttClient,
  isConnected,
  publishStateMessage,
} from "./service.js";

// Pure transformations (for testing)
export {
  buildStateMessage,
  buildStatePayload,
  buildStateTopic,
  sanitizeTopicSegment,
} from "./transform.js";
