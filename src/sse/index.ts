/**
 * SSE Module - Public API
 *
 * Exports types and service functions for Server-Sent Events.
 */

// Types
export type {
  ConnectedEvent,
  DeviceSnapshotEvent,
  DeviceStateEvent,
  PollResultEvent,
  SseEvent,
  Subscription,
} from "./schema.js";

// Service functions
export {
  broadcast,
  broadcastDeviceEvent,
  broadcastPollResult,
  createSseStream,
  disconnectAllClients,
  getClientCount,
  removeClient,
  sendToClient,
} from "./service.js";
