/**
 * SSE Module - Schemas and Types
 *
 * Defines the event types for Server-Sent Events.
 */
import type {
  Capability,
  ComponentId,
  DeviceEvent,
} from "../device-state/index.js";
import type { DeviceView } from "../devices/index.js";
import type { CycleOutcome } from "../poller/index.js";

// =============================================================================
// Subscriptions
// =============================================================================

/**
 * An open event stream. `deviceId: null` follows every device.
 */
export type Subscription = Readonly<{
  clientId: number;
  deviceId: string | null;
}>;

// =============================================================================
// SSE Event Types
// =============================================================================

/**
 * First event on every stream.
 */
export type ConnectedEvent = Readonly<{ type: "connected" } & Subscription>;

/**
 * One accepted device-state change.
 */
export type DeviceStateEvent = Readonly<{
  type: "device_event";
  deviceId: string;
  component: ComponentId;
  capability: Capability;
  attribute: string;
  value: DeviceEvent["value"];
  unit: string | null;
  timestamp: string;
}>;

/**
 * Result of a finished poll cycle.
 */
export type PollResultEvent = Readonly<{
  type: "poll_result";
  deviceId: string;
  status: CycleOutcome["status"];
  trigger: CycleOutcome["trigger"];
  completedAt: string;
  error: string | null;
}>;

/**
 * Device snapshot (initial state on connect).
 */
export type DeviceSnapshotEvent = Readonly<{
  type: "device_snapshot";
  devices: ReadonlyArray<DeviceView>;
}>;

/**
 * Union of all SSE event types.
 */
export type SseEvent =
  | ConnectedEvent
  | DeviceStateEvent
  | PollResultEvent
  | DeviceSnapshotEvent;
