/**
 * Emission Module - Schemas and Types
 *
 * Logical channels a reading is published on.
 */
import type { DeviceEvent, DeviceStateError } from "../device-state/index.js";

/**
 * - production: solar output on the main component
 * - consumption: home load on the consumed component
 * - grid: flow magnitude and export indicator on the grid component
 */
export type ChannelName = "production" | "consumption" | "grid";

export type ChannelEvents = Readonly<{
  channel: ChannelName;
  events: ReadonlyArray<DeviceEvent>;
}>;

export type ChannelOptions = Readonly<{
  /** Also emit the richer consumption report */
  consumptionReport: boolean;
}>;

/**
 * An event the sink refused.
 */
export type RejectedEvent = Readonly<{
  channel: ChannelName;
  event: DeviceEvent;
  error: DeviceStateError;
}>;

/**
 * Outcome of emitting one reading. Partial emission is a normal outcome.
 */
export type EmissionSummary = Readonly<{
  published: number;
  rejected: ReadonlyArray<RejectedEvent>;
}>;
