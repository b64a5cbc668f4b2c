/**
 * MQTT Module - Pure Transformations
 *
 * Topic and payload construction for device-state messages.
 */
import type { DeviceEvent } from "../device-state/index.js";
import { eventUnit } from "../device-state/index.js";
import type { StateMessage, StatePayload } from "./schema.js";

/**
 * Replace characters that would split a topic level or act as a wildcard.
 *
 * @example
 * sanitizeTopicSegment("roof/gw#1") // "roof_gw_1"
 */
export function sanitizeTopicSegment(segment: string): string {
  return segment.replace(/[/+#]/g, "_");
}

/**
 * Build the state topic for an event.
 *
 * @example
 * buildStateTopic("solar-gateway", "gw-1", gridSwitchEvent)
 * // "solar-gateway/gw-1/grid/switch/switch"
 */
export function buildStateTopic(
  prefix: string,
  deviceId: string,
  event: DeviceEvent,
): string {
  return [
    prefix,
    sanitizeTopicSegment(deviceId),
    event.component,
    event.capability,
    event.attribute,
  ].join("/");
}

export function buildStatePayload(
  event: DeviceEvent,
  timestamp: number,
): StatePayload {
  return {
    value: event.value,
    unit: eventUnit(event),
    timestamp: new Date(timestamp).toISOString(),
  };
}

export function buildStateMessage(
  prefix: string,
  deviceId: string,
  event: DeviceEvent,
  timestamp: number,
): StateMessage {
  return {
    topic: buildStateTopic(prefix, deviceId, event),
    payload: JSON.stringify(buildStatePayload(event, timestamp)),
  };
}
