/**
 * MQTT Module - Schemas and Types
 *
 * Retained device-state messages published for each accepted device event.
 */
import type { DeviceEvent } from "../device-state/index.js";

export type MqttPublisherConfig = Readonly<{
  brokerUrl: string;
  topicPrefix: string;
}>;

/**
 * Body of a device-state message.
 *
 * @example
 * { "value": 3300, "unit": "W", "timestamp": "2024-01-01T12:00:00.000Z" }
 */
export type StatePayload = Readonly<{
  value: DeviceEvent["value"];
  unit: string | null;
  timestamp: string;
}>;

export type StateMessage = Readonly<{
  topic: string;
  payload: string;
}>;
