/**
 * MQTT Module - Service Layer
 *
 * MQTT client management and retained device-state publication.
 * Publishing never waits for a connection: while the client is offline a
 * publish fails fast with NOT_CONNECTED and the next reading catches up.
 */
import { type Result, err, ok } from "neverthrow";
import mqtt from "mqtt";
import type { MqttClient } from "mqtt";

import type { DeviceStatePublisher } from "../device-state/index.js";
import { publishFailed as statePublishFailed } from "../device-state/index.js";
import { createLogger } from "../logger.js";
import type { MqttError } from "./errors.js";
import { formatMqttError, notConnected, publishFailed } from "./errors.js";
import type { MqttPublisherConfig, StateMessage } from "./schema.js";
import { buildStateMessage } from "./transform.js";

const log = createLogger("mqtt");

// =============================================================================
// Module State
// =============================================================================

let mqttClient: MqttClient | null = null;

// =============================================================================
// MQTT Client Management
// =============================================================================

/**
 * Initialize and connect the MQTT client.
 *
 * @returns true if connection initiated successfully
 */
export function initializeMqttClient(brokerUrl: string): boolean {
  if (mqttClient) {
    log.warn("MQTT client already initialized");
    return true;
  }

  log.info({ broker: brokerUrl }, "Connecting to MQTT broker...");

  try {
    mqttClient = mqtt.connect(brokerUrl, {
      reconnectPeriod: 5000, // Reconnect every 5 seconds
      connectTimeout: 10000, // 10 second connection timeout
    });

    setupClientHandlers(mqttClient);

    return true;
  } catch (error) {
    log.error({ error }, "Failed to initialize MQTT client");
    return false;
  }
}

/**
 * Set up MQTT client event handlers.
 */
function setupClientHandlers(client: MqttClient): void {
  client.on("connect", () => {
    log.info("Connected to MQTT broker");
  });

  client.on("error", (error) => {
    log.error({ error: error.message }, "MQTT client error");
  });

  client.on("close", () => {
    log.warn("MQTT connection closed");
  });

  client.on("reconnect", () => {
    log.info("Reconnecting to MQTT broker...");
  });

  client.on("offline", () => {
    log.warn("MQTT client offline");
  });
}

// =============================================================================
// Publishing
// =============================================================================

/**
 * Publish one retained state message.
 */
export async function publishStateMessage(
  message: StateMessage,
): Promise<Result<void, MqttError>> {
  if (!mqttClient || !mqttClient.connected) {
    return err(notConnected());
  }

  try {
    await mqttClient.publishAsync(message.topic, message.payload, {
      qos: 0,
      retain: true,
    });
    log.debug({ topic: message.topic }, "Device state published");
    return ok(undefined);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    return err(
      publishFailed(
        message.topic,
        cause ? cause.message : String(error),
        cause,
      ),
    );
  }
}

/**
 * Create a sink publisher that mirrors every accepted device event to MQTT.
 */
export function createMqttStatePublisher(
  publisherConfig: Pick<MqttPublisherConfig, "topicPrefix">,
): DeviceStatePublisher {
  return async (deviceId, event, timestamp) => {
    const message = buildStateMessage(
      publisherConfig.topicPrefix,
      deviceId,
      event,
      timestamp,
    );

    const result = await publishStateMessage(message);
    return result.mapErr((error) => {
      log.debug(
        { deviceId, error: formatMqttError(error) },
        "MQTT publish skipped",
      );
      const cause = error.type === "PUBLISH_FAILED" ? error.cause : undefined;
      return statePublishFailed(formatMqttError(error), cause);
    });
  };
}

// =============================================================================
// Client Control
// =============================================================================

/**
 * Check if MQTT client is connected.
 */
export function isConnected(): boolean {
  return mqttClient?.connected ?? false;
}

/**
 * Disconnect and clean up MQTT client.
 */
export function disconnectMqttClient(): void {
  if (mqttClient) {
    log.info("Disconnecting MQTT client...");
    mqttClient.end(true);
    mqttClient = null;
  }
}
