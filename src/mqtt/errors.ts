/**
 * MQTT Module - Error Types
 */

export type MqttError =
  | {
      readonly type: "NOT_CONNECTED";
      readonly message: string;
    }
  | {
      readonly type: "PUBLISH_FAILED";
      readonly topic: string;
      readonly message: string;
      readonly cause?: Error;
    };

export const notConnected = (): MqttError => ({
  type: "NOT_CONNECTED",
  message: "MQTT client is not connected",
});

export function publishFailed(
  topic: string,
  message: string,
  cause?: Error,
): MqttError {
  if (cause) {
    return { type: "PUBLISH_FAILED", topic, message, cause };
  }
  return { type: "PUBLISH_FAILED", topic, message };
}

/**
 * Format an MqttError for logging.
 */
export function formatMqttError(error: MqttError): string {
  switch (error.type) {
    case "NOT_CONNECTED":
      return error.message;
    case "PUBLISH_FAILED":
      return `Publish to ${error.topic} failed: ${error.message}`;
  }
}
