/**
 * Solar Gateway Bridge - Application Entry Point
 *
 * Sets up:
 * - Device-state sink with SSE broadcast and optional MQTT publication
 * - Gateway device registration and polling
 * - Hono server with request ID tracing and global error handling
 */
import { serve } from "@hono/node-server";
import { Hono } from "hono";

import { errorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { routes } from "./api/routes.js";
import { config, getInitialPreferences, getMqttConfig } from "./config.js";
import type { DeviceStatePublisher } from "./device-state/index.js";
import { createDeviceStateSink } from "./device-state/index.js";
import {
  formatDevicesError,
  registerDevice,
  startDevice,
  stopAllDevices,
} from "./devices/index.js";
import { createLogger } from "./logger.js";
import {
  createMqttStatePublisher,
  disconnectMqttClient,
  initializeMqttClient,
} from "./mqtt/index.js";
import {
  broadcastDeviceEvent,
  broadcastPollResult,
  disconnectAllClients,
} from "./sse/index.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  SOLAR GATEWAY BRIDGE");
console.log("========================================");
console.log("");

// Log configuration summary (non-sensitive values only)
const initialPreferences = getInitialPreferences();
log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    deviceId: config.DEVICE_ID,
    profile: config.DEVICE_PROFILE,
    gatewayAddress: initialPreferences.address || "(not set)",
    pollingIntervalMs: config.POLLING_INTERVAL_MS,
    gatewayTimeoutMs: config.GATEWAY_TIMEOUT_MS,
  },
  "Configuration loaded",
);

// =============================================================================
// DEVICE STATE SINK
// =============================================================================

const publishers: DeviceStatePublisher[] = [];

const mqttConfig = getMqttConfig();
if (mqttConfig) {
  initializeMqttClient(mqttConfig.brokerUrl);
  publishers.push(createMqttStatePublisher(mqttConfig));
  log.info(
    { broker: mqttConfig.brokerUrl, topicPrefix: mqttConfig.topicPrefix },
    "MQTT publication: ENABLED",
  );
} else {
  log.info("MQTT publication: DISABLED");
}

const sink = createDeviceStateSink({
  publishers,
  listeners: [broadcastDeviceEvent],
});

console.log("");

// =============================================================================
// DEVICE REGISTRATION
// =============================================================================

const registration = registerDevice(
  {
    id: config.DEVICE_ID,
    label: config.DEVICE_LABEL,
    profileName: config.DEVICE_PROFILE,
    preferences: initialPreferences,
  },
  {
    sink,
    intervalMs: config.POLLING_INTERVAL_MS,
    timeoutMs: config.GATEWAY_TIMEOUT_MS,
    onCycleComplete: broadcastPollResult,
  },
);

if (registration.isErr()) {
  log.error(
    { error: formatDevicesError(registration.error) },
    "Device registration failed",
  );
  process.exit(1);
}

// =============================================================================
// HONO SERVER SETUP
// =============================================================================

const app = new Hono();

// Global middleware
app.use("*", requestIdMiddleware);

// Error handler
app.onError(errorHandler);

// Mount routes
app.route("/", routes);

// =============================================================================
// START SERVER
// =============================================================================

log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    appName: config.APP_NAME,
  },
  `🚀 ${config.APP_NAME} starting on port ${config.PORT}`,
);

const server = serve({
  fetch: app.fetch,
  port: config.PORT,
  hostname: "0.0.0.0", // Bind to all interfaces for remote access
});

// Startup poll and periodic timer
startDevice(config.DEVICE_ID);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down...`);

  // Stop polling timers; an in-flight fetch ends under its timeout
  stopAllDevices();

  // Close MQTT client
  disconnectMqttClient();

  // Close SSE connections
  disconnectAllClients();

  server.close(() => {
    log.info("Shutdown complete");
    process.exit(0);
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
