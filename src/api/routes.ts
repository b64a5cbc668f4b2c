/**
 * API routes for the Solar Gateway Bridge.
 *
 * Routes are organized by domain:
 * - /api/health - Health check
 * - /api/devices/* - Device state, manual refresh, preferences
 * - /api/events - SSE stream for real-time updates
 */
import { Hono } from "hono";

import { config, getMqttConfig } from "../config.js";
import {
  describeDevice,
  formatDevicesError,
  getDevice,
  listDevices,
} from "../devices/index.js";
import { createLogger } from "../logger.js";
import { isConnected } from "../mqtt/index.js";
import type { CycleOutcome } from "../poller/index.js";
import {
  PreferencesUpdateSchema,
  describePreferences,
  mergePreferences,
  summarizeOutcome,
} from "../poller/index.js";
import {
  createSseStream,
  getClientCount,
  removeClient,
  sendToClient,
} from "../sse/index.js";

const log = createLogger("api");

const APP_VERSION = "1.0.0";

export const routes = new Hono();

/**
 * HTTP status for a finished cycle: emitted → 200, configuration
 * incomplete → 409, fetch or decode failure → 502.
 */
function outcomeStatus(outcome: CycleOutcome): 200 | 409 | 502 {
  switch (outcome.status) {
    case "emitted":
      return 200;
    case "skipped":
      return 409;
    case "failed":
      return 502;
  }
}

// =============================================================================
// Health Check
// =============================================================================

/**
 * Health endpoint - returns service status.
 * Used by container orchestration and monitoring.
 */
routes.get("/api/health", (c) => {
  const requestId = c.get("requestId");
  log.debug({ requestId }, "Health check");

  return c.json({
    status: "ok",
    timestamp: new Date().toISOString(),
    requestId,
    version: APP_VERSION,
    config: {
      deviceCount: listDevices().length,
      pollingIntervalMs: config.POLLING_INTERVAL_MS,
      mqttEnabled: getMqttConfig() !== null,
      mqttConnected: isConnected(),
    },
    sseClients: getClientCount(),
  });
});

/**
 * Version endpoint - returns app version.
 */
routes.get("/api/version", (c) => {
  return c.json({ version: APP_VERSION });
});

// =============================================================================
// Devices
// =============================================================================

routes.get("/api/devices", (c) => {
  const requestId = c.get("requestId");

  return c.json({
    devices: listDevices().map(describeDevice),
    requestId,
  });
});

routes.get("/api/devices/:id", (c) => {
  const requestId = c.get("requestId");
  const result = getDevice(c.req.param("id"));

  if (result.isErr()) {
    return c.json({ error: formatDevicesError(result.error), requestId }, 404);
  }

  return c.json({ ...describeDevice(result.value), requestId });
});

/**
 * Manual refresh - runs one poll cycle and waits for it.
 * Joins the queued cycle if one is already waiting.
 */
routes.post("/api/devices/:id/refresh", async (c) => {
  const requestId = c.get("requestId");
  const deviceId = c.req.param("id");
  log.info({ requestId, deviceId }, "POST /api/devices/:id/refresh");

  const result = getDevice(deviceId);
  if (result.isErr()) {
    return c.json({ error: formatDevicesError(result.error), requestId }, 404);
  }

  const outcome = await result.value.poller.refresh("manual");

  return c.json(
    { ...summarizeOutcome(outcome), requestId },
    outcomeStatus(outcome),
  );
});

/**
 * Update gateway preferences. Fields left out keep their value.
 * Any change triggers exactly one poll; the response carries its outcome.
 */
routes.put("/api/devices/:id/preferences", async (c) => {
  const requestId = c.get("requestId");
  const deviceId = c.req.param("id");

  const result = getDevice(deviceId);
  if (result.isErr()) {
    return c.json({ error: formatDevicesError(result.error), requestId }, 404);
  }

  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return c.json({ error: "Request body must be JSON", requestId }, 400);
  }

  const parsed = PreferencesUpdateSchema.safeParse(body);
  if (!parsed.success) {
    return c.json(
      {
        error: "Invalid preferences",
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
        requestId,
      },
      400,
    );
  }

  const { poller } = result.value;
  const next = mergePreferences(poller.getPreferences(), parsed.data);

  log.info(
    { requestId, deviceId, fields: Object.keys(parsed.data) },
    "PUT /api/devices/:id/preferences",
  );

  const outcome = await poller.applyPreferences(next);

  return c.json({
    preferences: describePreferences(poller.getPreferences()),
    poll: outcome === null ? null : summarizeOutcome(outcome),
    requestId,
  });
});

/**
 * Grid switch command. The grid indicator only reflects the measured flow
 * direction, so a command re-polls instead of switching anything.
 */
routes.post("/api/devices/:id/components/grid/switch/:command", async (c) => {
  const requestId = c.get("requestId");
  const deviceId = c.req.param("id");
  const command = c.req.param("command");

  if (command !== "on" && command !== "off") {
    return c.json(
      { error: `Unknown switch command: ${command}`, requestId },
      400,
    );
  }

  const result = getDevice(deviceId);
  if (result.isErr()) {
    return c.json({ error: formatDevicesError(result.error), requestId }, 404);
  }

  log.info(
    { requestId, deviceId, command },
    "Grid indicator is read-only - refreshing instead",
  );

  const outcome = await result.value.poller.refresh("command");

  return c.json(
    { ...summarizeOutcome(outcome), ignoredCommand: command, requestId },
    outcomeStatus(outcome),
  );
});

// =============================================================================
// Server-Sent Events
// =============================================================================

/**
 * SSE endpoint for real-time updates.
 * `?device=<id>` follows one device; otherwise every device is followed.
 * New clients get a snapshot of the followed devices, then live events.
 */
routes.get("/api/events", (c) => {
  const requestId = c.get("requestId");
  const deviceId = c.req.query("device") ?? null;

  let devices = listDevices();
  if (deviceId !== null) {
    const result = getDevice(deviceId);
    if (result.isErr()) {
      return c.json({ error: formatDevicesError(result.error), requestId }, 404);
    }
    devices = [result.value];
  }

  const { stream, clientId } = createSseStream(deviceId);

  log.info({ requestId, clientId, deviceId }, "SSE client connected");

  sendToClient(clientId, {
    type: "device_snapshot",
    devices: devices.map(describeDevice),
  });

  c.req.raw.signal.addEventListener("abort", () => {
    removeClient(clientId);
  });

  return new Response(stream, {
    headers: {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    },
  });
});
