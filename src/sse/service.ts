/**
 * SSE Module - Service Layer
 *
 * Server-Sent Events fan-out of device state and poll results. A subscriber
 * either follows every device or a single one.
 */
import type { DeviceEvent } from "../device-state/index.js";
import { eventUnit } from "../device-state/index.js";
import { createLogger } from "../logger.js";
import type { CycleOutcome } from "../poller/index.js";
import { summarizeOutcome } from "../poller/index.js";
import type { SseEvent, Subscription } from "./schema.js";

const log = createLogger("sse");

const encoder = new TextEncoder();

type Subscriber = Readonly<{
  controller: ReadableStreamDefaultController<Uint8Array>;
  subscription: Subscription;
}>;

const subscribers = new Map<number, Subscriber>();
let nextClientId = 1;

// =============================================================================
// Framing
// =============================================================================

function frame(event: SseEvent): Uint8Array {
  return encoder.encode(
    `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`,
  );
}

/**
 * Whether a subscriber receives an event. Snapshots and connection notices
 * are addressed to one client, so only per-device events are filtered.
 */
function follows(subscription: Subscription, event: SseEvent): boolean {
  switch (event.type) {
    case "device_event":
    case "poll_result":
      return (
        subscription.deviceId === null ||
        subscription.deviceId === event.deviceId
      );
    case "connected":
    case "device_snapshot":
      return true;
  }
}

/**
 * Enqueue a frame; a closed stream drops its subscriber.
 */
function deliver(clientId: number, data: Uint8Array): boolean {
  const subscriber = subscribers.get(clientId);
  if (!subscriber) return false;

  try {
    subscriber.controller.enqueue(data);
    return true;
  } catch (error) {
    subscribers.delete(clientId);
    log.debug({ clientId, error }, "SSE stream closed - subscriber dropped");
    return false;
  }
}

// =============================================================================
// Subscribers
// =============================================================================

/**
 * Number of open event streams.
 */
export function getClientCount(): number {
  return subscribers.size;
}

/**
 * Open an event stream.
 *
 * @param deviceId - Follow only this device; all devices when omitted
 */
export function createSseStream(deviceId: string | null = null): {
  stream: ReadableStream<Uint8Array>;
  clientId: number;
} {
  const clientId = nextClientId++;
  const subscription: Subscription = { clientId, deviceId };

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      subscribers.set(clientId, { controller, subscription });
      log.info(
        { clientId, deviceId, totalClients: subscribers.size },
        "SSE subscriber added",
      );
      controller.enqueue(frame({ type: "connected", ...subscription }));
    },
    cancel() {
      removeClient(clientId);
    },
  });

  return { stream, clientId };
}

/**
 * Drop a subscriber, e.g. when its request is aborted.
 */
export function removeClient(clientId: number): void {
  if (subscribers.delete(clientId)) {
    log.debug(
      { clientId, remainingClients: subscribers.size },
      "SSE subscriber removed",
    );
  }
}

/**
 * Send an event to one subscriber.
 */
export function sendToClient(clientId: number, event: SseEvent): boolean {
  return deliver(clientId, frame(event));
}

// =============================================================================
// Broadcasting
// =============================================================================

/**
 * Send an event to every subscriber that follows it.
 *
 * @returns Number of streams the event was written to
 */
export function broadcast(event: SseEvent): number {
  const data = frame(event);
  let sent = 0;

  for (const [clientId, { subscription }] of subscribers) {
    if (follows(subscription, event) && deliver(clientId, data)) {
      sent++;
    }
  }

  log.debug({ eventType: event.type, clients: sent }, "Event broadcasted");
  return sent;
}

/**
 * Broadcast an accepted device-state change.
 * Registered as a listener on the device-state sink.
 */
export function broadcastDeviceEvent(
  deviceId: string,
  event: DeviceEvent,
  timestamp: number,
): void {
  broadcast({
    type: "device_event",
    deviceId,
    component: event.component,
    capability: event.capability,
    attribute: event.attribute,
    value: event.value,
    unit: eventUnit(event),
    timestamp: new Date(timestamp).toISOString(),
  });
}

/**
 * Broadcast the result of a finished poll cycle.
 */
export function broadcastPollResult(
  deviceId: string,
  outcome: CycleOutcome,
): void {
  const summary = summarizeOutcome(outcome);
  broadcast({
    type: "poll_result",
    deviceId,
    status: summary.status,
    trigger: summary.trigger,
    completedAt: summary.completedAt,
    error: summary.error,
  });
}

/**
 * Close every stream (shutdown).
 */
export function disconnectAllClients(): void {
  log.info({ clientCount: subscribers.size }, "Closing SSE streams...");

  for (const [clientId, { controller }] of subscribers) {
    try {
      controller.close();
    } catch (error) {
      log.debug({ clientId, error }, "SSE stream already closed");
    }
  }

  subscribers.clear();
}
