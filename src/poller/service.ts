/**
 * Poller Module - Service Layer
 *
 * Runs the poll pipeline for one device:
 * preferences → token → fetch → decode → extract → derive → emit.
 *
 * Every trigger (startup, interval, preference change, manual refresh,
 * grid switch command) goes through one entry point that keeps at most one
 * cycle in flight per device. A trigger that arrives mid-cycle queues the next
 * cycle; further triggers join that queued cycle.
 */
import { emitReading } from "../emission/index.js";
import type { GatewayPreferences } from "../gateway/index.js";
import {
  decodeProductionDocument,
  fetchProductionBody,
  formatGatewayError,
  resolveGatewayTarget,
} from "../gateway/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  extractMetrics,
  formatEnergySummary,
  formatPowerSummary,
  normalizeReading,
} from "../metrics/index.js";
import { unexpectedError } from "./errors.js";
import type {
  CycleOutcome,
  FetchBody,
  PollerDependencies,
  PollerOptions,
  PollerState,
  PollTrigger,
} from "./schema.js";
import { INITIAL_POLLER_STATE } from "./schema.js";
import { preferencesChanged } from "./transform.js";

const log = createLogger("poller");

// =============================================================================
// Poll Cycle
// =============================================================================

type CycleContext = Readonly<{
  deviceId: string;
  timeoutMs: number;
  fetchBody: FetchBody;
  sink: PollerDependencies["sink"];
  now: () => number;
}>;

/**
 * Run one poll cycle end to end. Each stage short-circuits on failure and
 * nothing is retried; the next trigger is the retry.
 *
 * @returns The cycle outcome; never rejects for pipeline failures
 */
export async function runPollCycle(
  preferences: GatewayPreferences,
  trigger: PollTrigger,
  ctx: CycleContext,
): Promise<CycleOutcome> {
  const { deviceId } = ctx;

  const target = resolveGatewayTarget(preferences);
  if (target.isErr()) {
    log.warn(
      { deviceId, trigger, error: formatGatewayError(target.error) },
      "Gateway address or token not set - skipping poll",
    );
    return {
      status: "skipped",
      trigger,
      error: target.error,
      completedAt: ctx.now(),
    };
  }

  const body = await ctx.fetchBody(target.value, { timeoutMs: ctx.timeoutMs });
  if (body.isErr()) {
    const status = body.error.type === "FETCH_FAILED" ? body.error.status : null;
    log.error(
      { deviceId, trigger, status, error: formatGatewayError(body.error) },
      status === 401
        ? "Gateway rejected the token (HTTP 401) - token may have expired"
        : "Gateway fetch failed",
    );
    return { status: "failed", trigger, error: body.error, completedAt: ctx.now() };
  }

  const document = decodeProductionDocument(body.value);
  if (document.isErr()) {
    log.error(
      {
        deviceId,
        trigger,
        error: formatGatewayError(document.error),
        body: body.value,
      },
      "Gateway response could not be decoded",
    );
    return {
      status: "failed",
      trigger,
      error: document.error,
      completedAt: ctx.now(),
    };
  }

  const metrics = extractMetrics(document.value);
  if (metrics.missingFields.length > 0) {
    log.debug(
      { deviceId, missingFields: metrics.missingFields },
      "Missing metrics defaulted to zero",
    );
  }

  const reading = normalizeReading(metrics, ctx.now());

  log.info({ deviceId }, formatPowerSummary(reading));
  log.info({ deviceId }, formatEnergySummary(reading));

  const emission = await emitReading(deviceId, reading, ctx.sink);

  return {
    status: "emitted",
    trigger,
    reading,
    emission,
    completedAt: ctx.now(),
  };
}

// =============================================================================
// Device Poller
// =============================================================================

/**
 * Per-device poll context with explicit start/stop lifecycle.
 */
export type DevicePoller = Readonly<{
  deviceId: string;
  /** Run a startup cycle and arm the periodic timer */
  start: () => void;
  /** Disarm the periodic timer; an in-flight cycle finishes on its own */
  stop: () => void;
  /** Request a cycle and wait for its outcome */
  refresh: (trigger?: PollTrigger) => Promise<CycleOutcome>;
  /**
   * Replace the preferences. Runs exactly one cycle if any watched value
   * changed, otherwise resolves to null without polling.
   */
  applyPreferences: (next: GatewayPreferences) => Promise<CycleOutcome | null>;
  getPreferences: () => GatewayPreferences;
  getState: () => PollerState;
}>;

/**
 * Create the poll context for one device.
 */
export function createDevicePoller(
  options: PollerOptions,
  deps: PollerDependencies,
): DevicePoller {
  const { deviceId, intervalMs } = options;
  const now = deps.now ?? Date.now;

  const ctx: CycleContext = {
    deviceId,
    timeoutMs: options.timeoutMs,
    fetchBody: deps.fetchBody ?? fetchProductionBody,
    sink: deps.sink,
    now,
  };

  let preferences: GatewayPreferences = options.preferences;
  let state: PollerState = INITIAL_POLLER_STATE;
  let timer: ReturnType<typeof setInterval> | null = null;

  let current: Promise<CycleOutcome> | null = null;
  let queued: Promise<CycleOutcome> | null = null;

  async function execute(trigger: PollTrigger): Promise<CycleOutcome> {
    const startTime = Date.now();
    state = { ...state, inFlight: true };
    logOperationStart(log, "pollCycle", { deviceId, trigger });

    let outcome: CycleOutcome;
    try {
      // Preferences are read when the cycle starts, not when it was requested
      outcome = await runPollCycle(preferences, trigger, ctx);
    } catch (error) {
      logOperationFailed(log, "pollCycle", error, { deviceId, trigger });
      outcome = {
        status: "failed",
        trigger,
        error: unexpectedError(error),
        completedAt: now(),
      };
    }

    state = {
      ...state,
      inFlight: false,
      cycleCount: state.cycleCount + 1,
      lastPollTime: outcome.completedAt,
      lastOutcome: outcome,
      lastReading:
        outcome.status === "emitted" ? outcome.reading : state.lastReading,
    };

    logOperationComplete(log, "pollCycle", startTime, {
      deviceId,
      trigger,
      status: outcome.status,
    });

    deps.onCycleComplete?.(deviceId, outcome);

    return outcome;
  }

  function startCycle(trigger: PollTrigger): Promise<CycleOutcome> {
    const run = execute(trigger).finally(() => {
      if (current === run) {
        current = null;
      }
    });
    current = run;
    return run;
  }

  function requestCycle(trigger: PollTrigger): Promise<CycleOutcome> {
    // A queued cycle outlives `current` until its callback runs; join it
    if (queued !== null) {
      log.debug({ deviceId, trigger }, "Cycle already queued - coalescing");
      return queued;
    }

    if (current === null) {
      return startCycle(trigger);
    }

    log.debug({ deviceId, trigger }, "Cycle in flight - queueing next");
    state = { ...state, queued: true };

    const next = current.then(() => {
      queued = null;
      state = { ...state, queued: false };
      return startCycle(trigger);
    });
    queued = next;
    return next;
  }

  function start(): void {
    if (timer !== null) {
      log.warn({ deviceId }, "Poller already running");
      return;
    }

    log.info({ deviceId, intervalMs }, "Starting device poller...");
    state = { ...state, isRunning: true };

    void requestCycle("startup");

    timer = setInterval(() => {
      void requestCycle("interval");
    }, intervalMs);
  }

  function stop(): void {
    if (timer === null) {
      log.warn({ deviceId }, "Poller not running");
      return;
    }

    log.info({ deviceId }, "Stopping device poller...");
    clearInterval(timer);
    timer = null;
    state = { ...state, isRunning: false };
  }

  function applyPreferences(
    next: GatewayPreferences,
  ): Promise<CycleOutcome | null> {
    if (!preferencesChanged(preferences, next)) {
      log.debug({ deviceId }, "Preferences unchanged - no poll");
      return Promise.resolve(null);
    }

    log.info(
      { deviceId, address: next.address },
      "Preferences updated - triggering immediate poll",
    );
    preferences = next;
    return requestCycle("preferences");
  }

  return {
    deviceId,
    start,
    stop,
    refresh: (trigger = "manual") => requestCycle(trigger),
    applyPreferences,
    getPreferences: () => preferences,
    getState: () => state,
  };
}
