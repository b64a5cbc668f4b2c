/**
 * Poller Module - Schemas and Types
 *
 * Per-device poll context: triggers, cycle outcomes and state.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { DeviceStateSink } from "../device-state/index.js";
import type { EmissionSummary } from "../emission/index.js";
import type {
  FetchOptions,
  GatewayError,
  GatewayPreferences,
  GatewayTarget,
} from "../gateway/index.js";
import type { NormalizedReading } from "../metrics/index.js";
import type { PollCycleError } from "./errors.js";

// =============================================================================
// Triggers
// =============================================================================

/**
 * Why a cycle ran.
 * - startup: device context started
 * - interval: periodic timer
 * - preferences: address or token halves changed
 * - manual: refresh requested over the API
 * - command: grid switch command (read-only, re-polls)
 */
export type PollTrigger =
  | "startup"
  | "interval"
  | "preferences"
  | "manual"
  | "command";

// =============================================================================
// Preferences Update
// =============================================================================

/**
 * Partial preference update. Omitted fields keep their current value.
 */
export const PreferencesUpdateSchema = z
  .object({
    address: z.string(),
    tokenPart1: z.string(),
    tokenPart2: z.string(),
  })
  .partial()
  .strict();

export type PreferencesUpdate = z.infer<typeof PreferencesUpdateSchema>;

// =============================================================================
// Cycle Outcome
// =============================================================================

export type CycleOutcome =
  | Readonly<{
      status: "emitted";
      trigger: PollTrigger;
      reading: NormalizedReading;
      emission: EmissionSummary;
      completedAt: number;
    }>
  | Readonly<{
      /** Configuration incomplete, no network call made */
      status: "skipped";
      trigger: PollTrigger;
      error: PollCycleError;
      completedAt: number;
    }>
  | Readonly<{
      status: "failed";
      trigger: PollTrigger;
      error: PollCycleError;
      completedAt: number;
    }>;

// =============================================================================
// Poller State
// =============================================================================

export type PollerState = Readonly<{
  /** Whether the periodic timer is armed */
  isRunning: boolean;
  inFlight: boolean;
  /** A cycle is waiting for the in-flight one to finish */
  queued: boolean;
  cycleCount: number;
  lastPollTime: number | null;
  lastOutcome: CycleOutcome | null;
  /** Last successfully emitted reading */
  lastReading: NormalizedReading | null;
}>;

export const INITIAL_POLLER_STATE: PollerState = {
  isRunning: false,
  inFlight: false,
  queued: false,
  cycleCount: 0,
  lastPollTime: null,
  lastOutcome: null,
  lastReading: null,
};

// =============================================================================
// Dependencies
// =============================================================================

export type FetchBody = (
  target: GatewayTarget,
  options: FetchOptions,
) => Promise<Result<string, GatewayError>>;

export type PollerOptions = Readonly<{
  deviceId: string;
  preferences: GatewayPreferences;
  intervalMs: number;
  timeoutMs: number;
}>;

export type PollerDependencies = Readonly<{
  sink: DeviceStateSink;
  /** Defaults to the HTTPS gateway fetch */
  fetchBody?: FetchBody;
  /** Called after every cycle, whatever its outcome */
  onCycleComplete?: (deviceId: string, outcome: CycleOutcome) => void;
  now?: () => number;
}>;
