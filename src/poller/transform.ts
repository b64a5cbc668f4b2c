/**
 * Poller Module - Pure Transformations
 */
import type { GatewayPreferences } from "../gateway/index.js";
import { assembleToken } from "../gateway/index.js";
import type { NormalizedReading } from "../metrics/index.js";
import { formatPollCycleError } from "./errors.js";
import type { CycleOutcome, PreferencesUpdate } from "./schema.js";

/**
 * Compare the watched preferences by value.
 */
export function preferencesChanged(
  previous: GatewayPreferences,
  next: GatewayPreferences,
): boolean {
  return (
    previous.address !== next.address ||
    previous.tokenPart1 !== next.tokenPart1 ||
    previous.tokenPart2 !== next.tokenPart2
  );
}

/**
 * Apply a partial update to the current preferences.
 */
export function mergePreferences(
  current: GatewayPreferences,
  update: PreferencesUpdate,
): GatewayPreferences {
  return {
    address: update.address ?? current.address,
    tokenPart1: update.tokenPart1 ?? current.tokenPart1,
    tokenPart2: update.tokenPart2 ?? current.tokenPart2,
  };
}

/**
 * Preferences as safe to show: the token itself never leaves the process.
 */
export function describePreferences(preferences: GatewayPreferences): Readonly<{
  address: string;
  tokenConfigured: boolean;
}> {
  return {
    address: preferences.address,
    tokenConfigured:
      assembleToken(preferences.tokenPart1, preferences.tokenPart2) !== "",
  };
}

/**
 * JSON-friendly view of a cycle outcome.
 */
export function summarizeOutcome(outcome: CycleOutcome): Readonly<{
  status: CycleOutcome["status"];
  trigger: CycleOutcome["trigger"];
  completedAt: string;
  error: string | null;
  errorType: string | null;
  reading: NormalizedReading | null;
  rejectedEvents: number;
}> {
  const completedAt = new Date(outcome.completedAt).toISOString();

  if (outcome.status === "emitted") {
    return {
      status: outcome.status,
      trigger: outcome.trigger,
      completedAt,
      error: null,
      errorType: null,
      reading: outcome.reading,
      rejectedEvents: outcome.emission.rejected.length,
    };
  }

  return {
    status: outcome.status,
    trigger: outcome.trigger,
    completedAt,
    error: formatPollCycleError(outcome.error),
    errorType: outcome.error.type,
    reading: null,
    rejectedEvents: 0,
  };
}
