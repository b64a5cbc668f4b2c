/**
 * Poller Module - Error Types
 *
 * Everything that can end a poll cycle without a reading.
 */
import type { GatewayError } from "../gateway/index.js";
import { formatGatewayError } from "../gateway/index.js";

export type PollCycleError =
  | GatewayError
  | {
      readonly type: "UNEXPECTED_ERROR";
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create an UNEXPECTED_ERROR from anything thrown inside a cycle.
 */
export function unexpectedError(error: unknown): PollCycleError {
  if (error instanceof Error) {
    return { type: "UNEXPECTED_ERROR", message: error.message, cause: error };
  }
  return { type: "UNEXPECTED_ERROR", message: String(error) };
}

/**
 * Format a PollCycleError for logging.
 */
export function formatPollCycleError(error: PollCycleError): string {
  if (error.type === "UNEXPECTED_ERROR") {
    return `Unexpected error: ${error.message}`;
  }
  return formatGatewayError(error);
}
