/**
 * Gateway Module - Error Types
 *
 * Typed error unions for talking to the solar gateway.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while fetching and decoding gateway telemetry.
 */
export type GatewayError =
  | {
      readonly type: "CONFIGURATION_INCOMPLETE";
      readonly message: string;
      readonly missing: ReadonlyArray<"address" | "token">;
    }
  | {
      readonly type: "FETCH_FAILED";
      readonly message: string;
      /** HTTP status, or null when no response was received */
      readonly status: number | null;
      readonly cause?: Error;
    }
  | {
      readonly type: "DECODE_FAILED";
      readonly message: string;
      /** Raw body, kept for diagnostics only */
      readonly body: string;
    };

/**
 * Create a CONFIGURATION_INCOMPLETE error.
 */
export function configurationIncomplete(
  missing: ReadonlyArray<"address" | "token">,
): GatewayError {
  return {
    type: "CONFIGURATION_INCOMPLETE",
    message: `Gateway ${missing.join(" and ")} not set`,
    missing,
  };
}

/**
 * Create a FETCH_FAILED error.
 */
export function fetchFailed(
  status: number | null,
  message: string,
  cause?: Error,
): GatewayError {
  if (cause) {
    return { type: "FETCH_FAILED", status, message, cause };
  }
  return { type: "FETCH_FAILED", status, message };
}

/**
 * Create a DECODE_FAILED error.
 */
export function decodeFailed(message: string, body: string): GatewayError {
  return { type: "DECODE_FAILED", message, body };
}

/**
 * Format a GatewayError for logging.
 */
export function formatGatewayError(error: GatewayError): string {
  switch (error.type) {
    case "CONFIGURATION_INCOMPLETE":
      return `Configuration incomplete: ${error.message}`;
    case "FETCH_FAILED":
      return error.status === null
        ? `Fetch failed: ${error.message}`
        : `Fetch failed (HTTP ${error.status}): ${error.message}`;
    case "DECODE_FAILED":
      return `Decode failed: ${error.message}`;
  }
}
