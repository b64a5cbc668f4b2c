/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Solar Gateway Bridge configuration covering:
 * - Server settings
 * - Gateway device (address, split bearer token, polling)
 * - MQTT publication of device state
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().default(8084).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z
    .string()
    .default("SolarGatewayBridge")
    .describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Device Registration
  // ==========================================================================
  DEVICE_ID: z
    .string()
    .min(1)
    .default("solar-gateway-1")
    .describe("Identifier of the monitored gateway device"),
  DEVICE_LABEL: z
    .string()
    .default("Solar Gateway")
    .describe("Human readable device label"),
  DEVICE_PROFILE: z
    .enum(["solar-gateway-power", "solar-gateway-basic", "solar-gateway-report"])
    .default("solar-gateway-power")
    .describe("Capability profile declared for the device"),

  // ==========================================================================
  // Gateway Preferences (initial values, may be changed at runtime)
  // Missing values do not crash the app - poll cycles are skipped instead.
  // ==========================================================================
  GATEWAY_ADDRESS: z
    .string()
    .default("")
    .describe("Gateway host or IP address on the local network"),
  GATEWAY_TOKEN_PART_1: z
    .string()
    .default("")
    .describe("First half of the gateway bearer token"),
  GATEWAY_TOKEN_PART_2: z
    .string()
    .default("")
    .describe("Second half of the gateway bearer token"),

  // ==========================================================================
  // Polling
  // ==========================================================================
  POLLING_INTERVAL_MS: z.coerce
    .number()
    .positive()
    .default(300_000)
    .describe("Polling interval in milliseconds"),
  GATEWAY_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(10_000)
    .describe("HTTP timeout for a single gateway request (ms)"),

  // ==========================================================================
  // MQTT Publication
  // ==========================================================================
  ENABLE_MQTT_PUBLISH: envBoolean(false).describe(
    "Publish device state to an MQTT broker",
  ),
  MQTT_BROKER_URL: optionalString.describe("MQTT broker connection URL"),
  MQTT_TOPIC_PREFIX: z
    .string()
    .min(1)
    .default("solar-gateway")
    .describe("Topic prefix for published device state"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * MQTT publication configuration.
 * Returns null if publishing is disabled or no broker is configured.
 */
export function getMqttConfig(): Readonly<{
  brokerUrl: string;
  topicPrefix: string;
}> | null {
  if (!config.ENABLE_MQTT_PUBLISH || !config.MQTT_BROKER_URL) {
    return null;
  }

  return {
    brokerUrl: config.MQTT_BROKER_URL,
    topicPrefix: config.MQTT_TOPIC_PREFIX,
  };
}

/**
 * Gateway preferences as seeded from the environment.
 */
export function getInitialPreferences(): Readonly<{
  address: string;
  tokenPart1: string;
  tokenPart2: string;
}> {
  return {
    address: config.GATEWAY_ADDRESS,
    tokenPart1: config.GATEWAY_TOKEN_PART_1,
    tokenPart2: config.GATEWAY_TOKEN_PART_2,
  };
}
