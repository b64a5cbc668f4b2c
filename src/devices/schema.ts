/**
 * Devices Module - Schemas and Types
 *
 * A registered device pairs its definition with its own poll context.
 */
import { z } from "zod";

import type { DeviceStateSink } from "../device-state/index.js";
import { GatewayPreferencesSchema } from "../gateway/index.js";
import type {
  CycleOutcome,
  DevicePoller,
  FetchBody,
} from "../poller/index.js";

export const DeviceDefinitionSchema = z.object({
  id: z.string().min(1),
  label: z.string(),
  profileName: z.enum([
    "solar-gateway-power",
    "solar-gateway-basic",
    "solar-gateway-report",
  ]),
  preferences: GatewayPreferencesSchema,
});

export type DeviceDefinition = z.infer<typeof DeviceDefinitionSchema>;

export type RegistryDependencies = Readonly<{
  sink: DeviceStateSink;
  intervalMs: number;
  timeoutMs: number;
  fetchBody?: FetchBody;
  onCycleComplete?: (deviceId: string, outcome: CycleOutcome) => void;
  now?: () => number;
}>;

export type RegisteredDevice = Readonly<{
  id: string;
  label: string;
  profileName: DeviceDefinition["profileName"];
  registeredAt: number;
  poller: DevicePoller;
  sink: DeviceStateSink;
}>;
