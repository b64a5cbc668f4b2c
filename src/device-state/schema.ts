/**
 * Device State Module - Schemas and Types
 *
 * Capability profiles and the device events published for a gateway device.
 */

// =============================================================================
// Capabilities and Components
// =============================================================================

export type ComponentId = "main" | "consumed" | "grid";

export type Capability =
  | "powerMeter"
  | "energyMeter"
  | "powerConsumptionReport"
  | "switch"
  | "refresh";

/**
 * Capabilities declared per component.
 * Events for anything not declared here are rejected by the sink.
 */
export type DeviceProfile = Readonly<{
  name: ProfileName;
  components: Readonly<Record<ComponentId, ReadonlyArray<Capability>>>;
}>;

export type ProfileName =
  | "solar-gateway-power"
  | "solar-gateway-basic"
  | "solar-gateway-report";

export const DEVICE_PROFILES: Readonly<Record<ProfileName, DeviceProfile>> = {
  "solar-gateway-power": {
    name: "solar-gateway-power",
    components: {
      main: ["powerMeter", "energyMeter", "refresh"],
      consumed: ["powerMeter", "energyMeter"],
      grid: ["powerMeter", "switch"],
    },
  },
  // Older profile without consumption energy
  "solar-gateway-basic": {
    name: "solar-gateway-basic",
    components: {
      main: ["powerMeter", "energyMeter", "refresh"],
      consumed: ["powerMeter"],
      grid: ["powerMeter", "switch"],
    },
  },
  "solar-gateway-report": {
    name: "solar-gateway-report",
    components: {
      main: ["powerMeter", "energyMeter", "refresh"],
      consumed: ["powerMeter", "energyMeter", "powerConsumptionReport"],
      grid: ["powerMeter", "switch"],
    },
  },
};

// =============================================================================
// Device Events
// =============================================================================

/**
 * Consumption report payload. Only energy and power are known; the
 * remaining fields are sent as zero.
 */
export type PowerConsumptionReport = Readonly<{
  energy: number;
  power: number;
  deltaEnergy: number;
  powerEnergy: number;
  persistedEnergy: number;
  energySaved: number;
}>;

export type DeviceEvent =
  | Readonly<{
      component: ComponentId;
      capability: "powerMeter";
      attribute: "power";
      value: number;
      unit: "W";
    }>
  | Readonly<{
      component: ComponentId;
      capability: "energyMeter";
      attribute: "energy";
      value: number;
      unit: "kWh";
    }>
  | Readonly<{
      component: ComponentId;
      capability: "powerConsumptionReport";
      attribute: "powerConsumption";
      value: PowerConsumptionReport;
    }>
  | Readonly<{
      component: ComponentId;
      capability: "switch";
      attribute: "switch";
      value: "on" | "off";
    }>;

/**
 * Latest value of one attribute as held by the sink.
 */
export type AttributeState = Readonly<{
  value: DeviceEvent["value"];
  unit: string | null;
  timestamp: number;
}>;

/**
 * Latest state per device, keyed `component.capability.attribute`.
 */
export type DeviceStateSnapshot = Readonly<Record<string, AttributeState>>;
