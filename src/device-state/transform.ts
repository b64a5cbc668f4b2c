/**
 * Device State Module - Pure Transformations
 */
import type {
  AttributeState,
  Capability,
  ComponentId,
  DeviceEvent,
  DeviceProfile,
  DeviceStateSnapshot,
} from "./schema.js";

/**
 * Check whether a profile declares a capability on a component.
 */
export function isCapabilityDeclared(
  profile: DeviceProfile,
  component: ComponentId,
  capability: Capability,
): boolean {
  return profile.components[component].includes(capability);
}

/**
 * Key of an attribute in the state snapshot.
 *
 * @example
 * attributeKey({ component: "grid", capability: "switch", attribute: "switch", value: "on" })
 * // "grid.switch.switch"
 */
export function attributeKey(event: DeviceEvent): string {
  return `${event.component}.${event.capability}.${event.attribute}`;
}

export function eventUnit(event: DeviceEvent): string | null {
  return "unit" in event ? event.unit : null;
}

/**
 * Return a new snapshot with the event applied.
 */
export function applyEvent(
  snapshot: DeviceStateSnapshot,
  event: DeviceEvent,
  timestamp: number,
): DeviceStateSnapshot {
  const state: AttributeState = {
    value: event.value,
    unit: eventUnit(event),
    timestamp,
  };
  return { ...snapshot, [attributeKey(event)]: state };
}
