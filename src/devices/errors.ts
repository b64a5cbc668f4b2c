/**
 * Devices Module - Error Types
 */

export type DevicesError =
  | {
      readonly type: "DEVICE_NOT_FOUND";
      readonly deviceId: string;
    }
  | {
      readonly type: "DEVICE_ALREADY_REGISTERED";
      readonly deviceId: string;
    };

export const deviceNotFound = (deviceId: string): DevicesError => ({
  type: "DEVICE_NOT_FOUND",
  deviceId,
});

export const deviceAlreadyRegistered = (deviceId: string): DevicesError => ({
  type: "DEVICE_ALREADY_REGISTERED",
  deviceId,
});

/**
 * Format a DevicesError for logging and API responses.
 */
export function formatDevicesError(error: DevicesError): string {
  switch (error.type) {
    case "DEVICE_NOT_FOUND":
      return `Device not found: ${error.deviceId}`;
    case "DEVICE_ALREADY_REGISTERED":
      return `Device already registered: ${error.deviceId}`;
  }
}
