/**
 * Emission Module - Service Layer
 *
 * Publishes a reading to the device-state sink, channel by channel.
 * A rejected event is logged and skipped; the rest still go out.
 */
import type { DeviceStateSink } from "../device-state/index.js";
import { attributeKey, formatDeviceStateError } from "../device-state/index.js";
import { createLogger } from "../logger.js";
import type { NormalizedReading } from "../metrics/index.js";
import type { EmissionSummary, RejectedEvent } from "./schema.js";
import { buildChannelEvents } from "./transform.js";

const log = createLogger("emission");

/**
 * Emit a normalized reading for a device.
 *
 * @param deviceId - Device the reading belongs to
 * @param reading - Reading to publish
 * @param sink - Device-state sink
 * @returns How many events were published and which were rejected
 */
export async function emitReading(
  deviceId: string,
  reading: NormalizedReading,
  sink: DeviceStateSink,
): Promise<EmissionSummary> {
  const channels = buildChannelEvents(reading, {
    consumptionReport: sink.supports(
      deviceId,
      "consumed",
      "powerConsumptionReport",
    ),
  });

  let published = 0;
  const rejected: RejectedEvent[] = [];

  for (const { channel, events } of channels) {
    for (const event of events) {
      const result = await sink.emit(deviceId, event);

      if (result.isErr()) {
        log.warn(
          {
            deviceId,
            channel,
            attribute: attributeKey(event),
            error: formatDeviceStateError(result.error),
          },
          "Device event rejected, continuing with remaining channels",
        );
        rejected.push({ channel, event, error: result.error });
        continue;
      }

      published++;
    }
  }

  log.debug(
    { deviceId, published, rejected: rejected.length },
    "Reading emitted",
  );

  return { published, rejected };
}
