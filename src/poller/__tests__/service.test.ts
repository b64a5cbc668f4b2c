/**
 * Poller Service Tests
 *
 * Drives full poll cycles against a real device-state sink with a stubbed
 * gateway fetch.
 */
import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Import after mocks
import { DEVICE_PROFILES, createDeviceStateSink } from "../../device-state/index.js";
import type { GatewayError, GatewayPreferences } from "../../gateway/index.js";
import { fetchFailed } from "../../gateway/errors.js";
import { createDevicePoller } from "../service.js";

const DEVICE_ID = "gw-1";
const NOW = 1_700_000_000_000;

const configured: GatewayPreferences = {
  address: "192.168.1.50",
  tokenPart1: "test-",
  tokenPart2: "token",
};

const productionBody = JSON.stringify({
  production: [{ type: "eim", wNow: 4500, whToday: 12000 }],
  consumption: [
    { measurementType: "total-consumption", wNow: 1200, whToday: 8000 },
    { measurementType: "net-consumption", wNow: -3300 },
  ],
});

type FetchResult = Result<string, GatewayError>;

function deferred() {
  let resolve: (value: FetchResult) => void = () => undefined;
  const promise = new Promise<FetchResult>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function setup(preferences: GatewayPreferences = configured) {
  const sink = createDeviceStateSink({ now: () => NOW });
  sink.registerProfile(DEVICE_ID, DEVICE_PROFILES["solar-gateway-power"]);

  const fetchBody = vi.fn<
    (
      target: { address: string; token: string },
      options: { timeoutMs: number },
    ) => Promise<FetchResult>
  >();
  fetchBody.mockResolvedValue(ok(productionBody));

  const poller = createDevicePoller(
    { deviceId: DEVICE_ID, preferences, intervalMs: 300_000, timeoutMs: 10_000 },
    { sink, fetchBody, now: () => NOW },
  );

  return { sink, fetchBody, poller };
}

describe("Poller Service", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("poll cycle", () => {
    test("emits production, consumption and grid for a healthy document", async () => {
      const { sink, fetchBody, poller } = setup();

      const outcome = await poller.refresh();

      expect(fetchBody).toHaveBeenCalledWith(
        { address: "192.168.1.50", token: "test-token" },
        { timeoutMs: 10_000 },
      );
      expect(outcome.status).toBe("emitted");
      expect(sink.getState(DEVICE_ID)).toEqual({
        "main.powerMeter.power": { value: 4500, unit: "W", timestamp: NOW },
        "main.energyMeter.energy": { value: 12, unit: "kWh", timestamp: NOW },
        "consumed.powerMeter.power": { value: 1200, unit: "W", timestamp: NOW },
        "consumed.energyMeter.energy": { value: 8, unit: "kWh", timestamp: NOW },
        "grid.powerMeter.power": { value: 3300, unit: "W", timestamp: NOW },
        "grid.switch.switch": { value: "on", unit: null, timestamp: NOW },
      });
    });

    test("records the reading and emission summary on success", async () => {
      const { poller } = setup();

      const outcome = await poller.refresh();

      expect(outcome).toMatchObject({
        status: "emitted",
        trigger: "manual",
        emission: { published: 6, rejected: [] },
        reading: {
          grid: { magnitudeWatts: 3300, exporting: true },
          netFlowWatts: -3300,
        },
      });
      expect(poller.getState()).toMatchObject({
        cycleCount: 1,
        inFlight: false,
        lastPollTime: NOW,
      });
      expect(poller.getState().lastReading?.production.powerWatts).toBe(4500);
    });

    test("skips without a network call when the address is empty", async () => {
      const { sink, fetchBody, poller } = setup({ ...configured, address: "" });

      const outcome = await poller.refresh();

      expect(fetchBody).not.toHaveBeenCalled();
      expect(outcome).toMatchObject({
        status: "skipped",
        error: { type: "CONFIGURATION_INCOMPLETE", missing: ["address"] },
      });
      expect(sink.getState(DEVICE_ID)).toEqual({});
    });

    test("skips without a network call when both token halves are empty", async () => {
      const { fetchBody, poller } = setup({
        address: "192.168.1.50",
        tokenPart1: "",
        tokenPart2: " ",
      });

      const outcome = await poller.refresh();

      expect(fetchBody).not.toHaveBeenCalled();
      expect(outcome).toMatchObject({
        status: "skipped",
        error: { missing: ["token"] },
      });
    });

    test("emits nothing when the gateway rejects the token", async () => {
      const { sink, fetchBody, poller } = setup();
      fetchBody.mockResolvedValue(
        err(fetchFailed(401, "HTTP 401: Unauthorized")),
      );

      const outcome = await poller.refresh();

      expect(outcome).toMatchObject({
        status: "failed",
        error: { type: "FETCH_FAILED", status: 401 },
      });
      expect(sink.getState(DEVICE_ID)).toEqual({});
      expect(poller.getState().lastReading).toBeNull();
      expect(poller.getState().cycleCount).toBe(1);
    });

    test("emits nothing when the body is not valid JSON", async () => {
      const { sink, fetchBody, poller } = setup();
      fetchBody.mockResolvedValue(ok("<html>login</html>"));

      const outcome = await poller.refresh();

      expect(outcome).toMatchObject({
        status: "failed",
        error: { type: "DECODE_FAILED", body: "<html>login</html>" },
      });
      expect(sink.getState(DEVICE_ID)).toEqual({});
    });

    test("keeps the previous state after a failed cycle", async () => {
      const { sink, fetchBody, poller } = setup();
      await poller.refresh();
      fetchBody.mockResolvedValue(err(fetchFailed(null, "Request timed out")));

      const outcome = await poller.refresh();

      expect(outcome.status).toBe("failed");
      expect(sink.getState(DEVICE_ID)).toHaveProperty(
        ["grid.switch.switch", "value"],
        "on",
      );
      expect(poller.getState().lastReading?.grid.magnitudeWatts).toBe(3300);
    });

    test("turns a thrown fetch into a failed outcome and keeps polling", async () => {
      const { fetchBody, poller } = setup();
      fetchBody.mockRejectedValueOnce(new Error("socket closed"));

      const first = await poller.refresh();
      const second = await poller.refresh();

      expect(first).toMatchObject({
        status: "failed",
        error: { type: "UNEXPECTED_ERROR", message: "socket closed" },
      });
      expect(second.status).toBe("emitted");
    });

    test("reports every finished cycle to the completion hook", async () => {
      const sink = createDeviceStateSink({ now: () => NOW });
      const onCycleComplete = vi.fn();
      const poller = createDevicePoller(
        {
          deviceId: DEVICE_ID,
          preferences: { ...configured, address: "" },
          intervalMs: 300_000,
          timeoutMs: 10_000,
        },
        { sink, onCycleComplete, now: () => NOW },
      );

      const outcome = await poller.refresh();

      expect(onCycleComplete).toHaveBeenCalledTimes(1);
      expect(onCycleComplete).toHaveBeenCalledWith(DEVICE_ID, outcome);
    });

    test("reports zero power and importing when no metrics are present", async () => {
      const { sink, fetchBody, poller } = setup();
      fetchBody.mockResolvedValue(ok("{}"));

      const outcome = await poller.refresh();

      expect(outcome.status).toBe("emitted");
      expect(sink.getState(DEVICE_ID)).toMatchObject({
        "main.powerMeter.power": { value: 0 },
        "grid.powerMeter.power": { value: 0 },
        "grid.switch.switch": { value: "off" },
      });
    });
  });

  describe("serialization", () => {
    test("never runs two cycles at once", async () => {
      const { fetchBody, poller } = setup();
      const first = deferred();
      fetchBody.mockReturnValueOnce(first.promise);

      const p1 = poller.refresh("manual");
      const p2 = poller.refresh("interval");

      expect(fetchBody).toHaveBeenCalledTimes(1);
      expect(poller.getState()).toMatchObject({ inFlight: true, queued: true });

      first.resolve(ok(productionBody));
      await p1;
      const second = await p2;

      expect(fetchBody).toHaveBeenCalledTimes(2);
      expect(second.trigger).toBe("interval");
      expect(poller.getState()).toMatchObject({
        inFlight: false,
        queued: false,
        cycleCount: 2,
      });
    });

    test("coalesces triggers that arrive while a cycle is queued", async () => {
      const { fetchBody, poller } = setup();
      const first = deferred();
      fetchBody.mockReturnValueOnce(first.promise);

      const p1 = poller.refresh("manual");
      const p2 = poller.refresh("interval");
      const p3 = poller.refresh("manual");

      expect(p3).toBe(p2);

      first.resolve(ok(productionBody));
      await Promise.all([p1, p2, p3]);

      expect(fetchBody).toHaveBeenCalledTimes(2);
      expect(poller.getState().cycleCount).toBe(2);
    });

    test("a trigger made as a cycle settles joins the queued cycle", async () => {
      const { fetchBody, poller } = setup();
      let inFlight = 0;
      let maxInFlight = 0;
      fetchBody.mockImplementation(async () => {
        inFlight += 1;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight -= 1;
        return ok(productionBody);
      });

      const p1 = poller.refresh("manual");
      const chained = p1.then(() => poller.refresh("manual"));
      const p2 = poller.refresh("interval");

      const [, again, queued] = await Promise.all([p1, chained, p2]);

      expect(maxInFlight).toBe(1);
      expect(fetchBody).toHaveBeenCalledTimes(2);
      expect(again).toBe(queued);
      expect(poller.getState().cycleCount).toBe(2);
    });

    test("a queued cycle reads the preferences current when it starts", async () => {
      const { fetchBody, poller } = setup();
      const first = deferred();
      fetchBody.mockReturnValueOnce(first.promise);

      const p1 = poller.refresh();
      const p2 = poller.applyPreferences({
        ...configured,
        address: "192.168.1.60",
      });

      first.resolve(ok(productionBody));
      await Promise.all([p1, p2]);

      expect(fetchBody).toHaveBeenLastCalledWith(
        { address: "192.168.1.60", token: "test-token" },
        { timeoutMs: 10_000 },
      );
    });
  });

  describe("applyPreferences", () => {
    test("runs exactly one cycle when a watched value changes", async () => {
      const { fetchBody, poller } = setup({
        address: "",
        tokenPart1: "",
        tokenPart2: "",
      });

      const outcome = await poller.applyPreferences(configured);

      expect(fetchBody).toHaveBeenCalledTimes(1);
      expect(outcome?.trigger).toBe("preferences");
      expect(poller.getPreferences()).toEqual(configured);
    });

    test("does not poll when nothing changed", async () => {
      const { fetchBody, poller } = setup();

      const outcome = await poller.applyPreferences({ ...configured });

      expect(outcome).toBeNull();
      expect(fetchBody).not.toHaveBeenCalled();
    });

    test("polls when only one token half changes", async () => {
      const { fetchBody, poller } = setup();

      await poller.applyPreferences({ ...configured, tokenPart2: "token-2" });

      expect(fetchBody).toHaveBeenCalledWith(
        { address: "192.168.1.50", token: "test-token-2" },
        { timeoutMs: 10_000 },
      );
    });
  });

  describe("lifecycle", () => {
    test("polls on startup and on every interval until stopped", async () => {
      vi.useFakeTimers();
      const { fetchBody, poller } = setup();

      poller.start();
      expect(fetchBody).toHaveBeenCalledTimes(1);
      expect(poller.getState().isRunning).toBe(true);

      await vi.advanceTimersByTimeAsync(300_000);
      expect(fetchBody).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(300_000);
      expect(fetchBody).toHaveBeenCalledTimes(3);

      poller.stop();
      expect(poller.getState().isRunning).toBe(false);

      await vi.advanceTimersByTimeAsync(600_000);
      expect(fetchBody).toHaveBeenCalledTimes(3);
    });

    test("ignores a second start", async () => {
      vi.useFakeTimers();
      const { fetchBody, poller } = setup();

      poller.start();
      poller.start();
      await vi.advanceTimersByTimeAsync(300_000);

      expect(fetchBody).toHaveBeenCalledTimes(2);
      poller.stop();
    });
  });
});
