import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Logger } from "../packages/client/src/observability/logger.js";
import { MessageClass } from "../packages/protocol/src/constants.js";
import { encodeFrame } from "../packages/protocol/src/frame.js";

describe("Logger", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-02T03:04:05.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("prefixes the timestamp and level and appends meta as JSON", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    new Logger(false).info("Ready", { port: 1 });

    expect(log).toHaveBeenCalledWith('[2024-01-02T03:04:05.000Z] [INFO] Ready {"port":1}');
  });

  it("writes warnings and errors to their own streams", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new Logger(false);

    logger.warn("Slow");
    logger.error("Broken");

    expect(warn).toHaveBeenCalledWith("[2024-01-02T03:04:05.000Z] [WARN] Slow");
    expect(error).toHaveBeenCalledWith("[2024-01-02T03:04:05.000Z] [ERROR] Broken");
  });

  it("drops debug output unless enabled", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const frame = encodeFrame("0506", "abcdef1234", Buffer.from("body")).buffer;

    new Logger(false).outbound("conn000001", frame);
    expect(log).not.toHaveBeenCalled();

    const logger = new Logger(true);
    logger.outbound("conn000001", frame);
    logger.inbound("conn000001", MessageClass.RESULT_CHUNK, 77);
    logger.stateTransition("conn000001", "CLOSED");

    expect(log.mock.calls.map(([line]) => line)).toEqual([
      '[2024-01-02T03:04:05.000Z] [DEBUG] [conn000001] → Frame {"actionId":"0506","requestId":"abcdef1234","bodySize":"4B"}',
      '[2024-01-02T03:04:05.000Z] [DEBUG] [conn000001] ← RESULT_CHUNK {"size":"77B"}',
      "[2024-01-02T03:04:05.000Z] [DEBUG] [conn000001] State: CLOSED",
    ]);
  });
});
