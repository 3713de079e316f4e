import { describe, expect, it, vi } from "vitest";
import { ConsoleLogger, formatLogLine } from "../src/modules/consoleLogger";
import { flush, recordingBus } from "./support/bus";

describe("ConsoleLogger", () => {
  it("formats a line with an ISO timestamp and padded level", () => {
    expect(formatLogLine({ level: "WARN", message: "careful", ts: 0 })).toBe("1970-01-01T00:00:00.000Z WARN  careful");
  });

  it("sends errors to stderr and everything else to stdout until stopped", async () => {
    const { bus } = recordingBus();
    const out = vi.fn();
    const err = vi.fn();
    const logger = new ConsoleLogger(bus, out, err);

    logger.start();
    bus.log("INFO", "hello");
    bus.log("ERROR", "broken");
    await flush();
    logger.stop();
    bus.log("INFO", "ignored");
    await flush();

    expect(out).toHaveBeenCalledTimes(1);
    expect(out.mock.calls[0]?.[0]).toMatch(/ INFO  hello\n$/);
    expect(err).toHaveBeenCalledTimes(1);
    expect(err.mock.calls[0]?.[0]).toMatch(/ ERROR broken\n$/);
  });
});
