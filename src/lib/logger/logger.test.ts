import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createLogger, formatLog } from "./logger";

describe("createLogger", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-02-03T04:05:06.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("should log info messages as JSON lines", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger({ level: "info" });

    logger.info("stack ready", { services: 3 });

    expect(consoleSpy).toHaveBeenCalledWith(
      '{"timestamp":"2026-02-03T04:05:06.000Z","level":"info","message":"stack ready","context":{"services":3}}',
    );
  });

  it("should drop messages below the configured level", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger({ level: "warn" });

    logger.debug("polling");
    logger.info("started");

    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it("should log errors with name and message", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger({ level: "debug", format: "pretty" });

    logger.error("bootstrap failed", new Error("permission denied"), { step: "ensure-admin-role" });

    expect(consoleSpy).toHaveBeenCalledWith(
      '2026-02-03T04:05:06.000Z [ERROR] bootstrap failed {"step":"ensure-admin-role"} (Error: permission denied)',
    );
  });

  it("should merge child bindings into the context", () => {
    const consoleSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createLogger({ level: "info", format: "pretty" }).child({ service: "kong" });

    logger.warn("slow to start", { attempts: 4 });

    expect(consoleSpy).toHaveBeenCalledWith(
      '2026-02-03T04:05:06.000Z [WARN] slow to start {"service":"kong","attempts":4}',
    );
  });
});

describe("formatLog", () => {
  it("should omit the context when absent", () => {
    expect(
      formatLog({ timestamp: "2026-01-01T00:00:00.000Z", level: "info", message: "done" }, "pretty"),
    ).toBe("2026-01-01T00:00:00.000Z [INFO] done");
  });
});
