/**
 * Logging Tests
 */

import {
  ConsoleTransport,
  configureLogger,
  createLogger,
  createMemoryTransport,
  createSubsystemLogger,
  getLogger,
  isLogLevel,
  type Logger,
  type MemoryTransport,
  resetLogger,
} from "@inktrail/telemetry/logging";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

describe("Logger", () => {
  let transport: MemoryTransport;
  let logger: Logger;

  beforeEach(() => {
    transport = createMemoryTransport();
    logger = createLogger({
      name: "test",
      level: "trace",
      transports: [transport],
    });
    resetLogger();
  });

  afterEach(() => {
    resetLogger();
  });

  describe("level filtering", () => {
    it("writes every level at trace", () => {
      logger.trace("t");
      logger.debug("d");
      logger.info("i");
      logger.warn("w");
      logger.error("e");
      logger.fatal("f");

      expect(transport.getEntries().map((entry) => entry.level)).toEqual([
        "trace",
        "debug",
        "info",
        "warn",
        "error",
        "fatal",
      ]);
    });

    it("drops entries below the configured level", () => {
      const warnLogger = createLogger({ name: "filtered", level: "warn", transports: [transport] });

      warnLogger.debug("hidden");
      warnLogger.info("hidden");
      warnLogger.warn("shown");

      const entries = transport.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].message).toBe("shown");
      expect(warnLogger.isLevelEnabled("info")).toBe(false);
    });
  });

  describe("structured data", () => {
    it("attaches data, name and timestamps", () => {
      logger.info("snapshot appended", { index: 47 });

      const [entry] = transport.getEntries();
      expect(entry.data).toEqual({ index: 47 });
      expect(entry.logger).toBe("test");
      expect(entry.timestampMs).toBeGreaterThan(0);
    });

    it("omits empty data", () => {
      logger.info("plain", {});

      expect(transport.getEntries()[0].data).toBeUndefined();
    });
  });

  describe("error logging", () => {
    it("captures name, message and code of errors", () => {
      const error = Object.assign(new Error("disk full"), { code: "IO_ERROR" });
      logger.error("append failed", error, { index: 3 });

      const [entry] = transport.getEntries();
      expect(entry.error?.name).toBe("Error");
      expect(entry.error?.message).toBe("disk full");
      expect(entry.error?.code).toBe("IO_ERROR");
      expect(entry.data).toEqual({ index: 3 });
    });

    it("stringifies non-Error values", () => {
      logger.error("append failed", "plain failure");

      expect(transport.getEntries()[0].error).toEqual({ name: "Error", message: "plain failure" });
    });
  });

  describe("timing", () => {
    it("records an explicit duration", () => {
      logger.timed("info", "flushed", 150);

      const [entry] = transport.getEntries();
      expect(entry.durationMs).toBe(150);
      expect(entry.data).toBeUndefined();
    });

    it("records the elapsed time of a timer", () => {
      const timer = logger.startTimer("append");
      timer.stop({ index: 1 });

      const [entry] = transport.getEntries();
      expect(entry.level).toBe("debug");
      expect(entry.durationMs).toBeGreaterThanOrEqual(0);
      expect(entry.data).toEqual({ index: 1 });
    });
  });

  describe("child loggers", () => {
    it("carries session and component context", () => {
      logger.forSession("slide-7").forComponent("navigation").info("undo issued");

      const [entry] = transport.getEntries();
      expect(entry.sessionId).toBe("slide-7");
      expect(entry.component).toBe("navigation");
    });

    it("renames without losing context", () => {
      logger.forSession("slide-7").named("other").info("message");

      const [entry] = transport.getEntries();
      expect(entry.logger).toBe("other");
      expect(entry.sessionId).toBe("slide-7");
    });
  });

  describe("MemoryTransport", () => {
    it("filters by level and session", () => {
      logger.forSession("a").info("one");
      logger.forSession("b").warn("two");

      expect(transport.getEntriesByLevel("warn").map((e) => e.message)).toEqual(["two"]);
      expect(transport.getEntriesBySession("a").map((e) => e.message)).toEqual(["one"]);
    });

    it("keeps only the newest entries", () => {
      const small = createMemoryTransport(3);
      const smallLogger = createLogger({ name: "small", transports: [small] });

      for (let i = 0; i < 5; i++) {
        smallLogger.info(`message ${i}`);
      }

      expect(small.size).toBe(3);
      expect(small.getEntries().map((e) => e.message)).toEqual([
        "message 2",
        "message 3",
        "message 4",
      ]);

      small.clear();
      expect(small.size).toBe(0);
    });
  });

  describe("ConsoleTransport", () => {
    it("formats a pretty line without colors", () => {
      const pretty = new ConsoleTransport({ pretty: true, colors: false, showTimestamp: false });
      const line = pretty.formatPretty({
        level: "warn",
        message: "load timed out",
        timestamp: "2026-01-01T00:00:00.000Z",
        timestampMs: 0,
        logger: "inktrail",
        sessionId: "slide-7",
        component: "navigation",
        data: { target: 48 },
      });

      expect(line).toBe('WARN  [inktrail] [session:slide-7] [navigation] load timed out {"target":48}');
    });

    it("can send every level to stderr", () => {
      const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
      const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
      try {
        const logger = createLogger({
          name: "cli",
          transports: [
            new ConsoleTransport({ pretty: true, colors: false, showTimestamp: false, stream: "stderr" }),
          ],
        });
        logger.info("listing sessions");

        expect(stdout).not.toHaveBeenCalled();
        expect(stderr).toHaveBeenCalledWith("INFO  [cli] listing sessions\n");
      } finally {
        stdout.mockRestore();
        stderr.mockRestore();
      }
    });
  });

  describe("global logger", () => {
    it("routes subsystem loggers through the configured root", () => {
      const memory = createMemoryTransport();
      configureLogger({ level: "debug", transports: [memory] });

      createSubsystemLogger("history", "store").debug("opened");

      const [entry] = memory.getEntries();
      expect(entry.logger).toBe("inktrail:history");
      expect(entry.component).toBe("store");
    });

    it("starts over after reset", () => {
      const first = createMemoryTransport();
      configureLogger({ transports: [first] });
      resetLogger();

      const second = createMemoryTransport();
      configureLogger({ transports: [second] });
      getLogger().info("after reset");

      expect(first.size).toBe(0);
      expect(second.size).toBe(1);
    });
  });

  it("recognizes log level names", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
