import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  createLogger,
  formatAsctime,
  getLogger,
  type Handler,
  levelName,
  LogLevel,
  type LogRecord,
  resolveLevel,
} from "../src/index.js";

describe("Logger Core", () => {
  let records: LogRecord[];
  let testHandler: Handler;
  const fixedTime = Date.UTC(2024, 2, 1, 12, 0, 0, 123);

  beforeEach(() => {
    records = [];
    testHandler = {
      name: "test",
      emit(record: LogRecord) {
        records.push(record);
      },
    };
  });

  describe("levels", () => {
    it("should resolve names case-insensitively", () => {
      expect(resolveLevel("debug")).toBe(10);
      expect(resolveLevel("INFO")).toBe(20);
      expect(resolveLevel("Warning")).toBe(30);
      expect(resolveLevel("ERROR")).toBe(40);
      expect(resolveLevel("critical")).toBe(50);
    });

    it("should accept WARN and FATAL aliases", () => {
      expect(resolveLevel("WARN")).toBe(LogLevel.WARNING);
      expect(resolveLevel("FATAL")).toBe(LogLevel.CRITICAL);
    });

    it("should pass numbers through and fall back to NOTSET", () => {
      expect(resolveLevel(25)).toBe(25);
      expect(resolveLevel("verbose")).toBe(LogLevel.NOTSET);
    });

    it("should name custom levels", () => {
      expect(levelName(40)).toBe("ERROR");
      expect(levelName(35)).toBe("Level 35");
    });
  });

  describe("getLogger", () => {
    it("should return the same logger for the same name", () => {
      const a = getLogger("core.registry");
      const b = getLogger("core.registry");
      expect(a).toBe(b);
      expect(a.name).toBe("core.registry");
      expect(getLogger("core.other")).not.toBe(a);
    });

    it("should default to root", () => {
      expect(getLogger().name).toBe("root");
    });

    it("should start at WARNING", () => {
      expect(getLogger("core.fresh").getLevel()).toBe(LogLevel.WARNING);
    });
  });

  describe("record creation", () => {
    it("should drop records below the logger level", () => {
      const logger = createLogger({ handlers: [testHandler] });
      logger.debug("no");
      logger.info("no");
      logger.warning("yes");
      logger.error("yes");
      logger.critical("yes");
      expect(records.map((r) => r.levelName)).toEqual([
        "WARNING",
        "ERROR",
        "CRITICAL",
      ]);
    });

    it("should fill every record field", () => {
      const logger = createLogger({
        name: "app.worker",
        level: "DEBUG",
        handlers: [testHandler],
        timestamp: () => fixedTime,
      });
      logger.info("started", { queue: "emails" });

      expect(records[0]).toEqual({
        name: "app.worker",
        level: 20,
        levelName: "INFO",
        message: "started",
        module: "worker",
        created: fixedTime,
        asctime: "2024-03-01 12:00:00,123",
        meta: { queue: "emails" },
        error: undefined,
      });
    });

    it("should take the module from meta, then options, then the name", () => {
      const named = createLogger({ name: "svc", level: "DEBUG", handlers: [testHandler] });
      const withModule = createLogger({
        name: "svc",
        module: "scheduler",
        level: "DEBUG",
        handlers: [testHandler],
      });

      named.info("a");
      withModule.info("b");
      withModule.info("c", { module: "cron" });

      expect(records.map((r) => r.module)).toEqual(["svc", "scheduler", "cron"]);
    });

    it("should log at custom numeric levels", () => {
      const logger = createLogger({ level: 0, handlers: [testHandler] });
      logger.log(35, "custom");
      logger.log("warn", "alias");
      expect(records[0]!.levelName).toBe("Level 35");
      expect(records[1]!.level).toBe(30);
    });

    it("should take lowercase level names", () => {
      const logger = createLogger({ level: "error", handlers: [testHandler] });
      logger.log("critical", "kept");
      logger.setLevel("info");
      logger.log("debug", "dropped");
      logger.log("fatal", "alias");
      expect(logger.getLevel()).toBe(20);
      expect(records.map((r) => r.level)).toEqual([50, 50]);
    });

    it("should serialize errors with their cause chain", () => {
      const logger = createLogger({ handlers: [testHandler] });
      const root = new Error("socket closed");
      logger.error("sync failed", { job: 7 }, new Error("retry", { cause: root }));
      logger.critical("crash", new Error("fatal"));

      expect(records[0]!.meta).toEqual({ job: 7 });
      expect(records[0]!.error!.message).toBe("retry");
      expect(records[0]!.error!.cause!.message).toBe("socket closed");
      expect(records[1]!.error!.name).toBe("Error");
      expect(records[1]!.meta).toEqual({});
    });

    it("should format asctime in UTC with milliseconds", () => {
      expect(formatAsctime(fixedTime)).toBe("2024-03-01 12:00:00,123");
      expect(formatAsctime(Date.UTC(2023, 11, 31, 23, 59, 59, 7))).toBe(
        "2023-12-31 23:59:59,007",
      );
    });
  });

  describe("handlers", () => {
    it("should respect per-handler levels", () => {
      const logger = createLogger({ level: "DEBUG" });
      logger.addHandler({ ...testHandler, level: "ERROR" });
      logger.info("skip");
      logger.error("keep");
      expect(records.map((r) => r.message)).toEqual(["keep"]);
    });

    it("should not attach the same handler twice", () => {
      const logger = createLogger({ level: "DEBUG" });
      logger.addHandler(testHandler);
      logger.addHandler(testHandler);
      logger.info("once");
      expect(records).toHaveLength(1);
      expect(logger.getHandlers()).toHaveLength(1);
    });

    it("should remove handlers by reference or name", () => {
      const logger = createLogger({ handlers: [testHandler] });
      expect(logger.hasHandler("test")).toBe(true);
      logger.removeHandler("test");
      expect(logger.hasHandler(testHandler)).toBe(false);

      logger.addHandler(testHandler);
      logger.removeHandler(testHandler);
      expect(logger.getHandlers()).toEqual([]);
    });

    it("should propagate synchronous handler errors", () => {
      const logger = createLogger({
        handlers: [
          {
            name: "exploding",
            emit: () => {
              throw new Error("Boom");
            },
          },
        ],
      });
      expect(() => logger.error("x")).toThrow("Boom");
    });

    it("should drop records logged from inside a handler", () => {
      const logger = createLogger({ level: "DEBUG" });
      logger.addHandler({
        name: "chatty",
        emit(record) {
          records.push(record);
          logger.info("nested");
        },
      });
      logger.info("outer");
      expect(records.map((r) => r.message)).toEqual(["outer"]);
    });
  });

  describe("filters", () => {
    it("should drop records a filter rejects", () => {
      const noHealth = (r: LogRecord) => !r.message.startsWith("health");
      const logger = createLogger({ level: "DEBUG", handlers: [testHandler] });
      logger.addFilter(noHealth);
      logger.info("health ok");
      logger.info("job done");
      logger.removeFilter(noHealth);
      logger.info("health ok");
      expect(records.map((r) => r.message)).toEqual(["job done", "health ok"]);
    });
  });

  describe("level control", () => {
    it("should change level at runtime", () => {
      const logger = createLogger({ handlers: [testHandler] });
      expect(logger.isLevelEnabled("INFO")).toBe(false);
      logger.setLevel("INFO");
      expect(logger.getLevel()).toBe(20);
      expect(logger.isLevelEnabled("INFO")).toBe(true);
      expect(logger.isLevelEnabled("DEBUG")).toBe(false);
    });
  });

  describe("lifecycle", () => {
    it("should wait for pending deliveries on flush", async () => {
      let delivered = false;
      const logger = createLogger({
        handlers: [
          {
            name: "slow",
            async emit() {
              await new Promise((r) => setTimeout(r, 5));
              delivered = true;
            },
          },
        ],
      });
      logger.error("x");
      expect(delivered).toBe(false);
      await logger.flush();
      expect(delivered).toBe(true);
    });

    it("should reject flush with the first delivery failure", async () => {
      const logger = createLogger({
        handlers: [
          {
            name: "failing",
            emit: () => Promise.reject(new Error("unreachable")),
          },
        ],
      });
      logger.error("a");
      logger.error("b");
      await expect(logger.flush()).rejects.toThrow("unreachable");
      await expect(logger.flush()).resolves.toBeUndefined();
    });

    it("should flush and close handlers on close", async () => {
      const flush = vi.fn();
      const close = vi.fn();
      const logger = createLogger({
        handlers: [{ ...testHandler, flush, close }],
      });
      await logger.close();
      expect(flush).toHaveBeenCalledTimes(1);
      expect(close).toHaveBeenCalledTimes(1);
    });

    it("should keep only the first failure until the next flush", async () => {
      const onError = vi.fn();
      const logger = createLogger({
        handlers: [
          {
            name: "failing",
            emit: (record: LogRecord) => Promise.reject(new Error(record.message)),
          },
        ],
        onError,
      });
      for (let i = 0; i < 1000; i++) logger.error(`failure ${i}`);

      await expect(logger.flush()).rejects.toThrow("failure 0");
      expect(onError).toHaveBeenCalledTimes(1000);
      await expect(logger.flush()).resolves.toBeUndefined();
    });

    it("should close handlers even when flush rejects", async () => {
      const close = vi.fn();
      const logger = createLogger({
        handlers: [
          {
            name: "failing",
            emit: () => Promise.reject(new Error("unreachable")),
            close,
          },
        ],
      });
      logger.error("a");

      await expect(logger.close()).rejects.toThrow("unreachable");
      expect(close).toHaveBeenCalledTimes(1);
    });
  });
});
