/**
 * Logger Test Suite
 */

import { EventBus } from "../src/core/eventBus";
import { TetherLogger, getLogger, initializeLogger, resetLogger } from "../src/core/logger";
import { createLoggerConfig, parseLogFormat, parseLogLevel } from "../src/core/logger/config";
import { formatDuration, summarizeArgs } from "../src/core/logger/formatters";
import { captureLogs } from "./fakes/logCapture";

describe("Logger", () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  afterEach(() => {
    resetLogger();
  });

  describe("Initialization", () => {
    test("should initialize a global logger", () => {
      const { destination } = captureLogs();
      const loggerInstance = initializeLogger(eventBus, { destination });
      expect(loggerInstance).toBeInstanceOf(TetherLogger);
      expect(getLogger()).toBe(loggerInstance);
    });

    test("should throw before initialization", () => {
      expect(() => getLogger()).toThrow("Logger not initialized. Call initializeLogger() first.");
    });

    test("should fill in defaults", () => {
      const config = createLoggerConfig({ level: "debug" });
      expect(config.level).toBe("debug");
      expect(config.format).toBe("pretty");
      expect(config.source).toBe("tether");
      expect(config.file).toEqual({ enabled: false, path: "./logs/tether.log" });
    });
  });

  describe("Logging Methods", () => {
    test("should write structured lines with source and level label", () => {
      const { lines, destination } = captureLogs();
      const log = new TetherLogger(null, { level: "info", destination });

      log.info("Fitting started", { modelKind: "linearSvc" });
      log.debug("hidden");

      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatchObject({
        level: "info",
        msg: "Fitting started",
        modelKind: "linearSvc",
        source: "tether",
      });
    });

    test("should serialize errors", () => {
      const { lines, destination } = captureLogs();
      const log = new TetherLogger(null, { destination });

      log.error(new Error("engine down"), { handle: "obj-1" });

      expect(lines[0]).toMatchObject({ level: "error", msg: "engine down", handle: "obj-1" });
      expect(lines[0].err).toMatchObject({ type: "Error", message: "engine down" });
    });

    test("should omit source when none is configured", () => {
      const { lines, destination } = captureLogs();
      const log = new TetherLogger(null, { destination, source: undefined });

      log.info("call", { correlationId: "corr-1" });

      expect(lines[0].source).toBeUndefined();
      expect(lines[0].correlationId).toBe("corr-1");
    });

    test("child loggers carry their context", () => {
      const { lines, destination } = captureLogs();
      const child = new TetherLogger(null, { destination }).child({ component: "engine-client" });

      child.warn("slow");
      expect(lines[0]).toMatchObject({ level: "warn", msg: "slow", component: "engine-client" });
    });
  });

  describe("Remote call tracing", () => {
    test("should trace successful calls at debug", () => {
      const { lines, destination } = captureLogs();
      const log = new TetherLogger(null, { level: "debug", destination });

      log.traceRemoteCall("ml.wrappers.LinearSVCWrapper", "fit", ["df-1", "y ~ x", 0.5], 1500, true);

      expect(lines[0]).toMatchObject({
        level: "debug",
        msg: "ml.wrappers.LinearSVCWrapper.fit succeeded (1.50s)",
        type: "remote_call",
        args: ["df-1", "y ~ x", 0.5],
        duration: 1500,
        success: true,
      });
    });

    test("should trace failures at warn and summarize long arrays", () => {
      const { lines, destination } = captureLogs();
      const log = new TetherLogger(null, { level: "warn", destination });
      const weights = Array.from({ length: 20 }, (_, i) => i);

      log.traceRemoteCall("#obj-3", "save", [weights], 12, false);

      expect(lines[0]).toMatchObject({
        level: "warn",
        msg: "#obj-3.save failed (12ms)",
        args: ["[Array(20)]"],
        success: false,
      });
    });
  });

  describe("EventBus Integration", () => {
    test("should log binding events", () => {
      const { lines, destination } = captureLogs();
      new TetherLogger(eventBus, { level: "debug", destination });

      const envelope = eventBus.emit("ModelFitEvent", { kind: "naiveBayes", handle: "obj-1" });
      eventBus.emit("ModelCloseEvent", { kind: "naiveBayes", handle: "obj-1" });

      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatchObject({
        level: "info",
        msg: "Model fitted",
        event: "ModelFitEvent",
        type: "eventbus",
        correlationId: envelope.id,
        payload: { kind: "naiveBayes", handle: "obj-1" },
      });
      expect(lines[1]).toMatchObject({ level: "debug", msg: "Model handle released" });
    });

    test("should not log events without a mapping", () => {
      const { lines, destination } = captureLogs();
      new TetherLogger(eventBus, { level: "trace", destination });

      eventBus.emit("RemoteCallEvent", { target: "x", method: "y" });
      expect(lines).toHaveLength(0);
    });
  });

  describe("Helpers", () => {
    test("formatDuration", () => {
      expect(formatDuration(250)).toBe("250ms");
      expect(formatDuration(2500)).toBe("2.50s");
      expect(formatDuration(125000)).toBe("2m 5.00s");
    });

    test("summarizeArgs keeps short arrays", () => {
      expect(summarizeArgs([[1, 2], "x"], 2)).toEqual([[1, 2], "x"]);
      expect(summarizeArgs([[1, 2, 3]], 2)).toEqual(["[Array(3)]"]);
    });

    test("parseLogLevel and parseLogFormat fall back on bad input", () => {
      const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
      expect(parseLogLevel("debug")).toBe("debug");
      expect(parseLogLevel("loud")).toBe("info");
      expect(parseLogFormat("json")).toBe("json");
      expect(parseLogFormat("xml")).toBe("pretty");
      expect(warn).toHaveBeenCalledTimes(2);
      warn.mockRestore();
    });
  });
});
