/**
 * Tether logger - Pino-based logging
 *
 * - Structured JSON logging with Pino, pretty output for terminals
 * - EventBus integration: every binding event becomes a log line
 * - Remote call tracing with durations
 */

import pino from "pino";
import { EventBus, EventEnvelope, EventType } from "../eventBus";
import { LoggerConfig, createLoggerConfig } from "./config";
import { createFormatter, formatDuration, summarizeArgs } from "./formatters";

export interface LoggerContext {
  modelKind?: string;
  handle?: string;
  correlationId?: string;
  [key: string]: unknown;
}

type EventLevel = "debug" | "info" | "warn";

const EVENT_MAPPINGS: ReadonlyArray<{ event: EventType; level: EventLevel; message: string }> = [
  { event: "ModelFitEvent", level: "info", message: "Model fitted" },
  { event: "ModelPredictEvent", level: "debug", message: "Predictions requested" },
  { event: "ModelSummaryEvent", level: "debug", message: "Summary collected" },
  { event: "ModelSaveEvent", level: "info", message: "Model saved" },
  { event: "ModelReadEvent", level: "info", message: "Model read" },
  { event: "ModelCloseEvent", level: "debug", message: "Model handle released" },
  { event: "RemoteErrorEvent", level: "warn", message: "Remote call failed" },
  { event: "ListenerErrorEvent", level: "warn", message: "Event listener threw" },
];

function buildPino(config: LoggerConfig): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    formatters: createFormatter(config),
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  if (config.destination) {
    return pino(options, config.destination);
  }

  const targets: pino.TransportTargetOptions[] = [];

  if (config.format === "pretty") {
    targets.push({
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname,source",
      },
      level: config.level,
    });
  } else {
    targets.push({
      target: "pino/file",
      options: { destination: 1 },
      level: config.level,
    });
  }

  if (config.file?.enabled) {
    targets.push({
      target: "pino/file",
      options: {
        destination: config.file.path,
        mkdir: true,
      },
      level: config.level,
    });
  }

  return pino(options, pino.transport({ targets }));
}

export class TetherLogger {
  private readonly pinoLogger: pino.Logger;
  private readonly config: LoggerConfig;

  constructor(eventBus: EventBus | null, config: Partial<LoggerConfig> = {}, parent?: pino.Logger) {
    this.config = createLoggerConfig(config);
    this.pinoLogger = parent ?? buildPino(this.config);

    if (eventBus && !parent) {
      this.subscribe(eventBus);
    }
  }

  /**
   * Create child logger with context. Children share the parent's streams
   * and do not subscribe to the bus again.
   */
  child(context: LoggerContext): TetherLogger {
    return new TetherLogger(null, this.config, this.pinoLogger.child(context));
  }

  get level(): string {
    return this.pinoLogger.level;
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context ?? {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context ?? {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context ?? {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  /**
   * Remote call tracing
   */
  traceRemoteCall(
    target: string,
    method: string,
    args: readonly unknown[],
    durationMs: number,
    success: boolean,
    context?: LoggerContext
  ): void {
    const level = success ? "debug" : "warn";
    this.pinoLogger[level](
      {
        ...context,
        target,
        method,
        args: summarizeArgs(args),
        duration: durationMs,
        success,
        type: "remote_call",
      },
      `${target}.${method} ${success ? "succeeded" : "failed"} (${formatDuration(durationMs)})`
    );
  }

  flush(): void {
    this.pinoLogger.flush();
  }

  private subscribe(eventBus: EventBus): void {
    for (const { event, level, message } of EVENT_MAPPINGS) {
      eventBus.on(event, (evt: EventEnvelope) => {
        this.pinoLogger[level](
          {
            event,
            payload: evt.payload,
            type: "eventbus",
            correlationId: evt.id,
          },
          message
        );
      });
    }
  }
}

let globalLogger: TetherLogger | null = null;

export function initializeLogger(eventBus: EventBus, config: Partial<LoggerConfig> = {}): TetherLogger {
  globalLogger = new TetherLogger(eventBus, config);
  return globalLogger;
}

export function getLogger(): TetherLogger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return globalLogger;
}

export function resetLogger(): void {
  globalLogger = null;
}

export { LoggerConfig, LogLevel, LogFormat, parseLogLevel, parseLogFormat } from "./config";
