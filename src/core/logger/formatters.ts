/**
 * Logger Formatters
 * Custom Pino formatters for structured logging
 */

import type { LoggerOptions } from "pino";
import { LoggerConfig } from "./config";

type Formatters = NonNullable<LoggerOptions["formatters"]>;

/**
 * Create Pino formatters based on configuration
 */
export function createFormatter(config: LoggerConfig): Formatters {
  return {
    level: (label: string) => ({ level: label }),

    log: (obj: Record<string, unknown>) => {
      if (config.source) {
        obj.source = config.source;
      }
      return obj;
    },
  };
}

/**
 * Format duration for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(2);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Summarize a remote argument list for logging: arrays longer than
 * `maxItems` are replaced by their length.
 */
export function summarizeArgs(args: readonly unknown[], maxItems = 16): unknown[] {
  return args.map((arg) => {
    if (Array.isArray(arg) && arg.length > maxItems) {
      return `[Array(${arg.length})]`;
    }
    return arg;
  });
}
