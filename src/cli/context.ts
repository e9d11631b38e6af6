/**
 * src/cli/context.ts
 * What a command needs from the outside world. Tests swap in their own.
 */

import { Tether, createTether } from "../index";
import { TetherConfig, loadConfig } from "./utils/loadConfig";

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
  exit(code: number): void;
}

export interface CliContext {
  io: CliIO;
  tether(): Tether;
}

export const processIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  exit: (code) => process.exit(code),
};

export function tetherFromConfig(config: TetherConfig): Tether {
  return createTether({
    engine: {
      url: config.engine.url,
      timeoutMs: config.engine.timeoutMs,
      headers: config.engine.headers,
    },
    namespace: config.engine.namespace,
    logger: { level: config.logger.level, format: config.logger.format },
  });
}

export function defaultContext(): CliContext {
  let tether: Tether | undefined;
  return {
    io: processIO,
    tether: () => {
      tether ??= tetherFromConfig(loadConfig());
      return tether;
    },
  };
}

/**
 * Run a command body, reporting any failure on stderr with exit code 1.
 */
export async function runAction(ctx: CliContext, body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (e) {
    const message = e instanceof Error ? `${e.name}: ${e.message}` : String(e);
    ctx.io.err(message);
    ctx.io.exit(1);
  }
}
