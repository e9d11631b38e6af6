/**
 * src/cli/utils/loadConfig.ts
 * tether.config.json in the working directory, overridden by environment.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { InvalidConfigurationError } from "../../core/errors";
import { DEFAULT_NAMESPACE } from "../../core/remote/engineClient";

export const CONFIG_FILE = "tether.config.json";

export const TetherConfigSchema = z
  .object({
    engine: z
      .object({
        url: z.string().url().default("http://localhost:8700/rpc"),
        timeoutMs: z.number().int().min(0).default(0),
        namespace: z.string().min(1).default(DEFAULT_NAMESPACE),
        headers: z.record(z.string()).default({}),
      })
      .strict()
      .default({}),
    logger: z
      .object({
        level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("warn"),
        format: z.enum(["json", "pretty"]).default("pretty"),
      })
      .strict()
      .default({}),
  })
  .strict();

export type TetherConfig = z.output<typeof TetherConfigSchema>;

type Env = Record<string, string | undefined>;

function readFile(file: string): Record<string, unknown> {
  if (!fs.existsSync(file)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (err) {
    throw new InvalidConfigurationError(
      `${file} is not valid JSON (${err instanceof Error ? err.message : String(err)})`
    );
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new InvalidConfigurationError(`${file} must contain a JSON object`);
  }
  return { ...parsed };
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return value !== null && typeof value === "object" && !Array.isArray(value) ? { ...value } : {};
}

export function loadConfig(cwd: string = process.cwd(), env: Env = process.env): TetherConfig {
  const raw = readFile(path.join(cwd, CONFIG_FILE));

  const engine = section(raw, "engine");
  if (env.TETHER_ENGINE_URL) engine.url = env.TETHER_ENGINE_URL;
  if (env.TETHER_ENGINE_TIMEOUT_MS) engine.timeoutMs = Number(env.TETHER_ENGINE_TIMEOUT_MS);
  if (env.TETHER_NAMESPACE) engine.namespace = env.TETHER_NAMESPACE;

  const logger = section(raw, "logger");
  if (env.LOG_LEVEL) logger.level = env.LOG_LEVEL;
  if (env.LOG_FORMAT) logger.format = env.LOG_FORMAT;

  const result = TetherConfigSchema.safeParse({ ...raw, engine, logger });
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new InvalidConfigurationError(`${CONFIG_FILE} rejected (${issues.join("; ")})`, issues);
  }
  return result.data;
}
