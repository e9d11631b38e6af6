/**
 * Configuration loading tests
 */

import fs from "fs";
import os from "os";
import path from "path";
import { loadConfig } from "../src/cli/utils/loadConfig";
import { InvalidConfigurationError } from "../src/core/errors";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tether-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(contents: string): void {
    fs.writeFileSync(path.join(dir, "tether.config.json"), contents);
  }

  test("uses defaults without a file", () => {
    expect(loadConfig(dir, {})).toEqual({
      engine: {
        url: "http://localhost:8700/rpc",
        timeoutMs: 0,
        namespace: "ml.wrappers",
        headers: {},
      },
      logger: { level: "warn", format: "pretty" },
    });
  });

  test("reads the file and lets the environment override it", () => {
    writeConfig(
      JSON.stringify({
        engine: { url: "http://engine.internal:9000/rpc", headers: { Authorization: "Bearer test-secret" } },
        logger: { level: "info" },
      })
    );

    const config = loadConfig(dir, {
      TETHER_ENGINE_TIMEOUT_MS: "5000",
      TETHER_NAMESPACE: "analytics",
      LOG_FORMAT: "json",
    });

    expect(config.engine).toEqual({
      url: "http://engine.internal:9000/rpc",
      timeoutMs: 5000,
      namespace: "analytics",
      headers: { Authorization: "Bearer test-secret" },
    });
    expect(config.logger).toEqual({ level: "info", format: "json" });

    expect(loadConfig(dir, { TETHER_ENGINE_URL: "http://other:1/rpc" }).engine.url).toBe("http://other:1/rpc");
  });

  test("rejects invalid JSON", () => {
    writeConfig("{ engine: ");
    expect(() => loadConfig(dir, {})).toThrow(InvalidConfigurationError);
    expect(() => loadConfig(dir, {})).toThrow("is not valid JSON");
  });

  test("rejects a file that is not an object", () => {
    writeConfig("[1, 2]");
    expect(() => loadConfig(dir, {})).toThrow("must contain a JSON object");
  });

  test("rejects unknown keys and bad values", () => {
    writeConfig(JSON.stringify({ engine: { retries: 3 } }));
    expect(() => loadConfig(dir, {})).toThrow("tether.config.json rejected");

    writeConfig("{}");
    expect(() => loadConfig(dir, { LOG_LEVEL: "loud" })).toThrow(/logger\.level/);
    expect(() => loadConfig(dir, { TETHER_ENGINE_TIMEOUT_MS: "soon" })).toThrow(/engine\.timeoutMs/);
  });
});
