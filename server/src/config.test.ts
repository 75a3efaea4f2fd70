/**
 * Configuration Tests
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("uses the defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({ config: DEFAULT_CONFIG, warnings: [] });
  });

  it("reads overrides", () => {
    const { config, warnings } = loadConfig({
      LISTEN_IP: "127.0.0.1",
      LISTEN_PORT: "8080",
      CLIENT_TIMEOUT: "500",
      CATCHUP_INTERVAL: "0",
      MAX_CONCURRENT: "4",
      LOG_FILE: "false",
      DB_DIR: "/srv/tickcall",
    });

    expect(warnings).toEqual([]);
    expect(config).toMatchObject({
      listenIp: "127.0.0.1",
      listenPort: 8080,
      clientTimeoutMs: 500,
      catchupIntervalMinutes: 0,
      maxConcurrent: 4,
      logToFile: false,
      dbDir: "/srv/tickcall",
    });
  });

  it("falls back with a warning on an unusable number", () => {
    const { config, warnings } = loadConfig({ LISTEN_PORT: "http", TICK_INTERVAL_MS: "10" });

    expect(config.listenPort).toBe(6777);
    expect(config.tickIntervalMs).toBe(60_000);
    expect(warnings).toEqual([
      "LISTEN_PORT=http is not an integer >= 1; using 6777",
      "TICK_INTERVAL_MS=10 is not an integer >= 1000; using 60000",
    ]);
  });

  it("takes LOG_LEVEL case-insensitively", () => {
    expect(loadConfig({ LOG_LEVEL: "WARN" }).config.logLevel).toBe("warn");
  });

  it("warns about an unknown LOG_LEVEL", () => {
    const { config, warnings } = loadConfig({ LOG_LEVEL: "loud" });

    expect(config.logLevel).toBe("info");
    expect(warnings).toEqual(["LOG_LEVEL=loud is not a log level; using info"]);
  });

  it("forces debug logging when DEBUG is set", () => {
    const { config, warnings } = loadConfig({ DEBUG: "yes", LOG_LEVEL: "error" });

    expect(config.debug).toBe(true);
    expect(config.logLevel).toBe("debug");
    expect(warnings).toEqual([]);
  });
});
