/**
 * Server Configuration
 *
 * Explicit configuration object built from environment variables. Loading
 * `.env` happens once in the entry point; this module only reads whatever
 * environment it is handed.
 */

import * as path from "path";
import * as os from "os";
import { isLogLevel, type LogLevel } from "@tickcall/shared/logging";

export interface AppConfig {
  listenIp: string;
  listenPort: number;
  debug: boolean;
  logLevel: LogLevel;
  logDir: string;
  logToFile: boolean;
  dbDir: string;
  /** Per-request callback timeout (ms) */
  clientTimeoutMs: number;
  /** Pause between tick cycles (ms) */
  tickIntervalMs: number;
  /** Minutes between catchup passes; 0 runs catchup only at startup */
  catchupIntervalMinutes: number;
  maxConcurrent: number;
  maxQueued: number;
  pageSize: number;
}

export interface LoadedConfig {
  config: AppConfig;
  /** Values that were present but unusable; logged once logging is up */
  warnings: string[];
}

const BASE_DIR = path.join(os.homedir(), ".tickcall");

export const DEFAULT_CONFIG: AppConfig = {
  listenIp: "0.0.0.0",
  listenPort: 6777,
  debug: false,
  logLevel: "info",
  logDir: path.join(BASE_DIR, "logs"),
  logToFile: true,
  dbDir: path.join(BASE_DIR, "data"),
  clientTimeoutMs: 3000,
  tickIntervalMs: 60_000,
  catchupIntervalMinutes: 5,
  maxConcurrent: 50,
  maxQueued: 1000,
  pageSize: 100,
};

// ============================================
// LOADING
// ============================================

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const warnings: string[] = [];

  function str(name: string, fallback: string): string {
    const value = env[name]?.trim();
    return value ? value : fallback;
  }

  function int(name: string, fallback: number, min: number): number {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    const n = Number(raw);
    if (!Number.isInteger(n) || n < min) {
      warnings.push(`${name}=${raw} is not an integer >= ${min}; using ${fallback}`);
      return fallback;
    }
    return n;
  }

  function bool(name: string, fallback: boolean): boolean {
    const raw = env[name]?.trim().toLowerCase();
    if (!raw) return fallback;
    return raw === "true" || raw === "1" || raw === "yes";
  }

  const debug = bool("DEBUG", DEFAULT_CONFIG.debug);

  let logLevel: LogLevel = debug ? "debug" : DEFAULT_CONFIG.logLevel;
  const rawLevel = env.LOG_LEVEL?.trim().toLowerCase();
  if (rawLevel && !debug) {
    if (isLogLevel(rawLevel)) {
      logLevel = rawLevel;
    } else {
      warnings.push(`LOG_LEVEL=${rawLevel} is not a log level; using ${logLevel}`);
    }
  }

  const config: AppConfig = {
    listenIp: str("LISTEN_IP", DEFAULT_CONFIG.listenIp),
    listenPort: int("LISTEN_PORT", DEFAULT_CONFIG.listenPort, 1),
    debug,
    logLevel,
    logDir: str("LOG_DIR", DEFAULT_CONFIG.logDir),
    logToFile: bool("LOG_FILE", DEFAULT_CONFIG.logToFile),
    dbDir: str("DB_DIR", DEFAULT_CONFIG.dbDir),
    clientTimeoutMs: int("CLIENT_TIMEOUT", DEFAULT_CONFIG.clientTimeoutMs, 1),
    tickIntervalMs: int("TICK_INTERVAL_MS", DEFAULT_CONFIG.tickIntervalMs, 1000),
    catchupIntervalMinutes: int("CATCHUP_INTERVAL", DEFAULT_CONFIG.catchupIntervalMinutes, 0),
    maxConcurrent: int("MAX_CONCURRENT", DEFAULT_CONFIG.maxConcurrent, 1),
    maxQueued: int("MAX_QUEUED", DEFAULT_CONFIG.maxQueued, 0),
    pageSize: int("PAGE_SIZE", DEFAULT_CONFIG.pageSize, 1),
  };

  return { config, warnings };
}
