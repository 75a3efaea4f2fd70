/**
 * Logging Setup for the Scheduler Server
 *
 * Initializes the centralized logging system with console and file
 * transports.
 */

import * as path from "path";
import * as os from "os";
import {
  initLogger,
  log,
  ConsoleTransport,
  FileTransport,
  type Logger,
  type ILogger,
  type LogLevel,
  type LogTransport,
} from "@tickcall/shared/logging";

// ============================================
// CONFIGURATION
// ============================================

const DEFAULT_LOG_DIR = path.join(os.homedir(), ".tickcall", "logs");

export interface LoggingOptions {
  /** Minimum level to log (default: "debug" in dev, "info" in prod) */
  minLevel?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Enable file output (default: true) */
  file?: boolean;
  /** Directory for log files */
  logDir?: string;
  /** Console colors (default: auto-detect) */
  colors?: boolean;
  /** Extra transports, mostly for tests */
  transports?: LogTransport[];
}

// ============================================
// INITIALIZATION
// ============================================

let logger: Logger | null = null;

/**
 * Initialize the logging system for the server.
 */
export function initServerLogging(options: LoggingOptions = {}): Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const minLevel = options.minLevel ?? (isDev ? "debug" : "info");

  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({
      minLevel,
      colors: options.colors,
      prettyPrint: isDev,
    }));
  }

  if (options.file !== false) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir: options.logDir ?? DEFAULT_LOG_DIR,
      filename: "server",
      maxSize: 10 * 1024 * 1024,
      maxFiles: 10,
    }));
  }

  transports.push(...(options.transports ?? []));

  logger = initLogger({
    minLevel,
    component: "server",
    transports,
    ringBufferSize: 2000,
  });

  return logger;
}

/**
 * Get the server logger instance. Auto-initializes if not already done.
 */
export function getServerLogger(): Logger {
  return logger ?? initServerLogging();
}

// Re-export log() for convenience
export { log };

/**
 * Create a namespaced logger for a specific component.
 *
 * Resolves the server logger on every call, so module-level loggers created
 * before initServerLogging() still pick up the configured transports.
 */
export function createComponentLogger(component: string): ILogger {
  const scoped = (): ILogger => getServerLogger().child({ component: `server.${component}` });
  return {
    trace: (message, data) => scoped().trace(message, data),
    debug: (message, data) => scoped().debug(message, data),
    info: (message, data) => scoped().info(message, data),
    warn: (message, data) => scoped().warn(message, data),
    error: (message, error, data) => scoped().error(message, error, data),
    fatal: (message, error, data) => scoped().fatal(message, error, data),
    child: (context) => scoped().child(context),
    getRecentLogs: (count) => scoped().getRecentLogs(count),
    flush: () => scoped().flush(),
  };
}
