/**
 * Centralized Logging System
 *
 * Usage:
 *
 * ```typescript
 * import { initLogger, log, ConsoleTransport, FileTransport } from "@tickcall/shared/logging";
 *
 * // Initialize once at startup
 * initLogger({
 *   minLevel: "debug",
 *   component: "server",
 *   transports: [
 *     new ConsoleTransport({ colors: true }),
 *     new FileTransport({ logDir: "/var/log/tickcall" })
 *   ]
 * });
 *
 * log().info("Listening", { port: 6777 });
 * log().error("Store unavailable", new Error("SQLITE_BUSY"), { table: "callback_tasks" });
 *
 * // Child logger with its own component and task context
 * const execLog = log().child({ component: "server.scheduler.executor", taskId: "nightly+a1b2@1700000040" });
 * execLog.debug("Starting callback");
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogTransport,
  type LoggerConfig,
  type ILogger,
} from "./types.js";

export {
  Logger,
  RingBuffer,
  initLogger,
  getLogger,
  log
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions,
} from "./transports/index.js";
