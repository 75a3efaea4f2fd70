/**
 * tickcall Server - Main Entry Point
 *
 * Loads configuration, opens the database, starts the tick and catchup
 * loops and serves the HTTP API until SIGINT/SIGTERM.
 */

import { config as loadEnv } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

// Load .env from project root (ESM compatible)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
loadEnv({ path: resolve(__dirname, "../../.env") });

import { serve } from "@hono/node-server";
import { createComponentLogger, initServerLogging } from "#logging.js";
import { loadConfig } from "./config.js";
import { closeDatabase, initDatabase } from "./db/index.js";
import { createApp } from "./routes/tasks.js";
import { SchedulingService, SqliteTaskStore } from "./services/scheduler/index.js";

const log = createComponentLogger("main");

async function main(): Promise<void> {
  const { config, warnings } = loadConfig();

  const logger = initServerLogging({
    minLevel: config.logLevel,
    file: config.logToFile,
    logDir: config.logDir,
  });
  for (const warning of warnings) {
    log.warn(warning);
  }

  const db = initDatabase(config.dbDir);
  const service = new SchedulingService(new SqliteTaskStore(db, config.pageSize), {
    clientTimeoutMs: config.clientTimeoutMs,
    tickIntervalMs: config.tickIntervalMs,
    catchupIntervalMinutes: config.catchupIntervalMinutes,
    maxConcurrent: config.maxConcurrent,
    maxQueued: config.maxQueued,
  });

  service.onSchedulerEvent((event) => {
    log.debug(`${event.type}: ${event.taskId}`, event.details);
  });
  service.start();

  const app = createApp(service);
  const server = serve({ fetch: app.fetch, hostname: config.listenIp, port: config.listenPort }, (info) => {
    log.info(`HTTP API listening on ${config.listenIp}:${info.port}`);
  });

  // ============================================
  // GRACEFUL SHUTDOWN
  // ============================================

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${signal}, shutting down`);

    const abandoned = await service.stop();
    await new Promise<void>((done) => server.close(() => done()));
    closeDatabase();

    log.info("Shutdown complete", { abandonedExecutions: abandoned });
    await logger.close();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.fatal("Shutdown failed", error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  log.fatal("Server failed to start", error);
  process.exit(1);
});
