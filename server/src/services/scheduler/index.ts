/**
 * Scheduler Module Barrel Exports
 *
 * Minute-resolution HTTP callback scheduler.
 *
 * Structure:
 *   types.ts         Task, event and config types
 *   errors.ts        Error classes surfaced to callers
 *   time-parser.ts   Trigger time normalization
 *   task-id.ts       Wire form of task identities
 *   task.ts          Validation, defaults, row and view encodings
 *   store.ts         Storage contract
 *   sqlite-store.ts  better-sqlite3 implementation
 *   transport.ts     Retrying HTTP callback
 *   pool.ts          Bounded dispatch pool
 *   execution.ts     Claim, call, record
 *   tick.ts          Per-minute dispatch loop
 *   catchup.ts       Missed-task recovery
 *   stats.ts         Aggregated counts
 *   service.ts       Lifecycle orchestrator and task operations
 */

export * from "./types.js";
export * from "./errors.js";

export { SchedulingService } from "./service.js";
export type { SchedulingServiceOptions, StatusResult } from "./service.js";

export { SqliteTaskStore, DEFAULT_PAGE_SIZE } from "./sqlite-store.js";
export type { TaskStore, Page, TagFilter, ScanFilter, StateCounts } from "./store.js";

export { parseCreateRequest, toTaskView } from "./task.js";
export { formatTaskId, parseTaskRef, parseTaskKey } from "./task-id.js";
export { normalizeTriggerAt } from "./time-parser.js";

export type { SchedulerStats } from "./stats.js";
