/**
 * Scheduler Types
 *
 * Types for the minute-resolution callback scheduler.
 */

// ============================================
// CALLBACK TASK
// ============================================

export const TASK_STATES = ["pending", "running", "successful", "failed", "skipped"] as const;
export type TaskState = (typeof TASK_STATES)[number];

export const CALLBACK_METHODS = ["GET", "POST", "PUT", "DELETE"] as const;
export type CallbackMethod = (typeof CALLBACK_METHODS)[number];

/** Structured identity of a stored task. */
export interface TaskKey {
  /** Unix seconds, multiple of 60 */
  triggerAt: number;
  tag: string;
  uniqueId: string;
}

export interface CallbackTask extends TaskKey {
  callbackEndpoint: string;
  callbackMethod: CallbackMethod;
  payload: string;
  /** Maximum callback attempts */
  retry: number;
  expectedHttpStatus: number;
  /** Minutes past triggerAt after which the callback is abandoned */
  maxDelay: number;
  taskState: TaskState;
  responseStatus: number | null;
  responseBody: string | null;
  /** Unix seconds */
  executedAt: number | null;
}

/**
 * Reference to one or more tasks, as parsed from a wire identifier.
 * Any field may be missing; which ones are present selects the lookup mode.
 */
export interface TaskRef {
  tag?: string;
  uniqueId?: string;
  triggerAt?: number;
}

/** Create request as it arrives on the wire. */
export interface CreateTaskRequest {
  trigger_at?: string;
  tag?: string;
  payload?: string;
  callback?: string;
  callback_method?: string;
  retry?: number;
  expected_http_status?: number;
  max_delay?: number;
}

/** JSON view of a task returned by the API. */
export interface TaskView {
  task_id: string;
  trigger_at: number;
  tag: string;
  unique_id: string;
  callback: string;
  callback_method: CallbackMethod;
  payload: string;
  retry: number;
  expected_http_status: number;
  max_delay: number;
  task_state: TaskState;
  response_status: number | null;
  response_body: string | null;
  executed_at: number | null;
}

// ============================================
// SCHEDULER EVENTS
// ============================================

export type SchedulerEventType =
  | "task_created"
  | "task_rescheduled"
  | "task_executing"
  | "task_completed"
  | "task_failed"
  | "task_skipped";

export interface SchedulerEvent {
  type: SchedulerEventType;
  taskId: string;
  timestamp: Date;
  details?: Record<string, unknown>;
}

export type SchedulerEventCallback = (event: SchedulerEvent) => void;

// ============================================
// SCHEDULER CONFIG
// ============================================

export interface SchedulerConfig {
  /** Pause between tick cycles (ms) */
  tickIntervalMs: number;
  /** Minutes between catchup passes; 0 disables the periodic pass */
  catchupIntervalMinutes: number;
  /** Maximum concurrent callback executions */
  maxConcurrent: number;
  /** Maximum executions waiting for a free slot */
  maxQueued: number;
  /** Per-request callback timeout (ms) */
  clientTimeoutMs: number;
  /** How long stop() waits for active executions (ms) */
  drainTimeoutMs: number;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  tickIntervalMs: 60_000,
  catchupIntervalMinutes: 5,
  maxConcurrent: 50,
  maxQueued: 1000,
  clientTimeoutMs: 3000,
  drainTimeoutMs: 30_000,
};

/** Milliseconds since the epoch; injectable for tests. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/** Current Unix time floored to the minute. */
export function unixMinute(nowMs: number): number {
  const seconds = Math.floor(nowMs / 1000);
  return seconds - (seconds % 60);
}
