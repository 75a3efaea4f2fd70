/**
 * Scheduling Service (Lifecycle Orchestrator)
 *
 * Wires the store, dispatch pool, executor, tick loop and catchup scanner
 * together. Owns the start/stop lifecycle, event emission, and the task
 * operations exposed over HTTP: create, reschedule, status and stats.
 */

import { createComponentLogger } from "#logging.js";
import { CatchupScanner } from "./catchup.js";
import { LookupFailedError, StorageWriteError, TaskNotFoundError, TaskValidationError } from "./errors.js";
import { CallbackExecutor } from "./execution.js";
import { DispatchPool, type SubmitResult } from "./pool.js";
import { collectStats, type SchedulerStats } from "./stats.js";
import { decodeRows, type Page, type TaskStore } from "./store.js";
import { formatTaskId, isFullKey } from "./task-id.js";
import { buildTask, taskFromRow } from "./task.js";
import { TickScheduler } from "./tick.js";
import { normalizeTriggerAt } from "./time-parser.js";
import type { TransportOptions } from "./transport.js";
import {
  DEFAULT_SCHEDULER_CONFIG,
  systemClock,
  unixMinute,
  type CallbackTask,
  type Clock,
  type CreateTaskRequest,
  type SchedulerConfig,
  type SchedulerEvent,
  type SchedulerEventCallback,
  type TaskKey,
  type TaskRef,
} from "./types.js";

const log = createComponentLogger("scheduler");

export interface SchedulingServiceOptions extends Partial<SchedulerConfig> {
  clock?: Clock;
  /** Overrides for tests */
  transport?: Pick<TransportOptions, "sleep" | "random">;
}

export interface StatusResult {
  tasks: CallbackTask[];
  /** Cursor for the following page, when this one was full */
  next?: TaskKey;
}

export class SchedulingService {
  readonly config: SchedulerConfig;
  readonly pool: DispatchPool<CallbackTask>;
  readonly executor: CallbackExecutor;
  readonly tick: TickScheduler;
  readonly catchup: CatchupScanner;

  private readonly clock: Clock;
  private readonly eventListeners: SchedulerEventCallback[] = [];
  private running = false;

  constructor(
    private readonly store: TaskStore,
    options: SchedulingServiceOptions = {},
  ) {
    const { clock, transport, ...overrides } = options;
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...overrides };
    this.clock = clock ?? systemClock;

    this.executor = new CallbackExecutor(store, {
      clientTimeoutMs: this.config.clientTimeoutMs,
      clock: this.clock,
      emit: (event) => this.emitEvent(event),
      transport,
    });
    this.pool = new DispatchPool(async (task) => {
      await this.executor.execute(task);
    }, this.config);

    const dispatch = (task: CallbackTask): SubmitResult => this.pool.submit(formatTaskId(task), task);
    this.tick = new TickScheduler(store, dispatch, { tickIntervalMs: this.config.tickIntervalMs, clock: this.clock });
    this.catchup = new CatchupScanner(store, dispatch, {
      catchupIntervalMinutes: this.config.catchupIntervalMinutes,
      clock: this.clock,
    });
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  start(): void {
    if (this.running) {
      log.warn("Scheduler already running");
      return;
    }
    this.running = true;
    this.catchup.start();
    this.tick.start();

    log.info("Scheduler started", {
      maxConcurrent: this.config.maxConcurrent,
      maxQueued: this.config.maxQueued,
      catchupIntervalMinutes: this.config.catchupIntervalMinutes,
    });
  }

  /** Stop both loops and drain running callbacks. Returns how many were abandoned. */
  async stop(): Promise<number> {
    if (!this.running) return 0;
    this.running = false;
    this.tick.stop();
    this.catchup.stop();

    const remaining = await this.pool.drain(this.config.drainTimeoutMs);
    log.info("Scheduler stopped", { activeExecutions: remaining });
    return remaining;
  }

  onSchedulerEvent(callback: SchedulerEventCallback): void {
    this.eventListeners.push(callback);
  }

  // ============================================
  // TASK OPERATIONS
  // ============================================

  /** Validate and store a new task. Returns its wire id. */
  async create(request: CreateTaskRequest): Promise<string> {
    const task = buildTask(request, this.clock());
    const taskId = formatTaskId(task);

    try {
      await this.store.put(task);
    } catch (error) {
      log.error("Failed to store task", error, { taskId });
      throw new StorageWriteError();
    }

    log.info("Task created", { taskId, callback: task.callbackEndpoint });
    this.emitEvent({
      type: "task_created",
      taskId,
      timestamp: new Date(this.clock()),
      details: { triggerAt: task.triggerAt, method: task.callbackMethod },
    });
    return taskId;
  }

  /**
   * Copy the referenced failed tasks (every referenced task when
   * `includeAll`) to a new trigger time. The old rows stay where they are.
   * Without `newTriggerSpec` the copies fire one minute from now.
   */
  async reschedule(
    ref: TaskRef,
    newTriggerSpec: string | undefined,
    includeAll: boolean,
  ): Promise<CallbackTask[]> {
    const now = this.clock();
    const triggerAt = newTriggerSpec ? normalizeTriggerAt(newTriggerSpec, now) : unixMinute(now) + 60;

    let found: CallbackTask[];
    if (isFullKey(ref)) {
      found = [await this.getTask(ref)];
    } else if (ref.tag) {
      found = await this.collectTag(ref.tag, ref.triggerAt);
    } else {
      throw new TaskValidationError("InvalidTaskId", "reschedule requires a tag");
    }

    const selected = includeAll ? found : found.filter((task) => task.taskState === "failed");
    const moved: CallbackTask[] = [];

    for (const task of selected) {
      const copy: CallbackTask = { ...task, triggerAt };
      try {
        await this.store.put(copy);
      } catch (error) {
        log.error("Failed to store rescheduled task", error, {
          from: formatTaskId(task),
          written: moved.length,
        });
        throw new StorageWriteError();
      }
      moved.push(copy);
      this.emitEvent({
        type: "task_rescheduled",
        taskId: formatTaskId(copy),
        timestamp: new Date(now),
        details: { from: formatTaskId(task), state: copy.taskState },
      });
    }

    log.info("Tasks rescheduled", { found: found.length, rescheduled: moved.length, triggerAt });
    return moved;
  }

  /**
   * Look up tasks by reference:
   * - full key: that one task
   * - tag, optionally at one time: a page of the tag's occurrences
   * - nothing: a page of every task
   *
   * `futureOnly` keeps tasks at or after now for a tag, and after the
   * current minute for a full listing.
   */
  async status(ref: TaskRef, cursor?: TaskKey, futureOnly = false): Promise<StatusResult> {
    if (isFullKey(ref)) {
      return { tasks: [await this.getTask(ref)] };
    }

    const now = this.clock();
    let page: Page;
    try {
      if (ref.tag) {
        page = await this.store.queryByTag(
          ref.tag,
          {
            triggerAt: ref.triggerAt,
            minTriggerAt: futureOnly ? Math.floor(now / 1000) : undefined,
          },
          cursor,
        );
      } else {
        page = await this.store.scan({ minTriggerAt: futureOnly ? unixMinute(now) + 1 : undefined }, cursor);
      }
    } catch (error) {
      log.error("Failed to query tasks", error, { tag: ref.tag });
      throw new LookupFailedError();
    }

    const tasks = decodeRows(page.rows, (error) => {
      log.warn("Skipping undecodable task row", { error: String(error) });
    });

    if (ref.tag && ref.triggerAt !== undefined && !cursor && page.rows.length === 0) {
      throw new TaskNotFoundError(`${ref.tag}@${ref.triggerAt}`);
    }

    return page.next ? { tasks, next: page.next } : { tasks };
  }

  async stats(): Promise<SchedulerStats> {
    try {
      return await collectStats(this.store, this.pool);
    } catch (error) {
      log.error("Failed to count tasks", error);
      throw new LookupFailedError();
    }
  }

  // ============================================
  // HELPERS
  // ============================================

  private async getTask(key: TaskKey): Promise<CallbackTask> {
    let row: unknown;
    try {
      row = await this.store.get(key);
    } catch (error) {
      log.error("Failed to fetch task", error, { taskId: formatTaskId(key) });
      throw new LookupFailedError();
    }
    if (row === null) {
      throw new TaskNotFoundError(formatTaskId(key));
    }
    try {
      return taskFromRow(row);
    } catch (error) {
      log.error("Stored task is malformed", error, { taskId: formatTaskId(key) });
      throw new LookupFailedError();
    }
  }

  private async collectTag(tag: string, triggerAt: number | undefined): Promise<CallbackTask[]> {
    const tasks: CallbackTask[] = [];
    let cursor: TaskKey | undefined;
    do {
      let page: Page;
      try {
        page = await this.store.queryByTag(tag, { triggerAt }, cursor);
      } catch (error) {
        log.error("Failed to query tag", error, { tag, collected: tasks.length });
        throw new LookupFailedError();
      }
      tasks.push(
        ...decodeRows(page.rows, (error) => {
          log.warn("Skipping undecodable task row", { tag, error: String(error) });
        }),
      );
      cursor = page.next;
    } while (cursor);
    return tasks;
  }

  private emitEvent(event: SchedulerEvent): void {
    for (const listener of this.eventListeners) {
      try {
        listener(event);
      } catch (error) {
        log.error("Event listener error", error, { type: event.type });
      }
    }
  }
}
