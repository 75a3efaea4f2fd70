/**
 * Callback Execution
 *
 * Runs one due task: abandons it past its max delay, claims it, calls the
 * endpoint through the retrying transport and records the outcome.
 * Storage failures are logged; nothing here throws to the dispatcher.
 */

import { createComponentLogger } from "#logging.js";
import type { ILogger } from "@tickcall/shared/logging";
import type { TaskStore } from "./store.js";
import { formatTaskId } from "./task-id.js";
import { truncateBody } from "./task.js";
import { sendWithRetry, type TransportOptions } from "./transport.js";
import {
  systemClock,
  unixMinute,
  type CallbackTask,
  type Clock,
  type SchedulerEvent,
} from "./types.js";

const log = createComponentLogger("scheduler.execution");

export type ExecutionOutcome = "successful" | "failed" | "skipped" | "claimed-elsewhere";

export interface CallbackExecutorOptions {
  clientTimeoutMs: number;
  clock?: Clock;
  emit?: (event: SchedulerEvent) => void;
  /** Overrides for tests */
  transport?: Pick<TransportOptions, "sleep" | "random">;
}

/** True once the current minute is past the task's max delay. */
export function isPastMaxDelay(task: CallbackTask, currentMinute: number): boolean {
  return currentMinute > task.triggerAt + task.maxDelay * 60;
}

export class CallbackExecutor {
  private readonly clock: Clock;
  private readonly emit: (event: SchedulerEvent) => void;

  constructor(
    private readonly store: TaskStore,
    private readonly options: CallbackExecutorOptions,
  ) {
    this.clock = options.clock ?? systemClock;
    this.emit = options.emit ?? (() => {});
  }

  async execute(task: CallbackTask): Promise<ExecutionOutcome> {
    const taskId = formatTaskId(task);
    const taskLog = log.child({ taskId });

    if (isPastMaxDelay(task, unixMinute(this.clock()))) {
      return this.skip(task, taskId, taskLog);
    }

    let claimed = true;
    try {
      claimed = await this.store.claim(task, task.taskState);
    } catch (error) {
      taskLog.error("Failed to mark task running, executing anyway", error);
    }
    if (!claimed) {
      taskLog.debug("Task already claimed by another dispatcher", { observedState: task.taskState });
      return "claimed-elsewhere";
    }

    this.emit({
      type: "task_executing",
      taskId,
      timestamp: new Date(this.clock()),
      details: { callback: task.callbackEndpoint, method: task.callbackMethod },
    });

    const result = await sendWithRetry(
      {
        url: task.callbackEndpoint,
        method: task.callbackMethod,
        payload: task.payload,
        expectedStatus: task.expectedHttpStatus,
        maxAttempts: task.retry,
      },
      { timeoutMs: this.options.clientTimeoutMs, ...this.options.transport },
    );

    const succeeded = result.status === task.expectedHttpStatus;
    const finished: CallbackTask = {
      ...task,
      taskState: succeeded ? "successful" : "failed",
      responseStatus: result.status,
      responseBody: truncateBody(result.body),
      executedAt: Math.floor(this.clock() / 1000),
    };

    try {
      await this.store.put(finished);
    } catch (error) {
      taskLog.error("Failed to record callback result", error, { state: finished.taskState });
    }

    const details = { status: result.status, attempts: result.attempts };
    if (succeeded) {
      taskLog.info("Callback succeeded", details);
      this.emit({ type: "task_completed", taskId, timestamp: new Date(this.clock()), details });
      return "successful";
    }

    taskLog.warn("Callback failed", { expected: task.expectedHttpStatus, ...details });
    this.emit({ type: "task_failed", taskId, timestamp: new Date(this.clock()), details });
    return "failed";
  }

  /** Conditional `observed → skipped`, so a stale copy never overwrites a finished row. */
  private async skip(task: CallbackTask, taskId: string, taskLog: ILogger): Promise<ExecutionOutcome> {
    let marked = true;
    try {
      marked = await this.store.claim(task, task.taskState, "skipped");
    } catch (error) {
      taskLog.error("Failed to mark task skipped", error);
    }
    if (!marked) {
      taskLog.debug("Task changed by another dispatcher, not skipped", { observedState: task.taskState });
      return "claimed-elsewhere";
    }

    taskLog.info("Task past its max delay, skipped", { maxDelay: task.maxDelay });
    this.emit({
      type: "task_skipped",
      taskId,
      timestamp: new Date(this.clock()),
      details: { triggerAt: task.triggerAt, maxDelay: task.maxDelay },
    });
    return "skipped";
  }
}
