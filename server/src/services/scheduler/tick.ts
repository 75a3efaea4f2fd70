/**
 * Tick Scheduler
 *
 * Once per interval, pages through the tasks due at the current minute and
 * hands them to the dispatcher. The next cycle is armed when the previous
 * one ends, so cycles never overlap and drift is accepted.
 */

import { createComponentLogger } from "#logging.js";
import type { SubmitResult } from "./pool.js";
import { decodeRows, type Page, type TaskStore } from "./store.js";
import { systemClock, unixMinute, type CallbackTask, type Clock, type TaskKey } from "./types.js";

const log = createComponentLogger("scheduler.tick");

export type Dispatch = (task: CallbackTask) => SubmitResult;

export interface TickSchedulerOptions {
  tickIntervalMs: number;
  clock?: Clock;
}

export interface CycleSummary {
  minute: number;
  dispatched: number;
  alreadyRunning: number;
  rejected: number;
  /** False when the store query failed part way */
  complete: boolean;
}

export class TickScheduler {
  private readonly clock: Clock;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(
    private readonly store: TaskStore,
    private readonly dispatch: Dispatch,
    private readonly options: TickSchedulerOptions,
  ) {
    this.clock = options.clock ?? systemClock;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Run a cycle now, then keep ticking until stop(). */
  start(): void {
    if (this.running) return;
    this.running = true;
    log.info("Tick scheduler started", { intervalMs: this.options.tickIntervalMs });
    void this.loop();
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Dispatch every non-running task due at the current minute. */
  async runCycle(): Promise<CycleSummary> {
    const minute = unixMinute(this.clock());
    const summary: CycleSummary = { minute, dispatched: 0, alreadyRunning: 0, rejected: 0, complete: true };

    let cursor: TaskKey | undefined;
    do {
      let page: Page;
      try {
        page = await this.store.queryByTriggerAt(minute, cursor);
      } catch (error) {
        log.error("Failed to query due tasks, skipping cycle", error, { minute });
        summary.complete = false;
        return summary;
      }

      const tasks = decodeRows(page.rows, (error) => {
        log.warn("Skipping undecodable task row", { minute, error: String(error) });
      });

      for (const task of tasks) {
        if (task.taskState === "running") {
          summary.alreadyRunning++;
          continue;
        }
        const result = this.dispatch(task);
        if (result === "rejected") summary.rejected++;
        else if (result !== "duplicate") summary.dispatched++;
      }

      cursor = page.next;
    } while (cursor);

    if (summary.dispatched > 0 || summary.rejected > 0) {
      log.info("Tick cycle dispatched tasks", { ...summary });
    } else {
      log.debug("Tick cycle found nothing due", { minute });
    }
    return summary;
  }

  private async loop(): Promise<void> {
    try {
      await this.runCycle();
    } catch (error) {
      log.error("Tick cycle failed", error);
    }
    if (this.running) {
      this.timer = setTimeout(() => void this.loop(), this.options.tickIntervalMs);
    }
  }
}
