/**
 * Catchup Scanner
 *
 * Replays tasks whose minute passed while nobody was ticking: every
 * pending task due at or before the current minute goes to the
 * dispatcher. Runs at startup and then every `catchupIntervalMinutes`.
 */

import { createComponentLogger } from "#logging.js";
import { decodeRows, type Page, type TaskStore } from "./store.js";
import type { Dispatch } from "./tick.js";
import { systemClock, unixMinute, type Clock, type TaskKey } from "./types.js";

const log = createComponentLogger("scheduler.catchup");

export interface CatchupScannerOptions {
  /** 0 runs a single pass at start() */
  catchupIntervalMinutes: number;
  clock?: Clock;
}

export interface CatchupSummary {
  scanned: number;
  dispatched: number;
  rejected: number;
  complete: boolean;
}

export class CatchupScanner {
  private readonly clock: Clock;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inProgress = false;

  constructor(
    private readonly store: TaskStore,
    private readonly dispatch: Dispatch,
    private readonly options: CatchupScannerOptions,
  ) {
    this.clock = options.clock ?? systemClock;
  }

  start(): void {
    if (this.timer) return;
    void this.runLogged();

    const minutes = this.options.catchupIntervalMinutes;
    if (minutes > 0) {
      this.timer = setInterval(() => void this.runLogged(), minutes * 60_000);
    }
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * One full pass. Returns null when a pass is already in progress.
   * A scan failure ends the pass; the next one starts over.
   */
  async run(): Promise<CatchupSummary | null> {
    if (this.inProgress) return null;
    this.inProgress = true;

    const currentMinute = unixMinute(this.clock());
    const summary: CatchupSummary = { scanned: 0, dispatched: 0, rejected: 0, complete: true };

    try {
      let cursor: TaskKey | undefined;
      do {
        let page: Page;
        try {
          page = await this.store.scan({ maxTriggerAt: currentMinute, state: "pending" }, cursor);
        } catch (error) {
          log.error("Catchup scan failed, pass aborted", error, { ...summary });
          summary.complete = false;
          return summary;
        }

        summary.scanned += page.rows.length;
        const tasks = decodeRows(page.rows, (error) => {
          log.warn("Skipping undecodable task row", { error: String(error) });
        });

        for (const task of tasks) {
          const result = this.dispatch(task);
          if (result === "rejected") summary.rejected++;
          else if (result !== "duplicate") summary.dispatched++;
        }

        cursor = page.next;
      } while (cursor);

      if (summary.dispatched > 0 || summary.rejected > 0) {
        log.info("Catchup pass dispatched missed tasks", { ...summary });
      } else {
        log.debug("Catchup pass found nothing", { currentMinute });
      }
      return summary;
    } finally {
      this.inProgress = false;
    }
  }

  private async runLogged(): Promise<void> {
    try {
      await this.run();
    } catch (error) {
      log.error("Catchup pass failed", error);
    }
  }
}
