/**
 * Dispatch Pool
 *
 * Bounded executor for callback jobs: at most `maxConcurrent` run at once
 * and up to `maxQueued` wait in FIFO order. Callers submit and move on;
 * the outcome of a job is never reported back to them.
 */

import { createComponentLogger } from "#logging.js";

const log = createComponentLogger("scheduler.pool");

export type SubmitResult = "started" | "queued" | "duplicate" | "rejected";

export interface DispatchPoolOptions {
  maxConcurrent: number;
  maxQueued: number;
}

export class DispatchPool<T> {
  private readonly active = new Set<string>();
  private readonly queue: { id: string; item: T }[] = [];
  private readonly queuedIds = new Set<string>();
  private idleWaiters: (() => void)[] = [];
  private closed = false;

  constructor(
    private readonly worker: (item: T) => Promise<void>,
    private readonly options: DispatchPoolOptions,
  ) {}

  get activeCount(): number {
    return this.active.size;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /** True while `id` is running or waiting in this pool. */
  has(id: string): boolean {
    return this.active.has(id) || this.queuedIds.has(id);
  }

  submit(id: string, item: T): SubmitResult {
    if (this.has(id)) return "duplicate";
    if (this.closed) return "rejected";

    if (this.active.size < this.options.maxConcurrent) {
      this.start(id, item);
      return "started";
    }
    if (this.queue.length < this.options.maxQueued) {
      this.queue.push({ id, item });
      this.queuedIds.add(id);
      return "queued";
    }

    log.warn("Dispatch queue full, job rejected", {
      id,
      active: this.active.size,
      queued: this.queue.length,
    });
    return "rejected";
  }

  /** Resolves once nothing is running or queued. */
  onIdle(): Promise<void> {
    if (this.active.size === 0 && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Stop accepting work, drop the queue and wait up to `timeoutMs` for
   * running jobs. Returns how many were still running when the wait ended.
   */
  async drain(timeoutMs: number): Promise<number> {
    this.closed = true;
    const dropped = this.queue.length;
    this.queue.length = 0;
    this.queuedIds.clear();
    if (dropped > 0) log.info("Dropped queued jobs", { count: dropped });

    if (this.active.size === 0) {
      this.notifyIdle();
      return 0;
    }

    log.info("Draining active executions", { count: this.active.size });
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });
    await Promise.race([this.onIdle(), timeout]);
    clearTimeout(timer);

    if (this.active.size > 0) {
      log.warn("Drain timed out, abandoning executions", { remaining: this.active.size });
    }
    return this.active.size;
  }

  private start(id: string, item: T): void {
    this.active.add(id);
    void this.run(id, item);
  }

  private async run(id: string, item: T): Promise<void> {
    try {
      await this.worker(item);
    } catch (error) {
      log.error("Dispatch worker failed", error, { id });
    } finally {
      this.active.delete(id);
      this.pump();
    }
  }

  private pump(): void {
    while (this.active.size < this.options.maxConcurrent) {
      const next = this.queue.shift();
      if (!next) break;
      this.queuedIds.delete(next.id);
      this.start(next.id, next.item);
    }
    if (this.active.size === 0 && this.queue.length === 0) {
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
