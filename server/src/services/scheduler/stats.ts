/**
 * Scheduler Stats
 *
 * Per-state task counts plus the live dispatch pool gauges.
 */

import type { DispatchPool } from "./pool.js";
import type { StateCounts, TaskStore } from "./store.js";
import type { CallbackTask } from "./types.js";

export interface SchedulerStats extends StateCounts {
  activeExecutions: number;
  queuedExecutions: number;
}

export async function collectStats(
  store: TaskStore,
  pool: DispatchPool<CallbackTask>,
): Promise<SchedulerStats> {
  const counts = await store.countByState();
  return {
    ...counts,
    activeExecutions: pool.activeCount,
    queuedExecutions: pool.queuedCount,
  };
}
