/**
 * Task Store Contract
 *
 * Storage seen by the scheduler: a primary partition by trigger minute, a
 * secondary index by tag, and a filtered scan. Rows come back undecoded so
 * that one bad row never fails a whole page; see taskFromRow().
 */

import { taskFromRow } from "./task.js";
import type { CallbackTask, TaskKey, TaskState } from "./types.js";

/** One page of rows in ascending key order. */
export interface Page {
  rows: unknown[];
  /** Key of the last row when the page is full; pass it back as the cursor. */
  next?: TaskKey;
}

export interface TagFilter {
  /** Only occurrences at or after this time */
  minTriggerAt?: number;
  /** Only occurrences at exactly this time */
  triggerAt?: number;
}

export interface ScanFilter {
  minTriggerAt?: number;
  maxTriggerAt?: number;
  state?: TaskState;
}

export type StateCounts = Record<TaskState, number>;

export interface TaskStore {
  get(key: TaskKey): Promise<unknown | null>;
  /** Insert or replace. */
  put(task: CallbackTask): Promise<void>;
  /**
   * Move the task to `nextState` (default `running`) only if it is still in
   * `expectedState`. False when the row is gone or another dispatcher
   * changed it first.
   */
  claim(key: TaskKey, expectedState: TaskState, nextState?: TaskState): Promise<boolean>;
  queryByTriggerAt(triggerAt: number, cursor?: TaskKey): Promise<Page>;
  queryByTag(tag: string, filter: TagFilter, cursor?: TaskKey): Promise<Page>;
  scan(filter: ScanFilter, cursor?: TaskKey): Promise<Page>;
  countByState(): Promise<StateCounts>;
}

/** Decode a page, handing undecodable rows to `onError` instead of failing. */
export function decodeRows(
  rows: unknown[],
  onError: (error: unknown, row: unknown) => void,
): CallbackTask[] {
  const tasks: CallbackTask[] = [];
  for (const row of rows) {
    try {
      tasks.push(taskFromRow(row));
    } catch (error) {
      onError(error, row);
    }
  }
  return tasks;
}
