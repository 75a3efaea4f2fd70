/**
 * Trigger Time Parser
 *
 * Turns a trigger specification into an absolute, minute-aligned Unix
 * timestamp. Accepted forms:
 *   - "1767225600"  absolute Unix seconds, multiple of 60, in the future
 *   - "+15m" / "+2h" / "+1d"  relative to the current minute
 */

import { TaskValidationError } from "./errors.js";
import { unixMinute } from "./types.js";

const RELATIVE_SPEC = /^\+(\d+)([mhd])$/;
const UNIX_TIMESTAMP = /^\d+$/;

const UNIT_SECONDS: Record<string, number> = {
  m: 60,
  h: 3600,
  d: 86_400,
};

function invalid(message: string): TaskValidationError {
  return new TaskValidationError("InvalidTimeSpec", message);
}

export function isRelativeSpec(spec: string): boolean {
  return spec.startsWith("+");
}

/**
 * Normalize a trigger specification against `nowMs`.
 * Re-normalizing `String(result)` returns `result` for as long as it is
 * still in the future.
 */
export function normalizeTriggerAt(spec: string, nowMs: number): number {
  // Neither a current Unix timestamp nor "+<int><unit>" fits in fewer than 3 chars
  if (spec.length < 3) {
    throw invalid("invalid time specification");
  }

  const now = unixMinute(nowMs);

  if (isRelativeSpec(spec)) {
    const match = RELATIVE_SPEC.exec(spec);
    const unit = match?.[2];
    if (!match || !unit) {
      throw invalid(`relative time specification does not match ${RELATIVE_SPEC.source}`);
    }
    const amount = Number(match[1]);
    const triggerAt = now + amount * (UNIT_SECONDS[unit] ?? 60);
    if (!Number.isSafeInteger(triggerAt)) {
      throw invalid("relative time specification is out of range");
    }
    return triggerAt;
  }

  if (!UNIX_TIMESTAMP.test(spec)) {
    throw invalid("invalid Unix timestamp");
  }
  const triggerAt = Number(spec);
  if (!Number.isSafeInteger(triggerAt)) {
    throw invalid("invalid Unix timestamp");
  }
  if (triggerAt % 60 !== 0) {
    throw invalid("timestamp must be on 1-minute resolution");
  }
  if (triggerAt <= now) {
    throw invalid("timestamp must be in the future");
  }
  return triggerAt;
}
