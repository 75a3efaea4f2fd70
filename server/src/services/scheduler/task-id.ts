/**
 * Task Identifiers
 *
 * Wire form of a task identity: `<tag>[+<uniqueId>]@<triggerAt>`, or just
 * `<tag>` to address every occurrence of a tag. Inside the service keys stay
 * structured (`TaskKey`); the delimiters only exist here.
 */

import { TaskValidationError } from "./errors.js";
import type { TaskKey, TaskRef } from "./types.js";

export const TAG_DELIMITER = "+";
export const TIME_DELIMITER = "@";

const ALPHANUMERIC = /^[A-Za-z0-9]*$/;
const UNIX_TIMESTAMP = /^\d+$/;

export function isValidTag(tag: string): boolean {
  return ALPHANUMERIC.test(tag);
}

export function formatTaskId(key: TaskKey): string {
  return `${key.tag}${TAG_DELIMITER}${key.uniqueId}${TIME_DELIMITER}${key.triggerAt}`;
}

/** True when the reference names exactly one stored task. */
export function isFullKey(ref: TaskRef): ref is TaskKey {
  return ref.tag !== undefined && ref.uniqueId !== undefined && ref.triggerAt !== undefined;
}

function invalidId(id: string, reason: string): TaskValidationError {
  return new TaskValidationError("InvalidTaskId", `invalid task id "${id}": ${reason}`);
}

/**
 * Parse a wire identifier. The empty string is a valid reference to all tasks.
 */
export function parseTaskRef(id: string): TaskRef {
  if (id === "") return {};

  const timeParts = id.split(TIME_DELIMITER);
  if (timeParts.length > 2) {
    throw invalidId(id, `more than one "${TIME_DELIMITER}"`);
  }
  const [name = "", time] = timeParts;

  const nameParts = name.split(TAG_DELIMITER);
  if (nameParts.length > 2) {
    throw invalidId(id, `more than one "${TAG_DELIMITER}"`);
  }
  const [tag = "", uniqueId] = nameParts;

  if (tag === "") {
    throw invalidId(id, "missing tag");
  }
  if (!isValidTag(tag)) {
    throw invalidId(id, "tag must be alphanumeric");
  }

  const ref: TaskRef = { tag };

  if (uniqueId !== undefined) {
    if (uniqueId === "" || !isValidTag(uniqueId)) {
      throw invalidId(id, "unique suffix must be a non-empty alphanumeric string");
    }
    if (time === undefined) {
      throw invalidId(id, "unique suffix requires a trigger time");
    }
    ref.uniqueId = uniqueId;
  }

  if (time !== undefined) {
    const triggerAt = Number(time);
    if (!UNIX_TIMESTAMP.test(time) || !Number.isSafeInteger(triggerAt) || triggerAt % 60 !== 0) {
      throw invalidId(id, "trigger time must be a minute-aligned Unix timestamp");
    }
    ref.triggerAt = triggerAt;
  }

  return ref;
}

/** Parse an identifier that must name exactly one task (pagination cursors). */
export function parseTaskKey(id: string): TaskKey {
  const ref = parseTaskRef(id);
  if (!isFullKey(ref)) {
    throw invalidId(id, "expected <tag>+<unique>@<trigger_at>");
  }
  return ref;
}
