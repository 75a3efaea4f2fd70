/**
 * Scheduler Errors
 *
 * Validation errors go back to the caller verbatim. Storage errors are
 * logged where they happen and surface with an opaque message.
 */

export type ValidationCode =
  | "InvalidTimeSpec"
  | "IncompleteTask"
  | "UnsupportedMethod"
  | "InvalidTag"
  | "InvalidCallbackURL"
  | "NegativeField"
  | "MalformedRequest"
  | "InvalidTaskId";

export class TaskValidationError extends Error {
  public code: ValidationCode;

  constructor(code: ValidationCode, message: string) {
    super(message);
    this.name = "TaskValidationError";
    this.code = code;
  }
}

export class TaskNotFoundError extends Error {
  constructor(taskId: string) {
    super(`task not found: ${taskId}`);
    this.name = "TaskNotFoundError";
  }
}

export class LookupFailedError extends Error {
  constructor() {
    super("failed to retrieve status");
    this.name = "LookupFailedError";
  }
}

export class StorageWriteError extends Error {
  constructor() {
    super("failed to store task");
    this.name = "StorageWriteError";
  }
}

/** A stored row that does not describe a valid task. */
export class TaskDecodeError extends Error {
  constructor(reason: string) {
    super(`malformed task row: ${reason}`);
    this.name = "TaskDecodeError";
  }
}
