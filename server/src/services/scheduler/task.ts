/**
 * Callback Task Domain Rules
 *
 * Validation, defaults, identity generation and the storage/API encodings
 * of a callback task. No I/O.
 */

import { customAlphabet } from "nanoid";
import { TaskDecodeError, TaskValidationError } from "./errors.js";
import { formatTaskId, isValidTag } from "./task-id.js";
import { normalizeTriggerAt } from "./time-parser.js";
import {
  CALLBACK_METHODS,
  TASK_STATES,
  type CallbackMethod,
  type CallbackTask,
  type CreateTaskRequest,
  type TaskState,
  type TaskView,
} from "./types.js";

// ============================================
// DEFAULTS
// ============================================

export const DEFAULT_CALLBACK_METHOD: CallbackMethod = "GET";
export const DEFAULT_RETRY = 1;
export const DEFAULT_EXPECTED_HTTP_STATUS = 200;
/** Minutes */
export const DEFAULT_MAX_DELAY = 10;
/** Bytes of the callback response kept on the task */
export const MAX_RESPONSE_BYTES = 256;

/** Alphanumeric only: the suffix must never contain an identity delimiter. */
export const generateUniqueId = customAlphabet(
  "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz",
  22,
);

// ============================================
// REQUEST PARSING
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function malformed(field: string, expected: string): TaskValidationError {
  return new TaskValidationError("MalformedRequest", `${field} must be ${expected}`);
}

function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw malformed(field, "a string");
  return value;
}

function optionalInteger(body: Record<string, unknown>, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) throw malformed(field, "an integer");
  return value;
}

/**
 * Check the JSON types of a create request body. `trigger_at` may be sent
 * as a number or a string.
 */
export function parseCreateRequest(body: unknown): CreateTaskRequest {
  if (!isRecord(body)) {
    throw new TaskValidationError("MalformedRequest", "request body must be a JSON object");
  }

  const rawTrigger = body.trigger_at;
  let triggerAt: string | undefined;
  if (typeof rawTrigger === "number" && Number.isInteger(rawTrigger)) {
    triggerAt = String(rawTrigger);
  } else {
    triggerAt = optionalString(body, "trigger_at");
  }

  return {
    trigger_at: triggerAt,
    tag: optionalString(body, "tag"),
    payload: optionalString(body, "payload"),
    callback: optionalString(body, "callback"),
    callback_method: optionalString(body, "callback_method"),
    retry: optionalInteger(body, "retry"),
    expected_http_status: optionalInteger(body, "expected_http_status"),
    max_delay: optionalInteger(body, "max_delay"),
  };
}

// ============================================
// VALIDATION
// ============================================

const METHOD_SET: ReadonlySet<string> = new Set<string>(CALLBACK_METHODS);
const STATE_SET: ReadonlySet<string> = new Set<string>(TASK_STATES);

export function isCallbackMethod(method: string): method is CallbackMethod {
  return METHOD_SET.has(method);
}

export function isTaskState(state: string): state is TaskState {
  return STATE_SET.has(state);
}

export function isValidCallbackUrl(endpoint: string): boolean {
  try {
    const url = new URL(endpoint);
    return (url.protocol === "http:" || url.protocol === "https:") && url.hostname !== "";
  } catch {
    return false;
  }
}

/**
 * Reject requests that cannot become a task. Does not look at the trigger
 * time beyond its presence; see normalizeTriggerAt().
 */
export function validateTaskRequest(request: CreateTaskRequest): void {
  if (!request.tag || !request.trigger_at || !request.callback) {
    throw new TaskValidationError("IncompleteTask", "tag, trigger_at and callback are required");
  }
  if (request.callback_method && !isCallbackMethod(request.callback_method)) {
    throw new TaskValidationError("UnsupportedMethod", `unsupported HTTP method: ${request.callback_method}`);
  }
  if (!isValidTag(request.tag)) {
    throw new TaskValidationError("InvalidTag", "invalid tag: must match [A-Za-z0-9]*");
  }
  if (!isValidCallbackUrl(request.callback)) {
    throw new TaskValidationError("InvalidCallbackURL", `invalid callback URL: ${request.callback}`);
  }
  if (request.retry !== undefined && request.retry < 0) {
    throw new TaskValidationError("NegativeField", "retry must be a non-negative integer");
  }
  if (request.max_delay !== undefined && request.max_delay < 0) {
    throw new TaskValidationError("NegativeField", "max_delay must be a non-negative integer");
  }
}

// ============================================
// CONSTRUCTION
// ============================================

type TaskSettings = Pick<
  CallbackTask,
  "callbackMethod" | "payload" | "retry" | "expectedHttpStatus" | "maxDelay" | "taskState"
>;

/**
 * Fill unset optional fields. Zero counts as unset for the numeric fields,
 * matching clients that always send them.
 */
export function applyDefaults(request: CreateTaskRequest): TaskSettings {
  const method = request.callback_method;
  return {
    callbackMethod: method && isCallbackMethod(method) ? method : DEFAULT_CALLBACK_METHOD,
    payload: request.payload ?? "",
    retry: request.retry || DEFAULT_RETRY,
    expectedHttpStatus: request.expected_http_status || DEFAULT_EXPECTED_HTTP_STATUS,
    maxDelay: request.max_delay || DEFAULT_MAX_DELAY,
    taskState: "pending",
  };
}

/**
 * Validate, normalize and default a create request into a new pending task
 * with a fresh unique suffix.
 */
export function buildTask(
  request: CreateTaskRequest,
  nowMs: number,
  uniqueId: string = generateUniqueId(),
): CallbackTask {
  validateTaskRequest(request);
  const { tag = "", trigger_at: triggerSpec = "", callback = "" } = request;

  return {
    triggerAt: normalizeTriggerAt(triggerSpec, nowMs),
    tag,
    uniqueId,
    callbackEndpoint: callback,
    ...applyDefaults(request),
    responseStatus: null,
    responseBody: null,
    executedAt: null,
  };
}

/** Cut a response body to MAX_RESPONSE_BYTES of UTF-8 without splitting a character. */
export function truncateBody(body: string, maxBytes = MAX_RESPONSE_BYTES): string {
  if (Buffer.byteLength(body) <= maxBytes) return body;

  let bytes = 0;
  let out = "";
  for (const ch of body) {
    const size = Buffer.byteLength(ch);
    if (bytes + size > maxBytes) break;
    bytes += size;
    out += ch;
  }
  return out;
}

// ============================================
// STORAGE ENCODING
// ============================================

/** Column values of the callback_tasks table. */
export interface TaskRow {
  trigger_at: number;
  tag: string;
  unique_id: string;
  callback_endpoint: string;
  callback_method: string;
  payload: string;
  retry: number;
  expected_http_status: number;
  max_delay: number;
  task_state: string;
  response_status: number | null;
  response_body: string | null;
  executed_at: number | null;
}

export function taskToRow(task: CallbackTask): TaskRow {
  return {
    trigger_at: task.triggerAt,
    tag: task.tag,
    unique_id: task.uniqueId,
    callback_endpoint: task.callbackEndpoint,
    callback_method: task.callbackMethod,
    payload: task.payload,
    retry: task.retry,
    expected_http_status: task.expectedHttpStatus,
    max_delay: task.maxDelay,
    task_state: task.taskState,
    response_status: task.responseStatus,
    response_body: task.responseBody,
    executed_at: task.executedAt,
  };
}

function readInteger(row: Record<string, unknown>, column: string): number {
  const value = row[column];
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "bigint") return Number(value);
  throw new TaskDecodeError(`${column} is not an integer`);
}

function readNullableInteger(row: Record<string, unknown>, column: string): number | null {
  return row[column] === null || row[column] === undefined ? null : readInteger(row, column);
}

function readString(row: Record<string, unknown>, column: string): string {
  const value = row[column];
  if (typeof value !== "string") throw new TaskDecodeError(`${column} is not a string`);
  return value;
}

function readNullableString(row: Record<string, unknown>, column: string): string | null {
  return row[column] === null || row[column] === undefined ? null : readString(row, column);
}

/** Decode a stored row. Throws TaskDecodeError when the row is not a task. */
export function taskFromRow(row: unknown): CallbackTask {
  if (!isRecord(row)) throw new TaskDecodeError("row is not an object");

  const method = readString(row, "callback_method");
  if (!isCallbackMethod(method)) throw new TaskDecodeError(`unknown callback_method ${method}`);

  const state = readString(row, "task_state");
  if (!isTaskState(state)) throw new TaskDecodeError(`unknown task_state ${state}`);

  return {
    triggerAt: readInteger(row, "trigger_at"),
    tag: readString(row, "tag"),
    uniqueId: readString(row, "unique_id"),
    callbackEndpoint: readString(row, "callback_endpoint"),
    callbackMethod: method,
    payload: readString(row, "payload"),
    retry: readInteger(row, "retry"),
    expectedHttpStatus: readInteger(row, "expected_http_status"),
    maxDelay: readInteger(row, "max_delay"),
    taskState: state,
    responseStatus: readNullableInteger(row, "response_status"),
    responseBody: readNullableString(row, "response_body"),
    executedAt: readNullableInteger(row, "executed_at"),
  };
}

// ============================================
// API VIEW
// ============================================

export function toTaskView(task: CallbackTask): TaskView {
  return {
    task_id: formatTaskId(task),
    trigger_at: task.triggerAt,
    tag: task.tag,
    unique_id: task.uniqueId,
    callback: task.callbackEndpoint,
    callback_method: task.callbackMethod,
    payload: task.payload,
    retry: task.retry,
    expected_http_status: task.expectedHttpStatus,
    max_delay: task.maxDelay,
    task_state: task.taskState,
    response_status: task.responseStatus,
    response_body: task.responseBody,
    executed_at: task.executedAt,
  };
}
