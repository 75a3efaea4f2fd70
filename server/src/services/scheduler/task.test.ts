/**
 * Callback Task Tests
 *
 * Covers:
 * - parseCreateRequest: JSON type checks
 * - buildTask: validation order, defaults, zero-as-unset
 * - truncateBody: UTF-8 byte cap
 * - taskToRow / taskFromRow / toTaskView
 */

import { describe, it, expect } from "vitest";
import {
  buildTask,
  generateUniqueId,
  parseCreateRequest,
  taskFromRow,
  taskToRow,
  toTaskView,
  truncateBody,
} from "./task.js";
import { TaskDecodeError, TaskValidationError } from "./errors.js";
import type { CreateTaskRequest } from "./types.js";

// 2026-01-01T00:00:30Z
const NOW_MS = 1_767_225_630_000;
const MINUTE = 1_767_225_600;

const VALID: CreateTaskRequest = {
  tag: "backup",
  trigger_at: "+1m",
  callback: "http://hooks.test/run",
};

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof TaskValidationError) return error.code;
    throw error;
  }
  return undefined;
}

// ============================================
// parseCreateRequest
// ============================================

describe("parseCreateRequest", () => {
  it("keeps known fields and drops nulls", () => {
    expect(
      parseCreateRequest({
        tag: "backup",
        trigger_at: "+1m",
        callback: "http://hooks.test/run",
        payload: null,
        retry: 3,
        extra: true,
      }),
    ).toEqual({
      trigger_at: "+1m",
      tag: "backup",
      payload: undefined,
      callback: "http://hooks.test/run",
      callback_method: undefined,
      retry: 3,
      expected_http_status: undefined,
      max_delay: undefined,
    });
  });

  it("accepts a numeric trigger_at", () => {
    expect(parseCreateRequest({ trigger_at: 1_767_225_660 }).trigger_at).toBe("1767225660");
  });

  it("rejects wrong JSON types", () => {
    expect(codeOf(() => parseCreateRequest([]))).toBe("MalformedRequest");
    expect(codeOf(() => parseCreateRequest("task"))).toBe("MalformedRequest");
    expect(codeOf(() => parseCreateRequest({ retry: "3" }))).toBe("MalformedRequest");
    expect(codeOf(() => parseCreateRequest({ max_delay: 1.5 }))).toBe("MalformedRequest");
    expect(codeOf(() => parseCreateRequest({ tag: 7 }))).toBe("MalformedRequest");
  });
});

// ============================================
// buildTask
// ============================================

describe("buildTask", () => {
  it("fills defaults on a minimal request", () => {
    expect(buildTask(VALID, NOW_MS, "u1")).toEqual({
      triggerAt: MINUTE + 60,
      tag: "backup",
      uniqueId: "u1",
      callbackEndpoint: "http://hooks.test/run",
      callbackMethod: "GET",
      payload: "",
      retry: 1,
      expectedHttpStatus: 200,
      maxDelay: 10,
      taskState: "pending",
      responseStatus: null,
      responseBody: null,
      executedAt: null,
    });
  });

  it("treats zero as unset", () => {
    const task = buildTask({ ...VALID, retry: 0, expected_http_status: 0, max_delay: 0 }, NOW_MS, "u1");
    expect(task.retry).toBe(1);
    expect(task.expectedHttpStatus).toBe(200);
    expect(task.maxDelay).toBe(10);
  });

  it("keeps explicit settings", () => {
    const task = buildTask(
      { ...VALID, callback_method: "POST", payload: "a=1", retry: 4, expected_http_status: 204, max_delay: 2 },
      NOW_MS,
      "u1",
    );
    expect(task.callbackMethod).toBe("POST");
    expect(task.payload).toBe("a=1");
    expect(task.retry).toBe(4);
    expect(task.expectedHttpStatus).toBe(204);
    expect(task.maxDelay).toBe(2);
  });

  it("generates an alphanumeric suffix when none is given", () => {
    const a = buildTask(VALID, NOW_MS);
    const b = buildTask(VALID, NOW_MS);
    expect(a.uniqueId).toMatch(/^[A-Za-z0-9]{22}$/);
    expect(a.uniqueId).not.toBe(b.uniqueId);
    expect(generateUniqueId()).toMatch(/^[A-Za-z0-9]{22}$/);
  });

  it.each<[string, CreateTaskRequest, string]>([
    ["missing callback", { tag: "backup", trigger_at: "+1m" }, "IncompleteTask"],
    ["empty tag", { ...VALID, tag: "" }, "IncompleteTask"],
    ["missing trigger", { tag: "backup", callback: "http://hooks.test" }, "IncompleteTask"],
    ["PATCH", { ...VALID, callback_method: "PATCH" }, "UnsupportedMethod"],
    ["lowercase method", { ...VALID, callback_method: "post" }, "UnsupportedMethod"],
    ["tag with a dash", { ...VALID, tag: "night-ly" }, "InvalidTag"],
    ["relative URL", { ...VALID, callback: "/run" }, "InvalidCallbackURL"],
    ["ftp URL", { ...VALID, callback: "ftp://hooks.test/run" }, "InvalidCallbackURL"],
    ["negative retry", { ...VALID, retry: -1 }, "NegativeField"],
    ["negative max_delay", { ...VALID, max_delay: -5 }, "NegativeField"],
    ["bad relative unit", { ...VALID, trigger_at: "+5s" }, "InvalidTimeSpec"],
    ["past timestamp", { ...VALID, trigger_at: String(MINUTE - 60) }, "InvalidTimeSpec"],
  ])("rejects %s", (_name, request, code) => {
    expect(codeOf(() => buildTask(request, NOW_MS, "u1"))).toBe(code);
  });

  it("reports a missing field before an unsupported method", () => {
    expect(codeOf(() => buildTask({ trigger_at: "+1m", callback_method: "PATCH" }, NOW_MS))).toBe(
      "IncompleteTask",
    );
  });
});

// ============================================
// truncateBody
// ============================================

describe("truncateBody", () => {
  it("leaves short bodies alone", () => {
    expect(truncateBody("ok")).toBe("ok");
  });

  it("caps ASCII at 256 bytes", () => {
    expect(truncateBody("x".repeat(1000))).toBe("x".repeat(256));
  });

  it("never splits a multi-byte character", () => {
    // 2 bytes each: exactly 128 fit
    expect(truncateBody("é".repeat(200))).toBe("é".repeat(128));
    // 3 bytes each: 85 fit in 255 bytes, the 86th would overflow
    expect(truncateBody("€".repeat(100))).toBe("€".repeat(85));
  });
});

// ============================================
// ENCODINGS
// ============================================

describe("row and view encodings", () => {
  const task = {
    ...buildTask({ ...VALID, callback_method: "PUT", payload: "{}" }, NOW_MS, "u1"),
    taskState: "failed" as const,
    responseStatus: 503,
    responseBody: "unavailable",
    executedAt: MINUTE + 61,
  };

  it("round-trips through a storage row", () => {
    expect(taskFromRow(taskToRow(task))).toEqual(task);
  });

  it("accepts bigint integers from the driver", () => {
    expect(taskFromRow({ ...taskToRow(task), trigger_at: BigInt(MINUTE + 60) }).triggerAt).toBe(MINUTE + 60);
  });

  it("rejects rows that are not tasks", () => {
    expect(() => taskFromRow(null)).toThrow(TaskDecodeError);
    expect(() => taskFromRow({ ...taskToRow(task), task_state: "done" })).toThrow(
      "malformed task row: unknown task_state done",
    );
    expect(() => taskFromRow({ ...taskToRow(task), retry: "1" })).toThrow(
      "malformed task row: retry is not an integer",
    );
  });

  it("renders the API view with the wire id", () => {
    expect(toTaskView(task)).toEqual({
      task_id: "backup+u1@1767225660",
      trigger_at: MINUTE + 60,
      tag: "backup",
      unique_id: "u1",
      callback: "http://hooks.test/run",
      callback_method: "PUT",
      payload: "{}",
      retry: 1,
      expected_http_status: 200,
      max_delay: 10,
      task_state: "failed",
      response_status: 503,
      response_body: "unavailable",
      executed_at: MINUTE + 61,
    });
  });
});
