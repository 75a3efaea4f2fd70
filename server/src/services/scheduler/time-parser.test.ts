/**
 * Trigger Time Parser Tests
 */

import { describe, it, expect } from "vitest";
import { normalizeTriggerAt } from "./time-parser.js";
import { TaskValidationError } from "./errors.js";

// 2026-01-01T00:00:30Z
const NOW_MS = 1_767_225_630_000;
const MINUTE = 1_767_225_600;

function failure(spec: string): TaskValidationError {
  try {
    normalizeTriggerAt(spec, NOW_MS);
  } catch (error) {
    if (error instanceof TaskValidationError) return error;
    throw error;
  }
  throw new Error(`expected ${spec} to be rejected`);
}

describe("normalizeTriggerAt: relative", () => {
  it("counts minutes from the current minute", () => {
    expect(normalizeTriggerAt("+1m", NOW_MS)).toBe(MINUTE + 60);
    expect(normalizeTriggerAt("+15m", NOW_MS)).toBe(MINUTE + 900);
  });

  it("supports hours and days", () => {
    expect(normalizeTriggerAt("+2h", NOW_MS)).toBe(MINUTE + 7200);
    expect(normalizeTriggerAt("+1d", NOW_MS)).toBe(MINUTE + 86_400);
  });

  it("allows +0m, which is the current minute", () => {
    expect(normalizeTriggerAt("+0m", NOW_MS)).toBe(MINUTE);
  });

  it("rejects other units and fractions", () => {
    expect(failure("+5s").message).toMatch(/relative time specification/);
    expect(failure("+1.5h").message).toMatch(/relative time specification/);
    expect(failure("+h1").code).toBe("InvalidTimeSpec");
  });
});

describe("normalizeTriggerAt: absolute", () => {
  it("accepts a future minute-aligned timestamp", () => {
    expect(normalizeTriggerAt(String(MINUTE + 120), NOW_MS)).toBe(MINUTE + 120);
  });

  it("is idempotent on its own output", () => {
    const first = normalizeTriggerAt("+5m", NOW_MS);
    expect(normalizeTriggerAt(String(first), NOW_MS)).toBe(first);
  });

  it("rejects timestamps that are not on a minute", () => {
    expect(failure(String(MINUTE + 90)).message).toBe("timestamp must be on 1-minute resolution");
  });

  it("rejects the current minute and the past", () => {
    expect(failure(String(MINUTE)).message).toBe("timestamp must be in the future");
    expect(failure(String(MINUTE - 60)).message).toBe("timestamp must be in the future");
  });

  it("rejects non-numeric input", () => {
    expect(failure("tomorrow").message).toBe("invalid Unix timestamp");
    expect(failure("-1767225660").message).toBe("invalid Unix timestamp");
  });

  it("rejects anything shorter than three characters", () => {
    expect(failure("").message).toBe("invalid time specification");
    expect(failure("+m").message).toBe("invalid time specification");
    expect(failure("60").code).toBe("InvalidTimeSpec");
  });
});
