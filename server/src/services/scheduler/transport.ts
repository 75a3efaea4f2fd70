/**
 * Callback Transport
 *
 * One callback request with bounded retries and exponential jittered
 * backoff. Stateless; never throws.
 */

import { createComponentLogger } from "#logging.js";
import type { CallbackMethod } from "./types.js";

const log = createComponentLogger("scheduler.transport");

/** Status reported when no HTTP response was ever received. */
export const TRANSPORT_ERROR_STATUS = 0;

const BACKOFF_BASE_MS = 100;

/** Longest delay a single Node timer honours; longer ones fire after 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

export interface CallbackRequest {
  url: string;
  method: CallbackMethod;
  payload: string;
  headers?: Record<string, string>;
  expectedStatus: number;
  maxAttempts: number;
}

export interface TransportResult {
  status: number;
  body: string;
  attempts: number;
}

export interface TransportOptions {
  /** Per-attempt timeout (ms) */
  timeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
  /** Uniform in [0, 1) */
  random?: () => number;
}

/** Sleep for `ms`, chaining timers for delays past MAX_TIMER_MS. */
export async function sleepMs(ms: number): Promise<void> {
  let remaining = ms;
  while (remaining > 0) {
    const chunk = Math.min(remaining, MAX_TIMER_MS);
    await new Promise<void>((resolve) => setTimeout(resolve, chunk));
    remaining -= chunk;
  }
}

/** Wait before retrying after attempt `attempt` (0-based): uniform in [base/2, base). */
export function backoffDelayMs(attempt: number, random: () => number = Math.random): number {
  const base = BACKOFF_BASE_MS * 2 ** attempt;
  return Math.floor(base / 2 + random() * (base / 2));
}

function buildInit(request: CallbackRequest, signal: AbortSignal): RequestInit {
  const headers = new Headers(request.headers);
  const init: RequestInit = { method: request.method, headers, signal };

  if (request.method === "GET") {
    return init;
  }
  if (request.method === "POST" && !headers.has("content-type")) {
    headers.set("Content-Type", "application/x-www-form-urlencoded");
  }
  init.body = request.payload;
  return init;
}

async function sendOnce(
  request: CallbackRequest,
  timeoutMs: number,
): Promise<{ status: number; body: string }> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(request.url, buildInit(request, controller.signal));
    const body = await response.text();
    return { status: response.status, body };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Send `request` up to `maxAttempts` times.
 *
 * - expected status or any 4xx: returned at once
 * - 5xx or transport failure: backed off, retried
 * - any other status: retried without backoff
 *
 * When attempts run out the last response is returned, or
 * TRANSPORT_ERROR_STATUS with the error message if none ever arrived.
 */
export async function sendWithRetry(
  request: CallbackRequest,
  options: TransportOptions,
): Promise<TransportResult> {
  const sleep = options.sleep ?? sleepMs;
  const random = options.random ?? Math.random;
  const maxAttempts = Math.max(1, request.maxAttempts);

  let lastResponse: { status: number; body: string } | undefined;
  let lastError = "";

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const isLast = attempt === maxAttempts - 1;

    let response: { status: number; body: string };
    try {
      response = await sendOnce(request, options.timeoutMs);
    } catch (error) {
      lastError = error instanceof Error ? error.message : String(error);
      log.debug("Callback attempt failed", { url: request.url, attempt: attempt + 1, error: lastError });
      if (!isLast) await sleep(backoffDelayMs(attempt, random));
      continue;
    }

    const { status } = response;
    if (status === request.expectedStatus || (status >= 400 && status < 500)) {
      return { ...response, attempts: attempt + 1 };
    }

    lastResponse = response;
    log.debug("Unexpected callback status", { url: request.url, attempt: attempt + 1, status });

    if (status >= 500 && status < 600 && !isLast) {
      await sleep(backoffDelayMs(attempt, random));
    }
  }

  if (lastResponse) {
    return { ...lastResponse, attempts: maxAttempts };
  }
  return { status: TRANSPORT_ERROR_STATUS, body: lastError, attempts: maxAttempts };
}
