/**
 * Bounded delivery with retries
 *
 * Every destination sends through `deliverWithRetry`: each attempt gets a
 * fixed timeout, transient failures back off exponentially, and the outcome
 * is always a DestinationResult.
 */

import {
  ConfigurationError,
  PermanentDeliveryError,
  TransientDeliveryError,
} from "../errors.js";
import type { DestinationResult } from "./types.js";

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Per-attempt timeout */
  timeoutMs: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxAttempts: 3,
  timeoutMs: 5_000,
  initialBackoffMs: 250,
  maxBackoffMs: 2_000,
};

/** Ceiling for a single attempt, whatever the caller asks for */
export const MAX_TIMEOUT_MS = 10_000;
export const MAX_ATTEMPTS = 5;

export type DeliveryError = TransientDeliveryError | PermanentDeliveryError | ConfigurationError;

export function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const merged = { ...DEFAULT_RETRY_POLICY, ...overrides };
  const initialBackoffMs = Math.max(0, merged.initialBackoffMs);
  return {
    maxAttempts: Math.min(MAX_ATTEMPTS, Math.max(1, Math.floor(merged.maxAttempts))),
    timeoutMs: Math.min(MAX_TIMEOUT_MS, Math.max(100, merged.timeoutMs)),
    initialBackoffMs,
    maxBackoffMs: Math.max(initialBackoffMs, merged.maxBackoffMs),
  };
}

function isNamed(error: unknown, ...names: string[]): boolean {
  return error instanceof Error && names.includes(error.name);
}

/**
 * Map anything thrown by an attempt onto the delivery taxonomy. Timeouts and
 * fetch-level network failures (TypeError) are transient; unknown errors are
 * not retried.
 */
export function classifyError(error: unknown): DeliveryError {
  if (
    error instanceof TransientDeliveryError ||
    error instanceof PermanentDeliveryError ||
    error instanceof ConfigurationError
  ) {
    return error;
  }
  if (isNamed(error, "AbortError", "TimeoutError")) {
    return new TransientDeliveryError("Request timed out", error);
  }
  if (error instanceof TypeError) {
    return new TransientDeliveryError(`Network error: ${error.message}`, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PermanentDeliveryError(message, error);
}

/**
 * Classify an HTTP status: 429 and 5xx are transient, other non-2xx are not
 */
export function errorForStatus(
  status: number,
  body: string,
  retryAfterHeader?: string | null
): TransientDeliveryError | PermanentDeliveryError {
  const detail = `HTTP ${status}${body ? `: ${body.slice(0, 200)}` : ""}`;
  if (status === 429 || status >= 500) {
    return new TransientDeliveryError(detail, undefined, parseRetryAfter(retryAfterHeader));
  }
  return new PermanentDeliveryError(detail);
}

export function parseRetryAfter(header?: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(policy: RetryPolicy, attempt: number, retryAfterMs?: number): number {
  if (retryAfterMs !== undefined) {
    return Math.min(policy.maxBackoffMs, retryAfterMs);
  }
  if (policy.initialBackoffMs === 0) return 0;
  const exponentialMs = policy.initialBackoffMs * 2 ** Math.max(0, attempt - 1);
  const cappedMs = Math.min(policy.maxBackoffMs, exponentialMs);
  const jitterMs = Math.floor(Math.random() * Math.max(1, Math.floor(cappedMs * 0.2)));
  return cappedMs + jitterMs;
}

/**
 * Run one attempt with a hard deadline. The signal is aborted when the
 * deadline passes; the race also covers attempts that ignore it.
 */
async function withTimeout(
  attempt: (signal: AbortSignal) => Promise<void>,
  timeoutMs: number
): Promise<void> {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new TransientDeliveryError(`Timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    await Promise.race([attempt(controller.signal), deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Deliver with retries. Never rejects.
 */
export async function deliverWithRetry(
  destinationName: string,
  attempt: (signal: AbortSignal) => Promise<void>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): Promise<DestinationResult> {
  let lastError: DeliveryError | undefined;

  for (let n = 1; n <= policy.maxAttempts; n += 1) {
    try {
      await withTimeout(attempt, policy.timeoutMs);
      return { destinationName, success: true, attempts: n };
    } catch (error) {
      lastError = classifyError(error);
      if (!(lastError instanceof TransientDeliveryError) || n >= policy.maxAttempts) {
        return { destinationName, success: false, error: lastError.message, attempts: n };
      }
      await sleep(backoffDelay(policy, n, lastError.retryAfterMs));
    }
  }

  return {
    destinationName,
    success: false,
    error: lastError?.message ?? "Delivery failed",
    attempts: policy.maxAttempts,
  };
}
