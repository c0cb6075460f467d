import { describe, it, expect, afterEach, vi } from "vitest";
import {
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  classifyError,
  deliverWithRetry,
  errorForStatus,
  resolveRetryPolicy,
} from "../lib/notification/retry.js";
import { PermanentDeliveryError, TransientDeliveryError } from "../lib/errors.js";

const fastPolicy = resolveRetryPolicy({ initialBackoffMs: 0 });

describe("resolveRetryPolicy", () => {
  it("should default to 3 attempts with a 5s timeout", () => {
    expect(resolveRetryPolicy()).toEqual(DEFAULT_RETRY_POLICY);
  });

  it("should clamp the timeout and attempt count", () => {
    const policy = resolveRetryPolicy({ timeoutMs: 60_000, maxAttempts: 10 });
    expect(policy.timeoutMs).toBe(10_000);
    expect(policy.maxAttempts).toBe(5);
    expect(resolveRetryPolicy({ maxAttempts: 0 }).maxAttempts).toBe(1);
  });
});

describe("classifyError", () => {
  it("should treat network failures and aborts as transient", () => {
    expect(classifyError(new TypeError("fetch failed"))).toBeInstanceOf(TransientDeliveryError);
    expect(classifyError(Object.assign(new Error("aborted"), { name: "AbortError" }))).toBeInstanceOf(
      TransientDeliveryError
    );
  });

  it("should not retry unknown errors", () => {
    const classified = classifyError(new Error("boom"));
    expect(classified).toBeInstanceOf(PermanentDeliveryError);
    expect(classified.message).toBe("boom");
  });

  it("should pass delivery errors through", () => {
    const error = new PermanentDeliveryError("HTTP 403");
    expect(classifyError(error)).toBe(error);
  });
});

describe("errorForStatus", () => {
  it("should make 429 and 5xx transient", () => {
    const limited = errorForStatus(429, "rate_limited", "2");
    expect(limited).toBeInstanceOf(TransientDeliveryError);
    expect(limited.message).toBe("HTTP 429: rate_limited");
    expect(limited instanceof TransientDeliveryError && limited.retryAfterMs).toBe(2000);
    expect(errorForStatus(503, "")).toBeInstanceOf(TransientDeliveryError);
  });

  it("should make other 4xx permanent", () => {
    const error = errorForStatus(404, "no_service");
    expect(error).toBeInstanceOf(PermanentDeliveryError);
    expect(error.message).toBe("HTTP 404: no_service");
  });
});

describe("backoffDelay", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should grow exponentially up to the cap", () => {
    vi.spyOn(Math, "random").mockReturnValue(0);
    const policy = resolveRetryPolicy();

    expect(backoffDelay(policy, 1)).toBe(250);
    expect(backoffDelay(policy, 2)).toBe(500);
    expect(backoffDelay(policy, 5)).toBe(2000);
  });

  it("should add up to 20% jitter", () => {
    vi.spyOn(Math, "random").mockReturnValue(0.5);
    expect(backoffDelay(resolveRetryPolicy(), 1)).toBe(275);
  });

  it("should honour Retry-After within the cap", () => {
    const policy = resolveRetryPolicy();
    expect(backoffDelay(policy, 1, 1500)).toBe(1500);
    expect(backoffDelay(policy, 1, 30_000)).toBe(2000);
  });
});

describe("deliverWithRetry", () => {
  it("should report success on the first attempt", async () => {
    const attempt = vi.fn().mockResolvedValue(undefined);

    const result = await deliverWithRetry("slack", attempt, fastPolicy);

    expect(result).toEqual({ destinationName: "slack", success: true, attempts: 1 });
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it("should retry transient failures", async () => {
    const attempt = vi
      .fn()
      .mockRejectedValueOnce(new TransientDeliveryError("HTTP 503"))
      .mockResolvedValueOnce(undefined);

    const result = await deliverWithRetry("slack", attempt, fastPolicy);

    expect(result).toEqual({ destinationName: "slack", success: true, attempts: 2 });
  });

  it("should stop at the first permanent failure", async () => {
    const attempt = vi.fn().mockRejectedValue(new PermanentDeliveryError("HTTP 403: invalid_token"));

    const result = await deliverWithRetry("slack", attempt, fastPolicy);

    expect(result).toEqual({
      destinationName: "slack",
      success: false,
      error: "HTTP 403: invalid_token",
      attempts: 1,
    });
  });

  it("should give up after the attempt limit", async () => {
    const attempt = vi.fn().mockRejectedValue(new TypeError("fetch failed"));

    const result = await deliverWithRetry("email", attempt, fastPolicy);

    expect(result).toEqual({
      destinationName: "email",
      success: false,
      error: "Network error: fetch failed",
      attempts: 3,
    });
    expect(attempt).toHaveBeenCalledTimes(3);
  });

  it("should time out an attempt that never settles and abort its signal", async () => {
    const seen: { signal?: AbortSignal } = {};
    const attempt = (signal: AbortSignal) => {
      seen.signal = signal;
      return new Promise<void>(() => {});
    };

    const result = await deliverWithRetry(
      "slack",
      attempt,
      resolveRetryPolicy({ maxAttempts: 1, timeoutMs: 100 })
    );

    expect(result).toEqual({
      destinationName: "slack",
      success: false,
      error: "Timed out after 100ms",
      attempts: 1,
    });
    expect(seen.signal?.aborted).toBe(true);
  });
});
