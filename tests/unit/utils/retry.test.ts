import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  RetryExecutor,
  abortableSleep,
  isRetryableError,
} from "../../../src/utils/retry.js";
import { AuthError, AUTH_ERROR_CODES } from "../../../src/utils/errors.js";
import { recordingSleeper } from "../../utils/test-helpers.js";

const mockLogger = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../../src/utils/logging.js", () => ({
  getLogger: () => mockLogger,
}));

const policy = {
  maxAttempts: 4,
  initialDelayMs: 100,
  maxDelayMs: 1000,
  multiplier: 2,
  jitter: false,
};

function transient(message = "server error") {
  return new AuthError(AUTH_ERROR_CODES.transient_failure, message, {
    status: 500,
  });
}

describe("RetryExecutor", () => {
  beforeEach(() => {
    mockLogger.warn.mockClear();
  });

  it("should return the first result without waiting", async () => {
    const { sleep, delays } = recordingSleeper();
    const executor = new RetryExecutor(policy, sleep);
    const operation = vi.fn(async () => "ok");

    await expect(executor.execute(operation)).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(operation).toHaveBeenCalledWith(1);
    expect(delays).toEqual([]);
  });

  it("should retry transient failures with increasing delays", async () => {
    const { sleep, delays } = recordingSleeper();
    const executor = new RetryExecutor(policy, sleep);
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockResolvedValueOnce("ok");

    await expect(executor.execute(operation)).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(delays).toEqual([100, 200]);
    expect(mockLogger.warn).toHaveBeenCalledTimes(2);
  });

  it("should cap the delay at maxDelayMs", () => {
    const executor = new RetryExecutor({ ...policy, maxDelayMs: 300 });

    expect(executor.calculateDelay(1)).toBe(100);
    expect(executor.calculateDelay(2)).toBe(200);
    expect(executor.calculateDelay(3)).toBe(300);
    expect(executor.calculateDelay(6)).toBe(300);
  });

  it("should keep jittered delays within a quarter of the base delay", () => {
    const executor = new RetryExecutor({ ...policy, jitter: true });

    for (let i = 0; i < 20; i++) {
      const delay = executor.calculateDelay(2);
      expect(delay).toBeGreaterThanOrEqual(150);
      expect(delay).toBeLessThanOrEqual(250);
    }
  });

  it("should rethrow non-retryable errors immediately", async () => {
    const { sleep, delays } = recordingSleeper();
    const executor = new RetryExecutor(policy, sleep);
    const rejection = new AuthError(
      AUTH_ERROR_CODES.authentication_rejected,
      "bad credentials",
      { status: 401 },
    );
    const operation = vi.fn(async () => {
      throw rejection;
    });

    await expect(executor.execute(operation)).rejects.toBe(rejection);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it("should rethrow the last error once attempts are exhausted", async () => {
    const { sleep, delays } = recordingSleeper();
    const executor = new RetryExecutor({ ...policy, maxAttempts: 3 }, sleep);
    const last = transient("third failure");
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transient("first failure"))
      .mockRejectedValueOnce(transient("second failure"))
      .mockRejectedValueOnce(last);

    await expect(executor.execute(operation)).rejects.toBe(last);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([100, 200]);
  });

  it("should fail without invoking the operation when no attempts are allowed", async () => {
    const executor = new RetryExecutor({ ...policy, maxAttempts: 0 });
    const operation = vi.fn(async () => "ok");

    await expect(
      executor.execute(operation, { operationName: "token request" }),
    ).rejects.toMatchObject({
      code: AUTH_ERROR_CODES.retries_exhausted,
      message: "Retry policy allows no attempts for token request",
    });
    expect(operation).not.toHaveBeenCalled();
  });

  it("should not start when the signal is already aborted", async () => {
    const executor = new RetryExecutor(policy);
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => "ok");

    await expect(
      executor.execute(operation, { signal: controller.signal }),
    ).rejects.toMatchObject({ code: AUTH_ERROR_CODES.request_cancelled });
    expect(operation).not.toHaveBeenCalled();
  });

  it("should stop after a backoff interrupted by cancellation", async () => {
    const controller = new AbortController();
    const executor = new RetryExecutor(policy, async () => {
      controller.abort();
    });
    const failure = transient();
    const operation = vi.fn(async () => {
      throw failure;
    });

    const error = await executor
      .execute(operation, { signal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ code: AUTH_ERROR_CODES.request_cancelled });
    expect(error instanceof Error && error.cause).toBe(failure);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("should honour a custom retry predicate", async () => {
    const { sleep } = recordingSleeper();
    const executor = new RetryExecutor(policy, sleep);
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("ok");

    await expect(
      executor.execute(operation, { shouldRetry: () => true }),
    ).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(2);
  });
});

describe("isRetryableError", () => {
  it("should follow the retryable flag of auth errors", () => {
    expect(isRetryableError(transient())).toBe(true);
    expect(
      isRetryableError(
        new AuthError(AUTH_ERROR_CODES.protocol_error, "missing access_token"),
      ),
    ).toBe(false);
  });

  it("should treat connection and timeout errors as retryable", () => {
    const reset = Object.assign(new Error("socket closed"), {
      code: "ECONNRESET",
    });
    const headersTimeout = Object.assign(new Error("Headers Timeout Error"), {
      code: "UND_ERR_HEADERS_TIMEOUT",
    });
    const timeout = new Error("The operation timed out");
    timeout.name = "TimeoutError";

    expect(isRetryableError(reset)).toBe(true);
    expect(isRetryableError(headersTimeout)).toBe(true);
    expect(isRetryableError(timeout)).toBe(true);
  });

  it("should not retry unknown errors", () => {
    expect(isRetryableError(new Error("certificate has expired"))).toBe(false);
    expect(isRetryableError("boom")).toBe(false);
    expect(isRetryableError(undefined)).toBe(false);
  });
});

describe("abortableSleep", () => {
  it("should resolve early when the signal aborts", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = abortableSleep(10_000, controller.signal);
    controller.abort();

    await pending;
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it("should resolve immediately for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(abortableSleep(10_000, controller.signal)).resolves.toBeUndefined();
  });
});
