import { AuthError, AUTH_ERROR_CODES, describeError } from "./errors.js";
import { getLogger } from "./logging.js";

const logger = getLogger("retry-executor");

const RETRYABLE_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EPIPE",
  "EHOSTUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
]);

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 8000,
  multiplier: 2,
  jitter: true,
};

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ExecuteOptions {
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  operationName?: string;
}

export class RetryExecutor {
  private readonly policy: RetryPolicy;

  constructor(
    policy: Partial<RetryPolicy> = {},
    private readonly sleep: Sleeper = abortableSleep,
  ) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...policy };
  }

  /**
   * Runs `operation` until it succeeds, fails with a non-retryable error or
   * the attempt budget is spent. The operation receives the 1-based attempt
   * number.
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: ExecuteOptions = {},
  ): Promise<T> {
    const { signal, operationName = "operation" } = options;
    const shouldRetry = options.shouldRetry ?? isRetryableError;
    const { maxAttempts } = this.policy;

    if (maxAttempts <= 0) {
      throw new AuthError(
        AUTH_ERROR_CODES.retries_exhausted,
        `Retry policy allows no attempts for ${operationName}`,
      );
    }

    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      throwIfCancelled(signal, operationName, lastError);

      try {
        return await operation(attempt);
      } catch (error: unknown) {
        lastError = error;
        throwIfCancelled(signal, operationName, lastError);

        if (!shouldRetry(error) || attempt >= maxAttempts) {
          throw error;
        }

        const delayMs = this.calculateDelay(attempt);
        logger.warn(`Retrying ${operationName} after failure`, {
          attempt,
          maxAttempts,
          delayMs,
          error: describeError(error),
        });
        await this.sleep(delayMs, signal);
      }
    }

    throw lastError;
  }

  calculateDelay(failedAttempt: number): number {
    const baseDelay =
      this.policy.initialDelayMs *
      Math.pow(this.policy.multiplier, failedAttempt - 1);
    const cappedDelay = Math.min(baseDelay, this.policy.maxDelayMs);

    if (this.policy.jitter) {
      const jitter = cappedDelay * 0.5 * (Math.random() - 0.5);
      return Math.round(cappedDelay + jitter);
    }

    return Math.round(cappedDelay);
  }
}

function throwIfCancelled(
  signal: AbortSignal | undefined,
  operationName: string,
  lastError: unknown,
): void {
  if (signal?.aborted) {
    throw new AuthError(
      AUTH_ERROR_CODES.request_cancelled,
      `${operationName} was cancelled`,
      { cause: lastError ?? signal.reason },
    );
  }
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof AuthError) {
    return error.retryable;
  }

  if (error instanceof Error && error.name === "TimeoutError") {
    return true;
  }

  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return RETRYABLE_ERROR_CODES.has(error.code);
  }

  return false;
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
