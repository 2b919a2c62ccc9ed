import { setTimeout as delay } from "node:timers/promises";
import { StepTimeoutError, isRetryableError } from "../clients/errors";

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type AttemptFailure = {
  attempt: number;
  error: unknown;
  retryable: boolean;
  startedAt: Date;
  finishedAt: Date;
};

export type RetryResult<T> =
  | { ok: true; value: T; attempt: number; startedAt: Date; failures: AttemptFailure[] }
  | { ok: false; error: unknown; attempt: number; cancelled: boolean; failures: AttemptFailure[] };

export type RetryOptions = {
  policy: RetryPolicy;
  timeoutMs: number;
  isRetryable?: (error: unknown) => boolean;
  signal?: AbortSignal;
  random?: () => number;
};

/**
 * Exponential backoff with equal jitter: half of the capped delay is fixed,
 * the other half is random so that orchestrations failing together spread out.
 */
export function computeBackoff(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const half = ceiling / 2;
  return Math.round(half + random() * half);
}

function abortion(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

async function attemptWithTimeout<T>(
  operation: (signal: AbortSignal, attempt: number) => Promise<T>,
  attempt: number,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener("abort", forwardAbort, { once: true });
  const timer = setTimeout(() => controller.abort(new StepTimeoutError(timeoutMs)), timeoutMs);
  try {
    return await Promise.race([operation(controller.signal, attempt), abortion(controller.signal)]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", forwardAbort);
  }
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable error, or the
 * attempt budget runs out. Never throws: the terminal outcome is returned as data.
 */
export async function runWithRetry<T>(
  operation: (signal: AbortSignal, attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const isRetryable = options.isRetryable ?? isRetryableError;
  const maxAttempts = Math.max(1, Math.floor(options.policy.maxAttempts));
  const failures: AttemptFailure[] = [];
  let attempt = 0;

  // eslint-disable-next-line no-constant-condition
  while (true) {
    if (options.signal?.aborted) {
      return { ok: false, error: options.signal.reason, attempt, cancelled: true, failures };
    }
    attempt += 1;
    const startedAt = new Date();
    try {
      const value = await attemptWithTimeout(operation, attempt, options.timeoutMs, options.signal);
      return { ok: true, value, attempt, startedAt, failures };
    } catch (error) {
      if (options.signal?.aborted) {
        return { ok: false, error: options.signal.reason, attempt, cancelled: true, failures };
      }
      const retryable = isRetryable(error);
      failures.push({ attempt, error, retryable, startedAt, finishedAt: new Date() });
      if (!retryable || attempt >= maxAttempts) {
        return { ok: false, error, attempt, cancelled: false, failures };
      }
    }

    try {
      await delay(computeBackoff(attempt, options.policy, options.random), undefined, { signal: options.signal });
    } catch (abortError) {
      return { ok: false, error: options.signal?.reason ?? abortError, attempt, cancelled: true, failures };
    }
  }
}
