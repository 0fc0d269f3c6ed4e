import { err, type Result } from "neverthrow";
import type { ProviderError } from "./errors.js";

export type RetryPolicy = {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  /** 0 disables jitter; 0.2 spreads each delay by up to ±20%. */
  readonly jitter: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 200,
  maxDelayMs: 10_000,
  jitter: 0.2,
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const backoffDelay = (
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number => {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  if (policy.jitter <= 0) {
    return exponential;
  }
  const spread = exponential * policy.jitter * (random() * 2 - 1);
  return Math.max(0, Math.round(exponential + spread));
};

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted === true) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export type RetryError = ProviderError | { readonly kind: "cancelled"; readonly message: string };

export type RetryOptions = {
  readonly policy: RetryPolicy;
  readonly sleep?: Sleep;
  readonly signal?: AbortSignal;
  readonly random?: () => number;
  readonly onAttempt?: (attempt: number) => void;
  readonly onRetry?: (attempt: number, delayMs: number, error: ProviderError) => void;
};

export type RetryOutcome<T> = {
  readonly result: Result<T, RetryError>;
  readonly attempts: number;
};

/**
 * Runs `call` until it succeeds, fails with a non-transient error, or runs out of
 * attempts. A cancelled signal stops the loop between attempts, never during one.
 */
export const withRetry = async <T>(
  call: () => Promise<Result<T, ProviderError>>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> => {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, options.policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    options.onAttempt?.(attempt);
    const result = await call();
    if (result.isOk() || result.error.kind !== "transient") {
      return { result, attempts: attempt };
    }

    if (attempt >= maxAttempts) {
      return {
        result: err({
          kind: "fatal",
          message: `${result.error.message} (gave up after ${attempt} attempts)`,
        }),
        attempts: attempt,
      };
    }

    const delayMs = backoffDelay(attempt, options.policy, options.random);
    options.onRetry?.(attempt, delayMs, result.error);
    await wait(delayMs, options.signal);

    if (options.signal?.aborted === true) {
      return {
        result: err({ kind: "cancelled", message: "Cancelled while waiting to retry" }),
        attempts: attempt,
      };
    }
  }
};
