export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type BackoffOptions = {
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  randomFn?: () => number;
  jitterRatio?: number;
};

export type RetryOptions = BackoffOptions & {
  retries: number;          // max attempts after initial try (e.g. 2 means up to 3 total tries)
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
};

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

const applyJitter = (delayMs: number, opts: BackoffOptions): number => {
  const { randomFn = Math.random, jitterRatio = 0.2 } = opts;
  const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
  const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
  return delayMs + Math.floor(delayMs * normalizedJitterRatio * normalizedRandom);
};

/**
 * Exponential backoff: `min(maxDelayMs, minDelayMs * 2^exponent)` plus jitter.
 * Shared by in-process retries and the backfill retry queue.
 */
export const computeBackoffMs = (exponent: number, opts: BackoffOptions): number => {
  const safeExponent = Math.max(0, Math.floor(exponent));
  const backoff = Math.min(opts.maxDelayMs, opts.minDelayMs * Math.pow(2, safeExponent));
  return applyJitter(backoff, opts);
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, maxDelayMs, shouldRetry, onRetry, onGiveUp } = opts;

  let attempt = 0;
  const maxAttempts = retries + 1;
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (attempt >= retries || !normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const waitMs = customDelayMs != null
        ? applyJitter(Math.min(maxDelayMs, customDelayMs), opts)
        : computeBackoffMs(attempt, opts);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs);
      attempt += 1;
    }
  }
};
