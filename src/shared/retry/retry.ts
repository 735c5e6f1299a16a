export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type BackoffStrategy = "exponential" | "linear";

export type RetryOptions = {
  retries: number;          // max attempts after initial try (e.g. 2 means up to 3 total tries)
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  backoff?: BackoffStrategy;
  randomFn?: () => number;
  jitterRatio?: number;
  sleepFn?: (ms: number) => Promise<void>;
};

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export const computeBackoffMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "backoff">
): number => {
  const raw =
    opts.backoff === "linear"
      ? opts.minDelayMs * (attempt + 1)
      : opts.minDelayMs * Math.pow(2, attempt);
  return Math.min(opts.maxDelayMs, raw);
};

export const retry = async <T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    minDelayMs,
    maxDelayMs,
    shouldRetry,
    onRetry,
    onGiveUp,
    backoff = "exponential",
    randomFn = Math.random,
    jitterRatio = 0.2,
    sleepFn = sleep
  } = opts;

  let attempt = 0;
  const maxAttempts = retries + 1;
  // attempt=0 is first try, then up to retries extra
  while (true) {
    try {
      return await fn(attempt + 1);
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
      const delay = customDelayMs != null
        ? Math.min(maxDelayMs, customDelayMs)
        : computeBackoffMs(attempt, { minDelayMs, maxDelayMs, backoff });
      // small jitter so parallel workers do not retry in lockstep
      const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
      const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
      const jitter = Math.floor(delay * normalizedJitterRatio * normalizedRandom);
      const waitMs = delay + jitter;
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleepFn(waitMs);
      attempt += 1;
    }
  }
};
