export type RetryOptions = {
  attempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffFactor?: number;
  jitterRatio?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
};

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const withJitter = (delay: number, jitterRatio: number) => {
  if (jitterRatio <= 0) {
    return delay;
  }
  const jitter = delay * jitterRatio;
  const min = delay - jitter;
  const max = delay + jitter;
  return Math.random() * (max - min) + min;
};

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    attempts = 3,
    initialDelayMs = 2_000,
    maxDelayMs = 10_000,
    backoffFactor = 2,
    jitterRatio = 0,
    shouldRetry = () => true,
    onRetry,
  } = options;

  let delay = initialDelayMs;
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error)) {
        throw error;
      }

      const sleepMs = Math.min(withJitter(delay, jitterRatio), maxDelayMs);
      onRetry?.({ attempt, delayMs: sleepMs, error });
      await sleep(sleepMs);
      delay *= backoffFactor;
    }
  }
}
