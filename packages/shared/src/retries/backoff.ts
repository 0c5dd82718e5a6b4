import { setTimeout as sleep } from 'node:timers/promises';

export type BackoffOptions = {
  baseMs?: number;
  factor?: number;
  maxMs?: number;
  jitterRatio?: number;
  random?: () => number;
};

export const DEFAULT_BACKOFF: Required<Omit<BackoffOptions, 'random'>> = {
  baseMs: 250,
  factor: 2,
  maxMs: 10_000,
  jitterRatio: 0.2
};

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

export function computeExponentialBackoff(attempt: number, options: BackoffOptions = {}): number {
  const normalizedAttempt = Math.max(1, Math.floor(attempt));

  const {
    baseMs = DEFAULT_BACKOFF.baseMs,
    factor = DEFAULT_BACKOFF.factor,
    maxMs = DEFAULT_BACKOFF.maxMs,
    jitterRatio = DEFAULT_BACKOFF.jitterRatio,
    random = Math.random
  } = options;

  const cappedDelay = clamp(baseMs * Math.pow(factor, normalizedAttempt - 1), baseMs, maxMs);
  if (jitterRatio <= 0) {
    return Math.round(cappedDelay);
  }

  const jitter = (random() * 2 - 1) * cappedDelay * jitterRatio;
  return Math.round(clamp(cappedDelay + jitter, baseMs, maxMs));
}

/** Waits for the backoff delay of the given attempt; rejects with an AbortError once the signal fires. */
export async function waitForRetry(attempt: number, options: BackoffOptions = {}, signal?: AbortSignal): Promise<void> {
  const delayMs = computeExponentialBackoff(attempt, options);
  if (delayMs <= 0) {
    return;
  }
  await sleep(delayMs, undefined, { signal });
}
