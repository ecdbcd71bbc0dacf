export type BackoffOptions = {
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor?: number;
  random?: () => number;
};

export type BackoffDelay = {
  delayMs: number;
  baseDelayMs: number;
  appliedJitterMs: number;
};

export const DEFAULT_BACKOFF: Required<Omit<BackoffOptions, 'random'>> = {
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  jitterFactor: 0.2
};

/**
 * Exponential delay for the given 1-based attempt: base, 2×base, 4×base … capped at
 * `maxDelayMs`, with symmetric jitter that never leaves `[baseDelayMs, maxDelayMs]`.
 */
export function computeBackoffDelay(attempt: number, options: BackoffOptions): BackoffDelay {
  const minDelayMs = Math.max(0, options.baseDelayMs);
  const maxDelayMs = Math.max(minDelayMs, options.maxDelayMs);

  let baseDelayMs = minDelayMs;
  if (attempt > 1) {
    const exponential = minDelayMs * 2 ** (attempt - 1);
    baseDelayMs = Math.min(maxDelayMs, Math.max(minDelayMs, Math.round(exponential)));
  }

  const factor = Math.max(0, options.jitterFactor ?? DEFAULT_BACKOFF.jitterFactor);
  const random = options.random?.() ?? Math.random();
  const jitterRange = Math.round(baseDelayMs * factor);
  let appliedJitterMs = 0;

  if (jitterRange > 0) {
    const centered = random * 2 - 1;
    appliedJitterMs = Math.round(centered * jitterRange);
  }

  let delayMs = baseDelayMs + appliedJitterMs;
  if (delayMs > maxDelayMs) {
    delayMs = maxDelayMs;
  } else if (delayMs < minDelayMs) {
    delayMs = minDelayMs;
  }

  return { delayMs, baseDelayMs, appliedJitterMs: delayMs - baseDelayMs };
}
