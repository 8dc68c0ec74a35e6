export type BackoffStrategy = (attempt: number) => number;

/** `attempt` is zero-based: the first retry waits `baseMs`. */
export function exponentialBackoff(baseMs: number, factor = 2, maxMs = Number.POSITIVE_INFINITY): BackoffStrategy {
  return (attempt) => Math.min(maxMs, baseMs * Math.pow(factor, attempt));
}

export function jittered(strategy: BackoffStrategy, jitterRatio = 0.5, random: () => number = Math.random): BackoffStrategy {
  if (jitterRatio <= 0) return strategy;
  return (attempt) => {
    const raw = strategy(attempt);
    const j = raw * jitterRatio;
    return raw - j + random() * j;
  };
}
