/**
 * Reconnect backoff
 *
 * Capped exponential backoff for consecutive liveness probe failures:
 * `min(base * 2^(failures - 1), cap)`.
 */

export interface BackoffConfig {
  baseSeconds: number
  maxSeconds: number
}

/**
 * Wait time before the next probe after `failures` consecutive failures.
 * Zero failures means no wait.
 */
export function computeBackoffSeconds(
  failures: number,
  { baseSeconds, maxSeconds }: BackoffConfig,
): number {
  if (failures <= 0) return 0
  // 2^31 already exceeds any sensible cap
  const exponent = Math.min(failures - 1, 31)
  return Math.min(baseSeconds * 2 ** exponent, maxSeconds)
}
