/**
 * Supervisor Module - Pure Transformations
 */

/**
 * Exponential backoff: `base * 2^(failures - 1)`, capped at `max`.
 *
 * @example
 * backoffDelay(1, 1000, 60000) // 1000
 * backoffDelay(4, 1000, 60000) // 8000
 */
export function backoffDelay(
  failures: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const exponent = Math.max(failures, 1) - 1;
  return Math.min(baseDelayMs * 2 ** exponent, maxDelayMs);
}
