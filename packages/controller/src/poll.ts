import type { Clock } from './clock.js';

export interface PollOptions {
  clock: Clock;
  intervalMs: number;
  timeoutMs: number;
  /** Multiplier applied to the interval after each miss (default 1, fixed interval) */
  backoffFactor?: number;
  /** Upper bound for the interval when backing off */
  maxIntervalMs?: number;
}

export type PollResult<T> =
  | { ok: true; value: T; attempts: number; elapsedMs: number }
  | { ok: false; attempts: number; elapsedMs: number };

/**
 * Probe until it yields a value or the timeout expires.
 *
 * The probe returns null while the condition does not hold. The last probe
 * runs exactly at the deadline, so the caller is never held longer than
 * `timeoutMs` plus the time the probes themselves take.
 */
export async function pollUntil<T>(
  probe: () => Promise<T | null>,
  options: PollOptions,
): Promise<PollResult<T>> {
  const { clock, timeoutMs } = options;
  const backoffFactor = options.backoffFactor ?? 1;
  const maxIntervalMs = options.maxIntervalMs ?? Number.POSITIVE_INFINITY;
  const startedAt = clock.now();
  let interval = options.intervalMs;
  let attempts = 0;

  for (;;) {
    attempts++;
    const value = await probe();
    const elapsedMs = clock.now() - startedAt;
    if (value !== null) return { ok: true, value, attempts, elapsedMs };
    if (elapsedMs >= timeoutMs) return { ok: false, attempts, elapsedMs };

    await clock.sleep(Math.min(interval, timeoutMs - elapsedMs));
    interval = Math.min(interval * backoffFactor, maxIntervalMs);
  }
}
