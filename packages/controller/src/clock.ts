import { setTimeout as delay } from 'node:timers/promises';

/**
 * Source of time for every wait in the controller.
 */
export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  async sleep(ms: number): Promise<void> {
    if (ms <= 0) return;
    await delay(ms);
  }
}

export type AdvanceListener = (elapsedMs: number, now: number) => void;

/**
 * Clock that only moves when something sleeps on it. A sleep advances time
 * by its full duration and resolves on the next microtask, so timeouts of
 * a minute run in no wall time at all.
 */
export class VirtualClock implements Clock {
  private current: number;
  private readonly listeners: AdvanceListener[] = [];

  constructor(startMs = 0) {
    this.current = startMs;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    if (ms > 0) this.advance(ms);
    await Promise.resolve();
  }

  /** Move time forward without a sleeper, notifying listeners */
  advance(ms: number): void {
    this.current += ms;
    for (const listener of this.listeners) listener(ms, this.current);
  }

  onAdvance(listener: AdvanceListener): void {
    this.listeners.push(listener);
  }
}
