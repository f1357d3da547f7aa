import { createLogger, type Logger, type Point } from '@crane-cell/shared';
import type { CellContext } from './cell-context.js';
import { pollUntil } from './poll.js';

export interface WaitOptions {
  tolerance?: number;
  timeoutMs?: number;
}

/**
 * Waits for the crane's measured position to settle on a target.
 */
export class PositionWaiter {
  private readonly logger: Logger;

  constructor(private readonly context: CellContext) {
    this.logger = createLogger('position-waiter');
  }

  /** Current X/Y, or null if either axis reads unknown */
  async readPosition(): Promise<Point | null> {
    const { port, config } = this.context;
    const x = await port.read(config.crane.currentX);
    const y = await port.read(config.crane.currentY);
    if (x === null || y === null) return null;
    return { x, y };
  }

  /**
   * Resolve true once both axes are within tolerance of the target, false
   * when the timeout expires first. Unknown reads count as not arrived.
   */
  async waitFor(targetX: number, targetY: number, options: WaitOptions = {}): Promise<boolean> {
    const { timings } = this.context.config;
    const tolerance = options.tolerance ?? timings.positionTolerance;
    const timeoutMs = options.timeoutMs ?? timings.positionTimeoutMs;

    const result = await pollUntil(
      async () => {
        const position = await this.readPosition();
        if (!position) return null;
        const arrived = Math.abs(position.x - targetX) <= tolerance && Math.abs(position.y - targetY) <= tolerance;
        return arrived ? position : null;
      },
      { clock: this.context.clock, intervalMs: timings.positionPollMs, timeoutMs },
    );

    if (result.ok) {
      this.logger.debug({ target: { x: targetX, y: targetY }, position: result.value, elapsedMs: result.elapsedMs }, 'Crane reached target');
      return true;
    }

    this.logger.warn({ target: { x: targetX, y: targetY }, timeoutMs, attempts: result.attempts }, 'Timeout waiting for crane position');
    return false;
  }
}
