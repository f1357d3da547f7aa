import { createLogger, type Logger, type StationConfig, type StationState } from '@crane-cell/shared';
import type { CellContext } from './cell-context.js';
import { pollUntil } from './poll.js';

export type StationFailureReason = 'unknown_station' | 'write_failed' | 'start_timeout' | 'completion_timeout';

export type StationRunResult =
  | { ok: true; stationId: string; startConfirmed: boolean; elapsedMs: number }
  | { ok: false; stationId: string; reason: StationFailureReason; elapsedMs: number };

/**
 * Drives processing stations through their run cycle:
 * idle → starting → running → completing → idle, or timed_out when the
 * running flag never clears. The run command is always switched off on
 * the way out.
 */
export class StationController {
  private readonly logger: Logger;
  private readonly stations = new Map<string, StationConfig>();
  private readonly states = new Map<string, StationState>();

  constructor(private readonly context: CellContext) {
    this.logger = createLogger('station-controller');
    for (const station of context.config.stations) {
      this.stations.set(station.stationId, station);
      this.states.set(station.stationId, 'idle');
    }
  }

  getState(stationId: string): StationState | undefined {
    return this.states.get(stationId);
  }

  async run(stationId: string): Promise<StationRunResult> {
    const { clock, port, config } = this.context;
    const { timings, policies } = config;
    const startedAt = clock.now();
    const elapsed = () => clock.now() - startedAt;

    const station = this.stations.get(stationId);
    if (!station) {
      this.logger.error({ stationId }, 'Unknown station');
      return { ok: false, stationId, reason: 'unknown_station', elapsedMs: 0 };
    }

    const present = await port.read(station.partPresent);
    if (present !== 1) {
      this.logger.warn({ stationId, value: present }, 'Station sensor shows no part');
    }

    let switchedOff = false;
    try {
      this.setState(stationId, 'starting');
      if (!(await port.write(station.run, 1))) {
        this.logger.warn({ stationId, register: station.run }, 'Could not write run command');
        this.setState(stationId, 'timed_out');
        return { ok: false, stationId, reason: 'write_failed', elapsedMs: elapsed() };
      }
      this.logger.info({ stationId }, 'Station started');
      await clock.sleep(timings.stationRunDelayMs);

      const started = await pollUntil(
        async () => ((await port.read(station.running)) === 1 ? true : null),
        { clock, intervalMs: timings.stationStartPollMs, timeoutMs: timings.stationStartTimeoutMs },
      );
      if (!started.ok) {
        if (policies.strictStart) {
          this.logger.warn({ stationId, timeoutMs: timings.stationStartTimeoutMs }, 'Station did not start');
          this.setState(stationId, 'timed_out');
          return { ok: false, stationId, reason: 'start_timeout', elapsedMs: elapsed() };
        }
        this.logger.warn({ stationId, timeoutMs: timings.stationStartTimeoutMs }, "Station didn't report running, continuing");
      }
      this.setState(stationId, 'running');

      const completed = await pollUntil(
        async () => ((await port.read(station.running)) === 0 ? true : null),
        { clock, intervalMs: timings.stationCompletionPollMs, timeoutMs: timings.stationCompletionTimeoutMs },
      );
      if (!completed.ok) {
        this.logger.warn({ stationId, timeoutMs: timings.stationCompletionTimeoutMs }, 'Station did not complete in time');
        this.setState(stationId, 'timed_out');
        return { ok: false, stationId, reason: 'completion_timeout', elapsedMs: elapsed() };
      }

      this.setState(stationId, 'completing');
      switchedOff = await this.switchOff(station);
      await clock.sleep(timings.stationOffSettleMs);
      this.setState(stationId, 'idle');
      this.logger.info({ stationId, elapsedMs: elapsed() }, 'Station completed');
      return { ok: true, stationId, startConfirmed: started.ok, elapsedMs: elapsed() };
    } finally {
      if (!switchedOff) await this.switchOff(station);
    }
  }

  private async switchOff(station: StationConfig): Promise<boolean> {
    const ok = await this.context.port.write(station.run, 0);
    if (!ok) {
      this.logger.error({ stationId: station.stationId, register: station.run }, 'Could not switch off run command');
    }
    return ok;
  }

  private setState(stationId: string, state: StationState): void {
    if (this.states.get(stationId) === state) return;
    this.states.set(stationId, state);
    this.context.emit('station-state', stationId, state);
  }
}
