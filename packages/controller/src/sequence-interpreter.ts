import { createLogger, type Action, type Logger, type Sequence } from '@crane-cell/shared';
import type { CellContext } from './cell-context.js';
import type { PositionLog } from './position-log.js';
import type { PositionWaiter } from './position-waiter.js';
import type { StationController, StationFailureReason } from './station-controller.js';

export type SequenceFailure =
  | { kind: 'write_failed'; sequence: string; actionIndex: number; register: number }
  | { kind: 'position_timeout'; sequence: string; actionIndex: number; x: number; y: number }
  | { kind: 'station_failed'; sequence: string; actionIndex: number; stationId: string; reason: StationFailureReason };

export interface SequenceResult {
  sequence: string;
  /** completed: every action ran (failures may still be listed under the continue policy) */
  status: 'completed' | 'failed' | 'interrupted';
  actionsRun: number;
  failures: SequenceFailure[];
}

export function describeFailure(failure: SequenceFailure): string {
  switch (failure.kind) {
    case 'write_failed':
      return `${failure.sequence}[${failure.actionIndex}]: write to register ${failure.register} failed`;
    case 'position_timeout':
      return `${failure.sequence}[${failure.actionIndex}]: crane did not reach (${failure.x}, ${failure.y})`;
    case 'station_failed':
      return `${failure.sequence}[${failure.actionIndex}]: station ${failure.stationId} ${failure.reason}`;
  }
}

/**
 * Executes crane action sequences one action at a time. An action starts
 * only after the previous one, including its wait, has finished.
 */
export class SequenceInterpreter {
  private readonly logger: Logger;

  constructor(
    private readonly context: CellContext,
    private readonly positionWaiter: PositionWaiter,
    private readonly stations: StationController,
    private readonly positionLog: PositionLog,
  ) {
    this.logger = createLogger('sequence-interpreter');
  }

  async run(sequence: Sequence, partId: number): Promise<SequenceResult> {
    const abortOnFailure = this.context.config.policies.failurePolicy === 'abort';
    const failures: SequenceFailure[] = [];
    let actionsRun = 0;

    this.logger.debug({ sequence: sequence.name, partId, actions: sequence.actions.length }, 'Running sequence');

    for (const [index, action] of sequence.actions.entries()) {
      if (this.context.stopping) {
        this.logger.info({ sequence: sequence.name, partId, actionIndex: index }, 'Stop requested, abandoning sequence');
        return { sequence: sequence.name, status: 'interrupted', actionsRun, failures };
      }

      const failure = await this.execute(sequence.name, index, action, partId);
      actionsRun++;

      if (failure) {
        failures.push(failure);
        this.logger.warn({ partId, failure: describeFailure(failure) }, 'Action failed');
        if (abortOnFailure) {
          return { sequence: sequence.name, status: 'failed', actionsRun, failures };
        }
      }
    }

    return { sequence: sequence.name, status: 'completed', actionsRun, failures };
  }

  private async execute(sequence: string, actionIndex: number, action: Action, partId: number): Promise<SequenceFailure | null> {
    const { port, clock, config } = this.context;
    const { crane, timings } = config;

    switch (action.kind) {
      case 'set_end_effector': {
        const ok = await port.write(crane.endEffector, action.engaged ? 1 : 0);
        if (ok) this.context.endEffectorEngaged = action.engaged;
        this.logger.debug({ partId, engaged: action.engaged }, 'End effector');
        await clock.sleep(action.engaged ? timings.engageSettleMs : timings.releaseSettleMs);
        return ok ? null : { kind: 'write_failed', sequence, actionIndex, register: crane.endEffector };
      }

      case 'move_to': {
        if (!(await port.write(crane.targetX, action.x))) {
          return { kind: 'write_failed', sequence, actionIndex, register: crane.targetX };
        }
        if (!(await port.write(crane.targetY, action.y))) {
          return { kind: 'write_failed', sequence, actionIndex, register: crane.targetY };
        }
        this.logger.debug({ partId, x: action.x, y: action.y }, 'Moving');

        const reached = await this.positionWaiter.waitFor(action.x, action.y);
        if (!reached) {
          return { kind: 'position_timeout', sequence, actionIndex, x: action.x, y: action.y };
        }

        if (this.context.endEffectorEngaged) {
          const position = await this.positionWaiter.readPosition();
          this.positionLog.append({
            partId,
            timestamp: this.context.timestamp(),
            x: position?.x ?? action.x,
            y: position?.y ?? action.y,
            endEffectorEngaged: true,
          });
        }
        return null;
      }

      case 'await_station': {
        await clock.sleep(timings.stationSettleMs);
        const result = await this.stations.run(action.stationId);
        return result.ok
          ? null
          : { kind: 'station_failed', sequence, actionIndex, stationId: action.stationId, reason: result.reason };
      }
    }
  }
}
