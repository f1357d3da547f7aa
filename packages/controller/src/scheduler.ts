import { createLogger, type Logger, type Part } from '@crane-cell/shared';
import { PartArrivalDetector } from './arrival-detector.js';
import type { CellContext } from './cell-context.js';
import type { PositionLog } from './position-log.js';
import { PositionWaiter } from './position-waiter.js';
import { RoutingTable } from './routing.js';
import { SequenceInterpreter, describeFailure } from './sequence-interpreter.js';
import { StationController } from './station-controller.js';

export interface PartOutcome {
  part: Part;
  status: 'completed' | 'failed' | 'interrupted';
  /** Recorded failures, including recoverable ones under the continue policy */
  failures: string[];
  stepsRun: number;
}

export type StepOutcome =
  | { kind: 'processed'; outcome: PartOutcome }
  | { kind: 'idle' }
  | { kind: 'stopped' };

export interface ShutdownSummary {
  remainingParts: number;
  completedParts: number;
  failedParts: number;
}

/**
 * The cell's control loop. One part at a time owns the crane from pick-up
 * to delivery; arrivals are polled between parts.
 *
 * Queue selection is round-robin over sources in configuration order,
 * FIFO within each source.
 */
export class OrchestrationScheduler {
  readonly context: CellContext;
  readonly routing: RoutingTable;
  readonly detector: PartArrivalDetector;
  readonly stations: StationController;
  readonly interpreter: SequenceInterpreter;
  private readonly positionLog: PositionLog;
  private readonly logger: Logger;
  private lastPollAt: number | null = null;
  private lastSourceIndex = -1;
  /** Set while a step runs; the crane takes one caller at a time */
  private stepping = false;
  private completedParts = 0;
  private failedParts = 0;

  constructor(context: CellContext, positionLog: PositionLog) {
    this.context = context;
    this.positionLog = positionLog;
    this.logger = createLogger('scheduler');
    this.routing = new RoutingTable(context.config);
    this.detector = new PartArrivalDetector(context);
    this.stations = new StationController(context);
    this.interpreter = new SequenceInterpreter(context, new PositionWaiter(context), this.stations, positionLog);
  }

  /** Put the crane in a known state before the loop starts */
  async initialize(): Promise<void> {
    const { port, config } = this.context;
    if (await port.write(config.crane.endEffector, 0)) {
      this.context.endEffectorEngaged = false;
    } else {
      this.logger.warn({ register: config.crane.endEffector }, 'Could not release end effector at startup');
    }
    this.logger.info(
      { sources: config.sources.map(s => s.sourceId), partTypes: this.routing.partTypes() },
      'Scheduler initialized',
    );
  }

  async pollArrivals(): Promise<Part[]> {
    this.lastPollAt = this.context.clock.now();
    return this.detector.poll();
  }

  /** Next part by round-robin over sources, or null when every queue is empty */
  popNext(): Part | null {
    const { sources } = this.context.config;
    for (let offset = 1; offset <= sources.length; offset++) {
      const index = (this.lastSourceIndex + offset) % sources.length;
      const part = this.context.dequeue(sources[index].sourceId);
      if (part) {
        this.lastSourceIndex = index;
        return part;
      }
    }
    return null;
  }

  /** One loop iteration; rejects while another step is in progress */
  async step(): Promise<StepOutcome> {
    if (this.stepping) throw new Error('A scheduler step is already in progress');
    this.stepping = true;
    try {
      return await this.runStep();
    } finally {
      this.stepping = false;
    }
  }

  private async runStep(): Promise<StepOutcome> {
    const { clock, config } = this.context;
    if (this.context.stopping) return { kind: 'stopped' };

    const interval = config.timings.arrivalPollIntervalMs;
    if (this.lastPollAt === null || clock.now() - this.lastPollAt >= interval) {
      await this.pollArrivals();
    }

    const part = this.popNext();
    if (part) {
      this.logger.info({ partId: part.id, queueDepth: this.context.queueDepth() }, 'Processing next part');
      const outcome = await this.processPart(part);
      if (!this.context.stopping) await this.pollArrivals();
      return { kind: 'processed', outcome };
    }

    await clock.sleep(interval);
    return { kind: 'idle' };
  }

  /** Loop until stop() is called */
  async run(): Promise<void> {
    this.logger.info('Control loop started');
    while (!this.context.stopping) {
      await this.step();
    }
    this.logger.info('Control loop stopped');
  }

  /** Takes effect between parts or at the next action boundary */
  stop(): void {
    if (this.context.stopping) return;
    this.logger.info({ activePartId: this.context.activePart?.id ?? null }, 'Stop requested');
    this.context.requestStop();
  }

  async shutdown(): Promise<ShutdownSummary> {
    const summary: ShutdownSummary = {
      remainingParts: this.context.queueDepth(),
      completedParts: this.completedParts,
      failedParts: this.failedParts,
    };
    await this.positionLog.close();
    await this.context.port.close();
    this.logger.info(summary, 'Shut down');
    return summary;
  }

  async processPart(part: Part): Promise<PartOutcome> {
    const { config } = this.context;
    const failures: string[] = [];
    let stepsRun = 0;

    const finish = (status: PartOutcome['status']): PartOutcome => {
      const outcome: PartOutcome = { part, status, failures, stepsRun };
      if (status === 'completed') this.completedParts++;
      if (status === 'failed') this.failedParts++;
      this.logger.info({ partId: part.id, status, location: part.location, failures: failures.length }, 'Part finished');
      this.context.emit('part-finished', outcome);
      return outcome;
    };

    const plan = this.routing.get(part.partType);
    if (!plan) {
      failures.push(`no routing plan for part type '${part.partType}'`);
      this.context.setStatus(part, 'failed', part.location);
      return finish('failed');
    }

    this.context.activePart = part;
    this.logger.info({ partId: part.id, partType: part.partType, steps: plan.steps.length }, 'Processing part');

    try {
      for (const [index, planned] of plan.steps.entries()) {
        if (this.context.stopping) return finish('interrupted');

        const { step } = planned;
        const sequence = step.kind === 'sequence'
          ? config.sequences[step.name]
          : { name: `run_${step.stationId}`, actions: [{ kind: 'await_station' as const, stationId: step.stationId }] };

        this.logger.info({ partId: part.id, step: index + 1, of: plan.steps.length, sequence: sequence.name }, 'Step');
        const result = await this.interpreter.run(sequence, part.id);
        failures.push(...result.failures.map(describeFailure));
        stepsRun++;

        if (result.status === 'interrupted') return finish('interrupted');
        if (result.status === 'failed') {
          this.context.setStatus(part, 'failed', part.location);
          return finish('failed');
        }

        for (const milestone of planned.milestones) {
          this.context.setStatus(part, milestone.status, milestone.location);
        }
      }
      return finish('completed');
    } finally {
      this.context.activePart = null;
    }
  }
}
