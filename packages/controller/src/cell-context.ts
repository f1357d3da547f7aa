import { EventEmitter } from 'node:events';
import type { CellConfig, Part, PartStatus, StationState } from '@crane-cell/shared';
import type { Clock } from './clock.js';
import type { RegisterPort } from './register-port.js';
import type { PartOutcome } from './scheduler.js';

/**
 * Events emitted by CellContext, as listener argument lists.
 */
export type CellEvents = {
  'part-arrived': [part: Part];
  'part-status': [part: Part];
  'station-state': [stationId: string, state: StationState];
  'part-finished': [outcome: PartOutcome];
};

const TERMINAL: ReadonlySet<PartStatus> = new Set(['completed', 'failed']);

/**
 * Everything the orchestration components share: the port, the clock, the
 * per-source queues and the active slot. Owned by the scheduler and passed
 * to each component; nothing reaches for module-level state.
 */
export class CellContext extends EventEmitter<CellEvents> {
  readonly config: CellConfig;
  readonly port: RegisterPort;
  readonly clock: Clock;
  /** Part currently owning the crane */
  activePart: Part | null = null;
  /** Last commanded end-effector state */
  endEffectorEngaged = false;

  private readonly queues = new Map<string, Part[]>();
  private lastPartId = 0;
  private stopRequested = false;

  constructor(config: CellConfig, port: RegisterPort, clock: Clock) {
    super();
    this.config = config;
    this.port = port;
    this.clock = clock;
    for (const source of config.sources) {
      this.queues.set(source.sourceId, []);
    }
  }

  timestamp(): string {
    return new Date(this.clock.now()).toISOString();
  }

  nextPartId(): number {
    this.lastPartId++;
    return this.lastPartId;
  }

  queue(sourceId: string): readonly Part[] {
    return this.queues.get(sourceId) ?? [];
  }

  enqueue(part: Part): void {
    const queue = this.queues.get(part.source);
    if (!queue) throw new Error(`Unknown source '${part.source}'`);
    queue.push(part);
  }

  dequeue(sourceId: string): Part | undefined {
    return this.queues.get(sourceId)?.shift();
  }

  queueDepth(): number {
    let depth = 0;
    for (const queue of this.queues.values()) depth += queue.length;
    return depth;
  }

  /** True if a waiting part located at `location` is queued or holds the active slot */
  hasWaitingAt(location: string): boolean {
    const active = this.activePart;
    if (active && active.status === 'waiting' && active.location === location) return true;
    for (const queue of this.queues.values()) {
      if (queue.some(p => p.status === 'waiting' && p.location === location)) return true;
    }
    return false;
  }

  /** Apply a lifecycle transition and record it in the part's history */
  setStatus(part: Part, status: PartStatus, location: string): void {
    if (TERMINAL.has(part.status)) {
      throw new Error(`Part ${part.id} is ${part.status} and cannot become ${status}`);
    }
    part.status = status;
    part.location = location;
    part.history.push({ status, location, at: this.timestamp() });
    this.emit('part-status', part);
  }

  requestStop(): void {
    this.stopRequested = true;
  }

  get stopping(): boolean {
    return this.stopRequested;
  }
}
