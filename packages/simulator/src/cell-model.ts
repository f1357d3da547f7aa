import { SINK_LOCATION, createLogger, type CellConfig, type Point, type StationConfig } from '@crane-cell/shared';

const log = createLogger('cell-model');

export interface CellModelOptions {
  /** Crane travel speed per axis, units per second */
  craneSpeed: number;
  /** How close the crane must be to a location for vacuum to grip or release there */
  gripTolerance: number;
  /** Delay between the run command and the running flag */
  stationStartDelayMs: number;
  /** Processing time per station id, falling back to `defaultProcessingMs` */
  processingMs: Record<string, number>;
  defaultProcessingMs: number;
  /** Crane position at power-up */
  home: Point;
}

const DEFAULT_OPTIONS: CellModelOptions = {
  craneSpeed: 500,
  gripTolerance: 5,
  stationStartDelayMs: 300,
  processingMs: {},
  defaultProcessingMs: 3000,
  home: { x: 0, y: 0 },
};

export type StationPhase =
  | { phase: 'idle' }
  | { phase: 'starting'; remainingMs: number }
  | { phase: 'processing'; remainingMs: number }
  | { phase: 'done' };

/** Where the part on the gripper was picked up */
export interface HeldPart {
  from: string;
}

export type RegisterListener = (address: number, value: number) => void;

/**
 * In-process model of the cell's field device: a register bank with a
 * crane that travels toward its target, a vacuum gripper that moves parts
 * between locations, and stations that run a timed cycle on command.
 *
 * Time only passes through advance(). Reads and writes behave like a
 * register port; only controller-owned registers accept writes.
 */
export class CellModel {
  readonly options: CellModelOptions;
  private readonly registers = new Map<number, number>();
  private readonly writable = new Set<number>();
  private readonly stationPhases = new Map<string, StationPhase>();
  private readonly stationsByRun = new Map<number, StationConfig>();
  private readonly listeners: RegisterListener[] = [];
  private heldPart: HeldPart | null = null;
  private delivered = 0;
  private dropped = 0;
  private closed = false;

  constructor(
    readonly config: CellConfig,
    options: Partial<CellModelOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    const { crane } = config;

    this.writable.add(crane.targetX).add(crane.targetY).add(crane.endEffector);
    this.registers.set(crane.targetX, this.options.home.x);
    this.registers.set(crane.targetY, this.options.home.y);
    this.registers.set(crane.currentX, this.options.home.x);
    this.registers.set(crane.currentY, this.options.home.y);
    this.registers.set(crane.endEffector, 0);

    for (const source of config.sources) {
      this.registers.set(source.presence, 0);
    }
    for (const station of config.stations) {
      this.writable.add(station.run);
      this.stationsByRun.set(station.run, station);
      this.stationPhases.set(station.stationId, { phase: 'idle' });
      this.registers.set(station.run, 0);
      this.registers.set(station.running, 0);
      this.registers.set(station.partPresent, 0);
    }
  }

  // ---- Register access ----

  async read(address: number): Promise<number | null> {
    return this.peek(address);
  }

  async write(address: number, value: number): Promise<boolean> {
    return this.poke(address, value);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  peek(address: number): number | null {
    return this.registers.get(address) ?? null;
  }

  /** Apply a controller write; rejected for sensor registers and unmapped addresses */
  poke(address: number, value: number): boolean {
    if (!this.writable.has(address)) {
      log.warn({ address, value }, 'Write to read-only register rejected');
      return false;
    }
    const previous = this.registers.get(address);
    this.set(address, value);

    if (address === this.config.crane.endEffector && previous !== value) {
      if (value === 1) this.grip();
      else if (value === 0) this.release();
    }

    const station = this.stationsByRun.get(address);
    if (station) this.commandStation(station, previous === 1, value === 1);
    return true;
  }

  onChange(listener: RegisterListener): void {
    this.listeners.push(listener);
  }

  /** Every mapped register with its current value */
  snapshot(): Map<number, number> {
    return new Map(this.registers);
  }

  // ---- Cell state ----

  /** Put a part on a source; false if the source is unknown or occupied */
  spawnPart(sourceId: string): boolean {
    const source = this.config.sources.find(s => s.sourceId === sourceId);
    if (!source || this.registers.get(source.presence) === 1) return false;
    this.set(source.presence, 1);
    log.debug({ sourceId }, 'Part placed on source');
    return true;
  }

  get cranePosition(): Point {
    const { crane } = this.config;
    return { x: this.registers.get(crane.currentX) ?? 0, y: this.registers.get(crane.currentY) ?? 0 };
  }

  get held(): HeldPart | null {
    return this.heldPart;
  }

  /** Parts released over the sink */
  get sinkCount(): number {
    return this.delivered;
  }

  /** Parts released away from any location */
  get droppedCount(): number {
    return this.dropped;
  }

  stationPhase(stationId: string): StationPhase['phase'] | undefined {
    return this.stationPhases.get(stationId)?.phase;
  }

  // ---- Time ----

  advance(ms: number): void {
    if (ms <= 0) return;
    this.moveCrane(ms);
    for (const station of this.config.stations) {
      this.advanceStation(station, ms);
    }
  }

  private moveCrane(ms: number): void {
    const { crane } = this.config;
    const step = (this.options.craneSpeed * ms) / 1000;
    for (const [current, target] of [[crane.currentX, crane.targetX], [crane.currentY, crane.targetY]]) {
      const position = this.registers.get(current) ?? 0;
      const goal = this.registers.get(target) ?? position;
      if (position === goal) continue;
      const next = Math.abs(goal - position) <= step
        ? goal
        : Math.round(position + Math.sign(goal - position) * step);
      this.set(current, next);
    }
  }

  private advanceStation(station: StationConfig, ms: number): void {
    let remaining = ms;
    let state: StationPhase = this.stationPhases.get(station.stationId) ?? { phase: 'idle' };

    while (remaining > 0 && (state.phase === 'starting' || state.phase === 'processing')) {
      if (state.remainingMs > remaining) {
        state = { ...state, remainingMs: state.remainingMs - remaining };
        break;
      }
      remaining -= state.remainingMs;
      if (state.phase === 'starting') {
        this.set(station.running, 1);
        state = { phase: 'processing', remainingMs: this.processingTime(station.stationId) };
        log.debug({ stationId: station.stationId }, 'Station running');
      } else {
        this.set(station.running, 0);
        state = { phase: 'done' };
        log.debug({ stationId: station.stationId }, 'Station cycle finished');
      }
    }

    this.stationPhases.set(station.stationId, state);
  }

  private processingTime(stationId: string): number {
    return this.options.processingMs[stationId] ?? this.options.defaultProcessingMs;
  }

  private commandStation(station: StationConfig, wasOn: boolean, isOn: boolean): void {
    if (isOn && !wasOn) {
      if (this.options.stationStartDelayMs > 0) {
        this.stationPhases.set(station.stationId, { phase: 'starting', remainingMs: this.options.stationStartDelayMs });
      } else {
        this.set(station.running, 1);
        this.stationPhases.set(station.stationId, { phase: 'processing', remainingMs: this.processingTime(station.stationId) });
      }
    } else if (!isOn && wasOn) {
      this.set(station.running, 0);
      this.stationPhases.set(station.stationId, { phase: 'idle' });
    }
  }

  // ---- Gripper ----

  /** Location whose pick/place point is under the crane */
  private locationUnderCrane(): string | null {
    const { x, y } = this.cranePosition;
    const tolerance = this.options.gripTolerance;
    for (const [location, point] of Object.entries(this.config.positions)) {
      if (Math.abs(point.x - x) <= tolerance && Math.abs(point.y - y) <= tolerance) return location;
    }
    return null;
  }

  private grip(): void {
    if (this.heldPart) return;
    const location = this.locationUnderCrane();
    if (location === null) return;

    const source = this.config.sources.find(s => s.sourceId === location);
    if (source && this.registers.get(source.presence) === 1) {
      this.set(source.presence, 0);
      this.heldPart = { from: location };
      log.debug({ location }, 'Part picked');
      return;
    }

    const station = this.config.stations.find(s => s.stationId === location);
    if (station && this.registers.get(station.partPresent) === 1) {
      this.set(station.partPresent, 0);
      this.heldPart = { from: location };
      log.debug({ location }, 'Part picked');
    }
  }

  private release(): void {
    const part = this.heldPart;
    if (!part) return;
    this.heldPart = null;
    const location = this.locationUnderCrane();

    if (location === SINK_LOCATION) {
      this.delivered++;
      log.debug({ from: part.from, delivered: this.delivered }, 'Part delivered to sink');
      return;
    }

    const station = this.config.stations.find(s => s.stationId === location);
    if (station && this.registers.get(station.partPresent) !== 1) {
      this.set(station.partPresent, 1);
      log.debug({ location }, 'Part placed');
      return;
    }

    const source = this.config.sources.find(s => s.sourceId === location);
    if (source && this.registers.get(source.presence) !== 1) {
      this.set(source.presence, 1);
      log.debug({ location }, 'Part placed');
      return;
    }

    this.dropped++;
    log.warn({ from: part.from, at: this.cranePosition }, 'Part released away from any location');
  }

  private set(address: number, value: number): void {
    if (this.registers.get(address) === value) return;
    this.registers.set(address, value);
    for (const listener of this.listeners) listener(address, value);
  }
}
