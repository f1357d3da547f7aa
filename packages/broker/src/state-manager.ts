import type {
  MqttPartEvent,
  MqttPartFinished,
  MqttStationEvent,
  Part,
  PartStatus,
  PositionLogRecord,
  StationState,
  WsMessage,
} from '@crane-cell/shared';

const POSITION_HISTORY_SIZE = 500;
const FINISHED_PART_LIMIT = 200;

type InitData = Extract<WsMessage, { type: 'init' }>['data'];

/**
 * Observer-side picture of the cell, rebuilt from the register image and
 * the controller's events. Never writes back.
 */
export class StateManager {
  registers = new Map<number, number>();
  parts = new Map<number, Part>();
  stations = new Map<string, StationState>();
  /** Ring buffer of logged crane positions, oldest first */
  positions: PositionLogRecord[] = [];
  private finished: number[] = [];

  constructor(stationIds: string[] = []) {
    for (const id of stationIds) this.stations.set(id, 'idle');
  }

  /** Returns false when nothing changed */
  handleRegister(address: number, value: number | null): boolean {
    if (value === null) return this.registers.delete(address);
    if (this.registers.get(address) === value) return false;
    this.registers.set(address, value);
    return true;
  }

  handlePart(event: MqttPartEvent): boolean {
    const known = this.parts.get(event.part.id);
    // Finished parts never move again; a late event must not revive one
    if (known && (known.status === 'completed' || known.status === 'failed')) return false;
    this.parts.set(event.part.id, event.part);
    return true;
  }

  handlePartFinished(event: MqttPartFinished): boolean {
    if (!this.parts.has(event.partId)) return false;
    this.finished.push(event.partId);
    while (this.finished.length > FINISHED_PART_LIMIT) {
      const oldest = this.finished.shift();
      if (oldest !== undefined) this.parts.delete(oldest);
    }
    return true;
  }

  handleStation(event: MqttStationEvent): void {
    this.stations.set(event.stationId, event.state);
  }

  handlePosition(record: PositionLogRecord): void {
    this.positions.push(record);
    if (this.positions.length > POSITION_HISTORY_SIZE) {
      this.positions.splice(0, this.positions.length - POSITION_HISTORY_SIZE);
    }
  }

  getPart(partId: number): Part | null {
    return this.parts.get(partId) ?? null;
  }

  listParts(status?: PartStatus): Part[] {
    const parts = [...this.parts.values()];
    return status ? parts.filter(p => p.status === status) : parts;
  }

  getInitData(): InitData {
    return {
      registers: Object.fromEntries([...this.registers].map(([address, value]) => [String(address), value])),
      parts: [...this.parts.values()],
      stations: Object.fromEntries(this.stations),
      positions: [...this.positions],
    };
  }
}
