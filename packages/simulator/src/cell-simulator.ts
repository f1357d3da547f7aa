import {
  createLogger,
  parseRegisterPayload,
  parseTopic,
  registerTopic,
} from '@crane-cell/shared';
import type { CellModel } from './cell-model.js';

const log = createLogger('simulator');

/**
 * The slice of an MQTT client the simulator needs. mqtt's MqttClient
 * satisfies it.
 */
export interface SimulatorBusClient {
  on(event: 'message', listener: (topic: string, payload: Buffer) => void): unknown;
  subscribe(topic: string, callback?: (err: Error | null) => void): unknown;
  publish(topic: string, message: string, opts: { qos: 0 | 1 | 2; retain: boolean }): unknown;
}

export interface CellSimulatorOptions {
  prefix: string;
  tickMs: number;
  /** Mean delay between new parts per source; 0 disables spawning */
  spawnEveryMs: number;
}

function randomBetween(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

/**
 * Exposes a CellModel as a field device on MQTT: every register is
 * published retained on change, and writes arrive on the `/set` topics.
 */
export class CellSimulator {
  private tickTimer: ReturnType<typeof setInterval> | null = null;
  private spawnTimer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private lastTick = 0;

  constructor(
    private readonly client: SimulatorBusClient,
    private readonly model: CellModel,
    private readonly options: CellSimulatorOptions,
  ) {}

  start(): void {
    this.running = true;
    const { prefix } = this.options;
    log.info({ prefix, sources: this.model.config.sources.length, stations: this.model.config.stations.length }, 'Starting cell simulator');

    this.model.onChange((address, value) => this.publishRegister(address, value));
    for (const [address, value] of this.model.snapshot()) {
      this.publishRegister(address, value);
    }

    this.client.on('message', (topic, payload) => this.handleMessage(topic, payload));
    this.client.subscribe(`${prefix}/registers/+/set`, (err) => {
      if (err) log.error({ err }, 'Subscribe error');
      else log.info({ topic: `${prefix}/registers/+/set` }, 'Subscribed to register writes');
    });

    this.lastTick = Date.now();
    this.tickTimer = setInterval(() => {
      const now = Date.now();
      this.model.advance(now - this.lastTick);
      this.lastTick = now;
    }, this.options.tickMs);

    this.scheduleNextPart();
  }

  stop(): void {
    this.running = false;
    if (this.tickTimer) clearInterval(this.tickTimer);
    if (this.spawnTimer) clearTimeout(this.spawnTimer);
    this.tickTimer = null;
    this.spawnTimer = null;
    log.info({ delivered: this.model.sinkCount, dropped: this.model.droppedCount }, 'Simulator stopped');
  }

  handleMessage(topic: string, payload: Buffer): void {
    const parsed = parseTopic(this.options.prefix, topic);
    if (parsed.kind !== 'register_set') return;

    const value = parseRegisterPayload(payload);
    if (value === null) {
      log.warn({ topic, payload: payload.toString() }, 'Ignoring malformed register write');
      return;
    }
    if (this.model.poke(parsed.address, value)) {
      log.debug({ address: parsed.address, value }, 'Register written');
    } else {
      // Re-publish so the writer's image falls back to the device's value
      const current = this.model.peek(parsed.address);
      if (current !== null) this.publishRegister(parsed.address, current);
    }
  }

  private publishRegister(address: number, value: number): void {
    this.client.publish(registerTopic(this.options.prefix, address), String(value), { qos: 0, retain: true });
  }

  private scheduleNextPart(): void {
    const mean = this.options.spawnEveryMs;
    if (!this.running || !Number.isFinite(mean) || mean <= 0) return;

    this.spawnTimer = setTimeout(() => {
      const sources = this.model.config.sources;
      const source = sources[Math.floor(Math.random() * sources.length)];
      if (this.model.spawnPart(source.sourceId)) {
        log.info({ sourceId: source.sourceId, partType: source.partType }, 'New part on source');
      }
      this.scheduleNextPart();
    }, randomBetween(Math.round(mean / 2), Math.round(mean * 1.5)));
  }
}
