import {
  createLogger,
  parseRegisterPayload,
  parseTopic,
  registerSetTopic,
  type Logger,
} from '@crane-cell/shared';
import type { RegisterPort, RegisterValue } from './register-port.js';

/**
 * The slice of an MQTT client the port needs. mqtt's MqttClient satisfies it.
 */
export interface RegisterBusClient {
  readonly connected: boolean;
  on(event: 'message', listener: (topic: string, payload: Buffer) => void): unknown;
  subscribeAsync(topic: string): Promise<unknown>;
  publishAsync(topic: string, message: string, opts: { qos: 0 | 1 | 2; retain?: boolean }): Promise<unknown>;
  endAsync(): Promise<void>;
}

/**
 * Register port over an MQTT process image.
 *
 * The field device publishes every register value retained on
 * `{prefix}/registers/{address}`; the port mirrors those into a local
 * image and answers reads from it. Writes go to
 * `{prefix}/registers/{address}/set`. While the client is disconnected
 * every read is unknown and every write fails.
 */
export class MqttRegisterPort implements RegisterPort {
  private readonly image = new Map<number, number>();
  private readonly logger: Logger;
  private opened = false;

  constructor(
    private readonly client: RegisterBusClient,
    private readonly prefix: string,
  ) {
    this.logger = createLogger('mqtt-register-port');
  }

  async open(): Promise<void> {
    if (this.opened) return;
    this.client.on('message', (topic, payload) => this.handleMessage(topic, payload));
    await this.client.subscribeAsync(`${this.prefix}/registers/+`);
    this.opened = true;
    this.logger.info({ prefix: this.prefix }, 'Subscribed to register image');
  }

  handleMessage(topic: string, payload: Buffer): void {
    const parsed = parseTopic(this.prefix, topic);
    if (parsed.kind !== 'register') return;

    const value = parseRegisterPayload(payload);
    if (value === null) {
      this.image.delete(parsed.address);
      this.logger.debug({ address: parsed.address, payload: payload.toString() }, 'Malformed register payload');
      return;
    }
    this.image.set(parsed.address, value);
  }

  async read(address: number): Promise<RegisterValue> {
    if (!this.client.connected) return null;
    return this.image.get(address) ?? null;
  }

  async write(address: number, value: number): Promise<boolean> {
    if (!this.client.connected) {
      this.logger.warn({ address, value }, 'Write while disconnected');
      return false;
    }
    try {
      await this.client.publishAsync(registerSetTopic(this.prefix, address), String(value), { qos: 1 });
      return true;
    } catch (err) {
      this.logger.warn({ err, address, value }, 'Register write failed');
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.endAsync();
    this.image.clear();
    this.logger.info('Register port closed');
  }
}
