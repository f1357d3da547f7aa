import {
  createLogger,
  eventTopic,
  type Logger,
  type MqttPartEvent,
  type MqttPartFinished,
  type MqttStationEvent,
  type Part,
  type PositionLogRecord,
  type StationState,
} from '@crane-cell/shared';
import type { CellContext } from './cell-context.js';
import type { RegisterBusClient } from './mqtt-register-port.js';
import type { PositionLog } from './position-log.js';
import type { PartOutcome } from './scheduler.js';

/**
 * Mirrors cell events onto MQTT for read-only observers. Publishing is
 * fire-and-forget: a failed publish is logged and never reaches the
 * control loop.
 */
export class CellEventPublisher implements PositionLog {
  private readonly logger: Logger;

  constructor(
    private readonly client: Pick<RegisterBusClient, 'publishAsync'>,
    private readonly prefix: string,
  ) {
    this.logger = createLogger('event-publisher');
  }

  attach(context: CellContext): void {
    context.on('part-arrived', (part: Part) => this.publishPart(part, context.timestamp()));
    context.on('part-status', (part: Part) => this.publishPart(part, context.timestamp()));
    context.on('station-state', (stationId: string, state: StationState) => {
      const payload: MqttStationEvent = { stationId, state, timestamp: context.timestamp() };
      this.publish(eventTopic(this.prefix, 'station'), payload);
    });
    context.on('part-finished', (outcome: PartOutcome) => {
      const payload: MqttPartFinished = {
        partId: outcome.part.id,
        status: outcome.part.status,
        failures: outcome.failures,
        timestamp: context.timestamp(),
      };
      this.publish(eventTopic(this.prefix, 'part-finished'), payload);
    });
  }

  append(record: PositionLogRecord): void {
    this.publish(eventTopic(this.prefix, 'position'), record);
  }

  async close(): Promise<void> {
    // Nothing buffered; the client is closed with the register port.
  }

  private publishPart(part: Part, timestamp: string): void {
    const payload: MqttPartEvent = { part, timestamp };
    this.publish(eventTopic(this.prefix, 'part'), payload);
  }

  private publish(topic: string, payload: object): void {
    this.client.publishAsync(topic, JSON.stringify(payload), { qos: 0 }).catch((err: unknown) => {
      this.logger.warn({ err, topic }, 'Event publish failed');
    });
  }
}
