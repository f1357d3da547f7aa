import mqtt, { type MqttClient } from 'mqtt';
import { TransportError, createLogger, loadCellConfig } from '@crane-cell/shared';
import { CellContext } from './cell-context.js';
import { SystemClock } from './clock.js';
import type { RuntimeConfig } from './config.js';
import { CellEventPublisher } from './event-publisher.js';
import { MqttRegisterPort } from './mqtt-register-port.js';
import { CsvPositionLog, FanoutPositionLog, type PositionLog } from './position-log.js';
import { OrchestrationScheduler, type ShutdownSummary } from './scheduler.js';

const log = createLogger('controller');

export interface RunningController {
  scheduler: OrchestrationScheduler;
  /** Resolves once the loop has stopped and everything is closed */
  done: Promise<ShutdownSummary>;
  stop(): void;
}

/**
 * Load the cell, connect to the broker and start the control loop.
 * Configuration and connect failures are thrown before the loop starts.
 */
export async function startController(runtime: RuntimeConfig): Promise<RunningController> {
  const config = await loadCellConfig(runtime.configPath);
  log.info(
    { configPath: runtime.configPath, sources: config.sources.length, stations: config.stations.length },
    'Cell configuration loaded',
  );

  log.info({ url: runtime.brokerUrl }, 'Connecting to MQTT broker...');
  let client: MqttClient;
  try {
    client = await mqtt.connectAsync(
      runtime.brokerUrl,
      { connectTimeout: runtime.connectTimeoutMs, reconnectPeriod: 1000 },
      false,
    );
  } catch (err) {
    throw new TransportError(runtime.brokerUrl, err);
  }
  log.info({ url: runtime.brokerUrl }, 'Connected to MQTT broker');

  client.on('offline', () => log.warn('Broker connection lost, registers read as unknown'));
  client.on('reconnect', () => log.info('Reconnecting to broker...'));
  client.on('error', err => log.error({ err }, 'MQTT client error'));

  const port = new MqttRegisterPort(client, runtime.topicPrefix);
  await port.open();

  const context = new CellContext(config, port, new SystemClock());
  const sinks: PositionLog[] = [];
  if (runtime.positionLogEnabled) {
    sinks.push(await CsvPositionLog.open(runtime.positionLogPath));
  }
  if (runtime.publishEvents) {
    const publisher = new CellEventPublisher(client, runtime.topicPrefix);
    publisher.attach(context);
    sinks.push(publisher);
  }

  const scheduler = new OrchestrationScheduler(context, new FanoutPositionLog(sinks));
  await scheduler.initialize();

  const done = scheduler.run().then(
    () => scheduler.shutdown(),
    async (err: unknown) => {
      log.error({ err }, 'Control loop failed');
      await scheduler.shutdown();
      throw err;
    },
  );

  return { scheduler, done, stop: () => scheduler.stop() };
}
