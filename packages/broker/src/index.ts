import { ConfigError, createLogger, loadCellConfig, type CellConfig } from '@crane-cell/shared';
import { loadBrokerEnv, type BrokerEnv } from './env.js';
import { startBroker } from './server.js';

const log = createLogger('broker');

let env: BrokerEnv;
let config: CellConfig;
try {
  env = loadBrokerEnv();
  config = await loadCellConfig(env.configPath);
} catch (err) {
  if (err instanceof ConfigError) log.error({ source: err.source, issues: err.issues }, 'Invalid broker configuration');
  else log.error({ err }, 'Broker failed to start');
  process.exit(1);
}

const MQTT_PORT = env.mqttPort;
const WS_PORT = env.wsPort;
const PREFIX = env.topicPrefix;

try {
  const broker = await startBroker({
    mqttPort: MQTT_PORT,
    wsPort: WS_PORT,
    prefix: PREFIX,
    stationIds: config.stations.map(s => s.stationId),
  });

  process.on('SIGINT', () => {
    log.info('Shutting down...');
    broker.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  });
} catch (err) {
  if (err instanceof Error && 'code' in err && err.code === 'EADDRINUSE') {
    log.error({ port: MQTT_PORT }, 'Port is already in use. Kill the other process and retry.');
  } else {
    log.error({ err }, 'Broker failed to start');
  }
  process.exit(1);
}
