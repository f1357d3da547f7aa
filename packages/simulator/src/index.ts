import mqtt from 'mqtt';
import { ConfigError, createLogger, loadCellConfig, type CellConfig } from '@crane-cell/shared';
import { CellModel } from './cell-model.js';
import { CellSimulator } from './cell-simulator.js';
import { loadSimulatorEnv, type SimulatorEnv } from './env.js';

const log = createLogger('simulator');

let env: SimulatorEnv;
let config: CellConfig;
try {
  env = loadSimulatorEnv();
  config = await loadCellConfig(env.configPath);
} catch (err) {
  if (err instanceof ConfigError) log.error({ source: err.source, issues: err.issues }, 'Invalid simulator configuration');
  else log.error({ err }, 'Simulator failed to start');
  process.exit(1);
}

const MQTT_URL = env.brokerUrl;
const PREFIX = env.topicPrefix;
const SPAWN_EVERY_MS = env.spawnEveryMs;
const home = config.positions['sink'] ?? { x: 0, y: 0 };
const model = new CellModel(config, { gripTolerance: config.timings.positionTolerance, home });

log.info({ url: MQTT_URL }, 'Connecting to MQTT broker...');
const client = mqtt.connect(MQTT_URL);
let simulator: CellSimulator | null = null;

client.on('connect', () => {
  log.info('Connected to MQTT broker');
  if (simulator) return;
  simulator = new CellSimulator(client, model, { prefix: PREFIX, tickMs: 100, spawnEveryMs: SPAWN_EVERY_MS });
  simulator.start();
});

client.on('error', (err) => {
  log.error({ err: err.message }, 'MQTT connection error, retrying (is the broker running?)');
});

process.on('SIGINT', () => {
  log.info('Shutting down...');
  simulator?.stop();
  client.end();
  process.exit(0);
});
