import { z } from 'zod';
import { ConfigError, DEFAULT_TOPIC_PREFIX } from '@crane-cell/shared';

const simulatorEnvSchema = z.object({
  brokerUrl: z.string().url().default('mqtt://localhost:1883'),
  configPath: z.string().min(1).default('config/cell.json'),
  topicPrefix: z.string().min(1).regex(/^[^#+/]+$/, 'must be a single topic level').default(DEFAULT_TOPIC_PREFIX),
  /** Mean delay between new parts; 0 turns random arrivals off */
  spawnEveryMs: z.coerce.number().int().min(0).default(20000),
});

export type SimulatorEnv = z.infer<typeof simulatorEnvSchema>;

/** Read the simulator's settings from `CRANE_CELL_*` variables */
export function loadSimulatorEnv(env: NodeJS.ProcessEnv = process.env): SimulatorEnv {
  const result = simulatorEnvSchema.safeParse({
    brokerUrl: env['CRANE_CELL_BROKER_URL'],
    configPath: env['CRANE_CELL_CONFIG'],
    topicPrefix: env['CRANE_CELL_TOPIC_PREFIX'],
    spawnEveryMs: env['CRANE_CELL_SPAWN_EVERY_MS'],
  });
  if (!result.success) {
    throw new ConfigError('environment', result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`));
  }
  return result.data;
}
