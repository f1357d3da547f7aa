import { z } from 'zod';
import { ConfigError, DEFAULT_TOPIC_PREFIX } from '@crane-cell/shared';

const port = z.coerce.number().int().min(1).max(65535);

const brokerEnvSchema = z.object({
  mqttPort: port.default(1883),
  wsPort: port.default(3001),
  topicPrefix: z.string().min(1).regex(/^[^#+/]+$/, 'must be a single topic level').default(DEFAULT_TOPIC_PREFIX),
  /** Cell file naming the stations shown before their first event */
  configPath: z.string().min(1).default('config/cell.json'),
});

export type BrokerEnv = z.infer<typeof brokerEnvSchema>;

export function loadBrokerEnv(env: NodeJS.ProcessEnv = process.env): BrokerEnv {
  const result = brokerEnvSchema.safeParse({
    mqttPort: env['CRANE_CELL_MQTT_PORT'],
    wsPort: env['CRANE_CELL_WS_PORT'],
    topicPrefix: env['CRANE_CELL_TOPIC_PREFIX'],
    configPath: env['CRANE_CELL_CONFIG'],
  });
  if (!result.success) {
    throw new ConfigError('environment', result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`));
  }
  return result.data;
}
