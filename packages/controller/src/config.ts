/**
 * Controller runtime configuration
 *
 * Read from environment variables with validation and defaults; CLI flags
 * override the environment. The cell layout itself lives in the JSON file
 * named by `configPath`.
 */

import { z } from 'zod';
import { ConfigError, DEFAULT_TOPIC_PREFIX, createLogger } from '@crane-cell/shared';

const log = createLogger('config');

const flag = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform(value => value === 'true' || value === '1'),
]);

const runtimeConfigSchema = z.object({
  /** MQTT broker carrying the register image */
  brokerUrl: z.string().url().default('mqtt://localhost:1883'),
  /** Topic prefix shared with the field device */
  topicPrefix: z.string().min(1).regex(/^[^#+/]+$/, 'must be a single topic level').default(DEFAULT_TOPIC_PREFIX),
  connectTimeoutMs: z.coerce.number().int().min(100).max(120000).default(5000),
  /** Cell layout, sequences and routing */
  configPath: z.string().min(1).default('config/cell.json'),
  positionLogEnabled: flag.default(true),
  positionLogPath: z.string().min(1).default('crane_log.csv'),
  /** Publish part/station/position events for observers */
  publishEvents: flag.default(true),
});

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;
export type RuntimeOverrides = Partial<z.input<typeof runtimeConfigSchema>>;

function fromEnv(env: NodeJS.ProcessEnv): Record<keyof RuntimeConfig, string | undefined> {
  return {
    brokerUrl: env['CRANE_CELL_BROKER_URL'],
    topicPrefix: env['CRANE_CELL_TOPIC_PREFIX'],
    connectTimeoutMs: env['CRANE_CELL_CONNECT_TIMEOUT_MS'],
    configPath: env['CRANE_CELL_CONFIG'],
    positionLogEnabled: env['CRANE_CELL_POSITION_LOG_ENABLED'],
    positionLogPath: env['CRANE_CELL_POSITION_LOG'],
    publishEvents: env['CRANE_CELL_PUBLISH_EVENTS'],
  };
}

function defined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Load runtime configuration from the environment, then apply overrides.
 */
export function loadRuntimeConfig(overrides: RuntimeOverrides = {}, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const raw = { ...defined(fromEnv(env)), ...defined(overrides) };
  const result = runtimeConfigSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid runtime configuration');
    throw new ConfigError('environment', result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`));
  }

  log.debug(
    {
      brokerUrl: result.data.brokerUrl,
      configPath: result.data.configPath,
      positionLog: result.data.positionLogEnabled ? result.data.positionLogPath : null,
    },
    'Runtime configuration loaded',
  );
  return result.data;
}
