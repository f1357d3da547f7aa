import { runCli } from './cli.js';
import { logger } from '@crane-cell/shared';

runCli().catch((err: unknown) => {
  logger.error({ err }, 'Fatal error');
  process.exit(1);
});
