export * from './types.js';
export * from './errors.js';
export * from './topics.js';
export { parseCellConfig, loadCellConfig, validateRoutingPlan } from './cell-config.js';
export type { CellFile } from './cell-config.js';
export { createLogger, logger } from './logger.js';
export type { Logger } from './logger.js';
