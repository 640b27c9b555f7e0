export * from './delegate/index.js';
export { configure, getConfig, loadConfig } from './config.js';
export { DelegateLogger, formatEntry, logger } from './logger.js';
export type { DelegateConfig, LogEntry, LogMetadata, LogType } from './types.js';
export { DelegateConfigSchema, LogTypeSchema } from './types.js';
