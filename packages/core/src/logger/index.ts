export type { LoggerOptions, LogLevel, LogMeta, ChalkColor } from './logger.js';
export { Logger, logger, maskSecrets } from './logger.js';
