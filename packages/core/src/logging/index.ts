export { Logger, silentLogger, redactSecrets, createTraceId } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
