export { Logger, redactSecrets, createSilentLogger } from './logger.js';
export type { LogLevel, LogFormat, LogSink, LoggerOptions } from './logger.js';
