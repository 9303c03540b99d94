export { createConsoleLogger, noopLogger, redactMeta } from './logger.js';
export type { Logger, LogLevel, ConsoleLoggerOptions } from './logger.js';
