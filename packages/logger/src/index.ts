export { createLogger, resetLoggers, resolveLogLevel, type Logger, type LogLevel } from './logger.js';
