import { pino, type Logger as PinoLogger, type LevelWithSilent } from 'pino';

export type LogLevel = LevelWithSilent;

export type Logger = PinoLogger;

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Level from LOG_LEVEL, falling back to info. */
export function resolveLogLevel(raw?: string): LogLevel {
  const level = raw?.trim().toLowerCase();
  return level && isLogLevel(level) ? level : 'info';
}

let baseLogger: Logger | null = null;

function getBaseLogger(): Logger {
  if (!baseLogger) {
    baseLogger = pino({
      level: resolveLogLevel(process.env.LOG_LEVEL),
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }
  return baseLogger;
}

/**
 * Child logger for one component. Structured fields go first:
 * `log.info({ vmIdentity, stage }, 'message')`.
 */
export function createLogger(service: string): Logger {
  return getBaseLogger().child({ service });
}

/** Drop the shared base logger so the next call re-reads LOG_LEVEL. */
export function resetLoggers(): void {
  baseLogger = null;
}
