/**
 * Subsystem loggers
 *
 * Every component logs through a named child of one root tslog logger, so a
 * run's output can be filtered by area (`target/expectation`,
 * `target/orchestrator`, ...).
 *
 * HARNESS_LOG_LEVEL: debug | info | warn | error (default info)
 * HARNESS_LOG_FORMAT: pretty | json | hidden (default pretty)
 */

import { Logger, type ILogObj } from 'tslog';

export type LogMeta = Record<string, unknown>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogFormat = 'pretty' | 'json' | 'hidden';

const LEVEL_NUMBERS: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

export interface SubsystemLogger {
  readonly subsystem: string;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

function resolveLevel(value: string | undefined): number {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return LEVEL_NUMBERS[normalized];
  }
  return LEVEL_NUMBERS.info;
}

function resolveFormat(value: string | undefined): LogFormat {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'json' || normalized === 'hidden') {
    return normalized;
  }
  return 'pretty';
}

const rootLogger = new Logger<ILogObj>({
  name: 'kmod-harness',
  type: resolveFormat(process.env.HARNESS_LOG_FORMAT),
  minLevel: resolveLevel(process.env.HARNESS_LOG_LEVEL),
});

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const logger = rootLogger.getSubLogger({ name: subsystem });

  const emit = (level: LogLevel) => (message: string, meta?: LogMeta): void => {
    if (meta) {
      logger[level](message, meta);
    } else {
      logger[level](message);
    }
  };

  return {
    subsystem,
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
