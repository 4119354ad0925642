import { logger } from '@appium/support';

type LogLevel = ReturnType<typeof logger.getLogger>['level'];

const LOG_LEVELS: readonly LogLevel[] = [
  'silly',
  'verbose',
  'debug',
  'info',
  'http',
  'warn',
  'error',
];

const LOG_LEVEL: LogLevel =
  LOG_LEVELS.find((level) => level === process.env.LOG_LEVEL) ?? 'info';

export function getLogger(name: string) {
  const log = logger.getLogger(name);
  log.level = LOG_LEVEL;
  return log;
}
