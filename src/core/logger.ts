import pino from 'pino';

// ============================================
// Logger Configuration
// ============================================

const DEFAULT_LEVEL = import.meta.env.MODE === 'test' ? 'silent' : 'info';

export type LogLevel = pino.LevelWithSilent;

export const LOG_LEVELS: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Root logger. In the browser pino writes to the console; under Node
 * (tests) it writes JSON lines to stdout.
 */
export const logger = pino({
  level: DEFAULT_LEVEL,
  base: { app: 'whack-a-zombie' },
  browser: { asObject: false },
});

/**
 * Child logger tagged with the subsystem it belongs to.
 */
export function createLogger(component: string): pino.Logger {
  return logger.child({ component });
}

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
