import { UnknownLogLevelError } from './errors';

export type Level = 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'panic';

/**
 * Severity above pino's built-in `fatal` (60).
 */
export const PANIC_LEVEL_VALUE = 70;

export const customLevels = { panic: PANIC_LEVEL_VALUE } as const;

/**
 * pino's numeric value for `error`; records at or above it carry a stacktrace
 * when the logger is built in debug mode.
 */
export const ERROR_LEVEL_VALUE = 50;

const levelsByName: ReadonlyMap<string, Level> = new Map<string, Level>([
  ['DEBUG', 'debug'],
  ['INFO', 'info'],
  ['WARNING', 'warn'],
  ['ERROR', 'error'],
  ['FATAL', 'fatal'],
  ['PANIC', 'panic'],
]);

/**
 * Maps a level name, in any letter case, to a logger level.
 * Throws UnknownLogLevelError for anything else.
 */
export function findLogLevel(name: string): Level {
  const level = levelsByName.get(name.toUpperCase());
  if (level === undefined) {
    throw new UnknownLogLevelError(name);
  }
  return level;
}
