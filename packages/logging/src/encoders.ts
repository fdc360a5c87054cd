import { basename, dirname, sep } from 'node:path';
import pretty from 'pino-pretty';
import type pino from 'pino';
import { componentFields } from './fields';
import { ERROR_LEVEL_VALUE, PANIC_LEVEL_VALUE } from './levels';
import type { Logger } from './logger';

const LEVEL_KEY = 'level';
const MESSAGE_KEY = 'msg';
const CALLER_KEY = 'caller';
const TIME_KEY = 'time';
const STACKTRACE_KEY = 'stacktrace';

/**
 * Wall-clock time in nanoseconds since the Unix epoch.
 */
export type Clock = () => bigint;

const NANOS_PER_MILLI = 1_000_000n;

// Anchors the monotonic clock to the wall clock once per process.
const epochOffset = BigInt(Date.now()) * NANOS_PER_MILLI - process.hrtime.bigint();

export const systemClock: Clock = () => epochOffset + process.hrtime.bigint();

/**
 * Whole milliseconds since the epoch; bigint division truncates toward zero.
 */
export function epochMillis(nanos: bigint): bigint {
  return nanos / NANOS_PER_MILLI;
}

/**
 * pino timestamp function writing `time` as integer epoch milliseconds.
 */
export function epochMillisTimestamp(clock: Clock): () => string {
  return () => `,"${TIME_KEY}":${epochMillis(clock())}`;
}

export function jsonEncoder(clock: Clock) {
  return {
    messageKey: MESSAGE_KEY,
    timestamp: epochMillisTimestamp(clock),
    formatters: {
      level: (label: string) => ({ [LEVEL_KEY]: label }),
    },
  };
}

export interface PrettyEncoderOptions {
  colorize: boolean;
  destination?: pino.DestinationStream;
}

export function prettyEncoder({ colorize, destination }: PrettyEncoderOptions) {
  return pretty({
    colorize,
    destination: destination ?? 1,
    sync: true,
    messageKey: MESSAGE_KEY,
    timestampKey: TIME_KEY,
    translateTime: 'SYS:HH:MM:ss.l',
    ignore: 'pid,hostname',
    customLevels: `panic:${PANIC_LEVEL_VALUE}`,
    useOnlyCustomProps: false,
  });
}

const pinoFrame = `${sep}node_modules${sep}pino${sep}`;
const locationPattern = /([^\s()]+):(\d+):\d+\)?$/;

function callerFrames(): string[] {
  const limit = Error.stackTraceLimit;
  let stack: string;
  Error.stackTraceLimit = Infinity;
  try {
    stack = new Error().stack ?? '';
  } finally {
    Error.stackTraceLimit = limit;
  }
  return stack
    .split('\n')
    .slice(1)
    .map((frame) => frame.trim())
    .filter((frame) => !frame.includes(pinoFrame) && !frame.includes(__filename));
}

/**
 * Formats a stack frame as `dir/file:line`.
 */
export function shortCaller(frame: string): string | undefined {
  const match = locationPattern.exec(frame);
  if (!match) {
    return undefined;
  }
  const [, file, line] = match;
  return `${basename(dirname(file))}/${basename(file)}:${line}`;
}

/**
 * pino mixin for debug loggers: adds the call site to every record and the
 * stack to records at error severity or above.
 */
export function callSiteMixin(_mergeObject: object, level: number): object {
  const frames = callerFrames();
  const fields: Record<string, string> = {};

  const caller = frames.length > 0 ? shortCaller(frames[0]) : undefined;
  if (caller) {
    fields[CALLER_KEY] = caller;
  }
  if (level >= ERROR_LEVEL_VALUE) {
    fields[STACKTRACE_KEY] = frames.join('\n');
  }

  return fields;
}

/**
 * pino mixin shared by every logger: the component name of named loggers,
 * plus the call site when debugging.
 */
export function recordMixin(debug: boolean) {
  return (mergeObject: object, level: number, logger: Logger): object => ({
    ...componentFields(logger),
    ...(debug ? callSiteMixin(mergeObject, level) : {}),
  });
}
