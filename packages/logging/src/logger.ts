import pino from 'pino';
import {
  attachBaseFields,
  readCloudEnvironment,
  type CloudEnvironment,
  type HostnameResolver,
} from './base-fields';
import {
  epochMillisTimestamp,
  jsonEncoder,
  prettyEncoder,
  recordMixin,
  systemClock,
  type Clock,
} from './encoders';
import { customLevels, type Level } from './levels';

export type Logger = pino.Logger<'panic'>;

export interface LoggerOptions {
  pretty: boolean;
  debug: boolean;
  level: Level;
  /** Defaults to the WG_CLOUD_* variables of the current process. */
  cloud?: CloudEnvironment;
  hostname?: HostnameResolver;
  clock?: Clock;
  /** Defaults to standard output. */
  destination?: pino.DestinationStream;
  /** Pretty output only. Defaults to whether stdout is a terminal. */
  colorize?: boolean;
}

/**
 * Structured logger for the whole system.
 *
 * Pretty loggers are meant for terminals and carry no base fields. JSON
 * loggers carry hostname, pid and the cloud identifiers on every record.
 * Debug loggers add the call site, and a stacktrace from `error` up.
 */
export function createLogger(options: LoggerOptions): Logger {
  const clock = options.clock ?? systemClock;

  if (options.pretty) {
    return pino(
      {
        level: options.level,
        customLevels,
        base: undefined,
        timestamp: epochMillisTimestamp(clock),
        mixin: recordMixin(options.debug),
      },
      prettyEncoder({
        colorize: options.colorize ?? process.stdout.isTTY === true,
        destination: options.destination,
      }),
    );
  }

  const logger = pino(
    {
      ...jsonEncoder(clock),
      level: options.level,
      customLevels,
      base: undefined,
      mixin: recordMixin(options.debug),
    },
    options.destination ?? pino.destination({ dest: 1, sync: true }),
  );

  return attachBaseFields(
    logger,
    options.cloud ?? readCloudEnvironment(),
    options.hostname,
  );
}
