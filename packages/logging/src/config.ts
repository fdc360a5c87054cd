import { z, ZodError } from 'zod';
import { readCloudEnvironment, type CloudEnvironment } from './base-fields';
import { InvalidLoggerConfigError, type ConfigIssue } from './errors';
import { findLogLevel, type Level } from './levels';

export interface LoggerConfig {
  pretty: boolean;
  debug: boolean;
  level: Level;
  cloud: CloudEnvironment;
}

const flagSchema = z
  .preprocess(
    (val) => (val === '' ? undefined : val),
    z
      .enum(['true', 'false', '1', '0'], {
        errorMap: () => ({ message: 'must be one of true, false, 1, 0' }),
      })
      .optional(),
  )
  .transform((val) => val === 'true' || val === '1');

const loggerEnvSchema = z.object({
  LOG_LEVEL: z
    .string()
    .trim()
    .optional()
    .transform((val) => (val === undefined || val === '' ? 'info' : val)),
  LOG_PRETTY: flagSchema,
  LOG_DEBUG: flagSchema,
});

/**
 * Reads logger settings from an environment map.
 * Malformed flags throw InvalidLoggerConfigError; an unknown LOG_LEVEL throws
 * UnknownLogLevelError so the caller can choose to fall back to a default.
 */
export function loadLoggerConfig(
  env: NodeJS.ProcessEnv = process.env,
): LoggerConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    throw new InvalidLoggerConfigError(formatIssues(result.error));
  }

  return {
    pretty: result.data.LOG_PRETTY,
    debug: result.data.LOG_DEBUG,
    level: findLogLevel(result.data.LOG_LEVEL),
    cloud: readCloudEnvironment(env),
  };
}

function formatIssues(error: ZodError): ConfigIssue[] {
  return error.issues
    .map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join('.') : issue.code,
      message: issue.message,
    }))
    .sort((a, b) =>
      a.path !== b.path
        ? a.path.localeCompare(b.path)
        : a.message.localeCompare(b.message),
    );
}
