export {
  createLogger,
  type Logger,
  type LoggerOptions,
} from './logger';
export { findLogLevel, type Level } from './levels';
export {
  REQUEST_ID_HEADER,
  RequestContext,
  contextWithRequestId,
  requestIdFromContext,
  withRequestId,
  withRequestIdFromContext,
  type LogFields,
} from './request-context';
export {
  WG_CLOUD_DEPLOYMENT_ID,
  WG_CLOUD_ENVIRONMENT_ID,
  WG_CLOUD_PROJECT_ID,
  attachBaseFields,
  readCloudEnvironment,
  type CloudEnvironment,
  type HostnameResolver,
} from './base-fields';
export { epochMillis, systemClock, type Clock } from './encoders';
export { named, withDuration } from './fields';
export { loadLoggerConfig, type LoggerConfig } from './config';
export {
  InvalidLoggerConfigError,
  UnknownLogLevelError,
  type ConfigIssue,
} from './errors';
export * from './nest';
