import { hostname as osHostname } from 'node:os';
import type { Logger } from './logger';
import type { LogFields } from './request-context';

export const WG_CLOUD_ENVIRONMENT_ID = 'WG_CLOUD_ENVIRONMENT_ID';
export const WG_CLOUD_PROJECT_ID = 'WG_CLOUD_PROJECT_ID';
export const WG_CLOUD_DEPLOYMENT_ID = 'WG_CLOUD_DEPLOYMENT_ID';

export interface CloudEnvironment {
  environmentId?: string;
  projectId?: string;
  deploymentId?: string;
}

export type HostnameResolver = () => string;

/**
 * Reads the cloud identifiers from an environment map. Empty values count as
 * absent.
 */
export function readCloudEnvironment(
  env: NodeJS.ProcessEnv = process.env,
): CloudEnvironment {
  const cloud: CloudEnvironment = {};
  const environmentId = env[WG_CLOUD_ENVIRONMENT_ID];
  if (environmentId) {
    cloud.environmentId = environmentId;
  }
  const projectId = env[WG_CLOUD_PROJECT_ID];
  if (projectId) {
    cloud.projectId = projectId;
  }
  const deploymentId = env[WG_CLOUD_DEPLOYMENT_ID];
  if (deploymentId) {
    cloud.deploymentId = deploymentId;
  }
  return cloud;
}

export function resolveHostname(
  resolve: HostnameResolver = osHostname,
): string {
  try {
    return resolve() || 'unknown';
  } catch {
    return 'unknown';
  }
}

export function baseFields(
  cloud: CloudEnvironment,
  resolve?: HostnameResolver,
): LogFields {
  const fields: LogFields = {
    hostname: resolveHostname(resolve),
    pid: process.pid,
  };

  if (cloud.environmentId) {
    fields.environmentID = cloud.environmentId;
  }
  if (cloud.projectId) {
    fields.projectID = cloud.projectId;
  }
  // deploymentID follows the project id's presence, not its own.
  if (cloud.projectId) {
    fields.deploymentID = cloud.deploymentId ?? '';
  }

  return fields;
}

/**
 * Derives a logger that carries hostname, pid and the cloud identifiers on
 * every record.
 */
export function attachBaseFields(
  logger: Logger,
  cloud: CloudEnvironment,
  resolve?: HostnameResolver,
): Logger {
  return logger.child(baseFields(cloud, resolve));
}
