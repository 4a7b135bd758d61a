import { ConfigError } from '../errors';
import type { ServerDirectory, ServerEnvironment } from '../schemas/config-schema';

export const ENDPOINT_PATHS = {
  submit: '/BatchScreensXML.cfm',
  status: '/ReportStatusFetch.cfm',
  download: '/ReportPDFFetch.cfm',
} as const;

export type ScreeningOperation = keyof typeof ENDPOINT_PATHS;

export function resolveEndpoint(
  servers: ServerDirectory,
  environment: ServerEnvironment,
  operation: ScreeningOperation
): string {
  const baseUrl = servers[environment];
  if (!baseUrl) {
    throw new ConfigError(`No server URL configured for environment "${environment}"`);
  }
  return `${baseUrl.replace(/\/+$/, '')}${ENDPOINT_PATHS[operation]}`;
}
