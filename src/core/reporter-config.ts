import { direct } from './direct-client.js';
import { proxy } from './proxy-client.js';
import { ConfigError } from './errors.js';
import type { IssueReporter, ReporterConfig } from '../types/issue.js';

export interface ReporterInput {
  proxyUrl?: string;
  proxyToken?: string;
  apiKey?: string;
  teamId?: string;
  projectId?: string;
}

/**
 * Pick the reporting mode from flags/env. A proxy URL wins over an API key.
 */
export function resolveReporterConfig(input: ReporterInput): ReporterConfig {
  if (input.proxyUrl) {
    return { mode: 'proxy', url: input.proxyUrl, token: input.proxyToken || undefined };
  }

  if (input.apiKey) {
    if (!input.teamId) {
      throw new ConfigError('--team-id is required for direct mode');
    }
    if (!input.projectId) {
      throw new ConfigError('--project-id is required for direct mode');
    }
    return { mode: 'direct', apiKey: input.apiKey, teamId: input.teamId, projectId: input.projectId };
  }

  throw new ConfigError('Provide either --proxy-url / HOTLINE_PROXY_URL or --api-key / HOTLINE_API_KEY');
}

export function createReporter(config: ReporterConfig): IssueReporter {
  if (config.mode === 'proxy') {
    const client = proxy(config.url);
    return config.token ? client.withToken(config.token) : client;
  }
  return direct(config.apiKey, config.teamId, config.projectId);
}
