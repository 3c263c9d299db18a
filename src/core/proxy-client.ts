import { formatDescription } from './description.js';
import { ParseError, ProxyError } from './errors.js';
import { postJson, getPath } from './transport.js';
import { logger } from '../utils/logger.js';
import type { IssueReporter, SystemInfo } from '../types/issue.js';

/**
 * Posts bug reports to a relay that holds the Linear credentials.
 * Instances are immutable; `withToken` returns a new client.
 */
export class ProxyClient implements IssueReporter {
  constructor(
    readonly url: string,
    readonly token?: string,
  ) {}

  /** Set a bearer token for relay authentication. */
  withToken(token: string): ProxyClient {
    return new ProxyClient(this.url, token);
  }

  async createIssue(title: string, description?: string, systemInfo: SystemInfo = []): Promise<string> {
    const headers: Record<string, string> = {};
    if (this.token !== undefined) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    // Team and project are supplied by the relay
    const res = await postJson(this.url, headers, {
      title,
      description: formatDescription(description, systemInfo),
    });

    if (!res.ok) {
      throw new ProxyError(res.status, res.body);
    }

    const url = getPath(res.data, 'url');
    if (typeof url !== 'string') {
      throw new ParseError('proxy response missing url');
    }

    logger.info(`Created Linear issue via proxy: ${url}`);
    return url;
  }
}

/**
 * Create a client that posts bug reports to a relay URL.
 */
export function proxy(url: string): ProxyClient {
  return new ProxyClient(url);
}
