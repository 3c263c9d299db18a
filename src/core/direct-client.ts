import { formatDescription } from './description.js';
import { ApiError, ParseError } from './errors.js';
import { postJson, getPath, isRecord } from './transport.js';
import { ISSUE_CREATE_MUTATION, LINEAR_API_URL } from '../constants.js';
import { logger } from '../utils/logger.js';
import type { IssueCreateInput, IssueReporter, SystemInfo } from '../types/issue.js';

export interface DirectClientOptions {
  endpoint?: string;
}

/**
 * Calls Linear's GraphQL API with an API key.
 */
export class DirectClient implements IssueReporter {
  readonly endpoint: string;

  constructor(
    readonly apiKey: string,
    readonly teamId: string,
    readonly projectId: string,
    options: DirectClientOptions = {},
  ) {
    this.endpoint = options.endpoint ?? LINEAR_API_URL;
  }

  /**
   * Create a bug report issue. Resolves to the URL of the created issue.
   */
  async createIssue(title: string, description?: string, systemInfo: SystemInfo = []): Promise<string> {
    const input: IssueCreateInput = {
      teamId: this.teamId,
      projectId: this.projectId,
      title,
      description: formatDescription(description, systemInfo),
    };

    // Linear takes the raw key, not a Bearer token
    const res = await postJson(
      this.endpoint,
      { Authorization: this.apiKey },
      { query: ISSUE_CREATE_MUTATION, variables: { input } },
    );

    if (!res.ok) {
      throw new ApiError(`${res.status}: ${res.body}`, res.status);
    }

    // GraphQL reports business errors inside a 200
    if (isRecord(res.data) && 'errors' in res.data) {
      throw new ApiError(JSON.stringify(res.data.errors));
    }

    const issue = getPath(res.data, 'data', 'issueCreate', 'issue');
    const url = getPath(issue, 'url');
    if (typeof url !== 'string') {
      throw new ParseError('Linear response missing issue url');
    }
    const identifier = getPath(issue, 'identifier');

    logger.info(`Created Linear issue ${typeof identifier === 'string' ? identifier : 'unknown'}: ${url}`);
    return url;
  }
}

/**
 * Create a client that calls Linear's GraphQL API directly.
 */
export function direct(apiKey: string, teamId: string, projectId: string, options?: DirectClientOptions): DirectClient {
  return new DirectClient(apiKey, teamId, projectId, options);
}
