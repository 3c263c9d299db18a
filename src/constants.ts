export const VERSION = '0.1.0';

// Linear GraphQL endpoint used by direct mode
export const LINEAR_API_URL = 'https://api.linear.app/graphql';

export const ISSUE_CREATE_MUTATION = `mutation IssueCreate($input: IssueCreateInput!) {
  issueCreate(input: $input) {
    success
    issue {
      id
      identifier
      url
    }
  }
}`;

// Environment fallbacks for CLI options
export const ENV = {
  apiKey: 'HOTLINE_API_KEY',
  proxyUrl: 'HOTLINE_PROXY_URL',
  proxyToken: 'HOTLINE_PROXY_TOKEN',
  teamId: 'HOTLINE_TEAM_ID',
  projectId: 'HOTLINE_PROJECT_ID',
  relayToken: 'HOTLINE_RELAY_TOKEN',
  port: 'PORT',
} as const;

// Relay defaults
export const DEFAULT_RELAY_PORT = 8787;
export const RATE_LIMIT_MAX = 20;
export const RATE_LIMIT_WINDOW_SECONDS = 600; // 10 minutes
export const MAX_RELAY_BODY_BYTES = 64 * 1024;
