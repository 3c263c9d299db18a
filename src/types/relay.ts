import type { IssueReporter } from './issue.js';

export interface RelayConfig {
  apiKey?: string;
  teamId?: string;
  projectId?: string;
  token?: string; // bearer token callers must send
  rateLimit?: {
    max: number;
    windowSeconds: number;
  };
}

export interface RateLimitStore {
  get(key: string): Promise<string | null>;
  put(key: string, value: string, options: { expirationTtl: number }): Promise<void>;
}

export interface RelayDeps {
  store?: RateLimitStore;
  reporter?: IssueReporter;
}

export interface BugReportRequest {
  title: string;
  description: string;
}

export type RelayHandler = (request: Request, clientIp?: string) => Promise<Response>;
