/** Ordered key/value diagnostics appended to an issue body. Keys may repeat. */
export type SystemInfo = ReadonlyArray<readonly [string, string]>;

/**
 * Anything that can file an issue and hand back its URL.
 * Implemented independently by the direct and proxy clients.
 */
export interface IssueReporter {
  createIssue(title: string, description?: string, systemInfo?: SystemInfo): Promise<string>;
}

export interface IssueCreateInput {
  teamId: string;
  projectId: string;
  title: string;
  description: string;
}

export type ReporterConfig =
  | { mode: 'proxy'; url: string; token?: string }
  | { mode: 'direct'; apiKey: string; teamId: string; projectId: string };
