/**
 * File bug reports to Linear from an application.
 *
 * Two modes: call the Linear API directly, or go through a relay that holds
 * the API key (recommended for distributed binaries).
 *
 * ```ts
 * const url = await proxy('https://relay.example.com')
 *   .withToken('relay-token')
 *   .createIssue('crash on startup', 'details...', [['OS', 'darwin']]);
 * ```
 */
export { direct, DirectClient, type DirectClientOptions } from './core/direct-client.js';
export { proxy, ProxyClient } from './core/proxy-client.js';
export { formatDescription } from './core/description.js';
export {
  ApiError,
  ConfigError,
  HttpError,
  ParseError,
  ProxyError,
  describeError,
  isReportError,
  type ReportError,
} from './core/errors.js';
export { createReporter, resolveReporterConfig, type ReporterInput } from './core/reporter-config.js';
export { createRelayHandler } from './core/relay.js';
export {
  startRelayServer,
  serveRequest,
  PayloadTooLargeError,
  type RelayServerOptions,
  type ResponseSink,
} from './core/relay-server.js';
export { MemoryRateLimitStore } from './core/rate-limit.js';
export type { IssueReporter, ReporterConfig, SystemInfo } from './types/issue.js';
export type { RateLimitStore, RelayConfig, RelayDeps, RelayHandler } from './types/relay.js';
