import { direct } from './direct-client.js';
import { isReportError } from './errors.js';
import { isRecord } from './transport.js';
import { RATE_LIMIT_MAX, RATE_LIMIT_WINDOW_SECONDS } from '../constants.js';
import { logger } from '../utils/logger.js';
import type { BugReportRequest, RelayConfig, RelayDeps, RelayHandler } from '../types/relay.js';

function text(body: string, status: number): Response {
  return new Response(body, {
    status,
    headers: { 'Content-Type': 'text/plain; charset=utf-8' },
  });
}

function parseBugReport(value: unknown): BugReportRequest | null {
  if (!isRecord(value)) return null;
  const { title, description } = value;
  if (typeof title !== 'string' || typeof description !== 'string') return null;
  if (!title || !description) return null;
  return { title, description };
}

/**
 * Build the relay's request handler. The relay owns the Linear credentials
 * and the team/project ids; callers only send a title and description.
 */
export function createRelayHandler(config: RelayConfig, deps: RelayDeps = {}): RelayHandler {
  const max = config.rateLimit?.max ?? RATE_LIMIT_MAX;
  const windowSeconds = config.rateLimit?.windowSeconds ?? RATE_LIMIT_WINDOW_SECONDS;

  return async (request, clientIp) => {
    if (request.method !== 'POST') {
      return text('Method not allowed', 405);
    }

    if (config.token && request.headers.get('Authorization') !== `Bearer ${config.token}`) {
      return text('Unauthorized', 401);
    }

    if (!clientIp) {
      logger.warn('Relay request without a client IP; skipping rate limit');
    }

    if (deps.store && clientIp) {
      const key = `rate:${clientIp}`;
      const count = parseInt((await deps.store.get(key)) ?? '0', 10);
      if (count >= max) {
        logger.warn(`Rate limit exceeded for ${clientIp}`);
        return text('Rate limit exceeded', 429);
      }
      await deps.store.put(key, String(count + 1), { expirationTtl: windowSeconds });
    }

    let payload: unknown;
    try {
      payload = await request.json();
    } catch {
      return text('Invalid JSON', 400);
    }

    const report = parseBugReport(payload);
    if (!report) {
      return text('Missing title or description', 400);
    }

    // Team and project come from the relay's own config, never the caller
    const { apiKey, teamId, projectId } = config;
    if (!apiKey || !teamId || !projectId) {
      return text('Proxy not configured', 500);
    }

    const reporter = deps.reporter ?? direct(apiKey, teamId, projectId);

    try {
      const url = await reporter.createIssue(report.title, report.description);
      return new Response(JSON.stringify({ url }), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      });
    } catch (err) {
      if (!isReportError(err)) throw err;
      logger.error(`Relay failed to create issue: ${err.message}`);
      return text(err.message, 502);
    }
  };
}
