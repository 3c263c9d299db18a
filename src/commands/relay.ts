import { createRelayHandler } from '../core/relay.js';
import { startRelayServer } from '../core/relay-server.js';
import { MemoryRateLimitStore } from '../core/rate-limit.js';
import { configureLogger, logger } from '../utils/logger.js';

export interface RelayOptions {
  port: number;
  host?: string;
  apiKey?: string;
  teamId?: string;
  projectId?: string;
  token?: string;
  rateLimit: number | false;
  rateWindow: number;
  trustProxy?: boolean;
  verbose?: boolean;
}

export async function relayCommand(options: RelayOptions): Promise<void> {
  configureLogger({ verbose: options.verbose });

  if (!options.apiKey || !options.teamId || !options.projectId) {
    logger.warn('Relay is missing --api-key, --team-id or --project-id; requests will fail with 500.');
  }
  if (!options.token) {
    logger.warn('No --token set; the relay accepts reports from anyone.');
  }

  const handler = createRelayHandler(
    {
      apiKey: options.apiKey,
      teamId: options.teamId,
      projectId: options.projectId,
      token: options.token,
      rateLimit: options.rateLimit === false
        ? undefined
        : { max: options.rateLimit, windowSeconds: options.rateWindow },
    },
    { store: options.rateLimit === false ? undefined : new MemoryRateLimitStore() },
  );

  const server = await startRelayServer(handler, {
    port: options.port,
    host: options.host,
    trustProxy: options.trustProxy,
  });
  logger.success(`Relay listening on ${options.host ?? '0.0.0.0'}:${options.port}`);
  if (options.rateLimit !== false) {
    logger.dim(`Rate limit: ${options.rateLimit} reports per ${options.rateWindow}s per IP`);
  }
  if (options.trustProxy) {
    logger.dim('Client IPs are read from X-Forwarded-For.');
  }
  logger.dim('Press Ctrl+C to stop.');

  // Graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down relay...');
    server.close((err) => {
      if (err) {
        logger.error(`Relay shutdown failed: ${err.message}`);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
