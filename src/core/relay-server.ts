import { createServer, type IncomingMessage, type Server } from 'node:http';
import { MAX_RELAY_BODY_BYTES } from '../constants.js';
import { logger } from '../utils/logger.js';
import type { RelayHandler } from '../types/relay.js';

export interface RelayServerOptions {
  port: number;
  host?: string;
  trustProxy?: boolean; // read the client IP from x-forwarded-for
  maxBodyBytes?: number;
}

/** The parts of `ServerResponse` the relay writes to. */
export interface ResponseSink {
  readonly headersSent: boolean;
  writeHead(status: number, headers: Record<string, string>): unknown;
  end(body: string): unknown;
}

export class PayloadTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

/**
 * The socket's peer address. The first x-forwarded-for hop is used instead
 * only when `trustProxy` is set, since any caller can send that header.
 */
export function clientIpOf(req: IncomingMessage, trustProxy = false): string | undefined {
  if (trustProxy) {
    const forwarded = req.headers['x-forwarded-for'];
    const first = (Array.isArray(forwarded) ? forwarded[0] : forwarded)?.split(',')[0]?.trim();
    if (first) return first;
  }
  return req.socket.remoteAddress || undefined;
}

/**
 * Convert a Node request into a fetch `Request`. Bodies over `maxBodyBytes`
 * are drained without being kept and reject with `PayloadTooLargeError`.
 */
export async function toRequest(
  req: IncomingMessage,
  maxBodyBytes: number = MAX_RELAY_BODY_BYTES,
): Promise<Request> {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    for (const v of Array.isArray(value) ? value : [value]) {
      headers.append(name, v);
    }
  }

  const method = req.method ?? 'GET';
  let body: string | undefined;
  if (method !== 'GET' && method !== 'HEAD') {
    if (Number(req.headers['content-length'] ?? 0) > maxBodyBytes) {
      throw new PayloadTooLargeError(maxBodyBytes);
    }
    const chunks: Buffer[] = [];
    let size = 0;
    for await (const chunk of req) {
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buf.length;
      if (size <= maxBodyBytes) chunks.push(buf);
    }
    if (size > maxBodyBytes) throw new PayloadTooLargeError(maxBodyBytes);
    body = Buffer.concat(chunks).toString('utf8');
  }

  return new Request(`http://${req.headers.host ?? 'localhost'}${req.url ?? '/'}`, {
    method,
    headers,
    body,
  });
}

async function writeResponse(res: ResponseSink, response: Response): Promise<void> {
  const body = await response.text();
  res.writeHead(response.status, Object.fromEntries(response.headers.entries()));
  res.end(body);
}

function writeText(res: ResponseSink, status: number, body: string): void {
  if (!res.headersSent) {
    res.writeHead(status, { 'Content-Type': 'text/plain; charset=utf-8' });
  }
  res.end(body);
}

/**
 * Run one Node request through the handler and write its response.
 * Never rejects: failures become 413 or 500.
 */
export async function serveRequest(
  handler: RelayHandler,
  req: IncomingMessage,
  res: ResponseSink,
  options: Pick<RelayServerOptions, 'trustProxy' | 'maxBodyBytes'> = {},
): Promise<void> {
  try {
    const request = await toRequest(req, options.maxBodyBytes);
    const response = await handler(request, clientIpOf(req, options.trustProxy));
    await writeResponse(res, response);
  } catch (err) {
    if (err instanceof PayloadTooLargeError) {
      logger.warn(`Rejected relay request: ${err.message}`);
      writeText(res, 413, 'Payload too large');
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`Relay request failed: ${message}`);
    writeText(res, 500, 'Internal error');
  }
}

/**
 * Serve a relay handler over Node's HTTP server. Resolves once listening.
 */
export function startRelayServer(handler: RelayHandler, options: RelayServerOptions): Promise<Server> {
  const server = createServer((req, res) => {
    void serveRequest(handler, req, res, options);
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}
