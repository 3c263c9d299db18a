/**
 * Failure kinds for issue creation. Each class carries a literal `kind`
 * so callers can switch on it instead of matching messages.
 */

/** The HTTP exchange itself failed (DNS, refused connection, TLS, abort). */
export class HttpError extends Error {
  readonly kind = 'http' as const;

  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'HttpError';
  }
}

/** Linear rejected the mutation, by HTTP status or an embedded `errors` field. */
export class ApiError extends Error {
  readonly kind = 'api' as const;

  constructor(
    readonly detail: string,
    readonly status?: number,
  ) {
    super(`Linear API error: ${detail}`);
    this.name = 'ApiError';
  }
}

/** The relay answered with a non-2xx status. `body` is kept verbatim. */
export class ProxyError extends Error {
  readonly kind = 'proxy' as const;

  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`Proxy returned error ${status}: ${body}`);
    this.name = 'ProxyError';
  }
}

/** A response was not valid JSON or lacked a required field. */
export class ParseError extends Error {
  readonly kind = 'parse' as const;

  constructor(readonly detail: string) {
    super(`Failed to parse response: ${detail}`);
    this.name = 'ParseError';
  }
}

export type ReportError = HttpError | ApiError | ProxyError | ParseError;

export function isReportError(err: unknown): err is ReportError {
  return (
    err instanceof HttpError ||
    err instanceof ApiError ||
    err instanceof ProxyError ||
    err instanceof ParseError
  );
}

/** CLI/env input that cannot produce a client. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * One line for the terminal, distinguishing transport failure from remote
 * rejection from relay rejection.
 */
export function describeError(err: ReportError): string {
  switch (err.kind) {
    case 'http':
      return `Could not reach the server: ${err.message}`;
    case 'api':
      return `Linear rejected the request: ${err.detail}`;
    case 'proxy':
      return `Relay rejected the request (${err.status}): ${err.body}`;
    case 'parse':
      return `Unexpected response: ${err.detail}`;
  }
}
