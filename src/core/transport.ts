import { HttpError, ParseError } from './errors.js';
import { logger } from '../utils/logger.js';

export type TransportResponse =
  | { ok: true; status: number; data: unknown }
  | { ok: false; status: number; body: string };

/**
 * POST a JSON body once. Non-2xx statuses are returned, not thrown, since
 * the direct and proxy clients classify them differently.
 */
export async function postJson(
  url: string,
  headers: Record<string, string>,
  body: unknown,
): Promise<TransportResponse> {
  let res: Response;
  try {
    res = await fetch(url, {
      method: 'POST',
      headers: {
        ...headers,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
    });
  } catch (err) {
    throw new HttpError(err);
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    return { ok: false, status: res.status, body: text };
  }

  let text: string;
  try {
    text = await res.text();
  } catch (err) {
    throw new ParseError(err instanceof Error ? err.message : String(err));
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ParseError(err instanceof Error ? err.message : String(err));
  }

  logger.debug(`Response from ${url}: ${JSON.stringify(data)}`);
  return { ok: true, status: res.status, data };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk nested objects by key, returning undefined as soon as a step is not an object.
 */
export function getPath(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}
