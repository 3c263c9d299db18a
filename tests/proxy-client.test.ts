import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { proxy, ProxyClient } from '../src/core/proxy-client.js';
import { HttpError, ParseError, ProxyError } from '../src/core/errors.js';
import { logger } from '../src/utils/logger.js';

vi.mock('../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    dim: vi.fn(),
  },
}));

const mockFetch = vi.fn();
const RELAY_URL = 'https://relay.example.test/';

function textResponse(status: number, body: string) {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => body,
  };
}

function sentHeaders(call = 0): Record<string, string> {
  return mockFetch.mock.calls[call][1].headers;
}

describe('ProxyClient', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.clearAllMocks();
  });

  it('should return the url from the relay', async () => {
    mockFetch.mockResolvedValue(textResponse(200, '{"url":"https://x/EMP-99"}'));

    const url = await proxy(RELAY_URL).createIssue('Bug Report: test', 'desc', []);
    expect(url).toBe('https://x/EMP-99');
    expect(logger.info).toHaveBeenCalledWith('Created Linear issue via proxy: https://x/EMP-99');
  });

  it('should send a flat title/description payload', async () => {
    mockFetch.mockResolvedValue(textResponse(200, '{"url":"https://x/1"}'));

    await proxy(RELAY_URL).createIssue('Bug Report: test', 'desc', [['OS', 'linux']]);

    expect(mockFetch.mock.calls[0][0]).toBe(RELAY_URL);
    expect(JSON.parse(mockFetch.mock.calls[0][1].body)).toEqual({
      title: 'Bug Report: test',
      description: 'desc\n\n## System Info\n\n| Field | Value |\n|-------|-------|\n| OS | linux |',
    });
  });

  it('should send no Authorization header without a token', async () => {
    mockFetch.mockResolvedValue(textResponse(200, '{"url":"https://x/1"}'));

    await proxy(RELAY_URL).createIssue('t');
    expect(sentHeaders()).toEqual({ 'Content-Type': 'application/json' });
  });

  it('should send the bearer token on every call', async () => {
    mockFetch.mockResolvedValue(textResponse(200, '{"url":"https://x/1"}'));

    const client = proxy(RELAY_URL).withToken('t');
    await client.createIssue('first');
    await client.createIssue('second');

    expect(sentHeaders(0)).toEqual({ Authorization: 'Bearer t', 'Content-Type': 'application/json' });
    expect(sentHeaders(1)).toEqual({ Authorization: 'Bearer t', 'Content-Type': 'application/json' });
  });

  it('should keep only the last token and leave the original client untouched', async () => {
    mockFetch.mockResolvedValue(textResponse(200, '{"url":"https://x/1"}'));

    const original = proxy(RELAY_URL);
    const tokened = original.withToken('first-token').withToken('second-token');

    expect(tokened).toBeInstanceOf(ProxyClient);
    expect(tokened).not.toBe(original);
    expect(tokened.token).toBe('second-token');
    expect(original.token).toBeUndefined();

    await tokened.createIssue('t');
    await original.createIssue('t');
    expect(sentHeaders(0).Authorization).toBe('Bearer second-token');
    expect(sentHeaders(1)).not.toHaveProperty('Authorization');
  });

  it('should fail with ProxyError carrying the exact status and body', async () => {
    mockFetch.mockResolvedValue(textResponse(429, 'rate limited'));

    const err = await proxy(RELAY_URL).createIssue('t', 'desc').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProxyError);
    expect(err).toMatchObject({ kind: 'proxy', status: 429, body: 'rate limited' });
    expect(err).toHaveProperty('message', 'Proxy returned error 429: rate limited');
  });

  it('should keep a JSON error body verbatim', async () => {
    mockFetch.mockResolvedValue(textResponse(502, '{"error":"upstream"}'));

    await expect(proxy(RELAY_URL).createIssue('t')).rejects.toMatchObject({ status: 502, body: '{"error":"upstream"}' });
  });

  it('should fail with ParseError on malformed JSON', async () => {
    mockFetch.mockResolvedValue(textResponse(200, '<html>'));

    await expect(proxy(RELAY_URL).createIssue('t')).rejects.toBeInstanceOf(ParseError);
  });

  it('should fail with ParseError when url is missing', async () => {
    mockFetch.mockResolvedValue(textResponse(200, '{"id":"abc"}'));

    const err = await proxy(RELAY_URL).createIssue('t').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ParseError);
    expect(err).toMatchObject({ detail: 'proxy response missing url' });
  });

  it('should fail with HttpError when the relay is unreachable', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed'));

    await expect(proxy(RELAY_URL).createIssue('t')).rejects.toBeInstanceOf(HttpError);
  });
});
