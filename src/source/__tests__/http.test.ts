import { describe, it, expect, vi, afterEach } from 'vitest';
import { createFetcher, fetchJson } from '../http.js';
import { SourceError } from '../../shared/errors.js';

describe('createFetcher', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const fetcher = createFetcher({ timeoutMs: 1000, userAgent: 'test-agent' });

  it('returns the response body and sends the configured headers', async () => {
    const spy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('<rss/>', { status: 200 }));

    await expect(fetcher('https://example.com/feed')).resolves.toBe('<rss/>');
    expect(spy).toHaveBeenCalledWith(
      'https://example.com/feed',
      expect.objectContaining({
        headers: {
          'User-Agent': 'test-agent',
          Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
        },
      }),
    );
  });

  it('honors a per-call Accept header', async () => {
    const spy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('[]', { status: 200 }));
    await fetcher('https://example.com/data', { accept: 'application/json' });
    expect(spy).toHaveBeenCalledWith(
      'https://example.com/data',
      expect.objectContaining({ headers: { 'User-Agent': 'test-agent', Accept: 'application/json' } }),
    );
  });

  it('fails on non-2xx responses', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('gone', { status: 404 }));
    await expect(fetcher('https://example.com/feed')).rejects.toThrow('Fetch failed: 404 from https://example.com/feed');
  });

  it('wraps network errors', async () => {
    vi.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
    const err = await fetcher('https://example.com/feed').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceError);
    expect(err).toHaveProperty('message', 'Fetch failed: fetch failed');
  });

  it('reports timeouts', async () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    vi.spyOn(globalThis, 'fetch').mockRejectedValue(abort);
    await expect(fetcher('https://example.com/slow')).rejects.toThrow(
      'Fetch timed out after 1000ms: https://example.com/slow',
    );
  });
});

describe('fetchJson', () => {
  it('parses the body as JSON and asks for JSON', async () => {
    const fetch = vi.fn(async () => '{"a":1}');
    await expect(fetchJson(fetch, 'https://example.com/x.json')).resolves.toEqual({ a: 1 });
    expect(fetch).toHaveBeenCalledWith('https://example.com/x.json', { accept: 'application/json' });
  });

  it('rejects invalid JSON', async () => {
    const fetch = vi.fn(async () => '<html>');
    await expect(fetchJson(fetch, 'https://example.com/x.json')).rejects.toBeInstanceOf(SourceError);
  });
});
