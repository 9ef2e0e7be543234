import type { Fetcher, FetchOptions } from './adapter.js';
import type { Config } from '../shared/config.js';
import { SourceError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*';

/**
 * Build the GET primitive every adapter fetches through.
 */
export function createFetcher(opts: { timeoutMs: number; userAgent: string }): Fetcher {
  return async (url: string, options: FetchOptions = {}): Promise<string> => {
    const timeoutMs = options.timeoutMs ?? opts.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': opts.userAgent,
          Accept: options.accept ?? FEED_ACCEPT,
        },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (!response.ok) {
        throw new SourceError(`Fetch failed: ${response.status} from ${url}`, {
          url,
          status: response.status,
        });
      }

      const body = await response.text();
      logger.debug({ url, bytes: body.length }, 'Fetched');
      return body;
    } catch (err) {
      if (err instanceof SourceError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new SourceError(`Fetch timed out after ${timeoutMs}ms: ${url}`, {
          url,
          timeout: timeoutMs,
        });
      }
      throw new SourceError(`Fetch failed: ${err instanceof Error ? err.message : String(err)}`, { url });
    } finally {
      clearTimeout(timer);
    }
  };
}

export function fetcherFromConfig(config: Config): Fetcher {
  return createFetcher({
    timeoutMs: config.ingest.fetch_timeout_ms,
    userAgent: config.ingest.user_agent,
  });
}

/**
 * Fetch and JSON-decode a response body.
 */
export async function fetchJson(fetcher: Fetcher, url: string, options: FetchOptions = {}): Promise<unknown> {
  const body = await fetcher(url, { accept: 'application/json', ...options });
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new SourceError(`Invalid JSON from ${url}: ${err instanceof Error ? err.message : String(err)}`, { url });
  }
}
