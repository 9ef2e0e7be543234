import type { SourceAdapter } from '../adapter.js';
import { SourceError } from '../../shared/errors.js';
import { applyLimit, fetchEntries, targetUrl } from './feed.js';

const SUBREDDIT_RE = /^[A-Za-z0-9_]{2,21}$/;

export function subredditName(identifier: string): string {
  const name = identifier.trim().replace(/^\/?r\//i, '').replace(/\/+$/, '');
  if (!SUBREDDIT_RE.test(name)) {
    throw new SourceError(`Invalid subreddit name: ${identifier}`, { identifier });
  }
  return name.toLowerCase();
}

export const redditAdapter: SourceAdapter = {
  type: 'reddit',

  resolve(identifier) {
    const name = subredditName(identifier);
    return { identifier: name, name: `r/${name}`, feedUrl: `https://www.reddit.com/r/${name}/.rss` };
  },

  async check(target, ctx, limit) {
    const entries = await fetchEntries(ctx, targetUrl(target, redditAdapter.resolve));
    return applyLimit(
      entries.map((e) => e.item),
      limit,
    );
  },
};
