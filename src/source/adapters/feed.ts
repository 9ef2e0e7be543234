import type { AdapterContext } from '../adapter.js';
import { parseFeed, type ParsedEntry, type ParseOptions } from '../normalize.js';

export async function fetchEntries(
  ctx: AdapterContext,
  url: string,
  options: ParseOptions = {},
): Promise<ParsedEntry[]> {
  const xml = await ctx.fetch(url);
  return parseFeed(xml, { atomContent: ctx.atomContent, ...options });
}

export function applyLimit<T>(items: T[], limit?: number): T[] {
  return limit !== undefined && limit >= 0 ? items.slice(0, limit) : items;
}

/**
 * Subscriptions store the resolved feed URL; callers may also pass a raw
 * identifier. Either way the adapter ends up with a URL.
 */
export function targetUrl(target: string, resolve: (identifier: string) => { feedUrl: string }): string {
  return /^https?:\/\//i.test(target) ? target : resolve(target).feedUrl;
}
