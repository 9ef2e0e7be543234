export const SOURCE_TYPES = [
  'news',
  'reddit',
  'hackernews',
  'github',
  'arxiv',
  'youtube',
  'podcast',
] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];

export function isSourceType(value: string): value is SourceType {
  return (SOURCE_TYPES as readonly string[]).includes(value);
}

export type ItemMetadata = Record<string, string | number | boolean | null>;

/**
 * Canonical item produced by every adapter, whatever the wire format.
 */
export interface CanonicalItem {
  title: string;
  url: string;
  content: string;
  published: string;
  author: string;
  metadata?: ItemMetadata;
}

/**
 * Database row shape for the subscriptions table.
 */
export interface Subscription {
  id: string;
  source_type: SourceType;
  identifier: string;
  name: string;
  feed_url: string;
  is_active: number;
  last_checked_at: string | null;
  created_at: string;
}

/**
 * Database row shape for the feed_items table.
 */
export interface FeedItem {
  id: number;
  subscription_id: string;
  title: string;
  url: string;
  content: string;
  published: string;
  author: string;
  metadata: string;
  fetched_at: string;
}

export interface FetchOptions {
  timeoutMs?: number;
  accept?: string;
}

/**
 * HTTP GET returning the response body as text. Throws SourceError on
 * timeouts, network errors and non-2xx responses.
 */
export type Fetcher = (url: string, options?: FetchOptions) => Promise<string>;

export interface AdapterContext {
  fetch: Fetcher;
  concurrency: number;
  atomContent: 'summary' | 'content';
  hackernewsLimit: number;
  arxivMaxResults: number;
}

/**
 * `identifier` is the canonical key stored for the subscription, so different
 * spellings of one source resolve to the same row.
 */
export interface ResolvedSource {
  identifier: string;
  name: string;
  feedUrl: string;
}

/**
 * Fetch-plus-normalize unit for one source type. Implementations are plain
 * objects registered by type; `check` has no storage side effects.
 */
export interface SourceAdapter {
  readonly type: SourceType;
  resolve(identifier: string): ResolvedSource;
  check(target: string, ctx: AdapterContext, limit?: number): Promise<CanonicalItem[]>;
}
