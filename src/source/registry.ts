import type { AdapterContext, CanonicalItem, Fetcher, SourceAdapter, SourceType } from './adapter.js';
import type { Config } from '../shared/config.js';
import { newsAdapter } from './adapters/news.js';
import { redditAdapter } from './adapters/reddit.js';
import { hackernewsAdapter } from './adapters/hackernews.js';
import { githubAdapter } from './adapters/github.js';
import { arxivAdapter } from './adapters/arxiv.js';
import { youtubeAdapter } from './adapters/youtube.js';
import { podcastAdapter } from './adapters/podcast.js';

export const ADAPTERS: { readonly [K in SourceType]: SourceAdapter } = {
  news: newsAdapter,
  reddit: redditAdapter,
  hackernews: hackernewsAdapter,
  github: githubAdapter,
  arxiv: arxivAdapter,
  youtube: youtubeAdapter,
  podcast: podcastAdapter,
};

export function createAdapterContext(config: Config, fetcher: Fetcher): AdapterContext {
  return {
    fetch: fetcher,
    concurrency: config.ingest.default_concurrency,
    atomContent: config.feeds.atom_content,
    hackernewsLimit: config.ingest.hackernews_limit,
    arxivMaxResults: config.ingest.arxiv_max_results,
  };
}

export function checkSource(
  type: SourceType,
  target: string,
  ctx: AdapterContext,
  limit?: number,
): Promise<CanonicalItem[]> {
  return ADAPTERS[type].check(target, ctx, limit);
}
