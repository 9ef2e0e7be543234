import type { SourceAdapter } from '../adapter.js';
import { SourceError } from '../../shared/errors.js';
import { applyLimit, fetchEntries, targetUrl } from './feed.js';

const ARXIV_API = 'https://export.arxiv.org/api/query';
const CATEGORY_RE = /^[a-z-]+(\.[A-Za-z-]+)?$/;
const DEFAULT_MAX_RESULTS = 25;

export function arxivQueryUrl(category: string, maxResults = DEFAULT_MAX_RESULTS): string {
  const url = new URL(ARXIV_API);
  url.searchParams.set('search_query', `cat:${category}`);
  url.searchParams.set('sortBy', 'submittedDate');
  url.searchParams.set('sortOrder', 'descending');
  url.searchParams.set('max_results', String(maxResults));
  return url.toString();
}

export function arxivId(entryId: string | undefined): string | null {
  if (!entryId) return null;
  const match = entryId.match(/arxiv\.org\/abs\/(.+)$/i);
  return match?.[1] ?? null;
}

export const arxivAdapter: SourceAdapter = {
  type: 'arxiv',

  resolve(identifier) {
    const category = identifier.trim();
    if (!CATEGORY_RE.test(category)) {
      throw new SourceError(`Invalid arXiv category: ${identifier}`, { identifier });
    }
    return { identifier: category, name: `arXiv: ${category}`, feedUrl: arxivQueryUrl(category) };
  },

  async check(target, ctx, limit) {
    const url = new URL(targetUrl(target, arxivAdapter.resolve));
    url.searchParams.set('max_results', String(limit ?? ctx.arxivMaxResults));

    const entries = await fetchEntries(ctx, url.toString());
    const items = entries.map(({ item, extras }) => {
      const id = arxivId(extras.entryId);
      return {
        ...item,
        // The abstract lives in <summary>, whatever the Atom content policy says.
        content: extras.summary || item.content,
        metadata: id ? { arxiv_id: id } : undefined,
      };
    });
    return applyLimit(items, limit);
  },
};
