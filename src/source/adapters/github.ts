import type { CanonicalItem, SourceAdapter } from '../adapter.js';
import { SourceError } from '../../shared/errors.js';
import { logger } from '../../shared/logger.js';
import { applyLimit, fetchEntries, targetUrl } from './feed.js';

const GITHUB_ORIGIN = 'https://github.com';
const REPO_RE = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

export function repoSlug(identifier: string): string {
  const slug = identifier
    .trim()
    .replace(/^https?:\/\/(www\.)?github\.com\//i, '')
    .replace(/\.git$/, '')
    .replace(/\/+$/, '');
  if (!REPO_RE.test(slug)) {
    throw new SourceError(`Invalid GitHub repository (expected owner/repo): ${identifier}`, { identifier });
  }
  return slug.toLowerCase();
}

/**
 * Resolve a release link against github.com; null when it points elsewhere.
 */
export function githubUrl(link: string): string | null {
  if (!link) return null;
  try {
    const url = new URL(link, GITHUB_ORIGIN);
    return url.hostname === 'github.com' ? url.toString() : null;
  } catch {
    return null;
  }
}

export const githubAdapter: SourceAdapter = {
  type: 'github',

  resolve(identifier) {
    const slug = repoSlug(identifier);
    return { identifier: slug, name: `GitHub: ${slug}`, feedUrl: `${GITHUB_ORIGIN}/${slug}/releases.atom` };
  },

  async check(target, ctx, limit) {
    const entries = await fetchEntries(ctx, targetUrl(target, githubAdapter.resolve));
    const items: CanonicalItem[] = [];
    for (const { item } of entries) {
      const url = githubUrl(item.url);
      if (!url) {
        logger.debug({ url: item.url }, 'Skipping release link outside github.com');
        continue;
      }
      items.push({ ...item, url });
    }
    return applyLimit(items, limit);
  },
};
