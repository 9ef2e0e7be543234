import type { SourceAdapter } from '../adapter.js';
import { findNewsPreset } from '../../shared/presets.js';
import { SourceError } from '../../shared/errors.js';
import { hostnameOf, isHttpUrl } from '../../shared/utils.js';
import { applyLimit, fetchEntries, targetUrl } from './feed.js';

export const newsAdapter: SourceAdapter = {
  type: 'news',

  resolve(identifier) {
    const preset = findNewsPreset(identifier);
    if (preset) {
      return { identifier: preset.key.toLowerCase(), name: preset.name, feedUrl: preset.url };
    }
    const url = identifier.trim();
    if (isHttpUrl(url)) {
      return { identifier: url, name: hostnameOf(url) ?? url, feedUrl: url };
    }
    throw new SourceError(`Unknown news preset "${identifier}" (use a preset name or a feed URL)`, {
      identifier,
    });
  },

  async check(target, ctx, limit) {
    const entries = await fetchEntries(ctx, targetUrl(target, newsAdapter.resolve));
    return applyLimit(
      entries.map((e) => e.item),
      limit,
    );
  },
};
