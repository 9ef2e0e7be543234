import type { ItemMetadata, SourceAdapter } from '../adapter.js';
import { SourceError } from '../../shared/errors.js';
import { hostnameOf, isHttpUrl } from '../../shared/utils.js';
import type { EntryExtras } from '../normalize.js';
import { applyLimit, fetchEntries } from './feed.js';

function podcastMetadata(extras: EntryExtras): ItemMetadata | undefined {
  if (!extras.enclosure && !extras.duration) return undefined;
  return {
    audio_url: extras.enclosure?.url ?? null,
    audio_type: extras.enclosure?.type ?? null,
    duration: extras.duration ?? null,
  };
}

export const podcastAdapter: SourceAdapter = {
  type: 'podcast',

  resolve(identifier) {
    const url = identifier.trim();
    if (!isHttpUrl(url)) {
      throw new SourceError(`Podcast feeds are subscribed by URL: ${identifier}`, { identifier });
    }
    return { identifier: url, name: hostnameOf(url) ?? url, feedUrl: url };
  },

  async check(target, ctx, limit) {
    const entries = await fetchEntries(ctx, podcastAdapter.resolve(target).feedUrl);
    const items = entries.map(({ item, extras }) => ({
      ...item,
      // Episodes without a page link are addressed by their audio file.
      url: item.url || extras.enclosure?.url || '',
      metadata: podcastMetadata(extras),
    }));
    return applyLimit(items, limit);
  },
};
