import type { SourceAdapter } from '../adapter.js';
import { SourceError } from '../../shared/errors.js';
import { applyLimit, fetchEntries, targetUrl } from './feed.js';

const CHANNEL_RE = /^UC[\w-]{22}$/;

export function youtubeFeedUrl(channelId: string): string {
  return `https://www.youtube.com/feeds/videos.xml?channel_id=${encodeURIComponent(channelId)}`;
}

function channelIdOf(identifier: string): string {
  const trimmed = identifier.trim();
  if (CHANNEL_RE.test(trimmed)) return trimmed;
  const fromUrl = trimmed.match(/(?:channel_id=|\/channel\/)(UC[\w-]{22})/);
  if (fromUrl?.[1]) return fromUrl[1];
  throw new SourceError(`Invalid YouTube channel id: ${identifier}`, { identifier });
}

export const youtubeAdapter: SourceAdapter = {
  type: 'youtube',

  resolve(identifier) {
    const channelId = channelIdOf(identifier);
    return { identifier: channelId, name: `YouTube: ${channelId}`, feedUrl: youtubeFeedUrl(channelId) };
  },

  async check(target, ctx, limit) {
    const entries = await fetchEntries(ctx, targetUrl(target, youtubeAdapter.resolve));
    const items = entries.map(({ item, extras }) => {
      const videoUrl =
        extras.mediaUrl ?? (extras.videoId ? `https://www.youtube.com/embed/${extras.videoId}` : undefined);
      return {
        ...item,
        content: extras.mediaDescription || item.content,
        metadata: videoUrl ? { video_id: extras.videoId ?? null, video_url: videoUrl } : undefined,
      };
    });
    return applyLimit(items, limit);
  },
};
