import { z } from 'zod';
import type { CanonicalItem, SourceAdapter } from '../adapter.js';
import { fetchJson } from '../http.js';
import { stripHtml } from '../html.js';
import { SourceError, errorMessage } from '../../shared/errors.js';
import { logger } from '../../shared/logger.js';
import { withConcurrency } from '../../shared/utils.js';

const HN_API = 'https://hacker-news.firebaseio.com/v0/';
const HN_LISTS = ['top', 'new', 'best', 'ask', 'show', 'job'] as const;

type HnList = (typeof HN_LISTS)[number];

const StoryIdsSchema = z.array(z.number().int());

const StorySchema = z.object({
  id: z.number().int(),
  type: z.string().optional(),
  by: z.string().optional(),
  time: z.number().optional(),
  title: z.string().optional(),
  url: z.string().optional(),
  text: z.string().optional(),
  score: z.number().optional(),
  descendants: z.number().optional(),
  deleted: z.boolean().optional(),
  dead: z.boolean().optional(),
});

export type HnStory = z.infer<typeof StorySchema>;

function isHnList(value: string): value is HnList {
  return (HN_LISTS as readonly string[]).includes(value);
}

export function discussionUrl(id: number): string {
  return `https://news.ycombinator.com/item?id=${id}`;
}

export function storyToItem(story: HnStory): CanonicalItem {
  return {
    title: story.title ?? '',
    url: story.url || discussionUrl(story.id),
    content: story.text ? stripHtml(story.text) : '',
    published: story.time !== undefined ? new Date(story.time * 1000).toISOString() : '',
    author: story.by ?? '',
    metadata: {
      score: story.score ?? 0,
      comments: story.descendants ?? 0,
      hn_url: discussionUrl(story.id),
    },
  };
}

export const hackernewsAdapter: SourceAdapter = {
  type: 'hackernews',

  resolve(identifier) {
    const list = identifier.trim().toLowerCase().replace(/stories$/, '');
    if (!isHnList(list)) {
      throw new SourceError(`Unknown Hacker News list "${identifier}" (expected one of ${HN_LISTS.join(', ')})`, {
        identifier,
      });
    }
    return { identifier: list, name: `Hacker News (${list})`, feedUrl: `${HN_API}${list}stories.json` };
  },

  async check(target, ctx, limit) {
    const listUrl = /^https?:\/\//i.test(target) ? target : hackernewsAdapter.resolve(target).feedUrl;

    const parsedIds = StoryIdsSchema.safeParse(await fetchJson(ctx.fetch, listUrl));
    if (!parsedIds.success) {
      throw new SourceError(`Unexpected story list payload from ${listUrl}`, { url: listUrl });
    }

    const ids = parsedIds.data.slice(0, limit ?? ctx.hackernewsLimit);
    const stories = await withConcurrency(ids, ctx.concurrency, async (id) => {
      const storyUrl = new URL(`item/${id}.json`, listUrl).toString();
      try {
        const raw = await fetchJson(ctx.fetch, storyUrl);
        if (raw === null) return null;
        const parsed = StorySchema.safeParse(raw);
        if (!parsed.success) {
          logger.warn({ id }, 'Skipping malformed Hacker News story');
          return null;
        }
        return parsed.data;
      } catch (err) {
        logger.warn({ id, error: errorMessage(err) }, 'Hacker News story fetch failed');
        return null;
      }
    });

    return stories
      .filter((s): s is HnStory => s !== null && !s.deleted && !s.dead)
      .map(storyToItem);
  },
};
