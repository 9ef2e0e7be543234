import { describe, it, expect, vi } from 'vitest';
import type { AdapterContext, Fetcher } from '../adapter.js';
import { hackernewsAdapter, storyToItem, discussionUrl } from '../adapters/hackernews.js';
import { SourceError } from '../../shared/errors.js';

const API = 'https://hacker-news.firebaseio.com/v0';

function jsonFetcher(routes: Record<string, unknown>): Fetcher {
  return vi.fn(async (url: string) => {
    if (!(url in routes)) {
      throw new SourceError(`Fetch failed: 404 from ${url}`);
    }
    return JSON.stringify(routes[url]);
  });
}

function contextFor(fetch: Fetcher): AdapterContext {
  return { fetch, concurrency: 2, atomContent: 'summary', hackernewsLimit: 30, arxivMaxResults: 25 };
}

describe('hackernews adapter', () => {
  it('resolves story lists', () => {
    expect(hackernewsAdapter.resolve('top')).toEqual({
      identifier: 'top',
      name: 'Hacker News (top)',
      feedUrl: `${API}/topstories.json`,
    });
    expect(hackernewsAdapter.resolve('BestStories').feedUrl).toBe(`${API}/beststories.json`);
    expect(() => hackernewsAdapter.resolve('worst')).toThrow(SourceError);
  });

  it('converts a story into a canonical item', () => {
    expect(
      storyToItem({
        id: 7,
        title: 'Show HN: A thing',
        url: 'https://thing.example.com',
        by: 'pg',
        time: 1700000000,
        score: 120,
        descendants: 33,
      }),
    ).toEqual({
      title: 'Show HN: A thing',
      url: 'https://thing.example.com',
      content: '',
      published: '2023-11-14T22:13:20.000Z',
      author: 'pg',
      metadata: { score: 120, comments: 33, hn_url: 'https://news.ycombinator.com/item?id=7' },
    });
  });

  it('uses the discussion page for text posts', () => {
    const item = storyToItem({ id: 9, title: 'Ask HN: Why?', text: '<p>Ask &amp; tell</p>' });
    expect(item.url).toBe(discussionUrl(9));
    expect(item.content).toBe('Ask & tell');
    expect(item.published).toBe('');
    expect(item.metadata).toEqual({ score: 0, comments: 0, hn_url: 'https://news.ycombinator.com/item?id=9' });
  });

  it('fetches stories concurrently and skips the ones that fail', async () => {
    const fetch = jsonFetcher({
      [`${API}/topstories.json`]: [1, 2, 3, 4, 5, 6],
      [`${API}/item/1.json`]: { id: 1, title: 'First', url: 'https://a.example.com', by: 'x', time: 1700000000 },
      [`${API}/item/2.json`]: { id: 2, title: 'Second', by: 'y' },
      [`${API}/item/3.json`]: null,
      // 4 is missing and throws
      [`${API}/item/5.json`]: { id: 5, title: 'Dead', dead: true },
      [`${API}/item/6.json`]: { id: 'not-a-number' },
    });

    const items = await hackernewsAdapter.check(`${API}/topstories.json`, contextFor(fetch));
    expect(items.map((i) => [i.title, i.url])).toEqual([
      ['First', 'https://a.example.com'],
      ['Second', 'https://news.ycombinator.com/item?id=2'],
    ]);
  });

  it('limits the number of story fetches', async () => {
    const fetch = jsonFetcher({
      [`${API}/newstories.json`]: [10, 11, 12],
      [`${API}/item/10.json`]: { id: 10, title: 'Ten' },
      [`${API}/item/11.json`]: { id: 11, title: 'Eleven' },
      [`${API}/item/12.json`]: { id: 12, title: 'Twelve' },
    });

    const items = await hackernewsAdapter.check('new', contextFor(fetch), 2);
    expect(items.map((i) => i.title)).toEqual(['Ten', 'Eleven']);
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it('rejects an unexpected list payload', async () => {
    const fetch = jsonFetcher({ [`${API}/topstories.json`]: { error: 'nope' } });
    await expect(hackernewsAdapter.check('top', contextFor(fetch))).rejects.toThrow(
      `Unexpected story list payload from ${API}/topstories.json`,
    );
  });
});
