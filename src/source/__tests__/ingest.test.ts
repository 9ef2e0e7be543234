import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { openDb, type Db } from '../../db/db.js';
import { ConfigSchema, type Config } from '../../shared/config.js';
import { SourceError } from '../../shared/errors.js';
import type { Fetcher } from '../adapter.js';
import { ADAPTERS } from '../registry.js';
import { countItems, listSubscriptions, setSubscriptionActive, subscribe } from '../feedDb.js';
import { resolveTranscriber, runCheck } from '../ingest.js';
import { hasCachedTranscript, type Transcriber } from '../enrich.js';

const GOOD_FEED = 'https://good.example.com/feed.xml';
const BAD_FEED = 'https://bad.example.com/feed.xml';
const CHANNEL = 'UCabcdefghijklmnopqrstuv';
const CHANNEL_FEED = `https://www.youtube.com/feeds/videos.xml?channel_id=${CHANNEL}`;

const NEWS_RSS = `<?xml version="1.0"?>
<rss version="2.0"><channel><title>Good</title>
  <item><title>Story A</title><link>https://good.example.com/a</link><description>Alpha</description></item>
  <item><title>Story B</title><link>https://good.example.com/b</link><description>Beta</description></item>
</channel></rss>`;

const CHANNEL_ATOM = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns:yt="http://www.youtube.com/xml/schemas/2015" xmlns="http://www.w3.org/2005/Atom">
  <title>Channel</title>
  <entry>
    <yt:videoId>abcDEF12345</yt:videoId>
    <title>Video One</title>
    <link rel="alternate" href="https://www.youtube.com/watch?v=abcDEF12345"/>
  </entry>
</feed>`;

function resolveWithAdapter(type: keyof typeof ADAPTERS, identifier: string) {
  return ADAPTERS[type].resolve(identifier);
}

describe('runCheck', () => {
  let db: Db;
  let config: Config;
  let cacheDir: string;
  let fetcher: Fetcher;

  beforeEach(() => {
    db = openDb(':memory:');
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'feedkeeper-ingest-'));
    config = ConfigSchema.parse({ transcription: { cache_dir: cacheDir } });
    fetcher = vi.fn(async (url: string) => {
      if (url === GOOD_FEED) return NEWS_RSS;
      if (url === CHANNEL_FEED) return CHANNEL_ATOM;
      throw new SourceError(`Fetch failed: 500 from ${url}`);
    });
  });

  afterEach(() => {
    fs.rmSync(cacheDir, { recursive: true, force: true });
  });

  it('reports an empty cycle when nothing is subscribed', async () => {
    const summary = await runCheck(db, config, { fetcher, transcriber: null });
    expect(summary.subscriptionsChecked).toBe(0);
    expect(summary.totalNew).toBe(0);
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('keeps going when one source fails', async () => {
    subscribe(db, 'news', GOOD_FEED, resolveWithAdapter);
    subscribe(db, 'news', BAD_FEED, resolveWithAdapter);

    const summary = await runCheck(db, config, { fetcher, transcriber: null });

    expect(summary.subscriptionsChecked).toBe(2);
    expect(summary.subscriptionsFailed).toBe(1);
    expect(summary.totalNew).toBe(2);
    expect(summary.perSource.map((s) => [s.name, s.fetched, s.newItems, s.error])).toEqual([
      ['bad.example.com', 0, 0, `Fetch failed: 500 from ${BAD_FEED}`],
      ['good.example.com', 2, 2, undefined],
    ]);
    expect(summary.errors).toEqual([{ source: 'bad.example.com', error: `Fetch failed: 500 from ${BAD_FEED}` }]);
    expect(countItems(db)).toBe(2);
    expect(listSubscriptions(db).map((s) => [s.name, s.last_checked_at !== null])).toEqual([
      ['bad.example.com', false],
      ['good.example.com', true],
    ]);
  });

  it('stores nothing new on a repeat cycle', async () => {
    subscribe(db, 'news', GOOD_FEED, resolveWithAdapter);

    await runCheck(db, config, { fetcher, transcriber: null });
    const second = await runCheck(db, config, { fetcher, transcriber: null });

    expect(second.totalNew).toBe(0);
    expect(second.perSource[0]).toMatchObject({ fetched: 2, newItems: 0 });
    expect(countItems(db)).toBe(2);
  });

  it('skips paused subscriptions and honors the type filter', async () => {
    const paused = subscribe(db, 'news', BAD_FEED, resolveWithAdapter).subscription;
    setSubscriptionActive(db, paused.id, false);
    subscribe(db, 'news', GOOD_FEED, resolveWithAdapter);
    subscribe(db, 'youtube', CHANNEL, resolveWithAdapter);

    const summary = await runCheck(db, config, { fetcher, transcriber: null }, { sourceType: 'news' });

    expect(summary.perSource.map((s) => s.name)).toEqual(['good.example.com']);
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it('transcribes new videos from youtube subscriptions once', async () => {
    subscribe(db, 'youtube', CHANNEL, resolveWithAdapter);
    subscribe(db, 'news', GOOD_FEED, resolveWithAdapter);
    const transcriber = vi.fn<Transcriber>(async () => 'spoken words');

    const first = await runCheck(db, config, { fetcher, transcriber });
    expect(first.enrichment).toEqual([
      {
        url: 'https://www.youtube.com/watch?v=abcDEF12345',
        title: 'Video One',
        status: 'transcribed',
        chars: 12,
      },
    ]);
    expect(transcriber).toHaveBeenCalledTimes(1);
    expect(
      hasCachedTranscript('https://www.youtube.com/watch?v=abcDEF12345', { cacheDir, tier: 'tiny' }),
    ).toBe(true);

    const second = await runCheck(db, config, { fetcher, transcriber });
    expect(second.enrichment).toEqual([]);
    expect(transcriber).toHaveBeenCalledTimes(1);
  });

  it('reports transcription failures without failing the cycle', async () => {
    subscribe(db, 'youtube', CHANNEL, resolveWithAdapter);
    const transcriber = vi.fn<Transcriber>(async () => {
      throw new Error('service down');
    });

    const summary = await runCheck(db, config, { fetcher, transcriber });

    expect(summary.totalNew).toBe(1);
    expect(summary.subscriptionsFailed).toBe(0);
    expect(summary.enrichment).toEqual([
      {
        url: 'https://www.youtube.com/watch?v=abcDEF12345',
        title: 'Video One',
        status: 'failed',
        error: 'service down',
      },
    ]);
  });
});

describe('resolveTranscriber', () => {
  it('prefers an injected transcriber, including null', () => {
    const config = ConfigSchema.parse({ transcription: { endpoint: 'http://localhost:9000' } });
    const injected: Transcriber = async () => '';
    expect(resolveTranscriber(config, { transcriber: injected })).toBe(injected);
    expect(resolveTranscriber(config, { transcriber: null })).toBeNull();
  });

  it('builds an HTTP transcriber only when an endpoint is configured', () => {
    expect(resolveTranscriber(ConfigSchema.parse({}), {})).toBeNull();
    expect(
      typeof resolveTranscriber(ConfigSchema.parse({ transcription: { endpoint: 'http://localhost:9000' } }), {}),
    ).toBe('function');
  });
});
