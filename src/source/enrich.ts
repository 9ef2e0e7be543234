import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { CanonicalItem } from './adapter.js';
import { errorMessage, TranscriptionError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { resolvePath, sha1 } from '../shared/utils.js';

/**
 * External transcription capability: video URL in, transcript text out.
 */
export type Transcriber = (url: string, tier: string) => Promise<string>;

export interface TranscriptCacheOptions {
  cacheDir: string;
  tier: string;
}

export interface EnrichOptions extends TranscriptCacheOptions {
  transcriber: Transcriber;
}

export type EnrichmentAction =
  | { url: string; title: string; status: 'transcribed'; chars: number }
  | { url: string; title: string; status: 'failed'; error: string };

const CachedTranscriptSchema = z.object({
  url: z.string(),
  tier: z.string(),
  transcript: z.string(),
  created_at: z.string(),
});

export type CachedTranscript = z.infer<typeof CachedTranscriptSchema>;

const VIDEO_WATCH_PATTERNS = [
  /^https?:\/\/(?:www\.|m\.)?youtube\.com\/watch\?(?:.*&)?v=[\w-]{6,}/i,
  /^https?:\/\/(?:www\.)?youtube\.com\/shorts\/[\w-]{6,}/i,
  /^https?:\/\/youtu\.be\/[\w-]{6,}/i,
];

export function isVideoWatchUrl(url: string): boolean {
  return VIDEO_WATCH_PATTERNS.some((re) => re.test(url));
}

export function transcriptCacheKey(url: string, tier: string): string {
  return sha1(`${url}\n${tier}`);
}

export function transcriptCachePath(url: string, opts: TranscriptCacheOptions): string {
  return path.join(resolvePath(opts.cacheDir), `${transcriptCacheKey(url, opts.tier)}.json`);
}

export function readCachedTranscript(url: string, opts: TranscriptCacheOptions): CachedTranscript | null {
  const cachePath = transcriptCachePath(url, opts);
  if (!fs.existsSync(cachePath)) return null;
  try {
    const parsed = CachedTranscriptSchema.safeParse(JSON.parse(fs.readFileSync(cachePath, 'utf-8')));
    return parsed.success ? parsed.data : null;
  } catch (err) {
    logger.warn({ cachePath, error: errorMessage(err) }, 'Unreadable transcript cache entry');
    return null;
  }
}

export function hasCachedTranscript(url: string, opts: TranscriptCacheOptions): boolean {
  return fs.existsSync(transcriptCachePath(url, opts));
}

export function writeCachedTranscript(url: string, transcript: string, opts: TranscriptCacheOptions): string {
  const cachePath = transcriptCachePath(url, opts);
  const entry: CachedTranscript = {
    url,
    tier: opts.tier,
    transcript,
    created_at: new Date().toISOString(),
  };
  fs.mkdirSync(path.dirname(cachePath), { recursive: true });
  fs.writeFileSync(cachePath, JSON.stringify(entry, null, 2), 'utf-8');
  return cachePath;
}

/**
 * Request transcripts for newly stored video items. A URL with a cache entry
 * is never sent to the transcriber again. An empty result means nothing to do.
 */
export async function autoEnrich(
  items: readonly Pick<CanonicalItem, 'url' | 'title'>[],
  opts: EnrichOptions,
): Promise<EnrichmentAction[]> {
  const seen = new Set<string>();
  const pending = items.filter((item) => {
    if (!isVideoWatchUrl(item.url) || seen.has(item.url)) return false;
    seen.add(item.url);
    if (hasCachedTranscript(item.url, opts)) {
      logger.debug({ url: item.url }, 'Transcript cached, skipping');
      return false;
    }
    return true;
  });

  const actions: EnrichmentAction[] = [];
  // One at a time: transcription is the expensive step.
  for (const item of pending) {
    try {
      const transcript = await opts.transcriber(item.url, opts.tier);
      writeCachedTranscript(item.url, transcript, opts);
      actions.push({ url: item.url, title: item.title, status: 'transcribed', chars: transcript.length });
      logger.info({ url: item.url, chars: transcript.length }, 'Video transcribed');
    } catch (err) {
      const error = errorMessage(err);
      actions.push({ url: item.url, title: item.title, status: 'failed', error });
      logger.warn({ url: item.url, error }, 'Transcription failed');
    }
  }

  return actions;
}

const TranscriptResponseSchema = z.object({ transcript: z.string() });

/**
 * Transcriber backed by an HTTP service: POST {url, quality} → {transcript}.
 */
export function createHttpTranscriber(endpoint: string, timeoutMs: number): Transcriber {
  return async (url, tier) => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify({ url, quality: tier }),
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new TranscriptionError(`Transcription service returned ${response.status}`, {
          url,
          status: response.status,
        });
      }
      const parsed = TranscriptResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new TranscriptionError('Transcription service returned no transcript', { url });
      }
      return parsed.data.transcript;
    } catch (err) {
      if (err instanceof TranscriptionError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new TranscriptionError(`Transcription timed out after ${timeoutMs}ms`, { url });
      }
      throw new TranscriptionError(`Transcription failed: ${errorMessage(err)}`, { url });
    } finally {
      clearTimeout(timer);
    }
  };
}
