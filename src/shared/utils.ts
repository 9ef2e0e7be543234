import { createHash } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { nanoid } from 'nanoid';

export function generateId(size = 21): string {
  return nanoid(size);
}

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function sha1(input: string): string {
  return createHash('sha1').update(input, 'utf8').digest('hex');
}

export function nowISO(): string {
  return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

/**
 * Normalize a feed timestamp to ISO-8601. Unparseable values are returned
 * trimmed but otherwise untouched; missing values become ''.
 */
export function normalizeTimestamp(raw: string | number | undefined | null): string {
  if (raw === undefined || raw === null) return '';
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? new Date(raw).toISOString() : '';
  }
  const trimmed = raw.trim();
  if (!trimmed) return '';
  const ms = Date.parse(trimmed);
  return Number.isNaN(ms) ? trimmed : new Date(ms).toISOString();
}

export function hostnameOf(url: string): string | null {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return null;
  }
}

export function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

export function getPackageRoot(): string {
  // Walk up from the current file to the directory holding package.json.
  // Works from both src/shared/utils.ts and dist/shared/utils.js.
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
}

export function getFeedkeeperDir(): string {
  return resolvePath('~/.feedkeeper');
}

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 * Results keep the input order.
 */
export async function withConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const workers: Promise<void>[] = [];

  for (let i = 0; i < Math.min(Math.max(1, concurrency), items.length); i++) {
    workers.push(
      (async () => {
        while (next < items.length) {
          const index = next++;
          results[index] = await fn(items[index], index);
        }
      })(),
    );
  }

  await Promise.all(workers);
  return results;
}
