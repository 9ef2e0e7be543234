import Parser from 'rss-parser';
import type { CanonicalItem } from './adapter.js';
import { stripHtml, collapseWhitespace } from './html.js';
import { ParseError } from '../shared/errors.js';
import { normalizeTimestamp } from '../shared/utils.js';

export type FeedFormat = 'rss' | 'atom';

export type AtomContentPolicy = 'summary' | 'content';

/**
 * Source-specific pieces of an entry that do not fit the canonical shape.
 * Adapters turn these into item metadata.
 */
export interface EntryExtras {
  entryId?: string;
  summary?: string;
  enclosure?: { url: string; type?: string; length?: string };
  duration?: string;
  videoId?: string;
  mediaUrl?: string;
  mediaDescription?: string;
}

export interface ParsedEntry {
  item: CanonicalItem;
  extras: EntryExtras;
}

export interface ParseOptions {
  atomContent?: AtomContentPolicy;
}

interface CustomEntryFields {
  entryId?: unknown;
  publishedRaw?: unknown;
  updatedRaw?: unknown;
  authorRaw?: unknown;
  encodedContent?: unknown;
  itunesDuration?: unknown;
  videoId?: unknown;
  mediaGroup?: unknown;
}

const parser = new Parser<Record<string, unknown>, CustomEntryFields>({
  defaultRSS: 2,
  customFields: {
    item: [
      ['id', 'entryId'],
      ['published', 'publishedRaw'],
      ['updated', 'updatedRaw'],
      ['author', 'authorRaw'],
      ['content:encoded', 'encodedContent'],
      ['itunes:duration', 'itunesDuration'],
      ['yt:videoId', 'videoId'],
      ['media:group', 'mediaGroup'],
    ],
  },
});

/**
 * Identify the feed dialect from its root element.
 */
export function detectFeedFormat(xml: string): FeedFormat | null {
  const body = xml
    .replace(/<\?[\s\S]*?\?>/g, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<!DOCTYPE[^>]*>/gi, '');
  const match = body.match(/<(?:[\w.-]+:)?([\w.-]+)[\s>/]/);
  switch (match?.[1]) {
    case 'rss':
    case 'RDF':
      return 'rss';
    case 'feed':
      return 'atom';
    default:
      return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read text out of an xml2js node: a string, a `{ _: text }` object, or an
 * array holding either.
 */
function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return textOf(value[0]);
  if (isRecord(value) && typeof value['_'] === 'string') return value['_'];
  return undefined;
}

function attrOf(value: unknown, name: string): string | undefined {
  const node = Array.isArray(value) ? value[0] : value;
  if (!isRecord(node) || !isRecord(node['$'])) return undefined;
  const attr = node['$'][name];
  return typeof attr === 'string' ? attr : undefined;
}

function atomAuthor(value: unknown): string | undefined {
  const node = Array.isArray(value) ? value[0] : value;
  if (typeof node === 'string') return node;
  if (isRecord(node)) return textOf(node['name']);
  return undefined;
}

function mediaExtras(group: unknown): Pick<EntryExtras, 'mediaUrl' | 'mediaDescription'> {
  if (!isRecord(group)) return {};
  const description = textOf(group['media:description']);
  return {
    mediaUrl: attrOf(group['media:content'], 'url'),
    mediaDescription: description ? stripHtml(description) : undefined,
  };
}

type ParserEntry = Parser.Item & CustomEntryFields;

function pickContent(entry: ParserEntry, format: FeedFormat, policy: AtomContentPolicy): string {
  if (format === 'atom') {
    const ordered = policy === 'summary' ? [entry.summary, entry.content] : [entry.content, entry.summary];
    return ordered.find((v): v is string => typeof v === 'string' && v.trim() !== '') ?? '';
  }
  if (typeof entry.content === 'string' && entry.content.trim() !== '') return entry.content;
  return textOf(entry.encodedContent) ?? '';
}

function toParsedEntry(entry: ParserEntry, format: FeedFormat, policy: AtomContentPolicy): ParsedEntry {
  const author =
    format === 'atom'
      ? atomAuthor(entry.authorRaw)
      : textOf(entry.authorRaw) ?? (typeof entry.creator === 'string' ? entry.creator : undefined);

  const publishedRaw =
    format === 'atom'
      ? textOf(entry.publishedRaw) ?? textOf(entry.updatedRaw) ?? entry.pubDate
      : entry.pubDate ?? entry.isoDate;

  const enclosureUrl = entry.enclosure?.url;
  const duration = textOf(entry.itunesDuration);
  const videoId = textOf(entry.videoId);
  const summary = typeof entry.summary === 'string' ? stripHtml(entry.summary) : undefined;

  return {
    item: {
      title: collapseWhitespace(typeof entry.title === 'string' ? entry.title : ''),
      url: (entry.link ?? '').trim(),
      content: stripHtml(pickContent(entry, format, policy)),
      published: normalizeTimestamp(publishedRaw),
      author: collapseWhitespace(author ?? ''),
    },
    extras: {
      entryId: textOf(entry.entryId)?.trim(),
      summary,
      enclosure: enclosureUrl
        ? {
            url: enclosureUrl,
            type: entry.enclosure?.type,
            length: entry.enclosure?.length !== undefined ? String(entry.enclosure.length) : undefined,
          }
        : undefined,
      duration: duration?.trim() || undefined,
      videoId: videoId?.trim() || undefined,
      ...mediaExtras(entry.mediaGroup),
    },
  };
}

/**
 * Atom links carry their target in `href`; the parser reads only that. Some
 * publishers put the URL in the element text instead, so move it there and
 * drop links that carry neither.
 */
function normalizeAtomLinks(xml: string): string {
  return xml
    .replace(/<link>\s*([^<]+?)\s*<\/link>/g, (_match, href: string) => `<link href="${href.replace(/"/g, '&quot;')}"/>`)
    .replace(/<link\s*\/>|<link>\s*<\/link>/g, '');
}

/**
 * Parse an RSS 2.0 or Atom document into canonical entries, in document order.
 * Entries missing a title or link are kept; storage decides what to drop.
 */
export async function parseFeed(xml: string, options: ParseOptions = {}): Promise<ParsedEntry[]> {
  const format = detectFeedFormat(xml);
  if (!format) {
    throw new ParseError('Not an RSS or Atom document', { preview: xml.slice(0, 120) });
  }

  let feed: Awaited<ReturnType<typeof parser.parseString>>;
  try {
    feed = await parser.parseString(format === 'atom' ? normalizeAtomLinks(xml) : xml);
  } catch (err) {
    throw new ParseError(`Malformed ${format} feed: ${err instanceof Error ? err.message : String(err)}`, {
      format,
    });
  }

  const policy = options.atomContent ?? 'summary';
  return (feed.items ?? []).map((entry) => toParsedEntry(entry, format, policy));
}

export async function parseItems(xml: string, options: ParseOptions = {}): Promise<CanonicalItem[]> {
  const entries = await parseFeed(xml, options);
  return entries.map((e) => e.item);
}
