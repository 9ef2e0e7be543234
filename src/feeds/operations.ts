import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { SOURCE_TYPES, isSourceType, type Fetcher, type SourceType } from '../source/adapter.js';
import { ADAPTERS } from '../source/registry.js';
import {
  getItems,
  getSubscriptionItemCounts,
  findSubscription,
  listSubscriptions,
  searchItems,
  setSubscriptionActive,
  subscribe,
  unsubscribe,
  type ItemWithSource,
} from '../source/feedDb.js';
import { runCheck, type CheckSummary } from '../source/ingest.js';
import type { Transcriber } from '../source/enrich.js';
import { FeedkeeperError, SourceError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface FeedContext {
  db: Database.Database;
  config: Config;
  fetcher?: Fetcher;
  transcriber?: Transcriber | null;
}

const PREVIEW_CHARS = 200;

function typeLabel(type: string): string {
  return `[${type.toUpperCase()}]`;
}

function preview(text: string): string {
  return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS).trimEnd()}...` : text;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

/**
 * User-facing text for a failed operation. Expected errors keep their
 * message; anything else is logged and summarized.
 */
function describeFailure(action: string, err: unknown): string {
  if (err instanceof FeedkeeperError) {
    return `Could not ${action}: ${err.message}`;
  }
  logger.error({ error: errorMessage(err), stack: err instanceof Error ? err.stack : undefined }, `${action} failed`);
  return `Could not ${action}: ${errorMessage(err)}`;
}

/**
 * Canonical key for a typed identifier. An identifier the adapter rejects
 * cannot belong to a stored subscription, so it maps to null.
 */
function canonicalIdentifier(type: SourceType, identifier: string): string | null {
  try {
    return ADAPTERS[type].resolve(identifier).identifier;
  } catch (err) {
    if (err instanceof SourceError) return null;
    throw err;
  }
}

export function subscribeFeed(ctx: FeedContext, sourceType: string, identifier: string): string {
  if (!isSourceType(sourceType)) {
    return `Invalid source type: ${sourceType}. Valid types: ${SOURCE_TYPES.join(', ')}`;
  }
  if (!identifier.trim()) {
    return 'Could not subscribe: an identifier is required';
  }

  try {
    const result = subscribe(ctx.db, sourceType, identifier, (type, id) => ADAPTERS[type].resolve(id));
    const { name, source_type } = result.subscription;
    return result.status === 'created'
      ? `Subscribed to ${name} (${source_type})\nFeed: ${result.subscription.feed_url}`
      : `Already subscribed to ${name} (${source_type})`;
  } catch (err) {
    return describeFailure('subscribe', err);
  }
}

export function unsubscribeFeed(ctx: FeedContext, sourceType: string, identifier: string): string {
  if (!isSourceType(sourceType)) {
    return `Invalid source type: ${sourceType}. Valid types: ${SOURCE_TYPES.join(', ')}`;
  }

  try {
    const key = canonicalIdentifier(sourceType, identifier);
    const result = key === null ? { status: 'not_found' as const } : unsubscribe(ctx.db, sourceType, key);
    if (result.status === 'not_found') {
      return `No subscription found for ${sourceType}/${identifier}`;
    }
    return `Unsubscribed from ${result.subscription.name} (${sourceType}). Removed ${plural(result.itemsRemoved, 'item')}.`;
  } catch (err) {
    return describeFailure('unsubscribe', err);
  }
}

/**
 * Pause or resume a subscription. Paused subscriptions keep their items but
 * are skipped by check cycles.
 */
export function setFeedPaused(ctx: FeedContext, sourceType: string, identifier: string, paused: boolean): string {
  if (!isSourceType(sourceType)) {
    return `Invalid source type: ${sourceType}. Valid types: ${SOURCE_TYPES.join(', ')}`;
  }

  try {
    const key = canonicalIdentifier(sourceType, identifier);
    const subscription = key === null ? undefined : findSubscription(ctx.db, sourceType, key);
    if (!subscription) {
      return `No subscription found for ${sourceType}/${identifier}`;
    }
    setSubscriptionActive(ctx.db, subscription.id, !paused);
    return `${paused ? 'Paused' : 'Resumed'} ${subscription.name} (${sourceType})`;
  } catch (err) {
    return describeFailure(paused ? 'pause' : 'resume', err);
  }
}

export function listSubscriptionsText(ctx: FeedContext): string {
  const subscriptions = listSubscriptions(ctx.db);
  if (subscriptions.length === 0) {
    return 'No subscriptions.';
  }

  const counts = getSubscriptionItemCounts(ctx.db);
  const lines = [`Subscriptions (${subscriptions.length}):`];
  for (const sub of subscriptions) {
    const paused = sub.is_active ? '' : ' (paused)';
    const checked = sub.last_checked_at ? `, last checked ${sub.last_checked_at}` : '';
    lines.push(
      `  ${typeLabel(sub.source_type)} ${sub.name} (${sub.identifier})${paused}: ${plural(counts.get(sub.id) ?? 0, 'item')}${checked}`,
    );
  }
  return lines.join('\n');
}

export function formatCheckSummary(summary: CheckSummary): string {
  const lines = [
    'Feed Check Complete',
    `Checked ${plural(summary.subscriptionsChecked, 'subscription')}: ${summary.totalNew} new items`,
  ];

  for (const source of summary.perSource) {
    const status = source.error !== undefined ? ` (failed: ${source.error})` : '';
    lines.push(`  ${typeLabel(source.sourceType)} ${source.name}: ${source.newItems} new${status}`);
  }

  const transcribed = summary.enrichment.filter((a) => a.status === 'transcribed');
  const failed = summary.enrichment.filter((a) => a.status === 'failed');
  if (transcribed.length > 0) {
    lines.push(`Transcribed ${plural(transcribed.length, 'video')}:`);
    for (const action of transcribed) lines.push(`  ${action.title} (${action.url})`);
  }
  if (failed.length > 0) {
    lines.push(`Transcription failed for ${plural(failed.length, 'video')}:`);
    for (const action of failed) {
      if (action.status === 'failed') lines.push(`  ${action.title} (${action.url}): ${action.error}`);
    }
  }

  return lines.join('\n');
}

export async function checkFeedsText(ctx: FeedContext): Promise<string> {
  try {
    const summary = await runCheck(ctx.db, ctx.config, {
      fetcher: ctx.fetcher,
      transcriber: ctx.transcriber,
    });
    if (summary.subscriptionsChecked === 0) {
      return 'No active subscriptions to check.';
    }
    return formatCheckSummary(summary);
  } catch (err) {
    return describeFailure('check feeds', err);
  }
}

function formatItem(item: ItemWithSource, index: number): string {
  const meta = [`${typeLabel(item.source_type)} ${item.subscription_name}`];
  if (item.published) meta.push(item.published);
  if (item.author) meta.push(item.author);

  const lines = [`${index + 1}. ${item.title || '(untitled)'}`, `   ${meta.join(' | ')}`, `   URL: ${item.url}`];
  if (item.content) lines.push(`   ${preview(item.content)}`);
  return lines.join('\n');
}

export function getFeedItemsText(ctx: FeedContext, sourceType?: string, limit?: number): string {
  let type: SourceType | undefined;
  if (sourceType !== undefined) {
    if (!isSourceType(sourceType)) {
      return `Invalid source type: ${sourceType}. Valid types: ${SOURCE_TYPES.join(', ')}`;
    }
    type = sourceType;
  }

  try {
    const items = getItems(ctx.db, {
      sourceType: type,
      limit: limit ?? ctx.config.feeds.default_item_limit,
    });
    if (items.length === 0) {
      return sourceType ? `No ${sourceType} items found.` : 'No items found.';
    }

    const header = sourceType ? `Recent ${sourceType} items (${items.length}):` : `Recent items (${items.length}):`;
    return [header, ...items.map(formatItem)].join('\n\n');
  } catch (err) {
    return describeFailure('list items', err);
  }
}

export function searchFeedsText(ctx: FeedContext, query: string, limit?: number): string {
  try {
    const hits = searchItems(ctx.db, query, limit ?? ctx.config.feeds.default_item_limit);
    if (hits.length === 0) {
      return `No results for "${query}"`;
    }
    return [`Feed Search: ${plural(hits.length, 'result')} for "${query}"`, ...hits.map(formatItem)].join('\n\n');
  } catch (err) {
    return describeFailure('search', err);
  }
}
