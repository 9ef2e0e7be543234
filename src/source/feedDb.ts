import type Database from 'better-sqlite3';
import {
  SOURCE_TYPES,
  isSourceType,
  type CanonicalItem,
  type FeedItem,
  type ResolvedSource,
  type SourceType,
  type Subscription,
} from './adapter.js';
import { generateId, nowISO } from '../shared/utils.js';
import { DbError, InvalidSourceTypeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

// ================================================================
// Subscriptions
// ================================================================

export type SubscribeResult =
  | { status: 'created'; subscription: Subscription }
  | { status: 'exists'; subscription: Subscription };

export type UnsubscribeResult =
  | { status: 'deleted'; subscription: Subscription; itemsRemoved: number }
  | { status: 'not_found' };

export function assertSourceType(sourceType: string): SourceType {
  if (!isSourceType(sourceType)) {
    throw new InvalidSourceTypeError(sourceType, SOURCE_TYPES);
  }
  return sourceType;
}

export function findSubscription(
  db: Database.Database,
  sourceType: SourceType,
  identifier: string,
): Subscription | undefined {
  return db
    .prepare('SELECT * FROM subscriptions WHERE source_type = ? AND identifier = ?')
    .get(sourceType, identifier) as Subscription | undefined;
}

export function getSubscription(db: Database.Database, id: string): Subscription | undefined {
  return db.prepare('SELECT * FROM subscriptions WHERE id = ?').get(id) as Subscription | undefined;
}

/**
 * Create a subscription, or return the existing one untouched. The row is keyed
 * by the identifier `resolve` returns, not by the spelling the caller passed.
 */
export function subscribe(
  db: Database.Database,
  sourceType: string,
  identifier: string,
  resolve: (type: SourceType, identifier: string) => ResolvedSource,
): SubscribeResult {
  const type = assertSourceType(sourceType);
  const { identifier: key, name, feedUrl } = resolve(type, identifier.trim());

  const run = db.transaction((): SubscribeResult => {
    const existing = findSubscription(db, type, key);
    if (existing) {
      return { status: 'exists', subscription: existing };
    }

    const id = generateId();
    db.prepare(
      `INSERT INTO subscriptions (id, source_type, identifier, name, feed_url, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
    ).run(id, type, key, name, feedUrl, nowISO());

    const created = getSubscription(db, id);
    if (!created) {
      throw new DbError('Subscription vanished after insert', { id });
    }
    return { status: 'created', subscription: created };
  });

  const result = run();
  if (result.status === 'created') {
    logger.info({ type, identifier: key, id: result.subscription.id }, 'Subscribed');
  }
  return result;
}

/**
 * Delete a subscription together with its items and their index rows.
 * `identifier` must already be canonical (see `ResolvedSource`).
 */
export function unsubscribe(db: Database.Database, sourceType: string, identifier: string): UnsubscribeResult {
  const type = assertSourceType(sourceType);

  const run = db.transaction((): UnsubscribeResult => {
    const subscription = findSubscription(db, type, identifier.trim());
    if (!subscription) {
      return { status: 'not_found' };
    }
    // Explicit delete so the FTS trigger fires per row; the FK cascade covers anything left.
    const removed = db.prepare('DELETE FROM feed_items WHERE subscription_id = ?').run(subscription.id);
    db.prepare('DELETE FROM subscriptions WHERE id = ?').run(subscription.id);
    return { status: 'deleted', subscription, itemsRemoved: removed.changes };
  });

  const result = run();
  if (result.status === 'deleted') {
    logger.info({ type, identifier, itemsRemoved: result.itemsRemoved }, 'Unsubscribed');
  }
  return result;
}

export function listSubscriptions(
  db: Database.Database,
  opts: { activeOnly?: boolean; sourceType?: SourceType } = {},
): Subscription[] {
  const where: string[] = [];
  const params: unknown[] = [];
  if (opts.activeOnly) where.push('is_active = 1');
  if (opts.sourceType) {
    where.push('source_type = ?');
    params.push(opts.sourceType);
  }
  const clause = where.length > 0 ? `WHERE ${where.join(' AND ')}` : '';
  return db
    .prepare(`SELECT * FROM subscriptions ${clause} ORDER BY source_type, name`)
    .all(...params) as Subscription[];
}

export function setSubscriptionActive(db: Database.Database, id: string, active: boolean): boolean {
  const result = db.prepare('UPDATE subscriptions SET is_active = ? WHERE id = ?').run(active ? 1 : 0, id);
  return result.changes > 0;
}

export function markChecked(db: Database.Database, id: string, at: string = nowISO()): void {
  db.prepare('UPDATE subscriptions SET last_checked_at = ? WHERE id = ?').run(at, id);
}

// ================================================================
// Items
// ================================================================

/**
 * Insert items that are new for this subscription and return them. Blank URLs
 * are dropped; an item whose (subscription, url) pair is already stored is skipped.
 */
export function storeNewItems(
  db: Database.Database,
  subscriptionId: string,
  sourceType: SourceType,
  items: readonly CanonicalItem[],
): CanonicalItem[] {
  const insert = db.prepare(
    `INSERT OR IGNORE INTO feed_items
     (subscription_id, title, url, content, published, author, metadata, fetched_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
  );

  const run = db.transaction((batch: readonly CanonicalItem[]): CanonicalItem[] => {
    const fetchedAt = new Date().toISOString();
    const inserted: CanonicalItem[] = [];
    for (const item of batch) {
      const url = item.url.trim();
      if (!url) continue;
      const result = insert.run(
        subscriptionId,
        item.title,
        url,
        item.content,
        item.published,
        item.author,
        JSON.stringify(item.metadata ?? {}),
        fetchedAt,
      );
      if (result.changes > 0) {
        inserted.push({ ...item, url });
      }
    }
    return inserted;
  });

  try {
    const inserted = run(items);
    logger.debug({ subscriptionId, sourceType, offered: items.length, inserted: inserted.length }, 'Items stored');
    return inserted;
  } catch (err) {
    throw new DbError(`Failed to store items: ${err instanceof Error ? err.message : String(err)}`, {
      subscriptionId,
    });
  }
}

/**
 * Returns the count of newly inserted rows; storing the same batch twice inserts nothing.
 */
export function storeItems(
  db: Database.Database,
  subscriptionId: string,
  sourceType: SourceType,
  items: readonly CanonicalItem[],
): number {
  return storeNewItems(db, subscriptionId, sourceType, items).length;
}

export interface ItemWithSource extends FeedItem {
  source_type: SourceType;
  subscription_name: string;
}

export function getItems(
  db: Database.Database,
  opts: { sourceType?: SourceType; limit?: number } = {},
): ItemWithSource[] {
  const limit = opts.limit ?? 20;
  const where = opts.sourceType ? 'WHERE s.source_type = ?' : '';
  const params: unknown[] = opts.sourceType ? [opts.sourceType, limit] : [limit];
  return db
    .prepare(
      `SELECT i.*, s.source_type, s.name AS subscription_name
       FROM feed_items i
       JOIN subscriptions s ON s.id = i.subscription_id
       ${where}
       ORDER BY (i.published = '') ASC, i.published DESC, i.id DESC
       LIMIT ?`,
    )
    .all(...params) as ItemWithSource[];
}

export interface SearchHit extends ItemWithSource {
  score: number;
}

/**
 * Turn free text into an FTS5 query of quoted terms, all of which must match.
 * Returns null when nothing searchable is left.
 */
export function toFtsQuery(query: string): string | null {
  const terms = query.match(/[\p{L}\p{N}_]+/gu) ?? [];
  if (terms.length === 0) return null;
  return terms.map((t) => `"${t}"`).join(' ');
}

export function searchItems(db: Database.Database, query: string, limit = 20): SearchHit[] {
  const ftsQuery = toFtsQuery(query);
  if (!ftsQuery) return [];

  return db
    .prepare(
      `SELECT i.*, s.source_type, s.name AS subscription_name, bm25(feed_items_fts) AS score
       FROM feed_items_fts
       JOIN feed_items i ON i.id = feed_items_fts.rowid
       JOIN subscriptions s ON s.id = i.subscription_id
       WHERE feed_items_fts MATCH ?
       ORDER BY score, i.id DESC
       LIMIT ?`,
    )
    .all(ftsQuery, limit) as SearchHit[];
}

export function countItems(db: Database.Database, subscriptionId?: string): number {
  const row = (
    subscriptionId
      ? db.prepare('SELECT COUNT(*) AS count FROM feed_items WHERE subscription_id = ?').get(subscriptionId)
      : db.prepare('SELECT COUNT(*) AS count FROM feed_items').get()
  ) as { count: number };
  return row.count;
}

export function getSubscriptionItemCounts(db: Database.Database): Map<string, number> {
  const rows = db
    .prepare('SELECT subscription_id, COUNT(*) AS count FROM feed_items GROUP BY subscription_id')
    .all() as Array<{ subscription_id: string; count: number }>;
  return new Map(rows.map((r) => [r.subscription_id, r.count]));
}

export function parseMetadata(item: Pick<FeedItem, 'metadata'>): Record<string, unknown> {
  try {
    const value: unknown = JSON.parse(item.metadata);
    return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : {};
  } catch {
    return {};
  }
}
