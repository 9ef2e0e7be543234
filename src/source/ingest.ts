import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { AdapterContext, CanonicalItem, Fetcher, SourceType, Subscription } from './adapter.js';
import { checkSource, createAdapterContext } from './registry.js';
import { fetcherFromConfig } from './http.js';
import { listSubscriptions, markChecked, storeNewItems } from './feedDb.js';
import { autoEnrich, createHttpTranscriber, type EnrichmentAction, type Transcriber } from './enrich.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { withConcurrency } from '../shared/utils.js';

export interface CheckDeps {
  fetcher?: Fetcher;
  /** Omit to use the configured HTTP transcriber; null disables enrichment. */
  transcriber?: Transcriber | null;
}

export interface CheckOptions {
  sourceType?: SourceType;
  sourceIds?: string[];
  concurrency?: number;
}

export interface SourceCheckResult {
  subscriptionId: string;
  sourceType: SourceType;
  name: string;
  fetched: number;
  newItems: number;
  error?: string;
}

export interface CheckSummary {
  subscriptionsChecked: number;
  subscriptionsFailed: number;
  totalNew: number;
  perSource: SourceCheckResult[];
  enrichment: EnrichmentAction[];
  errors: Array<{ source: string; error: string }>;
  durationMs: number;
}

export function resolveTranscriber(config: Config, deps: CheckDeps): Transcriber | null {
  if (deps.transcriber !== undefined) return deps.transcriber;
  const { endpoint, timeout_ms } = config.transcription;
  return endpoint ? createHttpTranscriber(endpoint, timeout_ms) : null;
}

type FetchOutcome = { ok: true; items: CanonicalItem[] } | { ok: false; error: string };

/**
 * Run one check cycle over every active subscription. A failing source is
 * recorded as zero new items and left unchanged; it never aborts the rest of the cycle.
 */
export async function runCheck(
  db: Database.Database,
  config: Config,
  deps: CheckDeps = {},
  options: CheckOptions = {},
): Promise<CheckSummary> {
  const startTime = Date.now();
  const ctx = createAdapterContext(config, deps.fetcher ?? fetcherFromConfig(config));
  const transcriber = resolveTranscriber(config, deps);
  const concurrency = options.concurrency ?? config.ingest.default_concurrency;

  const summary: CheckSummary = {
    subscriptionsChecked: 0,
    subscriptionsFailed: 0,
    totalNew: 0,
    perSource: [],
    enrichment: [],
    errors: [],
    durationMs: 0,
  };

  let subscriptions = listSubscriptions(db, { activeOnly: true, sourceType: options.sourceType });
  if (options.sourceIds && options.sourceIds.length > 0) {
    const idSet = new Set(options.sourceIds);
    subscriptions = subscriptions.filter((s) => idSet.has(s.id));
  }

  if (subscriptions.length === 0) {
    logger.info('No active subscriptions to check');
    summary.durationMs = Date.now() - startTime;
    return summary;
  }

  const results = await withConcurrency(subscriptions, concurrency, async (sub: Subscription) => {
    const outcome = await fetchSubscription(sub, ctx);
    // Storage is synchronous: each write runs to completion before the next fetch resolves.
    return recordOutcome(db, sub, outcome);
  });

  for (const { result } of results) {
    summary.subscriptionsChecked++;
    summary.totalNew += result.newItems;
    summary.perSource.push(result);
    if (result.error !== undefined) {
      summary.subscriptionsFailed++;
      summary.errors.push({ source: result.name, error: result.error });
    }
  }

  for (const { sub, newItems } of results) {
    if (sub.source_type !== 'youtube' || newItems.length === 0 || !transcriber) continue;
    try {
      const actions = await autoEnrich(newItems, {
        transcriber,
        tier: config.transcription.quality_tier,
        cacheDir: config.transcription.cache_dir,
      });
      summary.enrichment.push(...actions);
    } catch (err) {
      const error = errorMessage(err);
      summary.errors.push({ source: sub.name, error });
      logger.warn({ subscription: sub.name, error }, 'Auto-enrichment failed');
    }
  }

  summary.durationMs = Date.now() - startTime;
  logger.info(
    {
      subscriptionsChecked: summary.subscriptionsChecked,
      subscriptionsFailed: summary.subscriptionsFailed,
      totalNew: summary.totalNew,
      transcribed: summary.enrichment.filter((a) => a.status === 'transcribed').length,
      durationMs: summary.durationMs,
    },
    'Feed check complete',
  );

  return summary;
}

async function fetchSubscription(
  sub: Subscription,
  ctx: AdapterContext,
): Promise<FetchOutcome> {
  try {
    const items = await checkSource(sub.source_type, sub.feed_url, ctx);
    return { ok: true, items };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

function recordOutcome(
  db: Database.Database,
  sub: Subscription,
  outcome: FetchOutcome,
): { sub: Subscription; result: SourceCheckResult; newItems: CanonicalItem[] } {
  const result: SourceCheckResult = {
    subscriptionId: sub.id,
    sourceType: sub.source_type,
    name: sub.name,
    fetched: 0,
    newItems: 0,
  };
  let newItems: CanonicalItem[] = [];

  if (outcome.ok) {
    result.fetched = outcome.items.length;
    try {
      newItems = storeNewItems(db, sub.id, sub.source_type, outcome.items);
      result.newItems = newItems.length;
      logger.debug({ subscription: sub.name, fetched: result.fetched, new: result.newItems }, 'Subscription checked');
    } catch (err) {
      result.error = errorMessage(err);
    }
  } else {
    result.error = outcome.error;
  }

  if (result.error !== undefined) {
    logger.warn({ subscription: sub.name, source: sub.feed_url, error: result.error }, 'Subscription check failed');
  } else {
    markChecked(db, sub.id);
  }

  return { sub, result, newItems };
}
