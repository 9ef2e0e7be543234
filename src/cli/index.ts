#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getFeedkeeperDir, resolvePath } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { loadNewsPresets } from '../shared/presets.js';
import { openDb, closeDb, type Db } from '../db/db.js';
import { SOURCE_TYPES } from '../source/adapter.js';
import { countItems, listSubscriptions } from '../source/feedDb.js';
import { readCachedTranscript } from '../source/enrich.js';
import {
  checkFeedsText,
  getFeedItemsText,
  listSubscriptionsText,
  searchFeedsText,
  setFeedPaused,
  subscribeFeed,
  unsubscribeFeed,
} from '../feeds/operations.js';
import { startScheduler, stopScheduler } from '../schedule/scheduler.js';

const program = new Command();

program
  .name('feedkeeper')
  .description('Subscribe to feeds, store their items and search them')
  .version('0.1.0')
  .option('--db <path>', 'Database path (overrides config)');

// === init ===
program
  .command('init')
  .description('Create the config file and database')
  .action(async () => {
    const configPath = path.join(getFeedkeeperDir(), 'config.yaml');
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const { db, config, cleanup } = await getDb();
    try {
      log(`✓ Database ready at ${resolvePath(config.db.path)} (${listSubscriptions(db).length} subscriptions)`);
    } finally {
      cleanup();
    }
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, database and transcription setup')
  .action(async () => {
    const results: string[] = [];
    try {
      const config = await loadConfig();
      results.push('Config: ok');
      try {
        const db = openDb(dbPathFor(config));
        results.push(`DB: ok (${listSubscriptions(db).length} subscriptions, ${countItems(db)} items)`);
        closeDb(db);
      } catch (err) {
        results.push(`DB: error (${errorMessage(err)})`);
      }
      results.push(config.transcription.endpoint ? 'Transcription: configured' : 'Transcription: (unconfigured)');
    } catch (err) {
      results.push(`Config: error (${errorMessage(err)})`);
    }
    log(results.join(' | '));
  });

// === presets ===
program
  .command('presets')
  .description('List named news feeds')
  .action(() => {
    for (const preset of loadNewsPresets().values()) {
      log(`${preset.key.padEnd(16)} ${preset.name.padEnd(28)} ${preset.url}`);
    }
  });

// === subscribe / unsubscribe ===
program
  .command('subscribe <type> <identifier>')
  .description(`Subscribe to a source (${SOURCE_TYPES.join(', ')})`)
  .action(async (type: string, identifier: string) => {
    await withDb((ctx) => log(subscribeFeed(ctx, type, identifier)));
  });

program
  .command('unsubscribe <type> <identifier>')
  .description('Remove a subscription and all of its items')
  .action(async (type: string, identifier: string) => {
    await withDb((ctx) => log(unsubscribeFeed(ctx, type, identifier)));
  });

program
  .command('pause <type> <identifier>')
  .description('Stop checking a subscription without removing its items')
  .action(async (type: string, identifier: string) => {
    await withDb((ctx) => log(setFeedPaused(ctx, type, identifier, true)));
  });

program
  .command('resume <type> <identifier>')
  .description('Resume checking a paused subscription')
  .action(async (type: string, identifier: string) => {
    await withDb((ctx) => log(setFeedPaused(ctx, type, identifier, false)));
  });

program
  .command('list')
  .description('List subscriptions')
  .action(async () => {
    await withDb((ctx) => log(listSubscriptionsText(ctx)));
  });

// === check ===
program
  .command('check')
  .description('Fetch new items from every active subscription')
  .action(async () => {
    await withDb(async (ctx) => log(await checkFeedsText(ctx)));
  });

// === items / search ===
program
  .command('items')
  .description('Show the most recent items')
  .option('-t, --type <type>', 'Only items from this source type')
  .option('-n, --limit <n>', 'Number of items')
  .action(async (opts: { type?: string; limit?: string }) => {
    await withDb((ctx) => log(getFeedItemsText(ctx, opts.type, parseLimit(opts.limit))));
  });

program
  .command('search <query>')
  .description('Full-text search over item titles and content')
  .option('-n, --limit <n>', 'Number of results')
  .action(async (query: string, opts: { limit?: string }) => {
    await withDb((ctx) => log(searchFeedsText(ctx, query, parseLimit(opts.limit))));
  });

// === transcript ===
program
  .command('transcript <url>')
  .description('Print the cached transcript for a video URL')
  .action(async (url: string) => {
    const config = await loadConfig();
    const cached = readCachedTranscript(url, {
      cacheDir: config.transcription.cache_dir,
      tier: config.transcription.quality_tier,
    });
    if (!cached) {
      log(`No cached transcript for ${url}`);
      process.exitCode = 1;
      return;
    }
    log(cached.transcript);
  });

// === watch ===
program
  .command('watch')
  .description('Check feeds on the configured cron schedule until interrupted')
  .action(async () => {
    const { db, config, cleanup } = await getDb();
    startScheduler(db, config);
    log(`Watching feeds (${config.schedule.check_cron}). Press Ctrl+C to stop.`);

    const shutdown = (): void => {
      stopScheduler();
      cleanup();
      process.exit(0);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

// === Helpers ===
function dbPathFor(config: Config): string {
  const override = program.opts<{ db?: string }>().db;
  return override ?? config.db.path;
}

async function getDb(): Promise<{ db: Db; config: Config; cleanup: () => void }> {
  const config = await loadConfig();
  const db = openDb(dbPathFor(config));
  return { db, config, cleanup: () => closeDb(db) };
}

async function withDb(fn: (ctx: { db: Db; config: Config }) => void | Promise<void>): Promise<void> {
  const { db, config, cleanup } = await getDb();
  try {
    await fn({ db, config });
  } finally {
    cleanup();
  }
}

function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  logger.debug({ stack: err instanceof Error ? err.stack : undefined }, 'Command failed');
  log(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
