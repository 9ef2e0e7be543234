import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface Migration {
  name: string;
  sql: string;
}

export interface MigrationResult {
  applied: string[];
  skipped: string[];
  /** True when the search index had drifted from feed_items and was rebuilt. */
  reindexed: boolean;
}

const MIGRATIONS_DIR = path.join(getPackageRoot(), 'src', 'db', 'migrations');

/** Read `.sql` files from `dir` in name order. */
export function loadMigrations(dir: string = MIGRATIONS_DIR): Migration[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`, { dir });
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .map((name) => ({ name, sql: fs.readFileSync(path.join(dir, name), 'utf-8') }));
}

function assertFts5(db: Database.Database): void {
  const enabled = db.prepare("SELECT sqlite_compileoption_used('ENABLE_FTS5') AS enabled").get() as {
    enabled: number;
  };
  if (enabled.enabled !== 1) {
    throw new DbError('SQLite was built without FTS5; full-text search is unavailable');
  }
}

function appliedNames(db: Database.Database): Set<string> {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
  const rows = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
  return new Set(rows.map((r) => r.name));
}

function tableExists(db: Database.Database, name: string): boolean {
  return db.prepare("SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = ?").get(name) !== undefined;
}

/**
 * Rebuild feed_items_fts when its row count no longer matches feed_items,
 * e.g. after rows were written with the triggers missing.
 */
export function syncSearchIndex(db: Database.Database): boolean {
  if (!tableExists(db, 'feed_items') || !tableExists(db, 'feed_items_fts')) {
    return false;
  }

  const counts = db
    .prepare('SELECT (SELECT COUNT(*) FROM feed_items) AS items, (SELECT COUNT(*) FROM feed_items_fts) AS indexed')
    .get() as { items: number; indexed: number };
  if (counts.items === counts.indexed) {
    return false;
  }

  db.transaction(() => {
    db.exec('DELETE FROM feed_items_fts');
    db.exec('INSERT INTO feed_items_fts (rowid, title, content) SELECT id, title, content FROM feed_items');
  })();
  logger.warn(counts, 'Search index out of sync with feed_items; rebuilt');
  return true;
}

/**
 * Apply pending migrations, each in its own transaction, then make sure the
 * search index covers every stored item.
 */
export function runMigrations(db: Database.Database, migrations: Migration[] = loadMigrations()): MigrationResult {
  assertFts5(db);

  const done = appliedNames(db);
  const applied: string[] = [];
  const skipped: string[] = [];
  const record = db.prepare('INSERT INTO _migrations (name) VALUES (?)');

  for (const migration of migrations) {
    if (done.has(migration.name)) {
      skipped.push(migration.name);
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        record.run(migration.name);
      })();
    } catch (err) {
      throw new DbError(`Migration failed: ${migration.name}`, {
        migration: migration.name,
        cause: errorMessage(err),
      });
    }
    applied.push(migration.name);
    logger.debug({ migration: migration.name }, 'Migration applied');
  }

  return { applied, skipped, reindexed: syncSearchIndex(db) };
}
