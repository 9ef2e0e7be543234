import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { runMigrations } from './migrate.js';

export type Db = Database.Database;

/**
 * Open a feed database at `dbPath` (or ':memory:') and bring its schema up to date.
 * Each call returns its own connection; callers own closing it.
 */
export function openDb(dbPath: string, opts: { migrate?: boolean } = {}): Db {
  const resolved = dbPath === ':memory:' ? ':memory:' : resolvePath(dbPath);

  if (resolved !== ':memory:') {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
  }

  let db: Db;
  try {
    db = new Database(resolved);
    if (resolved !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');
  } catch (err) {
    throw new DbError(`Failed to open database at ${resolved}`, {
      path: resolved,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  if (opts.migrate !== false) {
    runMigrations(db);
  }

  logger.debug({ path: resolved }, 'Database opened');
  return db;
}

export function closeDb(db: Db): void {
  if (db.open) {
    db.close();
  }
}
