/**
 * Scheduler: node-cron job that runs a feed check cycle on `schedule.check_cron`.
 * Started by `feedkeeper watch`.
 */

import cron from 'node-cron';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { runCheck, type CheckDeps, type CheckSummary } from '../source/ingest.js';

let checkTask: cron.ScheduledTask | null = null;
let running = false;

/**
 * Run one scheduled cycle. Overlapping ticks are skipped, so a slow cycle
 * never races the next one for the same subscriptions.
 */
export async function runScheduledCheck(
  db: Database.Database,
  config: Config,
  deps: CheckDeps = {},
): Promise<CheckSummary | null> {
  if (running) {
    logger.warn('Previous feed check still running, skipping this tick');
    return null;
  }
  running = true;
  try {
    return await runCheck(db, config, deps);
  } catch (err) {
    logger.error({ error: errorMessage(err) }, 'Scheduled feed check failed');
    return null;
  } finally {
    running = false;
  }
}

export function startScheduler(db: Database.Database, config: Config, deps: CheckDeps = {}): void {
  const expr = config.schedule.check_cron;
  if (!cron.validate(expr)) {
    throw new ConfigError(`Invalid cron expression: ${expr}`, { check_cron: expr });
  }

  stopScheduler();
  checkTask = cron.schedule(expr, () => {
    void runScheduledCheck(db, config, deps);
  });
  logger.info({ cron: expr }, 'Feed check scheduler started');
}

export function stopScheduler(): void {
  if (checkTask) {
    checkTask.stop();
    checkTask = null;
    logger.info('Feed check scheduler stopped');
  }
}
