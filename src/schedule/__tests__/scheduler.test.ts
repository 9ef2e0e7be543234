import { describe, it, expect, vi, afterEach } from 'vitest';
import { openDb } from '../../db/db.js';
import { ConfigSchema } from '../../shared/config.js';
import { ConfigError } from '../../shared/errors.js';
import type { Fetcher } from '../../source/adapter.js';
import { runScheduledCheck, startScheduler, stopScheduler } from '../scheduler.js';

describe('scheduler', () => {
  afterEach(() => {
    stopScheduler();
  });

  it('runs a check cycle', async () => {
    const db = openDb(':memory:');
    const summary = await runScheduledCheck(db, ConfigSchema.parse({}), { transcriber: null });
    expect(summary?.subscriptionsChecked).toBe(0);
  });

  it('skips a tick while the previous cycle is running', async () => {
    const db = openDb(':memory:');
    const config = ConfigSchema.parse({});
    const fetcher: Fetcher = vi.fn(async () => '');

    const first = runScheduledCheck(db, config, { fetcher, transcriber: null });
    const second = runScheduledCheck(db, config, { fetcher, transcriber: null });

    expect(await second).toBeNull();
    expect(await first).not.toBeNull();
  });

  it('rejects an invalid cron expression', () => {
    const db = openDb(':memory:');
    const config = ConfigSchema.parse({ schedule: { check_cron: 'every minute' } });
    expect(() => startScheduler(db, config)).toThrow(ConfigError);
  });

  it('starts and stops with a valid expression', () => {
    const db = openDb(':memory:');
    expect(() => startScheduler(db, ConfigSchema.parse({}))).not.toThrow();
    stopScheduler();
  });
});
