import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getFeedkeeperDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  db: z
    .object({
      path: z.string().default('~/.feedkeeper/feedkeeper.db'),
    })
    .default({}),

  ingest: z
    .object({
      default_concurrency: z.number().int().positive().default(5),
      fetch_timeout_ms: z.number().int().positive().default(15000),
      user_agent: z.string().default('feedkeeper/0.1 (+https://github.com/feedkeeper)'),
      hackernews_limit: z.number().int().positive().default(30),
      arxiv_max_results: z.number().int().positive().default(25),
    })
    .default({}),

  feeds: z
    .object({
      // Which Atom element wins when an entry carries both <summary> and <content>.
      atom_content: z.enum(['summary', 'content']).default('summary'),
      default_item_limit: z.number().int().positive().default(20),
    })
    .default({}),

  transcription: z
    .object({
      endpoint: z.string().default(''),
      quality_tier: z.string().min(1).default('tiny'),
      cache_dir: z.string().default('~/.feedkeeper/transcripts'),
      timeout_ms: z.number().int().positive().default(600000),
    })
    .default({}),

  schedule: z
    .object({
      check_cron: z.string().default('*/30 * * * *'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Apply FEEDKEEPER_* environment overrides on top of the raw file config.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...rawConfig };

  const dbPath = env['FEEDKEEPER_DB_PATH'];
  if (dbPath) {
    const db = isRecord(result['db']) ? { ...result['db'] } : {};
    db['path'] = dbPath;
    result['db'] = db;
  }

  const transcribeUrl = env['FEEDKEEPER_TRANSCRIBE_URL'];
  if (transcribeUrl) {
    const transcription = isRecord(result['transcription']) ? { ...result['transcription'] } : {};
    transcription['endpoint'] = transcribeUrl;
    result['transcription'] = transcription;
  }

  return result;
}

export function parseConfig(rawConfig: unknown): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('feedkeeper', {
    searchPlaces: [
      'feedkeeper.config.yaml',
      'feedkeeper.config.yml',
      '.feedkeeperrc.yaml',
      '.feedkeeperrc.yml',
    ],
  });

  const envConfigPath = process.env['FEEDKEEPER_CONFIG'];
  const defaultConfigPath = path.join(getFeedkeeperDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = isRecord(result?.config) ? result.config : {};
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    rawConfig = isRecord(result?.config) ? result.config : {};
  } else {
    logger.debug('No config file found, using defaults');
  }

  cachedConfig = parseConfig(applyEnvOverrides(rawConfig));
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
