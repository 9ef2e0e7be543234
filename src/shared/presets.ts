import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { parse as yamlParse } from 'yaml';
import { getPackageRoot } from './utils.js';
import { ConfigError } from './errors.js';

const NewsPresetSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  url: z.string().url(),
});

const PresetFileSchema = z.object({
  presets: z.array(NewsPresetSchema).min(1),
});

export type NewsPreset = z.infer<typeof NewsPresetSchema>;

let cachedPresets: Map<string, NewsPreset> | null = null;

export function getPresetsPath(): string {
  return path.join(getPackageRoot(), 'presets', 'news.yaml');
}

export function parsePresetFile(content: string): NewsPreset[] {
  const parsed = PresetFileSchema.safeParse(yamlParse(content));
  if (!parsed.success) {
    throw new ConfigError('Invalid news presets file', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data.presets;
}

export function loadNewsPresets(): Map<string, NewsPreset> {
  if (cachedPresets) return cachedPresets;

  const presetsPath = getPresetsPath();
  if (!fs.existsSync(presetsPath)) {
    throw new ConfigError(`News presets not found: ${presetsPath}`);
  }

  const presets = parsePresetFile(fs.readFileSync(presetsPath, 'utf-8'));
  cachedPresets = new Map(presets.map((p) => [p.key.toLowerCase(), p]));
  return cachedPresets;
}

export function findNewsPreset(key: string): NewsPreset | undefined {
  return loadNewsPresets().get(key.trim().toLowerCase());
}
