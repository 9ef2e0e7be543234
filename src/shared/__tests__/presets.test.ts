import { describe, it, expect } from 'vitest';
import { findNewsPreset, loadNewsPresets, parsePresetFile } from '../presets.js';
import { ConfigError } from '../errors.js';

describe('news presets', () => {
  it('loads the bundled presets', () => {
    const presets = loadNewsPresets();
    expect(presets.size).toBe(14);
    expect(presets.get('bbc')).toEqual({
      key: 'bbc',
      name: 'BBC News',
      url: 'http://feeds.bbci.co.uk/news/rss.xml',
    });
  });

  it('looks presets up case-insensitively', () => {
    expect(findNewsPreset(' BBC ')?.name).toBe('BBC News');
    expect(findNewsPreset('unknown')).toBeUndefined();
  });

  it('validates preset files', () => {
    expect(parsePresetFile('presets:\n  - key: a\n    name: A\n    url: https://a.example.com/rss\n')).toEqual([
      { key: 'a', name: 'A', url: 'https://a.example.com/rss' },
    ]);
    expect(() => parsePresetFile('presets: []\n')).toThrow(ConfigError);
    expect(() => parsePresetFile('presets:\n  - key: a\n    name: A\n    url: not-a-url\n')).toThrow(ConfigError);
  });
});
