/**
 * Tests for merging defaults, config and flags (settings.ts)
 */

import { describe, it, expect } from 'vitest';
import { parseConfig } from '../config.js';
import {
  formatFromExtension,
  resolveSettings,
  toTraversalOptions,
  toUncappedTraversalOptions,
  withDefaultExtension,
  type FromCli,
} from '../settings.js';
import type { CliOptions, DirscopeConfig } from '../types.js';

/** What commander hands over when no flag is given */
const NO_FLAGS: CliOptions = {
  limit: true,
  gitignore: true,
  files: true,
  color: true,
  contents: true,
  config: true,
};

function fromCli(...keys: Array<keyof CliOptions>): FromCli {
  return (key) => keys.includes(key);
}

function config(raw: Partial<DirscopeConfig> = {}): DirscopeConfig {
  return parseConfig(raw, 'config.yaml');
}

describe('resolveSettings', () => {
  it('uses the built-in defaults when nothing is configured', () => {
    const settings = resolveSettings(NO_FLAGS, fromCli(), config());

    expect(settings).toEqual({
      maxDepth: undefined,
      maxItems: 20,
      maxEntries: 40,
      gitignore: true,
      gitignoreDepth: undefined,
      hiddenItems: false,
      exclude: [],
      excludeDepth: undefined,
      include: [],
      includeFileTypes: [],
      noFiles: false,
      filesFirst: false,
      showIcons: false,
      color: true,
      interactive: false,
      exportFile: undefined,
      format: 'txt',
      contents: true,
      skipContents: [],
      zipFile: undefined,
      copy: false,
      summary: false,
    });
  });

  it('lets the config file override defaults', () => {
    const settings = resolveSettings(NO_FLAGS, fromCli(), config({ maxItems: 5, exclude: ['dist'], showIcons: true }));

    expect(settings.maxItems).toBe(5);
    expect(settings.exclude).toEqual(['dist']);
    expect(settings.showIcons).toBe(true);
  });

  it('lets command-line flags override the config file', () => {
    const options: CliOptions = { ...NO_FLAGS, maxItems: 3, exclude: ['build'], emoji: false };
    const settings = resolveSettings(
      options,
      fromCli('maxItems', 'exclude', 'emoji'),
      config({ maxItems: 5, exclude: ['dist'], showIcons: true }),
    );

    expect(settings.maxItems).toBe(3);
    expect(settings.exclude).toEqual(['build']);
    expect(settings.showIcons).toBe(false);
  });

  it('ignores option values that did not come from the command line', () => {
    const settings = resolveSettings({ ...NO_FLAGS, color: true }, fromCli(), config({ color: false }));
    expect(settings.color).toBe(false);
  });

  it('removes the per-directory limit with --no-limit', () => {
    const settings = resolveSettings({ ...NO_FLAGS, limit: false }, fromCli('limit'), config({ maxItems: 5 }));
    expect(settings.maxItems).toBeUndefined();
  });

  it('handles --max-entries and --no-max-entries', () => {
    expect(resolveSettings({ ...NO_FLAGS, maxEntries: 10 }, fromCli('maxEntries'), config()).maxEntries).toBe(10);
    expect(resolveSettings({ ...NO_FLAGS, maxEntries: false }, fromCli('maxEntries'), config()).maxEntries).toBeUndefined();
    expect(resolveSettings(NO_FLAGS, fromCli(), config({ maxEntries: null })).maxEntries).toBeUndefined();
  });

  it('maps --no-files onto noFiles', () => {
    expect(resolveSettings({ ...NO_FLAGS, files: false }, fromCli('files'), config()).noFiles).toBe(true);
    expect(resolveSettings(NO_FLAGS, fromCli(), config({ noFiles: true })).noFiles).toBe(true);
  });

  it('infers the export format from the file extension', () => {
    const settings = resolveSettings({ ...NO_FLAGS, export: 'out/tree.md' }, fromCli('export'), config());

    expect(settings.format).toBe('md');
    expect(settings.exportFile).toBe('out/tree.md');
  });

  it('keeps an explicit --format and appends it to a bare export name', () => {
    const bare = resolveSettings({ ...NO_FLAGS, export: 'tree', format: 'json' }, fromCli('export', 'format'), config());
    expect(bare.format).toBe('json');
    expect(bare.exportFile).toBe('tree.json');

    const mismatched = resolveSettings(
      { ...NO_FLAGS, export: 'tree.md', format: 'json' },
      fromCli('export', 'format'),
      config(),
    );
    expect(mismatched.format).toBe('json');
    expect(mismatched.exportFile).toBe('tree.md');
  });

  it('falls back to the configured format for unknown extensions', () => {
    const settings = resolveSettings({ ...NO_FLAGS, export: 'tree' }, fromCli('export'), config({ format: 'md' }));

    expect(settings.format).toBe('md');
    expect(settings.exportFile).toBe('tree.md');
  });

  it('adds .zip to a bare archive name', () => {
    expect(resolveSettings({ ...NO_FLAGS, zip: 'bundle' }, fromCli('zip'), config()).zipFile).toBe('bundle.zip');
    expect(resolveSettings({ ...NO_FLAGS, zip: 'bundle.zip' }, fromCli('zip'), config()).zipFile).toBe('bundle.zip');
  });
});

describe('formatFromExtension', () => {
  it('recognizes the export formats case-insensitively', () => {
    expect(formatFromExtension('tree.JSON')).toBe('json');
    expect(formatFromExtension('tree.txt')).toBe('txt');
    expect(formatFromExtension('tree.yaml')).toBeUndefined();
    expect(formatFromExtension('tree')).toBeUndefined();
  });
});

describe('withDefaultExtension', () => {
  it('only appends when the name has no extension', () => {
    expect(withDefaultExtension('tree', 'txt')).toBe('tree.txt');
    expect(withDefaultExtension('tree.out', 'txt')).toBe('tree.out');
  });
});

describe('traversal options', () => {
  const settings = resolveSettings(
    { ...NO_FLAGS, hiddenItems: true, maxDepth: 2, include: ['*.ts'] },
    fromCli('hiddenItems', 'maxDepth', 'include'),
    config(),
  );

  it('maps settings onto engine options', () => {
    expect(toTraversalOptions(settings)).toEqual({
      maxDepth: 2,
      showHidden: true,
      respectGitignore: true,
      gitignoreDepth: undefined,
      extraExcludePatterns: [],
      excludeDepth: undefined,
      includePatterns: ['*.ts'],
      includeFileTypes: [],
      noFiles: false,
      maxItemsPerDirectory: 20,
      maxTotalEntries: 40,
      filesFirst: false,
    });
  });

  it('drops both caps for uncapped walks', () => {
    const options = toUncappedTraversalOptions(settings);

    expect(options.maxItemsPerDirectory).toBeUndefined();
    expect(options.maxTotalEntries).toBeUndefined();
    expect(options.maxDepth).toBe(2);
  });
});
