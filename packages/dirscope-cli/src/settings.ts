/**
 * Merge built-in defaults, the config file and command-line flags into
 * RunSettings, and map them onto engine traversal options.
 *
 * Precedence: defaults < config file < flags given on the command line.
 */

import * as path from 'path';
import type { TraversalOptions } from '@dirscope/core';
import { OUTPUT_FORMATS, type CliOptions, type DirscopeConfig, type OutputFormat, type RunSettings } from './types.js';

/** Whether an option's value came from the command line */
export type FromCli = (key: keyof CliOptions) => boolean;

function orUndefined(value: number | null): number | undefined {
  return value === null ? undefined : value;
}

/** Format implied by a file name's extension, if it names one */
export function formatFromExtension(file: string): OutputFormat | undefined {
  const ext = path.extname(file).slice(1).toLowerCase();
  return OUTPUT_FORMATS.find((format) => format === ext);
}

/** Append `.${extension}` when the file name has none */
export function withDefaultExtension(file: string, extension: string): string {
  return path.extname(file) === '' ? `${file}.${extension}` : file;
}

export function resolveSettings(options: CliOptions, fromCli: FromCli, config: DirscopeConfig): RunSettings {
  const pick = <T>(key: keyof CliOptions, cliValue: T | undefined, configValue: T): T =>
    fromCli(key) && cliValue !== undefined ? cliValue : configValue;

  let maxItems = pick('maxItems', options.maxItems, orUndefined(config.maxItems));
  if (fromCli('limit') && !options.limit) {
    maxItems = undefined;
  }

  let maxEntries = orUndefined(config.maxEntries);
  if (fromCli('maxEntries')) {
    maxEntries = options.maxEntries === false ? undefined : options.maxEntries;
  }

  let format = pick('format', options.format, config.format);
  if (!fromCli('format') && options.export !== undefined) {
    format = formatFromExtension(options.export) ?? format;
  }

  return {
    maxDepth: pick('maxDepth', options.maxDepth, orUndefined(config.maxDepth)),
    maxItems,
    maxEntries,
    gitignore: pick('gitignore', options.gitignore, config.gitignore),
    gitignoreDepth: pick('gitignoreDepth', options.gitignoreDepth, orUndefined(config.gitignoreDepth)),
    hiddenItems: pick('hiddenItems', options.hiddenItems, config.hiddenItems),
    exclude: pick('exclude', options.exclude, config.exclude),
    excludeDepth: pick('excludeDepth', options.excludeDepth, orUndefined(config.excludeDepth)),
    include: pick('include', options.include, config.include),
    includeFileTypes: pick('includeFileTypes', options.includeFileTypes, config.includeFileTypes),
    noFiles: fromCli('files') ? !options.files : config.noFiles,
    filesFirst: pick('filesFirst', options.filesFirst, config.filesFirst),
    showIcons: pick('emoji', options.emoji, config.showIcons),
    color: pick('color', options.color, config.color),
    interactive: options.interactive ?? false,
    exportFile: options.export === undefined ? undefined : withDefaultExtension(options.export, format),
    format,
    contents: pick('contents', options.contents, config.contents),
    skipContents: options.skipContents ?? [],
    zipFile: options.zip === undefined ? undefined : withDefaultExtension(options.zip, 'zip'),
    copy: options.copy ?? false,
    summary: options.summary ?? false,
  };
}

/** Traversal options for the tree as rendered or exported */
export function toTraversalOptions(settings: RunSettings): TraversalOptions {
  return {
    maxDepth: settings.maxDepth,
    showHidden: settings.hiddenItems,
    respectGitignore: settings.gitignore,
    gitignoreDepth: settings.gitignoreDepth,
    extraExcludePatterns: settings.exclude,
    excludeDepth: settings.excludeDepth,
    includePatterns: settings.include,
    includeFileTypes: settings.includeFileTypes,
    noFiles: settings.noFiles,
    maxItemsPerDirectory: settings.maxItems,
    maxTotalEntries: settings.maxEntries,
    filesFirst: settings.filesFirst,
  };
}

/** Same filters without any caps: archives, selection and summaries see every file */
export function toUncappedTraversalOptions(settings: RunSettings): TraversalOptions {
  return {
    ...toTraversalOptions(settings),
    maxItemsPerDirectory: undefined,
    maxTotalEntries: undefined,
  };
}
