/**
 * DirectoryLister - the per-directory pipeline shared by every consumer:
 * extend the pattern set with the local .gitignore, read the children
 * once, run the EntryFilter, then apply the whitelist.
 *
 * One lister serves one traversal. It memoizes include-mode
 * subtree searches by absolute path for that traversal only.
 */

import type { Logger } from 'pino';
import { filterEntries, isIncludeMode, type EntryFilterOptions } from '../filter/entry-filter.js';
import { GitignoreAccumulator } from '../gitignore/gitignore-accumulator.js';
import { getDefaultLogger } from '../logger.js';
import { PatternSet } from '../patterns/pattern-set.js';
import { nodeDirectoryReader } from './directory-reader.js';
import { isBelow } from './paths.js';
import type {
  DirectoryReader,
  EngineOptions,
  Entry,
  FilteredChildren,
  TraversalContext,
} from './types.js';

/**
 * Drop files that are not whitelisted and directories with no
 * whitelisted file beneath them. Without a whitelist, returns `entries`.
 */
export function applyWhitelist(entries: Entry[], whitelist: ReadonlySet<string> | undefined): Entry[] {
  if (whitelist === undefined) {
    return entries;
  }

  const selected = [...whitelist];
  return entries.filter((entry) =>
    entry.isDirectory
      ? selected.some((filePath) => isBelow(entry.absolutePath, filePath))
      : whitelist.has(entry.absolutePath),
  );
}

export class DirectoryLister {
  private readonly logger: Logger;
  private readonly reader: DirectoryReader;
  private readonly accumulator: GitignoreAccumulator;
  private readonly includeMode: boolean;
  /** Same filters, but uncapped and with files kept, for subtree searches */
  private readonly searchContext: TraversalContext;
  private readonly searchResults = new Map<string, boolean>();

  constructor(
    private readonly context: TraversalContext,
    options: EngineOptions = {},
  ) {
    const logger = options.logger ?? getDefaultLogger();
    this.logger = logger.child({ component: 'directory-lister' });
    this.reader = options.reader ?? nodeDirectoryReader;
    this.accumulator = new GitignoreAccumulator(context, { logger, reader: this.reader });
    this.includeMode = isIncludeMode(context);
    this.searchContext = Object.freeze({
      ...context,
      noFiles: false,
      maxItemsPerDirectory: undefined,
    });
  }

  /**
   * List the visible children of `directory`.
   *
   * @param directory - Absolute path of the directory
   * @param depth - Depth of `directory` (root is 0)
   * @param inherited - Pattern set in effect for `directory` itself
   */
  list(directory: string, depth: number, inherited: PatternSet = PatternSet.empty()): FilteredChildren {
    const patternSet = this.accumulator.extend(directory, depth, inherited);
    const raw = this.readChildren(directory, 'warn');

    const { visible, truncatedCount } = filterEntries(
      raw,
      directory,
      depth,
      patternSet,
      this.context,
      this.filterOptions(patternSet),
    );

    return {
      entries: applyWhitelist(visible, this.context.whitelist),
      truncatedCount,
      patternSet,
    };
  }

  private filterOptions(patternSet: PatternSet): EntryFilterOptions {
    if (!this.includeMode) {
      return {};
    }
    return {
      admitDirectory: (entry: Entry, depth: number) => this.subtreeHasIncludedFile(entry, depth, patternSet),
    };
  }

  /**
   * Whether a directory listed at `depth` holds an included file anywhere
   * beneath it, applying the same hidden/.gitignore/exclude rules.
   */
  private subtreeHasIncludedFile(directory: Entry, depth: number, inherited: PatternSet): boolean {
    if (directory.isSymbolicLink) {
      return false;
    }

    const cached = this.searchResults.get(directory.absolutePath);
    if (cached !== undefined) {
      return cached;
    }

    const childDepth = depth + 1;
    const patternSet = this.accumulator.extend(directory.absolutePath, childDepth, inherited);
    const raw = this.readChildren(directory.absolutePath, 'debug');
    const { visible } = filterEntries(
      raw,
      directory.absolutePath,
      childDepth,
      patternSet,
      this.searchContext,
      this.filterOptions(patternSet),
    );

    // In include mode every surviving file is an included file and every
    // surviving directory already passed this search.
    const result = visible.length > 0;
    this.searchResults.set(directory.absolutePath, result);
    return result;
  }

  private readChildren(directory: string, level: 'warn' | 'debug'): Entry[] {
    try {
      return this.reader.readDirectory(directory);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger[level]({ dir: directory, err: error }, 'Cannot read directory, treating it as empty');
      return [];
    }
  }
}

/**
 * List the filtered children of one directory.
 *
 * Returns the ordered visible entries, the number cut by the
 * per-directory cap, and the extended pattern set to hand down when
 * descending into any of the returned directories.
 */
export function listFilteredChildren(
  directory: string,
  depth: number,
  inheritedPatternSet: PatternSet,
  context: TraversalContext,
  options: EngineOptions = {},
): FilteredChildren {
  return new DirectoryLister(context, options).list(directory, depth, inheritedPatternSet);
}
