/**
 * EntryFilter - decides which raw children of one directory are visible.
 *
 * Decision order per entry (all must pass):
 * 1. hidden names, unless an include rule matches them (or, for a
 *    directory, an anchored include rule reaches below it)
 * 2. the effective .gitignore PatternSet, unless an include rule matches
 * 3. extra exclude globs (only down to excludeDepth), unless an include rule matches
 * 4. include mode: files must match; directories go through `admitDirectory`
 * 5. no-files mode drops every file
 *
 * Survivors are ordered (directories and files each sorted by name,
 * case-insensitively) and then cut to maxItemsPerDirectory. The filter
 * is whitelist-agnostic: the selection collector that computes
 * whitelists uses it too.
 */

import { checkNameOrPath, parsePattern, ruleReachesBelow } from '../patterns/pattern-matcher.js';
import type { Matcher, PatternRule } from '../patterns/types.js';
import { relativeToRoot } from '../traversal/paths.js';
import type { Entry, TraversalContext } from '../traversal/types.js';
import { matchesFileType, normalizeFileType } from './file-types.js';

/** Rules compiled once per context */
interface CompiledFilters {
  excludeRules: PatternRule[];
  includeRules: PatternRule[];
  fileTypes: string[];
  includeMode: boolean;
}

export interface EntryFilterOptions {
  /**
   * Called in include mode for every directory that reached step 4.
   * Returning false prunes it (e.g. no included file in its subtree).
   */
  admitDirectory?: (entry: Entry, depth: number) => boolean;
}

export interface EntryFilterResult {
  /** Ordered, truncated survivors */
  visible: Entry[];
  /** Survivors cut by maxItemsPerDirectory */
  truncatedCount: number;
}

const compiledByContext = new WeakMap<TraversalContext, CompiledFilters>();

function compileRules(patterns: readonly string[], source: string): PatternRule[] {
  const rules: PatternRule[] = [];
  for (const pattern of patterns) {
    const rule = parsePattern(pattern, { source });
    if (rule !== null) {
      rules.push(rule);
    }
  }
  return rules;
}

function getCompiledFilters(context: TraversalContext): CompiledFilters {
  let compiled = compiledByContext.get(context);
  if (compiled === undefined) {
    const fileTypes = context.includeFileTypes.map(normalizeFileType).filter((type) => type !== '');
    const includeRules = compileRules(context.includePatterns, 'include');
    compiled = {
      excludeRules: compileRules(context.extraExcludePatterns, 'exclude'),
      includeRules,
      fileTypes,
      includeMode: includeRules.length > 0 || fileTypes.length > 0,
    };
    compiledByContext.set(context, compiled);
  }
  return compiled;
}

/** Whether include patterns or file types are in effect */
export function isIncludeMode(context: TraversalContext): boolean {
  return getCompiledFilters(context).includeMode;
}

function matchesNameOrPath(
  rules: readonly PatternRule[],
  name: string,
  relativePath: string,
  isDirectory: boolean,
): boolean {
  if (rules.length === 0) {
    return false;
  }
  return checkNameOrPath(name, relativePath, rules, isDirectory).matched;
}

/** Whether some include rule names a path inside the directory at `relativePath` */
function includeReachesInto(rules: readonly PatternRule[], relativePath: string): boolean {
  return rules.some((rule) => ruleReachesBelow(rule, relativePath));
}

/**
 * Whether an entry explicitly matches an include pattern, or (files
 * only) an include file type.
 */
export function matchesInclude(context: TraversalContext, entry: Entry, relativePath: string): boolean {
  const filters = getCompiledFilters(context);
  if (matchesNameOrPath(filters.includeRules, entry.name, relativePath, entry.isDirectory)) {
    return true;
  }
  return !entry.isDirectory && matchesFileType(entry.name, filters.fileTypes);
}

/**
 * Order entries: each group sorted case-insensitively by name (ties
 * broken by code point), directories first unless `filesFirst`.
 */
export function sortEntries(entries: readonly Entry[], filesFirst: boolean): Entry[] {
  const byName = (a: Entry, b: Entry): number => {
    const left = a.name.toLowerCase();
    const right = b.name.toLowerCase();
    if (left !== right) {
      return left < right ? -1 : 1;
    }
    if (a.name === b.name) {
      return 0;
    }
    return a.name < b.name ? -1 : 1;
  };

  const directories = entries.filter((entry) => entry.isDirectory).sort(byName);
  const files = entries.filter((entry) => !entry.isDirectory).sort(byName);
  return filesFirst ? [...files, ...directories] : [...directories, ...files];
}

/**
 * Filter, order and truncate one directory's raw children.
 *
 * @param rawChildren - Children as read from disk, in any order
 * @param currentDir - Absolute path of the directory being listed
 * @param depth - Depth of `currentDir` (root is 0)
 * @param patternSet - Effective .gitignore rules for `currentDir`'s children
 */
export function filterEntries(
  rawChildren: readonly Entry[],
  currentDir: string,
  depth: number,
  patternSet: Matcher,
  context: TraversalContext,
  options: EntryFilterOptions = {},
): EntryFilterResult {
  const filters = getCompiledFilters(context);
  const parentPath = relativeToRoot(context.root, currentDir);
  const excludesActive =
    filters.excludeRules.length > 0 && (context.excludeDepth === undefined || depth <= context.excludeDepth);

  const survivors: Entry[] = [];

  for (const entry of rawChildren) {
    const relativePath = parentPath === '' ? entry.name : `${parentPath}/${entry.name}`;
    const included = filters.includeMode && matchesInclude(context, entry, relativePath);

    // 1. Hidden
    if (
      !context.showHidden &&
      entry.name.startsWith('.') &&
      !included &&
      !(entry.isDirectory && filters.includeMode && includeReachesInto(filters.includeRules, relativePath))
    ) {
      continue;
    }

    // 2. .gitignore
    if (!included && patternSet.matches(relativePath, entry.isDirectory)) {
      continue;
    }

    // 3. Extra excludes
    if (
      excludesActive &&
      !included &&
      matchesNameOrPath(filters.excludeRules, entry.name, relativePath, entry.isDirectory)
    ) {
      continue;
    }

    // 4. Include
    if (filters.includeMode) {
      if (entry.isDirectory) {
        if (options.admitDirectory !== undefined && !options.admitDirectory(entry, depth)) {
          continue;
        }
      } else if (!included) {
        continue;
      }
    }

    // 5. No files
    if (context.noFiles && !entry.isDirectory) {
      continue;
    }

    survivors.push(entry);
  }

  const ordered = sortEntries(survivors, context.filesFirst);
  const cap = context.maxItemsPerDirectory;
  if (cap !== undefined && ordered.length > cap) {
    return { visible: ordered.slice(0, cap), truncatedCount: ordered.length - cap };
  }

  return { visible: ordered, truncatedCount: 0 };
}
