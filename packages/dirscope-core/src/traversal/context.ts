/**
 * TraversalContext construction.
 *
 * The engine assumes a well-formed context and does not re-validate it
 * during a walk; `validateTraversalOptions` is for callers that accept
 * user input.
 */

import * as path from 'node:path';
import type { TraversalContext, TraversalOptions } from './types.js';

/** Default values for every optional flag of a context */
export const DEFAULT_TRAVERSAL_OPTIONS = {
  showHidden: false,
  respectGitignore: true,
  extraExcludePatterns: [],
  includePatterns: [],
  includeFileTypes: [],
  noFiles: false,
  filesFirst: false,
} as const satisfies TraversalOptions;

/**
 * Build a frozen TraversalContext for `root` (resolved to an absolute path).
 */
export function createTraversalContext(root: string, options: TraversalOptions = {}): TraversalContext {
  const context: TraversalContext = {
    root: path.resolve(root),
    maxDepth: options.maxDepth,
    showHidden: options.showHidden ?? DEFAULT_TRAVERSAL_OPTIONS.showHidden,
    respectGitignore: options.respectGitignore ?? DEFAULT_TRAVERSAL_OPTIONS.respectGitignore,
    gitignoreDepth: options.gitignoreDepth,
    extraExcludePatterns: Object.freeze([...(options.extraExcludePatterns ?? [])]),
    excludeDepth: options.excludeDepth,
    includePatterns: Object.freeze([...(options.includePatterns ?? [])]),
    includeFileTypes: Object.freeze([...(options.includeFileTypes ?? [])]),
    noFiles: options.noFiles ?? DEFAULT_TRAVERSAL_OPTIONS.noFiles,
    maxItemsPerDirectory: options.maxItemsPerDirectory,
    maxTotalEntries: options.maxTotalEntries,
    filesFirst: options.filesFirst ?? DEFAULT_TRAVERSAL_OPTIONS.filesFirst,
    whitelist:
      options.whitelist === undefined
        ? undefined
        : new Set([...options.whitelist].map((filePath) => path.resolve(filePath))),
  };

  return Object.freeze(context);
}

/**
 * Validate user-supplied traversal options.
 * Returns an array of error messages (empty = valid).
 */
export function validateTraversalOptions(options: TraversalOptions): string[] {
  const errors: string[] = [];

  const nonNegative: Array<[string, number | undefined]> = [
    ['maxDepth', options.maxDepth],
    ['gitignoreDepth', options.gitignoreDepth],
    ['excludeDepth', options.excludeDepth],
  ];
  for (const [name, value] of nonNegative) {
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      errors.push(`${name} must be a non-negative integer`);
    }
  }

  const positive: Array<[string, number | undefined]> = [
    ['maxItemsPerDirectory', options.maxItemsPerDirectory],
    ['maxTotalEntries', options.maxTotalEntries],
  ];
  for (const [name, value] of positive) {
    if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
      errors.push(`${name} must be a positive integer`);
    }
  }

  return errors;
}
