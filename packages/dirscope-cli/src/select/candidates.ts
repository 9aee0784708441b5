/**
 * Flat list of the files a user can pick from, gathered with the same
 * per-directory pipeline the tree uses (caps excluded).
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  DirectoryLister,
  PatternSet,
  createTraversalContext,
  type EngineOptions,
  type TraversalOptions,
} from '@dirscope/core';

/**
 * Root-relative POSIX paths of every visible file under `root`, in tree
 * order. A file root yields its own name unless `noFiles` is set.
 */
export function collectCandidateFiles(
  root: string,
  options: TraversalOptions,
  engine: EngineOptions = {},
): string[] {
  if (!fs.statSync(root).isDirectory()) {
    return options.noFiles ? [] : [path.basename(root)];
  }

  const context = createTraversalContext(root, {
    ...options,
    maxItemsPerDirectory: undefined,
    maxTotalEntries: undefined,
    whitelist: undefined,
  });
  const lister = new DirectoryLister(context, engine);
  const files: string[] = [];

  const visit = (directory: string, depth: number, inherited: PatternSet): void => {
    if (context.maxDepth !== undefined && depth >= context.maxDepth) {
      return;
    }
    const { entries, patternSet } = lister.list(directory, depth, inherited);
    for (const entry of entries) {
      if (entry.isDirectory) {
        if (!entry.isSymbolicLink) {
          visit(entry.absolutePath, depth + 1, patternSet);
        }
      } else {
        files.push(path.relative(context.root, entry.absolutePath).split(path.sep).join('/'));
      }
    }
  };

  visit(context.root, 0, PatternSet.empty());
  return files;
}
