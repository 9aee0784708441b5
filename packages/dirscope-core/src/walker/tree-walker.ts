/**
 * TreeWalker - the shared depth-first, pre-order traversal driver.
 *
 * Renderer, exporter, archiver and selector all walk through here and
 * only differ in the visitor they pass. All bookkeeping for one walk
 * lives in a WalkState created by that walk, so a walker instance can
 * be reused and separate walks never share counters.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import { getDefaultLogger } from '../logger.js';
import { PatternSet } from '../patterns/pattern-set.js';
import { DirectoryLister } from '../traversal/directory-lister.js';
import { nodeDirectoryReader } from '../traversal/directory-reader.js';
import { relativeToRoot } from '../traversal/paths.js';
import type { EngineOptions, TraversalContext } from '../traversal/types.js';
import type { DirectoryEvent, TreeVisitor, WalkStats } from './types.js';

/** Mutable bookkeeping for a single walk */
class WalkState {
  entriesEmitted = 0;
  directoriesListed = 0;
  omittedEntries = 0;
  truncatedItems = 0;
  /** Where the global cap was first hit */
  capHitAt: { parentPath: string; depth: number } | null = null;

  constructor(private readonly maxTotalEntries: number | undefined) {}

  get capReached(): boolean {
    return this.maxTotalEntries !== undefined && this.entriesEmitted >= this.maxTotalEntries;
  }

  omit(count: number, parentPath: string, depth: number): void {
    if (this.capHitAt === null) {
      this.capHitAt = { parentPath, depth };
    }
    this.omittedEntries += count;
  }

  toStats(): WalkStats {
    return {
      entriesEmitted: this.entriesEmitted,
      directoriesListed: this.directoriesListed,
      omittedEntries: this.omittedEntries,
      truncatedItems: this.truncatedItems,
    };
  }
}

export class TreeWalker {
  private readonly logger: Logger;

  constructor(
    private readonly context: TraversalContext,
    private readonly options: EngineOptions = {},
  ) {
    this.logger = (options.logger ?? getDefaultLogger()).child({ component: 'tree-walker' });
  }

  /**
   * Walk `root` (normally `context.root`), invoking `visitor` for every
   * listed directory, emitted entry and truncation.
   */
  walk(root: string, visitor: TreeVisitor): WalkStats {
    const state = new WalkState(this.context.maxTotalEntries);
    const rootPath = path.resolve(root);

    const reader = this.options.reader ?? nodeDirectoryReader;
    if (!reader.isDirectory(rootPath)) {
      this.logger.debug({ root: rootPath }, 'Root is not a directory, nothing to walk');
      return state.toStats();
    }

    const lister = new DirectoryLister(this.context, this.options);
    this.visitDirectory(lister, rootPath, 0, PatternSet.empty(), visitor, state);

    if (state.capHitAt !== null && state.omittedEntries > 0) {
      visitor.truncated?.({ kind: 'entries', count: state.omittedEntries, ...state.capHitAt });
    }

    const stats = state.toStats();
    this.logger.debug({ root: rootPath, ...stats }, 'Walk finished');
    return stats;
  }

  private visitDirectory(
    lister: DirectoryLister,
    directory: string,
    depth: number,
    inherited: PatternSet,
    visitor: TreeVisitor,
    state: WalkState,
  ): void {
    const { maxDepth } = this.context;
    if (maxDepth !== undefined && depth >= maxDepth) {
      return;
    }

    const { entries, truncatedCount, patternSet } = lister.list(directory, depth, inherited);
    state.directoriesListed += 1;

    const event: DirectoryEvent = {
      path: directory,
      relativePath: relativeToRoot(this.context.root, directory),
      depth,
      entries,
      truncatedCount,
    };
    visitor.enterDirectory?.(event);

    entries.forEach((entry, index) => {
      if (state.capReached) {
        // Directories already entered are finished; new ones are not
        state.omit(1, directory, depth);
        return;
      }

      visitor.visitEntry?.({
        entry,
        depth,
        parentPath: directory,
        relativePath: relativeToRoot(this.context.root, entry.absolutePath),
        index,
        isLast: index === entries.length - 1 && truncatedCount === 0,
      });
      state.entriesEmitted += 1;

      if (entry.isDirectory && !entry.isSymbolicLink) {
        this.visitDirectory(lister, entry.absolutePath, depth + 1, patternSet, visitor, state);
      }
    });

    if (truncatedCount > 0) {
      if (state.capReached) {
        state.omit(truncatedCount, directory, depth);
      } else {
        visitor.truncated?.({ kind: 'items', count: truncatedCount, parentPath: directory, depth });
        state.truncatedItems += truncatedCount;
      }
    }

    visitor.leaveDirectory?.(event);
  }
}

/**
 * Walk `root` with a fresh TreeWalker.
 */
export function walk(
  root: string,
  context: TraversalContext,
  visitor: TreeVisitor,
  options: EngineOptions = {},
): WalkStats {
  return new TreeWalker(context, options).walk(root, visitor);
}
