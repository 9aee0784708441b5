/**
 * Visitor contract for TreeWalker.
 *
 * Depth convention: the root directory has depth 0 and entries listed in
 * a directory of depth `d` are reported with depth `d`.
 */

import type { Entry } from '../traversal/types.js';

/** A directory about to have its children visited */
export interface DirectoryEvent {
  /** Absolute path of the directory */
  path: string;
  /** Root-relative POSIX path ('' for the root) */
  relativePath: string;
  depth: number;
  /** Visible children, in visiting order */
  entries: readonly Entry[];
  /** Children cut by the per-directory cap */
  truncatedCount: number;
}

/** One emitted entry */
export interface EntryEvent {
  entry: Entry;
  depth: number;
  /** Absolute path of the containing directory */
  parentPath: string;
  /** Root-relative POSIX path of the entry */
  relativePath: string;
  /** Position among the directory's visible entries */
  index: number;
  /** Last line of its directory: no further sibling and no "more items" line follows */
  isLast: boolean;
}

/**
 * Omitted entries.
 * - `items`: the per-directory cap cut `count` children of `parentPath`
 * - `entries`: the global cap was reached; `count` entries were not
 *   emitted. Reported once, at the end of the walk, located at the
 *   directory where the cap was first hit.
 */
export interface TruncationEvent {
  kind: 'items' | 'entries';
  count: number;
  parentPath: string;
  depth: number;
}

export interface TreeVisitor {
  enterDirectory?(event: DirectoryEvent): void;
  visitEntry?(event: EntryEvent): void;
  leaveDirectory?(event: DirectoryEvent): void;
  truncated?(event: TruncationEvent): void;
}

/** Counters of a finished walk */
export interface WalkStats {
  entriesEmitted: number;
  directoriesListed: number;
  /** Entries withheld because of the global cap */
  omittedEntries: number;
  /** Children reported through per-directory `items` events */
  truncatedItems: number;
}
