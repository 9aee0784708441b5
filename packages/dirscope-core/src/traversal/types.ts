/**
 * Types for the traversal engine.
 *
 * A TraversalContext is built once per top-level invocation and never
 * mutated. Entries are produced fresh by every directory read.
 */

import type { Logger } from 'pino';
import type { PatternSet } from '../patterns/pattern-set.js';

/** One filesystem child of a directory */
export interface Entry {
  name: string;
  absolutePath: string;
  /** True for directories and for symbolic links that point at one */
  isDirectory: boolean;
  /** Symbolic links are reported but never descended into */
  isSymbolicLink: boolean;
}

/** Immutable configuration for one traversal */
export interface TraversalContext {
  /** Absolute path of the traversal root */
  readonly root: string;
  /** Directories at this depth or deeper are not listed (root is depth 0) */
  readonly maxDepth?: number;
  /** Include names starting with `.` */
  readonly showHidden: boolean;
  /** Read `.gitignore` files and apply their rules */
  readonly respectGitignore: boolean;
  /** `.gitignore` files are read only in directories shallower than this */
  readonly gitignoreDepth?: number;
  /** Extra exclusion globs, matched against the name or root-relative path */
  readonly extraExcludePatterns: readonly string[];
  /** Extra excludes apply only in directories at this depth or shallower */
  readonly excludeDepth?: number;
  /** When non-empty (with includeFileTypes), only matching files survive */
  readonly includePatterns: readonly string[];
  /** File extensions or names, e.g. `py`, `.ts`, `Makefile` */
  readonly includeFileTypes: readonly string[];
  /** List directories only */
  readonly noFiles: boolean;
  /** Per-directory cap on listed children */
  readonly maxItemsPerDirectory?: number;
  /** Cap on entries emitted across the whole traversal */
  readonly maxTotalEntries?: number;
  /** Files precede directories among siblings */
  readonly filesFirst: boolean;
  /** Absolute file paths; when set, only these files (and their ancestors) are visible */
  readonly whitelist?: ReadonlySet<string>;
}

/** Everything in a TraversalContext except the root, all optional */
export type TraversalOptions = Partial<Omit<TraversalContext, 'root'>>;

/** Filesystem capability the engine reads through */
export interface DirectoryReader {
  /** List the immediate children of a directory. Throws on I/O errors. */
  readDirectory(directory: string): Entry[];
  /** Read a text file, or null when it is missing or unreadable */
  readFileText(filePath: string): string | null;
  /** Whether the path exists and is a directory (following links) */
  isDirectory(target: string): boolean;
}

/** Collaborators injected into the engine (for testability) */
export interface EngineOptions {
  logger?: Logger;
  reader?: DirectoryReader;
}

/** Result of listing one directory */
export interface FilteredChildren {
  /** Visible children, ordered and truncated */
  entries: Entry[];
  /** Children that passed filtering but were cut by maxItemsPerDirectory */
  truncatedCount: number;
  /** The pattern set in effect for this directory's children */
  patternSet: PatternSet;
}
