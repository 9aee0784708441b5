/**
 * @dirscope/core - gitignore-aware directory traversal and filtering.
 *
 * Two entry points: `listFilteredChildren` for one directory and `walk`
 * for a whole tree. Everything else is exported for callers that want
 * to compose the pieces themselves.
 */

export { walk, TreeWalker } from './walker/tree-walker.js';
export { composeVisitors } from './walker/compose.js';
export type {
  DirectoryEvent,
  EntryEvent,
  TruncationEvent,
  TreeVisitor,
  WalkStats,
} from './walker/types.js';

export { listFilteredChildren, DirectoryLister, applyWhitelist } from './traversal/directory-lister.js';
export {
  createTraversalContext,
  validateTraversalOptions,
  DEFAULT_TRAVERSAL_OPTIONS,
} from './traversal/context.js';
export { nodeDirectoryReader } from './traversal/directory-reader.js';
export { relativeToRoot, isBelow } from './traversal/paths.js';
export type {
  Entry,
  TraversalContext,
  TraversalOptions,
  DirectoryReader,
  EngineOptions,
  FilteredChildren,
} from './traversal/types.js';

export { filterEntries, sortEntries, matchesInclude, isIncludeMode } from './filter/entry-filter.js';
export type { EntryFilterOptions, EntryFilterResult } from './filter/entry-filter.js';
export { normalizeFileType, matchesFileType } from './filter/file-types.js';

export { GitignoreAccumulator, extendPatternSet, GITIGNORE_FILE } from './gitignore/gitignore-accumulator.js';

export * from './patterns/index.js';

export { createLogger, getDefaultLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';
