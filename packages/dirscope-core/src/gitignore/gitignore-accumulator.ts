/**
 * GitignoreAccumulator - extends an inherited PatternSet with the rules
 * of the current directory's `.gitignore`.
 *
 * Discovery is depth-bounded: with `gitignoreDepth = n`, only
 * directories at depth 0..n-1 have their `.gitignore` read. Rules
 * inherited from shallower directories keep applying below the cutoff.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import { getDefaultLogger } from '../logger.js';
import { parsePatterns } from '../patterns/pattern-matcher.js';
import type { PatternSet } from '../patterns/pattern-set.js';
import { nodeDirectoryReader } from '../traversal/directory-reader.js';
import { relativeToRoot } from '../traversal/paths.js';
import type { DirectoryReader, EngineOptions, TraversalContext } from '../traversal/types.js';

export const GITIGNORE_FILE = '.gitignore';

export class GitignoreAccumulator {
  private readonly logger: Logger;
  private readonly reader: DirectoryReader;

  constructor(
    private readonly context: TraversalContext,
    options: EngineOptions = {},
  ) {
    this.logger = (options.logger ?? getDefaultLogger()).child({ component: 'gitignore' });
    this.reader = options.reader ?? nodeDirectoryReader;
  }

  /** Whether `.gitignore` files are still read at this depth */
  isActiveAt(depth: number): boolean {
    if (!this.context.respectGitignore) {
      return false;
    }
    return this.context.gitignoreDepth === undefined || depth < this.context.gitignoreDepth;
  }

  /**
   * Return the pattern set in effect for `currentDir`'s children.
   * `inherited` is never modified; a missing or unreadable `.gitignore`
   * returns it as is.
   */
  extend(currentDir: string, depth: number, inherited: PatternSet): PatternSet {
    if (!this.isActiveAt(depth)) {
      return inherited;
    }

    const gitignorePath = path.join(currentDir, GITIGNORE_FILE);
    const content = this.reader.readFileText(gitignorePath);
    if (content === null) {
      return inherited;
    }

    const rules = parsePatterns(content, {
      source: gitignorePath,
      originDirectory: relativeToRoot(this.context.root, currentDir),
    });

    for (const rule of rules) {
      if (rule.regex === null) {
        this.logger.debug({ pattern: rule.pattern, source: rule.source }, 'Ignoring malformed pattern');
      }
    }

    this.logger.debug({ dir: currentDir, ruleCount: rules.length }, 'Loaded .gitignore');
    return inherited.extend(rules);
  }
}

/**
 * Extend `inherited` with the `.gitignore` of `currentDir`, if one is
 * read at this depth.
 */
export function extendPatternSet(
  currentDir: string,
  depth: number,
  inherited: PatternSet,
  context: TraversalContext,
  options: EngineOptions = {},
): PatternSet {
  return new GitignoreAccumulator(context, options).extend(currentDir, depth, inherited);
}
