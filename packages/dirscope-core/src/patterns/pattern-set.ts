/**
 * Immutable, structurally shared rule list.
 *
 * A child directory's set is its parent's set plus the child's own
 * `.gitignore` rules. Extending links a new layer to the parent instead
 * of copying it, so siblings never see each other's local rules and
 * descending costs only the rules actually added.
 */

import { ruleMatches, toPosixPath } from './pattern-matcher.js';
import type { Matcher, PatternCheckResult, PatternRule } from './types.js';

export class PatternSet implements Matcher {
  private static readonly EMPTY = new PatternSet(null, [], 0);

  private constructor(
    private readonly parent: PatternSet | null,
    private readonly local: readonly PatternRule[],
    /** Total number of rules in this set and its ancestors */
    readonly size: number,
  ) {}

  /** The shared empty set used at the traversal root */
  static empty(): PatternSet {
    return PatternSet.EMPTY;
  }

  static of(rules: readonly PatternRule[]): PatternSet {
    return PatternSet.EMPTY.extend(rules);
  }

  /**
   * Return a new set with `rules` appended after every rule of this one.
   * This set is left untouched.
   */
  extend(rules: readonly PatternRule[]): PatternSet {
    if (rules.length === 0) {
      return this;
    }
    return new PatternSet(this, [...rules], this.size + rules.length);
  }

  /** All rules, oldest (root-most) first */
  rules(): PatternRule[] {
    const layers: (readonly PatternRule[])[] = [];
    for (let layer: PatternSet | null = this; layer !== null; layer = layer.parent) {
      layers.push(layer.local);
    }
    return layers.reverse().flat();
  }

  matches(relativePath: string, isDirectory: boolean): boolean {
    return this.check(relativePath, isDirectory).matched;
  }

  /**
   * Last-match-wins check. Scanning newest to oldest and stopping at the
   * first matching rule gives the same answer as a full forward pass.
   */
  check(relativePath: string, isDirectory: boolean): PatternCheckResult {
    const normalizedPath = toPosixPath(relativePath);

    for (let layer: PatternSet | null = this; layer !== null; layer = layer.parent) {
      for (let i = layer.local.length - 1; i >= 0; i--) {
        const rule = layer.local[i];
        if (rule !== undefined && ruleMatches(rule, normalizedPath, isDirectory)) {
          return { matched: !rule.negated, decidingRule: rule };
        }
      }
    }

    return { matched: false };
  }
}
