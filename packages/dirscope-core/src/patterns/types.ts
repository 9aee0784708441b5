/**
 * Types for gitignore-style pattern rules.
 *
 * Rules come from three places: `.gitignore` files found during a walk,
 * `--exclude` patterns and `--include` patterns. All of them share the
 * same glob dialect and the same last-match-wins evaluation.
 */

/** A single compiled rule */
export interface PatternRule {
  /** Glob text rewritten relative to the traversal root (e.g. `src/*.pyc`) */
  pattern: string;
  /** Whether this is a negation rule (starts with !) */
  negated: boolean;
  /** Whether this rule only matches directories (ends with /) */
  directoryOnly: boolean;
  /** Whether the glob is anchored to its origin directory */
  anchored: boolean;
  /** Root-relative POSIX path of the directory the rule is scoped to ('' for root) */
  originDirectory: string;
  /**
   * Compiled regex tested against the origin-relative path (includes
   * (?:/.*)?$ for child path matching). Null when the glob text could
   * not be compiled; such a rule never matches.
   */
  regex: RegExp | null;
  /** Regex matching the exact path only, used for directoryOnly rules */
  dirExactRegex: RegExp | null;
  /** Where the rule came from (a .gitignore path or a label) */
  source: string;
}

/** Result of checking a path against a list of rules */
export interface PatternCheckResult {
  /** Whether the last matching rule was a non-negated one */
  matched: boolean;
  /** The rule that decided the result (if any) */
  decidingRule?: PatternRule;
}

/** Anything that can answer "does this path match" */
export interface Matcher {
  matches(relativePath: string, isDirectory: boolean): boolean;
}
