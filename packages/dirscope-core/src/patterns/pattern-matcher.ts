/**
 * Gitignore-style pattern compiler and matcher.
 *
 * Converts gitignore patterns into RegExp objects and provides
 * a check function for testing paths against compiled rules.
 *
 * Supports:
 * - `*` matches anything except `/`
 * - `**` matches anything including `/` (directory traversal)
 * - `?` matches a single character except `/`
 * - `[abc]` and `[!abc]` character classes
 * - `\` escapes the next character
 * - `!` negation (un-ignore)
 * - Trailing `/` to match directories only
 * - Leading `/` to anchor to the origin directory
 * - `#` comments and blank lines are skipped
 *
 * Every rule carries an origin directory. A rule only applies to paths
 * below its origin and its glob is matched against the origin-relative
 * remainder, so `*.pyc` read from `src/.gitignore` matches `src/a.pyc`
 * and `src/lib/b.pyc` but never `a.pyc`.
 */

import type { Matcher, PatternCheckResult, PatternRule } from './types.js';

/** Options for {@link parsePattern} */
export interface ParsePatternOptions {
  /** Where the rule came from (a file path or a label such as `exclude`) */
  source: string;
  /** Root-relative directory the rule is scoped to (default: root) */
  originDirectory?: string;
}

/**
 * Normalize a path to the form rules are matched against:
 * forward slashes, no leading `./` or `/`, no trailing `/`.
 */
export function toPosixPath(relativePath: string): string {
  let normalized = relativePath.replace(/\\/g, '/');
  while (normalized.startsWith('./')) {
    normalized = normalized.slice(2);
  }
  normalized = normalized.replace(/^\/+/, '').replace(/\/+$/, '');
  return normalized === '.' ? '' : normalized;
}

/**
 * Parse a single gitignore pattern line into a PatternRule, or null
 * if the line is a comment or blank.
 */
export function parsePattern(line: string, options: ParsePatternOptions): PatternRule | null {
  let pattern = line.trim();

  // Skip blank lines and comments
  if (pattern === '' || pattern.startsWith('#')) {
    return null;
  }

  // Detect negation; `\!` and `\#` are literal first characters
  let negated = false;
  if (pattern.startsWith('!')) {
    negated = true;
    pattern = pattern.slice(1);
  } else if (pattern.startsWith('\\!') || pattern.startsWith('\\#')) {
    pattern = pattern.slice(1);
  }

  // Detect directory-only patterns (trailing /)
  let directoryOnly = false;
  if (pattern.endsWith('/')) {
    directoryOnly = true;
    pattern = pattern.replace(/\/+$/, '');
  }

  // A leading / anchors; so does any inner /
  let anchored = false;
  if (pattern.startsWith('/')) {
    anchored = true;
    pattern = pattern.replace(/^\/+/, '');
  } else if (pattern.includes('/')) {
    anchored = true;
  }

  if (pattern === '') {
    return null;
  }

  const originDirectory = toPosixPath(options.originDirectory ?? '');
  const prefix = originDirectory === '' ? '' : `${originDirectory}/`;
  const compiled = compileGlob(pattern, anchored);

  return {
    pattern: `${negated ? '!' : ''}${prefix}${pattern}${directoryOnly ? '/' : ''}`,
    negated,
    directoryOnly,
    anchored,
    originDirectory,
    regex: compiled?.full ?? null,
    dirExactRegex: compiled?.exact ?? null,
    source: options.source,
  };
}

/**
 * Parse multiple pattern lines (e.g., .gitignore file content).
 */
export function parsePatterns(content: string, options: ParsePatternOptions): PatternRule[] {
  const rules: PatternRule[] = [];

  for (const line of content.split(/\r?\n/)) {
    const rule = parsePattern(line, options);
    if (rule !== null) {
      rules.push(rule);
    }
  }

  return rules;
}

/**
 * Compile glob text into a full regex (the path or anything below it)
 * and an exact regex (the path only). Returns null when the result is
 * not a valid regular expression.
 */
function compileGlob(glob: string, anchored: boolean): { full: RegExp; exact: RegExp } | null {
  const body = globToRegexSource(glob);
  if (body === null) {
    return null;
  }

  const head = anchored ? '^' : '(?:^|/)';
  try {
    return {
      full: new RegExp(`${head}${body}(?:/.*)?$`),
      exact: new RegExp(`${head}${body}$`),
    };
  } catch {
    // e.g. a reversed range such as [z-a]
    return null;
  }
}

function globToRegexSource(glob: string): string | null {
  let regexStr = '';
  let i = 0;

  while (i < glob.length) {
    const char = glob.charAt(i);

    if (char === '\\') {
      // Escape: next character is literal; a dangling backslash is malformed
      if (i + 1 >= glob.length) {
        return null;
      }
      regexStr += escapeRegexChar(glob.charAt(i + 1));
      i += 2;
    } else if (char === '*') {
      if (glob.charAt(i + 1) === '*') {
        const atSegmentStart = i === 0 || glob.charAt(i - 1) === '/';
        if (atSegmentStart && glob.charAt(i + 2) === '/') {
          // **/ matches zero or more directories
          regexStr += '(?:.*/)?';
          i += 3;
        } else if (atSegmentStart && i + 2 === glob.length) {
          // trailing ** matches everything
          regexStr += '.*';
          i += 2;
        } else {
          // ** inside a segment behaves like *
          regexStr += '[^/]*';
          i += 2;
        }
      } else {
        // Single * matches anything except /
        regexStr += '[^/]*';
        i += 1;
      }
    } else if (char === '?') {
      regexStr += '[^/]';
      i += 1;
    } else if (char === '[') {
      const closeBracket = findClassEnd(glob, i);
      if (closeBracket === -1) {
        // No closing bracket, treat literally
        regexStr += '\\[';
        i += 1;
      } else {
        let inner = glob.slice(i + 1, closeBracket);
        if (inner.startsWith('!')) {
          inner = '^' + inner.slice(1);
        }
        regexStr += '[' + inner + ']';
        i = closeBracket + 1;
      }
    } else {
      regexStr += escapeRegexChar(char);
      i += 1;
    }
  }

  return regexStr;
}

/** Index of the `]` closing the class opened at `start`, or -1 */
function findClassEnd(glob: string, start: number): number {
  let j = start + 1;
  if (glob.charAt(j) === '!' || glob.charAt(j) === '^') {
    j += 1;
  }
  // A ] directly after the opening bracket is part of the class
  if (glob.charAt(j) === ']') {
    j += 1;
  }
  while (j < glob.length) {
    const char = glob.charAt(j);
    if (char === '\\') {
      j += 2;
      continue;
    }
    if (char === '/') {
      return -1;
    }
    if (char === ']') {
      return j;
    }
    j += 1;
  }
  return -1;
}

function escapeRegexChar(char: string): string {
  return '.+^${}()|[]\\/*?'.includes(char) ? '\\' + char : char;
}

/**
 * Whether a single rule matches a normalized root-relative path.
 * Rules whose glob failed to compile never match.
 */
export function ruleMatches(rule: PatternRule, normalizedPath: string, isDirectory: boolean): boolean {
  if (rule.regex === null || rule.dirExactRegex === null) {
    return false;
  }

  let localPath = normalizedPath;
  if (rule.originDirectory !== '') {
    const prefix = `${rule.originDirectory}/`;
    if (!normalizedPath.startsWith(prefix)) {
      return false;
    }
    localPath = normalizedPath.slice(prefix.length);
  }

  if (!rule.regex.test(localPath)) {
    return false;
  }

  // Directory-only rules (trailing / in pattern):
  // "build/" ignores the directory itself AND everything inside it, but
  // not a regular file named "build". The full regex also matched child
  // paths, so only an exact match on a non-directory is rejected.
  if (rule.directoryOnly && !isDirectory && rule.dirExactRegex.test(localPath)) {
    return false;
  }

  return true;
}

/**
 * Last-match-wins check where each rule may match either the
 * root-relative path or the bare name. Used for command-line exclude
 * and include globs, which accept both spellings.
 */
export function checkNameOrPath(
  name: string,
  relativePath: string,
  rules: readonly PatternRule[],
  isDirectory = false,
): PatternCheckResult {
  const normalizedPath = toPosixPath(relativePath);

  let matched = false;
  let decidingRule: PatternRule | undefined;

  for (const rule of rules) {
    if (!ruleMatches(rule, normalizedPath, isDirectory) && !ruleMatches(rule, name, isDirectory)) {
      continue;
    }
    matched = !rule.negated;
    decidingRule = rule;
  }

  return { matched, decidingRule };
}

function segmentMatches(glob: string, segment: string): boolean {
  const body = globToRegexSource(glob);
  if (body === null) {
    return false;
  }
  try {
    return new RegExp(`^${body}$`).test(segment);
  } catch {
    // Same malformed classes compileGlob rejects
    return false;
  }
}

/**
 * Whether an anchored, non-negated rule could match a path strictly
 * below `directoryPath`, comparing the leading segments of both.
 * `**` matches any remaining depth.
 */
export function ruleReachesBelow(rule: PatternRule, directoryPath: string): boolean {
  if (rule.negated || !rule.anchored || rule.regex === null) {
    return false;
  }

  const ruleSegments = rule.pattern.replace(/\/+$/, '').split('/');
  const dirSegments = toPosixPath(directoryPath).split('/');

  for (let i = 0; i < dirSegments.length; i++) {
    const ruleSegment = ruleSegments[i];
    const dirSegment = dirSegments[i];
    if (ruleSegment === undefined || dirSegment === undefined) {
      return false;
    }
    if (ruleSegment === '**') {
      return true;
    }
    if (!segmentMatches(ruleSegment, dirSegment)) {
      return false;
    }
  }

  return ruleSegments.length > dirSegments.length;
}

/**
 * Check whether a given relative path is matched by a list of rules.
 *
 * Rules are evaluated in order (last match wins, gitignore semantics).
 * Negation rules (!) can un-match previously matched paths.
 *
 * @param relativePath - Path relative to the traversal root
 * @param rules - Ordered list of rules
 * @param isDirectory - Whether the path is a directory
 */
export function checkPatterns(
  relativePath: string,
  rules: readonly PatternRule[],
  isDirectory = false,
): PatternCheckResult {
  const normalizedPath = toPosixPath(relativePath);

  let matched = false;
  let decidingRule: PatternRule | undefined;

  for (const rule of rules) {
    if (!ruleMatches(rule, normalizedPath, isDirectory)) {
      continue;
    }
    matched = !rule.negated;
    decidingRule = rule;
  }

  return { matched, decidingRule };
}

/**
 * Compile an ordered rule list into a single match predicate.
 */
export function compilePatterns(rules: readonly PatternRule[]): Matcher {
  const snapshot = [...rules];
  return {
    matches: (relativePath: string, isDirectory: boolean): boolean =>
      checkPatterns(relativePath, snapshot, isDirectory).matched,
  };
}
