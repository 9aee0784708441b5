export { PatternSet } from './pattern-set.js';
export {
  parsePattern,
  parsePatterns,
  checkPatterns,
  checkNameOrPath,
  ruleReachesBelow,
  compilePatterns,
  ruleMatches,
  toPosixPath,
} from './pattern-matcher.js';
export type { ParsePatternOptions } from './pattern-matcher.js';
export type { PatternRule, PatternCheckResult, Matcher } from './types.js';
