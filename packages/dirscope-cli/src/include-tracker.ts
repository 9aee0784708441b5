import {
  checkNameOrPath,
  matchesFileType,
  normalizeFileType,
  parsePattern,
  type EntryEvent,
  type PatternRule,
  type TreeVisitor,
} from '@dirscope/core';

/**
 * Records whether any shown file matched the include patterns and the
 * include file types, so the CLI can warn when one of them matched
 * nothing.
 */
export class IncludeTracker implements TreeVisitor {
  private readonly rules: PatternRule[];
  private readonly fileTypes: string[];
  matchedPattern = false;
  matchedFileType = false;

  constructor(
    readonly patterns: readonly string[],
    readonly types: readonly string[],
  ) {
    this.rules = patterns.flatMap((pattern) => {
      const rule = parsePattern(pattern, { source: 'include' });
      return rule === null ? [] : [rule];
    });
    this.fileTypes = types.map(normalizeFileType).filter((type) => type !== '');
  }

  visitEntry(event: EntryEvent): void {
    if (event.entry.isDirectory) {
      return;
    }
    this.recordFile(event.entry.name, event.relativePath);
  }

  recordFile(name: string, relativePath: string): void {
    if (!this.matchedPattern && checkNameOrPath(name, relativePath, this.rules).matched) {
      this.matchedPattern = true;
    }
    if (!this.matchedFileType && matchesFileType(name, this.fileTypes)) {
      this.matchedFileType = true;
    }
  }

  /** Warning lines for include options that matched no file */
  warnings(): string[] {
    const warnings: string[] = [];
    if (this.patterns.length > 0 && !this.matchedPattern) {
      warnings.push(`Warning: No files found matching --include patterns: ${this.patterns.join(', ')}`);
    }
    if (this.types.length > 0 && !this.matchedFileType) {
      warnings.push(`Warning: No files found matching --include-file-types: ${this.types.join(', ')}`);
    }
    return warnings;
  }
}
