/**
 * Per-root counts of visible files and directories, plus the most
 * common file extensions.
 */

import * as path from 'path';
import type { EntryEvent, TreeVisitor } from '@dirscope/core';

export const NO_EXTENSION = '(no extension)';
const TOP_EXTENSIONS = 5;

export interface TreeSummary {
  directories: number;
  files: number;
  /** Most common extensions first; ties by name */
  topExtensions: Array<{ extension: string; count: number }>;
}

export class SummaryCollector implements TreeVisitor {
  private directories = 0;
  private files = 0;
  private readonly extensions = new Map<string, number>();

  visitEntry(event: EntryEvent): void {
    if (event.entry.isDirectory) {
      this.directories += 1;
      return;
    }
    this.addFile(event.entry.name);
  }

  addFile(name: string): void {
    this.files += 1;
    const ext = path.extname(name).toLowerCase() || NO_EXTENSION;
    this.extensions.set(ext, (this.extensions.get(ext) ?? 0) + 1);
  }

  getSummary(): TreeSummary {
    const topExtensions = [...this.extensions.entries()]
      .map(([extension, count]) => ({ extension, count }))
      .sort((a, b) => b.count - a.count || (a.extension < b.extension ? -1 : a.extension > b.extension ? 1 : 0))
      .slice(0, TOP_EXTENSIONS);

    return { directories: this.directories, files: this.files, topExtensions };
  }
}

export function formatSummary(summary: TreeSummary): string[] {
  const lines = [
    'Summary:',
    `  Directories: ${summary.directories}`,
    `  Files: ${summary.files}`,
  ];
  if (summary.topExtensions.length > 0) {
    const list = summary.topExtensions.map(({ extension, count }) => `${extension} (${count})`).join(', ');
    lines.push(`  Top extensions: ${list}`);
  }
  return lines;
}
