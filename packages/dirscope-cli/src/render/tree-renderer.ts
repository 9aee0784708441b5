/**
 * TreeRenderer - a TreeVisitor that draws the familiar `tree` layout.
 *
 * Each directory's child prefix is remembered by absolute path, so the
 * per-directory "more items" line and the final "more entries" line
 * are drawn at the right indentation whenever they arrive.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ChalkInstance } from 'chalk';
import type { Entry, EntryEvent, TreeVisitor, TruncationEvent } from '@dirscope/core';
import {
  BRANCH,
  DIR_ICON,
  EMPTY_DIR_ICON,
  FILE_ICON,
  LAST,
  SPACE,
  VERT,
  moreEntriesLabel,
  moreItemsLabel,
} from './connectors.js';

export interface TreeRendererOptions {
  showIcons: boolean;
  chalk: ChalkInstance;
  /** Overridable for tests; defaults to reading the directory */
  isEmptyDirectory?: (directory: string) => boolean;
}

function directoryIsEmpty(directory: string): boolean {
  try {
    return fs.readdirSync(directory).length === 0;
  } catch {
    // Unreadable: draw it as a regular directory
    return false;
  }
}

export class TreeRenderer implements TreeVisitor {
  private readonly lines: string[] = [];
  private readonly childPrefixes = new Map<string, string>();
  private readonly isEmptyDirectory: (directory: string) => boolean;
  /** Files drawn so far */
  filesShown = 0;

  constructor(
    private readonly root: string,
    private readonly options: TreeRendererOptions,
  ) {
    this.isEmptyDirectory = options.isEmptyDirectory ?? directoryIsEmpty;
    this.childPrefixes.set(root, '');
    this.lines.push(this.rootLabel());
  }

  visitEntry(event: EntryEvent): void {
    const prefix = this.childPrefixes.get(event.parentPath) ?? '';
    const connector = event.isLast ? LAST : BRANCH;
    this.lines.push(prefix + connector + this.label(event.entry));

    if (event.entry.isDirectory) {
      this.childPrefixes.set(event.entry.absolutePath, prefix + (event.isLast ? SPACE : VERT));
    } else {
      this.filesShown += 1;
    }
  }

  truncated(event: TruncationEvent): void {
    const prefix = this.childPrefixes.get(event.parentPath) ?? '';
    const text = event.kind === 'items' ? moreItemsLabel(event.count) : moreEntriesLabel(event.count);
    this.lines.push(prefix + LAST + this.options.chalk.dim(text));
  }

  getLines(): string[] {
    return [...this.lines];
  }

  private rootLabel(): string {
    const name = path.basename(this.root) || this.root;
    return this.options.chalk.bold(name);
  }

  private label(entry: Entry): string {
    const { chalk } = this.options;
    const suffix = entry.isDirectory ? '/' : '';

    let name = entry.name + suffix;
    if (entry.isDirectory) {
      name = chalk.blue.bold(name);
    } else if (entry.name.startsWith('.')) {
      name = chalk.dim(name);
    }

    if (!this.options.showIcons) {
      return name;
    }

    let icon = FILE_ICON;
    if (entry.isDirectory) {
      icon = !entry.isSymbolicLink && this.isEmptyDirectory(entry.absolutePath) ? EMPTY_DIR_ICON : DIR_ICON;
    }
    return `${icon} ${name}`;
  }
}
