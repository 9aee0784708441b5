/**
 * TreeDataBuilder - a TreeVisitor that builds the nested export record.
 */

import * as path from 'path';
import { isBelow, type EntryEvent, type TreeVisitor, type TruncationEvent } from '@dirscope/core';
import { moreEntriesLabel, moreItemsLabel } from '../render/connectors.js';
import { readFileContents } from './file-contents.js';

export interface DirectoryNode {
  name: string;
  type: 'directory';
  children: TreeNode[];
}

export interface FileNode {
  name: string;
  type: 'file';
  /** Root-relative POSIX path */
  path: string;
  contents?: string;
}

export interface TruncatedNode {
  name: string;
  type: 'truncated';
}

export type TreeNode = DirectoryNode | FileNode | TruncatedNode;

export interface TreeDataOptions {
  includeContents: boolean;
  /** Absolute paths (files or directories) whose contents are left out */
  skipContents?: readonly string[];
  readContents?: (filePath: string) => string;
}

/** Whether `filePath` is, or lies below, one of `skipped` */
export function isContentSkipped(filePath: string, skipped: readonly string[]): boolean {
  return skipped.some((skip) => skip === filePath || isBelow(skip, filePath));
}

/** File record, with contents unless disabled or skipped for this path */
export function createFileNode(
  name: string,
  absolutePath: string,
  relativePath: string,
  options: TreeDataOptions,
): FileNode {
  const node: FileNode = { name, type: 'file', path: relativePath };
  const skipped = (options.skipContents ?? []).map((skip) => path.resolve(skip));
  if (options.includeContents && !isContentSkipped(absolutePath, skipped)) {
    node.contents = (options.readContents ?? readFileContents)(absolutePath);
  }
  return node;
}

export class TreeDataBuilder implements TreeVisitor {
  private readonly root: DirectoryNode;
  private readonly nodes = new Map<string, DirectoryNode>();

  constructor(
    rootPath: string,
    private readonly options: TreeDataOptions,
  ) {
    this.root = { name: path.basename(rootPath) || rootPath, type: 'directory', children: [] };
    this.nodes.set(rootPath, this.root);
  }

  visitEntry(event: EntryEvent): void {
    const parent = this.nodes.get(event.parentPath);
    if (parent === undefined) {
      return;
    }
    const { entry } = event;

    if (entry.isDirectory) {
      const node: DirectoryNode = { name: entry.name, type: 'directory', children: [] };
      parent.children.push(node);
      this.nodes.set(entry.absolutePath, node);
      return;
    }

    parent.children.push(createFileNode(entry.name, entry.absolutePath, event.relativePath, this.options));
  }

  truncated(event: TruncationEvent): void {
    const parent = this.nodes.get(event.parentPath) ?? this.root;
    const name = event.kind === 'items' ? moreItemsLabel(event.count) : moreEntriesLabel(event.count);
    parent.children.push({ name, type: 'truncated' });
  }

  getTree(): DirectoryNode {
    return this.root;
  }
}
