/**
 * Render export records as JSON, plain text or Markdown.
 */

import { BRANCH, DIR_ICON, FILE_ICON, LAST, SPACE, VERT } from '../render/connectors.js';
import type { OutputFormat } from '../types.js';
import { getLanguageHint } from './language-hints.js';
import type { FileNode, TreeNode } from './tree-data.js';

export interface FormatOptions {
  showIcons: boolean;
}

const RULE_WIDTH = 80;

export function formatJson(trees: readonly TreeNode[]): string {
  return JSON.stringify(trees.length === 1 ? trees[0] : trees, null, 2);
}

/** Tree lines (root name first) and the files carrying contents, in order */
function layout(tree: TreeNode, options: FormatOptions): { lines: string[]; files: FileNode[] } {
  const lines = [tree.name];
  const files: FileNode[] = [];

  if (tree.type === 'file' && tree.contents !== undefined) {
    files.push(tree);
  }

  const rec = (node: TreeNode, prefix: string): void => {
    if (node.type !== 'directory') {
      return;
    }
    node.children.forEach((child, i) => {
      const isLast = i === node.children.length - 1;
      const connector = isLast ? LAST : BRANCH;

      if (child.type === 'truncated') {
        lines.push(prefix + connector + child.name);
        return;
      }

      if (options.showIcons) {
        const icon = child.type === 'file' ? FILE_ICON : DIR_ICON;
        lines.push(`${prefix}${connector}${icon} ${child.name}`);
      } else {
        lines.push(prefix + connector + child.name + (child.type === 'directory' ? '/' : ''));
      }

      if (child.type === 'file') {
        if (child.contents !== undefined) {
          files.push(child);
        }
        return;
      }
      rec(child, prefix + (isLast ? SPACE : VERT));
    });
  };

  rec(tree, '');
  return { lines, files };
}

export function formatText(tree: TreeNode, options: FormatOptions): string {
  const { lines, files } = layout(tree, options);
  let text = lines.join('\n');

  if (files.length > 0) {
    const heavy = '='.repeat(RULE_WIDTH);
    const light = '-'.repeat(RULE_WIDTH);
    text += `\n\n${heavy}\nFILE CONTENTS\n${heavy}\n\n`;
    for (const file of files) {
      text += `File: ${file.path}\n${light}\n${file.contents ?? ''}\n${light}\n\n`;
    }
  }

  return text;
}

export function formatMarkdown(tree: TreeNode, options: FormatOptions): string {
  const { lines, files } = layout(tree, options);
  let markdown = '```\n' + lines.join('\n') + '\n```\n';

  if (files.length > 0) {
    markdown += '\n## File Contents\n\n';
    for (const file of files) {
      markdown += `### ${file.path}\n\n`;
      markdown += '```' + getLanguageHint(file.name) + '\n';
      markdown += (file.contents ?? '') + '\n```\n\n';
    }
  }

  return markdown;
}

/**
 * Format one or more root records. Several roots give a JSON array or
 * concatenated text / Markdown sections.
 */
export function formatTrees(trees: readonly TreeNode[], format: OutputFormat, options: FormatOptions): string {
  switch (format) {
    case 'json':
      return formatJson(trees);
    case 'md':
      return trees.map((tree) => formatMarkdown(tree, options)).join('\n');
    case 'txt':
      return trees.map((tree) => formatText(tree, options)).join('\n\n');
  }
}
