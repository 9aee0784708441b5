/**
 * The dirscope main action: resolve roots, optionally ask which files
 * to keep, then print, export, zip or copy the filtered tree.
 *
 * Every output walks the same engine with a different visitor.
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { Logger } from 'pino';
import {
  composeVisitors,
  createTraversalContext,
  validateTraversalOptions,
  walk,
  type EngineOptions,
  type TraversalContext,
  type TraversalOptions,
} from '@dirscope/core';
import { ZipArchiver } from '../archive/zip-archiver.js';
import { formatTrees } from '../export/formatters.js';
import { TreeDataBuilder, createFileNode, type TreeNode } from '../export/tree-data.js';
import { IncludeTracker } from '../include-tracker.js';
import { OutputBuffer } from '../output-buffer.js';
import { TreeRenderer } from '../render/tree-renderer.js';
import { resolveRoots } from '../roots.js';
import { collectCandidateFiles } from '../select/candidates.js';
import { toTraversalOptions, toUncappedTraversalOptions } from '../settings.js';
import { SummaryCollector, formatSummary } from '../summary.js';
import type { RunSettings } from '../types.js';
import { success, warn } from '../ui.js';

export interface RunDependencies {
  cwd: string;
  logger: Logger;
  /** Print a block to stdout */
  out: (text: string) => void;
  /** Print a line to stderr */
  err: (text: string) => void;
  /** Ask which of a root's candidate files to keep (root-relative POSIX paths) */
  chooseFiles: (root: string, candidates: string[]) => Promise<string[]>;
  /** Put text on the clipboard; false when no clipboard utility worked */
  copy: (text: string) => boolean;
}

const plain = new Chalk({ level: 0 });

function isDirectory(target: string): boolean {
  return fs.statSync(target).isDirectory();
}

function contextFor(
  root: string,
  options: TraversalOptions,
  whitelist: ReadonlySet<string> | undefined,
): TraversalContext {
  return createTraversalContext(root, { ...options, whitelist });
}

// ── Per-root outputs ─────────────────────────────────────────────────────────

function renderRoot(
  root: string,
  settings: RunSettings,
  whitelist: ReadonlySet<string> | undefined,
  palette: ChalkInstance,
  engine: EngineOptions,
  deps: RunDependencies,
): string[] {
  const tracker = new IncludeTracker(settings.include, settings.includeFileTypes);
  let lines: string[];

  if (isDirectory(root)) {
    const context = contextFor(root, toTraversalOptions(settings), whitelist);
    const renderer = new TreeRenderer(context.root, { showIcons: settings.showIcons, chalk: palette });
    walk(context.root, context, composeVisitors(renderer, tracker), engine);
    lines = renderer.getLines();
  } else {
    const name = path.basename(root);
    tracker.recordFile(name, name);
    lines = [palette.bold(name)];
  }

  for (const warning of tracker.warnings()) {
    deps.err(chalk.yellow(warning));
  }
  return lines;
}

function summarizeRoot(
  root: string,
  settings: RunSettings,
  whitelist: ReadonlySet<string> | undefined,
  engine: EngineOptions,
): string[] {
  const collector = new SummaryCollector();
  if (isDirectory(root)) {
    const context = contextFor(root, toUncappedTraversalOptions(settings), whitelist);
    walk(context.root, context, collector, engine);
  } else {
    collector.addFile(path.basename(root));
  }
  return formatSummary(collector.getSummary());
}

function buildTree(
  root: string,
  settings: RunSettings,
  whitelist: ReadonlySet<string> | undefined,
  engine: EngineOptions,
  cwd: string,
): TreeNode {
  const dataOptions = {
    includeContents: settings.contents,
    skipContents: settings.skipContents.map((skip) => path.resolve(cwd, skip)),
  };

  if (!isDirectory(root)) {
    const name = path.basename(root);
    return createFileNode(name, root, name, dataOptions);
  }

  const context = contextFor(root, toTraversalOptions(settings), whitelist);
  const builder = new TreeDataBuilder(context.root, dataOptions);
  walk(context.root, context, builder, engine);
  return builder.getTree();
}

async function writeArchive(
  roots: readonly string[],
  settings: RunSettings,
  selections: ReadonlyMap<string, ReadonlySet<string>>,
  zipFile: string,
  engine: EngineOptions,
  deps: RunDependencies,
): Promise<void> {
  const archiver = new ZipArchiver(deps.logger);

  for (const root of roots) {
    if (!isDirectory(root)) {
      if (!settings.noFiles) {
        archiver.addFile(path.basename(root), root);
      }
      continue;
    }
    const prefix = roots.length > 1 ? path.basename(root) : '';
    const context = contextFor(root, toUncappedTraversalOptions(settings), selections.get(root));
    walk(context.root, context, archiver.visitorFor(prefix), engine);
  }

  const zipPath = path.resolve(deps.cwd, zipFile);
  await archiver.writeTo(zipPath);
  deps.err(success(`Archive written to ${zipPath} (${archiver.filesAdded} files)`));
}

// ── Main flow ────────────────────────────────────────────────────────────────

export async function runDirscope(paths: readonly string[], settings: RunSettings, deps: RunDependencies): Promise<void> {
  const errors = validateTraversalOptions(toTraversalOptions(settings));
  if (errors.length > 0) {
    throw new Error(`Invalid options: ${errors.join('; ')}`);
  }

  const engine: EngineOptions = { logger: deps.logger };
  const roots = resolveRoots(paths, deps.cwd);
  deps.logger.debug({ roots }, 'Resolved roots');

  // Interactive selection turns into a whitelist per root
  const selections = new Map<string, ReadonlySet<string>>();
  const activeRoots: string[] = [];
  for (const root of roots) {
    if (!settings.interactive || !isDirectory(root)) {
      activeRoots.push(root);
      continue;
    }

    const candidates = collectCandidateFiles(root, toUncappedTraversalOptions(settings), engine);
    const chosen = candidates.length === 0 ? [] : await deps.chooseFiles(root, candidates);
    if (chosen.length === 0) {
      deps.err(warn(`No files selected in ${root}, skipping it`));
      continue;
    }
    selections.set(root, new Set(chosen.map((relative) => path.join(root, ...relative.split('/')))));
    activeRoots.push(root);
  }

  if (settings.zipFile !== undefined) {
    await writeArchive(activeRoots, settings, selections, settings.zipFile, engine, deps);
    return;
  }

  const palette = settings.color && !settings.copy ? chalk : plain;
  const buffer = new OutputBuffer();

  activeRoots.forEach((root, i) => {
    const whitelist = selections.get(root);
    if (activeRoots.length > 1) {
      if (i > 0) {
        buffer.write('');
      }
      buffer.write(palette.bold(root));
    }
    buffer.writeAll(renderRoot(root, settings, whitelist, palette, engine, deps));
    if (settings.summary) {
      buffer.writeAll(['', ...summarizeRoot(root, settings, whitelist, engine)]);
    }
  });

  let formatted: string | null = null;
  const formatAll = (): string => {
    if (formatted === null) {
      const trees = activeRoots.map((root) => buildTree(root, settings, selections.get(root), engine, deps.cwd));
      formatted = formatTrees(trees, settings.format, { showIcons: settings.showIcons });
    }
    return formatted;
  };

  if (settings.exportFile !== undefined) {
    const exportPath = path.resolve(deps.cwd, settings.exportFile);
    // Format before creating the target directory so it never appears in the export
    const text = formatAll();
    fs.mkdirSync(path.dirname(exportPath), { recursive: true });
    fs.writeFileSync(exportPath, text);
    deps.err(success(`Exported ${settings.format} to ${exportPath}`));
  }

  if (settings.copy) {
    const text = settings.format === 'txt' ? buffer.getValue() : formatAll();
    if (deps.copy(text + '\n')) {
      deps.logger.debug({ bytes: text.length }, 'Copied output to clipboard');
      return;
    }
    deps.err(warn('Could not copy to clipboard. Install a clipboard utility (pbcopy, clip, wl-copy, xclip or xsel).'));
  }

  if (!buffer.isEmpty()) {
    deps.out(buffer.getValue());
  }
}
