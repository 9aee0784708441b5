import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { pino } from 'pino';
import { PatternSet } from '../patterns/pattern-set.js';
import { createTraversalContext } from '../traversal/context.js';
import { applyWhitelist, DirectoryLister, listFilteredChildren } from '../traversal/directory-lister.js';
import type { Entry } from '../traversal/types.js';

const logger = pino({ level: 'silent' });

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dirscope-lister-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function createFile(relativePath: string, content = ''): void {
  const absPath = path.join(tmpDir, relativePath);
  fs.mkdirSync(path.dirname(absPath), { recursive: true });
  fs.writeFileSync(absPath, content);
}

function names(entries: readonly Entry[]): string[] {
  return entries.map((entry) => entry.name);
}

describe('listFilteredChildren', () => {
  it('returns the visible children and the extended pattern set', () => {
    createFile('src/main.py');
    createFile('src/main.pyc');
    createFile('src/.gitignore', '*.pyc\n');
    const context = createTraversalContext(tmpDir);

    const result = listFilteredChildren(path.join(tmpDir, 'src'), 1, PatternSet.empty(), context, { logger });

    expect(names(result.entries)).toEqual(['main.py']);
    expect(result.truncatedCount).toBe(0);
    expect(result.patternSet.rules().map((rule) => rule.pattern)).toEqual(['src/*.pyc']);
  });

  it('is idempotent', () => {
    for (const name of ['d', 'c', 'b', 'a']) {
      createFile(name);
    }
    createFile('.gitignore', 'c\n');
    const context = createTraversalContext(tmpDir, { maxItemsPerDirectory: 2 });

    const first = listFilteredChildren(tmpDir, 0, PatternSet.empty(), context, { logger });
    const second = listFilteredChildren(tmpDir, 0, PatternSet.empty(), context, { logger });

    expect(names(first.entries)).toEqual(['a', 'b']);
    expect(first.truncatedCount).toBe(1);
    expect(names(second.entries)).toEqual(names(first.entries));
    expect(second.truncatedCount).toBe(first.truncatedCount);
    expect(second.patternSet.size).toBe(first.patternSet.size);
  });

  it('treats a missing directory as empty', () => {
    const context = createTraversalContext(tmpDir);
    const result = listFilteredChildren(path.join(tmpDir, 'gone'), 1, PatternSet.empty(), context, { logger });

    expect(result.entries).toEqual([]);
    expect(result.truncatedCount).toBe(0);
  });
});

describe('DirectoryLister subtree include checks', () => {
  it('ignores the per-directory cap and noFiles while probing', () => {
    createFile('pkg/a.txt');
    createFile('pkg/b.txt');
    createFile('pkg/z.py');
    const context = createTraversalContext(tmpDir, {
      includePatterns: ['*.py'],
      maxItemsPerDirectory: 1,
      noFiles: true,
    });

    const result = new DirectoryLister(context, { logger }).list(tmpDir, 0);

    expect(names(result.entries)).toEqual(['pkg']);
  });

  it('lets include rules win over .gitignore inside the searched subtree', () => {
    createFile('gen/out.py');
    createFile('gen/.gitignore', '*.py\n');
    const context = createTraversalContext(tmpDir, { includePatterns: ['*.py'] });

    expect(names(new DirectoryLister(context, { logger }).list(tmpDir, 0).entries)).toEqual(['gen']);
  });

  it('never searches directories dropped by .gitignore', () => {
    createFile('gen/out.py');
    createFile('.gitignore', 'gen/\n');
    const context = createTraversalContext(tmpDir, { includePatterns: ['*.py'] });

    expect(new DirectoryLister(context, { logger }).list(tmpDir, 0).entries).toEqual([]);
  });

  it('prunes directories left empty by excludes', () => {
    createFile('vendor/lib.py');
    createFile('app/main.py');
    const context = createTraversalContext(tmpDir, { includeFileTypes: ['py'], extraExcludePatterns: ['vendor'] });

    expect(names(new DirectoryLister(context, { logger }).list(tmpDir, 0).entries)).toEqual(['app']);
  });
});

describe('applyWhitelist', () => {
  const root = path.resolve('/p');
  const entries: Entry[] = [
    { name: 'src', absolutePath: path.join(root, 'src'), isDirectory: true, isSymbolicLink: false },
    { name: 'srcx', absolutePath: path.join(root, 'srcx'), isDirectory: true, isSymbolicLink: false },
    { name: 'a.ts', absolutePath: path.join(root, 'a.ts'), isDirectory: false, isSymbolicLink: false },
    { name: 'b.ts', absolutePath: path.join(root, 'b.ts'), isDirectory: false, isSymbolicLink: false },
  ];

  it('returns entries unchanged without a whitelist', () => {
    expect(applyWhitelist(entries, undefined)).toBe(entries);
  });

  it('keeps whitelisted files and their ancestors', () => {
    const whitelist = new Set([path.join(root, 'src', 'x.ts'), path.join(root, 'a.ts')]);
    expect(names(applyWhitelist(entries, whitelist))).toEqual(['src', 'a.ts']);
  });
});
