import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RootPathError } from '../errors.js';
import { resolveRoots } from '../roots.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dirscope-roots-test-'));
  fs.mkdirSync(path.join(tmpDir, 'pkg-b'));
  fs.mkdirSync(path.join(tmpDir, 'pkg-a'));
  fs.mkdirSync(path.join(tmpDir, 'docs'));
  fs.writeFileSync(path.join(tmpDir, 'notes.txt'), 'n');
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('resolveRoots', () => {
  it('defaults to the working directory', () => {
    expect(resolveRoots([], tmpDir)).toEqual([tmpDir]);
  });

  it('resolves relative paths against cwd, keeping argument order', () => {
    expect(resolveRoots(['pkg-b', 'notes.txt', 'pkg-a'], tmpDir)).toEqual([
      path.join(tmpDir, 'pkg-b'),
      path.join(tmpDir, 'notes.txt'),
      path.join(tmpDir, 'pkg-a'),
    ]);
  });

  it('expands wildcards in sorted order', () => {
    expect(resolveRoots(['pkg-*'], tmpDir)).toEqual([path.join(tmpDir, 'pkg-a'), path.join(tmpDir, 'pkg-b')]);
    expect(resolveRoots(['pkg-?'], tmpDir)).toEqual([path.join(tmpDir, 'pkg-a'), path.join(tmpDir, 'pkg-b')]);
  });

  it('drops duplicate roots', () => {
    expect(resolveRoots(['docs', './docs', 'do*'], tmpDir)).toEqual([path.join(tmpDir, 'docs')]);
  });

  it('throws for a missing path', () => {
    expect(() => resolveRoots(['missing'], tmpDir)).toThrow(RootPathError);
    expect(() => resolveRoots(['missing'], tmpDir)).toThrow(`Path not found: ${path.join(tmpDir, 'missing')}`);
  });

  it('throws for a wildcard without matches', () => {
    expect(() => resolveRoots(['nothing-*'], tmpDir)).toThrow('No matches found for pattern: nothing-*');
  });
});
