import { describe, it, expect } from 'vitest';
import * as path from 'node:path';
import { createTraversalContext, validateTraversalOptions } from '../traversal/context.js';
import { isBelow, relativeToRoot } from '../traversal/paths.js';

describe('createTraversalContext', () => {
  it('fills defaults and freezes the result', () => {
    const context = createTraversalContext('relative/root');

    expect(context.root).toBe(path.resolve('relative/root'));
    expect(context.showHidden).toBe(false);
    expect(context.respectGitignore).toBe(true);
    expect(context.filesFirst).toBe(false);
    expect(context.noFiles).toBe(false);
    expect(context.maxDepth).toBeUndefined();
    expect(context.whitelist).toBeUndefined();
    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.extraExcludePatterns)).toBe(true);
  });

  it('resolves whitelist paths', () => {
    const context = createTraversalContext('/p', { whitelist: new Set(['/p/src/../src/a.ts']) });
    expect([...(context.whitelist ?? [])]).toEqual([path.resolve('/p/src/a.ts')]);
  });
});

describe('validateTraversalOptions', () => {
  it('accepts valid options', () => {
    expect(validateTraversalOptions({ maxDepth: 0, maxItemsPerDirectory: 1, gitignoreDepth: 3 })).toEqual([]);
  });

  it('reports every invalid number', () => {
    expect(
      validateTraversalOptions({ maxDepth: -1, gitignoreDepth: 1.5, maxItemsPerDirectory: 0, maxTotalEntries: 2 }),
    ).toEqual([
      'maxDepth must be a non-negative integer',
      'gitignoreDepth must be a non-negative integer',
      'maxItemsPerDirectory must be a positive integer',
    ]);
  });
});

describe('paths', () => {
  const root = path.resolve('/p');

  it('gives root-relative POSIX paths', () => {
    expect(relativeToRoot(root, root)).toBe('');
    expect(relativeToRoot(root, path.join(root, 'src', 'main.py'))).toBe('src/main.py');
  });

  it('compares whole path segments', () => {
    expect(isBelow(path.join(root, 'src'), path.join(root, 'src', 'a.ts'))).toBe(true);
    expect(isBelow(path.join(root, 'src'), path.join(root, 'srcx', 'a.ts'))).toBe(false);
    expect(isBelow(path.join(root, 'src'), path.join(root, 'src'))).toBe(false);
  });
});
