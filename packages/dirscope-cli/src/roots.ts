import * as fs from 'fs';
import * as path from 'path';
import { globSync } from 'glob';
import { RootPathError } from './errors.js';

function hasWildcard(input: string): boolean {
  return input.includes('*') || input.includes('?');
}

/**
 * Resolve root arguments to absolute paths, expanding `*` and `?`
 * wildcards. Order follows the arguments; wildcard matches are sorted.
 * Throws RootPathError for a missing path or a wildcard without matches.
 */
export function resolveRoots(inputs: readonly string[], cwd: string): string[] {
  const roots: string[] = [];
  const seen = new Set<string>();

  const add = (root: string): void => {
    if (!seen.has(root)) {
      seen.add(root);
      roots.push(root);
    }
  };

  for (const input of inputs.length > 0 ? inputs : ['.']) {
    if (hasWildcard(input)) {
      const matches = globSync(input, { cwd, absolute: true, windowsPathsNoEscape: true }).sort();
      if (matches.length === 0) {
        throw new RootPathError(input, `No matches found for pattern: ${input}`);
      }
      matches.forEach((match) => add(path.resolve(match)));
      continue;
    }

    const resolved = path.resolve(cwd, input);
    if (!fs.existsSync(resolved)) {
      throw new RootPathError(input, `Path not found: ${resolved}`);
    }
    add(resolved);
  }

  return roots;
}
