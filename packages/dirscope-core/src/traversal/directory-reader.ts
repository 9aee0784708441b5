import * as fs from 'node:fs';
import * as path from 'node:path';
import type { DirectoryReader, Entry } from './types.js';

const utf8 = new TextDecoder('utf-8');

function toEntry(directory: string, dirent: fs.Dirent): Entry {
  const absolutePath = path.join(directory, dirent.name);

  if (dirent.isSymbolicLink()) {
    let pointsAtDirectory = false;
    try {
      pointsAtDirectory = fs.statSync(absolutePath).isDirectory();
    } catch {
      // Dangling link: report it as a plain file
      pointsAtDirectory = false;
    }
    return { name: dirent.name, absolutePath, isDirectory: pointsAtDirectory, isSymbolicLink: true };
  }

  return {
    name: dirent.name,
    absolutePath,
    isDirectory: dirent.isDirectory(),
    isSymbolicLink: false,
  };
}

/** DirectoryReader backed by synchronous `node:fs` calls */
export const nodeDirectoryReader: DirectoryReader = {
  readDirectory(directory: string): Entry[] {
    return fs.readdirSync(directory, { withFileTypes: true }).map((dirent) => toEntry(directory, dirent));
  },

  readFileText(filePath: string): string | null {
    try {
      if (!fs.statSync(filePath).isFile()) {
        return null;
      }
      // Invalid UTF-8 sequences decode to U+FFFD instead of failing
      return utf8.decode(fs.readFileSync(filePath));
    } catch {
      return null;
    }
  },

  isDirectory(target: string): boolean {
    try {
      return fs.statSync(target).isDirectory();
    } catch {
      return false;
    }
  },
};
