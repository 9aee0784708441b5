import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import JSZip from 'jszip';
import { pino } from 'pino';
import { createTraversalContext, walk } from '@dirscope/core';
import { ZipArchiver } from '../archive/zip-archiver.js';

const logger = pino({ level: 'silent' });

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dirscope-zip-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function createFile(relativePath: string, content = ''): void {
  const absPath = path.join(tmpDir, relativePath);
  fs.mkdirSync(path.dirname(absPath), { recursive: true });
  fs.writeFileSync(absPath, content);
}

async function archive(prefix: string): Promise<{ archiver: ZipArchiver; zip: JSZip }> {
  const context = createTraversalContext(tmpDir);
  const archiver = new ZipArchiver(logger);
  walk(context.root, context, archiver.visitorFor(prefix), { logger });
  return { archiver, zip: await JSZip.loadAsync(await archiver.toBuffer()) };
}

describe('ZipArchiver', () => {
  beforeEach(() => {
    createFile('src/a.ts', 'export const a = 1;');
    createFile('README.md', '# Demo');
    createFile('.gitignore', 'build/\n');
    createFile('build/out.js', 'ignored');
  });

  it('archives the visible files with root-relative member names', async () => {
    const { archiver, zip } = await archive('');

    expect(Object.keys(zip.files).sort()).toEqual(['README.md', 'src/', 'src/a.ts']);
    expect(await zip.file('src/a.ts')?.async('string')).toBe('export const a = 1;');
    expect(archiver.filesAdded).toBe(2);
  });

  it('puts members under a prefix', async () => {
    const { zip } = await archive('proj');

    expect(Object.keys(zip.files).sort()).toEqual(['proj/', 'proj/README.md', 'proj/src/', 'proj/src/a.ts']);
  });

  it('leaves unreadable files out', async () => {
    const archiver = new ZipArchiver(logger);
    archiver.addFile('missing.txt', path.join(tmpDir, 'missing.txt'));

    const zip = await JSZip.loadAsync(await archiver.toBuffer());
    expect(Object.keys(zip.files)).toEqual([]);
    expect(archiver.filesAdded).toBe(0);
  });

  it('writes the archive, creating parent directories', async () => {
    const archiver = new ZipArchiver(logger);
    archiver.addFile('README.md', path.join(tmpDir, 'README.md'));
    const zipPath = path.join(tmpDir, 'out', 'bundle.zip');

    await archiver.writeTo(zipPath);

    const zip = await JSZip.loadAsync(fs.readFileSync(zipPath));
    expect(await zip.file('README.md')?.async('string')).toBe('# Demo');
  });

  it('joins prefixes and relative paths with slashes', () => {
    const archiver = new ZipArchiver(logger);
    expect(archiver.memberName('', 'src/a.ts')).toBe('src/a.ts');
    expect(archiver.memberName('proj', 'src/a.ts')).toBe('proj/src/a.ts');
  });
});
