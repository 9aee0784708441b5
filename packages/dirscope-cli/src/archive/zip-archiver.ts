/**
 * ZipArchiver - a TreeVisitor that adds every visited file to a zip
 * archive. Several roots can be walked into the same archive, each
 * under its own member prefix.
 */

import * as fs from 'fs';
import * as path from 'path';
import JSZip from 'jszip';
import type { Logger } from 'pino';
import type { EntryEvent, TreeVisitor } from '@dirscope/core';

export class ZipArchiver {
  private readonly zip = new JSZip();
  private fileCount = 0;

  constructor(private readonly logger: Logger) {}

  get filesAdded(): number {
    return this.fileCount;
  }

  /**
   * Visitor that adds files under `prefix` (no prefix when empty).
   */
  visitorFor(prefix: string): TreeVisitor {
    return {
      visitEntry: (event: EntryEvent) => {
        const member = this.memberName(prefix, event.relativePath);
        if (event.entry.isDirectory) {
          this.zip.folder(member);
          return;
        }
        this.addFile(member, event.entry.absolutePath);
      },
    };
  }

  /** Add a single file (a file root) */
  addFile(member: string, filePath: string): void {
    let data: Buffer;
    try {
      data = fs.readFileSync(filePath);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.warn({ file: filePath, err: error }, 'Cannot read file, leaving it out of the archive');
      return;
    }
    this.zip.file(member, data);
    this.fileCount += 1;
  }

  memberName(prefix: string, relativePath: string): string {
    return prefix === '' ? relativePath : `${prefix}/${relativePath}`;
  }

  async toBuffer(): Promise<Buffer> {
    return this.zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: { level: 6 },
    });
  }

  async writeTo(zipPath: string): Promise<void> {
    const buffer = await this.toBuffer();
    fs.mkdirSync(path.dirname(zipPath), { recursive: true });
    fs.writeFileSync(zipPath, buffer);
  }
}
