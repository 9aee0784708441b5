/**
 * Read a file's text for embedding in an export.
 */

import * as fs from 'fs';

export const MAX_CONTENT_BYTES = 1024 * 1024;
const BINARY_SNIFF_BYTES = 8192;

export const BINARY_PLACEHOLDER = '[binary file omitted]';

const utf8 = new TextDecoder('utf-8');

/**
 * File text, or a bracketed placeholder for binary, oversized or
 * unreadable files. Never throws.
 */
export function readFileContents(filePath: string, maxBytes: number = MAX_CONTENT_BYTES): string {
  try {
    const stat = fs.statSync(filePath);
    if (stat.size > maxBytes) {
      return `[file too large: ${stat.size} bytes]`;
    }

    const data = fs.readFileSync(filePath);
    if (data.subarray(0, BINARY_SNIFF_BYTES).includes(0)) {
      return BINARY_PLACEHOLDER;
    }
    return utf8.decode(data);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    return `[unreadable: ${error.message}]`;
  }
}
