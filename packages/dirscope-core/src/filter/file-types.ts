/**
 * File-type allowlist matching.
 *
 * A type is an extension written as `py`, `.py` or `*.py`, a compound
 * extension such as `tar.gz`, or a full file name such as `Makefile`.
 * Comparison is case-insensitive.
 */

export function normalizeFileType(fileType: string): string {
  return fileType.trim().toLowerCase().replace(/^\*+/, '').replace(/^\.+/, '');
}

export function matchesFileType(fileName: string, normalizedTypes: readonly string[]): boolean {
  const lower = fileName.toLowerCase();
  return normalizedTypes.some((type) => type !== '' && (lower === type || lower.endsWith(`.${type}`)));
}
