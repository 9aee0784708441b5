import * as fs from 'fs';

interface LanguageHintTable {
  extensions: Record<string, string>;
  fileNames: Record<string, string>;
}

function toStringMap(value: unknown): Record<string, string> {
  const map: Record<string, string> = {};
  if (typeof value !== 'object' || value === null) {
    return map;
  }
  for (const [key, hint] of Object.entries(value)) {
    if (typeof hint === 'string') {
      map[key] = hint;
    }
  }
  return map;
}

let table: LanguageHintTable | null = null;

function loadTable(): LanguageHintTable {
  if (table === null) {
    const raw: unknown = JSON.parse(fs.readFileSync(new URL('./language-hints.json', import.meta.url), 'utf-8'));
    const record = typeof raw === 'object' && raw !== null ? raw : {};
    table = {
      extensions: toStringMap('extensions' in record ? record.extensions : undefined),
      fileNames: toStringMap('fileNames' in record ? record.fileNames : undefined),
    };
  }
  return table;
}

/**
 * Code-fence language for a file name: full-name matches first
 * (`Dockerfile`), then the extension. Empty when unknown.
 */
export function getLanguageHint(fileName: string): string {
  const { extensions, fileNames } = loadTable();
  const lower = fileName.toLowerCase();

  const byName = fileNames[lower];
  if (byName !== undefined) {
    return byName;
  }

  const dot = lower.lastIndexOf('.');
  if (dot <= 0) {
    return '';
  }
  return extensions[lower.slice(dot + 1)] ?? '';
}
