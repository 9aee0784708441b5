/**
 * dirscope CLI types
 */

export type OutputFormat = 'txt' | 'json' | 'md';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['txt', 'json', 'md'];

/** Contents of the YAML config file (every field optional on disk) */
export interface DirscopeConfig {
  maxDepth: number | null;
  maxItems: number | null;     // null = no per-directory limit
  maxEntries: number | null;   // null = no total limit
  gitignore: boolean;
  gitignoreDepth: number | null;
  hiddenItems: boolean;
  exclude: string[];
  excludeDepth: number | null;
  include: string[];
  includeFileTypes: string[];
  noFiles: boolean;
  filesFirst: boolean;
  showIcons: boolean;
  color: boolean;
  format: OutputFormat;
  contents: boolean;
}

/** Parsed command-line options, as commander hands them over */
export interface CliOptions {
  maxDepth?: number;
  maxItems?: number;
  limit: boolean;
  maxEntries?: number | false;
  gitignoreDepth?: number;
  gitignore: boolean;
  hiddenItems?: boolean;
  exclude?: string[];
  excludeDepth?: number;
  include?: string[];
  includeFileTypes?: string[];
  files: boolean;
  filesFirst?: boolean;
  emoji?: boolean;
  color: boolean;
  interactive?: boolean;
  export?: string;
  format?: OutputFormat;
  contents: boolean;
  skipContents?: string[];
  zip?: string;
  copy?: boolean;
  summary?: boolean;
  initConfig?: boolean;
  editConfig?: boolean;
  config: boolean;
  verbose?: boolean;
}

/** Effective settings after merging defaults, config file and flags */
export interface RunSettings {
  maxDepth?: number;
  maxItems?: number;
  maxEntries?: number;
  gitignore: boolean;
  gitignoreDepth?: number;
  hiddenItems: boolean;
  exclude: string[];
  excludeDepth?: number;
  include: string[];
  includeFileTypes: string[];
  noFiles: boolean;
  filesFirst: boolean;
  showIcons: boolean;
  color: boolean;
  interactive: boolean;
  /** Export target, with its extension already settled */
  exportFile?: string;
  format: OutputFormat;
  contents: boolean;
  skipContents: string[];
  /** Archive target, ending in an extension */
  zipFile?: string;
  copy: boolean;
  summary: boolean;
}
