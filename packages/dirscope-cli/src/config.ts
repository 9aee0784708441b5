/**
 * User config file: location, defaults, loading and validation.
 *
 * The file is YAML. Every key is optional; missing keys take the value
 * from DEFAULT_CONFIG. Unknown keys and wrongly typed values are errors.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { spawnSync } from 'child_process';
import * as yaml from 'js-yaml';
import { ConfigError } from './errors.js';
import { OUTPUT_FORMATS, type DirscopeConfig, type OutputFormat } from './types.js';

export const CONFIG_FILE = 'config.yaml';

export const DEFAULT_CONFIG: Readonly<DirscopeConfig> = Object.freeze({
  maxDepth: null,
  maxItems: 20,
  maxEntries: 40,
  gitignore: true,
  gitignoreDepth: null,
  hiddenItems: false,
  exclude: [],
  excludeDepth: null,
  include: [],
  includeFileTypes: [],
  noFiles: false,
  filesFirst: false,
  showIcons: false,
  color: true,
  format: 'txt',
  contents: true,
});

/**
 * Resolve the config file location:
 * DIRSCOPE_CONFIG, else $XDG_CONFIG_HOME/dirscope/config.yaml,
 * else ~/.config/dirscope/config.yaml.
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env['DIRSCOPE_CONFIG'];
  if (explicit) {
    return path.resolve(explicit);
  }
  const configHome = env['XDG_CONFIG_HOME'] || path.join(os.homedir(), '.config');
  return path.join(configHome, 'dirscope', CONFIG_FILE);
}

// ── Validation ───────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function isCount(value: unknown, min: number): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min;
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

const BOOLEAN_KEYS = ['gitignore', 'hiddenItems', 'noFiles', 'filesFirst', 'showIcons', 'color', 'contents'] as const;
const DEPTH_KEYS = ['maxDepth', 'gitignoreDepth', 'excludeDepth'] as const;
const LIMIT_KEYS = ['maxItems', 'maxEntries'] as const;
const LIST_KEYS = ['exclude', 'include', 'includeFileTypes'] as const;

const KNOWN_KEYS: ReadonlySet<string> = new Set<string>([
  ...BOOLEAN_KEYS,
  ...DEPTH_KEYS,
  ...LIMIT_KEYS,
  ...LIST_KEYS,
  'format',
]);

/**
 * Validate parsed YAML.
 * Returns an array of error messages (empty = valid).
 */
export function validateConfig(raw: unknown): string[] {
  if (raw === null || raw === undefined) {
    return [];
  }
  if (!isRecord(raw)) {
    return ['config must be a mapping of keys to values'];
  }

  const errors: string[] = [];

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      errors.push(`unknown key "${key}"`);
    }
  }

  for (const key of BOOLEAN_KEYS) {
    if (raw[key] !== undefined && typeof raw[key] !== 'boolean') {
      errors.push(`${key} must be true or false`);
    }
  }
  for (const key of DEPTH_KEYS) {
    const value = raw[key];
    if (value !== undefined && value !== null && !isCount(value, 0)) {
      errors.push(`${key} must be a non-negative integer or null`);
    }
  }
  for (const key of LIMIT_KEYS) {
    const value = raw[key];
    if (value !== undefined && value !== null && !isCount(value, 1)) {
      errors.push(`${key} must be a positive integer or null`);
    }
  }
  for (const key of LIST_KEYS) {
    if (raw[key] !== undefined && !isStringList(raw[key])) {
      errors.push(`${key} must be a list of strings`);
    }
  }
  if (raw['format'] !== undefined && !isOutputFormat(raw['format'])) {
    errors.push(`format must be one of ${OUTPUT_FORMATS.join(', ')}`);
  }

  return errors;
}

function readBoolean(raw: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = raw[key];
  return typeof value === 'boolean' ? value : fallback;
}

function readCount(raw: Record<string, unknown>, key: string, fallback: number | null): number | null {
  const value = raw[key];
  if (value === null) {
    return null;
  }
  return typeof value === 'number' ? value : fallback;
}

function readList(raw: Record<string, unknown>, key: string, fallback: readonly string[]): string[] {
  const value = raw[key];
  return isStringList(value) ? [...value] : [...fallback];
}

/**
 * Merge validated YAML over the defaults.
 * Throws ConfigError when the content is invalid.
 */
export function parseConfig(raw: unknown, configPath: string): DirscopeConfig {
  const errors = validateConfig(raw);
  if (errors.length > 0) {
    throw new ConfigError(configPath, `Invalid config file ${configPath}:\n  - ${errors.join('\n  - ')}`);
  }

  const source = isRecord(raw) ? raw : {};
  const d = DEFAULT_CONFIG;
  const format = source['format'];

  return {
    maxDepth: readCount(source, 'maxDepth', d.maxDepth),
    maxItems: readCount(source, 'maxItems', d.maxItems),
    maxEntries: readCount(source, 'maxEntries', d.maxEntries),
    gitignore: readBoolean(source, 'gitignore', d.gitignore),
    gitignoreDepth: readCount(source, 'gitignoreDepth', d.gitignoreDepth),
    hiddenItems: readBoolean(source, 'hiddenItems', d.hiddenItems),
    exclude: readList(source, 'exclude', d.exclude),
    excludeDepth: readCount(source, 'excludeDepth', d.excludeDepth),
    include: readList(source, 'include', d.include),
    includeFileTypes: readList(source, 'includeFileTypes', d.includeFileTypes),
    noFiles: readBoolean(source, 'noFiles', d.noFiles),
    filesFirst: readBoolean(source, 'filesFirst', d.filesFirst),
    showIcons: readBoolean(source, 'showIcons', d.showIcons),
    color: readBoolean(source, 'color', d.color),
    format: isOutputFormat(format) ? format : d.format,
    contents: readBoolean(source, 'contents', d.contents),
  };
}

/**
 * Load the config file. A missing file yields the defaults.
 */
export function loadConfig(configPath: string): DirscopeConfig {
  if (!fs.existsSync(configPath)) {
    return parseConfig(undefined, configPath);
  }

  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    throw new ConfigError(configPath, `Cannot read config file ${configPath}: ${error.message}`);
  }

  return parseConfig(raw, configPath);
}

// ── init / edit ──────────────────────────────────────────────────────────────

const CONFIG_HEADER = `# dirscope configuration
# Flags given on the command line override these values.
# null means "no limit" for maxItems / maxEntries and "unbounded" for depths.
`;

/**
 * Write the default config. Never overwrites an existing file.
 * Returns true if the file was created.
 */
export function initConfig(configPath: string): boolean {
  if (fs.existsSync(configPath)) {
    return false;
  }
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, CONFIG_HEADER + yaml.dump({ ...DEFAULT_CONFIG }, { lineWidth: -1 }));
  return true;
}

/** $VISUAL, then $EDITOR, then the platform's opener */
export function resolveEditor(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  const configured = env['VISUAL'] || env['EDITOR'];
  if (configured) {
    return configured;
  }
  if (platform === 'darwin') return 'open';
  if (platform === 'win32') return 'notepad';
  return 'xdg-open';
}

/**
 * Open the config file in an editor, creating it first if needed.
 */
export function editConfig(configPath: string): void {
  initConfig(configPath);
  const editor = resolveEditor();
  const result = spawnSync(editor, [configPath], { stdio: 'inherit', shell: process.platform === 'win32' });
  if (result.error) {
    throw new ConfigError(configPath, `Could not launch editor "${editor}": ${result.error.message}`);
  }
  if (result.status !== 0) {
    throw new ConfigError(configPath, `Editor "${editor}" exited with status ${result.status}`);
  }
}
