/**
 * dirscope command-line definition.
 */

import { createRequire } from 'module';
import { Command, InvalidArgumentError, Option } from 'commander';
import { createLogger } from '@dirscope/core';
import { copyToClipboard } from './clipboard.js';
import { runDirscope, type RunDependencies } from './commands/run.js';
import { editConfig, getConfigPath, initConfig, loadConfig, parseConfig } from './config.js';
import { promptFileSelection } from './select/prompt.js';
import { resolveSettings } from './settings.js';
import { OUTPUT_FORMATS, type CliOptions } from './types.js';
import { info, success } from './ui.js';

const require = createRequire(import.meta.url);

function readVersion(): string {
  const pkg: unknown = require('../package.json');
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

function parseCount(min: number): (value: string) => number {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(min === 0 ? 'Must be a non-negative integer.' : 'Must be a positive integer.');
    }
    return parsed;
  };
}

export interface ProgramDependencies extends Omit<RunDependencies, 'logger'> {
  env: NodeJS.ProcessEnv;
  exit: (code: number) => void;
}

const defaultDependencies: ProgramDependencies = {
  cwd: process.cwd(),
  env: process.env,
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  chooseFiles: (root, candidates) => promptFileSelection(root, candidates),
  copy: (text) => copyToClipboard(text),
  exit: (code) => process.exit(code),
};

export function createProgram(overrides: Partial<ProgramDependencies> = {}): Command {
  const deps: ProgramDependencies = { ...defaultDependencies, ...overrides };
  const program = new Command();

  program
    .name('dirscope')
    .description('Print a directory tree that respects .gitignore, or export, zip or copy it')
    .version(readVersion(), '-V, --version')
    .argument('[paths...]', 'directories or files to show (wildcards allowed)', ['.'])
    // Listing
    .option('--max-depth <n>', 'maximum depth to descend', parseCount(0))
    .option('--max-items <n>', 'maximum items shown per directory (default: 20)', parseCount(1))
    .option('--no-limit', 'show every item in each directory')
    .option('--max-entries <n>', 'maximum entries shown in total (default: 40)', parseCount(1))
    .option('--no-max-entries', 'no limit on the total number of entries')
    .option('--hidden-items', 'show hidden files and directories')
    .option('--no-files', 'show directories only')
    .option('--files-first', 'list files before directories')
    // Filtering
    .option('--gitignore-depth <n>', 'only read .gitignore files above this depth', parseCount(0))
    .option('--no-gitignore', 'ignore .gitignore files')
    .option('--exclude <patterns...>', 'extra gitignore-style patterns to exclude')
    .option('--exclude-depth <n>', 'only apply --exclude down to this depth', parseCount(0))
    .option('--include <patterns...>', 'only show files matching these patterns')
    .option('--include-file-types <types...>', 'only show files with these extensions or names')
    // Display
    .option('-e, --emoji', 'show file and directory icons')
    .option('--no-color', 'disable colours')
    .option('--summary', 'print file and directory counts after each tree')
    // Output
    .option('-i, --interactive', 'choose the files to include before output')
    .option('--export <file>', 'write the tree to a file')
    .addOption(new Option('--format <format>', 'export format').choices(OUTPUT_FORMATS))
    .option('--no-contents', 'leave file contents out of exports')
    .option('--skip-contents <paths...>', 'leave these files (or directories) out of export contents')
    .option('-z, --zip <file>', 'write the visible files to a zip archive')
    .option('-c, --copy', 'copy the output to the clipboard instead of printing it')
    // Config
    .option('--init-config', 'create the config file with default values')
    .option('--edit-config', 'open the config file in your editor')
    .option('--no-config', 'ignore the config file')
    .option('--verbose', 'log debug information to stderr')
    .action(async (paths: string[], options: CliOptions, command: Command) => {
      try {
        const configPath = getConfigPath(deps.env);

        if (options.initConfig) {
          deps.out(initConfig(configPath) ? success(`Created ${configPath}`) : info(`Config already exists at ${configPath}`));
          return;
        }
        if (options.editConfig) {
          editConfig(configPath);
          return;
        }

        const config = options.config ? loadConfig(configPath) : parseConfig(undefined, configPath);
        const settings = resolveSettings(options, (key) => command.getOptionValueSource(key) === 'cli', config);
        const logger = createLogger({ level: options.verbose ? 'debug' : 'warn' });

        await runDirscope(paths, settings, { ...deps, logger });
      } catch (error) {
        deps.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
        deps.exit(1);
      }
    });

  return program;
}
