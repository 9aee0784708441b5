/**
 * Tests for the command-line definition (program.ts)
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createProgram, type ProgramDependencies } from '../program.js';
import { success } from '../ui.js';

let tmpDir: string;
let configDir: string;
let configPath: string;
let base: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dirscope-program-test-'));
  configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dirscope-program-config-'));
  configPath = path.join(configDir, 'config.yaml');
  base = path.basename(tmpDir);

  fs.writeFileSync(path.join(tmpDir, 'a.txt'), 'a');
  fs.writeFileSync(path.join(tmpDir, 'b.txt'), 'b');
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
  fs.rmSync(configDir, { recursive: true, force: true });
});

interface Run {
  out: string[];
  err: string[];
  exit: Mock;
}

async function run(args: string[], overrides: Partial<ProgramDependencies> = {}): Promise<Run> {
  const out: string[] = [];
  const err: string[] = [];
  const exit = vi.fn();
  const program = createProgram({
    cwd: tmpDir,
    env: { DIRSCOPE_CONFIG: configPath },
    out: (text) => out.push(text),
    err: (text) => err.push(text),
    chooseFiles: async () => [],
    copy: () => true,
    exit: (code) => exit(code),
    ...overrides,
  });
  program.exitOverride().configureOutput({ writeOut: () => {}, writeErr: () => {} });
  await program.parseAsync(args, { from: 'user' });
  return { out, err, exit };
}

describe('dirscope program', () => {
  it('prints the working directory by default', async () => {
    const { out, exit } = await run(['--no-color']);

    expect(out).toEqual([[base, '├── a.txt', '└── b.txt'].join('\n')]);
    expect(exit).not.toHaveBeenCalled();
  });

  it('applies values from the config file', async () => {
    fs.writeFileSync(configPath, 'maxItems: 1\ncolor: false\n');

    const { out } = await run([]);

    expect(out).toEqual([[base, '├── a.txt', '└── ... and 1 more items'].join('\n')]);
  });

  it('lets flags override the config file', async () => {
    fs.writeFileSync(configPath, 'maxItems: 1\ncolor: false\n');

    const { out } = await run(['--max-items', '5']);

    expect(out).toEqual([[base, '├── a.txt', '└── b.txt'].join('\n')]);
  });

  it('ignores the config file with --no-config', async () => {
    fs.writeFileSync(configPath, 'colour: false\n');

    const { out, exit } = await run(['--no-config', '--no-color', '--no-limit']);

    expect(out).toEqual([[base, '├── a.txt', '└── b.txt'].join('\n')]);
    expect(exit).not.toHaveBeenCalled();
  });

  it('reports an invalid config file and exits with 1', async () => {
    fs.writeFileSync(configPath, 'colour: false\n');

    const { out, err, exit } = await run([]);

    expect(out).toEqual([]);
    expect(err).toEqual([`Error: Invalid config file ${configPath}:\n  - unknown key "colour"`]);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('reports a missing path and exits with 1', async () => {
    const { err, exit } = await run(['missing', '--no-color']);

    expect(err).toEqual([`Error: Path not found: ${path.join(tmpDir, 'missing')}`]);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('creates the config file with --init-config', async () => {
    const { out } = await run(['--init-config']);

    expect(out).toEqual([success(`Created ${configPath}`)]);
    expect(fs.existsSync(configPath)).toBe(true);
  });

  it('infers the export format from the file name', async () => {
    const { err } = await run(['--no-color', '--export', 'tree.md', '--no-contents']);
    const exportPath = path.join(tmpDir, 'tree.md');

    expect(fs.readFileSync(exportPath, 'utf-8')).toBe('```\n' + [base, '├── a.txt', '└── b.txt'].join('\n') + '\n```\n');
    expect(err).toEqual([success(`Exported md to ${exportPath}`)]);
  });

  it('rejects a non-positive --max-items', async () => {
    await expect(run(['--max-items', '0'])).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });

  it('rejects an unknown --format', async () => {
    await expect(run(['--format', 'html'])).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });
});
