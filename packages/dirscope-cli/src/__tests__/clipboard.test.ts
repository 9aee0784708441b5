import { describe, it, expect } from 'vitest';
import { clipboardCommands, copyToClipboard, type CommandRunner } from '../clipboard.js';

function fakeRunner(working: string[]): { run: CommandRunner; calls: string[] } {
  const calls: string[] = [];
  const run: CommandRunner = (cmd, args, input) => {
    calls.push([cmd, ...args, input].join(' '));
    return working.includes(cmd);
  };
  return { run, calls };
}

describe('clipboardCommands', () => {
  it('picks the platform utility', () => {
    expect(clipboardCommands('darwin')).toEqual([{ cmd: 'pbcopy', args: [] }]);
    expect(clipboardCommands('win32')).toEqual([{ cmd: 'clip', args: [] }]);
    expect(clipboardCommands('linux').map(({ cmd }) => cmd)).toEqual(['wl-copy', 'xclip', 'xsel']);
  });
});

describe('copyToClipboard', () => {
  it('stops at the first utility that works', () => {
    const { run, calls } = fakeRunner(['xclip']);

    expect(copyToClipboard('tree', 'linux', run)).toBe(true);
    expect(calls).toEqual(['wl-copy tree', 'xclip -selection clipboard tree']);
  });

  it('returns false when no utility works', () => {
    const { run, calls } = fakeRunner([]);

    expect(copyToClipboard('tree', 'linux', run)).toBe(false);
    expect(calls).toHaveLength(3);
  });
});
