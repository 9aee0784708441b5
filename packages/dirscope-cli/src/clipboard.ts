import { spawnSync } from 'child_process';

interface ClipboardCommand {
  cmd: string;
  args: string[];
}

/** Copy commands to try, in order, for a platform */
export function clipboardCommands(platform: NodeJS.Platform): ClipboardCommand[] {
  if (platform === 'darwin') return [{ cmd: 'pbcopy', args: [] }];
  if (platform === 'win32') return [{ cmd: 'clip', args: [] }];
  return [
    { cmd: 'wl-copy', args: [] },
    { cmd: 'xclip', args: ['-selection', 'clipboard'] },
    { cmd: 'xsel', args: ['--clipboard', '--input'] },
  ];
}

/** Runs a command with `input` on stdin and reports whether it succeeded */
export type CommandRunner = (cmd: string, args: string[], input: string) => boolean;

const runCommand: CommandRunner = (cmd, args, input) => {
  const result = spawnSync(cmd, args, { input, stdio: ['pipe', 'ignore', 'ignore'] });
  return result.error === undefined && result.status === 0;
};

/**
 * Copy text with the first clipboard utility that works.
 * Returns false when none is available.
 */
export function copyToClipboard(
  text: string,
  platform: NodeJS.Platform = process.platform,
  run: CommandRunner = runCommand,
): boolean {
  return clipboardCommands(platform).some(({ cmd, args }) => run(cmd, args, text));
}
