/**
 * Interactive file checklist on stdin/stdout.
 */

import * as readline from 'readline';
import chalk from 'chalk';

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Parse a selection answer against `count` numbered items.
 *
 * Accepts `all` (or an empty answer), `none`, and comma/space separated
 * 1-based numbers and ranges such as `1,3-5 8`. Returns the chosen
 * 0-based indices in ascending order, or null if the answer is invalid.
 */
export function parseSelection(answer: string, count: number): number[] | null {
  const trimmed = answer.trim().toLowerCase();
  if (trimmed === '' || trimmed === 'all' || trimmed === 'a') {
    return Array.from({ length: count }, (_, i) => i);
  }
  if (trimmed === 'none' || trimmed === 'n') {
    return [];
  }

  const chosen = new Set<number>();
  for (const token of trimmed.split(/[\s,]+/).filter((part) => part !== '')) {
    const range = /^(\d+)(?:-(\d+))?$/.exec(token);
    if (range === null) {
      return null;
    }
    const start = Number(range[1]);
    const end = range[2] === undefined ? start : Number(range[2]);
    if (start < 1 || end > count || start > end) {
      return null;
    }
    for (let i = start; i <= end; i++) {
      chosen.add(i - 1);
    }
  }

  return [...chosen].sort((a, b) => a - b);
}

/** Resolves with '' if the input ends before an answer arrives */
function ask(rl: readline.Interface, question: string): Promise<string> {
  return new Promise((resolve) => {
    const onClose = (): void => resolve('');
    rl.once('close', onClose);
    rl.question(question, (answer) => {
      rl.off('close', onClose);
      resolve(answer);
    });
  });
}

/**
 * Show the numbered candidates (all preselected) and ask which to keep.
 * Re-asks until the answer parses.
 */
export async function promptFileSelection(
  root: string,
  candidates: readonly string[],
  streams: PromptStreams = { input: process.stdin, output: process.stdout },
): Promise<string[]> {
  if (candidates.length === 0) {
    return [];
  }

  const rl = readline.createInterface({ input: streams.input, output: streams.output });
  try {
    streams.output.write(`\n${chalk.bold(`Select files to include from ${root}:`)}\n`);
    candidates.forEach((candidate, i) => {
      streams.output.write(`  ${chalk.green('[x]')} ${String(i + 1).padStart(3)}  ${candidate}\n`);
    });

    for (;;) {
      const answer = await ask(rl, 'Files to keep (e.g. 1,3-5; Enter = all, "none" = skip): ');
      const indices = parseSelection(answer, candidates.length);
      if (indices !== null) {
        return indices.flatMap((i) => {
          const candidate = candidates[i];
          return candidate === undefined ? [] : [candidate];
        });
      }
      streams.output.write(chalk.yellow(`  Invalid selection: "${answer.trim()}"\n`));
    }
  } finally {
    rl.close();
  }
}
