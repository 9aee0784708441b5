import chalk from "chalk";

export function success(msg: string): string {
  return chalk.green("  ✓") + " " + msg;
}

export function warn(msg: string): string {
  return chalk.yellow("  ✗") + " " + msg;
}

export function info(msg: string): string {
  return chalk.dim("  ~") + " " + msg;
}
