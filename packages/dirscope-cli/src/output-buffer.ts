/**
 * Collects output lines so they can be printed, exported or copied as
 * one block.
 */
export class OutputBuffer {
  private lines: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }

  writeAll(lines: readonly string[]): void {
    this.lines.push(...lines);
  }

  getValue(): string {
    return this.lines.join('\n');
  }

  isEmpty(): boolean {
    return this.lines.length === 0;
  }

  clear(): void {
    this.lines = [];
  }
}
