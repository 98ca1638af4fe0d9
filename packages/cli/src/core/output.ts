/**
 * Line-oriented terminal output. Handlers and the reporter write through this
 * so tests can capture what a run prints.
 */

export interface Output {
  /** Whether in-place progress updates (`\r`) are appropriate */
  readonly isTTY: boolean;
  line(text?: string): void;
  /** Overwrite the current line (TTY only) */
  overwrite(text: string): void;
  error(text: string): void;
}

export class ConsoleOutput implements Output {
  constructor(
    private readonly stdout: NodeJS.WriteStream = process.stdout,
    private readonly stderr: NodeJS.WriteStream = process.stderr
  ) {}

  get isTTY(): boolean {
    return this.stdout.isTTY === true;
  }

  line(text: string = ''): void {
    this.stdout.write(`${text}\n`);
  }

  overwrite(text: string): void {
    const width = this.stdout.columns || 80;
    this.stdout.write(`\r${text.slice(0, width - 1).padEnd(width - 1)}`);
  }

  error(text: string): void {
    this.stderr.write(`${text}\n`);
  }
}

/**
 * Collects output in memory
 */
export class BufferedOutput implements Output {
  readonly isTTY = false;
  readonly lines: string[] = [];
  readonly errors: string[] = [];

  line(text: string = ''): void {
    this.lines.push(...text.split('\n'));
  }

  overwrite(_text: string): void {
    // progress updates are not recorded
  }

  error(text: string): void {
    this.errors.push(text);
  }

  text(): string {
    return this.lines.join('\n');
  }
}
