/**
 * Terminal output for the build command
 */

export interface OutputSink {
  stdout(line: string): void;
  stderr(line: string): void;
}

export const processSink: OutputSink = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

export class Reporter {
  constructor(private readonly sink: OutputSink = processSink) {}

  info(message: string): void {
    this.sink.stdout(`[INFO] ${message}`);
  }

  success(message: string): void {
    this.sink.stdout(`[SUCCESS] ${message}`);
  }

  warning(message: string): void {
    this.sink.stdout(`[WARNING] ${message}`);
  }

  error(message: string): void {
    this.sink.stderr(`[ERROR] ${message}`);
  }

  /** Unprefixed text, one sink call per line */
  plain(text: string): void {
    for (const line of text.split('\n')) {
      this.sink.stdout(line);
    }
  }
}
