/*
Purpose: human-readable progress on the console, separate from the JSONL event log.
Assumptions: stdout is the default stream; colour only when it is a TTY.
Usage: const out = new ConsoleOutput({ verbosity: "verbose" }); out.info("discover");
*/

import {
  createAnsiFormatter,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
} from "./error-format.js";

export type Verbosity = "quiet" | "normal" | "verbose";

export type OutputStream = {
  write(chunk: string): unknown;
  isTTY?: boolean;
};

export type ConsoleOutputOptions = {
  verbosity?: Verbosity;
  stream?: OutputStream;
  errorStream?: OutputStream;
  useColor?: boolean;
};

const LEVELS: Record<Verbosity, number> = { quiet: 0, normal: 1, verbose: 2 };

export class ConsoleOutput {
  readonly verbosity: Verbosity;
  private readonly stream: OutputStream;
  private readonly errorStream: OutputStream;
  private readonly format: AnsiFormatter;

  constructor(opts: ConsoleOutputOptions = {}) {
    this.verbosity = opts.verbosity ?? "normal";
    this.stream = opts.stream ?? process.stdout;
    this.errorStream = opts.errorStream ?? opts.stream ?? process.stderr;
    this.format = createAnsiFormatter(
      resolveColorEnabled({ stream: this.stream, useColor: opts.useColor }),
    );
  }

  /** Always printed, even under --quiet. */
  print(message: string): void {
    this.stream.write(`${message}\n`);
  }

  info(message: string): void {
    if (LEVELS[this.verbosity] >= LEVELS.normal) this.print(message);
  }

  verbose(message: string): void {
    if (LEVELS[this.verbosity] >= LEVELS.verbose) this.print(this.format(message, ["dim"]));
  }

  warn(message: string): void {
    this.errorStream.write(`${this.format("warn:", ["yellow"])} ${message}\n`);
  }

  error(message: string): void {
    this.errorStream.write(`${this.format("error:", ["red", "bold"])} ${message}\n`);
  }

  style(text: string, styles: AnsiStyle[]): string {
    return this.format(text, styles);
  }

  /** A child output indenting every line, for nested steps and phases. */
  indented(level = 1): ConsoleOutput {
    const prefix = "    ".repeat(level);
    const parent = this.stream;
    return new ConsoleOutput({
      verbosity: this.verbosity,
      stream: {
        isTTY: parent.isTTY,
        write: (chunk) =>
          parent.write(
            chunk
              .split("\n")
              .map((line) => (line.length > 0 ? `${prefix}${line}` : line))
              .join("\n"),
          ),
      },
      errorStream: this.errorStream,
    });
  }
}

export const SILENT_OUTPUT = new ConsoleOutput({
  verbosity: "quiet",
  stream: { write: () => undefined },
});
