/**
 * Streams and leveled output for the CLI.
 *
 * Everything the CLI prints goes through an injected `CliIo`, so tests can run
 * it against in-memory streams without spawning a process.
 */
export interface CliIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  stdin: NodeJS.ReadableStream;
}

export type OutputIo = Pick<CliIo, 'stdout' | 'stderr'>;

export interface ReporterOptions {
  /** Echo commands before running them. */
  verbose?: boolean;
  /** Echo commands and their raw output. */
  debug?: boolean;
}

function withNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

/**
 * Leveled writer over stdout/stderr.
 *
 * - `info`: always printed to stdout.
 * - `verbose`: printed with `--verbose` or `--debug`.
 * - `debug`: printed with `--debug` only.
 * - `error`: always printed to stderr.
 */
export class Reporter {
  private readonly io: OutputIo;
  private readonly verboseEnabled: boolean;
  private readonly debugEnabled: boolean;

  constructor(io: OutputIo, options: ReporterOptions = {}) {
    this.io = io;
    this.debugEnabled = options.debug ?? false;
    this.verboseEnabled = (options.verbose ?? false) || this.debugEnabled;
  }

  info(message: string): void {
    this.io.stdout.write(withNewline(message));
  }

  /** Write text to stdout as is (diffs, prompts). */
  raw(text: string): void {
    this.io.stdout.write(text);
  }

  verbose(message: string): void {
    if (this.verboseEnabled) this.io.stdout.write(withNewline(message));
  }

  debug(message: string): void {
    if (this.debugEnabled && message !== '') this.io.stdout.write(withNewline(message));
  }

  error(message: string): void {
    this.io.stderr.write(withNewline(message));
  }
}
