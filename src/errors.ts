/**
 * Error types shared by the CLI, the MCP server and the GitHub client.
 *
 * Plain `Error` is still used for one-off failures; these exist where a
 * caller needs to tell failures apart.
 */

/**
 * The operator chose `q` (or closed the input) while reviewing a block.
 *
 * This is a deliberate abort of the whole run rather than a failure: the
 * current item is left untouched and no later item is processed.
 */
export class QuitRequestedError extends Error {
  constructor(message = 'Quit') {
    super(message);
    this.name = 'QuitRequestedError';
  }
}

/**
 * A command-line argument or argument combination is not acceptable.
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * A `gh` invocation exited non-zero or printed output we could not read.
 */
export class GhCommandError extends Error {
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string, message?: string) {
    super(message ?? `Command failed with exit code ${exitCode}: ${command}`);
    this.name = 'GhCommandError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export function isQuitRequested(error: unknown): error is QuitRequestedError {
  return error instanceof QuitRequestedError;
}
