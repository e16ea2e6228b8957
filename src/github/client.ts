/**
 * GitHub issue access through the `gh` CLI.
 *
 * `gh` owns authentication, hosts and API details; this module only builds
 * argument lists, runs the binary, and validates the JSON it prints.
 */

import { spawn } from 'node:child_process';
import * as z from 'zod';
import { GhCommandError } from '../errors.js';
import type { Reporter } from '../io.js';
import { formatRepoRef, ghIssueArg, type RepoRef } from './repo.js';

export type IssueState = 'open' | 'closed' | 'all';

export interface Issue {
  url: string;
  body: string;
}

/**
 * Everything the run needs from the issue tracker.
 */
export interface IssueClient {
  /** URLs of all issues in the configured repo with the given state. */
  listIssues(state: IssueState): Promise<string[]>;
  viewIssue(issue: string): Promise<Issue>;
  editIssueBody(issue: string, body: string): Promise<void>;
  /** Command line `editIssueBody` would run, for dry-run output. */
  editCommand?(issue: string): string;
}

export interface GhCliClientOptions {
  repo?: RepoRef;
  /** `gh` executable (default `gh`). */
  binary?: string;
  reporter?: Reporter;
}

export interface GhRunResult {
  stdout: string;
  stderr: string;
}

const DEFAULT_BINARY = 'gh';

/** `gh issue list` stops at `--limit`; this is the largest value it takes. */
const LIST_LIMIT = '2147483647';

const IssueListSchema = z.array(z.object({ url: z.string() }));
const IssueViewSchema = z.object({
  url: z.string(),
  body: z.string().nullable().optional(),
});

/**
 * Quote an argument for display as a shell command.
 */
export function shellQuote(arg: string): string {
  if (/^[A-Za-z0-9_./:,=@+-]+$/.test(arg)) return arg;
  return `'${arg.replaceAll("'", `'"'"'`)}'`;
}

export function formatCommand(binary: string, args: readonly string[]): string {
  return [binary, ...args].map(shellQuote).join(' ');
}

function parseJsonOutput<T>(command: string, stdout: string, schema: z.ZodType<T>): T {
  let value: unknown;
  try {
    value = JSON.parse(stdout);
  } catch (error) {
    throw new GhCommandError(
      command,
      0,
      '',
      `Could not parse output of ${command}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new GhCommandError(
      command,
      0,
      '',
      `Unexpected output of ${command}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`
    );
  }
  return parsed.data;
}

/**
 * `IssueClient` backed by the `gh` binary.
 */
export class GhCliClient implements IssueClient {
  private readonly repo: RepoRef | undefined;
  private readonly binary: string;
  private readonly reporter: Reporter | undefined;

  constructor(options: GhCliClientOptions = {}) {
    this.repo = options.repo;
    this.binary = options.binary ?? DEFAULT_BINARY;
    this.reporter = options.reporter;
  }

  async listIssues(state: IssueState): Promise<string[]> {
    const args = ['issue', 'list', ...this.repoArgs(), '--json', 'url', '--state', state, '--limit', LIST_LIMIT];
    const { stdout } = await this.run(args);
    const issues = parseJsonOutput(formatCommand(this.binary, args), stdout, IssueListSchema);
    return issues.map((issue) => issue.url);
  }

  async viewIssue(issue: string): Promise<Issue> {
    const args = ['issue', 'view', '--json', 'url,body', ...this.repoArgs(), ghIssueArg(issue)];
    const { stdout } = await this.run(args);
    const parsed = parseJsonOutput(formatCommand(this.binary, args), stdout, IssueViewSchema);
    return { url: parsed.url, body: parsed.body ?? '' };
  }

  async editIssueBody(issue: string, body: string): Promise<void> {
    await this.run(this.editArgs(issue), body);
  }

  /**
   * Command line `editIssueBody` runs (the body goes to stdin).
   */
  editCommand(issue: string): string {
    return formatCommand(this.binary, this.editArgs(issue));
  }

  /**
   * Run `gh` with `args`, optionally feeding `input` on stdin.
   *
   * Resolves with the captured output on exit code 0; otherwise rejects with
   * `GhCommandError`.
   */
  run(args: readonly string[], input?: string): Promise<GhRunResult> {
    const command = formatCommand(this.binary, args);
    this.reporter?.verbose(`>>> ${command}`);

    return new Promise<GhRunResult>((resolve, reject) => {
      const child = spawn(this.binary, [...args], { stdio: ['pipe', 'pipe', 'pipe'] });

      let stdout = '';
      let stderr = '';
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (error) => {
        reject(new GhCommandError(command, 127, stderr, `Failed to run ${command}: ${error.message}`));
      });
      let stdinError: Error | undefined;
      child.stdin.on('error', (error) => {
        stdinError = error;
      });

      child.on('close', (code) => {
        const exitCode = code ?? 1;
        this.reporter?.debug(stdout);
        if (exitCode !== 0) {
          reject(new GhCommandError(command, exitCode, stderr));
          return;
        }
        if (stdinError && input !== undefined) {
          reject(
            new GhCommandError(command, exitCode, stderr, `Failed to write input to ${command}: ${stdinError.message}`)
          );
          return;
        }
        resolve({ stdout, stderr });
      });

      child.stdin.end(input ?? '');
    });
  }

  private repoArgs(): string[] {
    return this.repo ? ['--repo', formatRepoRef(this.repo)] : [];
  }

  private editArgs(issue: string): string[] {
    return ['issue', 'edit', ghIssueArg(issue), ...this.repoArgs(), '--body-file', '-'];
  }
}
