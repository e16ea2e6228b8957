import { InvalidArgumentError } from './errors.js';
import type { IssueState } from './github/client.js';
import { assertIssueRef, parseRepoRef, type RepoRef } from './github/repo.js';
import { DEFAULT_CONTEXT_LINES } from './tasklist/constants.js';

/**
 * Runtime configuration for a detasklister run.
 */
export interface DetasklisterConfig {
  repo?: RepoRef;
  /** Issue numbers or URLs given on the command line. */
  issues: string[];
  /** Process every issue of `repo` (filtered by `issueState`). */
  allIssues: boolean;
  issueState: IssueState;
  interactive: boolean;
  dryRun: boolean;
  contextLines: number;
  verbose: boolean;
  debug: boolean;
  /** ANSI colors in diffs. */
  color: boolean;
  /** `gh` executable. */
  ghBinary: string;
}

/**
 * Configuration of the MCP stdio server.
 */
export interface ServerConfig {
  /** Repo used by `issue.*` tools when a call does not name one. */
  repo?: RepoRef;
  contextLines: number;
  ghBinary: string;
}

export type Env = Record<string, string | undefined>;

const DEFAULT_ISSUE_STATE: IssueState = 'open';
const GH_BINARY_ENV = 'DETASKLISTER_GH';

/** Short options that take a value (`-R o/r`, `-Ro/r`). */
const SHORT_OPTIONS_WITH_VALUE = new Set(['R', 's', 'C']);

/**
 * Split bundled short flags (`-in` → `-i -n`, `-Ro/r` → `-R o/r`).
 *
 * Everything after `--` is left alone.
 */
export function expandShortFlags(argv: readonly string[]): string[] {
  const out: string[] = [];
  let passthrough = false;
  for (const arg of argv) {
    if (passthrough || arg === '--' || !/^-[A-Za-z]./.test(arg)) {
      if (arg === '--') passthrough = true;
      out.push(arg);
      continue;
    }
    for (let index = 1; index < arg.length; index += 1) {
      const letter = arg[index] ?? '';
      out.push(`-${letter}`);
      if (SHORT_OPTIONS_WITH_VALUE.has(letter) && index + 1 < arg.length) {
        out.push(arg.slice(index + 1));
        break;
      }
    }
  }
  return out;
}

/**
 * Consume a boolean flag (any of its spellings) from argv.
 *
 * Returns true if the flag was present; every occurrence is removed.
 */
export function takeFlag(argv: string[], ...names: string[]): boolean {
  const separator = argv.indexOf('--');
  const limit = separator === -1 ? argv.length : separator;
  let found = false;
  for (let index = limit - 1; index >= 0; index -= 1) {
    if (names.includes(argv[index] ?? '')) {
      argv.splice(index, 1);
      found = true;
    }
  }
  return found;
}

/**
 * Consume a `--flag value`, `--flag=value` or `-f value` option from argv.
 *
 * Returns undefined when absent. Throws if present but missing a value.
 * The last occurrence wins.
 */
export function takeOption(argv: string[], ...names: string[]): string | undefined {
  let value: string | undefined;
  let index = 0;
  while (index < argv.length) {
    const arg = argv[index] ?? '';
    if (arg === '--') break;

    const long = names.find((name) => name.startsWith('--') && arg.startsWith(`${name}=`));
    if (long) {
      value = arg.slice(long.length + 1);
      argv.splice(index, 1);
      if (!value) throw new InvalidArgumentError(`Missing value for ${long}`);
      continue;
    }

    if (names.includes(arg)) {
      const next = argv[index + 1];
      argv.splice(index, 2);
      if (next === undefined || next.startsWith('-')) {
        throw new InvalidArgumentError(`Missing value for ${arg}`);
      }
      value = next;
      continue;
    }

    index += 1;
  }
  return value;
}

/**
 * Fail on any flag left after all known flags were consumed; return the positionals.
 */
export function takePositionals(argv: string[]): string[] {
  const separator = argv.indexOf('--');
  const head = separator === -1 ? argv : argv.slice(0, separator);
  const tail = separator === -1 ? [] : argv.slice(separator + 1);
  const unknown = head.find((arg) => arg.startsWith('-') && arg !== '-');
  if (unknown) throw new InvalidArgumentError(`Unknown option: ${unknown}`);
  return [...head, ...tail];
}

/**
 * Parse `--context` into a non-negative integer.
 */
export function parseContextLines(value: string | undefined): number {
  if (value === undefined) return DEFAULT_CONTEXT_LINES;
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError(`--context (-C) must be a non-negative integer, got '${value}'`);
  }
  return Number(value);
}

function parseIssueState(value: string): IssueState {
  if (value === 'open' || value === 'closed' || value === 'all') return value;
  throw new InvalidArgumentError("--issue-state (-s) must be one of 'all', 'open', or 'closed'");
}

/**
 * Colors are on unless `--no-color` is given or `NO_COLOR` is set (https://no-color.org/).
 */
function colorEnabled(noColorFlag: boolean, env: Env): boolean {
  if (noColorFlag) return false;
  const noColor = env.NO_COLOR;
  return noColor === undefined || noColor === '';
}

function ghBinaryFromEnv(env: Env): string {
  const binary = env[GH_BINARY_ENV];
  return binary && binary.trim() ? binary : 'gh';
}

/**
 * Parse CLI args into a `DetasklisterConfig`.
 *
 * Supported flags:
 * - `-R, --repo [HOST/]OWNER/REPO`
 * - `-i, --interactive`
 * - `-A, --all-issues` (requires `--repo`, excludes positional issues)
 * - `-s, --issue-state open|closed|all` (requires `--all-issues`; default `open`)
 * - `-C, --context <n>` (default 5)
 * - `-n, --dry-run`, `-v, --verbose`, `--debug`, `--no-color`
 */
export function loadConfigFromArgs(args: readonly string[], env: Env = {}): DetasklisterConfig {
  const argv = expandShortFlags(args);

  const repoArg = takeOption(argv, '--repo', '-R');
  const issueStateArg = takeOption(argv, '--issue-state', '-s');
  const contextArg = takeOption(argv, '--context', '-C');
  const interactive = takeFlag(argv, '--interactive', '-i');
  const allIssues = takeFlag(argv, '--all-issues', '-A');
  const dryRun = takeFlag(argv, '--dry-run', '-n');
  const verbose = takeFlag(argv, '--verbose', '-v');
  const debug = takeFlag(argv, '--debug');
  const noColor = takeFlag(argv, '--no-color');
  const issues = takePositionals(argv);

  const repo = repoArg === undefined ? undefined : parseRepoRef(repoArg);
  const contextLines = parseContextLines(contextArg);

  let issueState = DEFAULT_ISSUE_STATE;
  if (allIssues) {
    if (issues.length > 0) {
      throw new InvalidArgumentError('Cannot combine positional arguments with --all-issues (-A)');
    }
    if (!repo) {
      throw new InvalidArgumentError('--repo (-R) is required when using --all-issues (-A)');
    }
    if (issueStateArg !== undefined) issueState = parseIssueState(issueStateArg);
  } else {
    if (issueStateArg !== undefined) {
      throw new InvalidArgumentError('--issue-state (-s) requires --all-issues (-A)');
    }
    if (issues.length === 0) {
      throw new InvalidArgumentError('Missing <issue>: pass issue numbers or URLs, or use --all-issues (-A)');
    }
  }

  for (const issue of issues) assertIssueRef(issue);

  return {
    ...(repo ? { repo } : {}),
    issues,
    allIssues,
    issueState,
    interactive,
    dryRun,
    contextLines,
    verbose,
    debug,
    color: colorEnabled(noColor, env),
    ghBinary: ghBinaryFromEnv(env),
  };
}

/**
 * Parse MCP server args into a `ServerConfig`.
 *
 * Supported flags:
 * - `--repo [HOST/]OWNER/REPO`: default repo for `issue.*` tools.
 * - `--context <n>`: context lines in `tasklist.scan` output (default 5).
 * - `--gh <path>`: `gh` executable (else `DETASKLISTER_GH`, else `gh`).
 */
export function loadServerConfigFromArgs(args: readonly string[], env: Env = {}): ServerConfig {
  const argv = [...args];

  const repoArg = takeOption(argv, '--repo');
  const contextArg = takeOption(argv, '--context');
  const ghArg = takeOption(argv, '--gh');
  const rest = takePositionals(argv);
  if (rest.length > 0) throw new InvalidArgumentError(`Unknown argument: ${rest[0]}`);

  const repo = repoArg === undefined ? undefined : parseRepoRef(repoArg);
  return {
    ...(repo ? { repo } : {}),
    contextLines: parseContextLines(contextArg),
    ghBinary: ghArg ?? ghBinaryFromEnv(env),
  };
}
