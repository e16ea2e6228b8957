#!/usr/bin/env node

/**
 * `detasklister` - remove tasklist blocks from GitHub issues.
 *
 * Issues are read and written through `gh`; the block edits themselves live in
 * `tasklist/`. Only runs when executed directly (see `isMain` below).
 */

import { resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';

import { expandShortFlags, loadConfigFromArgs, type DetasklisterConfig, type Env } from './config.js';
import { GhCommandError, InvalidArgumentError, isQuitRequested } from './errors.js';
import { GhCliClient, type IssueClient } from './github/client.js';
import { Reporter, type CliIo } from './io.js';
import { runDetasklist } from './run.js';
import { DEFAULT_CONTEXT_LINES } from './tasklist/constants.js';
import { TerminalDecisionPrompt } from './tasklist/prompt.js';
import { DETASKLISTER_VERSION } from './version.js';

/** Exit code after the operator quits (same as an interrupted shell command). */
export const QUIT_EXIT_CODE = 130;

export interface CliDeps {
  env?: Env;
  /** Replace the `gh`-backed client (tests). */
  createClient?: (config: DetasklisterConfig, reporter: Reporter) => IssueClient;
}

/** Usage text for `--help` and argument errors. */
export function helpText(): string {
  return [
    'detasklister - remove tasklist blocks from GitHub issues',
    '',
    'Usage:',
    '  detasklister [options] [<issue number or url> ...]',
    '',
    'Options:',
    '  -R, --repo [HOST/]OWNER/REPO        Select the GitHub repo to change',
    '  -i, --interactive                   Prompt for each tasklist block',
    '  -A, --all-issues                    Modify all issues in the repo (requires --repo)',
    '  -s, --issue-state open|closed|all   Filter for --all-issues (default: open)',
    `  -C, --context <n>                   Lines of context around each block (default: ${DEFAULT_CONTEXT_LINES})`,
    '  -n, --dry-run                       Show changes without performing them',
    '  -v, --verbose                       Print each gh command before running it',
    '      --debug                         Also print gh command output',
    '      --no-color                      Do not color diffs (also: NO_COLOR=1)',
    '  -h, --help                          Show this help',
    '      --version                       Show the version',
    '',
    'Interactive answers:',
    '  y = remove fences, n = keep block, a = remove this and the rest of the issue,',
    '  d = keep this and the rest of the issue, q = quit without updating, ? = help',
    '',
    'Requires an authenticated GitHub CLI (gh).',
    '',
  ].join('\n');
}

function writeHelp(io: CliIo): void {
  io.stdout.write(helpText());
}

function defaultCreateClient(config: DetasklisterConfig, reporter: Reporter): GhCliClient {
  return new GhCliClient({ repo: config.repo, binary: config.ghBinary, reporter });
}

/**
 * Run the CLI on `args` (argv without `node` and the script path).
 *
 * Resolves with the exit code: 0 on success, 1 on bad arguments or a failed
 * run, `QUIT_EXIT_CODE` when the operator quits. Never calls `process.exit()`.
 */
export async function runDetasklisterCli(
  args: string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr, stdin: process.stdin },
  deps: CliDeps = {}
): Promise<number> {
  if (args.length === 0) {
    writeHelp(io);
    return 1;
  }
  const separator = args.indexOf('--');
  const options = expandShortFlags(separator === -1 ? args : args.slice(0, separator));
  if (options.includes('--help') || options.includes('-h')) {
    writeHelp(io);
    return 0;
  }
  if (options.includes('--version')) {
    io.stdout.write(`detasklister ${DETASKLISTER_VERSION}\n`);
    return 0;
  }

  let config: DetasklisterConfig;
  try {
    config = loadConfigFromArgs(args, deps.env ?? process.env);
  } catch (error) {
    if (!(error instanceof InvalidArgumentError)) throw error;
    io.stderr.write(`${error.message}\n\n`);
    writeHelp(io);
    return 1;
  }

  const reporter = new Reporter(io, { verbose: config.verbose, debug: config.debug });
  const client = (deps.createClient ?? defaultCreateClient)(config, reporter);
  const prompt = config.interactive
    ? new TerminalDecisionPrompt(io, { color: config.color })
    : undefined;

  try {
    await runDetasklist(config, { client, reporter, prompt });
    return 0;
  } catch (error) {
    if (isQuitRequested(error)) {
      reporter.error(error.message);
      return QUIT_EXIT_CODE;
    }
    if (error instanceof GhCommandError) {
      reporter.error(error.message);
      if (error.stderr) reporter.error(error.stderr);
      return 1;
    }
    reporter.error(error instanceof Error ? error.message : String(error));
    return 1;
  } finally {
    prompt?.close();
  }
}

const isMain = resolvePath(process.argv[1] ?? '') === fileURLToPath(import.meta.url);
if (isMain) {
  const exitCode = await runDetasklisterCli(process.argv.slice(2));
  if (exitCode !== 0) process.exitCode = exitCode;
}
