#!/usr/bin/env node

/**
 * `detasklister-mcp`: serves the tasklist tools over MCP stdio.
 */
import { loadServerConfigFromArgs, type ServerConfig } from './config.js';
import { InvalidArgumentError } from './errors.js';
import { runStdioServer } from './server.js';
import { DETASKLISTER_VERSION } from './version.js';

function printHelp(): void {
  process.stdout.write(
    [
      'detasklister-mcp (stdio MCP server)',
      '',
      'Usage:',
      '  detasklister-mcp [--repo [HOST/]OWNER/REPO] [--context <n>] [--gh <path>]',
      '',
      'Options:',
      '  --repo     Default repo for issue.* tools (default: the current gh repo)',
      '  --context  Context lines returned by tasklist.scan (default: 5)',
      '  --gh       gh executable (default: $DETASKLISTER_GH or gh)',
      '  --help     Show help',
      '',
    ].join('\n')
  );
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (argv.includes('--help') || argv.includes('-h')) {
    printHelp();
    return;
  }

  if (argv.includes('--version')) {
    process.stdout.write(`detasklister-mcp ${DETASKLISTER_VERSION}\n`);
    return;
  }

  let config: ServerConfig;
  try {
    config = loadServerConfigFromArgs(argv, process.env);
  } catch (error) {
    if (!(error instanceof InvalidArgumentError)) throw error;
    process.stderr.write(`${error.message}\n\n`);
    printHelp();
    process.exitCode = 1;
    return;
  }
  await runStdioServer(config);
}

await main();
