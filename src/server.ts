import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as z from 'zod';
import type { ServerConfig } from './config.js';
import { GhCliClient, type IssueClient } from './github/client.js';
import { assertIssueRef, parseRepoRef, type RepoRef } from './github/repo.js';
import { Reporter } from './io.js';
import { processIssue } from './run.js';
import { buildContextWindow } from './tasklist/context.js';
import { renderUnifiedDiff } from './tasklist/diff.js';
import { ScriptedDecisionPrompt } from './tasklist/prompt.js';
import { listTasklistBlocks } from './tasklist/scan.js';
import { runEditSession, stripTasklistBlocks } from './tasklist/session.js';
import { DETASKLISTER_VERSION } from './version.js';

export interface McpServerDeps {
  /** Replace the `gh`-backed client (tests). */
  createClient?: (repo: RepoRef | undefined) => IssueClient;
  /**
   * Where progress messages go. Stdout carries the MCP protocol, so this
   * defaults to stderr.
   */
  log?: NodeJS.WritableStream;
}

const decisionTokenSchema = z.enum(['y', 'n', 'a', 'd']);

/**
 * Create an MCP server instance and register all tools.
 *
 * Tool naming convention:
 * - `tasklist.*` works on markdown text passed in the call (no GitHub access).
 * - `issue.*` reads and writes GitHub issues through `gh`.
 *
 * There is no operator to ask, so `tasklist.strip` takes its answers up front
 * and `issue.*` tools always strip every block.
 */
export function createMcpServer(config: ServerConfig, deps: McpServerDeps = {}): McpServer {
  const server = new McpServer({ name: 'detasklister-mcp', version: DETASKLISTER_VERSION });

  const log = deps.log ?? process.stderr;
  const reporter = new Reporter({ stdout: log, stderr: log });

  function resolveRepo(repo: string | undefined): RepoRef | undefined {
    return repo === undefined ? config.repo : parseRepoRef(repo);
  }

  function createClient(repo: RepoRef | undefined): IssueClient {
    if (deps.createClient) return deps.createClient(repo);
    return new GhCliClient({ repo, binary: config.ghBinary, reporter });
  }

  server.registerTool(
    'tasklist.scan',
    {
      title: 'Find tasklist blocks',
      description:
        'Find ```[tasklist] fenced blocks in a markdown body. Returns each block with its position, its inner content and surrounding context lines.',
      inputSchema: {
        body: z.string(),
        contextLines: z.number().int().min(0).max(100).optional(),
      },
      outputSchema: {
        blocks: z.array(
          z.object({
            index: z.number().int().nonnegative(),
            line: z.number().int().nonnegative(),
            start: z.number().int().nonnegative(),
            end: z.number().int().nonnegative(),
            outer: z.string(),
            inner: z.string(),
            before: z.string(),
            after: z.string(),
          })
        ),
      },
    },
    async ({ body, contextLines }) => {
      const lines = contextLines ?? config.contextLines;
      const blocks = listTasklistBlocks(body).map((block) => {
        const window = buildContextWindow(body, block, lines);
        return { ...block, before: window.before, after: window.after };
      });
      return {
        content: [{ type: 'text', text: JSON.stringify({ blocks }, null, 2) }],
        structuredContent: { blocks },
      };
    }
  );

  server.registerTool(
    'tasklist.strip',
    {
      title: 'Strip tasklist fences',
      description:
        'Remove the fences of tasklist blocks in a markdown body, keeping their content. Without `decisions`, every block is stripped. With `decisions`, one answer is used per block in order (y = strip, n = keep, a = strip this and the rest, d = keep this and the rest); blocks without an answer are kept.',
      inputSchema: {
        body: z.string(),
        decisions: z.array(decisionTokenSchema).optional(),
      },
      outputSchema: {
        changed: z.boolean(),
        newBody: z.string(),
        diff: z.string(),
        blocks: z.number().int().nonnegative(),
        accepted: z.number().int().nonnegative(),
        rejected: z.number().int().nonnegative(),
        aborted: z.boolean(),
      },
    },
    async ({ body, decisions }) => {
      const outcome =
        decisions === undefined
          ? stripTasklistBlocks(body)
          : await runEditSession(body, {
              mode: 'interactive',
              contextLines: 0,
              prompt: new ScriptedDecisionPrompt(decisions, { fallback: 'n' }),
            });
      const result = {
        changed: outcome.changed,
        newBody: outcome.newBody,
        diff: renderUnifiedDiff(outcome.oldBody, outcome.newBody, { oldLabel: 'body', newLabel: 'body' }),
        blocks: outcome.blocks,
        accepted: outcome.accepted,
        rejected: outcome.rejected,
        aborted: outcome.aborted,
      };
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: result,
      };
    }
  );

  server.registerTool(
    'issue.detasklist',
    {
      title: 'Strip tasklist fences from an issue',
      description:
        'Fetch a GitHub issue with gh, strip the fences of every tasklist block in its body and write it back. With dryRun, only report the diff. If repo is omitted, the server default (--repo) or the current gh repo is used.',
      inputSchema: {
        issue: z.string(),
        repo: z.string().optional(),
        dryRun: z.boolean().optional(),
      },
      outputSchema: {
        url: z.string(),
        changed: z.boolean(),
        updated: z.boolean(),
        blocks: z.number().int().nonnegative(),
        diff: z.string(),
      },
    },
    async ({ issue, repo, dryRun }) => {
      assertIssueRef(issue);
      const client = createClient(resolveRepo(repo));
      const report = await processIssue(
        issue,
        { interactive: false, dryRun: dryRun ?? false, contextLines: config.contextLines, color: false },
        { client, reporter }
      );
      const result = {
        url: report.url,
        changed: report.changed,
        updated: report.updated,
        blocks: report.blocks,
        diff: report.diff,
      };
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: result,
      };
    }
  );

  return server;
}

/**
 * Connect the MCP server to stdio transport and start serving requests.
 *
 * This function does not return until the transport closes.
 */
export async function runStdioServer(config: ServerConfig): Promise<void> {
  const server = createMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
