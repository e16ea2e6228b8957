import { PassThrough } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { helpText, QUIT_EXIT_CODE, runDetasklisterCli } from './detasklister.js';
import { GhCommandError } from './errors.js';
import type { IssueClient } from './github/client.js';
import { captureStream, FakeIssueClient } from './testUtils.js';

const BLOCK = '```[tasklist]\n- a\n```\n';

function cli(client: IssueClient, input = '', env: Record<string, string> = { NO_COLOR: '1' }) {
  const stdout = captureStream();
  const stderr = captureStream();
  const stdin = new PassThrough();
  stdin.end(input);
  const run = (args: string[]) =>
    runDetasklisterCli(
      args,
      { stdout: stdout.stream, stderr: stderr.stream, stdin },
      { env, createClient: () => client }
    );
  return { run, stdout, stderr };
}

describe('runDetasklisterCli', () => {
  it('prints help and fails without arguments', async () => {
    const { run, stdout } = cli(new FakeIssueClient({}));
    expect(await run([])).toBe(1);
    expect(stdout.text()).toBe(helpText());
  });

  it('prints help on request', async () => {
    const { run, stdout } = cli(new FakeIssueClient({}));
    expect(await run(['-h'])).toBe(0);
    expect(stdout.text()).toBe(helpText());
  });

  it('finds help inside bundled short flags', async () => {
    const client = new FakeIssueClient({ '3': BLOCK });
    const { run, stdout, stderr } = cli(client);
    expect(await run(['-ih', '3'])).toBe(0);
    expect(stdout.text()).toBe(helpText());
    expect(stderr.text()).toBe('');
    expect(client.viewed).toEqual([]);
  });

  it('prints the version', async () => {
    const { run, stdout } = cli(new FakeIssueClient({}));
    expect(await run(['--version'])).toBe(0);
    expect(stdout.text()).toBe('detasklister 0.1.0\n');
  });

  it('reports bad arguments followed by help', async () => {
    const { run, stdout, stderr } = cli(new FakeIssueClient({}));
    expect(await run(['-s', 'all', '3'])).toBe(1);
    expect(stderr.text()).toBe('--issue-state (-s) requires --all-issues (-A)\n\n');
    expect(stdout.text()).toBe(helpText());
  });

  it('strips every block of the given issues', async () => {
    const client = new FakeIssueClient({ '3': BLOCK, '4': 'plain\n' });
    const { run, stdout, stderr } = cli(client);
    expect(await run(['3', '4'])).toBe(0);
    expect(stdout.text()).toBe('Updating 3...\nUpdated 3\nNo changes to make for 4\n');
    expect(stderr.text()).toBe('');
    expect(client.edits).toEqual([{ issue: '3', body: '- a\n' }]);
  });

  it('asks about each block in interactive mode and exits 130 on quit', async () => {
    const client = new FakeIssueClient({ '3': BLOCK, '4': BLOCK });
    const { run, stderr } = cli(client, 'y\nq\n');
    expect(await run(['-i', '3', '4'])).toBe(QUIT_EXIT_CODE);
    expect(stderr.text()).toBe('Quit\n');
    expect(client.edits).toEqual([{ issue: '3', body: '- a\n' }]);
  });

  it('treats the end of input as quit', async () => {
    const client = new FakeIssueClient({ '3': BLOCK });
    const { run, stderr } = cli(client);
    expect(await run(['--interactive', '3'])).toBe(QUIT_EXIT_CODE);
    expect(stderr.text()).toBe('Quit (end of input)\n');
    expect(client.edits).toEqual([]);
  });

  it('prints uncolored diffs when NO_COLOR is set', async () => {
    const client = new FakeIssueClient({ '3': BLOCK });
    const { run, stdout } = cli(client);
    expect(await run(['-n', '3'])).toBe(0);
    expect(stdout.text()).toBe(
      '>>> gh issue edit 3 --body-file -\n--- 3 (current)\n+++ 3 (updated)\n@@ -1,3 +1,1 @@\n-```[tasklist]\n - a\n-```\n'
    );
  });

  it('prints colored diffs otherwise', async () => {
    const client = new FakeIssueClient({ '3': BLOCK });
    const { run, stdout } = cli(client, '', {});
    expect(await run(['-n', '3'])).toBe(0);
    expect(stdout.text()).toContain('\u001b[31m-```[tasklist]\u001b[0m\n');
    expect(stdout.text()).toContain('\u001b[36m@@ -1,3 +1,1 @@\u001b[0m\n');
  });

  it('reports gh failures with their stderr', async () => {
    const client: IssueClient = {
      listIssues: async () => [],
      viewIssue: async () => {
        throw new GhCommandError('gh issue view 3', 1, 'could not find issue\n');
      },
      editIssueBody: async () => undefined,
    };
    const { run, stderr } = cli(client);
    expect(await run(['3'])).toBe(1);
    expect(stderr.text()).toBe('Command failed with exit code 1: gh issue view 3\ncould not find issue\n');
  });

  it('reports other failures', async () => {
    const { run, stderr } = cli(new FakeIssueClient({}));
    expect(await run(['9'])).toBe(1);
    expect(stderr.text()).toBe('Issue not found: 9\n');
  });
});
