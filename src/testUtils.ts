import { Writable } from 'node:stream';
import type { Issue, IssueClient, IssueState } from './github/client.js';

/**
 * Shared helpers for tests.
 */

export interface CapturedStream {
  stream: Writable;
  text(): string;
}

/**
 * A writable stream that keeps everything written to it.
 */
export function captureStream(): CapturedStream {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

/**
 * In-memory `IssueClient`: issues live in a map keyed by the reference used to
 * fetch them.
 */
export class FakeIssueClient implements IssueClient {
  readonly bodies: Map<string, string>;
  readonly viewed: string[] = [];
  readonly edits: Array<{ issue: string; body: string }> = [];
  readonly listedStates: IssueState[] = [];
  private readonly listed: string[];

  constructor(bodies: Record<string, string>, listed: string[] = Object.keys(bodies)) {
    this.bodies = new Map(Object.entries(bodies));
    this.listed = listed;
  }

  async listIssues(state: IssueState): Promise<string[]> {
    this.listedStates.push(state);
    return [...this.listed];
  }

  async viewIssue(issue: string): Promise<Issue> {
    this.viewed.push(issue);
    const body = this.bodies.get(issue);
    if (body === undefined) throw new Error(`Issue not found: ${issue}`);
    const url = issue.startsWith('http') ? issue : `https://github.com/octo/repo/issues/${issue.replace(/^#/, '')}`;
    return { url, body };
  }

  async editIssueBody(issue: string, body: string): Promise<void> {
    this.edits.push({ issue, body });
    this.bodies.set(issue, body);
  }

  editCommand(issue: string): string {
    return `gh issue edit ${issue} --body-file -`;
  }
}
