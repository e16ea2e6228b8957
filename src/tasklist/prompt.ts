import { createInterface, type Interface } from 'node:readline';
import { QuitRequestedError } from '../errors.js';
import { DECISION_QUESTION } from './constants.js';
import { renderUnifiedDiff } from './diff.js';
import type { DecisionPrompt, DecisionRequest } from './session.js';

/**
 * Decision prompts: the terminal one used by the CLI, and a scripted one that
 * replays a fixed list of answers.
 */
export interface TerminalPromptIo {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
}

export interface TerminalPromptOptions {
  color?: boolean;
}

/**
 * Ask the operator on a terminal (or any line-oriented stream).
 *
 * Each question shows the block's context window as a unified diff (fences
 * present vs. removed) and reads one line. End of input counts as quitting.
 *
 * The readline interface is created on the first question, so a run that
 * never asks does not hold stdin open. Call `close()` when done.
 */
export class TerminalDecisionPrompt implements DecisionPrompt {
  private readonly io: TerminalPromptIo;
  private readonly color: boolean;
  private rl: Interface | undefined;
  private lines: AsyncIterator<string> | undefined;

  constructor(io: TerminalPromptIo, options: TerminalPromptOptions = {}) {
    this.io = io;
    this.color = options.color ?? false;
  }

  async ask(request: DecisionRequest): Promise<string> {
    const diff = renderUnifiedDiff(request.oldText, request.newText, {
      oldLabel: `${request.label} (current)`,
      newLabel: `${request.label} (without fences)`,
      color: this.color,
    });
    this.io.stdout.write(diff);
    this.io.stdout.write(`\n${DECISION_QUESTION}`);

    const next = await this.lineReader().next();
    if (next.done) {
      this.io.stdout.write('\n');
      throw new QuitRequestedError('Quit (end of input)');
    }
    return next.value;
  }

  help(legend: string): void {
    this.io.stdout.write(`${legend}\n`);
  }

  close(): void {
    this.rl?.close();
    this.rl = undefined;
    this.lines = undefined;
  }

  private lineReader(): AsyncIterator<string> {
    if (!this.lines) {
      const rl = createInterface({ input: this.io.stdin, crlfDelay: Infinity, terminal: false });
      this.rl = rl;
      this.lines = rl[Symbol.asyncIterator]();
    }
    return this.lines;
  }
}

export interface ScriptedPromptOptions {
  /**
   * Answer given once the script is used up. Without it, running out of
   * answers is an error.
   */
  fallback?: string;
}

/**
 * Replay a fixed list of answers, one per question.
 *
 * Questions and help requests are recorded in order, which makes the prompt
 * usable both for scripted runs (the MCP `tasklist.strip` tool) and in tests.
 */
export class ScriptedDecisionPrompt implements DecisionPrompt {
  readonly requests: DecisionRequest[] = [];
  readonly helpShown: string[] = [];
  private readonly answers: string[];
  private readonly fallback: string | undefined;

  constructor(answers: readonly string[], options: ScriptedPromptOptions = {}) {
    this.answers = [...answers];
    this.fallback = options.fallback;
  }

  async ask(request: DecisionRequest): Promise<string> {
    this.requests.push(request);
    const answer = this.answers.shift() ?? this.fallback;
    if (answer === undefined) {
      throw new Error(`No scripted answer left for ${request.label}`);
    }
    return answer;
  }

  help(legend: string): void {
    this.helpShown.push(legend);
  }

  /** Answers not consumed yet. */
  remaining(): number {
    return this.answers.length;
  }
}
