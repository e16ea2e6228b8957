import { PassThrough } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { QuitRequestedError } from '../errors.js';
import { captureStream } from '../testUtils.js';
import { DECISION_LEGEND, DECISION_QUESTION } from './constants.js';
import { ScriptedDecisionPrompt, TerminalDecisionPrompt } from './prompt.js';
import { runEditSession } from './session.js';

const BODY = '```[tasklist]\n- a\n```\n';
const SHOWN_DIFF =
  '--- block 1/1 (current)\n+++ block 1/1 (without fences)\n@@ -1,3 +1,1 @@\n-```[tasklist]\n - a\n-```\n';

function terminal(input: string) {
  const stdin = new PassThrough();
  const stdout = captureStream();
  stdin.end(input);
  const prompt = new TerminalDecisionPrompt({ stdin, stdout: stdout.stream });
  return { prompt, stdout };
}

describe('TerminalDecisionPrompt', () => {
  it('shows the block as a diff and reads one line per question', async () => {
    const { prompt, stdout } = terminal('x\ny\n');
    try {
      const outcome = await runEditSession(BODY, { mode: 'interactive', prompt });
      expect(outcome.newBody).toBe('- a\n');
    } finally {
      prompt.close();
    }
    const question = `${SHOWN_DIFF}\n${DECISION_QUESTION}`;
    expect(stdout.text()).toBe(`${question}${question}`);
  });

  it('prints the legend for help requests', async () => {
    const { prompt, stdout } = terminal('?\nn\n');
    try {
      await runEditSession(BODY, { mode: 'interactive', prompt });
    } finally {
      prompt.close();
    }
    const question = `${SHOWN_DIFF}\n${DECISION_QUESTION}`;
    expect(stdout.text()).toBe(`${question}${DECISION_LEGEND}\n${question}`);
  });

  it('treats end of input as quit', async () => {
    const { prompt, stdout } = terminal('');
    try {
      await expect(runEditSession(BODY, { mode: 'interactive', prompt })).rejects.toThrow(
        new QuitRequestedError('Quit (end of input)')
      );
    } finally {
      prompt.close();
    }
    expect(stdout.text().endsWith(`${DECISION_QUESTION}\n`)).toBe(true);
  });

  it('does not read input when nothing is asked', async () => {
    const { prompt, stdout } = terminal('y\n');
    const outcome = await runEditSession('no blocks\n', { mode: 'interactive', prompt });
    prompt.close();
    expect(outcome.changed).toBe(false);
    expect(stdout.text()).toBe('');
  });
});

describe('ScriptedDecisionPrompt', () => {
  it('fails once the script is used up', async () => {
    const prompt = new ScriptedDecisionPrompt(['n']);
    await expect(
      runEditSession(`${BODY}${BODY}`, { mode: 'interactive', prompt, label: '#1' })
    ).rejects.toThrow('No scripted answer left for #1 block 2/2');
  });

  it('uses the fallback once the script is used up', async () => {
    const prompt = new ScriptedDecisionPrompt(['y'], { fallback: 'n' });
    const outcome = await runEditSession(`${BODY}${BODY}`, { mode: 'interactive', prompt });
    expect(outcome.newBody).toBe(`- a\n${BODY}`);
    expect(prompt.requests).toHaveLength(2);
  });
});
