import { QuitRequestedError } from '../errors.js';
import { DECISION_LEGEND, DEFAULT_CONTEXT_LINES } from './constants.js';
import { buildContextWindow, windowNewText, windowOldText } from './context.js';
import { parseDecisionInput } from './decision.js';
import type {
  ContextWindow,
  Decision,
  EditOutcome,
  SessionMode,
  TasklistBlock,
} from './model.js';
import { findNextTasklistBlock, listTasklistBlocks } from './scan.js';

/**
 * Edit session: walk the tasklist blocks of one document and decide, block by
 * block, whether to strip their fences.
 *
 * The original document is never modified. Blocks are found in the original
 * and resolved strictly left to right: `cursor` is the offset in the original
 * past the last resolved block, and `delta` is how much the accepted edits so
 * far have shifted the working copy relative to the original. An accepted
 * block is replaced at `block.start + delta`, never by searching for its text,
 * so identical blocks at different positions stay independent.
 */
export interface EditSessionState {
  mode: SessionMode;
  original: string;
  working: string;
  cursor: number;
  delta: number;
  accepted: number;
  /** Blocks left in place by `reject` or `abort-rest`; blocks after an abort are not counted. */
  rejected: number;
  aborted: boolean;
}

/**
 * What the operator is asked about for one block.
 */
export interface DecisionRequest {
  /** Human-readable label, e.g. `#12 block 2/3`. */
  label: string;
  /** 0-based block index. */
  index: number;
  total: number;
  block: TasklistBlock;
  window: ContextWindow;
  /** Context window as it currently reads. */
  oldText: string;
  /** Context window with this block's fences removed. */
  newText: string;
}

/**
 * Source of interactive decisions.
 *
 * `ask` returns one raw line of operator input per call; the session parses it
 * and asks again on invalid input. `help` shows the legend after a help request.
 */
export interface DecisionPrompt {
  ask(request: DecisionRequest): Promise<string>;
  help(legend: string): void | Promise<void>;
}

export interface EditSessionOptions {
  mode: SessionMode;
  /** Lines of context around each block (default 5). */
  contextLines?: number;
  /** Required in interactive mode. */
  prompt?: DecisionPrompt;
  /** Prefix for the per-block label (usually the issue reference). */
  label?: string;
}

export function createEditSessionState(original: string, mode: SessionMode): EditSessionState {
  return {
    mode,
    original,
    working: original,
    cursor: 0,
    delta: 0,
    accepted: 0,
    rejected: 0,
    aborted: false,
  };
}

/**
 * Advance the session by one decision about `block`.
 *
 * Returns a new state; the input state is not modified. `quit` throws
 * `QuitRequestedError` instead of returning.
 */
export function applyDecision(
  state: EditSessionState,
  block: TasklistBlock,
  decision: Decision
): EditSessionState {
  if (state.aborted) {
    throw new Error('Edit session already finished');
  }
  if (block.start < state.cursor) {
    throw new Error(`Tasklist block ${block.index + 1} was already resolved`);
  }

  switch (decision) {
    case 'quit':
      throw new QuitRequestedError();
    case 'abort-rest':
      return { ...state, cursor: state.original.length, rejected: state.rejected + 1, aborted: true };
    case 'reject':
      return { ...state, cursor: block.end, rejected: state.rejected + 1 };
    case 'accept':
    case 'accept-rest': {
      const at = block.start + state.delta;
      const working = `${state.working.slice(0, at)}${block.inner}${state.working.slice(at + block.outer.length)}`;
      return {
        ...state,
        mode: decision === 'accept-rest' ? 'auto-accept' : state.mode,
        working,
        cursor: block.end,
        delta: state.delta + block.inner.length - block.outer.length,
        accepted: state.accepted + 1,
      };
    }
  }
}

/**
 * Summarize a finished session.
 *
 * Every block that was not accepted counts as rejected, including those never
 * reached after an `abort-rest`.
 */
export function finishEditSession(state: EditSessionState, blocks: number): EditOutcome {
  return {
    changed: state.working !== state.original,
    oldBody: state.original,
    newBody: state.working,
    blocks,
    accepted: state.accepted,
    rejected: blocks - state.accepted,
    aborted: state.aborted,
  };
}

function blockLabel(prefix: string | undefined, index: number, total: number): string {
  const position = `block ${index + 1}/${total}`;
  return prefix ? `${prefix} ${position}` : position;
}

/**
 * Ask until the operator gives a recognized decision.
 *
 * Help requests show the legend and do not use up the question.
 */
async function askDecision(prompt: DecisionPrompt, request: DecisionRequest): Promise<Decision> {
  for (;;) {
    const parsed = parseDecisionInput(await prompt.ask(request));
    if (parsed.kind === 'decision') return parsed.decision;
    if (parsed.kind === 'help') await prompt.help(DECISION_LEGEND);
  }
}

/**
 * Run an edit session over one document.
 *
 * In `auto-accept` mode every block is stripped without asking. In
 * `interactive` mode each block is shown to `options.prompt` until an
 * `accept-rest` switches the rest of the document to auto-accept or an
 * `abort-rest` leaves the rest untouched. `quit` rejects with
 * `QuitRequestedError`.
 */
export async function runEditSession(
  original: string,
  options: EditSessionOptions
): Promise<EditOutcome> {
  const contextLines = options.contextLines ?? DEFAULT_CONTEXT_LINES;
  const prompt = options.prompt;
  if (options.mode === 'interactive' && !prompt) {
    throw new Error('Interactive edit session requires a decision prompt');
  }

  const blocks = listTasklistBlocks(original);
  let state = createEditSessionState(original, options.mode);

  for (const block of blocks) {
    if (state.aborted) break;

    let decision: Decision = 'accept';
    if (state.mode === 'interactive' && prompt) {
      const window = buildContextWindow(original, block, contextLines);
      decision = await askDecision(prompt, {
        label: blockLabel(options.label, block.index, blocks.length),
        index: block.index,
        total: blocks.length,
        block,
        window,
        oldText: windowOldText(window),
        newText: windowNewText(window),
      });
    }
    state = applyDecision(state, block, decision);
  }

  return finishEditSession(state, blocks.length);
}

/**
 * Strip every tasklist block of a document (auto-accept, no prompt).
 */
export function stripTasklistBlocks(original: string): EditOutcome {
  let state = createEditSessionState(original, 'auto-accept');
  let blocks = 0;
  for (
    let block = findNextTasklistBlock(original, state.cursor);
    block;
    block = findNextTasklistBlock(original, state.cursor)
  ) {
    state = applyDecision(state, block, 'accept');
    blocks += 1;
  }
  return finishEditSession(state, blocks);
}
