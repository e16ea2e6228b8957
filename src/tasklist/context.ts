import type { ContextWindow, TasklistBlock } from './model.js';

/**
 * Context windows shown next to a block during review.
 *
 * Windows are computed from the block's position in the original document,
 * never by searching for its text, so two identical blocks each get their
 * own surroundings.
 */

function assertContextLines(lines: number): void {
  if (!Number.isInteger(lines) || lines < 0) {
    throw new Error(`Context lines must be a non-negative integer, got ${JSON.stringify(lines)}`);
  }
}

/**
 * Offset of the start of the `count`-th whole line before `offset`.
 *
 * `offset` must be at a line start.
 */
function startOfLinesBefore(text: string, offset: number, count: number): number {
  let position = offset;
  for (let step = 0; step < count && position > 0; step += 1) {
    // `position - 1` is the newline ending the previous line.
    position = position - 2 < 0 ? 0 : text.lastIndexOf('\n', position - 2) + 1;
  }
  return position;
}

/**
 * Offset just past the `count`-th whole line from `offset`.
 */
function endOfLinesAfter(text: string, offset: number, count: number): number {
  let position = offset;
  for (let step = 0; step < count && position < text.length; step += 1) {
    const newline = text.indexOf('\n', position);
    position = newline === -1 ? text.length : newline + 1;
  }
  return position;
}

/**
 * Build the context window around `block` with up to `lines` lines on each side.
 *
 * Fewer lines are returned at document boundaries; `lines = 0` yields the block alone.
 */
export function buildContextWindow(
  text: string,
  block: TasklistBlock,
  lines: number
): ContextWindow {
  assertContextLines(lines);
  const beforeStart = startOfLinesBefore(text, block.start, lines);
  const afterEnd = endOfLinesAfter(text, block.end, lines);
  return {
    before: text.slice(beforeStart, block.start),
    block,
    after: text.slice(block.end, afterEnd),
  };
}

/** Window text as it currently reads (fences present). */
export function windowOldText(window: ContextWindow): string {
  return `${window.before}${window.block.outer}${window.after}`;
}

/** Window text with this block's fences removed. */
export function windowNewText(window: ContextWindow): string {
  return `${window.before}${window.block.inner}${window.after}`;
}
