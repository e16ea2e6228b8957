import type { TasklistBlock } from './model.js';

/**
 * Line scanner for tasklist blocks.
 *
 * Not a Markdown parser: it recognizes exactly one construct:
 * - an opening fence line: optional spaces/tabs, ```` ```[tasklist] ````,
 *   optional spaces/tabs
 * - any number of inner lines
 * - the first closing fence line after it: optional spaces/tabs, ```` ``` ````,
 *   optional spaces/tabs
 *
 * Fences only count when they fill their whole line, so a fence preceded by
 * other text on the same line is ignored. Both `\n` and `\r\n` line endings
 * are accepted.
 */
const OPEN_FENCE_RE = /^[ \t]*```\[tasklist\][ \t]*$/;
const CLOSE_FENCE_RE = /^[ \t]*```[ \t]*$/;

interface LineSpan {
  /** Offset of the first character of the line. */
  start: number;
  /** Offset just past the line content (before `\r\n` / `\n`). */
  contentEnd: number;
  /** Offset just past the line terminator (or `contentEnd` at EOF). */
  end: number;
  /** True if the line ends with `\n`. */
  terminated: boolean;
}

/**
 * Read the line starting at `offset`, or `undefined` at end of text.
 */
function readLine(text: string, offset: number): LineSpan | undefined {
  if (offset >= text.length) return undefined;
  const newline = text.indexOf('\n', offset);
  const terminated = newline !== -1;
  const end = terminated ? newline + 1 : text.length;
  let contentEnd = terminated ? newline : text.length;
  if (contentEnd > offset && text[contentEnd - 1] === '\r') contentEnd -= 1;
  return { start: offset, contentEnd, end, terminated };
}

function lineContent(text: string, span: LineSpan): string {
  return text.slice(span.start, span.contentEnd);
}

export function isOpeningFenceLine(line: string): boolean {
  return OPEN_FENCE_RE.test(line);
}

export function isClosingFenceLine(line: string): boolean {
  return CLOSE_FENCE_RE.test(line);
}

/**
 * Lazily yield tasklist blocks in document order.
 *
 * Blocks never overlap: scanning resumes right after the closing fence of the
 * previous block. The inner content is the shortest run of lines up to the
 * first closing fence, so a later fence is never swallowed.
 *
 * An opening fence with no closing fence after it ends the scan, since no
 * later opening fence can be closed either.
 */
export function* scanTasklistBlocks(text: string): Generator<TasklistBlock, void, undefined> {
  let offset = 0;
  let lineIndex = 0;
  let index = 0;

  for (;;) {
    const open = readLine(text, offset);
    if (!open) return;

    if (!open.terminated || !isOpeningFenceLine(lineContent(text, open))) {
      offset = open.end;
      lineIndex += 1;
      continue;
    }

    let cursor = open.end;
    let closeLineIndex = lineIndex + 1;
    let close: LineSpan | undefined;
    for (;;) {
      const candidate = readLine(text, cursor);
      if (!candidate) break;
      if (isClosingFenceLine(lineContent(text, candidate))) {
        close = candidate;
        break;
      }
      cursor = candidate.end;
      closeLineIndex += 1;
    }
    if (!close) return;

    yield {
      index,
      start: open.start,
      end: close.end,
      line: lineIndex,
      outer: text.slice(open.start, close.end),
      inner: text.slice(open.end, close.start),
    };

    index += 1;
    offset = close.end;
    lineIndex = closeLineIndex + 1;
  }
}

/**
 * First tasklist block that starts at or after `fromOffset`, or `undefined`.
 *
 * Blocks are recognized from the top of the document, so `index` and `line`
 * keep their document-wide values and a block that straddles `fromOffset` is
 * not returned.
 */
export function findNextTasklistBlock(text: string, fromOffset = 0): TasklistBlock | undefined {
  for (const block of scanTasklistBlocks(text)) {
    if (block.start >= fromOffset) return block;
  }
  return undefined;
}

/**
 * Collect every tasklist block of a document.
 */
export function listTasklistBlocks(text: string): TasklistBlock[] {
  return [...scanTasklistBlocks(text)];
}
