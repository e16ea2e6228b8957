import { createTwoFilesPatch } from 'diff';

/**
 * Unified diff rendering for operator review and dry runs.
 */
export interface RenderDiffOptions {
  oldLabel?: string;
  newLabel?: string;
  /** Wrap lines in ANSI colors (respect `NO_COLOR` at the call site). */
  color?: boolean;
  /** Unchanged lines around each hunk (default 3). */
  context?: number;
}

const ANSI = {
  reset: '\u001b[0m',
  bold: '\u001b[1m',
  red: '\u001b[31m',
  green: '\u001b[32m',
  cyan: '\u001b[36m',
} as const;

function paint(code: string, line: string): string {
  return `${code}${line}${ANSI.reset}`;
}

function colorizeLine(line: string): string {
  if (line.startsWith('--- ') || line.startsWith('+++ ')) return paint(ANSI.bold, line);
  if (line.startsWith('@@')) return paint(ANSI.cyan, line);
  if (line.startsWith('+')) return paint(ANSI.green, line);
  if (line.startsWith('-')) return paint(ANSI.red, line);
  return line;
}

/**
 * Render a unified diff between two texts.
 *
 * Returns an empty string when the texts are identical. The `Index:` and
 * `====` preamble that `createTwoFilesPatch` emits is dropped so the output
 * reads like `diff -u`.
 */
export function renderUnifiedDiff(
  oldText: string,
  newText: string,
  options: RenderDiffOptions = {}
): string {
  if (oldText === newText) return '';

  const patch = createTwoFilesPatch(
    options.oldLabel ?? 'old',
    options.newLabel ?? 'new',
    oldText,
    newText,
    undefined,
    undefined,
    { context: options.context ?? 3 }
  );

  const lines = patch
    .split('\n')
    .filter((line) => !line.startsWith('Index: ') && !/^=+$/.test(line));
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();

  const rendered = options.color ? lines.map(colorizeLine) : lines;
  return `${rendered.join('\n')}\n`;
}
