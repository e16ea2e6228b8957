/**
 * Data model for tasklist scanning and editing.
 *
 * Notes:
 * - Offsets are UTF-16 code unit offsets into the original document (what
 *   `String.prototype.slice` takes); `end` is exclusive.
 * - Line numbers are 0-based to match typical array indexing in JS/TS.
 */
export interface TasklistBlock {
  /** 0-based ordinal of the block in the document. */
  index: number;
  /** Offset of the opening fence line in the original document. */
  start: number;
  /** Offset just past the closing fence line (and its line terminator, if any). */
  end: number;
  /** 0-based line index of the opening fence. */
  line: number;
  /** Full fenced block: opening fence line, inner lines, closing fence line. */
  outer: string;
  /** Lines between the fences, verbatim (including their final newline). */
  inner: string;
}

export interface ContextWindow {
  /** Up to N whole lines preceding the block. */
  before: string;
  block: TasklistBlock;
  /** Up to N whole lines following the block. */
  after: string;
}

export type Decision = 'accept' | 'reject' | 'accept-rest' | 'abort-rest' | 'quit';

/** Single-character tokens the operator types for each decision. */
export type DecisionToken = 'y' | 'n' | 'a' | 'd' | 'q';

export type SessionMode = 'interactive' | 'auto-accept';

export interface EditOutcome {
  /** True if the working document differs from the original. */
  changed: boolean;
  oldBody: string;
  newBody: string;
  /** Number of tasklist blocks found in the original document. */
  blocks: number;
  accepted: number;
  rejected: number;
  /** True if an `abort-rest` decision ended the session early. */
  aborted: boolean;
}
