/**
 * Constants of the interactive review.
 *
 * A tasklist block reads:
 * ```[tasklist]
 * - [ ] first
 * ```
 */

/**
 * Default number of whole lines shown before and after a block when asking
 * the operator about it.
 */
export const DEFAULT_CONTEXT_LINES = 5;

/**
 * Question printed after each block comparison in interactive mode.
 */
export const DECISION_QUESTION = 'Remove this tasklist block [y/n/a/d/q/?]? ';

/**
 * Legend printed for a help request (`?`/`h`).
 */
export const DECISION_LEGEND = [
  'y - remove the fences of this tasklist block',
  'n - keep this tasklist block as it is',
  'a - remove this block and every remaining block in this issue',
  'd - keep this block and every remaining block in this issue',
  'q - quit; do not update this issue or any later issue',
  '? - print help',
].join('\n');
