/**
 * colwrap - comment reflow for the terminal
 *
 * Wrap core exports
 */

export { StringTextBuffer } from './text-buffer.js';
export type { TextBuffer } from './text-buffer.js';

export {
  charAdvance,
  measureText,
  columnAt,
  lineEndColumn,
  positionAtColumn,
  DEFAULT_TAB_WIDTH,
} from './column-metrics.js';
export { findDelimiter } from './delimiter.js';
export { wordBoundsAt, tokenBoundsAt, nextTokenStart, isWordChar, isBlank } from './word-bounds.js';
export type { Bounds } from './word-bounds.js';
export { spacingAfter, indentationProfile } from './comment-spacing.js';
export { EditSession } from './edit-session.js';

export { wrapCommentAtPosition, findWrapBoundary } from './comment-wrapper.js';
export { wrapStringAtPosition, closesBefore } from './string-wrapper.js';
export { handleTriggerKey, DEFAULT_TRIGGER_OPTIONS } from './trigger.js';
export {
  resolveWrapOptions,
  isPositiveInteger,
  DEFAULT_WRAP_OPTIONS,
  DEFAULT_STRING_WRAP_OPTIONS,
} from './options.js';

export type {
  Position,
  Column,
  Line,
  WrapOptions,
  StringWrapOptions,
  IndentationProfile,
  WrapSkipReason,
  WrapResult,
  TriggerOptions,
  TriggerResult,
} from './types.js';
