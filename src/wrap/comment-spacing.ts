import { columnAt, DEFAULT_TAB_WIDTH } from './column-metrics.js';
import type { TextBuffer } from './text-buffer.js';
import type { IndentationProfile, Position } from './types.js';

const CONTENT_CHAR = /[\p{L}\p{N}]/u;

/**
 * Characters between the end of the delimiter and the first letter or digit.
 * Spaces, punctuation and list markers (`-`, `*`, `1.`) are skipped, so a
 * bulleted comment keeps its hanging indent on continuation lines.
 */
export function spacingAfter(buffer: TextBuffer, delimPos: Position, delimLen: number): number {
  const start = delimPos + delimLen;
  const { end } = buffer.lineAt(delimPos);
  let i = start;
  while (i < end && !CONTENT_CHAR.test(buffer.charAt(i))) i++;
  return i - start;
}

export function indentationProfile(
  buffer: TextBuffer,
  delimPos: Position,
  delimLen: number,
  tabWidth = DEFAULT_TAB_WIDTH
): IndentationProfile {
  const contentIndent = spacingAfter(buffer, delimPos, delimLen);
  return {
    delimiterIndent: columnAt(buffer, delimPos, tabWidth),
    contentIndent,
    delimiterPos: delimPos,
    contentStart: delimPos + delimLen + contentIndent,
  };
}
