import type { TextBuffer } from './text-buffer.js';
import type { Position } from './types.js';

export interface Bounds {
  start: Position;
  end: Position;
}

const WORD_CHAR = /[\p{L}\p{N}_]/u;

export function isWordChar(char: string): boolean {
  return char !== '' && WORD_CHAR.test(char);
}

export function isBlank(char: string): boolean {
  return char === ' ' || char === '\t';
}

/**
 * Bounds of the word containing `pos`, or of the word ending right at `pos`.
 * Returns null when `pos` touches no word. Never crosses a line terminator.
 */
export function wordBoundsAt(buffer: TextBuffer, pos: Position): Bounds | null {
  const line = buffer.lineAt(pos);
  let anchor = pos;
  if (!isWordChar(buffer.charAt(pos)) || pos >= line.end) {
    if (pos > line.start && isWordChar(buffer.charAt(pos - 1))) {
      anchor = pos - 1;
    } else {
      return null;
    }
  }

  let start = anchor;
  while (start > line.start && isWordChar(buffer.charAt(start - 1))) start--;
  let end = anchor + 1;
  while (end < line.end && isWordChar(buffer.charAt(end))) end++;
  return { start, end };
}

/**
 * Bounds of the whitespace-delimited run containing `pos`, so that
 * punctuation attached to a word travels with it. Null on whitespace.
 */
export function tokenBoundsAt(buffer: TextBuffer, pos: Position): Bounds | null {
  const line = buffer.lineAt(pos);
  if (pos >= line.end || isBlank(buffer.charAt(pos))) return null;

  let start = pos;
  while (start > line.start && !isBlank(buffer.charAt(start - 1))) start--;
  let end = pos + 1;
  while (end < line.end && !isBlank(buffer.charAt(end))) end++;
  return { start, end };
}

/**
 * Start of the first token at or after `pos` on the same line.
 */
export function nextTokenStart(buffer: TextBuffer, pos: Position): Position | null {
  const line = buffer.lineAt(pos);
  let i = pos;
  while (i < line.end && isBlank(buffer.charAt(i))) i++;
  return i < line.end ? i : null;
}
