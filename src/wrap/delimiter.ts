import type { TextBuffer } from './text-buffer.js';
import type { Line, Position } from './types.js';

/**
 * Position of the first `delim` that lies entirely within `line`, or null.
 * Matching is textual; a delimiter inside a string literal still counts.
 */
export function findDelimiter(buffer: TextBuffer, line: Line, delim: string): Position | null {
  if (!delim) return null;
  const index = buffer.slice(line.start, line.end).indexOf(delim);
  return index === -1 ? null : line.start + index;
}

