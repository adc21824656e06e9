import stringWidth from 'string-width';
import type { TextBuffer } from './text-buffer.js';
import type { Column, Position } from './types.js';

export const DEFAULT_TAB_WIDTH = 8;

/**
 * Display width of one character that starts at `column`.
 * Tabs advance to the next tab stop.
 */
export function charAdvance(char: string, column: Column, tabWidth = DEFAULT_TAB_WIDTH): number {
  if (char === '\t') {
    return tabWidth - (column % tabWidth);
  }
  return stringWidth(char);
}

/**
 * Column reached after rendering `text` starting from `startColumn`.
 */
export function measureText(text: string, startColumn: Column = 0, tabWidth = DEFAULT_TAB_WIDTH): Column {
  let column = startColumn;
  for (const char of text) {
    column += charAdvance(char, column, tabWidth);
  }
  return column;
}

/**
 * Display column of `pos` within its line.
 */
export function columnAt(buffer: TextBuffer, pos: Position, tabWidth = DEFAULT_TAB_WIDTH): Column {
  const line = buffer.lineAt(pos);
  return measureText(buffer.slice(line.start, pos), 0, tabWidth);
}

export function lineEndColumn(buffer: TextBuffer, pos: Position, tabWidth = DEFAULT_TAB_WIDTH): Column {
  const line = buffer.lineAt(pos);
  return measureText(buffer.slice(line.start, line.end), 0, tabWidth);
}

/**
 * First position on the line whose character would end past `column`.
 * Returns the line end when the whole line fits.
 */
export function positionAtColumn(
  buffer: TextBuffer,
  lineStart: Position,
  column: Column,
  tabWidth = DEFAULT_TAB_WIDTH
): Position {
  const line = buffer.lineAt(lineStart);
  const text = buffer.slice(line.start, line.end);
  let current = 0;
  let offset = 0;
  for (const char of text) {
    const next = current + charAdvance(char, current, tabWidth);
    if (next > column) {
      return line.start + offset;
    }
    current = next;
    offset += char.length;
  }
  return line.end;
}
