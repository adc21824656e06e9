/**
 * colwrap - comment reflow for the terminal
 *
 * Cursor navigation over the editor's text. Columns are display columns, so
 * moving up or down across tabs and wide glyphs keeps the visual position.
 */
import { charAdvance, measureText, DEFAULT_TAB_WIDTH } from '../wrap/column-metrics.js';
import { isWordChar } from '../wrap/word-bounds.js';

// =============================================================================
// Word Navigation
// =============================================================================

/**
 * Start of the previous word from `pos`.
 * Used for Option+Left / Ctrl+Left and word deletion.
 */
export function findPrevWordStart(text: string, pos: number): number {
  if (pos <= 0) return 0;
  let i = pos - 1;
  while (i > 0 && !isWordChar(text[i])) i--;
  while (i > 0 && isWordChar(text[i - 1])) i--;
  return i;
}

/**
 * End of the next word from `pos`.
 */
export function findNextWordEnd(text: string, pos: number): number {
  const len = text.length;
  if (pos >= len) return len;
  let i = pos;
  while (i < len && !isWordChar(text[i])) i++;
  while (i < len && isWordChar(text[i])) i++;
  return i;
}

// =============================================================================
// Line Navigation
// =============================================================================

export function getLineStart(text: string, pos: number): number {
  return text.lastIndexOf('\n', pos - 1) + 1;
}

export function getLineEnd(text: string, pos: number): number {
  const nextNewline = text.indexOf('\n', pos);
  return nextNewline === -1 ? text.length : nextNewline;
}

export function getLineCount(text: string): number {
  return text.split('\n').length;
}

/**
 * Line number (0-indexed) and display column of `pos`.
 */
export function getLineAndColumn(
  text: string,
  pos: number,
  tabWidth = DEFAULT_TAB_WIDTH
): { line: number; column: number } {
  const lines = text.slice(0, pos).split('\n');
  return {
    line: lines.length - 1,
    column: measureText(lines[lines.length - 1], 0, tabWidth),
  };
}

/**
 * Position on `line` closest to display `column`, clamped to the line end.
 */
export function getCursorPosition(text: string, line: number, column: number, tabWidth = DEFAULT_TAB_WIDTH): number {
  const lines = text.split('\n');
  let pos = 0;
  for (let i = 0; i < line && i < lines.length; i++) {
    pos += lines[i].length + 1;
  }
  const target = lines[line] ?? '';
  let current = 0;
  let offset = 0;
  for (const char of target) {
    const next = current + charAdvance(char, current, tabWidth);
    if (next > column) break;
    current = next;
    offset += char.length;
  }
  return pos + offset;
}

// =============================================================================
// Cursor Handlers
// =============================================================================

export interface CursorContext {
  text: string;
  cursorPosition: number;
  tabWidth?: number;
}

/**
 * Pure cursor movements. Vertical moves return null at the first/last line.
 */
export const cursorHandlers = {
  moveLeft: (ctx: CursorContext): number =>
    Math.max(0, ctx.cursorPosition - 1),

  moveRight: (ctx: CursorContext): number =>
    Math.min(ctx.text.length, ctx.cursorPosition + 1),

  moveToLineStart: (ctx: CursorContext): number =>
    getLineStart(ctx.text, ctx.cursorPosition),

  moveToLineEnd: (ctx: CursorContext): number =>
    getLineEnd(ctx.text, ctx.cursorPosition),

  moveUp: (ctx: CursorContext): number | null => {
    const { line, column } = getLineAndColumn(ctx.text, ctx.cursorPosition, ctx.tabWidth);
    if (line === 0) return null;
    return getCursorPosition(ctx.text, line - 1, column, ctx.tabWidth);
  },

  moveDown: (ctx: CursorContext): number | null => {
    const { line, column } = getLineAndColumn(ctx.text, ctx.cursorPosition, ctx.tabWidth);
    if (line >= getLineCount(ctx.text) - 1) return null;
    return getCursorPosition(ctx.text, line + 1, column, ctx.tabWidth);
  },

  moveWordBackward: (ctx: CursorContext): number =>
    findPrevWordStart(ctx.text, ctx.cursorPosition),

  moveWordForward: (ctx: CursorContext): number =>
    findNextWordEnd(ctx.text, ctx.cursorPosition),
};
