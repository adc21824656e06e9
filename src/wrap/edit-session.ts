import type { TextBuffer } from './text-buffer.js';
import type { Position } from './types.js';

/**
 * Text lifted off a line, with the cursor offset inside it when the cursor
 * was part of the lifted span.
 */
export interface Extracted {
  text: string;
  carried: number | null;
}

/**
 * Applies edits to a buffer while keeping a cursor position in step.
 * An insert at the cursor pushes it forward, so the cursor stays attached to
 * the text that followed it.
 */
export class EditSession {
  constructor(
    readonly buffer: TextBuffer,
    public cursor: Position
  ) {}

  insert(pos: Position, text: string, keepCursor = false): void {
    if (!text) return;
    this.buffer.insert(pos, text);
    if (pos < this.cursor || (pos === this.cursor && !keepCursor)) {
      this.cursor += text.length;
    }
  }

  delete(start: Position, end: Position): void {
    if (end <= start) return;
    this.buffer.delete(start, end);
    if (this.cursor >= end) {
      this.cursor -= end - start;
    } else if (this.cursor > start) {
      this.cursor = start;
    }
  }

  /**
   * Remove `[start, end)` and return it trimmed. A cursor strictly inside the
   * span (or at its end) is carried as an offset into the trimmed text.
   */
  extract(start: Position, end: Position): Extracted {
    const raw = this.buffer.slice(start, end);
    const text = raw.trim();
    const leading = raw.length - raw.trimStart().length;
    let carried: number | null = null;
    if (this.cursor > start && this.cursor <= end) {
      carried = Math.max(0, Math.min(this.cursor - start - leading, text.length));
    }
    this.delete(start, end);
    return { text, carried };
  }

  /**
   * Insert `before + extracted.text + after` at `pos`. A carried cursor lands
   * at its offset inside the placed text; otherwise the normal insert rules
   * apply.
   */
  place(pos: Position, extracted: Extracted, before = '', after = '', keepCursor = false): void {
    this.insert(pos, before + extracted.text + after, keepCursor);
    if (extracted.carried !== null) {
      this.cursor = pos + before.length + extracted.carried;
    }
  }
}
