import type { Line, Position } from './types.js';

/**
 * The host surface the wrap core borrows for one operation.
 * Lines are terminated by '\n' or '\r\n'; a buffer ending in a terminator has
 * an empty last line. `Line.end` stops before the whole terminator.
 */
export interface TextBuffer {
  readonly length: number;
  readonly text: string;
  /** Terminator used for lines the wrapper creates */
  readonly newline: string;
  slice(start: Position, end: Position): string;
  charAt(pos: Position): string;
  lineAt(pos: Position): Line;
  /** The line after `line`, or null when `line` is the last one */
  nextLine(line: Line): Line | null;
  lineCount(): number;
  insert(pos: Position, text: string): void;
  delete(start: Position, end: Position): void;
}

/**
 * In-memory buffer over a plain string.
 */
export class StringTextBuffer implements TextBuffer {
  private content: string;

  constructor(text = '') {
    this.content = text;
  }

  get length(): number {
    return this.content.length;
  }

  get text(): string {
    return this.content;
  }

  get newline(): string {
    return this.content.includes('\r\n') ? '\r\n' : '\n';
  }

  slice(start: Position, end: Position): string {
    return this.content.slice(start, end);
  }

  charAt(pos: Position): string {
    return this.content.charAt(pos);
  }

  lineAt(pos: Position): Line {
    const clamped = Math.max(0, Math.min(pos, this.content.length));
    const start = clamped === 0 ? 0 : this.content.lastIndexOf('\n', clamped - 1) + 1;
    const nextNewline = this.content.indexOf('\n', clamped);
    if (nextNewline === -1) {
      return { start, end: this.content.length };
    }
    const end = nextNewline > start && this.content[nextNewline - 1] === '\r' ? nextNewline - 1 : nextNewline;
    return { start, end };
  }

  nextLine(line: Line): Line | null {
    const nextNewline = this.content.indexOf('\n', line.end);
    if (nextNewline === -1) return null;
    return this.lineAt(nextNewline + 1);
  }

  lineCount(): number {
    let count = 1;
    for (let i = this.content.indexOf('\n'); i !== -1; i = this.content.indexOf('\n', i + 1)) {
      count++;
    }
    return count;
  }

  insert(pos: Position, text: string): void {
    this.content = this.content.slice(0, pos) + text + this.content.slice(pos);
  }

  delete(start: Position, end: Position): void {
    this.content = this.content.slice(0, start) + this.content.slice(end);
  }
}
