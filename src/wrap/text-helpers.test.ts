import { describe, it, expect } from 'vitest';
import { StringTextBuffer } from './text-buffer.js';
import { columnAt, lineEndColumn, measureText, positionAtColumn } from './column-metrics.js';
import { findDelimiter } from './delimiter.js';
import { indentationProfile, spacingAfter } from './comment-spacing.js';
import { nextTokenStart, tokenBoundsAt, wordBoundsAt } from './word-bounds.js';
import { EditSession } from './edit-session.js';

describe('StringTextBuffer', () => {
  it('reports line bounds without the terminator', () => {
    const buffer = new StringTextBuffer('ab\ncde\n');
    expect(buffer.lineAt(0)).toEqual({ start: 0, end: 2 });
    expect(buffer.lineAt(2)).toEqual({ start: 0, end: 2 });
    expect(buffer.lineAt(4)).toEqual({ start: 3, end: 6 });
    expect(buffer.lineAt(7)).toEqual({ start: 7, end: 7 });
  });

  it('walks to the next line and stops at the last one', () => {
    const buffer = new StringTextBuffer('ab\ncde');
    const first = buffer.lineAt(0);
    const second = buffer.nextLine(first);
    expect(second).toEqual({ start: 3, end: 6 });
    expect(second && buffer.nextLine(second)).toBeNull();
    expect(buffer.lineCount()).toBe(2);
  });

  it('ends CRLF lines before the carriage return', () => {
    const buffer = new StringTextBuffer('ab\r\ncd\r\n');
    const first = buffer.lineAt(0);
    expect(first).toEqual({ start: 0, end: 2 });
    expect(buffer.nextLine(first)).toEqual({ start: 4, end: 6 });
    expect(buffer.newline).toBe('\r\n');
    expect(new StringTextBuffer('ab\ncd').newline).toBe('\n');
  });

  it('counts a trailing empty line', () => {
    expect(new StringTextBuffer('a\n').lineCount()).toBe(2);
    expect(new StringTextBuffer('').lineCount()).toBe(1);
  });
});

describe('column metrics', () => {
  it('advances tabs to the next tab stop', () => {
    expect(measureText('a\tb', 0, 4)).toBe(5);
    expect(columnAt(new StringTextBuffer('x\n\tab'), 3, 8)).toBe(8);
  });

  it('counts wide characters as two columns', () => {
    expect(measureText('日本')).toBe(4);
    expect(lineEndColumn(new StringTextBuffer('// 日本'), 0)).toBe(7);
  });

  it('finds the first character ending past a column', () => {
    const buffer = new StringTextBuffer('abcdef');
    expect(positionAtColumn(buffer, 0, 3)).toBe(3);
    expect(positionAtColumn(buffer, 0, 10)).toBe(6);
    expect(positionAtColumn(new StringTextBuffer('日本語'), 0, 3)).toBe(1);
  });
});

describe('findDelimiter', () => {
  it('searches only within the given line', () => {
    const buffer = new StringTextBuffer('a // b\n// c');
    expect(findDelimiter(buffer, buffer.lineAt(0), '//')).toBe(2);
    expect(findDelimiter(buffer, buffer.lineAt(8), '//')).toBe(7);
    expect(findDelimiter(new StringTextBuffer('x / y'), { start: 0, end: 5 }, '//')).toBeNull();
  });

  it('matches delimiters inside string literals textually', () => {
    const buffer = new StringTextBuffer('url = "http://example"');
    expect(findDelimiter(buffer, buffer.lineAt(0), '//')).toBe(12);
  });
});

describe('spacingAfter', () => {
  it('skips spaces and list markers up to the first letter or digit', () => {
    expect(spacingAfter(new StringTextBuffer('//   - item'), 0, 2)).toBe(5);
    expect(spacingAfter(new StringTextBuffer('// 1. first'), 0, 2)).toBe(1);
  });

  it('counts to the line end when there is no content', () => {
    expect(spacingAfter(new StringTextBuffer('//'), 0, 2)).toBe(0);
    expect(spacingAfter(new StringTextBuffer('//  \nnext'), 0, 2)).toBe(2);
  });

  it('builds a profile with the delimiter column', () => {
    const buffer = new StringTextBuffer('\t// x');
    expect(indentationProfile(buffer, 1, 2, 8)).toEqual({
      delimiterIndent: 8,
      contentIndent: 1,
      delimiterPos: 1,
      contentStart: 4,
    });
  });
});

describe('word bounds', () => {
  const buffer = new StringTextBuffer('foo bar_baz, qux');

  it('returns the word containing the position', () => {
    expect(wordBoundsAt(buffer, 5)).toEqual({ start: 4, end: 11 });
  });

  it('returns the word ending at the position', () => {
    expect(wordBoundsAt(buffer, 3)).toEqual({ start: 0, end: 3 });
  });

  it('returns null away from any word', () => {
    expect(wordBoundsAt(buffer, 12)).toBeNull();
  });

  it('widens to the whitespace-delimited token', () => {
    expect(tokenBoundsAt(buffer, 5)).toEqual({ start: 4, end: 12 });
    expect(tokenBoundsAt(buffer, 3)).toBeNull();
    expect(nextTokenStart(buffer, 12)).toBe(13);
  });

  it('does not cross line terminators', () => {
    const lines = new StringTextBuffer('ab\ncd');
    expect(wordBoundsAt(lines, 3)).toEqual({ start: 3, end: 5 });
    expect(nextTokenStart(new StringTextBuffer('ab  \ncd'), 2)).toBeNull();
  });
});

describe('EditSession', () => {
  it('pushes the cursor forward for inserts at or before it', () => {
    const session = new EditSession(new StringTextBuffer('abc'), 1);
    session.insert(1, 'xx');
    expect(session.cursor).toBe(3);
    session.insert(3, 'y', true);
    expect(session.cursor).toBe(3);
    expect(session.buffer.text).toBe('axxybc');
  });

  it('carries a cursor inside extracted text', () => {
    const session = new EditSession(new StringTextBuffer('keep  moved'), 9);
    const extracted = session.extract(4, 11);
    expect(extracted).toEqual({ text: 'moved', carried: 3 });
    expect(session.cursor).toBe(4);

    session.place(0, extracted, '[', ']');
    expect(session.buffer.text).toBe('[moved]keep');
    expect(session.cursor).toBe(4);
  });
});
