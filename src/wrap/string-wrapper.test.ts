import { describe, it, expect } from 'vitest';
import { closesBefore, wrapStringAtPosition } from './string-wrapper.js';
import { DEFAULT_STRING_WRAP_OPTIONS, resolveWrapOptions } from './options.js';
import { StringTextBuffer } from './text-buffer.js';

const width20 = resolveWrapOptions({ width: 20 });

describe('wrapStringAtPosition', () => {
  it('splits an unterminated string before the word crossing the limit', () => {
    const buffer = new StringTextBuffer('x = "alpha beta gamma delta');
    const result = wrapStringAtPosition(buffer, 4, width20);

    expect(buffer.text).toBe('x = "alpha beta \\\ngamma delta');
    expect(result).toEqual({
      changed: true,
      cursor: 4,
      linesWrapped: 1,
      linesCreated: 1,
      stoppedBy: 'within-width',
    });
  });

  it('leaves a string that closes on the same line alone', () => {
    const text = 'x = "alpha beta gamma delta" + suffix';
    const buffer = new StringTextBuffer(text);
    const result = wrapStringAtPosition(buffer, 4, width20);

    expect(result.changed === false && result.reason).toBe('terminated');
    expect(buffer.text).toBe(text);
  });

  it('requires the position to be at the opening delimiter', () => {
    const buffer = new StringTextBuffer('x = "alpha beta gamma delta');
    const result = wrapStringAtPosition(buffer, 0, width20);

    expect(result.changed === false && result.reason).toBe('no-string');
  });

  it('leaves a short unterminated string alone', () => {
    const buffer = new StringTextBuffer('x = "alpha');
    const result = wrapStringAtPosition(buffer, 4, width20);

    expect(result.changed === false && result.reason).toBe('within-width');
  });

  it('uses the configured fragment close and continuation prefix', () => {
    const buffer = new StringTextBuffer('s = "alpha beta gamma delta');
    wrapStringAtPosition(buffer, 4, width20, {
      ...DEFAULT_STRING_WRAP_OPTIONS,
      lineEnd: '" +',
      lineContinue: '"',
    });

    expect(buffer.text).toBe('s = "alpha beta " +\n"gamma delta');
  });

  it('keeps splitting while the new fragment overflows', () => {
    const buffer = new StringTextBuffer('"aaa bbb ccc ddd eee fff ggg');
    const result = wrapStringAtPosition(buffer, 0, resolveWrapOptions({ width: 12 }));

    expect(buffer.text).toBe('"aaa bbb \\\nccc ddd eee\\\n fff ggg');
    expect(result.changed && result.linesWrapped).toBe(2);
  });

  it('does not split a single word that fills the string', () => {
    const text = '"' + 'a'.repeat(30);
    const buffer = new StringTextBuffer(text);
    const result = wrapStringAtPosition(buffer, 0, width20);

    expect(result.changed === false && result.reason).toBe('no-word-boundary');
    expect(buffer.text).toBe(text);
  });

  it('never merges into the following line', () => {
    const buffer = new StringTextBuffer('x = "alpha beta gamma delta\nnext line');
    wrapStringAtPosition(buffer, 4, width20);

    expect(buffer.text).toBe('x = "alpha beta \\\ngamma delta\nnext line');
  });
});

describe('closesBefore', () => {
  it('ignores escaped delimiters', () => {
    const buffer = new StringTextBuffer('"a \\" b');
    expect(closesBefore(buffer, 1, buffer.length, DEFAULT_STRING_WRAP_OPTIONS)).toBe(false);
  });

  it('finds an unescaped closing delimiter', () => {
    const buffer = new StringTextBuffer('"a \\" b" c');
    expect(closesBefore(buffer, 1, buffer.length, DEFAULT_STRING_WRAP_OPTIONS)).toBe(true);
  });
});
