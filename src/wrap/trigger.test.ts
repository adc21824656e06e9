import { describe, it, expect } from 'vitest';
import { handleTriggerKey, DEFAULT_TRIGGER_OPTIONS } from './trigger.js';
import { StringTextBuffer } from './text-buffer.js';
import type { TriggerOptions } from './types.js';

const width20: TriggerOptions = { ...DEFAULT_TRIGGER_OPTIONS, width: 20 };

describe('handleTriggerKey', () => {
  it('wraps before inserting when typing at the end of the line', () => {
    const head = '// ' + 'word '.repeat(14).trimEnd();
    const text = `${head} ${'a'.repeat(19)}`;
    const buffer = new StringTextBuffer(text);

    const result = handleTriggerKey(buffer, text.length, ' ');

    expect(buffer.text).toBe(`${head}\n// ${'a'.repeat(19)} `);
    expect(result.cursor).toBe(buffer.length);
    expect(result.wrap?.changed).toBe(true);
  });

  it('inserts first and keeps the typing position when mid-line', () => {
    const buffer = new StringTextBuffer('// aaa bbb ccc ddd ee');

    const result = handleTriggerKey(buffer, 6, ' ', width20);

    expect(buffer.text).toBe('// aaa  bbb ccc ddd\n// ee');
    expect(result.cursor).toBe(7);
    expect(result.wrap?.changed).toBe(true);
  });

  it('reports the skip reason when nothing needed wrapping', () => {
    const buffer = new StringTextBuffer('// hello world');

    const result = handleTriggerKey(buffer, 8, ' ');

    expect(buffer.text).toBe('// hello  world');
    expect(result.cursor).toBe(9);
    expect(result.wrap).toEqual({ changed: false, cursor: 9, reason: 'within-width' });
  });

  it('inserts plainly when disabled', () => {
    const text = '// aaa bbb ccc ddd eee';
    const buffer = new StringTextBuffer(text);

    const result = handleTriggerKey(buffer, text.length, ' ', { ...width20, enabled: false });

    expect(buffer.text).toBe(`${text} `);
    expect(result).toEqual({ cursor: text.length + 1, wrap: null });
  });

  it('inserts plainly for keys that are not triggers', () => {
    const text = '// aaa bbb ccc ddd eee';
    const buffer = new StringTextBuffer(text);

    const result = handleTriggerKey(buffer, text.length, 'x', width20);

    expect(buffer.text).toBe(`${text}x`);
    expect(result.wrap).toBeNull();
  });

  it('continues typing on the continuation line after a merge', () => {
    const text = '// aaa bbb ccc ddd eee\n// fff';
    const buffer = new StringTextBuffer(text);

    const result = handleTriggerKey(buffer, 22, ' ', width20);

    expect(buffer.text).toBe('// aaa bbb ccc ddd\n// eee  fff');
    expect(result.cursor).toBe(26);
  });
});
