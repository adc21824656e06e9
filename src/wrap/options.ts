import { logger } from '../utils/logger.js';
import { DEFAULT_TAB_WIDTH } from './column-metrics.js';
import type { StringWrapOptions, WrapOptions } from './types.js';

export const DEFAULT_WRAP_OPTIONS: WrapOptions = {
  width: 80,
  delimiter: '//',
  tabWidth: DEFAULT_TAB_WIDTH,
};

export const DEFAULT_STRING_WRAP_OPTIONS: StringWrapOptions = {
  startDelim: '"',
  endDelim: '"',
  lineEnd: '\\',
  lineContinue: '',
  escape: '\\',
};

export function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Fill in defaults and drop invalid values. Invalid values are logged, not
 * thrown, so a bad settings file never stops the editor.
 */
export function resolveWrapOptions(partial: Partial<WrapOptions> = {}): WrapOptions {
  const resolved = { ...DEFAULT_WRAP_OPTIONS };

  if (partial.width !== undefined) {
    if (isPositiveInteger(partial.width)) {
      resolved.width = partial.width;
    } else {
      logger.warn(`Ignoring invalid width: ${String(partial.width)}`);
    }
  }

  if (partial.tabWidth !== undefined) {
    if (isPositiveInteger(partial.tabWidth)) {
      resolved.tabWidth = partial.tabWidth;
    } else {
      logger.warn(`Ignoring invalid tab width: ${String(partial.tabWidth)}`);
    }
  }

  if (partial.delimiter !== undefined) {
    if (partial.delimiter.length > 0 && !/[\n\r]/.test(partial.delimiter)) {
      resolved.delimiter = partial.delimiter;
    } else {
      logger.warn('Ignoring empty or multi-line delimiter');
    }
  }

  return resolved;
}
