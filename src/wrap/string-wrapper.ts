import { logger } from '../utils/logger.js';
import { measureText, positionAtColumn } from './column-metrics.js';
import { EditSession } from './edit-session.js';
import { DEFAULT_STRING_WRAP_OPTIONS } from './options.js';
import type { TextBuffer } from './text-buffer.js';
import type { Position, StringWrapOptions, WrapOptions, WrapResult, WrapSkipReason } from './types.js';
import { isBlank, tokenBoundsAt } from './word-bounds.js';

/**
 * Whether an unescaped `endDelim` occurs in `[from, to)`.
 */
export function closesBefore(buffer: TextBuffer, from: Position, to: Position, options: StringWrapOptions): boolean {
  const { endDelim, escape } = options;
  let i = from;
  while (i < to) {
    if (escape && buffer.slice(i, i + escape.length) === escape) {
      i += escape.length + 1;
      continue;
    }
    if (buffer.slice(i, i + endDelim.length) === endDelim && i + endDelim.length <= to) {
      return true;
    }
    i++;
  }
  return false;
}

/**
 * Split an unterminated string literal that starts at `pos` across lines.
 *
 * Each fragment is closed with `lineEnd` and the next one starts with
 * `lineContinue`. Whitespace is part of the literal, so it stays on the
 * fragment it was on. Fragments are always new lines; an existing following
 * line is never merged into.
 */
export function wrapStringAtPosition(
  buffer: TextBuffer,
  pos: Position,
  options: WrapOptions,
  stringOptions: StringWrapOptions = DEFAULT_STRING_WRAP_OPTIONS,
  cursor: Position = pos
): WrapResult {
  const session = new EditSession(buffer, cursor);
  const { startDelim, lineEnd, lineContinue } = stringOptions;

  const skip = (reason: WrapSkipReason): WrapResult => {
    logger.debug(`String wrap skipped: ${reason}`, { pos });
    return { changed: false, cursor: session.cursor, reason };
  };

  if (!startDelim || buffer.slice(pos, pos + startDelim.length) !== startDelim) {
    return skip('no-string');
  }

  let line = buffer.lineAt(pos);
  let contentStart = pos + startDelim.length;
  if (closesBefore(buffer, contentStart, line.end, stringOptions)) {
    return skip('terminated');
  }

  const limit = options.width - measureText(lineEnd, 0, options.tabWidth);
  const maxIterations = buffer.lineCount() + buffer.length;
  let fragments = 0;
  let stoppedBy: WrapSkipReason = 'iteration-limit';

  for (let i = 0; i < maxIterations; i++) {
    if (measureText(buffer.slice(line.start, line.end), 0, options.tabWidth) <= options.width) {
      stoppedBy = 'within-width';
      break;
    }

    const overflowPos = positionAtColumn(buffer, line.start, Math.max(0, limit), options.tabWidth);
    const breakPos = isBlank(buffer.charAt(overflowPos))
      ? overflowPos
      : tokenBoundsAt(buffer, overflowPos)?.start ?? overflowPos;
    if (limit <= 0 || breakPos <= contentStart) {
      stoppedBy = 'no-word-boundary';
      break;
    }

    session.insert(breakPos, lineEnd + buffer.newline + lineContinue);
    fragments++;
    line = buffer.lineAt(breakPos + lineEnd.length + buffer.newline.length);
    contentStart = line.start + lineContinue.length;
  }

  if (fragments === 0) {
    return skip(stoppedBy);
  }
  if (stoppedBy === 'iteration-limit') {
    logger.warn('String wrap stopped at iteration limit', { maxIterations });
  }

  logger.info(`Split string literal into ${fragments + 1} fragments`, { stoppedBy });
  return { changed: true, cursor: session.cursor, linesWrapped: fragments, linesCreated: fragments, stoppedBy };
}
