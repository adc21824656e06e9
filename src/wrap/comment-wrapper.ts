import { logger } from '../utils/logger.js';
import { measureText, positionAtColumn } from './column-metrics.js';
import { indentationProfile } from './comment-spacing.js';
import { findDelimiter } from './delimiter.js';
import { EditSession } from './edit-session.js';
import type { TextBuffer } from './text-buffer.js';
import type { IndentationProfile, Line, Position, WrapOptions, WrapResult, WrapSkipReason } from './types.js';
import { isBlank, nextTokenStart, tokenBoundsAt, wordBoundsAt } from './word-bounds.js';

type LineStep =
  | { kind: 'skip'; reason: WrapSkipReason }
  | { kind: 'wrapped'; created: boolean; next: Line };

/**
 * Where overflow text begins on a comment line, or null when no word starts
 * after the comment content start (a single token filling the comment).
 */
export function findWrapBoundary(
  buffer: TextBuffer,
  line: Line,
  profile: IndentationProfile,
  options: WrapOptions
): Position | null {
  const overflowPos = positionAtColumn(buffer, line.start, options.width, options.tabWidth);
  if (overflowPos >= line.end) return null;

  let tokenStart: Position | null;
  if (isBlank(buffer.charAt(overflowPos))) {
    tokenStart = nextTokenStart(buffer, overflowPos);
  } else {
    const word = wordBoundsAt(buffer, overflowPos);
    tokenStart = tokenBoundsAt(buffer, word?.start ?? overflowPos)?.start ?? null;
  }
  if (tokenStart === null || tokenStart <= profile.contentStart) return null;

  // Take the whitespace before the word along with it
  let boundary = tokenStart;
  while (boundary > profile.contentStart && isBlank(buffer.charAt(boundary - 1))) {
    boundary--;
  }
  return boundary;
}

function wrapLine(session: EditSession, line: Line, options: WrapOptions): LineStep {
  const { buffer } = session;

  if (measureText(buffer.slice(line.start, line.end), 0, options.tabWidth) <= options.width) {
    return { kind: 'skip', reason: 'within-width' };
  }

  const delimPos = findDelimiter(buffer, line, options.delimiter);
  if (delimPos === null) {
    return { kind: 'skip', reason: 'no-delimiter' };
  }

  const delimLen = options.delimiter.length;
  const profile = indentationProfile(buffer, delimPos, delimLen, options.tabWidth);
  const boundary = findWrapBoundary(buffer, line, profile, options);
  if (boundary === null) {
    return { kind: 'skip', reason: 'no-word-boundary' };
  }

  const overflow = session.extract(boundary, line.end);
  const current: Line = { start: line.start, end: boundary };
  const next = buffer.nextLine(current);

  const nextDelim = next ? findDelimiter(buffer, next, options.delimiter) : null;
  if (next && nextDelim !== null) {
    const nextProfile = indentationProfile(buffer, nextDelim, delimLen, options.tabWidth);
    const pad = Math.max(0, profile.contentIndent - nextProfile.contentIndent);
    // An empty comment line takes the overflow as its whole content
    const separator = nextProfile.contentStart < next.end ? ' ' : '';
    session.insert(nextProfile.contentStart, ' '.repeat(pad));
    session.place(nextProfile.contentStart + pad, overflow, '', separator);
    return { kind: 'wrapped', created: false, next: buffer.lineAt(next.start) };
  }

  const { newline } = buffer;
  const prefix = ' '.repeat(profile.delimiterIndent) + options.delimiter + ' '.repeat(profile.contentIndent);
  if (next === null) {
    session.place(current.end, overflow, newline + prefix, '', true);
    return { kind: 'wrapped', created: true, next: buffer.lineAt(current.end + newline.length) };
  }
  session.place(next.start, overflow, prefix, newline);
  return { kind: 'wrapped', created: true, next: buffer.lineAt(next.start) };
}

/**
 * Wrap the comment on the line containing `pos` so it fits within
 * `options.width`, moving overflow onto the following comment line (merging)
 * or onto a new one, and cascading while the receiving line overflows.
 *
 * `cursor` defaults to `pos` and is returned updated; a cursor inside the
 * moved text moves with it.
 */
export function wrapCommentAtPosition(
  buffer: TextBuffer,
  pos: Position,
  options: WrapOptions,
  cursor: Position = pos
): WrapResult {
  const session = new EditSession(buffer, cursor);
  const maxIterations = buffer.lineCount() + buffer.length;
  let line = buffer.lineAt(pos);
  let linesWrapped = 0;
  let linesCreated = 0;
  let stoppedBy: WrapSkipReason = 'iteration-limit';

  for (let i = 0; i < maxIterations; i++) {
    const step = wrapLine(session, line, options);
    if (step.kind === 'skip') {
      stoppedBy = step.reason;
      break;
    }
    linesWrapped++;
    if (step.created) linesCreated++;
    line = step.next;
  }

  if (stoppedBy === 'iteration-limit') {
    logger.warn('Comment wrap stopped at iteration limit', { maxIterations, linesWrapped });
  }

  if (linesWrapped === 0) {
    logger.debug(`Comment wrap skipped: ${stoppedBy}`, { pos });
    return { changed: false, cursor: session.cursor, reason: stoppedBy };
  }

  logger.info(`Wrapped ${linesWrapped} comment line${linesWrapped === 1 ? '' : 's'}`, {
    linesCreated,
    stoppedBy,
  });
  return { changed: true, cursor: session.cursor, linesWrapped, linesCreated, stoppedBy };
}
