import { wrapCommentAtPosition } from './comment-wrapper.js';
import { EditSession } from './edit-session.js';
import { DEFAULT_WRAP_OPTIONS } from './options.js';
import type { TextBuffer } from './text-buffer.js';
import type { Position, TriggerOptions, TriggerResult } from './types.js';

export const DEFAULT_TRIGGER_OPTIONS: TriggerOptions = {
  ...DEFAULT_WRAP_OPTIONS,
  enabled: true,
  triggerKeys: [' '],
};

/**
 * Insert `key` at `cursor`, wrapping the current comment line when `key` is
 * a trigger. At the end of a line the wrap runs first, so the key lands after
 * the moved text; elsewhere the key goes in first and the wrap follows with
 * the cursor kept at the typing position.
 */
export function handleTriggerKey(
  buffer: TextBuffer,
  cursor: Position,
  key: string,
  options: TriggerOptions = DEFAULT_TRIGGER_OPTIONS
): TriggerResult {
  const session = new EditSession(buffer, cursor);

  if (!options.enabled || !options.triggerKeys.includes(key)) {
    session.insert(cursor, key);
    return { cursor: session.cursor, wrap: null };
  }

  if (cursor === buffer.lineAt(cursor).end) {
    const wrap = wrapCommentAtPosition(buffer, cursor, options, cursor);
    session.cursor = wrap.cursor;
    session.insert(session.cursor, key);
    return { cursor: session.cursor, wrap };
  }

  session.insert(cursor, key);
  const wrap = wrapCommentAtPosition(buffer, cursor, options, session.cursor);
  return { cursor: wrap.cursor, wrap };
}
