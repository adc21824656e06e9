/**
 * colwrap - comment reflow for the terminal
 *
 * Editor component - multi-line scratch buffer that wraps comments as you type
 */
import React from 'react';
import { Box, useInput } from 'ink';

import { colors } from '../theme.js';
import type { UseTextBufferResult } from '../hooks/useTextBuffer.js';
import { cursorHandlers } from '../utils/index.js';
import type { TriggerOptions, WrapResult } from '../wrap/index.js';
import { CursorText } from './CursorText.js';

interface EditorProps {
  buffer: UseTextBufferResult;
  triggerOptions: TriggerOptions;
  /** Whether this component receives keystrokes */
  isActive: boolean;
  /** Esc pressed - hand focus to the command line */
  onEscape: () => void;
  /** Called whenever a keystroke consulted the wrapper */
  onWrap?: (result: WrapResult) => void;
}

export function Editor({ buffer, triggerOptions, isActive, onEscape, onWrap }: EditorProps) {
  const { text, cursorPosition, actions } = buffer;
  const { tabWidth } = triggerOptions;

  useInput((input, key) => {
    const ctx = { text, cursorPosition, tabWidth };

    if (key.escape) {
      onEscape();
      return;
    }

    if (key.upArrow) {
      const newPos = cursorHandlers.moveUp(ctx);
      if (newPos !== null) actions.moveCursor(newPos);
      return;
    }

    if (key.downArrow) {
      const newPos = cursorHandlers.moveDown(ctx);
      if (newPos !== null) actions.moveCursor(newPos);
      return;
    }

    // Option+Left (Mac) / Ctrl+Left (Windows) / Alt+B - word backward
    if ((key.meta && key.leftArrow) || (key.ctrl && key.leftArrow) || (key.meta && input === 'b')) {
      actions.moveCursor(cursorHandlers.moveWordBackward(ctx));
      return;
    }

    // Option+Right (Mac) / Ctrl+Right (Windows) / Alt+F - word forward
    if ((key.meta && key.rightArrow) || (key.ctrl && key.rightArrow) || (key.meta && input === 'f')) {
      actions.moveCursor(cursorHandlers.moveWordForward(ctx));
      return;
    }

    if (key.leftArrow) {
      actions.moveCursor(cursorHandlers.moveLeft(ctx));
      return;
    }

    if (key.rightArrow) {
      actions.moveCursor(cursorHandlers.moveRight(ctx));
      return;
    }

    if (key.ctrl && input === 'a') {
      actions.moveCursor(cursorHandlers.moveToLineStart(ctx));
      return;
    }

    if (key.ctrl && input === 'e') {
      actions.moveCursor(cursorHandlers.moveToLineEnd(ctx));
      return;
    }

    if ((key.meta || key.ctrl) && (key.backspace || key.delete)) {
      actions.deleteWordBackward();
      return;
    }

    if (key.backspace || key.delete) {
      actions.deleteBackward();
      return;
    }

    if (key.return) {
      actions.insert('\n');
      return;
    }

    if (key.tab) {
      actions.insert('\t');
      return;
    }

    if (input && !key.ctrl && !key.meta) {
      // Pasted chunks arrive as one string; feed them key by key so spaces
      // inside them still trigger wrapping
      for (const char of input) {
        const result = actions.typeKey(char, triggerOptions);
        if (result.wrap && onWrap) onWrap(result.wrap);
      }
    }
  }, { isActive });

  return (
    <Box
      flexDirection="column"
      borderStyle="single"
      borderColor={isActive ? colors.primary : colors.mutedDark}
      borderLeft={false}
      borderRight={false}
      paddingX={1}
    >
      <CursorText
        text={text}
        cursorPosition={cursorPosition}
        width={triggerOptions.width}
        tabWidth={tabWidth}
        showCursor={isActive}
      />
    </Box>
  );
}
