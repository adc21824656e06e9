/**
 * colwrap - comment reflow for the terminal
 *
 * CommandInput component - single-line slash command input with Tab completion
 */
import React, { useMemo } from 'react';
import { Box, Text, useInput } from 'ink';

import { colors } from '../theme.js';
import { useTextBuffer } from '../hooks/useTextBuffer.js';
import { cursorHandlers } from '../utils/index.js';
import { CursorText } from './CursorText.js';

// Available slash commands for autocomplete
export const SLASH_COMMANDS = [
  { cmd: '/help', desc: 'Show available commands' },
  { cmd: '/wrap', desc: 'Wrap the comment at the cursor' },
  { cmd: '/string', desc: 'Split the string literal at the cursor' },
  { cmd: '/width', desc: 'Set the wrap column' },
  { cmd: '/delim', desc: 'Set the comment delimiter' },
  { cmd: '/autowrap', desc: 'Toggle wrap on space' },
  { cmd: '/clear', desc: 'Clear the buffer' },
  { cmd: '/save', desc: 'Save settings' },
  { cmd: '/debug', desc: 'Toggle debug panel' },
];

export function matchCommands(text: string): typeof SLASH_COMMANDS {
  if (!text.startsWith('/') || text.includes(' ')) return [];
  return SLASH_COMMANDS.filter(c => c.cmd.startsWith(text.toLowerCase()));
}

/**
 * Tab completion: a unique match completes to the command plus a space,
 * several matches extend the input to their common prefix. Null when Tab
 * would not change the input.
 */
export function completeCommand(text: string): string | null {
  const matches = matchCommands(text);
  if (matches.length === 0) return null;
  if (matches.length === 1) return `${matches[0].cmd} `;

  let prefix = matches[0].cmd;
  for (const { cmd } of matches) {
    while (!cmd.startsWith(prefix)) prefix = prefix.slice(0, -1);
  }
  return prefix.length > text.length ? prefix : null;
}

interface CommandInputProps {
  onSubmit: (value: string) => void;
  onCancel: () => void;
  isActive: boolean;
}

export function CommandInput({ onSubmit, onCancel, isActive }: CommandInputProps) {
  const { text, cursorPosition, actions } = useTextBuffer();
  const suggestions = useMemo(() => matchCommands(text), [text]);

  useInput((input, key) => {
    const ctx = { text, cursorPosition };

    if (key.escape) {
      actions.clear();
      onCancel();
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

    if ((key.meta || key.ctrl) && (key.backspace || key.delete)) {
      actions.deleteWordBackward();
      return;
    }

    if (key.backspace || key.delete) {
      actions.deleteBackward();
      return;
    }

    if (key.tab) {
      const completion = completeCommand(text);
      if (completion) actions.setValue(completion);
      return;
    }

    if (key.return) {
      const val = text.trim();
      actions.clear();
      if (val) {
        onSubmit(val);
      } else {
        onCancel();
      }
      return;
    }

    if (input && !key.ctrl && !key.meta) {
      actions.insert(input);
    }
  }, { isActive });

  if (!isActive) {
    return (
      <Box paddingX={1}>
        <Text color={colors.muted}>esc for commands · ctrl+c to quit</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column">
      <Box paddingX={1}>
        <Text color={colors.primary} bold>
          {': '}
        </Text>
        <CursorText text={text} cursorPosition={cursorPosition} />
      </Box>

      {suggestions.length > 0 && (
        <Box paddingX={3} flexDirection="column">
          {suggestions.map(s => (
            <Text key={s.cmd} color={colors.muted}>
              {s.cmd.padEnd(10)}
              <Text dimColor>{s.desc}</Text>
            </Text>
          ))}
        </Box>
      )}
    </Box>
  );
}
