import React from 'react';
import { Box, Text } from 'ink';
import { colors } from '../theme.js';
import { measureText, DEFAULT_TAB_WIDTH } from '../wrap/column-metrics.js';

interface CursorTextProps {
  text: string;
  cursorPosition: number;
  /** Lines wider than this are highlighted */
  width?: number;
  tabWidth?: number;
  /** Hide the cursor block when another input has focus */
  showCursor?: boolean;
}

/**
 * Renders text line by line with an inverse block at the cursor.
 */
export function CursorText({
  text,
  cursorPosition,
  width,
  tabWidth = DEFAULT_TAB_WIDTH,
  showCursor = true,
}: CursorTextProps) {
  const lines = text.split('\n');
  let lineStart = 0;

  return (
    <Box flexDirection="column">
      {lines.map((line, index) => {
        const start = lineStart;
        lineStart += line.length + 1;
        const overflows = width !== undefined && measureText(line, 0, tabWidth) > width;
        const color = overflows ? colors.warning : undefined;
        const hasCursor = showCursor && cursorPosition >= start && cursorPosition <= start + line.length;

        if (!hasCursor) {
          return (
            <Text key={index} color={color}>
              {line || ' '}
            </Text>
          );
        }

        const offset = cursorPosition - start;
        const before = line.slice(0, offset);
        const atCursor = line[offset] ?? ' ';
        const after = line.slice(offset + 1);
        return (
          <Text key={index} color={color}>
            {before}
            <Text inverse>{atCursor === '\t' ? ' ' : atCursor}</Text>
            {after}
          </Text>
        );
      })}
    </Box>
  );
}
