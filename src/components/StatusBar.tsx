import React from 'react';
import { Box, Text } from 'ink';
import { colors } from '../theme.js';
import type { EditorSettings } from '../utils/index.js';
import type { WrapResult, WrapSkipReason } from '../wrap/index.js';

const SKIP_LABELS: Record<WrapSkipReason, string> = {
  'within-width': 'fits',
  'no-delimiter': 'not a comment',
  'no-word-boundary': 'no place to break',
  'no-string': 'no string at cursor',
  terminated: 'string closes on this line',
  'iteration-limit': 'stopped early',
};

/**
 * One-line summary of a wrap outcome for the status bar.
 */
export function describeWrap(result: WrapResult): string {
  if (!result.changed) {
    return SKIP_LABELS[result.reason];
  }
  const lines = `${result.linesWrapped} line${result.linesWrapped === 1 ? '' : 's'}`;
  return result.linesCreated > 0
    ? `wrapped ${lines}, +${result.linesCreated} new`
    : `wrapped ${lines}`;
}

interface StatusBarProps {
  line: number;
  column: number;
  settings: EditorSettings;
  lastWrap: WrapResult | null;
}

export function StatusBar({ line, column, settings, lastWrap }: StatusBarProps) {
  const pastWidth = column > settings.width;

  return (
    <Box paddingX={1} gap={1}>
      <Text color={pastWidth ? colors.warning : colors.muted}>
        Ln {line + 1}, Col {column + 1}
      </Text>
      <Text color={colors.muted}>·</Text>
      <Text color={colors.accent}>width {settings.width}</Text>
      <Text color={colors.muted}>·</Text>
      <Text color={colors.comment}>{settings.delimiter}</Text>
      <Text color={colors.muted}>·</Text>
      <Text color={settings.autoWrap ? colors.success : colors.muted}>
        auto-wrap {settings.autoWrap ? 'on' : 'off'}
      </Text>
      {lastWrap && (
        <>
          <Text color={colors.muted}>·</Text>
          <Text color={lastWrap.changed ? colors.success : colors.muted}>{describeWrap(lastWrap)}</Text>
        </>
      )}
    </Box>
  );
}
