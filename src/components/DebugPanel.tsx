import React, { useEffect, useState } from 'react';
import { Box, Text } from 'ink';
import { colors } from '../theme.js';
import { logger } from '../utils/index.js';
import type { LogEntry, LogLevel } from '../utils/index.js';

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: colors.muted,
  info: colors.info,
  warn: colors.warning,
  error: colors.error,
};

interface DebugPanelProps {
  maxLines?: number;
  show?: boolean;
}

export function DebugPanel({ maxLines = 8, show = true }: DebugPanelProps) {
  const [logs, setLogs] = useState<LogEntry[]>([]);

  useEffect(() => logger.subscribe(setLogs), []);

  if (!show || logs.length === 0) return null;

  const displayLogs = logs.slice(-maxLines);

  return (
    <Box flexDirection="column" borderStyle="single" borderColor={colors.mutedDark} paddingX={1}>
      <Text color={colors.muted} dimColor>─ Debug Logs ─</Text>
      {displayLogs.map(entry => (
        <Box key={entry.id}>
          <Text color={LEVEL_COLORS[entry.level]}>[{entry.level.toUpperCase()}]</Text>
          <Text> {entry.message}</Text>
          {entry.data !== undefined && (
            <Text color={colors.muted}> {JSON.stringify(entry.data)}</Text>
          )}
        </Box>
      ))}
    </Box>
  );
}
