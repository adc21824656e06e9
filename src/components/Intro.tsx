import React from 'react';
import { Box, Text } from 'ink';
import { colors } from '../theme.js';

interface IntroProps {
  width: number;
  delimiter: string;
}

export function Intro({ width, delimiter }: IntroProps) {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text color={colors.primary} bold>
        colwrap
      </Text>
      <Text color={colors.muted}>
        Type {delimiter} comments; they wrap at column {width} when you press space. /help for commands.
      </Text>
    </Box>
  );
}
