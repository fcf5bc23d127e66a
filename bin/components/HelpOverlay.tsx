import type { HelpEntry } from 'bucketwalk-engine';
import { Box, Text } from 'ink';
import React from 'react';

import type { Theme } from '../theme.js';

export const HelpOverlay: React.FC<{ entries: HelpEntry[]; height: number; theme: Theme }> = ({
  entries,
  height,
  theme
}) => {
  const keyWidth = Math.max(...entries.map((entry) => entry.keys.length)) + 2;

  return (
    <Box
      flexDirection="column"
      height={height}
      borderStyle="round"
      borderColor={theme.colors.primary}
      paddingX={1}
    >
      <Text bold color={theme.colors.primary}>
        Keys
      </Text>
      {entries.map((entry) => (
        <Text key={entry.keys}>
          <Text color={theme.colors.highlight}>{entry.keys.padEnd(keyWidth)}</Text>
          {entry.description}
        </Text>
      ))}
    </Box>
  );
};
