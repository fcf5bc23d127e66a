/**
 * Dialog - overwrite confirmation, text prompts and the copy menu
 */

import type { DialogView } from 'bucketwalk-engine';
import { Box, Text } from 'ink';
import React from 'react';

import { truncateText } from '../../src/list-viewport.js';
import type { Theme } from '../theme.js';

export const Dialog: React.FC<{ dialog: DialogView; width: number; theme: Theme }> = ({ dialog, width, theme }) => {
  const inner = Math.max(10, width - 4);

  switch (dialog.kind) {
    case 'confirm':
      return (
        <Box borderStyle="round" borderColor={theme.colors.warning} paddingX={1} flexDirection="column">
          <Text color={theme.colors.warning}>{dialog.message}</Text>
          <Text color={theme.colors.muted}>[y] yes  [n] no</Text>
        </Box>
      );

    case 'prompt':
      return (
        <Box borderStyle="round" borderColor={theme.colors.primary} paddingX={1} flexDirection="column">
          <Text bold color={theme.colors.primary}>
            {dialog.title}
          </Text>
          <Text>
            {'> '}
            {dialog.text ? (
              dialog.text
            ) : (
              <Text color={theme.colors.muted}>{dialog.placeholder}</Text>
            )}
            <Text color={theme.colors.primary}>█</Text>
          </Text>
        </Box>
      );

    case 'copyMenu':
      return (
        <Box borderStyle="round" borderColor={theme.colors.accent} paddingX={1} flexDirection="column">
          <Text bold color={theme.colors.accent}>
            Copy
          </Text>
          {dialog.choices.map((choice, i) => {
            const selected = i === dialog.selected;
            const value = choice.value ?? 'n/a';
            return (
              <Text key={choice.target} inverse={selected} wrap="truncate-end">
                {selected ? '› ' : '  '}
                {choice.label.padEnd(12)}
                <Text color={choice.value ? undefined : theme.colors.muted}>
                  {truncateText(value, Math.max(1, inner - 14))}
                </Text>
              </Text>
            );
          })}
        </Box>
      );
  }
};
