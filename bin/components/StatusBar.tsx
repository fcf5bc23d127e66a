/**
 * StatusBar - transfers, the latest notification and key hints
 */

import type { Notification } from 'bucketwalk-engine';
import { Box, Text } from 'ink';
import React from 'react';

import { notificationColor, type Theme } from '../theme.js';

export const StatusBar: React.FC<{
  transfers: string[];
  notification?: Notification;
  region: string;
  hints: string;
  debugLog?: string;
  theme: Theme;
}> = ({ transfers, notification, region, hints, debugLog, theme }) => (
  <Box flexDirection="column" paddingX={1}>
    {transfers.map((line) => (
      <Text key={line} color={theme.colors.info} wrap="truncate-end">
        [~] {line}
      </Text>
    ))}
    {notification ? (
      <Text wrap="truncate-end">
        <Text color={notificationColor(theme, notification.level)}>{notification.message}</Text>
        {notification.hint && <Text color={theme.colors.muted}> {notification.hint}</Text>}
      </Text>
    ) : (
      <Text color={theme.colors.muted} wrap="truncate-end">
        Region: {region}
        {debugLog && ` | Debug log: ${debugLog}`}
      </Text>
    )}
    <Text color={theme.colors.muted} wrap="truncate-end">
      {hints}
    </Text>
  </Box>
);
