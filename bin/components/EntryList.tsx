/**
 * EntryList - the listing of the current container
 */

import type { FrameRow, ListStatus } from 'bucketwalk-engine';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import React, { useRef } from 'react';

import { formatScrollInfo, layoutRow, visibleWindow } from '../../src/list-viewport.js';
import type { Theme } from '../theme.js';

const RowName: React.FC<{
  name: string;
  match?: [number, number];
  color?: string;
  theme: Theme;
}> = ({ name, match, color, theme }) => {
  if (!match || match[0] >= name.trimEnd().length) {
    return <Text color={color}>{name}</Text>;
  }
  const [start, end] = match;
  return (
    <Text color={color}>
      {name.slice(0, start)}
      <Text color={theme.colors.highlight} bold underline>
        {name.slice(start, end)}
      </Text>
      {name.slice(end)}
    </Text>
  );
};

export const EntryList: React.FC<{
  rows: FrameRow[];
  cursor?: number;
  status: ListStatus;
  footer?: string;
  height: number;
  width: number;
  theme: Theme;
}> = ({ rows, cursor, status, footer, height, width, theme }) => {
  const startRef = useRef(0);

  if (status.kind === 'loading') {
    return (
      <Box height={height} width={width}>
        <Text color={theme.colors.primary}>
          <Spinner type="dots" />
        </Text>
        <Text color={theme.colors.muted}> Loading…</Text>
      </Box>
    );
  }

  if (status.kind === 'error' && rows.length === 0) {
    return (
      <Box height={height} width={width} flexDirection="column">
        <Text color={theme.colors.error}>[x] {status.message}</Text>
        {status.hint && <Text color={theme.colors.muted}>{status.hint}</Text>}
        <Text color={theme.colors.muted}>Press r to retry.</Text>
      </Box>
    );
  }

  if (status.kind === 'empty') {
    return (
      <Box height={height} width={width}>
        <Text color={theme.colors.muted}>{status.message}</Text>
      </Box>
    );
  }

  // One row each for the footer and the position indicator
  const listHeight = Math.max(1, height - 2);
  const view = visibleWindow(rows, cursor, listHeight, startRef.current);
  startRef.current = view.start;
  const rowWidth = Math.max(10, width - 2);

  return (
    <Box height={height} width={width} flexDirection="column">
      {view.items.map((row, i) => {
        const columns = layoutRow(row, rowWidth);
        const color = row.selected
          ? theme.colors.selectedText
          : row.isContainer
            ? theme.colors.container
            : undefined;
        return (
          <Box key={`${view.start + i}-${row.name}`}>
            <Text
              backgroundColor={row.selected ? theme.colors.selectedBackground : undefined}
              color={color}
              wrap="truncate-end"
            >
              {row.selected ? '› ' : '  '}
              <RowName name={columns.name} match={row.match} color={color} theme={theme} />
              {'  '}
              {columns.size}
              {columns.modified && `  ${columns.modified}`}
            </Text>
          </Box>
        );
      })}
      <Box flexGrow={1} />
      {footer && <Text color={theme.colors.muted}>{footer}</Text>}
      {status.kind === 'error' && <Text color={theme.colors.error}>[x] {status.message}</Text>}
      <Text color={theme.colors.muted}>{formatScrollInfo(view.start, view.end, rows.length)}</Text>
    </Box>
  );
};
