/**
 * SidePane - object detail, versions and preview beside the listing
 */

import type { PaneView } from 'bucketwalk-engine';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import React, { useMemo } from 'react';

import { paneSlice, truncateText } from '../../src/list-viewport.js';
import { previewLines, StyledLines, type StyledLine } from '../../src/markdown-renderer.js';
import type { Theme } from '../theme.js';

type DetailView = Extract<PaneView, { kind: 'detail' }>;
type PreviewView = Extract<PaneView, { kind: 'preview' }>;

const LABEL_WIDTH = 16;

const ErrorLines: React.FC<{ error: { message: string; hint?: string }; theme: Theme }> = ({ error, theme }) => (
  <Box flexDirection="column">
    <Text color={theme.colors.error}>[x] {error.message}</Text>
    {error.hint && <Text color={theme.colors.muted}>{error.hint}</Text>}
  </Box>
);

function detailLines(pane: DetailView, theme: Theme): StyledLine[] {
  if (pane.tab === 'versions') {
    return pane.versions.length > 0
      ? pane.versions.map((line) => [{ text: line, color: line.startsWith('*') ? theme.colors.primary : undefined }])
      : [[{ text: 'No versions', color: theme.colors.muted }]];
  }
  return pane.fields.map((field) => [
    { text: field.label.padEnd(LABEL_WIDTH), color: theme.colors.muted },
    { text: field.value }
  ]);
}

const DetailBody: React.FC<{ pane: DetailView; height: number; theme: Theme }> = ({ pane, height, theme }) => {
  if (pane.loading) {
    return (
      <Text color={theme.colors.muted}>
        <Spinner type="dots" /> Loading details…
      </Text>
    );
  }
  // A failed versions listing still has fields to show
  const showError = pane.error && (pane.fields.length === 0 || pane.tab === 'versions');
  const { lines } = paneSlice(detailLines(pane, theme), pane.scroll, Math.max(1, height - (showError ? 2 : 0)));
  return (
    <Box flexDirection="column">
      {showError && pane.error && <ErrorLines error={pane.error} theme={theme} />}
      {!(showError && pane.fields.length === 0) && <StyledLines lines={lines} />}
    </Box>
  );
};

const PreviewBody: React.FC<{ pane: PreviewView; height: number; theme: Theme }> = ({ pane, height, theme }) => {
  const content = pane.content;
  const lines = useMemo(() => (content ? previewLines(content) : []), [content]);

  switch (pane.status) {
    case 'loading':
      return (
        <Text color={theme.colors.muted}>
          <Spinner type="dots" /> Loading preview{pane.progress ? ` (${pane.progress})` : '…'}
        </Text>
      );
    case 'cancelled':
      return <Text color={theme.colors.warning}>Preview cancelled. Press p to retry.</Text>;
    case 'failed':
      return pane.error ? (
        <ErrorLines error={pane.error} theme={theme} />
      ) : (
        <Text color={theme.colors.error}>[x] Preview failed</Text>
      );
    case 'ready':
      return <StyledLines lines={paneSlice(lines, pane.scroll, height).lines} />;
  }
};

export const SidePane: React.FC<{
  pane: PaneView;
  height: number;
  width: number;
  theme: Theme;
}> = ({ pane, height, width, theme }) => {
  // Border, title and tab rows
  const bodyHeight = Math.max(1, height - 4);

  return (
    <Box
      flexDirection="column"
      height={height}
      width={width}
      borderStyle="round"
      borderColor={theme.colors.border}
      paddingX={1}
    >
      <Text bold color={theme.colors.primary} wrap="truncate-end">
        {truncateText(pane.title, Math.max(1, width - 4))}
      </Text>
      {pane.kind === 'detail' ? (
        <>
          <Text>
            <Text inverse={pane.tab === 'detail'}> Detail </Text>
            <Text> </Text>
            <Text inverse={pane.tab === 'versions'}> Versions </Text>
            <Text color={theme.colors.muted}> (Tab)</Text>
          </Text>
          <DetailBody pane={pane} height={bodyHeight} theme={theme} />
        </>
      ) : (
        <>
          <Text color={theme.colors.muted}>Preview (J/K scroll)</Text>
          <PreviewBody pane={pane} height={bodyHeight} theme={theme} />
        </>
      )}
    </Box>
  );
};
