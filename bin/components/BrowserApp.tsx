/**
 * BrowserApp - top-level layout of the bucket browser
 */

import type { BrowserSession } from 'bucketwalk-engine';
import { Box, Text, useApp, useInput, useStdout } from 'ink';
import React, { useCallback, useEffect, useState } from 'react';

import { calculateAvailableRows, type TerminalSize } from '../../src/list-viewport.js';
import { useBrowserSession } from '../hooks/useBrowserSession.js';
import type { Theme } from '../theme.js';
import { toKeyPresses } from '../utils/keyboard.js';
import { Dialog } from './Dialog.js';
import { EntryList } from './EntryList.js';
import { HelpOverlay } from './HelpOverlay.js';
import { SidePane } from './SidePane.js';
import { StatusBar } from './StatusBar.js';

function useTerminalSize(): TerminalSize {
  const { stdout } = useStdout();
  const [size, setSize] = useState<TerminalSize>({ rows: stdout.rows || 24, columns: stdout.columns || 80 });

  useEffect(() => {
    const onResize = () => setSize({ rows: stdout.rows || 24, columns: stdout.columns || 80 });
    stdout.on('resize', onResize);
    return () => {
      stdout.off('resize', onResize);
    };
  }, [stdout]);

  return size;
}

export const BrowserApp: React.FC<{
  session: BrowserSession;
  region: string;
  theme: Theme;
  debugLog?: string;
}> = ({ session, region, theme, debugLog }) => {
  const { exit } = useApp();
  const onQuit = useCallback(() => exit(), [exit]);
  const onError = useCallback(
    (error: unknown) => exit(error instanceof Error ? error : new Error(String(error))),
    [exit]
  );
  const { frame, handleKeys } = useBrowserSession(session, onQuit, onError);
  const size = useTerminalSize();

  useInput((input, key) => handleKeys(toKeyPresses(input, key)));

  const dialog = frame.dialog;
  // Dialog boxes: border, title and body rows
  const dialogRows = !dialog ? 0 : dialog.kind === 'copyMenu' ? dialog.choices.length + 3 : 4;
  const bodyHeight = Math.max(3, calculateAvailableRows(size) - frame.transfers.length - dialogRows);
  const listWidth = frame.pane ? Math.floor(size.columns * 0.5) : size.columns;
  const paneWidth = size.columns - listWidth;

  return (
    <Box flexDirection="column" height={size.rows}>
      {/* Location */}
      <Box paddingX={1} flexDirection="column">
        <Text bold color={theme.colors.primary} wrap="truncate-start">
          {frame.location}
        </Text>
        {frame.filter ? (
          <Text color={frame.filter.editing ? theme.colors.highlight : theme.colors.muted}>
            /{frame.filter.text}
            {frame.filter.editing && <Text color={theme.colors.primary}>█</Text>} ({frame.filter.matches}{' '}
            {frame.filter.matches === 1 ? 'match' : 'matches'})
          </Text>
        ) : (
          <Text color={theme.colors.muted} wrap="truncate-start">
            {frame.breadcrumb.length > 0 ? frame.breadcrumb.join(' › ') : 'All buckets'}
          </Text>
        )}
      </Box>

      {frame.help ? (
        <HelpOverlay entries={frame.help} height={bodyHeight} theme={theme} />
      ) : (
        <Box flexDirection="row" height={bodyHeight} paddingX={1}>
          <EntryList
            rows={frame.rows}
            cursor={frame.cursor}
            status={frame.status}
            footer={frame.footer}
            height={bodyHeight}
            width={Math.max(10, listWidth - 2)}
            theme={theme}
          />
          {frame.pane && <SidePane pane={frame.pane} height={bodyHeight} width={paneWidth} theme={theme} />}
        </Box>
      )}

      {dialog && <Dialog dialog={dialog} width={size.columns} theme={theme} />}

      <StatusBar
        transfers={frame.transfers}
        notification={frame.notification}
        region={region}
        hints={frame.hints}
        debugLog={debugLog}
        theme={theme}
      />
    </Box>
  );
};
