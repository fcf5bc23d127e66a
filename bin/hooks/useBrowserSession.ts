/**
 * useBrowserSession Hook
 *
 * Responsibilities:
 * - Run the session's completion loop while the component is mounted
 * - Mirror every published frame into React state
 * - Forward keystrokes to the session
 * - Exit the Ink app when the session quits
 */

import type { BrowserSession, Frame, KeyPress } from 'bucketwalk-engine';
import { useCallback, useEffect, useState } from 'react';

export interface BrowserSessionHandle {
  frame: Frame;
  handleKeys: (presses: KeyPress[]) => void;
}

export function useBrowserSession(
  session: BrowserSession,
  onQuit: () => void,
  onError: (error: unknown) => void
): BrowserSessionHandle {
  const [frame, setFrame] = useState<Frame>(() => session.frame());

  useEffect(() => {
    const onFrame = (next: Frame) => setFrame(next);
    session.on('frame', onFrame);
    session.on('quit', onQuit);
    session.run().catch(onError);

    return () => {
      session.off('frame', onFrame);
      session.off('quit', onQuit);
      session.stop();
    };
  }, [session, onQuit, onError]);

  const handleKeys = useCallback(
    (presses: KeyPress[]) => {
      for (const press of presses) {
        if (session.isStopped) return;
        session.handleKey(press);
      }
    },
    [session]
  );

  return { frame, handleKeys };
}
