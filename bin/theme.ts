/**
 * Terminal colors for the browser
 */

import type { NotificationLevel } from 'bucketwalk-engine';

export interface Theme {
  name: string;
  colors: {
    primary: string;
    accent: string;
    muted: string;
    border: string;
    highlight: string;
    container: string;
    selectedBackground: string;
    selectedText: string;
    success: string;
    warning: string;
    error: string;
    info: string;
  };
}

export const DEFAULT_THEME: Theme = {
  name: 'default',
  colors: {
    primary: 'cyan',
    accent: 'magenta',
    muted: 'gray',
    border: 'gray',
    highlight: 'yellow',
    container: 'blue',
    selectedBackground: 'cyan',
    selectedText: 'black',
    success: 'green',
    warning: 'yellow',
    error: 'red',
    info: 'cyan'
  }
};

export function notificationColor(theme: Theme, level: NotificationLevel): string {
  switch (level) {
    case 'success':
      return theme.colors.success;
    case 'error':
      return theme.colors.error;
    case 'info':
      return theme.colors.info;
  }
}
