/**
 * Clipboard and browser access for the session
 */

import { spawn } from 'child_process';
import clipboard from 'clipboardy';
import type { SessionPlatform } from 'bucketwalk-engine';
import { SecurityValidator } from '../../src/security-validator.js';

export interface OpenCommand {
  command: string;
  args: string[];
}

export function openCommand(url: string, platform: NodeJS.Platform = process.platform): OpenCommand {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      // `start` treats its first quoted argument as the window title
      return { command: 'cmd', args: ['/c', 'start', '""', url.replace(/&/g, '^&')] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
}

/**
 * Launch the default browser. Resolves once the launcher has started.
 */
export function openUrl(url: string): Promise<void> {
  if (!/^https:\/\//.test(url)) {
    return Promise.reject(new Error(`Refusing to open non-https URL: ${url}`));
  }
  const { command, args } = openCommand(url);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'ignore', detached: true });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}

export async function copyToClipboard(text: string): Promise<void> {
  const clean = SecurityValidator.sanitizeClipboard(text);
  if (!clean) throw new Error('Nothing to copy');
  await clipboard.write(clean);
}

export const systemPlatform: SessionPlatform = { copyToClipboard, openUrl };
