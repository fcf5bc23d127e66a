/**
 * Ink keystrokes to engine key presses
 */

import type { Key } from 'ink';
import type { KeyName, KeyPress } from 'bucketwalk-engine';

const NAMED_KEYS: Array<[keyof Key, KeyName]> = [
  ['upArrow', 'up'],
  ['downArrow', 'down'],
  ['leftArrow', 'left'],
  ['rightArrow', 'right'],
  ['pageUp', 'pageup'],
  ['pageDown', 'pagedown'],
  ['return', 'enter'],
  ['escape', 'escape'],
  ['tab', 'tab'],
  ['backspace', 'backspace'],
  // Most terminals send DEL for Backspace, which Ink reports as delete
  ['delete', 'backspace']
];

// Sequences Ink passes through as input
const SEQUENCES: Record<string, KeyName> = {
  '\x1b[H': 'home',
  '\x1b[1~': 'home',
  '\x1bOH': 'home',
  '\x1b[F': 'end',
  '\x1b[4~': 'end',
  '\x1bOF': 'end'
};

/**
 * Normalize one Ink `useInput` callback. Returns undefined for input that
 * carries no key (e.g. a bare modifier).
 */
export function toKeyPress(input: string, key: Key): KeyPress | undefined {
  for (const [flag, name] of NAMED_KEYS) {
    // Ink sets meta on Escape itself
    if (key[flag]) return key.ctrl && name !== 'escape' ? { key: name, ctrl: true } : { key: name };
  }

  const sequence = SEQUENCES[input];
  if (sequence) return { key: sequence };

  if (!input) return undefined;

  const press: KeyPress = { key: input };
  if (key.ctrl) press.ctrl = true;
  if (key.meta) press.meta = true;
  return press;
}

/**
 * Split pasted text into one press per character.
 */
export function toKeyPresses(input: string, key: Key): KeyPress[] {
  if (input.length > 1 && !key.ctrl && !key.meta && !(input in SEQUENCES) && !input.startsWith('\x1b')) {
    return Array.from(input, (ch) => ({ key: ch }));
  }
  const press = toKeyPress(input, key);
  return press ? [press] : [];
}
