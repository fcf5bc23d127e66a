/**
 * Input State Machine
 *
 * Pure mapping from (state, key) to (next state, command). Every key is
 * accepted in every state; keys without a binding leave the state unchanged
 * and produce no command. `Ctrl-c` quits from anywhere.
 */

import type { ObjectPath } from './types.js';

export type KeyName =
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'pageup'
  | 'pagedown'
  | 'home'
  | 'end'
  | 'enter'
  | 'escape'
  | 'backspace'
  | 'delete'
  | 'tab';

/**
 * Normalized keystroke. `key` is either a single printable character
 * (case preserved) or a `KeyName`.
 */
export interface KeyPress {
  key: string;
  ctrl?: boolean;
  meta?: boolean;
}

export type CursorMove = 'next' | 'prev' | 'first' | 'last' | 'pageDown' | 'pageUp';

export const COPY_TARGETS = ['key', 's3Uri', 'objectUrl', 'arn', 'etag'] as const;
export type CopyTarget = (typeof COPY_TARGETS)[number];

export type PromptPurpose = 'saveAs' | 'upload';

export type ConfirmAction = { type: 'overwrite'; path: ObjectPath; destination: string };

export type Mode =
  | { kind: 'browse' }
  | { kind: 'filter'; text: string }
  | { kind: 'confirm'; action: ConfirmAction; message: string }
  | { kind: 'help' }
  | { kind: 'prompt'; purpose: PromptPurpose; text: string }
  | { kind: 'copyMenu'; selected: number };

export interface InputState {
  /** Committed filter; while editing, the live text is in the filter mode */
  filter: string;
  mode: Mode;
}

export type Command =
  | { type: 'moveCursor'; move: CursorMove }
  | { type: 'pushSelection' }
  | { type: 'popToParent' }
  | { type: 'jumpToRoot' }
  | { type: 'reload' }
  | { type: 'setFilter'; text: string }
  | { type: 'closePane' }
  | { type: 'startPreview' }
  | { type: 'startDownload' }
  | { type: 'saveAs'; name: string }
  | { type: 'upload'; source: string }
  | { type: 'confirm'; action: ConfirmAction }
  | { type: 'cancelJob' }
  | { type: 'copy'; target: CopyTarget }
  | { type: 'copyPath' }
  | { type: 'openConsole' }
  | { type: 'scrollPane'; delta: number }
  | { type: 'toggleTab' }
  | { type: 'quit' };

export interface Transition {
  state: InputState;
  command?: Command;
}

export const INITIAL_STATE: InputState = { filter: '', mode: { kind: 'browse' } };

export function isPrintable(press: KeyPress): boolean {
  if (press.ctrl || press.meta) return false;
  if (press.key.length !== 1) return false;
  const code = press.key.charCodeAt(0);
  return code >= 0x20 && code !== 0x7f;
}

/**
 * Filter text in effect for the visible list, including uncommitted edits.
 */
export function activeFilter(state: InputState): string {
  return state.mode.kind === 'filter' ? state.mode.text : state.filter;
}

export function confirmState(state: InputState, action: ConfirmAction, message: string): InputState {
  return { filter: state.filter, mode: { kind: 'confirm', action, message } };
}

function browse(state: InputState, filter = state.filter): InputState {
  return { filter, mode: { kind: 'browse' } };
}

function stay(state: InputState): Transition {
  return { state };
}

const BROWSE_MOVES = new Map<string, CursorMove>([
  ['j', 'next'],
  ['down', 'next'],
  ['k', 'prev'],
  ['up', 'prev'],
  ['g', 'first'],
  ['home', 'first'],
  ['G', 'last'],
  ['end', 'last'],
  ['f', 'pageDown'],
  ['pagedown', 'pageDown'],
  ['b', 'pageUp'],
  ['pageup', 'pageUp']
]);

function browseTransition(state: InputState, press: KeyPress): Transition {
  const { key } = press;

  if (press.ctrl) {
    return key === 'x' ? { state, command: { type: 'cancelJob' } } : stay(state);
  }
  if (press.meta) return stay(state);

  const move = BROWSE_MOVES.get(key);
  if (move) return { state, command: { type: 'moveCursor', move } };

  switch (key) {
    case 'l':
    case 'right':
    case 'enter':
      return { state, command: { type: 'pushSelection' } };
    case 'h':
    case 'left':
    case 'backspace':
      return { state, command: { type: 'popToParent' } };
    case '~':
      return { state, command: { type: 'jumpToRoot' } };
    case 'r':
      return { state, command: { type: 'reload' } };
    case 'p':
      return { state, command: { type: 'startPreview' } };
    case 's':
      return { state, command: { type: 'startDownload' } };
    case 'S':
      return { state: { ...state, mode: { kind: 'prompt', purpose: 'saveAs', text: '' } } };
    case 'u':
      return { state: { ...state, mode: { kind: 'prompt', purpose: 'upload', text: '' } } };
    case 'c':
      return { state: { ...state, mode: { kind: 'copyMenu', selected: 0 } } };
    case 'y':
      return { state, command: { type: 'copyPath' } };
    case 'x':
      return { state, command: { type: 'openConsole' } };
    case 'J':
      return { state, command: { type: 'scrollPane', delta: 1 } };
    case 'K':
      return { state, command: { type: 'scrollPane', delta: -1 } };
    case 'tab':
      return { state, command: { type: 'toggleTab' } };
    case '/':
      return { state: { ...state, mode: { kind: 'filter', text: state.filter } } };
    case '?':
      return { state: { ...state, mode: { kind: 'help' } } };
    case 'q':
      return { state, command: { type: 'quit' } };
    case 'escape':
      if (state.filter) {
        return { state: browse(state, ''), command: { type: 'setFilter', text: '' } };
      }
      return { state, command: { type: 'closePane' } };
    default:
      return stay(state);
  }
}

function editText(text: string, press: KeyPress): string | undefined {
  if (isPrintable(press)) return text + press.key;
  if (press.key === 'backspace' || press.key === 'delete') return text.slice(0, -1);
  return undefined;
}

function filterTransition(state: InputState, text: string, press: KeyPress): Transition {
  const edited = editText(text, press);
  if (edited !== undefined) {
    return {
      state: { ...state, mode: { kind: 'filter', text: edited } },
      command: { type: 'setFilter', text: edited }
    };
  }

  switch (press.key) {
    case 'enter':
      return { state: browse(state, text), command: { type: 'setFilter', text } };
    case 'escape':
      return { state: browse(state), command: { type: 'setFilter', text: state.filter } };
    default:
      return stay(state);
  }
}

function confirmTransition(state: InputState, action: ConfirmAction, press: KeyPress): Transition {
  if (press.ctrl || press.meta) return stay(state);
  switch (press.key) {
    case 'y':
    case 'Y':
    case 'enter':
      return { state: browse(state), command: { type: 'confirm', action } };
    case 'n':
    case 'N':
    case 'escape':
      return { state: browse(state) };
    default:
      return stay(state);
  }
}

function promptTransition(
  state: InputState,
  purpose: PromptPurpose,
  text: string,
  press: KeyPress
): Transition {
  const edited = editText(text, press);
  if (edited !== undefined) {
    return { state: { ...state, mode: { kind: 'prompt', purpose, text: edited } } };
  }

  switch (press.key) {
    case 'enter': {
      const value = text.trim();
      if (purpose === 'saveAs') {
        return { state: browse(state), command: { type: 'saveAs', name: value } };
      }
      return value ? { state: browse(state), command: { type: 'upload', source: value } } : { state: browse(state) };
    }
    case 'escape':
      return { state: browse(state) };
    default:
      return stay(state);
  }
}

function copyMenuTransition(state: InputState, selected: number, press: KeyPress): Transition {
  if (press.ctrl || press.meta) return stay(state);
  const count = COPY_TARGETS.length;

  switch (press.key) {
    case 'j':
    case 'down':
      return { state: { ...state, mode: { kind: 'copyMenu', selected: (selected + 1) % count } } };
    case 'k':
    case 'up':
      return { state: { ...state, mode: { kind: 'copyMenu', selected: (selected - 1 + count) % count } } };
    case 'enter':
      return { state: browse(state), command: { type: 'copy', target: COPY_TARGETS[selected] } };
    case 'escape':
    case 'c':
      return { state: browse(state) };
    default:
      return stay(state);
  }
}

function helpTransition(state: InputState, press: KeyPress): Transition {
  if (press.ctrl || press.meta) return stay(state);
  switch (press.key) {
    case '?':
    case 'escape':
    case 'q':
      return { state: browse(state) };
    default:
      return stay(state);
  }
}

export function transition(state: InputState, press: KeyPress): Transition {
  if (press.ctrl && press.key === 'c') {
    return { state, command: { type: 'quit' } };
  }

  const { mode } = state;
  switch (mode.kind) {
    case 'browse':
      return browseTransition(state, press);
    case 'filter':
      return filterTransition(state, mode.text, press);
    case 'confirm':
      return confirmTransition(state, mode.action, press);
    case 'prompt':
      return promptTransition(state, mode.purpose, mode.text, press);
    case 'copyMenu':
      return copyMenuTransition(state, mode.selected, press);
    case 'help':
      return helpTransition(state, press);
  }
}

export interface HelpEntry {
  keys: string;
  description: string;
}

const BROWSE_HELP: HelpEntry[] = [
  { keys: 'j / ↓', description: 'Next item (loads more past the end)' },
  { keys: 'k / ↑', description: 'Previous item' },
  { keys: 'g / G', description: 'First / last item' },
  { keys: 'f / b', description: 'Page down / up' },
  { keys: 'l / → / Enter', description: 'Open bucket, prefix or object' },
  { keys: 'h / ← / Backspace', description: 'Parent' },
  { keys: '~', description: 'Back to the root' },
  { keys: 'r', description: 'Reload' },
  { keys: '/', description: 'Filter by name' },
  { keys: 'p', description: 'Preview object' },
  { keys: 'J / K', description: 'Scroll the pane' },
  { keys: 'Tab', description: 'Switch detail / versions' },
  { keys: 's / S', description: 'Download / save as' },
  { keys: 'u', description: 'Upload a local file here' },
  { keys: 'c', description: 'Copy menu' },
  { keys: 'y', description: 'Copy S3 URI' },
  { keys: 'x', description: 'Open in the management console' },
  { keys: 'Ctrl-x', description: 'Cancel running transfer' },
  { keys: 'Esc', description: 'Clear filter, then close pane' },
  { keys: '?', description: 'Help' },
  { keys: 'q / Ctrl-c', description: 'Quit' }
];

const HELP_BY_MODE: Record<Mode['kind'], HelpEntry[]> = {
  browse: BROWSE_HELP,
  filter: [
    { keys: 'type', description: 'Edit filter' },
    { keys: 'Enter', description: 'Apply' },
    { keys: 'Esc', description: 'Restore previous filter' }
  ],
  confirm: [
    { keys: 'y / Enter', description: 'Confirm' },
    { keys: 'n / Esc', description: 'Cancel' }
  ],
  prompt: [
    { keys: 'type', description: 'Edit' },
    { keys: 'Enter', description: 'Submit' },
    { keys: 'Esc', description: 'Cancel' }
  ],
  copyMenu: [
    { keys: 'j / k', description: 'Select' },
    { keys: 'Enter', description: 'Copy' },
    { keys: 'Esc / c', description: 'Close' }
  ],
  help: [{ keys: '? / Esc / q', description: 'Close help' }]
};

export function helpFor(mode: Mode['kind']): HelpEntry[] {
  return HELP_BY_MODE[mode];
}
