/**
 * Barrel export for all React components
 */

export { BrowserApp } from './BrowserApp.js';
export { Dialog } from './Dialog.js';
export { EntryList } from './EntryList.js';
export { HelpOverlay } from './HelpOverlay.js';
export { SidePane } from './SidePane.js';
export { StatusBar } from './StatusBar.js';
