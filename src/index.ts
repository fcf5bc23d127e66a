/**
 * bucketwalk - terminal browser for S3-compatible object storage
 *
 * Shell-side library: configuration, local file checks, secret redaction,
 * viewport arithmetic and preview rendering. The browsing engine itself lives
 * in the `bucketwalk-engine` workspace package.
 *
 * For CLI usage, run:
 *   npm start
 */

export {
  CONFIG_FILE,
  CONFIG_FOLDER,
  configFromEnv,
  defaultConfig,
  loadConfig,
  mergeConfigs,
  parseConfig,
  resolvePath
} from './config-loader';
export type { BucketwalkConfig, ConfigOverrides, LoadConfigOptions } from './config-loader';

export { isSensitiveKey, relevantEnv, sanitizeEnv, sanitizeText } from './env-sanitizer';

export { SecurityValidator } from './security-validator';

export { createLocalFiles } from './local-files';
export type { LocalFilesOptions } from './local-files';

export {
  calculateAvailableRows,
  defaultLayoutConfig,
  formatScrollInfo,
  layoutRow,
  paneSlice,
  truncateText,
  visibleWindow,
  windowStart,
  wrapLines
} from './list-viewport';
export type { LayoutConfig, RowColumns, TerminalSize, ViewportWindow } from './list-viewport';

export {
  codeLines,
  decodeEntities,
  highlightCode,
  lineText,
  markdownLines,
  plainLines,
  previewLines,
  StyledLines
} from './markdown-renderer';
export type { Segment, StyledLine } from './markdown-renderer';
