/**
 * bucketwalk-engine
 *
 * Navigation-and-fetch engine for a terminal object-storage browser: listing
 * cache, storage gateway, navigation stack, fetch orchestrator, preview and
 * transfer pipeline, input state machine and view model, tied together by the
 * browser session main loop.
 */

export type {
  ContainerEntry,
  ContainerKey,
  DetailState,
  Entry,
  ListPage,
  ListingState,
  ObjectDetail,
  ObjectEntry,
  ObjectMetadata,
  ObjectPath,
  ObjectVersion,
  RequestToken
} from './types.js';

export {
  ACCOUNT_ROOT,
  baseName,
  bucketRoot,
  childContainerKey,
  childObjectPath,
  isContainerKey,
  isStrictAncestor,
  parentKey,
  pathSegments,
  splitPath,
  toArn,
  toConsoleUrl,
  toObjectUrl,
  toS3Uri
} from './container-key.js';

export {
  StorageError,
  describeError,
  formatError,
  getRecoveryHint,
  toLocalIOError,
  toStorageError
} from './errors.js';
export type { ErrorDetails, StorageErrorKind } from './errors.js';

export { ListingCache } from './listing-cache.js';
export type { CallOptions, ProgressSink, StorageGateway } from './storage-gateway.js';
export { S3StorageGateway, normalizeEtag } from './s3-gateway.js';
export type { S3GatewayOptions } from './s3-gateway.js';
export { createDeadline, DeadlineExceededError } from './deadline.js';
export type { Deadline } from './deadline.js';

export { NavigationStack } from './navigation-stack.js';
export { CompletionChannel } from './completion-channel.js';
export { FetchOrchestrator } from './fetch-orchestrator.js';
export type { FetchCompletion, FetchOrchestratorOptions } from './fetch-orchestrator.js';

export { detectContent, formatHexDump, resolveLanguage } from './content-detect.js';
export type { PreviewContent, TextFormat } from './content-detect.js';
export { Pipeline } from './pipeline.js';
export type {
  JobKind,
  JobStatus,
  PipelineCompletion,
  PipelineJob,
  PipelineOptions,
  PreviewHints
} from './pipeline.js';

export {
  COPY_TARGETS,
  INITIAL_STATE,
  activeFilter,
  confirmState,
  helpFor,
  isPrintable,
  transition
} from './input-machine.js';
export type {
  Command,
  ConfirmAction,
  CopyTarget,
  CursorMove,
  HelpEntry,
  InputState,
  KeyName,
  KeyPress,
  Mode,
  PromptPurpose,
  Transition
} from './input-machine.js';

export { copyChoices, copyValue } from './copy-targets.js';
export type { CopyChoice } from './copy-targets.js';
export { formatBytes, formatDateTime, formatPercent } from './format.js';
export { breadcrumb, buildFrame, visibleEntries } from './view-model.js';
export type {
  DetailField,
  DetailTab,
  DialogView,
  Frame,
  FrameRow,
  ListStatus,
  Notification,
  NotificationLevel,
  PaneState,
  PaneView,
  ViewSnapshot,
  VisibleEntry
} from './view-model.js';

export { BrowserSession } from './browser-session.js';
export type {
  BrowserSessionOptions,
  LocalCompletion,
  LocalFiles,
  ResolvedDownload,
  ResolvedUpload,
  SessionMessage,
  SessionPlatform
} from './browser-session.js';
