/**
 * Browser Session
 *
 * The main loop. Owns the navigation stack, listing cache, fetch orchestrator,
 * pipeline and input state, executes commands produced by the input machine,
 * and applies background completions from the single completion channel in
 * arrival order. A frame is published after every state change.
 *
 * Events:
 * - `frame` (frame: Frame)
 * - `quit`
 */

import { EventEmitter } from 'events';
import { basename } from 'node:path';

import { CompletionChannel } from './completion-channel.js';
import {
  ACCOUNT_ROOT,
  baseName,
  childObjectPath,
  isContainerKey,
  parentKey,
  toConsoleUrl,
  toS3Uri
} from './container-key.js';
import { copyValue } from './copy-targets.js';
import { describeError, toLocalIOError, type StorageError } from './errors.js';
import { FetchOrchestrator, type FetchCompletion } from './fetch-orchestrator.js';
import {
  INITIAL_STATE,
  activeFilter,
  confirmState,
  transition,
  type Command,
  type ConfirmAction,
  type CopyTarget,
  type CursorMove,
  type InputState,
  type KeyPress
} from './input-machine.js';
import { ListingCache } from './listing-cache.js';
import { NavigationStack } from './navigation-stack.js';
import {
  Pipeline,
  type JobKind,
  type PipelineCompletion,
  type PipelineJob,
  type PreviewHints
} from './pipeline.js';
import type { StorageGateway } from './storage-gateway.js';
import type { ContainerKey, Entry, ObjectEntry, ObjectPath } from './types.js';
import {
  buildFrame,
  visibleEntries,
  type Frame,
  type Notification,
  type PaneState,
  type ViewSnapshot
} from './view-model.js';

/**
 * OS integrations the session calls out to.
 */
export interface SessionPlatform {
  copyToClipboard(text: string): Promise<void>;
  openUrl(url: string): Promise<void>;
}

export interface ResolvedDownload {
  path: string;
  exists: boolean;
}

export interface ResolvedUpload {
  path: string;
  size: number;
}

/**
 * Local filesystem checks done before a transfer starts. Implementations
 * reject with a `StorageError` of kind `LocalIOError`.
 */
export interface LocalFiles {
  /** Destination for `name` inside the download directory */
  resolveDownload(name: string): Promise<ResolvedDownload>;
  /** Readable regular file at `source` */
  resolveUpload(source: string): Promise<ResolvedUpload>;
}

export type LocalCompletion =
  | { type: 'downloadResolved'; path: ObjectPath; size?: number; destination: ResolvedDownload }
  | { type: 'uploadResolved'; target: ObjectPath; source: ResolvedUpload }
  | { type: 'notify'; notification: Notification };

export type SessionMessage = FetchCompletion | PipelineCompletion | LocalCompletion;

export interface BrowserSessionOptions {
  gateway: StorageGateway;
  files: LocalFiles;
  platform: SessionPlatform;
  region: string;
  /** Navigation root; defaults to the account root (bucket list) */
  root?: ContainerKey;
  /** Rows skipped by page up/down */
  pageRows?: number;
  previewMaxBytes?: number;
  progressIntervalMs?: number;
  throttleRetryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  log?: (message: string) => void;
}

const JOB_KINDS: readonly JobKind[] = ['preview', 'download', 'upload'];

export class BrowserSession extends EventEmitter {
  private readonly channel = new CompletionChannel<SessionMessage>();
  private readonly stack: NavigationStack;
  private readonly orchestrator: FetchOrchestrator;
  private readonly pipeline: Pipeline;
  private readonly files: LocalFiles;
  private readonly platform: SessionPlatform;
  private readonly region: string;
  private readonly pageRows: number;
  private readonly log: (message: string) => void;

  private input: InputState = INITIAL_STATE;
  private pane: PaneState = { kind: 'none' };
  private notification: Notification | undefined;
  /** Overwrite question held back until the user is back in browse mode */
  private deferredConfirm: ConfirmAction | undefined;
  private started = false;
  private stopped = false;

  constructor(options: BrowserSessionOptions) {
    super();
    const post = (message: SessionMessage) => this.channel.post(message);

    this.files = options.files;
    this.platform = options.platform;
    this.region = options.region;
    this.pageRows = Math.max(1, options.pageRows ?? 10);
    this.log = options.log ?? (() => {});
    this.stack = new NavigationStack(options.root ?? ACCOUNT_ROOT);
    this.orchestrator = new FetchOrchestrator(options.gateway, new ListingCache(), post, {
      throttleRetryDelayMs: options.throttleRetryDelayMs,
      sleep: options.sleep,
      log: this.log
    });
    this.pipeline = new Pipeline(options.gateway, post, {
      previewMaxBytes: options.previewMaxBytes,
      progressIntervalMs: options.progressIntervalMs,
      now: options.now
    });
  }

  /**
   * Load the root listing and publish the first frame.
   */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.orchestrator.ensureLoaded(this.stack.current());
    this.publish();
  }

  /**
   * Consume completions until `stop()`.
   */
  async run(): Promise<void> {
    this.start();
    for await (const message of this.channel) {
      this.apply(message);
    }
  }

  /**
   * Apply every queued completion without waiting. Returns how many were taken.
   */
  applyPending(): number {
    let count = 0;
    let message = this.channel.tryTake();
    while (message !== undefined) {
      this.apply(message);
      count++;
      message = this.channel.tryTake();
    }
    return count;
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.pipeline.cancel();
    this.channel.close();
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  handleKey(press: KeyPress): void {
    if (this.stopped) return;
    this.notification = undefined;

    const { state, command } = transition(this.input, press);
    this.input = state;
    if (command) this.execute(command);
    if (this.deferredConfirm && this.input.mode.kind === 'browse') this.askOverwrite(this.deferredConfirm);
    if (!this.stopped) this.publish();
  }

  execute(command: Command): void {
    switch (command.type) {
      case 'moveCursor':
        this.moveCursor(command.move);
        break;
      case 'pushSelection':
        this.pushSelection();
        break;
      case 'popToParent':
        if (this.stack.atRoot()) break;
        this.leaveContainer([this.stack.current()]);
        this.stack.pop();
        this.enterContainer();
        break;
      case 'jumpToRoot':
        if (this.stack.atRoot()) break;
        this.leaveContainer(this.stack.keys().slice(1));
        this.stack.reset();
        this.enterContainer();
        break;
      case 'reload':
        this.orchestrator.reload(this.stack.current());
        if (this.pane.kind === 'detail') this.orchestrator.reloadDetail(this.pane.path);
        break;
      case 'setFilter':
        this.stack.setCursor(this.visible().length > 0 ? 0 : undefined);
        break;
      case 'closePane':
        this.closePane();
        break;
      case 'startPreview':
        this.startPreview();
        break;
      case 'startDownload':
        this.startDownload('');
        break;
      case 'saveAs':
        this.startDownload(command.name);
        break;
      case 'upload':
        this.startUpload(command.source);
        break;
      case 'confirm':
        this.pipeline.startDownload(
          command.action.path,
          command.action.destination,
          this.findObject(command.action.path)?.size
        );
        break;
      case 'cancelJob':
        this.cancelJobs();
        break;
      case 'copy':
        this.copy(command.target);
        break;
      case 'copyPath':
        this.copy('s3Uri');
        break;
      case 'openConsole':
        this.openConsole();
        break;
      case 'scrollPane':
        if (this.pane.kind !== 'none') {
          this.pane = { ...this.pane, scroll: Math.max(0, this.pane.scroll + command.delta) };
        }
        break;
      case 'toggleTab':
        if (this.pane.kind === 'detail') {
          this.pane = { ...this.pane, tab: this.pane.tab === 'detail' ? 'versions' : 'detail', scroll: 0 };
        }
        break;
      case 'quit':
        this.stop();
        this.emit('quit');
        break;
    }
  }

  /**
   * Apply one completion and publish a frame when it changed anything.
   */
  apply(message: SessionMessage): boolean {
    const changed = this.applyMessage(message);
    if (changed && !this.stopped) this.publish();
    return changed;
  }

  snapshot(): ViewSnapshot {
    return {
      stack: this.stack.keys(),
      listing: this.orchestrator.cache.get(this.stack.current()),
      cursor: this.stack.getCursor(),
      input: this.input,
      pane: this.pane,
      detail:
        this.pane.kind === 'detail' ? this.orchestrator.detail(this.pane.path) : { status: 'notLoaded' },
      jobs: JOB_KINDS.flatMap((kind) => {
        const job = this.pipeline.job(kind);
        return job ? [job] : [];
      }),
      region: this.region,
      notification: this.notification
    };
  }

  frame(): Frame {
    return buildFrame(this.snapshot());
  }

  private publish(): void {
    this.emit('frame', this.frame());
  }

  private applyMessage(message: SessionMessage): boolean {
    switch (message.type) {
      case 'listPage':
      case 'listFailed': {
        if (!this.orchestrator.apply(message)) return false;
        if (message.key === this.stack.current()) this.clampCursor();
        return true;
      }
      case 'detailLoaded':
      case 'detailFailed':
        return this.orchestrator.apply(message);
      case 'jobProgress':
      case 'jobDone':
      case 'jobFailed': {
        const job = this.pipeline.apply(message);
        if (!job) return false;
        this.onJobChanged(job);
        return true;
      }
      case 'downloadResolved':
        this.onDownloadResolved(message);
        return true;
      case 'uploadResolved':
        this.pipeline.startUpload(message.source.path, message.target, message.source.size);
        return true;
      case 'notify':
        this.notification = message.notification;
        return true;
    }
  }

  private onJobChanged(job: Readonly<PipelineJob>): void {
    if (job.status === 'failed' && job.error) {
      const action = job.kind === 'upload' ? 'Upload' : job.kind === 'download' ? 'Download' : 'Preview';
      this.log(`${action} of ${toS3Uri(job.target)} failed: ${job.error.message}`);
      if (job.kind !== 'preview') this.notifyError(job.error);
      return;
    }
    if (job.status !== 'done') return;

    if (job.kind === 'download') {
      this.notify('success', `Downloaded ${toS3Uri(job.target)} to ${job.localPath ?? ''}`);
    } else if (job.kind === 'upload') {
      this.notify('success', `Uploaded ${job.localPath ?? ''} to ${toS3Uri(job.target)}`);
      this.orchestrator.invalidateDetail(job.target);
      const container = parentKey(job.target);
      if (container === this.stack.current()) {
        this.orchestrator.reload(container);
      } else if (container !== undefined) {
        this.orchestrator.cache.invalidate(container);
      }
    }
  }

  private onDownloadResolved(message: Extract<LocalCompletion, { type: 'downloadResolved' }>): void {
    const { path, size, destination } = message;
    if (!destination.exists) {
      this.pipeline.startDownload(path, destination.path, size);
      return;
    }
    const action: ConfirmAction = { type: 'overwrite', path, destination: destination.path };
    if (this.input.mode.kind !== 'browse') {
      this.deferredConfirm = action;
      this.notify('info', `${destination.path} already exists, download not started yet`);
      return;
    }
    this.askOverwrite(action);
  }

  private askOverwrite(action: ConfirmAction): void {
    this.deferredConfirm = undefined;
    this.input = confirmState(this.input, action, `${action.destination} already exists. Overwrite?`);
  }

  private visible(): Entry[] {
    const listing = this.orchestrator.cache.get(this.stack.current());
    return visibleEntries(listing, activeFilter(this.input)).map((v) => v.entry);
  }

  private selected(): Entry | undefined {
    const cursor = this.stack.getCursor();
    return cursor === undefined ? undefined : this.visible()[cursor];
  }

  private selectedObject(): ObjectEntry | undefined {
    const entry = this.selected();
    return entry?.kind === 'object' && !isContainerKey(entry.key) ? entry : undefined;
  }

  private findObject(path: ObjectPath): ObjectEntry | undefined {
    const listing = this.orchestrator.cache.get(this.stack.current());
    if (listing.status !== 'loaded' && listing.status !== 'failed') return undefined;
    for (const entry of listing.items) {
      if (entry.kind === 'object' && entry.key === path) return entry;
    }
    return undefined;
  }

  /**
   * Keep the cursor on a visible row once the listing has settled.
   */
  private clampCursor(): void {
    const listing = this.orchestrator.cache.get(this.stack.current());
    if (listing.status !== 'loaded' && listing.status !== 'failed') return;

    const count = this.visible().length;
    const cursor = this.stack.getCursor();
    if (count === 0) {
      this.stack.setCursor(undefined);
    } else if (cursor === undefined) {
      this.stack.setCursor(0);
    } else if (cursor >= count) {
      this.stack.setCursor(count - 1);
    }
  }

  private moveCursor(move: CursorMove): void {
    const count = this.visible().length;
    if (count === 0) return;

    const last = count - 1;
    const cursor = Math.min(this.stack.getCursor() ?? 0, last);
    let next = cursor;
    switch (move) {
      case 'next':
        next = cursor + 1;
        break;
      case 'prev':
        next = cursor - 1;
        break;
      case 'first':
        next = 0;
        break;
      case 'last':
        next = last;
        break;
      case 'pageDown':
        next = cursor + this.pageRows;
        break;
      case 'pageUp':
        next = cursor - this.pageRows;
        break;
    }

    if (next > last && cursor === last) {
      this.orchestrator.loadMore(this.stack.current());
    }
    this.stack.setCursor(Math.max(0, Math.min(next, last)));
    this.followSelection();
  }

  /**
   * An open detail pane tracks the selected object.
   */
  private followSelection(): void {
    if (this.pane.kind !== 'detail') return;
    const entry = this.selectedObject();
    if (!entry || entry.key === this.pane.path) return;
    this.pane = { kind: 'detail', path: entry.key, tab: this.pane.tab, scroll: 0 };
    this.orchestrator.ensureDetail(entry.key);
  }

  private pushSelection(): void {
    const entry = this.selected();
    if (!entry) return;

    if (entry.kind === 'container' || isContainerKey(entry.key)) {
      this.leaveContainer();
      this.stack.push(entry.key);
      this.enterContainer();
      return;
    }
    this.pane = { kind: 'detail', path: entry.key, tab: 'detail', scroll: 0 };
    this.orchestrator.ensureDetail(entry.key);
  }

  /**
   * Containers being left lose any load still in flight, so a late page is
   * dropped instead of landing in a listing nobody is looking at.
   */
  private leaveContainer(leaving: ContainerKey[]): void {
    for (const key of leaving) {
      const listing = this.orchestrator.cache.get(key);
      if (listing.status === 'loading' || (listing.status === 'loaded' && listing.loadingMore !== undefined)) {
        this.orchestrator.cache.invalidate(key);
      }
    }
    this.closePane();
    if (this.input.filter) this.input = { ...this.input, filter: '' };
  }

  private enterContainer(): void {
    this.orchestrator.ensureLoaded(this.stack.current());
    this.clampCursor();
  }

  private closePane(): void {
    if (this.pane.kind === 'preview') this.pipeline.dismiss('preview');
    this.pane = { kind: 'none' };
  }

  /**
   * Object the job commands act on: the selection, else the object in the pane.
   */
  private targetObject(): ObjectPath | undefined {
    const entry = this.selectedObject();
    if (entry) return entry.key;
    return this.pane.kind === 'none' ? undefined : this.pane.path;
  }

  private previewHints(path: ObjectPath): PreviewHints {
    const detail = this.orchestrator.detail(path);
    if (detail.status === 'loaded') {
      const { size, contentType } = detail.detail.metadata;
      return { size, contentType };
    }
    const entry = this.findObject(path);
    return entry ? { size: entry.size } : {};
  }

  private startPreview(): void {
    const path = this.targetObject();
    if (!path) {
      this.notify('info', 'Select an object to preview');
      return;
    }
    this.pane = { kind: 'preview', path, scroll: 0 };
    this.pipeline.startPreview(path, this.previewHints(path));
  }

  private startDownload(name: string): void {
    const path = this.targetObject();
    if (!path) {
      this.notify('info', 'Select an object to download');
      return;
    }
    const size = this.previewHints(path).size;
    const fileName = name.trim() || baseName(path);

    void this.files.resolveDownload(fileName).then(
      (destination) => this.channel.post({ type: 'downloadResolved', path, size, destination }),
      (err: unknown) => this.postError(toLocalIOError(err, fileName))
    );
  }

  private startUpload(source: string): void {
    const container = this.stack.current();
    if (container === ACCOUNT_ROOT) {
      this.notify('error', 'Open a bucket before uploading');
      return;
    }

    void this.files.resolveUpload(source).then(
      (resolved) =>
        this.channel.post({
          type: 'uploadResolved',
          target: childObjectPath(container, basename(resolved.path)),
          source: resolved
        }),
      (err: unknown) => this.postError(toLocalIOError(err, source))
    );
  }

  private cancelJobs(): void {
    const cancelled = this.pipeline.cancel();
    if (cancelled.length === 0) {
      this.notify('info', 'No running job');
      return;
    }
    const summary = cancelled.map((job) => `${job.kind} of ${toS3Uri(job.target)}`).join(', ');
    this.notify('info', `Cancelled ${summary}`);
  }

  private copy(target: CopyTarget): void {
    const entry = this.selected();
    const path = entry?.key ?? this.stack.current();
    if (path === ACCOUNT_ROOT) {
      this.notify('info', 'Nothing selected to copy');
      return;
    }

    let etag = entry?.kind === 'object' ? entry.etag : undefined;
    if (!etag && this.pane.kind === 'detail' && this.pane.path === path) {
      const detail = this.orchestrator.detail(path);
      if (detail.status === 'loaded') etag = detail.detail.metadata.etag;
    }

    const value = copyValue(target, path, this.region, etag);
    if (value === undefined) {
      this.notify('error', 'No ETag for this entry');
      return;
    }

    void this.platform.copyToClipboard(value).then(
      () => this.postNotification({ level: 'success', message: `Copied ${value}` }),
      (err: unknown) => this.postPlatformError('Copy to clipboard failed', err)
    );
  }

  private openConsole(): void {
    const path = this.selected()?.key ?? this.stack.current();
    const url = toConsoleUrl(path, this.region);

    void this.platform.openUrl(url).then(
      () => this.postNotification({ level: 'info', message: `Opened ${url}` }),
      (err: unknown) => this.postPlatformError('Could not open the browser', err)
    );
  }

  private notify(level: Notification['level'], message: string): void {
    this.notification = { level, message };
    if (level === 'error') this.log(message);
  }

  private notifyError(error: StorageError): void {
    const { title, hint } = describeError(error);
    this.notification = hint ? { level: 'error', message: title, hint } : { level: 'error', message: title };
  }

  private postNotification(notification: Notification): void {
    this.channel.post({ type: 'notify', notification });
  }

  private postError(error: StorageError): void {
    this.log(error.message);
    const { title, hint } = describeError(error);
    this.postNotification(hint ? { level: 'error', message: title, hint } : { level: 'error', message: title });
  }

  private postPlatformError(message: string, err: unknown): void {
    const reason = err instanceof Error ? err.message : String(err);
    this.log(`${message}: ${reason}`);
    this.postNotification({ level: 'error', message: `${message}: ${reason}` });
  }
}
