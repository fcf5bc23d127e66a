/**
 * View Model
 *
 * Pure projection of engine state into a renderable frame. Performs no I/O
 * and keeps no state of its own; the shell decides how a frame is drawn.
 */

import { ACCOUNT_ROOT, pathSegments, toS3Uri } from './container-key.js';
import { copyChoices, type CopyChoice } from './copy-targets.js';
import { describeError, type StorageError } from './errors.js';
import { formatBytes, formatDateTime, formatPercent } from './format.js';
import type { PreviewContent } from './content-detect.js';
import {
  COPY_TARGETS,
  activeFilter,
  helpFor,
  type HelpEntry,
  type InputState
} from './input-machine.js';
import type { PipelineJob } from './pipeline.js';
import type {
  ContainerKey,
  DetailState,
  Entry,
  ListingState,
  ObjectPath
} from './types.js';

export type DetailTab = 'detail' | 'versions';

export type PaneState =
  | { kind: 'none' }
  | { kind: 'detail'; path: ObjectPath; tab: DetailTab; scroll: number }
  | { kind: 'preview'; path: ObjectPath; scroll: number };

export type NotificationLevel = 'info' | 'success' | 'error';

export interface Notification {
  level: NotificationLevel;
  message: string;
  hint?: string;
}

export interface ViewSnapshot {
  /** Navigation stack, root first */
  stack: ContainerKey[];
  listing: ListingState;
  cursor: number | undefined;
  input: InputState;
  pane: PaneState;
  detail: DetailState;
  jobs: Array<Readonly<PipelineJob>>;
  region: string;
  notification?: Notification;
}

export interface VisibleEntry {
  entry: Entry;
  /** Start and end of the first filter match in the name */
  match?: [number, number];
}

export interface FrameRow {
  name: string;
  isContainer: boolean;
  size: string;
  modified: string;
  selected: boolean;
  match?: [number, number];
}

export type ListStatus =
  | { kind: 'loading' }
  | { kind: 'empty'; message: string }
  | { kind: 'error'; message: string; hint?: string }
  | { kind: 'ready' };

export interface DetailField {
  label: string;
  value: string;
}

export type PaneView =
  | {
      kind: 'detail';
      title: string;
      tab: DetailTab;
      scroll: number;
      loading: boolean;
      fields: DetailField[];
      versions: string[];
      error?: { message: string; hint?: string };
    }
  | {
      kind: 'preview';
      title: string;
      scroll: number;
      status: 'loading' | 'ready' | 'failed' | 'cancelled';
      content?: PreviewContent;
      progress?: string;
      error?: { message: string; hint?: string };
    };

export type DialogView =
  | { kind: 'confirm'; message: string }
  | { kind: 'prompt'; title: string; text: string; placeholder: string }
  | { kind: 'copyMenu'; selected: number; choices: CopyChoice[] };

export interface Frame {
  breadcrumb: string[];
  location: string;
  rows: FrameRow[];
  cursor?: number;
  status: ListStatus;
  /** Row shown after the last entry: more pages exist or one is loading */
  footer?: string;
  filter?: { text: string; editing: boolean; matches: number };
  pane?: PaneView;
  transfers: string[];
  dialog?: DialogView;
  help?: HelpEntry[];
  notification?: Notification;
  hints: string;
}

/**
 * Entries of a listing that pass the filter (case-sensitive substring).
 */
export function visibleEntries(listing: ListingState, filter: string): VisibleEntry[] {
  const items = listing.status === 'loaded' || listing.status === 'failed' ? listing.items : [];
  if (!filter) return items.map((entry) => ({ entry }));

  const visible: VisibleEntry[] = [];
  for (const entry of items) {
    const idx = entry.name.indexOf(filter);
    if (idx !== -1) visible.push({ entry, match: [idx, idx + filter.length] });
  }
  return visible;
}

export function breadcrumb(stack: ContainerKey[]): string[] {
  const current = stack[stack.length - 1] ?? ACCOUNT_ROOT;
  return pathSegments(current);
}

function toRow(visible: VisibleEntry, selected: boolean): FrameRow {
  const { entry } = visible;
  if (entry.kind === 'container') {
    return { name: `${entry.name}/`, isContainer: true, size: '', modified: '', selected, match: visible.match };
  }
  return {
    name: entry.name,
    isContainer: false,
    size: formatBytes(entry.size),
    modified: formatDateTime(entry.lastModified),
    selected,
    match: visible.match
  };
}

function errorView(error: StorageError): { message: string; hint?: string } {
  const { title, hint } = describeError(error);
  return hint ? { message: title, hint } : { message: title };
}

function listStatus(listing: ListingState, visibleCount: number, filter: string): ListStatus {
  switch (listing.status) {
    case 'notLoaded':
    case 'loading':
      return { kind: 'loading' };
    case 'failed':
      return { kind: 'error', ...errorView(listing.error) };
    case 'loaded':
      if (listing.items.length === 0) return { kind: 'empty', message: 'No items' };
      if (visibleCount === 0) return { kind: 'empty', message: `No names contain "${filter}"` };
      return { kind: 'ready' };
  }
}

function listFooter(listing: ListingState): string | undefined {
  if (listing.status !== 'loaded') return undefined;
  if (listing.loadingMore !== undefined) return 'Loading more…';
  if (listing.hasMore) return 'More items available, scroll down to load';
  return undefined;
}

function detailPane(pane: Extract<PaneState, { kind: 'detail' }>, detail: DetailState): PaneView {
  const base = { kind: 'detail' as const, title: toS3Uri(pane.path), tab: pane.tab, scroll: pane.scroll };

  switch (detail.status) {
    case 'notLoaded':
    case 'loading':
      return { ...base, loading: true, fields: [], versions: [] };
    case 'failed':
      return { ...base, loading: false, fields: [], versions: [], error: errorView(detail.error) };
    case 'loaded': {
      const { metadata, versions } = detail.detail;
      const fields: DetailField[] = [
        { label: 'Name', value: metadata.name },
        { label: 'Key', value: metadata.path },
        { label: 'Size', value: `${formatBytes(metadata.size)} (${metadata.size} bytes)` },
        { label: 'Last Modified', value: formatDateTime(metadata.lastModified) },
        { label: 'ETag', value: metadata.etag ?? '' },
        { label: 'Content-Type', value: metadata.contentType ?? '' },
        { label: 'Storage Class', value: metadata.storageClass ?? 'STANDARD' }
      ];
      if (metadata.versionId) fields.push({ label: 'Version ID', value: metadata.versionId });
      for (const [key, value] of Object.entries(metadata.metadata)) {
        fields.push({ label: `x-amz-meta-${key}`, value });
      }

      if (!Array.isArray(versions)) {
        return { ...base, loading: false, fields, versions: [], error: errorView(versions) };
      }
      const lines = versions.map(
        (v) =>
          `${v.isLatest ? '*' : ' '} ${v.versionId}  ${formatBytes(v.size)}  ${formatDateTime(v.lastModified)}`
      );
      return { ...base, loading: false, fields, versions: lines };
    }
  }
}

function transferLine(job: Readonly<PipelineJob>): string {
  const verb = job.kind === 'upload' ? 'Uploading' : 'Downloading';
  const total = job.totalBytes !== undefined ? ` / ${formatBytes(job.totalBytes)}` : '';
  const percent = formatPercent(job.bytes, job.totalBytes);
  return `${verb} ${toS3Uri(job.target)}  ${formatBytes(job.bytes)}${total}${percent ? ` (${percent})` : ''}`;
}

function previewPane(pane: Extract<PaneState, { kind: 'preview' }>, job: Readonly<PipelineJob> | undefined): PaneView {
  const title = toS3Uri(pane.path);
  if (!job || job.target !== pane.path) {
    return { kind: 'preview', title, scroll: pane.scroll, status: 'loading' };
  }
  switch (job.status) {
    case 'running':
      return { kind: 'preview', title, scroll: pane.scroll, status: 'loading', progress: formatBytes(job.bytes) };
    case 'done':
      return { kind: 'preview', title, scroll: pane.scroll, status: 'ready', content: job.preview };
    case 'cancelled':
      return { kind: 'preview', title, scroll: pane.scroll, status: 'cancelled' };
    case 'failed':
      return {
        kind: 'preview',
        title,
        scroll: pane.scroll,
        status: 'failed',
        error: job.error ? errorView(job.error) : undefined
      };
  }
}

function selectedEntry(visible: VisibleEntry[], cursor: number | undefined): Entry | undefined {
  return cursor === undefined ? undefined : visible[cursor]?.entry;
}

function dialogView(snapshot: ViewSnapshot, selected: Entry | undefined): DialogView | undefined {
  const { mode } = snapshot.input;
  switch (mode.kind) {
    case 'confirm':
      return { kind: 'confirm', message: mode.message };
    case 'prompt':
      return mode.purpose === 'saveAs'
        ? {
            kind: 'prompt',
            title: 'Save as',
            text: mode.text,
            placeholder: selected?.name ?? ''
          }
        : {
            kind: 'prompt',
            title: 'Upload local file',
            text: mode.text,
            placeholder: 'path/to/file'
          };
    case 'copyMenu': {
      const path = selected?.key ?? snapshot.stack[snapshot.stack.length - 1] ?? ACCOUNT_ROOT;
      const etag = selected?.kind === 'object' ? selected.etag : undefined;
      return {
        kind: 'copyMenu',
        selected: mode.selected,
        choices: copyChoices(COPY_TARGETS, path, snapshot.region, etag)
      };
    }
    default:
      return undefined;
  }
}

const HINTS: Record<InputState['mode']['kind'], string> = {
  browse: 'j/k move · l open · h back · p preview · s download · / filter · ? help · q quit',
  filter: 'type to filter · Enter apply · Esc restore',
  confirm: 'y confirm · n cancel',
  prompt: 'Enter submit · Esc cancel',
  copyMenu: 'j/k select · Enter copy · Esc close',
  help: '? / Esc close'
};

export function buildFrame(snapshot: ViewSnapshot): Frame {
  const filter = activeFilter(snapshot.input);
  const visible = visibleEntries(snapshot.listing, filter);
  const cursor =
    snapshot.cursor !== undefined && snapshot.cursor < visible.length ? snapshot.cursor : undefined;
  const selected = selectedEntry(visible, cursor);
  const { mode } = snapshot.input;

  const location = snapshot.stack[snapshot.stack.length - 1] ?? ACCOUNT_ROOT;
  const frame: Frame = {
    breadcrumb: breadcrumb(snapshot.stack),
    location: location === ACCOUNT_ROOT ? 'Buckets' : toS3Uri(location),
    rows: visible.map((v, i) => toRow(v, i === cursor)),
    cursor,
    status: listStatus(snapshot.listing, visible.length, filter),
    footer: listFooter(snapshot.listing),
    transfers: snapshot.jobs
      .filter((job) => job.kind !== 'preview' && job.status === 'running')
      .map(transferLine),
    hints: HINTS[mode.kind]
  };

  if (filter || mode.kind === 'filter') {
    frame.filter = { text: filter, editing: mode.kind === 'filter', matches: visible.length };
  }

  if (snapshot.pane.kind === 'detail') {
    frame.pane = detailPane(snapshot.pane, snapshot.detail);
  } else if (snapshot.pane.kind === 'preview') {
    frame.pane = previewPane(
      snapshot.pane,
      snapshot.jobs.find((job) => job.kind === 'preview')
    );
  }

  const dialog = dialogView(snapshot, selected);
  if (dialog) frame.dialog = dialog;
  if (mode.kind === 'help') frame.help = helpFor('browse');
  if (snapshot.notification) frame.notification = snapshot.notification;

  return frame;
}
