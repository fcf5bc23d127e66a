/**
 * Core data model shared by every engine component.
 */

import type { StorageError } from './errors.js';

/**
 * Identifies a container: `''` is the account root, `'bucket/'` a bucket and
 * `'bucket/a/b/'` a prefix. Every non-root key ends with `/`.
 */
export type ContainerKey = string;

/**
 * Full path of an object: `'bucket/a/b/file.txt'`.
 */
export type ObjectPath = string;

export type RequestToken = number;

export interface ContainerEntry {
  kind: 'container';
  /** Last path segment, without the trailing delimiter */
  name: string;
  key: ContainerKey;
}

export interface ObjectEntry {
  kind: 'object';
  /** Key relative to the parent container */
  name: string;
  key: ObjectPath;
  size: number;
  lastModified?: Date;
  etag?: string;
  storageClass?: string;
}

export type Entry = ContainerEntry | ObjectEntry;

export interface ListPage {
  items: Entry[];
  nextPageToken?: string;
  hasMore: boolean;
}

export type ListingState =
  | { status: 'notLoaded' }
  | { status: 'loading'; token: RequestToken }
  | {
      status: 'loaded';
      items: Entry[];
      nextPageToken?: string;
      hasMore: boolean;
      /** Token of the follow-up page currently in flight */
      loadingMore?: RequestToken;
    }
  | {
      status: 'failed';
      error: StorageError;
      /** Items loaded before the failing page, empty when the first page failed */
      items: Entry[];
    };

export interface ObjectMetadata {
  name: string;
  path: ObjectPath;
  size: number;
  lastModified?: Date;
  etag?: string;
  contentType?: string;
  storageClass?: string;
  versionId?: string;
  metadata: Record<string, string>;
}

export interface ObjectVersion {
  versionId: string;
  size: number;
  lastModified?: Date;
  etag?: string;
  isLatest: boolean;
}

export interface ObjectDetail {
  metadata: ObjectMetadata;
  /** Version history, or the error that prevented loading it */
  versions: ObjectVersion[] | StorageError;
}

export type DetailState =
  | { status: 'notLoaded' }
  | { status: 'loading'; token: RequestToken }
  | { status: 'loaded'; detail: ObjectDetail }
  | { status: 'failed'; error: StorageError };
