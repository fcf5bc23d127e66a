/**
 * Storage Gateway contract.
 *
 * Every operation is asynchronous and takes an optional `AbortSignal`.
 * Implementations reject only with `StorageError`.
 */

import type {
  ContainerKey,
  ListPage,
  ObjectMetadata,
  ObjectPath,
  ObjectVersion
} from './types.js';

/**
 * Receives the running total of bytes moved. Calls are monotonically increasing.
 */
export type ProgressSink = (bytesTransferred: number) => void;

export interface CallOptions {
  signal?: AbortSignal;
}

export interface StorageGateway {
  listChildren(key: ContainerKey, pageToken: string | undefined, options?: CallOptions): Promise<ListPage>;

  /**
   * Fails with `NotAnObject` for container keys.
   */
  headObject(path: ObjectPath, options?: CallOptions): Promise<ObjectMetadata>;

  listVersions(path: ObjectPath, options?: CallOptions): Promise<ObjectVersion[]>;

  /**
   * First `maxBytes` bytes of the object (fewer for short objects).
   */
  fetchPrefix(path: ObjectPath, maxBytes: number, options?: CallOptions): Promise<Uint8Array>;

  /**
   * Stream the object to `destinationPath`. A partial file is left in place
   * when the transfer fails or is aborted. Resolves to the byte count written.
   */
  downloadTo(
    path: ObjectPath,
    destinationPath: string,
    progress: ProgressSink,
    options?: CallOptions
  ): Promise<number>;

  /**
   * Stream a local file to `path`. Resolves to the byte count sent.
   */
  upload(
    sourcePath: string,
    path: ObjectPath,
    progress: ProgressSink,
    options?: CallOptions
  ): Promise<number>;
}
