/**
 * In-memory Storage Gateway.
 *
 * Holds a flat map of object paths to contents and answers every gateway
 * operation from it. Individual operations can be held until released and
 * failures can be queued, which makes every interleaving of completions
 * reproducible.
 */

import { readFile, writeFile, appendFile } from 'node:fs/promises';

import {
  ACCOUNT_ROOT,
  baseName,
  bucketRoot,
  isContainerKey,
  splitPath
} from '../../src/container-key.js';
import { StorageError, toLocalIOError } from '../../src/errors.js';
import type { CallOptions, ProgressSink, StorageGateway } from '../../src/storage-gateway.js';
import type {
  ContainerKey,
  Entry,
  ListPage,
  ObjectMetadata,
  ObjectPath,
  ObjectVersion
} from '../../src/types.js';

export type GatewayOperation =
  | 'listChildren'
  | 'headObject'
  | 'listVersions'
  | 'fetchPrefix'
  | 'downloadTo'
  | 'upload';

export interface GatewayCall {
  op: GatewayOperation;
  target: string;
  pageToken?: string;
}

export interface HeldCall extends GatewayCall {
  release(): void;
  fail(error: StorageError): void;
}

export interface MemoryGatewayOptions {
  pageSize?: number;
  /** Bytes per progress step for downloads and uploads */
  chunkSize?: number;
  /** Buckets that exist without any objects */
  emptyBuckets?: string[];
}

interface StoredObject {
  body: Uint8Array;
  lastModified: Date;
  contentType?: string;
}

const encoder = new TextEncoder();

function abortError(): Error {
  const err = new Error('The operation was aborted');
  err.name = 'AbortError';
  return err;
}

export class MemoryGateway implements StorageGateway {
  readonly calls: GatewayCall[] = [];
  readonly held: HeldCall[] = [];

  private objects = new Map<ObjectPath, StoredObject>();
  private buckets = new Set<string>();
  private holding = new Set<GatewayOperation>();
  private failures = new Map<GatewayOperation, StorageError[]>();
  private readonly pageSize: number;
  private readonly chunkSize: number;

  constructor(contents: Record<ObjectPath, string | Uint8Array> = {}, options: MemoryGatewayOptions = {}) {
    this.pageSize = options.pageSize ?? 1000;
    this.chunkSize = options.chunkSize ?? 64 * 1024;
    for (const bucket of options.emptyBuckets ?? []) {
      this.buckets.add(bucket);
    }
    for (const [path, body] of Object.entries(contents)) {
      this.put(path, body);
    }
  }

  put(path: ObjectPath, body: string | Uint8Array, contentType?: string): void {
    const { bucket } = splitPath(path);
    this.buckets.add(bucket);
    this.objects.set(path, {
      body: typeof body === 'string' ? encoder.encode(body) : body,
      lastModified: new Date(0),
      contentType
    });
  }

  /**
   * Park every later call of `op` in `held` until released.
   */
  hold(op: GatewayOperation): void {
    this.holding.add(op);
  }

  resume(op: GatewayOperation): void {
    this.holding.delete(op);
  }

  /**
   * Fail the next call of `op` with `error`. Queued failures apply in order.
   */
  failNext(op: GatewayOperation, error: StorageError): void {
    const queue = this.failures.get(op) ?? [];
    queue.push(error);
    this.failures.set(op, queue);
  }

  callsOf(op: GatewayOperation): GatewayCall[] {
    return this.calls.filter((call) => call.op === op);
  }

  async listChildren(key: ContainerKey, pageToken: string | undefined, options?: CallOptions): Promise<ListPage> {
    await this.enter({ op: 'listChildren', target: key, pageToken }, options);

    const all = key === ACCOUNT_ROOT ? this.bucketEntries() : this.childEntries(key);
    if (key !== ACCOUNT_ROOT && all.length === 0 && !this.buckets.has(splitPath(key).bucket)) {
      throw new StorageError('NotFound', `List ${key}: NoSuchBucket`);
    }

    const start = pageToken ? Number(pageToken) : 0;
    const end = start + this.pageSize;
    const nextPageToken = end < all.length ? String(end) : undefined;
    return { items: all.slice(start, end), nextPageToken, hasMore: nextPageToken !== undefined };
  }

  async headObject(path: ObjectPath, options?: CallOptions): Promise<ObjectMetadata> {
    this.requireObject(path);
    await this.enter({ op: 'headObject', target: path }, options);
    const object = this.found(path);
    return {
      name: baseName(path),
      path,
      size: object.body.byteLength,
      lastModified: object.lastModified,
      etag: `etag-${object.body.byteLength}`,
      contentType: object.contentType,
      metadata: {}
    };
  }

  async listVersions(path: ObjectPath, options?: CallOptions): Promise<ObjectVersion[]> {
    this.requireObject(path);
    await this.enter({ op: 'listVersions', target: path }, options);
    const object = this.found(path);
    return [
      {
        versionId: 'null',
        size: object.body.byteLength,
        lastModified: object.lastModified,
        isLatest: true
      }
    ];
  }

  async fetchPrefix(path: ObjectPath, maxBytes: number, options?: CallOptions): Promise<Uint8Array> {
    this.requireObject(path);
    await this.enter({ op: 'fetchPrefix', target: path }, options);
    return this.found(path).body.slice(0, Math.max(0, maxBytes));
  }

  async downloadTo(
    path: ObjectPath,
    destinationPath: string,
    progress: ProgressSink,
    options?: CallOptions
  ): Promise<number> {
    this.requireObject(path);
    await this.enter({ op: 'downloadTo', target: path }, options);
    const { body } = this.found(path);

    try {
      await writeFile(destinationPath, new Uint8Array(0));
      let written = 0;
      while (written < body.byteLength) {
        if (options?.signal?.aborted) throw abortError();
        const chunk = body.subarray(written, written + this.chunkSize);
        await appendFile(destinationPath, chunk);
        written += chunk.byteLength;
        progress(written);
      }
      return written;
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new StorageError('Transient', `Download ${path}: request aborted`, { cause: err });
      }
      throw toLocalIOError(err, destinationPath);
    }
  }

  async upload(
    sourcePath: string,
    path: ObjectPath,
    progress: ProgressSink,
    options?: CallOptions
  ): Promise<number> {
    this.requireObject(path);
    let body: Uint8Array;
    try {
      body = new Uint8Array(await readFile(sourcePath));
    } catch (err) {
      throw toLocalIOError(err, sourcePath);
    }

    await this.enter({ op: 'upload', target: path }, options);
    for (let sent = 0; sent < body.byteLength; ) {
      sent = Math.min(body.byteLength, sent + this.chunkSize);
      progress(sent);
    }
    this.put(path, body);
    return body.byteLength;
  }

  private bucketEntries(): Entry[] {
    return [...this.buckets]
      .sort()
      .map((name): Entry => ({ kind: 'container', name, key: bucketRoot(name) }));
  }

  private childEntries(key: ContainerKey): Entry[] {
    const byKey = new Map<string, Entry>();
    for (const [path, object] of this.objects) {
      if (!path.startsWith(key) || path === key) continue;
      const rest = path.slice(key.length);
      const slash = rest.indexOf('/');
      if (slash === -1) {
        byKey.set(path, {
          kind: 'object',
          name: rest,
          key: path,
          size: object.body.byteLength,
          lastModified: object.lastModified
        });
      } else {
        const childKey = `${key}${rest.slice(0, slash + 1)}`;
        byKey.set(childKey, { kind: 'container', name: rest.slice(0, slash), key: childKey });
      }
    }
    return [...byKey.keys()].sort().flatMap((k) => {
      const entry = byKey.get(k);
      return entry ? [entry] : [];
    });
  }

  private requireObject(path: ObjectPath): void {
    const { bucket, key } = splitPath(path);
    if (isContainerKey(path) || !bucket || !key) {
      throw new StorageError('NotAnObject', `${path || '/'} is not an object`);
    }
  }

  private found(path: ObjectPath): StoredObject {
    const object = this.objects.get(path);
    if (!object) throw new StorageError('NotFound', `${path}: NoSuchKey`);
    return object;
  }

  private async enter(call: GatewayCall, options?: CallOptions): Promise<void> {
    this.calls.push(call);

    if (this.holding.has(call.op)) {
      await new Promise<void>((resolve, reject) => {
        const signal = options?.signal;
        const onAbort = (): void => {
          reject(new StorageError('Transient', `${call.op} ${call.target}: request aborted`));
        };
        signal?.addEventListener('abort', onAbort, { once: true });
        this.held.push({
          ...call,
          release: () => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
          },
          fail: (error) => {
            signal?.removeEventListener('abort', onAbort);
            reject(error);
          }
        });
      });
    }

    const failure = this.failures.get(call.op)?.shift();
    if (failure) throw failure;
  }
}
