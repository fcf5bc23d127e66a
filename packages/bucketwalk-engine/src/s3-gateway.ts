/**
 * Storage Gateway backed by `@aws-sdk/client-s3`.
 *
 * The client is injected already configured (region, endpoint, credentials);
 * this class only issues commands and converts results and failures into the
 * engine's model.
 */

import { createReadStream, createWriteStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import {
  GetObjectCommand,
  HeadObjectCommand,
  ListBucketsCommand,
  ListObjectVersionsCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3ServiceException,
  type GetObjectCommandOutput,
  type S3Client
} from '@aws-sdk/client-s3';

import {
  ACCOUNT_ROOT,
  baseName,
  bucketRoot,
  isContainerKey,
  splitPath
} from './container-key.js';
import { createDeadline, type Deadline } from './deadline.js';
import { StorageError, toLocalIOError, toStorageError } from './errors.js';
import type { CallOptions, ProgressSink, StorageGateway } from './storage-gateway.js';
import type {
  ContainerKey,
  Entry,
  ListPage,
  ObjectMetadata,
  ObjectPath,
  ObjectVersion
} from './types.js';

export interface S3GatewayOptions {
  /** MaxKeys for object listings */
  pageSize?: number;
  requestTimeoutMs?: number;
}

const DEFAULT_PAGE_SIZE = 1000;
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const DELIMITER = '/';

export function normalizeEtag(etag: string | undefined): string | undefined {
  if (!etag) return undefined;
  return etag.replace(/^"+|"+$/g, '');
}

function isInvalidRange(err: unknown): boolean {
  return (
    err instanceof S3ServiceException &&
    (err.name === 'InvalidRange' || err.$metadata?.httpStatusCode === 416)
  );
}

async function* countChunks(
  source: AsyncIterable<Uint8Array>,
  progress: ProgressSink,
  deadline: Deadline
): AsyncGenerator<Uint8Array> {
  let total = 0;
  for await (const chunk of source) {
    total += chunk.byteLength;
    deadline.refresh();
    progress(total);
    yield chunk;
  }
}

function toNodeReadable(body: NonNullable<GetObjectCommandOutput['Body']>): Readable {
  if (body instanceof Readable) return body;
  return Readable.fromWeb(body.transformToWebStream());
}

export class S3StorageGateway implements StorageGateway {
  private readonly pageSize: number;
  private readonly requestTimeoutMs: number;

  constructor(
    private readonly client: S3Client,
    options: S3GatewayOptions = {}
  ) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async listChildren(
    key: ContainerKey,
    pageToken: string | undefined,
    options?: CallOptions
  ): Promise<ListPage> {
    if (key === ACCOUNT_ROOT) {
      return this.listBuckets(pageToken, options);
    }
    if (!isContainerKey(key)) {
      throw new StorageError('NotFound', `${key} is not a container`);
    }

    const { bucket, key: prefix } = splitPath(key);
    const response = await this.withDeadline(`List ${key}`, options, (abortSignal) =>
      this.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix || undefined,
          Delimiter: DELIMITER,
          MaxKeys: this.pageSize,
          ContinuationToken: pageToken
        }),
        { abortSignal }
      )
    );

    const merged: Array<{ sortKey: string; entry: Entry }> = [];

    for (const common of response.CommonPrefixes ?? []) {
      if (!common.Prefix) continue;
      const name = common.Prefix.slice(prefix.length, -DELIMITER.length);
      merged.push({
        sortKey: common.Prefix,
        entry: { kind: 'container', name, key: `${bucket}/${common.Prefix}` }
      });
    }

    for (const object of response.Contents ?? []) {
      // Skip the zero-length marker some tools create for "folders"
      if (!object.Key || object.Key === prefix) continue;
      merged.push({
        sortKey: object.Key,
        entry: {
          kind: 'object',
          name: object.Key.slice(prefix.length),
          key: `${bucket}/${object.Key}`,
          size: object.Size ?? 0,
          lastModified: object.LastModified,
          etag: normalizeEtag(object.ETag),
          storageClass: object.StorageClass
        }
      });
    }

    merged.sort((a, b) => (a.sortKey < b.sortKey ? -1 : a.sortKey > b.sortKey ? 1 : 0));

    const nextPageToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    return {
      items: merged.map((m) => m.entry),
      nextPageToken,
      hasMore: nextPageToken !== undefined
    };
  }

  async headObject(path: ObjectPath, options?: CallOptions): Promise<ObjectMetadata> {
    const { bucket, key } = this.requireObject(path);
    const response = await this.withDeadline(`Head ${path}`, options, (abortSignal) =>
      this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }), { abortSignal })
    );

    return {
      name: baseName(path),
      path,
      size: response.ContentLength ?? 0,
      lastModified: response.LastModified,
      etag: normalizeEtag(response.ETag),
      contentType: response.ContentType,
      storageClass: response.StorageClass,
      versionId: response.VersionId,
      metadata: response.Metadata ?? {}
    };
  }

  async listVersions(path: ObjectPath, options?: CallOptions): Promise<ObjectVersion[]> {
    const { bucket, key } = this.requireObject(path);
    const versions: ObjectVersion[] = [];
    let keyMarker: string | undefined;
    let versionIdMarker: string | undefined;

    do {
      const response = await this.withDeadline(`List versions of ${path}`, options, (abortSignal) =>
        this.client.send(
          new ListObjectVersionsCommand({
            Bucket: bucket,
            Prefix: key,
            KeyMarker: keyMarker,
            VersionIdMarker: versionIdMarker
          }),
          { abortSignal }
        )
      );

      for (const version of response.Versions ?? []) {
        // Prefix matching also returns longer keys
        if (version.Key !== key) continue;
        versions.push({
          versionId: version.VersionId ?? 'null',
          size: version.Size ?? 0,
          lastModified: version.LastModified,
          etag: normalizeEtag(version.ETag),
          isLatest: version.IsLatest ?? false
        });
      }

      const truncated = response.IsTruncated === true && response.NextKeyMarker === key;
      keyMarker = truncated ? response.NextKeyMarker : undefined;
      versionIdMarker = truncated ? response.NextVersionIdMarker : undefined;
    } while (keyMarker !== undefined);

    return versions;
  }

  async fetchPrefix(path: ObjectPath, maxBytes: number, options?: CallOptions): Promise<Uint8Array> {
    const { bucket, key } = this.requireObject(path);
    if (maxBytes <= 0) return new Uint8Array(0);

    const context = `Read ${path}`;
    const deadline = createDeadline(this.requestTimeoutMs, options?.signal);
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: bucket, Key: key, Range: `bytes=0-${maxBytes - 1}` }),
        { abortSignal: deadline.signal }
      );
      if (!response.Body) return new Uint8Array(0);
      const bytes = await response.Body.transformToByteArray();
      // Some providers ignore Range
      return bytes.byteLength > maxBytes ? bytes.subarray(0, maxBytes) : bytes;
    } catch (err) {
      // A range request against an empty object
      if (isInvalidRange(err)) return new Uint8Array(0);
      throw this.wrap(err, context, deadline);
    } finally {
      deadline.dispose();
    }
  }

  async downloadTo(
    path: ObjectPath,
    destinationPath: string,
    progress: ProgressSink,
    options?: CallOptions
  ): Promise<number> {
    const { bucket, key } = this.requireObject(path);
    const context = `Download ${path}`;
    const deadline = createDeadline(this.requestTimeoutMs, options?.signal);
    let written = 0;

    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }), {
        abortSignal: deadline.signal
      });

      const sink = createWriteStream(destinationPath);
      if (!response.Body) {
        await new Promise<void>((resolve, reject) => {
          sink.once('error', reject);
          sink.end(resolve);
        });
        progress(0);
        return 0;
      }

      await pipeline(
        toNodeReadable(response.Body),
        (source: AsyncIterable<Uint8Array>) =>
          countChunks(
            source,
            (total) => {
              written = total;
              progress(total);
            },
            deadline
          ),
        sink,
        { signal: deadline.signal }
      );
      return written;
    } catch (err) {
      throw this.wrap(err, context, deadline, destinationPath);
    } finally {
      deadline.dispose();
    }
  }

  async upload(
    sourcePath: string,
    path: ObjectPath,
    progress: ProgressSink,
    options?: CallOptions
  ): Promise<number> {
    const { bucket, key } = this.requireObject(path);

    let size: number;
    try {
      const info = await stat(sourcePath);
      if (!info.isFile()) {
        throw new StorageError('LocalIOError', `${sourcePath}: not a regular file`);
      }
      size = info.size;
    } catch (err) {
      throw toLocalIOError(err, sourcePath);
    }

    const context = `Upload ${path}`;
    const deadline = createDeadline(this.requestTimeoutMs, options?.signal);
    try {
      const body = Readable.from(countChunks(createReadStream(sourcePath), progress, deadline));
      await this.client.send(
        new PutObjectCommand({ Bucket: bucket, Key: key, Body: body, ContentLength: size }),
        { abortSignal: deadline.signal }
      );
      return size;
    } catch (err) {
      throw this.wrap(err, context, deadline, sourcePath);
    } finally {
      deadline.dispose();
    }
  }

  private async listBuckets(pageToken: string | undefined, options?: CallOptions): Promise<ListPage> {
    const response = await this.withDeadline('List buckets', options, (abortSignal) =>
      this.client.send(new ListBucketsCommand({ ContinuationToken: pageToken }), { abortSignal })
    );

    const items: Entry[] = [];
    for (const bucket of response.Buckets ?? []) {
      if (!bucket.Name) continue;
      items.push({ kind: 'container', name: bucket.Name, key: bucketRoot(bucket.Name) });
    }

    const nextPageToken = response.ContinuationToken || undefined;
    return { items, nextPageToken, hasMore: nextPageToken !== undefined };
  }

  private requireObject(path: ObjectPath): { bucket: string; key: string } {
    const parts = splitPath(path);
    if (isContainerKey(path) || !parts.bucket || !parts.key) {
      throw new StorageError('NotAnObject', `${path || '/'} is not an object`);
    }
    return parts;
  }

  private async withDeadline<T>(
    context: string,
    options: CallOptions | undefined,
    run: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const deadline = createDeadline(this.requestTimeoutMs, options?.signal);
    try {
      return await run(deadline.signal);
    } catch (err) {
      throw this.wrap(err, context, deadline);
    } finally {
      deadline.dispose();
    }
  }

  private wrap(err: unknown, context: string, deadline: Deadline, localPath?: string): StorageError {
    if (deadline.expired) {
      return new StorageError('Transient', `${context}: timed out after ${this.requestTimeoutMs}ms`, {
        cause: err
      });
    }
    const mapped = toStorageError(err, context);
    if (mapped.kind === 'LocalIOError' && localPath) {
      return toLocalIOError(err, localPath);
    }
    return mapped;
  }
}
