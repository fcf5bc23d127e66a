/**
 * Uniform error taxonomy for remote and local I/O.
 *
 * Gateway and filesystem failures are converted into `StorageError` at the
 * boundary and travel as values (inside listing, detail and job state) from
 * then on; nothing here is ever rethrown across the UI.
 */

import { S3ServiceException } from '@aws-sdk/client-s3';

export type StorageErrorKind =
  | 'NotFound'
  | 'AccessDenied'
  | 'Throttled'
  | 'Transient'
  | 'NotAnObject'
  | 'LocalIOError'
  | 'DecodeError';

export interface ErrorDetails {
  title: string;
  hint?: string;
}

export class StorageError extends Error {
  readonly kind: StorageErrorKind;

  constructor(kind: StorageErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
    this.kind = kind;
  }

  /** Only throttling is retried automatically */
  get retryable(): boolean {
    return this.kind === 'Throttled';
  }
}

const NOT_FOUND_NAMES = new Set(['NoSuchKey', 'NoSuchBucket', 'NotFound', 'NoSuchVersion']);

const ACCESS_DENIED_NAMES = new Set([
  'AccessDenied',
  'Forbidden',
  'AllAccessDisabled',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'ExpiredToken',
  'InvalidToken'
]);

const THROTTLED_NAMES = new Set([
  'SlowDown',
  'Throttling',
  'ThrottlingException',
  'TooManyRequests',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'RequestThrottled',
  'RequestThrottledException'
]);

const NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH'
]);

const LOCAL_FS_CODES = new Set([
  'ENOSPC',
  'EDQUOT',
  'EACCES',
  'EPERM',
  'EISDIR',
  'ENOTDIR',
  'EROFS',
  'EEXIST',
  'ENOENT',
  'EMFILE',
  'EBADF'
]);

/**
 * Read the `code` property Node attaches to system errors
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  if (err instanceof Error && err.message) return err.message;
  if (typeof err === 'string') return err;
  return 'unknown error';
}

function isAbortLike(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

/**
 * True for errors raised by the local filesystem rather than the network
 */
export function isLocalFsError(err: unknown): boolean {
  const code = errorCode(err);
  if (!code || !LOCAL_FS_CODES.has(code)) return false;
  return typeof err === 'object' && err !== null && 'syscall' in err;
}

function fromServiceException(err: S3ServiceException, context: string): StorageError {
  const status = err.$metadata?.httpStatusCode;
  const detail = `${context}: ${err.name}${err.message && err.message !== err.name ? ` (${err.message})` : ''}`;

  if (NOT_FOUND_NAMES.has(err.name) || status === 404) {
    return new StorageError('NotFound', detail, { cause: err });
  }
  if (ACCESS_DENIED_NAMES.has(err.name) || status === 401 || status === 403) {
    return new StorageError('AccessDenied', detail, { cause: err });
  }
  if (THROTTLED_NAMES.has(err.name) || status === 429 || status === 503) {
    return new StorageError('Throttled', detail, { cause: err });
  }
  return new StorageError('Transient', detail, { cause: err });
}

/**
 * Map any failure of a remote call into the taxonomy.
 *
 * @param context - Short description of the operation, used as message prefix
 */
export function toStorageError(err: unknown, context = 'Request failed'): StorageError {
  if (err instanceof StorageError) return err;

  if (err instanceof S3ServiceException) {
    return fromServiceException(err, context);
  }

  if (isAbortLike(err)) {
    return new StorageError('Transient', `${context}: request aborted`, { cause: err });
  }

  if (isLocalFsError(err)) {
    return new StorageError('LocalIOError', `${context}: ${errorMessage(err)}`, { cause: err });
  }

  const code = errorCode(err);
  if (code && NETWORK_CODES.has(code)) {
    return new StorageError('Transient', `${context}: network error (${code})`, { cause: err });
  }

  return new StorageError('Transient', `${context}: ${errorMessage(err)}`, { cause: err });
}

/**
 * Wrap a failure of a local filesystem call
 */
export function toLocalIOError(err: unknown, filePath: string): StorageError {
  if (err instanceof StorageError) return err;
  const code = errorCode(err);
  const reason =
    code === 'ENOSPC' ? 'disk full'
    : code === 'EACCES' || code === 'EPERM' ? 'permission denied'
    : code === 'ENOENT' ? 'no such file or directory'
    : code === 'EISDIR' ? 'is a directory'
    : errorMessage(err);
  return new StorageError('LocalIOError', `${filePath}: ${reason}`, { cause: err });
}

export function getRecoveryHint(err: StorageError): string | undefined {
  switch (err.kind) {
    case 'NotFound':
      return 'The bucket or object may not exist, or the credentials cannot see it. Press r to reload.';
    case 'AccessDenied':
      return 'Check IAM permissions, bucket policies, and whether the profile matches the target.';
    case 'Throttled':
      return 'Rate limited by the provider. Wait a moment, then press r to retry.';
    case 'Transient':
      return 'Network error or timeout. Check connectivity and the endpoint, then press r to retry.';
    case 'LocalIOError':
      return 'Check free disk space and permissions on the local path.';
    case 'NotAnObject':
      return 'The selected key is a prefix, not an object.';
    case 'DecodeError':
      return undefined;
  }
}

export function formatError(err: unknown): string {
  if (err instanceof StorageError) return `${err.kind}: ${err.message}`;
  return errorMessage(err);
}

export function describeError(err: unknown): ErrorDetails {
  const title = formatError(err);
  const hint = err instanceof StorageError ? getRecoveryHint(err) : undefined;
  return hint ? { title, hint } : { title };
}
