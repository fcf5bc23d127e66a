/**
 * Path arithmetic over container keys and object paths.
 *
 * Keys are plain strings so that ancestry is a string-prefix test:
 * `''` ⊂ `'bucket/'` ⊂ `'bucket/logs/'` ⊂ `'bucket/logs/2024/'`.
 */

import type { ContainerKey, ObjectPath } from './types.js';

export const ACCOUNT_ROOT: ContainerKey = '';

const DELIMITER = '/';

export function bucketRoot(bucket: string): ContainerKey {
  return `${bucket}${DELIMITER}`;
}

export function isContainerKey(path: string): boolean {
  return path === ACCOUNT_ROOT || path.endsWith(DELIMITER);
}

/**
 * True when `ancestor` is a strict path prefix of `descendant`.
 */
export function isStrictAncestor(ancestor: ContainerKey, descendant: string): boolean {
  return descendant.length > ancestor.length && descendant.startsWith(ancestor);
}

/**
 * Split a path into its bucket and the key inside that bucket.
 * The account root has neither.
 */
export function splitPath(path: string): { bucket: string; key: string } {
  const idx = path.indexOf(DELIMITER);
  if (idx === -1) {
    return { bucket: path, key: '' };
  }
  return { bucket: path.slice(0, idx), key: path.slice(idx + 1) };
}

export function childContainerKey(parent: ContainerKey, name: string): ContainerKey {
  return `${parent}${name}${DELIMITER}`;
}

export function childObjectPath(parent: ContainerKey, name: string): ObjectPath {
  return `${parent}${name}`;
}

/**
 * Container holding `path`, or undefined for the account root.
 */
export function parentKey(path: string): ContainerKey | undefined {
  if (path === ACCOUNT_ROOT) return undefined;
  const trimmed = path.endsWith(DELIMITER) ? path.slice(0, -1) : path;
  const idx = trimmed.lastIndexOf(DELIMITER);
  return idx === -1 ? ACCOUNT_ROOT : trimmed.slice(0, idx + 1);
}

/**
 * Last segment of a path without its trailing delimiter.
 */
export function baseName(path: string): string {
  const trimmed = path.endsWith(DELIMITER) ? path.slice(0, -1) : path;
  const idx = trimmed.lastIndexOf(DELIMITER);
  return idx === -1 ? trimmed : trimmed.slice(idx + 1);
}

/**
 * Segments of a container key, e.g. `'b/x/y/'` → `['b', 'x', 'y']`.
 */
export function pathSegments(key: ContainerKey): string[] {
  if (key === ACCOUNT_ROOT) return [];
  const trimmed = key.endsWith(DELIMITER) ? key.slice(0, -1) : key;
  return trimmed.split(DELIMITER);
}

export function toS3Uri(path: string): string {
  return `s3://${path}`;
}

export function toArn(path: string): string {
  return `arn:aws:s3:::${path}`;
}

function encodeKey(key: string): string {
  return encodeURIComponent(key).replace(/%2F/g, '/');
}

export function toObjectUrl(path: string, region: string): string {
  const { bucket, key } = splitPath(path);
  return `https://${bucket}.s3.${region}.amazonaws.com/${encodeKey(key)}`;
}

/**
 * Management console page for a container or object.
 */
export function toConsoleUrl(path: string, region: string): string {
  const base = 'https://s3.console.aws.amazon.com/s3';
  if (path === ACCOUNT_ROOT) {
    return `${base}/buckets?region=${region}`;
  }
  const { bucket, key } = splitPath(path);
  if (isContainerKey(path)) {
    return `${base}/buckets/${bucket}?region=${region}&prefix=${encodeKey(key)}&showversions=false`;
  }
  return `${base}/object/${bucket}?region=${region}&prefix=${encodeKey(key)}`;
}
