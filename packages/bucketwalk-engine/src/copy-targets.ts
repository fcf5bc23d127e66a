/**
 * Values offered by the copy menu for the selected entry.
 */

import { splitPath, toArn, toObjectUrl, toS3Uri } from './container-key.js';
import type { CopyTarget } from './input-machine.js';

export interface CopyChoice {
  target: CopyTarget;
  label: string;
  /** Undefined when the value does not apply (ETag of a prefix, unknown ETag) */
  value?: string;
}

const LABELS: Record<CopyTarget, string> = {
  key: 'Key',
  s3Uri: 'S3 URI',
  objectUrl: 'Object URL',
  arn: 'ARN',
  etag: 'ETag'
};

export function copyValue(target: CopyTarget, path: string, region: string, etag?: string): string | undefined {
  switch (target) {
    case 'key':
      return splitPath(path).key || splitPath(path).bucket;
    case 's3Uri':
      return toS3Uri(path);
    case 'objectUrl':
      return toObjectUrl(path, region);
    case 'arn':
      return toArn(path);
    case 'etag':
      return etag;
  }
}

export function copyChoices(
  targets: readonly CopyTarget[],
  path: string,
  region: string,
  etag?: string
): CopyChoice[] {
  return targets.map((target) => ({
    target,
    label: LABELS[target],
    value: copyValue(target, path, region, etag)
  }));
}
