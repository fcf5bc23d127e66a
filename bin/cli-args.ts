/**
 * Command-line flags
 */

import { parseArgs } from 'util';
import type { ConfigOverrides } from '../src/config-loader.js';

export const USAGE = `Usage: bucketwalk [options]

Browse S3-compatible object storage in the terminal.

Options:
  --bucket NAME        Open NAME directly; the bucket list is not shown
  --profile NAME       Shared credentials/config profile
  --region REGION      Region for requests and console links
  --endpoint URL       Custom S3 endpoint (MinIO, Ceph, LocalStack, ...)
  --path-style         Address buckets as endpoint/bucket instead of bucket.endpoint
  --download-dir DIR   Where downloads are saved (default: ~/Downloads)
  --debug              Write a debug log to ~/.bucketwalk/debug.log
  -h, --help           Show this help

Settings are also read from ~/.bucketwalk/config.json, ./.bucketwalk/config.json
and BUCKETWALK_* / AWS_PROFILE / AWS_REGION environment variables.`;

export interface CliArgs {
  overrides: ConfigOverrides;
  debug: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function nonEmpty(flag: string, value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!trimmed) throw new UsageError(`--${flag} needs a value`);
  return trimmed;
}

function checkEndpoint(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new UsageError(`--endpoint is not a URL: ${value}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new UsageError(`--endpoint must use http or https: ${value}`);
  }
  return value;
}

const OPTIONS = {
  bucket: { type: 'string' },
  profile: { type: 'string' },
  region: { type: 'string' },
  endpoint: { type: 'string' },
  'path-style': { type: 'boolean' },
  'download-dir': { type: 'string' },
  debug: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' }
} as const;

function readFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const values = readFlags(argv);

  const overrides: ConfigOverrides = {};
  const bucket = nonEmpty('bucket', values.bucket);
  const profile = nonEmpty('profile', values.profile);
  const region = nonEmpty('region', values.region);
  const endpoint = nonEmpty('endpoint', values.endpoint);
  const downloadDir = nonEmpty('download-dir', values['download-dir']);

  if (bucket) {
    if (bucket.includes('/')) throw new UsageError(`--bucket takes a bucket name, not a path: ${bucket}`);
    overrides.defaultBucket = bucket;
  }
  if (profile) overrides.profile = profile;
  if (region) overrides.region = region;
  if (endpoint) overrides.endpoint = checkEndpoint(endpoint);
  if (values['path-style']) overrides.forcePathStyle = true;
  if (downloadDir) overrides.downloadDir = downloadDir;

  return { overrides, debug: values.debug === true, help: values.help === true };
}
