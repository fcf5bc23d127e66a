/**
 * Config Loader
 *
 * Resolves settings from, lowest priority first:
 * 1. Built-in defaults
 * 2. User-level ~/.bucketwalk/config.json
 * 3. Project-level ./.bucketwalk/config.json
 * 4. Environment (BUCKETWALK_*, AWS_PROFILE, AWS_REGION)
 * 5. Command-line overrides
 *
 * Invalid values are dropped field by field and reported through `log`.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export const CONFIG_FOLDER = '.bucketwalk';
export const CONFIG_FILE = 'config.json';

/**
 * Configuration structure
 */
export interface BucketwalkConfig {
  /** Shared-credentials profile */
  profile?: string;
  region?: string;
  /** Custom endpoint for S3-compatible services */
  endpoint?: string;
  forcePathStyle: boolean;
  /** Start inside this bucket instead of the bucket list */
  defaultBucket?: string;
  downloadDir: string;
  previewMaxBytes: number;
  pageSize: number;
  requestTimeoutMs: number;
  throttleRetryDelayMs: number;
  progressIntervalMs: number;
}

export type ConfigOverrides = Partial<BucketwalkConfig>;

export interface LoadConfigOptions {
  workingDir: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
  log?: (message: string) => void;
}

type Parser<K extends keyof BucketwalkConfig> = (value: unknown) => BucketwalkConfig[K] | undefined;

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function booleanValue(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return undefined;
}

function integerIn(min: number, max: number): (value: unknown) => number | undefined {
  return (value) => {
    const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof n !== 'number' || !Number.isInteger(n) || n < min || n > max) return undefined;
    return n;
  };
}

function endpointUrl(value: unknown): string | undefined {
  const text = nonEmptyString(value);
  if (!text) return undefined;
  try {
    const url = new URL(text);
    return url.protocol === 'http:' || url.protocol === 'https:' ? text : undefined;
  } catch {
    return undefined;
  }
}

const PARSERS: { [K in keyof BucketwalkConfig]-?: Parser<K> } = {
  profile: nonEmptyString,
  region: nonEmptyString,
  endpoint: endpointUrl,
  forcePathStyle: booleanValue,
  defaultBucket: nonEmptyString,
  downloadDir: nonEmptyString,
  previewMaxBytes: integerIn(1, 64 * 1024 * 1024),
  pageSize: integerIn(1, 1000),
  requestTimeoutMs: integerIn(1, 10 * 60 * 1000),
  throttleRetryDelayMs: integerIn(0, 60 * 1000),
  progressIntervalMs: integerIn(0, 60 * 1000)
};

const ENV_KEYS: Array<[string, keyof BucketwalkConfig]> = [
  ['AWS_PROFILE', 'profile'],
  ['AWS_REGION', 'region'],
  ['BUCKETWALK_PROFILE', 'profile'],
  ['BUCKETWALK_REGION', 'region'],
  ['BUCKETWALK_ENDPOINT', 'endpoint'],
  ['BUCKETWALK_PATH_STYLE', 'forcePathStyle'],
  ['BUCKETWALK_BUCKET', 'defaultBucket'],
  ['BUCKETWALK_DOWNLOAD_DIR', 'downloadDir'],
  ['BUCKETWALK_PREVIEW_MAX_BYTES', 'previewMaxBytes'],
  ['BUCKETWALK_PAGE_SIZE', 'pageSize'],
  ['BUCKETWALK_REQUEST_TIMEOUT_MS', 'requestTimeoutMs'],
  ['BUCKETWALK_THROTTLE_RETRY_DELAY_MS', 'throttleRetryDelayMs'],
  ['BUCKETWALK_PROGRESS_INTERVAL_MS', 'progressIntervalMs']
];

function isKnownKey(key: string): key is keyof BucketwalkConfig {
  return Object.prototype.hasOwnProperty.call(PARSERS, key);
}

function setField<K extends keyof BucketwalkConfig>(
  target: ConfigOverrides,
  key: K,
  raw: unknown
): boolean {
  const parsed = PARSERS[key](raw);
  if (parsed === undefined) return false;
  target[key] = parsed;
  return true;
}

export function defaultConfig(homeDir: string = os.homedir()): BucketwalkConfig {
  return {
    forcePathStyle: false,
    downloadDir: path.join(homeDir, CONFIG_FOLDER, 'download'),
    previewMaxBytes: 1024 * 1024,
    pageSize: 1000,
    requestTimeoutMs: 30_000,
    throttleRetryDelayMs: 1000,
    progressIntervalMs: 200
  };
}

/**
 * Expand a leading `~` and make the path absolute.
 */
export function resolvePath(value: string, baseDir: string, homeDir: string = os.homedir()): string {
  if (value === '~') return homeDir;
  if (value.startsWith('~/')) return path.join(homeDir, value.slice(2));
  return path.resolve(baseDir, value);
}

/**
 * Validate a parsed config document field by field.
 *
 * @param source - Where the document came from, for log messages
 */
export function parseConfig(
  raw: unknown,
  source: string,
  log: (message: string) => void = () => {}
): ConfigOverrides {
  const result: ConfigOverrides = {};
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    log(`${source}: expected a JSON object`);
    return result;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!isKnownKey(key)) {
      log(`${source}: unknown setting "${key}"`);
      continue;
    }
    if (!setField(result, key, value)) {
      log(`${source}: invalid value for "${key}"`);
    }
  }
  return result;
}

export function configFromEnv(
  env: NodeJS.ProcessEnv,
  log: (message: string) => void = () => {}
): ConfigOverrides {
  const result: ConfigOverrides = {};
  for (const [name, key] of ENV_KEYS) {
    const value = env[name];
    if (value === undefined || value === '') continue;
    if (!setField(result, key, value)) {
      log(`${name}: invalid value for "${key}"`);
    }
  }
  return result;
}

/**
 * Merge configs with later values taking precedence
 */
export function mergeConfigs(base: BucketwalkConfig, ...layers: ConfigOverrides[]): BucketwalkConfig {
  const result: BucketwalkConfig = { ...base };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined || !isKnownKey(key)) continue;
      setField(result, key, value);
    }
  }
  return result;
}

/**
 * Load one config file. A missing file is not an error.
 */
async function loadFromFolder(
  folderPath: string,
  homeDir: string,
  log: (message: string) => void
): Promise<ConfigOverrides> {
  const filePath = path.join(folderPath, CONFIG_FILE);
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
    log(`${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    log(`${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    return {};
  }

  const parsed = parseConfig(raw, filePath, log);
  if (parsed.downloadDir) parsed.downloadDir = resolvePath(parsed.downloadDir, path.dirname(folderPath), homeDir);
  return parsed;
}

/**
 * Load configuration with folder priority
 *
 * @param options.workingDir - The project working directory
 * @returns Merged configuration from defaults, files, environment and overrides
 */
export async function loadConfig(options: LoadConfigOptions): Promise<BucketwalkConfig> {
  const homeDir = options.homeDir ?? os.homedir();
  const log = options.log ?? (() => {});

  const userConfig = await loadFromFolder(path.join(homeDir, CONFIG_FOLDER), homeDir, log);
  const projectConfig =
    path.resolve(options.workingDir) === path.resolve(homeDir)
      ? {}
      : await loadFromFolder(path.join(options.workingDir, CONFIG_FOLDER), homeDir, log);
  const envConfig = configFromEnv(options.env ?? process.env, log);
  if (envConfig.downloadDir) envConfig.downloadDir = resolvePath(envConfig.downloadDir, options.workingDir, homeDir);

  const overrides = { ...options.overrides };
  if (overrides.downloadDir) overrides.downloadDir = resolvePath(overrides.downloadDir, options.workingDir, homeDir);

  return mergeConfigs(defaultConfig(homeDir), userConfig, projectConfig, envConfig, overrides);
}
