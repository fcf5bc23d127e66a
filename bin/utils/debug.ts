/**
 * Debug Logging Utility
 *
 * File-based debug log that:
 * - Is enabled by BUCKETWALK_DEBUG=true or --debug
 * - Writes to ~/.bucketwalk/debug.log, readable by the owner only
 * - Redacts credentials, signatures and tokens before writing
 * - Never blocks the UI: writes are queued and appended in order
 */

import * as fsp from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { sanitizeText } from '../../src/env-sanitizer.js';

export const DEBUG_ENV = 'BUCKETWALK_DEBUG';

export interface DebugLoggerOptions {
  enabled: boolean;
  /** Defaults to ~/.bucketwalk/debug.log */
  file?: string;
  now?: () => Date;
}

export interface DebugLogger {
  readonly enabled: boolean;
  readonly file: string;
  log(message: string): void;
  /** Resolves once every queued line is written */
  flush(): Promise<void>;
  /** First write failure, reported once the UI has exited */
  readonly failure: unknown;
}

export function defaultDebugLogPath(homeDir = os.homedir()): string {
  return path.join(homeDir, '.bucketwalk', 'debug.log');
}

export function debugEnabledFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  return env[DEBUG_ENV] === 'true' || env[DEBUG_ENV] === '1';
}

export function createDebugLogger(options: DebugLoggerOptions): DebugLogger {
  const file = options.file ?? defaultDebugLogPath();
  const now = options.now ?? (() => new Date());
  let pending: Promise<void> = Promise.resolve();
  let prepared = false;
  let failure: unknown;

  const write = async (line: string): Promise<void> => {
    if (!prepared) {
      await fsp.mkdir(path.dirname(file), { recursive: true, mode: 0o700 });
      prepared = true;
    }
    await fsp.appendFile(file, line, { mode: 0o600 });
    // appendFile only applies the mode when it creates the file
    await fsp.chmod(file, 0o600);
  };

  return {
    enabled: options.enabled,
    file,
    get failure() {
      return failure;
    },
    log(message: string): void {
      if (!options.enabled || failure !== undefined) return;
      const line = `[${now().toISOString()}] ${sanitizeText(message)}\n`;
      pending = pending.then(() => write(line)).catch((error: unknown) => {
        failure = error;
      });
    },
    flush(): Promise<void> {
      return pending;
    }
  };
}
