#!/usr/bin/env tsx
/**
 * bucketwalk - terminal browser for S3-compatible object storage
 *
 * Run with:
 *   npm start -- [--bucket NAME] [--profile NAME] [--region R] ...
 *   bucketwalk (if installed globally)
 */
import { S3Client } from '@aws-sdk/client-s3';
import { ACCOUNT_ROOT, BrowserSession, bucketRoot, S3StorageGateway } from 'bucketwalk-engine';
import { render } from 'ink';
import React from 'react';

import { loadConfig, type BucketwalkConfig } from '../src/config-loader.js';
import { relevantEnv, sanitizeEnv } from '../src/env-sanitizer.js';
import { createLocalFiles } from '../src/local-files.js';
import { parseCliArgs, USAGE, UsageError, type CliArgs } from './cli-args.js';
import { BrowserApp } from './components/index.js';
import { DEFAULT_THEME } from './theme.js';
import { createDebugLogger, debugEnabledFromEnv, type DebugLogger } from './utils/debug.js';
import { systemPlatform } from './utils/system.js';

const FALLBACK_REGION = 'us-east-1';

function readArgs(): CliArgs {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(`bucketwalk: ${error.message}\n\n${USAGE}`);
    process.exit(2);
  }
}

function createClient(config: BucketwalkConfig): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    profile: config.profile
  });
}

/**
 * Region for console links and object URLs when none is configured: whatever
 * the SDK resolves from the profile, else the SDK's global default.
 */
async function resolveRegion(client: S3Client, logger: DebugLogger): Promise<string> {
  try {
    return await client.config.region();
  } catch (error) {
    logger.log(`No region configured (${error instanceof Error ? error.message : String(error)}), using ${FALLBACK_REGION}`);
    return FALLBACK_REGION;
  }
}

function restoreTerminal(): void {
  const { stdin } = process;
  if (stdin.isTTY && stdin.setRawMode) {
    stdin.setRawMode(false);
  }
  // Reset Application Cursor Keys
  process.stdout.write('\x1b[?1l');
}

async function main(): Promise<number> {
  const args = readArgs();
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const logger = createDebugLogger({ enabled: args.debug || debugEnabledFromEnv() });
  const log = (message: string) => logger.log(message);
  log(`Starting in ${process.cwd()}`);
  log(`Environment: ${JSON.stringify(sanitizeEnv(relevantEnv()))}`);

  const config = await loadConfig({ workingDir: process.cwd(), overrides: args.overrides, log });
  log(`Config: ${JSON.stringify(config)}`);

  const { stdin, stdout } = process;
  if (!stdin.isTTY || !stdout.isTTY) {
    console.error('bucketwalk needs an interactive terminal.');
    return 1;
  }

  const client = createClient(config);
  const region = config.region ?? (await resolveRegion(client, logger));
  const session = new BrowserSession({
    gateway: new S3StorageGateway(client, {
      pageSize: config.pageSize,
      requestTimeoutMs: config.requestTimeoutMs
    }),
    files: createLocalFiles({ downloadDir: config.downloadDir, workingDir: process.cwd() }),
    platform: systemPlatform,
    region,
    root: config.defaultBucket ? bucketRoot(config.defaultBucket) : ACCOUNT_ROOT,
    pageRows: Math.max(1, (stdout.rows || 24) - 10),
    previewMaxBytes: config.previewMaxBytes,
    progressIntervalMs: config.progressIntervalMs,
    throttleRetryDelayMs: config.throttleRetryDelayMs,
    log
  });

  // Enable raw mode before rendering
  if (stdin.setRawMode) {
    stdin.setRawMode(true);
    stdin.resume();
  }

  const { waitUntilExit } = render(
    <BrowserApp
      session={session}
      region={region}
      theme={DEFAULT_THEME}
      debugLog={logger.enabled ? logger.file : undefined}
    />,
    {
      stdin,
      stdout,
      stderr: process.stderr,
      debug: false,
      exitOnCtrlC: false, // Ctrl-c goes through the session's key handling
      patchConsole: false
    }
  );

  // Guarantee cleanup on ANY exit
  const onSignal = () => {
    session.stop();
    restoreTerminal();
    process.exit(0);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  let status = 0;
  try {
    await waitUntilExit();
  } catch (error) {
    log(`Fatal: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`);
    console.error(`bucketwalk: ${error instanceof Error ? error.message : String(error)}`);
    status = 1;
  } finally {
    session.stop();
    client.destroy();
    restoreTerminal();
  }

  await logger.flush();
  if (logger.failure !== undefined) {
    const reason = logger.failure instanceof Error ? logger.failure.message : String(logger.failure);
    console.error(`bucketwalk: could not write the debug log ${logger.file}: ${reason}`);
  }
  return status;
}

main().then(
  (status) => process.exit(status),
  (error: unknown) => {
    console.error(error);
    process.exit(1);
  }
);
