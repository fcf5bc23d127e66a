/**
 * Preview/Download Pipeline
 *
 * Runs at most one job of each kind. Starting a job cancels the running job of
 * the same kind: its transport call is aborted, a preview buffer is dropped
 * and a partial download stays on disk. Job state is owned by the main loop;
 * tasks only post completions, and completions for a job that is no longer
 * current (or no longer running) are discarded.
 */

import { detectContent, type PreviewContent } from './content-detect.js';
import { toStorageError, type StorageError } from './errors.js';
import type { StorageGateway } from './storage-gateway.js';
import type { ObjectPath } from './types.js';

export type JobKind = 'preview' | 'download' | 'upload';

export type JobStatus = 'running' | 'done' | 'cancelled' | 'failed';

export interface PipelineJob {
  readonly id: number;
  readonly kind: JobKind;
  /** Object the job reads from or writes to */
  readonly target: ObjectPath;
  /** Download destination or upload source */
  readonly localPath?: string;
  readonly totalBytes?: number;
  status: JobStatus;
  bytes: number;
  error?: StorageError;
  preview?: PreviewContent;
}

export type PipelineCompletion =
  | { type: 'jobProgress'; jobId: number; bytes: number }
  | { type: 'jobDone'; jobId: number; bytes: number; preview?: PreviewContent }
  | { type: 'jobFailed'; jobId: number; error: StorageError };

export interface PipelineOptions {
  previewMaxBytes?: number;
  /** Minimum spacing of progress completions */
  progressIntervalMs?: number;
  now?: () => number;
}

export interface PreviewHints {
  size?: number;
  contentType?: string;
}

interface ActiveJob {
  job: PipelineJob;
  controller: AbortController;
}

export class Pipeline {
  private jobs = new Map<JobKind, ActiveJob>();
  private lastJobId = 0;
  private readonly previewMaxBytes: number;
  private readonly progressIntervalMs: number;
  private readonly now: () => number;

  constructor(
    private readonly gateway: StorageGateway,
    private readonly post: (completion: PipelineCompletion) => void,
    options: PipelineOptions = {}
  ) {
    this.previewMaxBytes = options.previewMaxBytes ?? 1024 * 1024;
    this.progressIntervalMs = options.progressIntervalMs ?? 200;
    this.now = options.now ?? Date.now;
  }

  startPreview(path: ObjectPath, hints: PreviewHints = {}): Readonly<PipelineJob> {
    const { job, signal } = this.begin('preview', path, undefined, hints.size);
    const maxBytes = this.previewMaxBytes;

    void this.runTask(job.id, async () => {
      const bytes = await this.gateway.fetchPrefix(path, maxBytes, { signal });
      const truncated = hints.size !== undefined ? hints.size > bytes.length : bytes.length >= maxBytes;
      const preview = detectContent(path, bytes, truncated, hints.contentType);
      return { bytes: bytes.length, preview };
    });
    return job;
  }

  startDownload(path: ObjectPath, destinationPath: string, size?: number): Readonly<PipelineJob> {
    const { job, signal } = this.begin('download', path, destinationPath, size);
    const progress = this.progressSink(job.id);

    void this.runTask(job.id, async () => {
      const bytes = await this.gateway.downloadTo(path, destinationPath, progress, { signal });
      return { bytes };
    });
    return job;
  }

  startUpload(sourcePath: string, path: ObjectPath, size?: number): Readonly<PipelineJob> {
    const { job, signal } = this.begin('upload', path, sourcePath, size);
    const progress = this.progressSink(job.id);

    void this.runTask(job.id, async () => {
      const bytes = await this.gateway.upload(sourcePath, path, progress, { signal });
      return { bytes };
    });
    return job;
  }

  job(kind: JobKind): Readonly<PipelineJob> | undefined {
    return this.jobs.get(kind)?.job;
  }

  /**
   * Jobs still running, in kind order.
   */
  running(): Array<Readonly<PipelineJob>> {
    const result: PipelineJob[] = [];
    for (const { job } of this.jobs.values()) {
      if (job.status === 'running') result.push(job);
    }
    return result;
  }

  /**
   * Cancel the running job of `kind`, or every running job.
   * Returns the jobs that were cancelled.
   */
  cancel(kind?: JobKind): Array<Readonly<PipelineJob>> {
    const cancelled: PipelineJob[] = [];
    for (const [jobKind, active] of this.jobs) {
      if (kind && jobKind !== kind) continue;
      if (active.job.status !== 'running') continue;
      active.job.status = 'cancelled';
      active.controller.abort();
      cancelled.push(active.job);
    }
    return cancelled;
  }

  /**
   * Forget the job of `kind`, cancelling it first when still running.
   */
  dismiss(kind: JobKind): void {
    this.cancel(kind);
    this.jobs.delete(kind);
  }

  /**
   * Apply a task completion. Returns the updated job, or undefined when the
   * completion was discarded.
   */
  apply(completion: PipelineCompletion): Readonly<PipelineJob> | undefined {
    const job = this.findRunning(completion.jobId);
    if (!job) return undefined;

    switch (completion.type) {
      case 'jobProgress':
        job.bytes = Math.max(job.bytes, completion.bytes);
        break;
      case 'jobDone':
        job.status = 'done';
        job.bytes = completion.bytes;
        job.preview = completion.preview;
        break;
      case 'jobFailed':
        job.status = 'failed';
        job.error = completion.error;
        break;
    }
    return job;
  }

  private findRunning(jobId: number): PipelineJob | undefined {
    for (const { job } of this.jobs.values()) {
      if (job.id === jobId) return job.status === 'running' ? job : undefined;
    }
    return undefined;
  }

  private begin(
    kind: JobKind,
    target: ObjectPath,
    localPath: string | undefined,
    totalBytes: number | undefined
  ): { job: PipelineJob; signal: AbortSignal } {
    this.cancel(kind);

    this.lastJobId += 1;
    const controller = new AbortController();
    const job: PipelineJob = {
      id: this.lastJobId,
      kind,
      target,
      localPath,
      totalBytes,
      status: 'running',
      bytes: 0
    };
    this.jobs.set(kind, { job, controller });
    return { job, signal: controller.signal };
  }

  private progressSink(jobId: number): (bytes: number) => void {
    let lastEmit = Number.NEGATIVE_INFINITY;
    return (bytes) => {
      const now = this.now();
      if (now - lastEmit < this.progressIntervalMs) return;
      lastEmit = now;
      this.post({ type: 'jobProgress', jobId, bytes });
    };
  }

  private async runTask(
    jobId: number,
    task: () => Promise<{ bytes: number; preview?: PreviewContent }>
  ): Promise<void> {
    try {
      const { bytes, preview } = await task();
      this.post({ type: 'jobDone', jobId, bytes, preview });
    } catch (err) {
      this.post({ type: 'jobFailed', jobId, error: toStorageError(err) });
    }
  }
}
