import * as path from 'path';
import * as fs from 'fs';
import { EventEmitter } from 'events';
import {
  ErrorKind,
  JobOutcome,
  QueuedFile,
  ToolPaths,
  TranscodeJobEvents,
  TranscodeRequest,
  WatchConfig,
} from '../core/types/types';
import { startTranscodeJob } from '../core/ffmpeg/transcode-job';
import { debugLogger } from '../core/utils/debug-logger';
import { outputPathFor } from './scan';

/** What the queue needs from a running job */
export interface JobHandle {
  readonly done: Promise<JobOutcome>;
  cancel(): Promise<void>;
}

export type JobStarter = (request: TranscodeRequest, events: TranscodeJobEvents) => JobHandle;

type FailedOutcome = Extract<JobOutcome, { status: 'failed' }>;

export interface QueueOptions {
  config: WatchConfig;
  tools: ToolPaths;
  startJob?: JobStarter;
  maxRetries?: number;
  onFileStart?: (file: QueuedFile) => void;
  onFileComplete?: (file: QueuedFile, outputPath: string) => void;
  onFileFailed?: (file: QueuedFile, failure: FailedOutcome) => void;
  onProgress?: (file: QueuedFile, percent: number) => void;
  onQueueEmpty?: () => void;
}

// Preflight failures won't change on a second attempt
const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>(['EngineFailure', 'UnexpectedFailure']);

export function isRetryable(kind: ErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

export class ProcessingQueue {
  private queue: QueuedFile[] = [];
  private running = new Map<string, JobHandle>();
  private readonly config: WatchConfig;
  private readonly maxConcurrency: number;
  private readonly maxRetries: number;
  private readonly startJob: JobStarter;
  private readonly idle = new EventEmitter();
  private shuttingDown = false;

  constructor(private readonly options: QueueOptions) {
    this.config = options.config;
    this.maxConcurrency = options.config.concurrency || 1;
    this.maxRetries = options.maxRetries ?? 3;
    this.startJob =
      options.startJob ?? ((request, events) => startTranscodeJob(request, { tools: options.tools }, events));
  }

  /**
   * Add a file to the processing queue
   */
  async addFile(filePath: string): Promise<void> {
    if (this.shuttingDown) return;

    // Dedupe - don't add if already seen
    if (this.queue.some((f) => f.path === filePath)) {
      console.log(`[Queue] File already in queue: ${path.basename(filePath)}`);
      return;
    }

    let size: number;
    try {
      size = (await fs.promises.stat(filePath)).size;
    } catch (error) {
      console.error(`[Queue] Could not stat file: ${filePath} (${error})`);
      return;
    }

    const queuedFile: QueuedFile = {
      path: filePath,
      name: path.basename(filePath),
      relativePath: path.relative(this.config.inputDirectory, filePath),
      size,
      addedAt: new Date(),
      attempts: 0,
      status: 'pending',
    };

    this.queue.push(queuedFile);
    debugLogger.info(`[Queue] Added: ${queuedFile.name} (${this.queue.length} in queue)`);

    this.processNext();
  }

  getStatus(): {
    pending: number;
    processing: number;
    completed: number;
    failed: number;
    total: number;
  } {
    return {
      pending: this.queue.filter((f) => f.status === 'pending').length,
      processing: this.running.size,
      completed: this.queue.filter((f) => f.status === 'completed').length,
      failed: this.queue.filter((f) => f.status === 'failed').length,
      total: this.queue.length,
    };
  }

  getFiles(): readonly QueuedFile[] {
    return this.queue;
  }

  /**
   * Start pending files until the concurrency limit is reached
   */
  private processNext(): void {
    while (!this.shuttingDown && this.running.size < this.maxConcurrency) {
      const next = this.queue.find((f) => f.status === 'pending');
      if (!next) break;
      this.runFile(next).catch((error: unknown) => {
        console.error(`[Queue] Unexpected error processing ${next.name}: ${error}`);
      });
    }

    if (this.isIdle()) {
      if (!this.shuttingDown) {
        this.options.onQueueEmpty?.();
      }
      this.idle.emit('idle');
    }
  }

  private isIdle(): boolean {
    if (this.running.size > 0) return false;
    return this.shuttingDown || !this.queue.some((f) => f.status === 'pending');
  }

  private async runFile(file: QueuedFile): Promise<void> {
    file.status = 'processing';
    file.attempts++;

    debugLogger.info(`[Queue] Processing: ${file.name} (attempt ${file.attempts}/${this.maxRetries})`);
    this.options.onFileStart?.(file);

    const request: TranscodeRequest = {
      inputPath: file.path,
      outputPath: outputPathFor(this.config, file.path),
      mode: this.config.mode,
      qualityTier: this.config.qualityTier,
    };

    const job = this.startJob(request, {
      onProgress: (percent) => this.options.onProgress?.(file, percent),
    });
    this.running.set(file.path, job);

    try {
      const outcome = await job.done;
      await this.settle(file, outcome);
    } finally {
      this.running.delete(file.path);
      this.processNext();
    }
  }

  private async settle(file: QueuedFile, outcome: JobOutcome): Promise<void> {
    switch (outcome.status) {
      case 'succeeded':
        file.status = 'completed';
        debugLogger.info(`[Queue] Completed: ${file.name}`);
        this.options.onFileComplete?.(file, outcome.outputPath);
        if (this.config.processedDirectory) {
          await this.moveFile(file.path, this.config.processedDirectory, file.relativePath);
        }
        return;

      case 'cancelled':
        file.status = 'cancelled';
        file.error = outcome.message;
        return;

      case 'failed':
        file.error = outcome.detail;
        if (isRetryable(outcome.kind) && file.attempts < this.maxRetries && !this.shuttingDown) {
          console.warn(`[Queue] Failed (will retry): ${file.name} - ${outcome.detail}`);
          file.status = 'pending';
          return;
        }
        file.status = 'failed';
        this.options.onFileFailed?.(file, outcome);
        if (this.config.failedDirectory) {
          await this.moveFile(file.path, this.config.failedDirectory, file.relativePath);
        }
        return;
    }
  }

  /**
   * Move a file to a target directory, preserving relative path structure
   */
  private async moveFile(sourcePath: string, targetDir: string, relativePath?: string): Promise<void> {
    const destPath = path.join(targetDir, relativePath || path.basename(sourcePath));
    try {
      await fs.promises.mkdir(path.dirname(destPath), { recursive: true });
      await fs.promises.rename(sourcePath, destPath);
      debugLogger.info(`[Queue] Moved: ${path.basename(sourcePath)} -> ${destPath}`);
    } catch (error) {
      console.error(`[Queue] Failed to move file: ${error}`);
    }
  }

  /**
   * Resolves once nothing is pending or running
   */
  waitForCompletion(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idle.once('idle', () => resolve());
    });
  }

  /**
   * Stop taking work and cancel running jobs
   */
  async shutdown(): Promise<void> {
    debugLogger.info('[Queue] Shutting down...');
    this.shuttingDown = true;

    const jobs = [...this.running.values()];
    await Promise.all(jobs.map((job) => job.cancel()));
    await Promise.all(jobs.map((job) => job.done));

    debugLogger.info('[Queue] Shutdown complete');
  }
}
