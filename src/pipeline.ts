import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import { CancellationFlag, OperationCanceledError, throwIfCanceled } from './cancellation.js';
import { runDownloadStep } from './download.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import { HandoffQueue, QueueAbortedError } from './queue.js';
import {
  LOCAL_BACKEND,
  type DownloadFn,
  type DownloadResult,
  type DownloadTask,
  type UploadDispatchFn,
  type UploadResult,
} from './types.js';
import { buildDownloadTasks } from './utils.js';

export type PipelineState = 'idle' | 'running' | 'completed' | 'cancelled' | 'failed';

/**
 * Front-end callbacks. `finished` fires exactly once per run.
 */
export interface PipelineListener {
  progress?: (percent: number, message: string) => void;
  error?: (message: string) => void;
  finished?: (downloads: DownloadResult[], uploads: UploadResult[], wasCancelled: boolean) => void;
}

export interface PipelineOptions {
  readonly urls: readonly string[];
  readonly backend: string;
  /** Backend relative folder; for the local backend, the directory to download into. */
  readonly destinationFolder: string;
  readonly quality?: string;
  readonly filenameTemplate?: string;
  readonly proxy?: string;
}

export interface PipelineDependencies {
  readonly download: DownloadFn;
  readonly dispatchUpload: UploadDispatchFn;
  /** How often the cancellation flag is polled while work is outstanding. */
  readonly pollIntervalMs?: number;
  /** Parent directory for per-run temporary folders. */
  readonly tempRoot?: string;
}

export interface PipelineOutcome {
  readonly state: Extract<PipelineState, 'completed' | 'cancelled' | 'failed'>;
  readonly downloads: DownloadResult[];
  readonly uploads: UploadResult[];
  readonly error?: string;
}

type DownloadedFile = Extract<DownloadResult, { status: 'success' }>;

interface WorkDir {
  readonly path: string;
  readonly temporary: boolean;
}

export const DEFAULT_POLL_INTERVAL_MS = 100;
export const TEMP_DIR_PREFIX = 'vdu-';

const START_PERCENT = 5;
const UPLOAD_START_PERCENT = 50;
const PHASE_SPAN = 45;

/** Progress before download `index` (0-based): spans [5, 50). */
export const downloadProgress = (index: number, total: number): number =>
  START_PERCENT + Math.floor((PHASE_SPAN * index) / Math.max(1, total));

/** Progress before upload `index` (0-based): spans [50, 95). */
export const uploadProgress = (index: number, total: number): number =>
  UPLOAD_START_PERCENT + Math.floor((PHASE_SPAN * index) / Math.max(1, total));

const isCancellation = (reason: unknown): boolean =>
  reason instanceof OperationCanceledError || reason instanceof QueueAbortedError;

/**
 * One download-then-upload run over a list of URLs. The downloader and
 * uploader activities overlap and hand files over through a FIFO queue;
 * cancellation is observed at await points only, so a download or upload
 * already in flight finishes before the run reports itself cancelled.
 */
export class PipelineRun {
  private currentState: PipelineState = 'idle';
  private started = false;
  private readonly tasks: DownloadTask[];
  private readonly pollIntervalMs: number;

  constructor(
    private readonly options: PipelineOptions,
    private readonly deps: PipelineDependencies,
    private readonly listener: PipelineListener = {},
    private readonly cancellation: CancellationFlag = new CancellationFlag(),
  ) {
    this.tasks = buildDownloadTasks(options.urls);
    this.pollIntervalMs = deps.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  get state(): PipelineState {
    return this.currentState;
  }

  get isLocalOnly(): boolean {
    return this.options.backend === LOCAL_BACKEND;
  }

  /** Asks the run to stop at its next poll point; repeated calls are no-ops. */
  requestCancel(): void {
    if (this.cancellation.isSet()) return;
    logger.info('pipeline', 'Cancellation requested.');
    this.cancellation.set();
  }

  async start(): Promise<PipelineOutcome> {
    if (this.started) {
      throw new Error('a pipeline run can only be started once');
    }
    this.started = true;

    let workDir: WorkDir;
    try {
      workDir = await this.acquireWorkDir();
    } catch (error) {
      const message = `Could not prepare working directory: ${errorMessage(error)}`;
      logger.error('pipeline', message);
      return this.conclude({ state: 'failed', downloads: [], uploads: [], error: message });
    }

    this.currentState = 'running';
    let outcome: PipelineOutcome;
    try {
      outcome = await this.execute(workDir.path);
    } finally {
      await this.releaseWorkDir(workDir);
    }
    return this.conclude(outcome);
  }

  private async acquireWorkDir(): Promise<WorkDir> {
    if (this.isLocalOnly) {
      const target = path.resolve(this.options.destinationFolder);
      await fs.ensureDir(target);
      return { path: target, temporary: false };
    }
    const root = this.deps.tempRoot ?? os.tmpdir();
    const dir = await fs.mkdtemp(path.join(root, TEMP_DIR_PREFIX));
    return { path: dir, temporary: true };
  }

  private async releaseWorkDir(workDir: WorkDir): Promise<void> {
    if (!workDir.temporary) return;
    try {
      await fs.remove(workDir.path);
      logger.debug('pipeline', `Removed working directory ${workDir.path}`);
    } catch (error) {
      logger.warn('pipeline', `Could not remove working directory ${workDir.path}: ${errorMessage(error)}`);
    }
  }

  private async execute(workDir: string): Promise<PipelineOutcome> {
    if (this.cancellation.isSet()) {
      logger.info('pipeline', 'Cancellation requested before any work started.');
      return { state: 'cancelled', downloads: [], uploads: [] };
    }
    this.emitProgress(START_PERCENT, `Working directory: ${workDir}`);

    const controller = new AbortController();
    const queue = new HandoffQueue<DownloadedFile>();
    // A failing activity aborts its sibling so neither waits forever.
    const guard = <T>(activity: Promise<T>): Promise<T> =>
      activity.catch((error: unknown) => {
        controller.abort();
        throw error;
      });

    const downloader = guard(this.runDownloader(workDir, queue, controller.signal));
    const uploader = this.isLocalOnly
      ? Promise.resolve<UploadResult[]>([])
      : guard(this.runUploader(queue, controller.signal));

    let settled = false;
    let wake: (() => void) | null = null;
    const completion = Promise.allSettled([downloader, uploader]).then((results) => {
      settled = true;
      wake?.();
      return results;
    });
    // Sleeps one poll interval; settling the activities cuts the sleep short.
    const waitForPoll = (): Promise<void> =>
      new Promise((resolve) => {
        const timer = setTimeout(resolve, this.pollIntervalMs);
        wake = () => {
          clearTimeout(timer);
          resolve();
        };
      });

    while (!settled) {
      if (this.cancellation.isSet()) {
        logger.info('pipeline', 'Cancellation flag observed, stopping activities.');
        controller.abort();
        await completion;
        return { state: 'cancelled', downloads: [], uploads: [] };
      }
      await waitForPoll();
      wake = null;
    }

    const [downloads, uploads] = await completion;
    if (downloads.status === 'fulfilled' && uploads.status === 'fulfilled') {
      logger.info('pipeline', 'All activities finished.');
      return { state: 'completed', downloads: downloads.value, uploads: uploads.value };
    }

    const reasons = [downloads, uploads]
      .filter((result): result is PromiseRejectedResult => result.status === 'rejected')
      .map((result) => result.reason)
      .filter((reason) => !isCancellation(reason));
    const message = `Pipeline stopped unexpectedly: ${reasons.map(errorMessage).join('; ') || 'unknown error'}`;
    logger.error('pipeline', message);
    return { state: 'failed', downloads: [], uploads: [], error: message };
  }

  private async runDownloader(
    workDir: string,
    queue: HandoffQueue<DownloadedFile>,
    signal: AbortSignal,
  ): Promise<DownloadResult[]> {
    const results: DownloadResult[] = [];
    const total = this.tasks.length;
    try {
      for (const [index, task] of this.tasks.entries()) {
        throwIfCanceled(signal);
        this.emitProgress(downloadProgress(index, total), `Downloading ${index + 1}/${total}: ${task.url}`);

        const result = await runDownloadStep(this.deps.download, {
          url: task.url,
          targetDir: workDir,
          quality: this.options.quality,
          proxy: this.options.proxy,
          filenameTemplate: this.options.filenameTemplate,
        });
        throwIfCanceled(signal);
        results.push(result);

        if (result.status === 'error') {
          this.emitError(`Download failed for ${task.url}: ${result.error}`);
          continue;
        }
        if (!this.isLocalOnly) {
          queue.push(result);
        }
      }
      logger.info('pipeline', `Downloader finished: ${results.length} item(s).`);
      return results;
    } finally {
      queue.close();
    }
  }

  private async runUploader(queue: HandoffQueue<DownloadedFile>, signal: AbortSignal): Promise<UploadResult[]> {
    const results: UploadResult[] = [];
    const total = this.tasks.length;

    for (;;) {
      const entry = await queue.pop(signal);
      if (entry.kind === 'end') break;
      throwIfCanceled(signal);

      const filename = path.basename(entry.value.path);
      this.emitProgress(
        uploadProgress(results.length, total),
        `Uploading ${results.length + 1}/${total}: ${filename}`,
      );

      const result = await this.deps.dispatchUpload({
        filePath: entry.value.path,
        backend: this.options.backend,
        destinationFolder: this.options.destinationFolder,
        filename,
      });
      throwIfCanceled(signal);
      results.push(result);

      if (result.status === 'error') {
        this.emitError(`Upload failed for ${filename}: ${result.error}`);
      }
    }

    logger.info('pipeline', `Uploader finished: ${results.length} item(s).`);
    return results;
  }

  private conclude(outcome: PipelineOutcome): PipelineOutcome {
    this.currentState = outcome.state;
    if (outcome.state === 'completed') {
      this.emitProgress(100, 'Done');
    }
    if (outcome.state === 'failed' && outcome.error) {
      this.emitError(outcome.error);
    }
    if (outcome.state === 'cancelled') {
      logger.warn('pipeline', 'Run cancelled; partial results discarded.');
    }
    this.notify('finished', () =>
      this.listener.finished?.(outcome.downloads, outcome.uploads, outcome.state === 'cancelled'),
    );
    return outcome;
  }

  private emitProgress(percent: number, message: string): void {
    logger.debug('pipeline', `${percent}% ${message}`);
    this.notify('progress', () => this.listener.progress?.(percent, message));
  }

  private emitError(message: string): void {
    logger.warn('pipeline', message);
    this.notify('error', () => this.listener.error?.(message));
  }

  private notify(event: keyof PipelineListener, call: () => void): void {
    try {
      call();
    } catch (error) {
      logger.error('pipeline', `The ${event} listener threw: ${errorMessage(error)}`);
    }
  }
}

/**
 * Starts a run and resolves with its outcome once the terminal event has fired.
 */
export const runPipeline = (
  options: PipelineOptions,
  deps: PipelineDependencies,
  listener: PipelineListener = {},
  cancellation?: CancellationFlag,
): Promise<PipelineOutcome> => new PipelineRun(options, deps, listener, cancellation).start();
