import { UploadError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { BackendName, UploadDispatchFn, UploadResult, UploadTask } from '../types.js';
import { GoogleDriveStrategy } from './google-drive.js';
import { LocalCopyStrategy } from './local.js';
import type { StrategyDependencies, StrategyFactory, UploadStrategy } from './strategy.js';
import { YandexDiskStrategy } from './yandex-disk.js';

export type { ConnectionOptions, StrategyDependencies, StrategyFactory, UploadStrategy } from './strategy.js';

export type StrategyRegistry = ReadonlyMap<string, StrategyFactory>;

export const BACKEND_LABELS: Readonly<Record<BackendName, string>> = {
  'google-drive': 'Google Drive',
  'yandex-disk': 'Yandex Disk',
  local: 'Save locally',
};

export const createDefaultRegistry = (): StrategyRegistry =>
  new Map<string, StrategyFactory>([
    ['google-drive', (deps) => new GoogleDriveStrategy(deps)],
    ['yandex-disk', (deps) => new YandexDiskStrategy(deps)],
    ['local', () => new LocalCopyStrategy()],
  ]);

/**
 * Instantiates the strategy registered under `backend`, or returns null.
 */
export const resolveStrategy = (
  registry: StrategyRegistry,
  backend: string,
  deps: StrategyDependencies,
): UploadStrategy | null => {
  const factory = registry.get(backend);
  return factory ? factory(deps) : null;
};

/**
 * Uploads one file through the strategy registered for its backend. Never
 * rejects: unknown backends and strategy failures come back as error results.
 */
export const uploadSingleFile = async (
  task: UploadTask,
  registry: StrategyRegistry,
  deps: StrategyDependencies,
): Promise<UploadResult> => {
  let strategy: UploadStrategy | null;
  try {
    strategy = resolveStrategy(registry, task.backend, deps);
  } catch (error) {
    const message = `Could not set up backend '${task.backend}': ${errorMessage(error)}`;
    logger.error('upload', message);
    return { status: 'error', filename: task.filename, error: message, kind: 'unexpected' };
  }

  if (!strategy) {
    const message = `No upload strategy registered for backend '${task.backend}'.`;
    logger.error('upload', message);
    return { status: 'error', filename: task.filename, error: message, kind: 'unknown-backend' };
  }

  try {
    const payload = await strategy.upload(task.filePath, task.destinationFolder, task.filename);
    logger.info('upload', `'${task.filename}' stored via ${task.backend}.`);
    return { status: 'success', filename: task.filename, payload };
  } catch (error) {
    const kind = error instanceof UploadError ? error.kind : 'unexpected';
    logger.error('upload', `Failed to upload '${task.filename}' to ${task.backend}: ${errorMessage(error)}`);
    return { status: 'error', filename: task.filename, error: errorMessage(error), kind };
  }
};

/**
 * Binds the dispatcher to a registry and dependencies for use by the pipeline.
 */
export const createUploadDispatcher = (
  registry: StrategyRegistry,
  deps: StrategyDependencies,
): UploadDispatchFn => (task) => uploadSingleFile(task, registry, deps);
