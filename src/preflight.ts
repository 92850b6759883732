import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import type { ConnectionCheck } from './types.js';
import { resolveStrategy, type StrategyDependencies, type StrategyRegistry } from './uploaders/index.js';

export interface PreflightRequest {
  readonly backend: string;
  readonly destinationFolder: string;
}

export interface PreflightProbes {
  /** Companion binary needed to merge best-quality video and audio. */
  readonly isFfmpegInstalled: () => Promise<boolean>;
  readonly isFetchToolInstalled: () => Promise<boolean>;
}

export const FFMPEG_MISSING_MESSAGE =
  'ffmpeg was not found. It is required to download video in the best quality; install it and add it to PATH or set FFMPEG_PATH.';

export const FETCH_TOOL_MISSING_MESSAGE =
  'yt-dlp was not found. Install it and add it to PATH or set YT_DLP_PATH.';

/**
 * Rejects a run that has nothing to download. Kept apart from the environment
 * checks so `--check` works without URLs.
 */
export const checkUrlList = (urls: readonly string[]): ConnectionCheck =>
  urls.some((url) => url.trim().length > 0)
    ? { ok: true, message: '' }
    : { ok: false, message: 'No URLs were given.' };

/**
 * Validates the environment before a run starts. The first failing check
 * short-circuits and its message is meant to be shown as is.
 */
export const runPreflightChecks = async (
  request: PreflightRequest,
  probes: PreflightProbes,
  registry: StrategyRegistry,
  deps: StrategyDependencies,
): Promise<ConnectionCheck> => {
  try {
    if (!(await probes.isFfmpegInstalled())) {
      return { ok: false, message: FFMPEG_MISSING_MESSAGE };
    }

    if (!(await probes.isFetchToolInstalled())) {
      return { ok: false, message: FETCH_TOOL_MISSING_MESSAGE };
    }

    const strategy = resolveStrategy(registry, request.backend, deps);
    if (!strategy) {
      return { ok: false, message: `No upload logic is registered for '${request.backend}'.` };
    }

    const check = await strategy.checkConnection({ path: request.destinationFolder });
    if (!check.ok) {
      logger.warn('preflight', `Connection check for ${request.backend} failed: ${check.message}`);
    }
    return check;
  } catch (error) {
    const message = `Pre-flight check failed unexpectedly: ${errorMessage(error)}`;
    logger.error('preflight', message);
    return { ok: false, message };
  }
};
