import path from 'node:path';
import fs from 'fs-extra';
import ffmpeg from 'fluent-ffmpeg';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import type { DownloadFn, DownloadRequest, DownloadResult } from './types.js';

export const DEFAULT_FILENAME_TEMPLATE = '%(title)s.%(ext)s';

const heightCapped = (height: number): string =>
  `bestvideo[height<=${height}]+bestaudio/best[height<=${height}]`;

export const QUALITY_PRESETS: Readonly<Record<string, string>> = {
  best: 'bestvideo+bestaudio/best',
  '1080p': heightCapped(1080),
  '720p': heightCapped(720),
  '480p': heightCapped(480),
  audio: 'bestaudio/best',
};

/**
 * Maps a preset name onto a yt-dlp format string; anything else is taken as a raw format.
 */
export const resolveQualityFormat = (quality?: string): string | undefined => {
  const trimmed = quality?.trim();
  if (!trimmed) {
    return undefined;
  }
  return QUALITY_PRESETS[trimmed] ?? trimmed;
};

/**
 * Builds the yt-dlp argument list for one URL. The final file path is printed
 * after post-processing so the caller never has to guess the extension.
 */
export const buildYtDlpArgs = (request: DownloadRequest, ffmpegPath?: string): string[] => {
  const args = [
    request.url,
    '--no-playlist',
    '--no-simulate',
    '--print',
    'after_move:filepath',
    '--newline',
    '--no-warnings',
    '--paths',
    request.targetDir,
    '--output',
    request.filenameTemplate?.trim() || DEFAULT_FILENAME_TEMPLATE,
  ];

  const format = resolveQualityFormat(request.quality);
  if (format) {
    args.push('--format', format);
  }
  if (request.proxy) {
    args.push('--proxy', request.proxy);
  }
  if (ffmpegPath) {
    args.push('--ffmpeg-location', ffmpegPath);
  }
  return args;
};

/**
 * Picks the reported file path out of yt-dlp stdout (last non-empty line).
 */
export const parseDownloadedPath = (stdout: string): string | null => {
  const lines = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines.at(-1) ?? null;
};

/**
 * Reduces a yt-dlp failure to its ERROR line when there is one.
 */
export const describeYtDlpError = (error: unknown): string => {
  const message = errorMessage(error);
  const match = message.match(/ERROR:\s*(.+)/);
  return match ? match[1].trim() : message.trim();
};

export interface YtDlpRunner {
  execPromise: (args: string[]) => Promise<string>;
  getVersion: () => Promise<string>;
}

type YtDlpConstructor = new (binaryPath?: string) => YtDlpRunner;

const runnerCache = new Map<string, Promise<YtDlpRunner>>();

/**
 * Lazily instantiates the yt-dlp wrapper so each binary path is set up once.
 */
export const getYtDlp = (binaryPath: string): Promise<YtDlpRunner> => {
  let pending = runnerCache.get(binaryPath);
  if (!pending) {
    pending = import('yt-dlp-wrap').then((module) => {
      // The package is CommonJS with a transpiled default export.
      const exported = module.default as unknown as YtDlpConstructor | { default: YtDlpConstructor };
      const Constructor = 'default' in exported ? exported.default : exported;
      return new Constructor(binaryPath);
    });
    runnerCache.set(binaryPath, pending);
  }
  return pending;
};

export interface YtDlpDownloaderOptions {
  readonly binaryPath: string;
  readonly ffmpegPath?: string;
  readonly runner?: YtDlpRunner;
}

/**
 * Creates the default fetch collaborator backed by yt-dlp.
 */
export const createYtDlpDownloader = ({
  binaryPath,
  ffmpegPath,
  runner,
}: YtDlpDownloaderOptions): DownloadFn => {
  return async (request: DownloadRequest): Promise<DownloadResult> => {
    logger.info('download', `Starting download: ${request.url}`);
    if (request.proxy) {
      logger.info('download', `Using proxy: ${request.proxy}`);
    }

    try {
      await fs.ensureDir(request.targetDir);
      const ytDlp = runner ?? (await getYtDlp(binaryPath));
      const stdout = await ytDlp.execPromise(buildYtDlpArgs(request, ffmpegPath));
      const reported = parseDownloadedPath(stdout);
      if (!reported) {
        return { status: 'error', url: request.url, error: 'yt-dlp did not report a file path' };
      }

      const filePath = path.resolve(request.targetDir, reported);
      if (!(await fs.pathExists(filePath))) {
        return { status: 'error', url: request.url, error: `Downloaded file is missing: ${filePath}` };
      }

      logger.info('download', `Downloaded ${path.basename(filePath)}`);
      return { status: 'success', url: request.url, path: filePath };
    } catch (error) {
      const message = describeYtDlpError(error);
      logger.error('download', `Download failed for ${request.url}: ${message}`);
      return { status: 'error', url: request.url, error: message };
    }
  };
};

/**
 * Runs one download through the collaborator, turning anything it throws into an error result.
 */
export const runDownloadStep = async (
  download: DownloadFn,
  request: DownloadRequest,
): Promise<DownloadResult> => {
  try {
    return await download(request);
  } catch (error) {
    const message = errorMessage(error);
    logger.error('download', `Download step threw for ${request.url}: ${message}`);
    return { status: 'error', url: request.url, error: message };
  }
};

/**
 * Probes ffmpeg by asking fluent-ffmpeg for the supported formats.
 */
export const isFfmpegInstalled = (ffmpegPath?: string): Promise<boolean> => {
  if (ffmpegPath) {
    ffmpeg.setFfmpegPath(ffmpegPath);
  }
  return new Promise((resolve) => {
    ffmpeg.getAvailableFormats((error) => {
      if (error) {
        logger.debug('preflight', `ffmpeg probe failed: ${error.message}`);
        resolve(false);
        return;
      }
      resolve(true);
    });
  });
};

/**
 * Checks that the yt-dlp binary answers a version query.
 */
export const isYtDlpInstalled = async (binaryPath: string, runner?: YtDlpRunner): Promise<boolean> => {
  try {
    const ytDlp = runner ?? (await getYtDlp(binaryPath));
    const version = await ytDlp.getVersion();
    logger.debug('preflight', `yt-dlp version ${version.trim()}`);
    return true;
  } catch (error) {
    logger.debug('preflight', `yt-dlp probe failed: ${errorMessage(error)}`);
    return false;
  }
};
