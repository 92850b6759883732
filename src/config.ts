import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => !(value === '' || value === '0' || value === 'false' || value === 'no'));

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const envSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_TO_FILE: booleanFlag.default('false'),
  LOG_FILE_PATH: z.string().trim().min(1).default(path.join('logs', 'app.log')),
  YANDEX_DISK_TOKEN: optionalString,
  GOOGLE_TOKEN_PATH: z.string().trim().min(1).default(path.join('credentials', 'google_token.json')),
  PROXY_URL: optionalString,
  FFMPEG_PATH: optionalString,
  YT_DLP_PATH: z.string().trim().min(1).default('yt-dlp'),
  UPLOAD_RETRIES: z.coerce.number().int().min(1).default(1),
  CANCEL_POLL_MS: z.coerce.number().int().positive().default(100),
});

export interface AppConfig {
  readonly logLevel: 'debug' | 'info' | 'warn' | 'error';
  readonly logToFile: boolean;
  readonly logFilePath: string;
  readonly yandexDiskToken?: string;
  readonly googleTokenPath: string;
  readonly proxyUrl?: string;
  readonly ffmpegPath?: string;
  readonly ytDlpPath: string;
  readonly uploadRetries: number;
  readonly cancelPollMs: number;
}

/**
 * Validates the relevant environment variables and maps them onto AppConfig.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    logLevel: values.LOG_LEVEL,
    logToFile: values.LOG_TO_FILE,
    logFilePath: values.LOG_FILE_PATH,
    yandexDiskToken: values.YANDEX_DISK_TOKEN,
    googleTokenPath: values.GOOGLE_TOKEN_PATH,
    proxyUrl: values.PROXY_URL,
    ffmpegPath: values.FFMPEG_PATH,
    ytDlpPath: values.YT_DLP_PATH,
    uploadRetries: values.UPLOAD_RETRIES,
    cancelPollMs: values.CANCEL_POLL_MS,
  };
};

let cachedConfig: AppConfig | null = null;

export const getConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
};

/**
 * Drops the memoized config so the next read picks up a changed environment.
 */
export const reloadConfig = (): AppConfig => {
  cachedConfig = null;
  return getConfig();
};
