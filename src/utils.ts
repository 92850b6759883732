import fs from 'fs-extra';
import type { DownloadTask } from './types.js';

/**
 * Reads URLs from a list file, one per line, skipping blanks and `#` comments.
 */
export const readUrlList = async (filePath: string): Promise<string[]> => {
  const exists = await fs.pathExists(filePath);
  if (!exists) {
    return [];
  }
  const raw = await fs.readFile(filePath, 'utf-8');
  return raw
    .split(/\r?\n/)
    .map((line: string) => line.trim())
    .filter((line: string) => line.length > 0 && !line.startsWith('#'));
};

/**
 * Creates the downloads directory when it does not exist yet.
 */
export const ensureDownloadsDir = async (dir: string): Promise<void> => {
  await fs.ensureDir(dir);
};

/**
 * Detects whether the given string is an absolute http(s) URL.
 */
export const isHttpUrl = (input: string): boolean => {
  try {
    const parsed = new URL(input);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
};

/**
 * Turns raw user input into download tasks, trimming entries and dropping blanks.
 */
export const buildDownloadTasks = (entries: readonly string[]): DownloadTask[] =>
  entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0).map((url) => ({ url }));

/**
 * Splits a slash separated backend path into its non-empty segments.
 */
export const splitFolderPath = (folderPath: string): string[] =>
  folderPath
    .split(/[\\/]/)
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);

/**
 * Truncates long labels so progress bars remain readable in narrower terminals.
 */
export const truncateLabel = (value: string, maxLength = 42): string =>
  value.length <= maxLength ? value : `${value.slice(0, maxLength - 3)}...`;
