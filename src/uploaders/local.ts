import { constants } from 'node:fs';
import path from 'node:path';
import fs from 'fs-extra';
import { UploadError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { ConnectionCheck, UploadPayload } from '../types.js';
import type { ConnectionOptions, UploadStrategy } from './strategy.js';

/**
 * Copies the file into a folder on the local filesystem.
 */
export class LocalCopyStrategy implements UploadStrategy {
  async upload(filePath: string, destinationFolder: string, filename: string): Promise<UploadPayload> {
    const destinationFile = path.resolve(destinationFolder, filename);
    try {
      await fs.ensureDir(path.dirname(destinationFile));
      await fs.copy(filePath, destinationFile, { overwrite: true, preserveTimestamps: true });
      logger.info('upload', `[Local] Copied '${filename}' to ${destinationFile}`);
      return { backend: 'local', path: destinationFile };
    } catch (error) {
      logger.error('upload', `[Local] Copy of '${filename}' failed: ${errorMessage(error)}`);
      throw new UploadError(`Local copy failed: ${errorMessage(error)}`, 'filesystem', error);
    }
  }

  async checkConnection(options: ConnectionOptions = {}): Promise<ConnectionCheck> {
    const target = options.path?.trim();
    if (!target) {
      return { ok: false, message: 'No local destination path was given.' };
    }
    if (!(await fs.pathExists(target))) {
      return { ok: false, message: `Path does not exist: ${target}` };
    }
    const stats = await fs.stat(target);
    if (!stats.isDirectory()) {
      return { ok: false, message: `Path is not a directory: ${target}` };
    }
    try {
      await fs.access(target, constants.W_OK);
    } catch {
      return { ok: false, message: `No write permission for: ${target}` };
    }
    return { ok: true, message: '' };
  }
}
