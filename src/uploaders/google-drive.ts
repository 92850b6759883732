import fs from 'fs-extra';
import { drive } from '@googleapis/drive';
import type { GoogleAuthClient } from '../credentials.js';
import { AuthError, UploadError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { ConnectionCheck, UploadPayload } from '../types.js';
import { ensureFolderChain, type FolderApi } from './folder-chain.js';
import type { StrategyDependencies, UploadStrategy } from './strategy.js';

const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';
const ROOT_FOLDER_ID = 'root';

export interface DriveFileRef {
  readonly id: string;
  readonly webViewLink?: string;
}

/**
 * The slice of the Drive v3 API the strategy relies on.
 */
export interface DriveApi extends FolderApi {
  findFile(parentId: string, name: string): Promise<string | null>;
  createFile(parentId: string, name: string, filePath: string): Promise<DriveFileRef>;
  updateFile(fileId: string, filePath: string): Promise<DriveFileRef>;
  /** Returns a label for the signed-in account. */
  about(): Promise<string>;
}

export const escapeQueryValue = (value: string): string =>
  value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");

export const buildChildQuery = (parentId: string, name: string, folder: boolean): string =>
  [
    `'${escapeQueryValue(parentId)}' in parents`,
    `name = '${escapeQueryValue(name)}'`,
    folder ? `mimeType = '${FOLDER_MIME_TYPE}'` : `mimeType != '${FOLDER_MIME_TYPE}'`,
    'trashed = false',
  ].join(' and ');

const toFileRef = (data: { id?: string | null; webViewLink?: string | null }): DriveFileRef => {
  if (!data.id) {
    throw new Error('Drive API response did not include a file id');
  }
  return { id: data.id, webViewLink: data.webViewLink ?? undefined };
};

/**
 * Binds DriveApi to the real Drive v3 client.
 */
export const createDriveApi = (authClient: GoogleAuthClient): DriveApi => {
  const service = drive({ version: 'v3', auth: authClient });

  const findChild = async (parentId: string, name: string, folder: boolean): Promise<string | null> => {
    const response = await service.files.list({
      q: buildChildQuery(parentId, name, folder),
      fields: 'files(id, name)',
      spaces: 'drive',
      pageSize: 1,
    });
    return response.data.files?.[0]?.id ?? null;
  };

  return {
    findFolder: (parentId, name) => findChild(parentId, name, true),
    findFile: (parentId, name) => findChild(parentId, name, false),
    createFolder: async (parentId, name) => {
      const response = await service.files.create({
        requestBody: { name, mimeType: FOLDER_MIME_TYPE, parents: [parentId] },
        fields: 'id',
      });
      return toFileRef(response.data).id;
    },
    createFile: async (parentId, name, filePath) => {
      const response = await service.files.create({
        requestBody: { name, parents: [parentId] },
        media: { body: fs.createReadStream(filePath) },
        fields: 'id, webViewLink',
      });
      return toFileRef(response.data);
    },
    updateFile: async (fileId, filePath) => {
      const response = await service.files.update({
        fileId,
        media: { body: fs.createReadStream(filePath) },
        fields: 'id, webViewLink',
      });
      return toFileRef(response.data);
    },
    about: async () => {
      const response = await service.about.get({ fields: 'user' });
      const user = response.data.user;
      return user?.emailAddress ?? user?.displayName ?? 'unknown user';
    },
  };
};

export interface GoogleDriveStrategyOptions {
  /** Builds an API handle; defaults to credentials from the provider. */
  readonly connect?: () => Promise<DriveApi>;
}

export class GoogleDriveStrategy implements UploadStrategy {
  private readonly connect: () => Promise<DriveApi>;

  constructor(deps: StrategyDependencies, options: GoogleDriveStrategyOptions = {}) {
    this.connect =
      options.connect ?? (async () => createDriveApi(await deps.credentials.getGoogleAuth()));
  }

  async upload(filePath: string, destinationFolder: string, filename: string): Promise<UploadPayload> {
    const api = await this.openApi();

    let folderId: string;
    try {
      folderId = await ensureFolderChain(api, ROOT_FOLDER_ID, destinationFolder);
    } catch (error) {
      logger.error('upload', `[Drive] Folder lookup/creation failed for '${destinationFolder}': ${errorMessage(error)}`);
      throw new UploadError(
        `Google Drive API error while preparing folder '${destinationFolder}': ${errorMessage(error)}`,
        'backend',
        error,
      );
    }

    try {
      const existingId = await api.findFile(folderId, filename);
      const file = existingId
        ? await api.updateFile(existingId, filePath)
        : await api.createFile(folderId, filename, filePath);
      logger.info('upload', `[Drive] ${existingId ? 'Replaced' : 'Uploaded'} '${filename}' (${file.id})`);
      return { backend: 'google-drive', id: file.id, url: file.webViewLink };
    } catch (error) {
      logger.error('upload', `[Drive] Upload of '${filename}' failed: ${errorMessage(error)}`);
      throw new UploadError(`Google Drive API error: ${errorMessage(error)}`, 'backend', error);
    }
  }

  async checkConnection(): Promise<ConnectionCheck> {
    let api: DriveApi;
    try {
      api = await this.connect();
    } catch (error) {
      return { ok: false, message: `Google Drive credentials are not available: ${errorMessage(error)}` };
    }

    try {
      const account = await api.about();
      logger.debug('preflight', `Google Drive reachable as ${account}`);
      return { ok: true, message: '' };
    } catch (error) {
      logger.error('preflight', `Google Drive connection check failed: ${errorMessage(error)}`);
      return { ok: false, message: `Google Drive API error: ${errorMessage(error)}` };
    }
  }

  private async openApi(): Promise<DriveApi> {
    try {
      return await this.connect();
    } catch (error) {
      if (error instanceof AuthError) {
        throw new UploadError(error.message, 'credentials', error);
      }
      throw new UploadError(`Could not initialise Google Drive client: ${errorMessage(error)}`, 'backend', error);
    }
  }
}
