import fs from 'fs-extra';
import { request, type Dispatcher } from 'undici';
import { AuthError, UploadError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { ConnectionCheck, UploadPayload } from '../types.js';
import { ensureFolderChain, type FolderApi } from './folder-chain.js';
import type { StrategyDependencies, UploadStrategy } from './strategy.js';

export const YANDEX_DISK_API = 'https://cloud-api.yandex.net/v1/disk';

type HttpMethod = 'GET' | 'PUT';

export class YandexDiskApiError extends Error {
  constructor(
    readonly statusCode: number,
    message: string,
  ) {
    super(message);
    this.name = 'YandexDiskApiError';
  }
}

const describeBody = (body: unknown): string | undefined => {
  if (body && typeof body === 'object') {
    if ('description' in body && typeof body.description === 'string') return body.description;
    if ('message' in body && typeof body.message === 'string') return body.message;
  }
  return undefined;
};

const readHref = (body: unknown): string => {
  if (body && typeof body === 'object' && 'href' in body && typeof body.href === 'string') {
    return body.href;
  }
  throw new Error('Yandex Disk response did not include an href');
};

export const joinDiskPath = (parent: string, name: string): string =>
  `${parent.replace(/\/+$/u, '')}/${name}`;

export interface YandexDiskClientOptions {
  readonly token: string;
  readonly dispatcher?: Dispatcher;
  readonly baseUrl?: string;
}

/**
 * Minimal Yandex Disk REST client. Folder ids are absolute disk paths.
 */
export class YandexDiskClient implements FolderApi {
  private readonly baseUrl: string;

  constructor(private readonly options: YandexDiskClientOptions) {
    this.baseUrl = options.baseUrl ?? YANDEX_DISK_API;
  }

  /** True when the token is accepted, false on 401; other failures throw. */
  async checkToken(): Promise<boolean> {
    const { statusCode, body } = await this.call('GET', '/');
    if (statusCode === 401) {
      return false;
    }
    if (statusCode >= 400) {
      throw new YandexDiskApiError(statusCode, describeBody(body) ?? `HTTP ${statusCode}`);
    }
    return true;
  }

  async findFolder(parentId: string, name: string): Promise<string | null> {
    const diskPath = joinDiskPath(parentId, name);
    const { statusCode, body } = await this.call('GET', '/resources', { path: diskPath });
    if (statusCode === 404) {
      return null;
    }
    this.ensureOk(statusCode, body);
    if (body && typeof body === 'object' && 'type' in body && body.type !== 'dir') {
      throw new YandexDiskApiError(409, `'${diskPath}' exists and is not a folder`);
    }
    return diskPath;
  }

  async createFolder(parentId: string, name: string): Promise<string> {
    const diskPath = joinDiskPath(parentId, name);
    const { statusCode, body } = await this.call('PUT', '/resources', { path: diskPath });
    this.ensureOk(statusCode, body);
    return diskPath;
  }

  /** Uploads the file to `diskPath`, replacing whatever is stored there. */
  async uploadFile(filePath: string, diskPath: string): Promise<void> {
    const target = await this.call('GET', '/resources/upload', { path: diskPath, overwrite: 'true' });
    this.ensureOk(target.statusCode, target.body);

    const stats = await fs.stat(filePath);
    const response = await request(readHref(target.body), {
      method: 'PUT',
      body: fs.createReadStream(filePath),
      headers: { 'content-length': String(stats.size) },
      dispatcher: this.options.dispatcher,
    });
    await response.body.dump();
    if (response.statusCode >= 400) {
      throw new YandexDiskApiError(response.statusCode, `file transfer failed with HTTP ${response.statusCode}`);
    }
  }

  async getDownloadLink(diskPath: string): Promise<string> {
    const { statusCode, body } = await this.call('GET', '/resources/download', { path: diskPath });
    this.ensureOk(statusCode, body);
    return readHref(body);
  }

  private ensureOk(statusCode: number, body: unknown): void {
    if (statusCode === 401) {
      throw new AuthError('Yandex Disk token is invalid.');
    }
    if (statusCode >= 400) {
      throw new YandexDiskApiError(statusCode, describeBody(body) ?? `HTTP ${statusCode}`);
    }
  }

  private async call(
    method: HttpMethod,
    resource: string,
    query: Record<string, string> = {},
  ): Promise<{ statusCode: number; body: unknown }> {
    const url = new URL(`${this.baseUrl}${resource}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }

    const response = await request(url, {
      method,
      headers: { authorization: `OAuth ${this.options.token}`, accept: 'application/json' },
      dispatcher: this.options.dispatcher,
    });
    const text = await response.body.text();
    let body: unknown = undefined;
    if (text.length > 0) {
      try {
        body = JSON.parse(text);
      } catch {
        body = text;
      }
    }
    return { statusCode: response.statusCode, body };
  }
}

export interface YandexDiskStrategyOptions {
  readonly baseUrl?: string;
}

export class YandexDiskStrategy implements UploadStrategy {
  constructor(
    private readonly deps: StrategyDependencies,
    private readonly options: YandexDiskStrategyOptions = {},
  ) {}

  async upload(filePath: string, destinationFolder: string, filename: string): Promise<UploadPayload> {
    const client = await this.openClient();

    let folderPath: string;
    try {
      folderPath = await ensureFolderChain(client, '', destinationFolder);
    } catch (error) {
      throw this.wrap(error, `Yandex Disk API error while preparing folder '${destinationFolder}'`);
    }

    const remotePath = joinDiskPath(folderPath, filename);
    try {
      await client.uploadFile(filePath, remotePath);
      const url = await client.getDownloadLink(remotePath);
      logger.info('upload', `[Yandex] Uploaded '${filename}' to ${remotePath}`);
      return { backend: 'yandex-disk', url };
    } catch (error) {
      throw this.wrap(error, 'Yandex Disk API error');
    }
  }

  async checkConnection(): Promise<ConnectionCheck> {
    let token: string;
    try {
      token = await this.deps.credentials.getYandexToken();
    } catch (error) {
      return { ok: false, message: errorMessage(error) };
    }

    try {
      const valid = await this.createClient(token).checkToken();
      return valid ? { ok: true, message: '' } : { ok: false, message: 'Yandex Disk token is invalid.' };
    } catch (error) {
      logger.error('preflight', `Yandex Disk token check failed: ${errorMessage(error)}`);
      return { ok: false, message: `Network or API error: ${errorMessage(error)}` };
    }
  }

  private async openClient(): Promise<YandexDiskClient> {
    let token: string;
    try {
      token = await this.deps.credentials.getYandexToken();
    } catch (error) {
      throw new UploadError(errorMessage(error), 'credentials', error);
    }
    return this.createClient(token);
  }

  private createClient(token: string): YandexDiskClient {
    return new YandexDiskClient({ token, dispatcher: this.deps.dispatcher, baseUrl: this.options.baseUrl });
  }

  private wrap(error: unknown, context: string): UploadError {
    logger.error('upload', `[Yandex] ${context}: ${errorMessage(error)}`);
    if (error instanceof AuthError) {
      return new UploadError(error.message, 'credentials', error);
    }
    return new UploadError(`${context}: ${errorMessage(error)}`, 'backend', error);
  }
}
