import path from 'node:path';
import fs from 'fs-extra';
import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AuthError } from '../../errors.js';
import { fakeCredentials, makeTempDir } from '../../__tests__/fakes.js';
import { YandexDiskStrategy, joinDiskPath } from '../yandex-disk.js';

const API_ORIGIN = 'https://cloud-api.yandex.net';
const UPLOAD_ORIGIN = 'https://uploader.test';
const AUTH_HEADERS = { authorization: 'OAuth test-token' };

describe('joinDiskPath', () => {
  it('joins without doubling slashes', () => {
    expect(joinDiskPath('', 'Videos')).toBe('/Videos');
    expect(joinDiskPath('/Videos/', '2024')).toBe('/Videos/2024');
  });
});

describe('YandexDiskStrategy', () => {
  let agent: MockAgent;
  let workDir: string;
  let filePath: string;

  beforeEach(async () => {
    agent = new MockAgent();
    agent.disableNetConnect();
    workDir = await makeTempDir('vdu-yandex-test-');
    filePath = path.join(workDir, 'clip.mp4');
    await fs.outputFile(filePath, 'video bytes');
  });

  afterEach(async () => {
    agent.assertNoPendingInterceptors();
    await agent.close();
    await fs.remove(workDir);
  });

  const strategy = (credentials = fakeCredentials()) =>
    new YandexDiskStrategy({ credentials, dispatcher: agent });

  it('walks the folder chain, uploads and returns the download link', async () => {
    const api = agent.get(API_ORIGIN);
    api
      .intercept({ path: '/v1/disk/resources', method: 'GET', query: { path: '/Videos' }, headers: AUTH_HEADERS })
      .reply(200, { type: 'dir', path: 'disk:/Videos' });
    api
      .intercept({ path: '/v1/disk/resources', method: 'GET', query: { path: '/Videos/2024' } })
      .reply(404, { error: 'DiskNotFoundError', description: 'Resource not found.' });
    api
      .intercept({ path: '/v1/disk/resources', method: 'PUT', query: { path: '/Videos/2024' } })
      .reply(201, { href: `${API_ORIGIN}/v1/disk/resources?path=disk%3A%2FVideos%2F2024` });
    api
      .intercept({
        path: '/v1/disk/resources/upload',
        method: 'GET',
        query: { path: '/Videos/2024/clip.mp4', overwrite: 'true' },
      })
      .reply(200, { href: `${UPLOAD_ORIGIN}/upload/target-1`, method: 'PUT' });
    agent.get(UPLOAD_ORIGIN).intercept({ path: '/upload/target-1', method: 'PUT' }).reply(201, '');
    api
      .intercept({ path: '/v1/disk/resources/download', method: 'GET', query: { path: '/Videos/2024/clip.mp4' } })
      .reply(200, { href: 'https://downloader.test/clip.mp4' });

    const payload = await strategy().upload(filePath, 'Videos/2024', 'clip.mp4');

    expect(payload).toEqual({ backend: 'yandex-disk', url: 'https://downloader.test/clip.mp4' });
  });

  it('reports a rejected transfer as a backend error', async () => {
    const api = agent.get(API_ORIGIN);
    api
      .intercept({ path: '/v1/disk/resources/upload', method: 'GET', query: { path: '/clip.mp4', overwrite: 'true' } })
      .reply(200, { href: `${UPLOAD_ORIGIN}/upload/target-2` });
    agent.get(UPLOAD_ORIGIN).intercept({ path: '/upload/target-2', method: 'PUT' }).reply(507, '');

    await expect(strategy().upload(filePath, '', 'clip.mp4')).rejects.toMatchObject({
      kind: 'backend',
      message: 'Yandex Disk API error: file transfer failed with HTTP 507',
    });
  });

  it('reports API errors while preparing folders with their description', async () => {
    agent
      .get(API_ORIGIN)
      .intercept({ path: '/v1/disk/resources', method: 'GET', query: { path: '/Videos' } })
      .reply(503, { error: 'ServiceUnavailable', description: 'Service temporarily unavailable.' });

    await expect(strategy().upload(filePath, 'Videos', 'clip.mp4')).rejects.toMatchObject({
      kind: 'backend',
      message: "Yandex Disk API error while preparing folder 'Videos': Service temporarily unavailable.",
    });
  });

  it('treats a 401 as a credential failure', async () => {
    agent
      .get(API_ORIGIN)
      .intercept({ path: '/v1/disk/resources', method: 'GET', query: { path: '/Videos' } })
      .reply(401, { error: 'UnauthorizedError', description: 'Unauthorized' });

    await expect(strategy().upload(filePath, 'Videos', 'clip.mp4')).rejects.toMatchObject({
      kind: 'credentials',
      message: 'Yandex Disk token is invalid.',
    });
  });

  it('fails fast when no token is configured', async () => {
    const credentials = fakeCredentials({
      getYandexToken: async () => {
        throw new AuthError('YANDEX_DISK_TOKEN is not configured.');
      },
    });

    await expect(strategy(credentials).upload(filePath, 'Videos', 'clip.mp4')).rejects.toMatchObject({
      kind: 'credentials',
      message: 'YANDEX_DISK_TOKEN is not configured.',
    });
    expect(await strategy(credentials).checkConnection()).toEqual({
      ok: false,
      message: 'YANDEX_DISK_TOKEN is not configured.',
    });
  });

  describe('checkConnection', () => {
    it('passes when the disk info is readable', async () => {
      agent
        .get(API_ORIGIN)
        .intercept({ path: '/v1/disk/', method: 'GET', headers: AUTH_HEADERS })
        .reply(200, { total_space: 10, used_space: 1 });

      expect(await strategy().checkConnection()).toEqual({ ok: true, message: '' });
    });

    it('fails on a rejected token', async () => {
      agent.get(API_ORIGIN).intercept({ path: '/v1/disk/', method: 'GET' }).reply(401, { description: 'Unauthorized' });

      expect(await strategy().checkConnection()).toEqual({ ok: false, message: 'Yandex Disk token is invalid.' });
    });

    it('fails on network errors', async () => {
      agent.get(API_ORIGIN).intercept({ path: '/v1/disk/', method: 'GET' }).replyWithError(new Error('socket hang up'));

      expect(await strategy().checkConnection()).toEqual({
        ok: false,
        message: 'Network or API error: socket hang up',
      });
    });
  });
});
