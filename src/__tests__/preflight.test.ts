import { describe, expect, it, vi } from 'vitest';
import {
  FETCH_TOOL_MISSING_MESSAGE,
  FFMPEG_MISSING_MESSAGE,
  checkUrlList,
  runPreflightChecks,
  type PreflightProbes,
} from '../preflight.js';
import type { ConnectionCheck } from '../types.js';
import type { StrategyFactory, UploadStrategy } from '../uploaders/index.js';
import { fakeCredentials } from './fakes.js';

const deps = { credentials: fakeCredentials() };

const probes = (ffmpeg = true, fetchTool = true): PreflightProbes => ({
  isFfmpegInstalled: vi.fn(async () => ffmpeg),
  isFetchToolInstalled: vi.fn(async () => fetchTool),
});

const registryReturning = (check: UploadStrategy['checkConnection']) => {
  const factory: StrategyFactory = () => ({
    upload: async () => ({ backend: 'local', path: '/unused' }),
    checkConnection: check,
  });
  return new Map([['stub', factory]]);
};

const request = { backend: 'stub', destinationFolder: '/library' };

describe('runPreflightChecks', () => {
  it('passes when every check passes', async () => {
    const check = vi.fn(async (): Promise<ConnectionCheck> => ({ ok: true, message: '' }));

    const result = await runPreflightChecks(request, probes(), registryReturning(check), deps);

    expect(result).toEqual({ ok: true, message: '' });
    expect(check).toHaveBeenCalledWith({ path: '/library' });
  });

  it('reports a missing ffmpeg before anything else', async () => {
    const tools = probes(false, false);

    const result = await runPreflightChecks(request, tools, registryReturning(vi.fn()), deps);

    expect(result).toEqual({ ok: false, message: FFMPEG_MISSING_MESSAGE });
    expect(tools.isFetchToolInstalled).not.toHaveBeenCalled();
  });

  it('reports a missing yt-dlp', async () => {
    const result = await runPreflightChecks(request, probes(true, false), registryReturning(vi.fn()), deps);

    expect(result).toEqual({ ok: false, message: FETCH_TOOL_MISSING_MESSAGE });
  });

  it('reports an unknown backend', async () => {
    const result = await runPreflightChecks({ ...request, backend: 'dropbox' }, probes(), new Map(), deps);

    expect(result).toEqual({ ok: false, message: "No upload logic is registered for 'dropbox'." });
  });

  it('returns the backend check as is', async () => {
    const result = await runPreflightChecks(
      request,
      probes(),
      registryReturning(async () => ({ ok: false, message: 'Yandex Disk token is invalid.' })),
      deps,
    );

    expect(result).toEqual({ ok: false, message: 'Yandex Disk token is invalid.' });
  });

  it('turns an unexpected throw into a failed check', async () => {
    const tools: PreflightProbes = {
      isFfmpegInstalled: async () => {
        throw new Error('spawn EACCES');
      },
      isFetchToolInstalled: async () => true,
    };

    const result = await runPreflightChecks(request, tools, registryReturning(vi.fn()), deps);

    expect(result).toEqual({ ok: false, message: 'Pre-flight check failed unexpectedly: spawn EACCES' });
  });
});

describe('checkUrlList', () => {
  it('requires at least one non-blank URL', () => {
    expect(checkUrlList([])).toEqual({ ok: false, message: 'No URLs were given.' });
    expect(checkUrlList(['  '])).toEqual({ ok: false, message: 'No URLs were given.' });
    expect(checkUrlList(['https://videos.test/a'])).toEqual({ ok: true, message: '' });
  });
});
