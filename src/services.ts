import type { AppConfig } from './config.js';
import { ConfigCredentialProvider, type CredentialProvider } from './credentials.js';
import { createYtDlpDownloader, isFfmpegInstalled, isYtDlpInstalled } from './download.js';
import type { PipelineDependencies } from './pipeline.js';
import type { PreflightProbes } from './preflight.js';
import { createRetryingDispatcher } from './retry.js';
import {
  createDefaultRegistry,
  createUploadDispatcher,
  type StrategyDependencies,
  type StrategyRegistry,
} from './uploaders/index.js';

export interface Services {
  readonly credentials: CredentialProvider;
  readonly registry: StrategyRegistry;
  readonly strategyDeps: StrategyDependencies;
  readonly pipeline: PipelineDependencies;
  readonly probes: PreflightProbes;
}

/**
 * Wires the production collaborators from configuration.
 */
export const createServices = (config: AppConfig): Services => {
  const credentials = new ConfigCredentialProvider(config);
  const registry = createDefaultRegistry();
  const strategyDeps: StrategyDependencies = { credentials };

  return {
    credentials,
    registry,
    strategyDeps,
    pipeline: {
      download: createYtDlpDownloader({ binaryPath: config.ytDlpPath, ffmpegPath: config.ffmpegPath }),
      dispatchUpload: createRetryingDispatcher(
        createUploadDispatcher(registry, strategyDeps),
        config.uploadRetries,
      ),
      pollIntervalMs: config.cancelPollMs,
    },
    probes: {
      isFfmpegInstalled: () => isFfmpegInstalled(config.ffmpegPath),
      isFetchToolInstalled: () => isYtDlpInstalled(config.ytDlpPath),
    },
  };
};
