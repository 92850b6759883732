import type { Dispatcher } from 'undici';
import type { CredentialProvider } from '../credentials.js';
import type { ConnectionCheck, UploadPayload } from '../types.js';

export interface ConnectionOptions {
  /** Destination path; required by the local strategy, ignored by cloud ones. */
  readonly path?: string;
}

/**
 * One upload backend. `upload` resolves only once the file is fully stored and
 * throws UploadError otherwise; `checkConnection` never throws.
 */
export interface UploadStrategy {
  upload(filePath: string, destinationFolder: string, filename: string): Promise<UploadPayload>;
  checkConnection(options?: ConnectionOptions): Promise<ConnectionCheck>;
}

export interface StrategyDependencies {
  readonly credentials: CredentialProvider;
  /** undici dispatcher for HTTP based backends; tests pass a MockAgent. */
  readonly dispatcher?: Dispatcher;
}

export type StrategyFactory = (deps: StrategyDependencies) => UploadStrategy;
