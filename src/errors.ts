import type { UploadErrorKind } from './types.js';

export type UploadFailureKind = Extract<UploadErrorKind, 'credentials' | 'backend' | 'filesystem'>;

/**
 * Raised by upload strategies; the dispatcher turns it into an error result.
 */
export class UploadError extends Error {
  readonly kind: UploadFailureKind;
  readonly details?: unknown;

  constructor(message: string, kind: UploadFailureKind, details?: unknown) {
    super(message);
    this.name = 'UploadError';
    this.kind = kind;
    this.details = details;
  }
}

export class AuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
