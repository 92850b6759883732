export type BackendName = 'google-drive' | 'yandex-disk' | 'local';

/** Backend that downloads straight into the destination folder with no upload stage. */
export const LOCAL_BACKEND: BackendName = 'local';

export interface DownloadTask {
  readonly url: string;
}

export type DownloadResult =
  | { readonly status: 'success'; readonly url: string; readonly path: string }
  | { readonly status: 'error'; readonly url: string; readonly error: string };

export interface UploadTask {
  readonly filePath: string;
  readonly backend: string;
  readonly destinationFolder: string;
  readonly filename: string;
}

export type UploadPayload =
  | { readonly backend: 'google-drive'; readonly id: string; readonly url?: string }
  | { readonly backend: 'yandex-disk'; readonly url: string }
  | { readonly backend: 'local'; readonly path: string };

export type UploadErrorKind = 'credentials' | 'backend' | 'filesystem' | 'unknown-backend' | 'unexpected';

export type UploadResult =
  | { readonly status: 'success'; readonly filename: string; readonly payload: UploadPayload }
  | {
      readonly status: 'error';
      readonly filename: string;
      readonly error: string;
      readonly kind: UploadErrorKind;
    };

export interface ConnectionCheck {
  readonly ok: boolean;
  readonly message: string;
}

export interface DownloadRequest {
  readonly url: string;
  readonly targetDir: string;
  readonly quality?: string;
  readonly proxy?: string;
  readonly filenameTemplate?: string;
}

/**
 * Fetch collaborator. Expected failures (network, unavailable video) resolve
 * to an error result instead of rejecting.
 */
export type DownloadFn = (request: DownloadRequest) => Promise<DownloadResult>;

export type UploadDispatchFn = (task: UploadTask) => Promise<UploadResult>;
