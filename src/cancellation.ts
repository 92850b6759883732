/**
 * Per-run cancel request shared between the caller and the pipeline. The
 * caller only sets it; the pipeline only reads it at its poll points.
 */
export class CancellationFlag {
  private flag = false;

  set(): void {
    this.flag = true;
  }

  isSet(): boolean {
    return this.flag;
  }
}

export class OperationCanceledError extends Error {
  constructor() {
    super('operation canceled');
    this.name = 'OperationCanceledError';
  }
}

export const throwIfCanceled = (signal: AbortSignal): void => {
  if (signal.aborted) {
    throw new OperationCanceledError();
  }
};
