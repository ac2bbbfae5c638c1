export class HarvestError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'HarvestError';
  }
}

export class ConfigError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/**
 * Session, render or network failure while collecting a topic. Retried by the harvester.
 */
export class SourceError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

export class FetchError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

export class ClassifierError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CLASSIFIER_ERROR', details);
    this.name = 'ClassifierError';
  }
}

export class StoreError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORE_ERROR', details);
    this.name = 'StoreError';
  }
}

export class UploadError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'UPLOAD_ERROR', details);
    this.name = 'UploadError';
  }
}

export class CancelledError extends HarvestError {
  constructor(message = 'Operation cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export class TimeoutError extends HarvestError {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, 'TIMEOUT', { timeoutMs });
    this.name = 'TimeoutError';
  }
}

/**
 * Only session, render and network failures are worth another attempt.
 * Anything else, a programming error included, is fatal.
 */
export function isTransient(err: unknown): boolean {
  if (err instanceof SourceError || err instanceof FetchError || err instanceof TimeoutError) {
    return true;
  }
  // undici rejects with TypeError('fetch failed') on connection errors
  return err instanceof TypeError && err.message === 'fetch failed';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
