/**
 * Remote tracker error taxonomy
 *
 * - RemoteTransientError: timeouts, 5xx; retried with backoff, then surfaced per entity
 * - RemoteRateLimitError: retried no sooner than retryAfterMs
 * - RemoteConflictError: already exists / already linked; callers treat it as success
 * - RemoteFatalError: authentication or permission failure; aborts the run
 * - RemoteTrackerError itself: any other rejected request (not retried)
 */

export class RemoteTrackerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RemoteTrackerError';
  }
}

export class RemoteTransientError extends RemoteTrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RemoteTransientError';
  }
}

export class RemoteRateLimitError extends RemoteTrackerError {
  constructor(
    message: string,
    public readonly retryAfterMs: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RemoteRateLimitError';
  }
}

export class RemoteConflictError extends RemoteTrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RemoteConflictError';
  }
}

export class RemoteFatalError extends RemoteTrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RemoteFatalError';
  }
}

/**
 * The run was cancelled or hit its overall timeout
 */
export class SyncAbortedError extends Error {
  constructor(message: string = 'Sync cancelled') {
    super(message);
    this.name = 'SyncAbortedError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Errors that end the whole run rather than a single entity
 */
export function isRunFatal(error: unknown): boolean {
  return error instanceof RemoteFatalError || error instanceof SyncAbortedError;
}
