/**
 * Rate-limit gate and retry loop around every tracker call
 */

import {
  RemoteRateLimitError,
  RemoteTransientError,
  SyncAbortedError,
  errorMessage,
} from './errors.js';
import { silentLogger, type SyncLogger } from './logger.js';
import type { RemoteTracker } from './tracker.js';

export interface RetryPolicy {
  /** Attempts per call, first one included */
  maxAttempts: number;
  baseDelayMs: number;
  /** Cap on any single wait, backoff and rate-limit pauses alike */
  maxDelayMs: number;
  /** Pause before a call once the reported remaining budget is at or below this */
  lowWatermark: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  lowWatermark: 50,
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RemoteCallerOptions {
  policy?: Partial<RetryPolicy>;
  sleep?: SleepFn;
  /** Epoch milliseconds */
  now?: () => number;
  logger?: SyncLogger;
  signal?: AbortSignal;
}

export interface CallOptions<T> {
  /**
   * Runs before retrying a call that failed with a transient error. For
   * calls that must not be applied twice: a non-null result means the
   * failed attempt went through and becomes the call's result.
   */
  recover?: (tracker: RemoteTracker) => Promise<T | null>;
}

/**
 * Error to reject with once a signal has fired
 */
export function abortError(signal: AbortSignal): SyncAbortedError {
  const reason: unknown = signal.reason;
  if (reason instanceof SyncAbortedError) {
    return reason;
  }
  return new SyncAbortedError(reason instanceof Error ? reason.message : 'Sync cancelled');
}

/**
 * setTimeout as a promise, rejected early when the signal fires
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) {
        reject(abortError(signal));
      }
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortError(signal));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Combine a caller-provided signal with an overall timeout.
 * `dispose` must be called once the run is over.
 */
export function createRunSignal(
  parent?: AbortSignal,
  timeoutMs?: number
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();

  const onParentAbort = () => {
    if (parent) {
      controller.abort(abortError(parent));
    }
  };
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  if (timeoutMs !== undefined && timeoutMs > 0) {
    timer = setTimeout(() => {
      controller.abort(new SyncAbortedError(`Sync timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Runs tracker calls one at a time with:
 * - a pause when the tracker reports its budget at or below the low watermark
 * - retries of rate-limit errors no sooner than the advertised retry-after
 * - exponential backoff for transient errors
 * Anything else (fatal, conflict, plain rejections) is rethrown untouched.
 */
export class RemoteCaller {
  readonly policy: RetryPolicy;
  private readonly sleepFn: SleepFn;
  private readonly now: () => number;
  private readonly logger: SyncLogger;
  private readonly signal?: AbortSignal;
  private callCount = 0;

  constructor(
    readonly tracker: RemoteTracker,
    options: RemoteCallerOptions = {}
  ) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    this.sleepFn = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.signal = options.signal;
  }

  /**
   * Calls issued so far, retries included
   */
  get calls(): number {
    return this.callCount;
  }

  async call<T>(
    operation: string,
    fn: (tracker: RemoteTracker) => Promise<T>,
    options: CallOptions<T> = {}
  ): Promise<T> {
    const maxAttempts = Math.max(1, this.policy.maxAttempts);
    let recover = false;

    for (let attempt = 1; ; attempt++) {
      try {
        if (recover && options.recover) {
          const recovered = await this.attempt(operation, options.recover);
          if (recovered !== null) {
            return recovered;
          }
        }
        return await this.attempt(operation, fn);
      } catch (error) {
        if (!(error instanceof RemoteRateLimitError || error instanceof RemoteTransientError)) {
          throw error;
        }
        if (attempt >= maxAttempts) {
          throw error;
        }

        // a rate-limited request was refused, a transient failure may have landed
        recover = error instanceof RemoteTransientError;
        const backoff = this.backoff(attempt);
        const delay =
          error instanceof RemoteRateLimitError ? Math.max(error.retryAfterMs, backoff) : backoff;

        this.logger.warn(
          `${operation}: ${errorMessage(error)}; retrying in ${delay}ms (attempt ${attempt + 1}/${maxAttempts})`
        );
        await this.sleepFn(delay, this.signal);
      }
    }
  }

  private async attempt<T>(operation: string, fn: (tracker: RemoteTracker) => Promise<T>): Promise<T> {
    this.throwIfAborted();
    await this.respectBudget(operation);
    this.callCount++;
    return raceAbort(fn(this.tracker), this.signal);
  }

  private backoff(attempt: number): number {
    return Math.min(this.policy.maxDelayMs, this.policy.baseDelayMs * Math.pow(2, attempt - 1));
  }

  private async respectBudget(operation: string): Promise<void> {
    const info = this.tracker.rateLimit?.();
    if (!info || info.remaining > this.policy.lowWatermark) {
      return;
    }

    const wait = Math.min(this.policy.maxDelayMs, info.resetAt - this.now());
    if (wait <= 0) {
      return;
    }

    this.logger.warn(
      `Rate limit budget low (${info.remaining} remaining); pausing ${wait}ms before ${operation}`
    );
    await this.sleepFn(wait, this.signal);
  }

  private throwIfAborted(): void {
    if (this.signal?.aborted) {
      throw abortError(this.signal);
    }
  }
}
