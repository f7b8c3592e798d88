import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  RemoteConflictError,
  RemoteRateLimitError,
  RemoteTrackerError,
  RemoteTransientError,
  SyncAbortedError,
} from '../reconcile/errors.js';
import { phaseKey } from '../reconcile/keys.js';
import { MemoryTracker } from '../reconcile/memory-tracker.js';
import { RemoteCaller, createRunSignal, sleep } from '../reconcile/remote-call.js';
import type { RemoteTracker } from '../reconcile/tracker.js';

const NOW = 1_700_000_000_000;

const createSleep = () => vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
const createCall = () => vi.fn(async (_tracker: RemoteTracker): Promise<string> => 'ok');

describe('RemoteCaller', () => {
  it('should retry transient errors with exponential backoff', async () => {
    const sleepFn = createSleep();
    const caller = new RemoteCaller(new MemoryTracker(), { sleep: sleepFn, now: () => NOW });
    const fn = createCall();
    fn.mockRejectedValueOnce(new RemoteTransientError('timeout'));
    fn.mockRejectedValueOnce(new RemoteTransientError('timeout'));

    await expect(caller.call('create phase/1', fn)).resolves.toBe('ok');

    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
    expect(caller.calls).toBe(3);
  });

  it('should take the recovered result instead of repeating a transient failure', async () => {
    const caller = new RemoteCaller(new MemoryTracker(), { sleep: createSleep() });
    const fn = createCall();
    fn.mockRejectedValueOnce(new RemoteTransientError('socket timeout'));
    const recover = vi.fn(async (_tracker: RemoteTracker): Promise<string | null> => 'landed');

    await expect(caller.call('create phase/1', fn, { recover })).resolves.toBe('landed');

    expect(fn).toHaveBeenCalledTimes(1);
    expect(recover).toHaveBeenCalledTimes(1);
    expect(caller.calls).toBe(2);
  });

  it('should retry after recovery finds nothing', async () => {
    const caller = new RemoteCaller(new MemoryTracker(), { sleep: createSleep() });
    const fn = createCall();
    fn.mockRejectedValueOnce(new RemoteTransientError('socket timeout'));
    const recover = vi.fn(async (_tracker: RemoteTracker): Promise<string | null> => null);

    await expect(caller.call('create phase/1', fn, { recover })).resolves.toBe('ok');

    expect(fn).toHaveBeenCalledTimes(2);
    expect(caller.calls).toBe(3);
  });

  it('should not recover after a rate limit', async () => {
    const caller = new RemoteCaller(new MemoryTracker(), { sleep: createSleep() });
    const fn = createCall();
    fn.mockRejectedValueOnce(new RemoteRateLimitError('rate limited', 500));
    const recover = vi.fn(async (_tracker: RemoteTracker): Promise<string | null> => 'landed');

    await expect(caller.call('create phase/1', fn, { recover })).resolves.toBe('ok');

    expect(recover).not.toHaveBeenCalled();
  });

  it('should rethrow other errors without retrying', async () => {
    const sleepFn = createSleep();
    const caller = new RemoteCaller(new MemoryTracker(), { sleep: sleepFn });
    const fn = createCall();
    fn.mockRejectedValueOnce(new RemoteTrackerError('Could not resolve to a node'));

    await expect(caller.call('lookup', fn)).rejects.toThrow('Could not resolve to a node');

    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleepFn).not.toHaveBeenCalled();
  });

  it('should not retry conflicts', async () => {
    const caller = new RemoteCaller(new MemoryTracker(), { sleep: createSleep() });
    const fn = createCall();
    fn.mockRejectedValueOnce(new RemoteConflictError('already exists'));

    await expect(caller.call('create', fn)).rejects.toBeInstanceOf(RemoteConflictError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should wait at least the backoff after a rate limit', async () => {
    const sleepFn = createSleep();
    const caller = new RemoteCaller(new MemoryTracker(), { sleep: sleepFn });
    const fn = createCall();
    fn.mockRejectedValueOnce(new RemoteRateLimitError('rate limited', 500));
    fn.mockRejectedValueOnce(new RemoteRateLimitError('rate limited', 45_000));

    await caller.call('create', fn);

    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([1000, 45_000]);
  });

  it('should cap the backoff and stop at the last attempt', async () => {
    const sleepFn = createSleep();
    const caller = new RemoteCaller(new MemoryTracker(), {
      sleep: sleepFn,
      policy: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 1500 },
    });
    const fn = vi.fn(async (_tracker: RemoteTracker): Promise<string> => {
      throw new RemoteTransientError('Service unavailable');
    });

    await expect(caller.call('update', fn)).rejects.toThrow('Service unavailable');

    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([1000, 1500]);
  });

  it('should pause when the remaining budget is at the low watermark', async () => {
    const sleepFn = createSleep();
    const tracker = new MemoryTracker({ rateLimit: { remaining: 50, resetAt: NOW + 5000 } });
    const caller = new RemoteCaller(tracker, { sleep: sleepFn, now: () => NOW });

    await expect(caller.call('lookup', (t) => t.lookupByNaturalKey(phaseKey(1), 'PROJECT_1'))).resolves.toBeNull();

    expect(sleepFn).toHaveBeenCalledTimes(1);
    expect(sleepFn.mock.calls[0][0]).toBe(5000);
  });

  it('should not pause with budget to spare or a reset in the past', async () => {
    const sleepFn = createSleep();
    const tracker = new MemoryTracker({ rateLimit: { remaining: 51, resetAt: NOW + 5000 } });
    const caller = new RemoteCaller(tracker, { sleep: sleepFn, now: () => NOW });

    await caller.call('lookup', createCall());
    tracker.rateLimitInfo = { remaining: 0, resetAt: NOW - 1 };
    await caller.call('lookup', createCall());

    expect(sleepFn).not.toHaveBeenCalled();
  });

  it('should refuse calls once the signal has fired', async () => {
    const controller = new AbortController();
    controller.abort(new SyncAbortedError('Sync timed out after 10ms'));
    const caller = new RemoteCaller(new MemoryTracker(), { signal: controller.signal });
    const fn = createCall();

    await expect(caller.call('lookup', fn)).rejects.toThrow('Sync timed out after 10ms');
    expect(fn).not.toHaveBeenCalled();
    expect(caller.calls).toBe(0);
  });

  it('should reject an in-flight call when the signal fires', async () => {
    const controller = new AbortController();
    const caller = new RemoteCaller(new MemoryTracker(), { signal: controller.signal });
    const pending = caller.call('lookup', () => new Promise<string>(() => undefined));

    controller.abort(new Error('interrupted'));

    await expect(pending).rejects.toBeInstanceOf(SyncAbortedError);
    await expect(pending).rejects.toThrow('interrupted');
  });
});

describe('sleep', () => {
  it('should reject early when aborted', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    controller.abort(new SyncAbortedError('Sync cancelled'));

    await expect(pending).rejects.toThrow('Sync cancelled');
  });
});

describe('createRunSignal', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should abort after the timeout', () => {
    vi.useFakeTimers();
    const run = createRunSignal(undefined, 5000);

    vi.advanceTimersByTime(4999);
    expect(run.signal.aborted).toBe(false);
    vi.advanceTimersByTime(1);

    expect(run.signal.aborted).toBe(true);
    expect(run.signal.reason).toBeInstanceOf(SyncAbortedError);
    expect(run.signal.reason).toHaveProperty('message', 'Sync timed out after 5000ms');
    run.dispose();
  });

  it('should follow the parent signal', () => {
    const parent = new AbortController();
    const run = createRunSignal(parent.signal);

    parent.abort(new Error('SIGINT received'));

    expect(run.signal.aborted).toBe(true);
    expect(run.signal.reason).toHaveProperty('message', 'SIGINT received');
    run.dispose();
  });

  it('should not fire after dispose', () => {
    vi.useFakeTimers();
    const run = createRunSignal(undefined, 1000);

    run.dispose();
    vi.advanceTimersByTime(2000);

    expect(run.signal.aborted).toBe(false);
  });
});
