import { afterEach, describe, expect, it, vi } from 'vitest';
import { TimeoutError } from '../error/timeoutError.js';
import { createTimeoutSignal, mergeSignals } from './signals.js';

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});

describe('createTimeoutSignal', () => {
  it('aborts after the configured timeout with a TimeoutError', async () => {
    vi.useFakeTimers();
    const { signal } = createTimeoutSignal(50);

    expect(signal.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(50);

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBeInstanceOf(TimeoutError);
    expect((signal.reason as TimeoutError).message).toBe('error request timed out after 50ms');
  });

  it('never aborts once cleared', async () => {
    vi.useFakeTimers();
    const { signal, clear } = createTimeoutSignal(50);

    clear();
    await vi.advanceTimersByTimeAsync(100);

    expect(signal.aborted).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('creates independent signals for separate invocations', () => {
    vi.useFakeTimers();

    const first = createTimeoutSignal(10);
    const second = createTimeoutSignal(20);

    vi.advanceTimersByTime(15);

    expect(first.signal.aborted).toBe(true);
    expect(second.signal.aborted).toBe(false);
  });
});

describe('mergeSignals', () => {
  it('never aborts when no signals are provided', () => {
    const { signal } = mergeSignals([null, undefined]);

    expect(signal.aborted).toBe(false);
  });

  it('propagates aborts and preserves the provided reason', () => {
    const controllerA = new AbortController();
    const controllerB = new AbortController();

    const { signal } = mergeSignals([controllerA.signal, controllerB.signal]);

    const reason = new Error('external abort');
    controllerB.abort(reason);

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBe(reason);
  });

  it('immediately aborts when merging an already-aborted signal', () => {
    const controller = new AbortController();
    const reason = new Error('existing abort');
    controller.abort(reason);

    const { signal } = mergeSignals([new AbortController().signal, controller.signal]);

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBe(reason);
  });

  it('stops following sources after release', () => {
    const controller = new AbortController();
    const removeSpy = vi.spyOn(controller.signal, 'removeEventListener');

    const { signal, release } = mergeSignals([controller.signal]);
    release();
    controller.abort(new Error('late'));

    expect(signal.aborted).toBe(false);
    expect(removeSpy).toHaveBeenCalledWith('abort', expect.any(Function));
  });

  it('detaches from every source once one aborts', () => {
    const sourceA = new AbortController();
    const sourceB = new AbortController();
    const removeSpy = vi.spyOn(sourceB.signal, 'removeEventListener');

    mergeSignals([sourceA.signal, sourceB.signal]);
    sourceA.abort(new Error('reason A'));

    expect(removeSpy).toHaveBeenCalledWith('abort', expect.any(Function));
  });
});
