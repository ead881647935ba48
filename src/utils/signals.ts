import { TimeoutError } from '../error/timeoutError.js';

/** A signal bound to a timer; `clear` stops the timer once the exchange settles. */
export interface TimeoutSignal {
  signal: AbortSignal;
  clear: () => void;
}

/** A signal following several sources; `release` detaches it from them. */
export interface MergedSignal {
  signal: AbortSignal;
  release: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError}
 * after `timeoutMs`.
 *
 * @param timeoutMs - Timeout in milliseconds, must be positive.
 */
export function createTimeoutSignal(timeoutMs: number): TimeoutSignal {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);

  return {
    signal: controller.signal,
    clear: () => clearTimeout(timeout),
  };
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * - Nullish entries are skipped.
 * - The merged signal aborts with the reason of the first source that aborts.
 * - A source that is already aborted aborts the merged signal immediately.
 * - `release` removes every listener placed on the sources; callers invoke it
 *   once the exchange settles so long-lived sources do not accumulate listeners.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): MergedSignal {
  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const release = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };

  for (const source of signals) {
    if (!source) {
      continue;
    }

    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }

    const abort = () => {
      controller.abort(source.reason);
      release();
    };
    source.addEventListener('abort', abort, { once: true });
    listeners.push(() => source.removeEventListener('abort', abort));
  }

  if (controller.signal.aborted) {
    release();
  }

  return { signal: controller.signal, release };
}
