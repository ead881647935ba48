import type { Response } from 'undici';
import { CancellationError } from '../error/cancellationError.js';
import { DisposedError } from '../error/disposedError.js';
import { TransportError } from '../error/transportError.js';
import type { OutgoingRequest } from '../types/request.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type { MessageHandler } from './handler.js';

/** Timeout applied when the client does not override it, in milliseconds. */
export const DEFAULT_TIMEOUT = 100_000;

/** Failures a single send can end in. */
export type SendError = TransportError | CancellationError | DisposedError;

/** Options to configure the {@link TransportClient}. */
export interface TransportClientOptions {
  /**
   * Exchange timeout in milliseconds.
   * @default 100000
   */
  timeout?: number;
}

/**
 * The transport handle shared by every request of one client: a message
 * handler plus a timeout, safe for concurrent sends once built.
 *
 * Every failure is classified here, once:
 * - caller signal aborted -> {@link CancellationError}
 * - handle disposed mid-flight -> {@link DisposedError}
 * - timeout elapsed -> {@link TransportError} caused by a `TimeoutError`
 * - anything else the handler throws -> {@link TransportError}
 */
export class TransportClient {
  /** Handler performing the actual exchange. */
  #handler: MessageHandler;
  /** Timeout applied to every send. */
  #timeout: number;
  /** Aborts in-flight sends on dispose. */
  #abortController = new AbortController();

  constructor(handler: MessageHandler, opts: TransportClientOptions = {}) {
    this.#handler = handler;
    this.#timeout = opts.timeout ?? DEFAULT_TIMEOUT;
  }

  get timeout(): number {
    return this.#timeout;
  }

  get disposed(): boolean {
    return this.#abortController.signal.aborted;
  }

  /**
   * Sends a request through the handler.
   *
   * @param request - Fully assembled outgoing request.
   * @param signal - Caller cancellation signal.
   * @returns A promise resolving to `[error, response]`; non-2xx responses are not errors here.
   */
  async send(request: OutgoingRequest, signal?: AbortSignal): SafeWrapAsync<SendError, Response> {
    if (this.disposed) {
      return [new DisposedError(), null];
    }

    if (signal?.aborted) {
      return [new CancellationError('error request cancelled before send', { cause: signal.reason }), null];
    }

    const timeout = createTimeoutSignal(this.#timeout);
    const merged = mergeSignals([signal, timeout.signal, this.#abortController.signal]);
    const [err, response] = await safeWrapAsync(() => this.#handler.send(request, merged.signal));
    timeout.clear();
    merged.release();

    if (!err) {
      return [null, response];
    }

    if (signal?.aborted) {
      return [new CancellationError(`error ${request.method} request cancelled`, { cause: signal.reason }), null];
    }

    if (this.disposed) {
      return [new DisposedError('error client was disposed during the request', { cause: err }), null];
    }

    if (timeout.signal.aborted) {
      return [
        new TransportError(`error ${request.method} request timed out`, { cause: timeout.signal.reason }),
        null,
      ];
    }

    return [new TransportError(`error sending ${request.method} request`, { cause: err }), null];
  }

  /**
   * Aborts in-flight sends and disposes the handler. Repeated calls are no-ops.
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.#abortController.abort(new DisposedError());
    await this.#handler.dispose?.();
  }
}
