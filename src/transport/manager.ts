import type { Logger } from 'pino';
import { DisposedError } from '../error/disposedError.js';
import { TransportError } from '../error/transportError.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import { TransportClient } from './client.js';
import { type MessageHandlerFactory, PoolingMessageHandler } from './handler.js';

/** Timeouts below this many milliseconds leave the transport default in place. */
export const MIN_TIMEOUT = 1;

/** Lifecycle of a client's transport. */
export type TransportState = 'uninitialized' | 'transport-acquired' | 'disposed';

/** Options to configure the {@link TransportManager}. */
export interface TransportManagerOptions {
  /** Timeout override; values below {@link MIN_TIMEOUT} mean "use the default". */
  timeout?: number;
  /** Custom handler factory, defaults to a {@link PoolingMessageHandler}. */
  createMessageHandler?: MessageHandlerFactory;
  logger: Logger;
}

/**
 * Owns the one {@link TransportClient} of a client instance.
 *
 * The handle is built on first `acquire` and reused afterwards. The existence
 * check and construction run synchronously, so concurrent executions on the
 * event loop can never interleave them and build a second handle. Once
 * released, `acquire` fails instead of rebuilding.
 */
export class TransportManager {
  #transport: TransportClient | null = null;
  #released = false;
  #options: TransportManagerOptions;

  constructor(options: TransportManagerOptions) {
    this.#options = options;
  }

  get state(): TransportState {
    if (this.#released) {
      return 'disposed';
    }

    return this.#transport ? 'transport-acquired' : 'uninitialized';
  }

  acquire(): SafeWrap<DisposedError | TransportError, TransportClient> {
    if (this.#released) {
      return [new DisposedError('error transport was released'), null];
    }

    if (this.#transport) {
      return [null, this.#transport];
    }

    const { createMessageHandler, timeout, logger } = this.#options;
    const [err, handler] = safeWrap(() => (createMessageHandler ? createMessageHandler() : new PoolingMessageHandler()));
    if (err) {
      return [new TransportError('error creating message handler', { cause: err }), null];
    }

    this.#transport = new TransportClient(handler, {
      timeout: timeout !== undefined && timeout >= MIN_TIMEOUT ? timeout : undefined,
    });
    logger.debug({ timeout: this.#transport.timeout, custom: Boolean(createMessageHandler) }, 'transport created');

    return [null, this.#transport];
  }

  /**
   * Disposes the handle. Only the first call does anything.
   */
  async release(): Promise<void> {
    if (this.#released) {
      return;
    }

    this.#released = true;
    const transport = this.#transport;
    this.#transport = null;
    if (transport) {
      this.#options.logger.debug('transport released');
      await transport.dispose();
    }
  }
}
