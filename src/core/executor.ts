import type { Logger } from 'pino';
import type { Response } from 'undici';
import { CancellationError } from '../error/cancellationError.js';
import { DisposedError } from '../error/disposedError.js';
import { HookError, type HookPhase } from '../error/hookError.js';
import type { RequestError } from '../error/index.js';
import { InvalidRequestError } from '../error/invalidRequestError.js';
import { ProtocolError } from '../error/protocolError.js';
import type { TransportManager } from '../transport/manager.js';
import type { Credentials, ExecuteOptions, LogicalRequest, OutgoingRequest, RequestHooks } from '../types/request.js';
import { resolveUrl } from '../utils/resolveUrl.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { assembleHeaders } from './headers.js';

/** Options to configure the {@link RequestExecutor}. */
export interface RequestExecutorOptions {
  /** Service root relative URIs resolve against. */
  baseUrl: string;
  /** Credentials for requests that carry none. */
  credentials?: Credentials;
  hooks?: RequestHooks;
  /** Client-wide default for `If-Match: *`. */
  checkOptimisticConcurrency?: boolean;
  /** Logs request and response bodies at `trace`. */
  traceContent?: boolean;
  logger: Logger;
}

/**
 * Runs logical requests through one pipeline:
 * pre-checks, request assembly, `beforeRequest`, transport acquisition, send,
 * `afterResponse`, then the status check.
 *
 * Failures come back classified as `[error, null]`; nothing is thrown.
 */
export class RequestExecutor {
  #transports: TransportManager;
  #options: RequestExecutorOptions;
  #logger: Logger;

  constructor(transports: TransportManager, options: RequestExecutorOptions) {
    this.#transports = transports;
    this.#options = options;
    this.#logger = options.logger.child({ component: 'executor' });
  }

  /** Whether the client's transport was released. */
  get disposed(): boolean {
    return this.#transports.state === 'disposed';
  }

  /**
   * Executes one logical request.
   *
   * @returns `[null, response]` for 2xx, otherwise the classified failure.
   */
  async execute(request: LogicalRequest, { signal }: ExecuteOptions = {}): SafeWrapAsync<RequestError, Response> {
    const errCheck = this.#precheck(signal);
    if (errCheck) {
      return [errCheck, null];
    }

    const [errPrepare, outgoing] = this.prepare(request);
    if (errPrepare) {
      return [errPrepare, null];
    }

    return this.#dispatch(outgoing, signal);
  }

  /**
   * Sends an already assembled request through the hooks, transport and
   * status check. Used for the physical batch exchange.
   */
  async dispatch(outgoing: OutgoingRequest, { signal }: ExecuteOptions = {}): SafeWrapAsync<RequestError, Response> {
    const errCheck = this.#precheck(signal);
    if (errCheck) {
      return [errCheck, null];
    }

    return this.#dispatch(outgoing, signal);
  }

  /**
   * Builds the outgoing request: URL resolved against the base address,
   * headers assembled, credentials defaulted from the client.
   */
  prepare(request: LogicalRequest): SafeWrap<InvalidRequestError, OutgoingRequest> {
    const { baseUrl, checkOptimisticConcurrency, credentials } = this.#options;

    const [errUrl, url] = resolveUrl(request.uri, baseUrl);
    if (errUrl) {
      return [errUrl, null];
    }

    const [errHeaders, headers] = safeWrap(() => assembleHeaders(request, checkOptimisticConcurrency));
    if (errHeaders) {
      return [
        new InvalidRequestError(`error assembling headers for ${request.uri}`, request.uri, { cause: errHeaders }),
        null,
      ];
    }

    return [
      null,
      {
        method: request.method,
        url,
        headers,
        body: request.body,
        credentials: request.credentials ?? credentials,
      },
    ];
  }

  #precheck(signal?: AbortSignal): DisposedError | CancellationError | null {
    if (this.disposed) {
      return new DisposedError();
    }

    if (signal?.aborted) {
      return new CancellationError('error request cancelled before send', { cause: signal.reason });
    }

    return null;
  }

  async #dispatch(outgoing: OutgoingRequest, signal?: AbortSignal): SafeWrapAsync<RequestError, Response> {
    const { hooks, traceContent } = this.#options;

    const errBefore = await this.#runHook('beforeRequest', () => hooks?.beforeRequest?.(outgoing));
    if (errBefore) {
      return [errBefore, null];
    }

    const [errAcquire, transport] = this.#transports.acquire();
    if (errAcquire) {
      return [errAcquire, null];
    }

    this.#logger.debug(`${outgoing.method} request: ${outgoing.url.href}`);
    if (traceContent && outgoing.body !== undefined) {
      this.#logger.trace({ body: outgoing.body }, `${outgoing.method} content: ${outgoing.url.href}`);
    }

    const [errSend, response] = await transport.send(outgoing, signal);
    if (errSend) {
      this.#logger.debug({ err: errSend }, `${outgoing.method} request failed: ${outgoing.url.href}`);
      return [errSend, null];
    }

    if (signal?.aborted) {
      const [errDiscard] = await safeWrapAsync(async () => response.body?.cancel());
      if (errDiscard) {
        this.#logger.debug({ err: errDiscard }, 'error discarding cancelled response body');
      }

      return [new CancellationError(`error ${outgoing.method} request cancelled`, { cause: signal.reason }), null];
    }

    this.#logger.debug(`Request completed: ${response.status}`);
    if (traceContent) {
      const [errContent, content] = await safeWrapAsync(() => response.clone().text());
      if (errContent) {
        this.#logger.debug({ err: errContent }, 'error reading response content for tracing');
      } else {
        this.#logger.trace({ body: content }, `Response content: ${outgoing.url.href}`);
      }
    }

    const errAfter = await this.#runHook('afterResponse', () => hooks?.afterResponse?.(response));
    if (errAfter) {
      return [errAfter, null];
    }

    if (!response.ok) {
      return [new ProtocolError(response), null];
    }

    return [null, response];
  }

  async #runHook(phase: HookPhase, hook: () => void | Promise<void>): Promise<HookError | null> {
    const [err] = await safeWrapAsync(async () => hook());
    if (err) {
      return new HookError(phase, { cause: err });
    }

    return null;
  }
}
