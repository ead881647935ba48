import type { Logger } from 'pino';
import type { Response } from 'undici';
import { BatchCoordinator, type BatchUnit } from '../batch/coordinator.js';
import { BatchResponse } from '../batch/response.js';
import { type MetadataCache, sharedMetadataCache } from '../cache/metadata.js';
import { BatchResponseError } from '../error/batchResponseError.js';
import { BatchStateError } from '../error/batchStateError.js';
import { DisposedError } from '../error/disposedError.js';
import type { RequestError } from '../error/index.js';
import type { ValidationError } from '../error/validationError.js';
import { TransportManager, type TransportState } from '../transport/manager.js';
import type { ExecuteOptions, LogicalRequest, Pluralizer } from '../types/request.js';
import { createLogger } from '../utils/logger.js';
import { validator } from '../utils/validator.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import { RequestExecutor } from './executor.js';
import { type ClientSettings, clientSettingsSchema, freezeSettings, normalizeSettings } from './settings.js';

/** Options to construct a {@link DataClient}. */
export interface DataClientOptions {
  /**
   * Queue requests until `commit` instead of sending them.
   * @default false
   */
  batch?: boolean;
}

type Settle = (result: SafeWrap<RequestError, Response>) => void;

interface LiveSession {
  settings: Readonly<ClientSettings>;
  transports: TransportManager;
  executor: RequestExecutor;
  logger: Logger;
}

interface OpenBatch {
  coordinator: BatchCoordinator;
  unit: BatchUnit;
  /** Deferred results of queued executions, by token. */
  pending: Map<string, Settle>;
}

type Session =
  | { mode: 'request'; live: LiveSession }
  | { mode: 'batch'; live: LiveSession; batch: OpenBatch | null }
  | { mode: 'response'; response: BatchResponse };

/**
 * Entry point of the query layer. Depending on how it was built, a client:
 * - sends each request as it is executed (request mode),
 * - queues requests and sends them in one exchange on `commit` (batch mode),
 * - or answers requests from a committed batch (response mode).
 *
 * Every mode is called the same way: `execute(request)` resolves to
 * `[error, response]`.
 *
 * @example
 * const client = new DataClient('https://services.example.com/odata/');
 * const [err, response] = await client.execute({ method: 'GET', uri: 'Products' });
 */
export class DataClient {
  #session: Session;
  #pluralizer: Pluralizer | undefined;
  #metadataCache: MetadataCache;

  constructor(source: ClientSettings | string | BatchResponse, { batch = false }: DataClientOptions = {}) {
    if (source instanceof BatchResponse) {
      this.#session = { mode: 'response', response: source };
      this.#metadataCache = sharedMetadataCache;
      return;
    }

    const settings = freezeSettings(normalizeSettings(source));
    const logger = createLogger({ logger: settings.logger, level: settings.logLevel });
    const transports = new TransportManager({
      timeout: settings.timeout,
      createMessageHandler: settings.createMessageHandler,
      logger: logger.child({ component: 'transport' }),
    });
    const executor = new RequestExecutor(transports, {
      baseUrl: settings.baseUrl,
      credentials: settings.credentials,
      hooks: settings.hooks,
      checkOptimisticConcurrency: settings.checkOptimisticConcurrency,
      traceContent: settings.traceContent,
      logger,
    });
    const live = { settings, transports, executor, logger };

    this.#session = batch ? { mode: 'batch', live, batch: null } : { mode: 'request', live };
    this.#pluralizer = settings.pluralizer;
    this.#metadataCache = settings.metadataCache ?? sharedMetadataCache;
  }

  /**
   * Validates the settings before building a client.
   */
  static async create(
    settings: ClientSettings | string,
    opts: DataClientOptions = {},
  ): SafeWrapAsync<ValidationError, DataClient> {
    const [err, valid] = await validator(normalizeSettings(settings), clientSettingsSchema);
    if (err) {
      return [err, null];
    }

    return [null, new DataClient(valid, opts)];
  }

  /** `request`, `batch` or `response`. */
  get mode(): Session['mode'] {
    return this.#session.mode;
  }

  /** Transport lifecycle; a response-mode client never acquires one. */
  get state(): TransportState {
    return this.#session.mode === 'response' ? 'uninitialized' : this.#session.live.transports.state;
  }

  /** Frozen settings, absent in response mode. */
  get settings(): Readonly<ClientSettings> | undefined {
    return this.#session.mode === 'response' ? undefined : this.#session.live.settings;
  }

  get pluralizer(): Pluralizer | undefined {
    return this.#pluralizer;
  }

  setPluralizer(pluralizer: Pluralizer): void {
    this.#pluralizer = pluralizer;
  }

  get metadataCache(): MetadataCache {
    return this.#metadataCache;
  }

  /**
   * Executes a request.
   *
   * In batch mode the request is queued and the promise settles once the
   * batch is committed or the client disposed. In response mode the recorded
   * result of the same request object is returned.
   */
  execute(request: LogicalRequest, opts: ExecuteOptions = {}): SafeWrapAsync<RequestError, Response> {
    const session = this.#session;

    switch (session.mode) {
      case 'request':
        return session.live.executor.execute(request, opts);
      case 'batch':
        return this.#enqueue(session, request);
      case 'response':
        return this.#replay(session.response, request);
    }
  }

  /**
   * Sends every queued request in one exchange and settles their promises.
   * A failed exchange settles all of them with the same error.
   */
  async commit(opts: ExecuteOptions = {}): SafeWrapAsync<RequestError, BatchResponse> {
    const session = this.#session;
    if (session.mode !== 'batch') {
      return [new BatchStateError(`error commit is not available in ${session.mode} mode`), null];
    }

    if (session.live.transports.state === 'disposed') {
      return [new DisposedError(), null];
    }

    const batch = this.#openBatch(session);
    const [err, response] = await batch.coordinator.commit(batch.unit, opts);
    const pending = [...batch.pending];
    batch.pending.clear();

    for (const [token, settle] of pending) {
      if (err) {
        settle([err, null]);
      } else {
        settle(response.get(token) ?? [new BatchResponseError(`error missing sub-response for token ${token}`), null]);
      }
    }

    if (err) {
      session.live.logger.debug({ err, requests: pending.length }, 'batch commit failed');
      return [err, null];
    }

    return [null, response];
  }

  /**
   * Releases the transport. Queued batch executions settle with a
   * {@link DisposedError}. Only the first call does anything.
   */
  async dispose(): Promise<void> {
    const session = this.#session;
    if (session.mode === 'response') {
      return;
    }

    if (session.mode === 'batch' && session.batch) {
      const pending = [...session.batch.pending.values()];
      session.batch.pending.clear();
      for (const settle of pending) {
        settle([new DisposedError(), null]);
      }
    }

    await session.live.transports.release();
  }

  #openBatch(session: Extract<Session, { mode: 'batch' }>): OpenBatch {
    if (!session.batch) {
      const coordinator = new BatchCoordinator(session.live.executor, {
        baseUrl: session.live.settings.baseUrl,
        logger: session.live.logger,
      });
      session.batch = { coordinator, unit: coordinator.open(), pending: new Map() };
    }

    return session.batch;
  }

  async #enqueue(
    session: Extract<Session, { mode: 'batch' }>,
    request: LogicalRequest,
  ): SafeWrapAsync<RequestError, Response> {
    if (session.live.transports.state === 'disposed') {
      return [new DisposedError(), null];
    }

    const batch = this.#openBatch(session);
    const [err, token] = batch.coordinator.add(batch.unit, request);
    if (err) {
      return [err, null];
    }

    return new Promise<SafeWrap<RequestError, Response>>((resolve) => {
      batch.pending.set(token, resolve);
    });
  }

  async #replay(response: BatchResponse, request: LogicalRequest): SafeWrapAsync<RequestError, Response> {
    return response.find(request) ?? [new BatchStateError('error request is not part of the batch'), null];
  }
}
