import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { RequestExecutor } from '../core/executor.js';
import { BatchResponseError } from '../error/batchResponseError.js';
import { BatchStateError } from '../error/batchStateError.js';
import { DisposedError } from '../error/disposedError.js';
import type { RequestError } from '../error/index.js';
import type { InvalidRequestError } from '../error/invalidRequestError.js';
import type { ExecuteOptions, LogicalRequest, OutgoingRequest } from '../types/request.js';
import { type SafeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { readBatch } from './reader.js';
import { BatchResponse, correlate } from './response.js';
import { type BatchPart, planSegments, serializeBatch } from './writer.js';

/** A queued request, its assembled form and the token it was added under. */
export interface BatchEntry {
  token: string;
  request: LogicalRequest;
  outgoing: OutgoingRequest;
}

/**
 * Ordered accumulation of requests awaiting one physical exchange.
 * Adding never touches the network; a unit commits at most once.
 */
export class BatchUnit {
  #entries: BatchEntry[] = [];
  #committed = false;

  get committed(): boolean {
    return this.#committed;
  }

  get size(): number {
    return this.#entries.length;
  }

  /**
   * Queues a request together with its assembled form.
   *
   * @returns The correlation token: `"1"`, `"2"`, ... in add order.
   */
  add(request: LogicalRequest, outgoing: OutgoingRequest): SafeWrap<BatchStateError, string> {
    if (this.#committed) {
      return [new BatchStateError('error adding to a committed batch'), null];
    }

    const token = String(this.#entries.length + 1);
    this.#entries.push({ token, request, outgoing });
    return [null, token];
  }

  /**
   * Marks the unit committed and hands out its entries, once.
   */
  seal(): SafeWrap<BatchStateError, readonly BatchEntry[]> {
    if (this.#committed) {
      return [new BatchStateError('error batch was already committed'), null];
    }

    this.#committed = true;
    return [null, this.#entries];
  }
}

/** Options to configure the {@link BatchCoordinator}. */
export interface BatchCoordinatorOptions {
  /** Service root; the exchange is posted to `<baseUrl>/$batch`. */
  baseUrl: string;
  logger: Logger;
  /** Produces the unique part of each boundary. */
  createId?: () => string;
}

/**
 * Collects requests into batch units and commits each as one
 * `multipart/mixed` exchange sent through the {@link RequestExecutor}.
 */
export class BatchCoordinator {
  #executor: RequestExecutor;
  #baseUrl: string;
  #createId: () => string;
  #logger: Logger;

  constructor(executor: RequestExecutor, { baseUrl, logger, createId = randomUUID }: BatchCoordinatorOptions) {
    this.#executor = executor;
    this.#baseUrl = baseUrl;
    this.#createId = createId;
    this.#logger = logger.child({ component: 'batch' });
  }

  open(): BatchUnit {
    return new BatchUnit();
  }

  /**
   * Assembles the request and queues it. A request that cannot be assembled
   * is refused here and takes no token, so the rest of the unit is unaffected.
   */
  add(unit: BatchUnit, request: LogicalRequest): SafeWrap<BatchStateError | InvalidRequestError, string> {
    if (unit.committed) {
      return [new BatchStateError('error adding to a committed batch'), null];
    }

    const [err, outgoing] = this.#executor.prepare(request);
    if (err) {
      this.#logger.debug({ err, uri: request.uri }, 'batch request refused');
      return [err, null];
    }

    return unit.add(request, outgoing);
  }

  /**
   * Sends every queued request in one exchange and attributes the results.
   *
   * - A disposed client fails the commit with a {@link DisposedError}.
   * - An empty unit yields an empty response without any exchange.
   * - A failed exchange, or a non-2xx status for the whole batch, fails the
   *   commit with that error.
   * - Within an accepted batch each token keeps its own outcome.
   */
  async commit(unit: BatchUnit, opts: ExecuteOptions = {}): SafeWrapAsync<RequestError, BatchResponse> {
    if (this.#executor.disposed) {
      return [new DisposedError(), null];
    }

    const [errSeal, entries] = unit.seal();
    if (errSeal) {
      return [errSeal, null];
    }

    if (entries.length === 0) {
      this.#logger.debug('empty batch committed without an exchange');
      return [null, BatchResponse.empty()];
    }

    const parts: BatchPart[] = entries.map(({ token, outgoing }) => ({ token, request: outgoing }));

    const boundary = `batch_${this.#createId()}`;
    const segments = planSegments(parts, () => `changeset_${this.#createId()}`);
    const [errBatch, outgoing] = this.#executor.prepare({
      method: 'POST',
      uri: '$batch',
      accept: ['multipart/mixed'],
      headers: { 'Content-Type': `multipart/mixed; boundary=${boundary}` },
      body: serializeBatch(segments, boundary),
    });
    if (errBatch) {
      return [errBatch, null];
    }

    this.#logger.debug({ parts: parts.length, segments: segments.length }, 'committing batch');
    const [errSend, response] = await this.#executor.dispatch(outgoing, opts);
    if (errSend) {
      return [errSend, null];
    }

    const [errRead, body] = await safeWrapAsync(() => response.text());
    if (errRead) {
      return [new BatchResponseError('error reading batch response body', null, { cause: errRead }), null];
    }

    const [errParse, received] = readBatch(response.headers.get('content-type'), body);
    if (errParse) {
      return [errParse, null];
    }

    // A request object added twice answers with its first result.
    const tokens = new Map<LogicalRequest, string>();
    for (const { token, request } of entries) {
      if (!tokens.has(request)) {
        tokens.set(request, token);
      }
    }

    return [null, new BatchResponse(correlate(segments, received), tokens)];
  }
}
