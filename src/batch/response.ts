import type { Response } from 'undici';
import { BatchResponseError } from '../error/batchResponseError.js';
import { ProtocolError } from '../error/protocolError.js';
import type { LogicalRequest } from '../types/request.js';
import type { SafeWrap } from '../utils/wrap.js';
import type { ResponseSegment, SubResponse } from './reader.js';
import type { BatchSegment } from './writer.js';

/** Outcome of one sub-request of a committed batch. */
export type BatchResult = SafeWrap<ProtocolError | BatchResponseError, Response>;

/**
 * Results of a committed batch, keyed by correlation token and iterated in
 * add order, whatever order the service answered in.
 */
export class BatchResponse {
  #results: ReadonlyMap<string, BatchResult>;
  #tokens: ReadonlyMap<LogicalRequest, string>;

  constructor(results: ReadonlyMap<string, BatchResult>, tokens: ReadonlyMap<LogicalRequest, string>) {
    this.#results = results;
    this.#tokens = tokens;
  }

  /** An empty result, as returned for a batch nothing was added to. */
  static empty(): BatchResponse {
    return new BatchResponse(new Map(), new Map());
  }

  get size(): number {
    return this.#results.size;
  }

  /** Result for a correlation token. */
  get(token: string): BatchResult | undefined {
    return this.#results.get(token);
  }

  /** Token the request object was added under. */
  tokenOf(request: LogicalRequest): string | undefined {
    return this.#tokens.get(request);
  }

  /**
   * Result for the request object that was added, matched by identity.
   * A request object added more than once resolves to its first token.
   */
  find(request: LogicalRequest): BatchResult | undefined {
    const token = this.#tokens.get(request);
    return token === undefined ? undefined : this.#results.get(token);
  }

  tokens(): string[] {
    return [...this.#results.keys()];
  }

  entries(): Array<[string, BatchResult]> {
    return [...this.#results];
  }
}

function toResult(sub: SafeWrap<BatchResponseError, Response>): BatchResult {
  const [err, response] = sub;
  if (err) {
    return [err, null];
  }

  if (!response.ok) {
    return [new ProtocolError(response), null];
  }

  return [null, response];
}

/**
 * Attributes sub-responses to tokens.
 *
 * - A sub-response whose `Content-ID` names a token goes to that token.
 * - The rest are matched by position within the segment at the same index.
 * - A change set answered by one non-multipart response gives every token of
 *   the change set that result.
 * - A token left without a sub-response gets a {@link BatchResponseError}.
 *
 * @returns Results in token order of `segments`.
 */
export function correlate(
  segments: readonly BatchSegment[],
  received: readonly ResponseSegment[],
): Map<string, BatchResult> {
  const tokens = segments.flatMap((segment) =>
    segment.type === 'single' ? [segment.part.token] : segment.parts.map((part) => part.token),
  );
  const known = new Set(tokens);
  const assigned = new Map<string, SafeWrap<BatchResponseError, Response>>();
  const matched = new Set<SubResponse>();

  const subResponsesOf = (segment: ResponseSegment | undefined): SubResponse[] => {
    if (!segment) {
      return [];
    }

    return segment.type === 'single' ? [segment.response] : segment.responses;
  };

  for (const sub of received.flatMap(subResponsesOf)) {
    if (sub.contentId !== null && known.has(sub.contentId) && !assigned.has(sub.contentId)) {
      assigned.set(sub.contentId, sub.result);
      matched.add(sub);
    }
  }

  segments.forEach((segment, index) => {
    const answer = received[index];
    const open = (segment.type === 'single' ? [segment.part] : segment.parts)
      .map((part) => part.token)
      .filter((token) => !assigned.has(token));
    const candidates = subResponsesOf(answer).filter((sub) => !matched.has(sub));

    const [first] = candidates;
    if (segment.type === 'changeset' && answer?.type === 'single' && first) {
      const [, response] = first.result;
      open.forEach((token, position) => {
        assigned.set(token, response && position > 0 ? [null, response.clone()] : first.result);
      });
      return;
    }

    open.forEach((token, position) => {
      const sub = candidates[position];
      if (sub) {
        assigned.set(token, sub.result);
      }
    });
  });

  const results = new Map<string, BatchResult>();
  for (const token of tokens) {
    const sub = assigned.get(token);
    results.set(token, sub ? toResult(sub) : [new BatchResponseError(`error missing sub-response for token ${token}`), null]);
  }

  return results;
}
