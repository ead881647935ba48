import { Headers } from 'undici';
import type { HeaderOptions, LogicalRequest, RestVerb } from '../types/request.js';

/** Verbs that carry `If-Match: *` when optimistic concurrency is requested. */
const CONDITIONAL_VERBS: ReadonlySet<RestVerb> = new Set(['PUT', 'PATCH', 'DELETE']);

function isPairList(headers: HeaderOptions): headers is ReadonlyArray<readonly [string, string]> {
  return Array.isArray(headers);
}

/**
 * Normalizes the header container shapes into ordered pairs.
 */
export function toEntries(headers?: HeaderOptions): ReadonlyArray<readonly [string, string]> {
  if (!headers) {
    return [];
  }

  if (isPairList(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Whether the request asks for a "match any current version" precondition.
 * The request flag wins; the client default applies when it is unset.
 */
export function requiresIfMatch(request: LogicalRequest, clientDefault = false): boolean {
  return (request.checkOptimisticConcurrency ?? clientDefault) && CONDITIONAL_VERBS.has(request.method);
}

/**
 * Assembles the headers of a logical request: accept types, the optional
 * `If-Match: *`, then caller headers appended as given.
 *
 * Caller headers go through fetch's own header validation: a name that is
 * not a token, or a value containing CR, LF or NUL, throws instead of being
 * sent. Header injection through request headers is refused this way.
 */
export function assembleHeaders(request: LogicalRequest, clientDefault = false): Headers {
  const headers = new Headers();

  for (const accept of request.accept ?? []) {
    headers.append('Accept', accept);
  }

  if (requiresIfMatch(request, clientDefault)) {
    headers.append('If-Match', '*');
  }

  for (const [key, value] of toEntries(request.headers)) {
    headers.append(key, value);
  }

  return headers;
}
