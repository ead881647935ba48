import { InvalidRequestError } from '../error/invalidRequestError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Resolves a request URI against the client's base address.
 *
 * - Absolute URIs are kept as they are.
 * - A leading slash on a relative URI is dropped, so the base path is kept
 *   (`Products` and `/Products` both land under `https://host/odata/`).
 */
export function resolveUrl(uri: string, baseUrl: string): SafeWrap<InvalidRequestError, URL> {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  const [err, url] = safeWrap(() => new URL(uri.replace(/^\//, ''), base));
  if (err) {
    return [new InvalidRequestError(`error resolving ${uri} against ${base}`, uri, { cause: err }), null];
  }

  return [null, url];
}
