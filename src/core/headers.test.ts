import { describe, expect, it } from 'vitest';
import type { LogicalRequest, RestVerb } from '../types/request.js';
import { assembleHeaders, requiresIfMatch, toEntries } from './headers.js';

const verbs: RestVerb[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

describe('toEntries', () => {
  it('keeps ordered pairs and converts records', () => {
    expect(toEntries([['Prefer', 'return=minimal']])).toEqual([['Prefer', 'return=minimal']]);
    expect(toEntries({ 'OData-Version': '4.0' })).toEqual([['OData-Version', '4.0']]);
    expect(toEntries()).toEqual([]);
  });
});

describe('requiresIfMatch', () => {
  it.each(verbs)('with the flag set on %s', (method) => {
    const expected = method === 'PUT' || method === 'PATCH' || method === 'DELETE';

    expect(requiresIfMatch({ method, uri: 'Products(1)', checkOptimisticConcurrency: true })).toBe(expected);
  });

  it.each(verbs)('never without the flag on %s', (method) => {
    expect(requiresIfMatch({ method, uri: 'Products(1)' })).toBe(false);
    expect(requiresIfMatch({ method, uri: 'Products(1)', checkOptimisticConcurrency: false }, true)).toBe(false);
  });

  it('falls back to the client default when the request leaves it unset', () => {
    expect(requiresIfMatch({ method: 'DELETE', uri: 'Products(1)' }, true)).toBe(true);
  });
});

describe('assembleHeaders', () => {
  it('adds accept types, the precondition and caller headers', () => {
    const request: LogicalRequest = {
      method: 'PATCH',
      uri: 'Products(1)',
      accept: ['application/json', 'text/plain'],
      checkOptimisticConcurrency: true,
      headers: [
        ['Content-Type', 'application/json'],
        ['Prefer', 'return=representation'],
      ],
    };

    const headers = assembleHeaders(request);

    expect([...headers]).toEqual([
      ['accept', 'application/json, text/plain'],
      ['content-type', 'application/json'],
      ['if-match', '*'],
      ['prefer', 'return=representation'],
    ]);
  });

  it('throws on a header value fetch rejects', () => {
    expect(() => assembleHeaders({ method: 'GET', uri: 'Products', headers: { 'X-Bad': 'a\nb' } })).toThrow();
  });
});
