import { Response } from 'undici';
import { describe, expect, it, vi } from 'vitest';
import { BatchResponse } from '../batch/response.js';
import { MetadataCache, sharedMetadataCache } from '../cache/metadata.js';
import { BatchStateError } from '../error/batchStateError.js';
import { DisposedError } from '../error/disposedError.js';
import { InvalidRequestError } from '../error/invalidRequestError.js';
import { ProtocolError } from '../error/protocolError.js';
import { ValidationError } from '../error/validationError.js';
import type { LogicalRequest, OutgoingRequest } from '../types/request.js';
import { DataClient } from './client.js';

const baseUrl = 'https://services.example.com/odata/';

function fakeHandler(respond: (request: OutgoingRequest) => Promise<Response>) {
  const send = vi.fn(respond);
  const createMessageHandler = vi.fn(() => ({ send }));
  return { send, createMessageHandler };
}

function batchBody(parts: string[]): Response {
  const body = `${parts.map((part) => `--b\r\n${part}\r\n`).join('')}--b--\r\n`;
  return new Response(body, { status: 200, headers: { 'content-type': 'multipart/mixed; boundary=b' } });
}

function httpPart(contentId: string, message: string): string {
  return `Content-Type: application/http\r\nContent-ID: ${contentId}\r\n\r\n${message}`;
}

const create: LogicalRequest = { method: 'POST', uri: 'Products', body: '{"Name":"Chai"}' };
const read: LogicalRequest = { method: 'GET', uri: 'Products(3)' };

describe('DataClient', () => {
  describe('request mode', () => {
    it('sends requests and tracks the transport lifecycle', async () => {
      const { send, createMessageHandler } = fakeHandler(async () => new Response('[]', { status: 200 }));
      const client = new DataClient({ baseUrl, createMessageHandler });

      expect(client.mode).toBe('request');
      expect(client.state).toBe('uninitialized');
      const [err, response] = await client.execute({ method: 'GET', uri: 'Products' });
      expect(err).toBeNull();
      expect(await response?.text()).toBe('[]');
      expect(client.state).toBe('transport-acquired');

      await client.dispose();

      expect(client.state).toBe('disposed');
      expect(send).toHaveBeenCalledTimes(1);
    });

    it('builds one transport for a burst of concurrent requests', async () => {
      const { send, createMessageHandler } = fakeHandler(async () => new Response(null, { status: 204 }));
      const client = new DataClient({ baseUrl, createMessageHandler });

      const results = await Promise.all(
        Array.from({ length: 120 }, (_, index) => client.execute({ method: 'GET', uri: `Products(${index})` })),
      );

      expect(results.every(([err]) => err === null)).toBe(true);
      expect(createMessageHandler).toHaveBeenCalledTimes(1);
      expect(send).toHaveBeenCalledTimes(120);
    });

    it('refuses requests after dispose without a network call', async () => {
      const { send, createMessageHandler } = fakeHandler(async () => new Response(null, { status: 204 }));
      const client = new DataClient({ baseUrl, createMessageHandler });
      await client.execute({ method: 'GET', uri: 'Products' });

      await client.dispose();
      await client.dispose();
      const [err] = await client.execute({ method: 'GET', uri: 'Products' });

      expect(err).toBeInstanceOf(DisposedError);
      expect(send).toHaveBeenCalledTimes(1);
    });

    it('accepts a bare service address and freezes its settings', () => {
      const client = new DataClient(baseUrl);

      expect(client.settings?.baseUrl).toBe(baseUrl);
      expect(Object.isFrozen(client.settings)).toBe(true);
    });

    it('has no commit', async () => {
      const [err] = await new DataClient(baseUrl).commit();

      expect(err).toBeInstanceOf(BatchStateError);
      expect(err?.message).toBe('error commit is not available in request mode');
    });
  });

  describe('batch mode', () => {
    it('queues requests until commit and settles each with its own result', async () => {
      const { send, createMessageHandler } = fakeHandler(async () =>
        batchBody([
          httpPart('1', 'HTTP/1.1 201 Created\r\n\r\n{"ID":3}'),
          httpPart('2', 'HTTP/1.1 200 OK\r\nContent-Type: application/json\r\n\r\n{"ID":3,"Name":"Chai"}'),
        ]),
      );
      const client = new DataClient({ baseUrl, createMessageHandler }, { batch: true });

      const created = client.execute(create);
      const fetched = client.execute(read);
      expect(send).not.toHaveBeenCalled();
      const [errCommit, batch] = await client.commit();

      expect(errCommit).toBeNull();
      expect(batch?.size).toBe(2);
      expect(send).toHaveBeenCalledTimes(1);
      const [, createdResponse] = await created;
      const [, fetchedResponse] = await fetched;
      expect(createdResponse?.status).toBe(201);
      expect(await fetchedResponse?.json()).toEqual({ ID: 3, Name: 'Chai' });
    });

    it('settles every queued request with the exchange failure', async () => {
      const { createMessageHandler } = fakeHandler(async () => new Response('down', { status: 503 }));
      const client = new DataClient({ baseUrl, createMessageHandler }, { batch: true });

      const first = client.execute(create);
      const second = client.execute(read);
      const [errCommit] = await client.commit();
      const [errFirst] = await first;
      const [errSecond] = await second;

      expect(errCommit).toBeInstanceOf(ProtocolError);
      expect(errFirst).toBe(errCommit);
      expect(errSecond).toBe(errCommit);
    });

    it('commits once', async () => {
      const { createMessageHandler } = fakeHandler(async () => batchBody([]));
      const client = new DataClient({ baseUrl, createMessageHandler }, { batch: true });
      await client.commit();

      const [errExecute] = await client.execute(read);
      const [errCommit] = await client.commit();

      expect(errExecute).toBeInstanceOf(BatchStateError);
      expect(errCommit).toBeInstanceOf(BatchStateError);
    });

    it('settles queued requests with DisposedError on dispose', async () => {
      const { send, createMessageHandler } = fakeHandler(async () => batchBody([]));
      const client = new DataClient({ baseUrl, createMessageHandler }, { batch: true });
      const queued = client.execute(read);

      await client.dispose();
      const [err] = await queued;
      const [errLater] = await client.execute(read);

      expect(err).toBeInstanceOf(DisposedError);
      expect(errLater).toBeInstanceOf(DisposedError);
      expect(send).not.toHaveBeenCalled();
    });

    it('fails commit after dispose, even with nothing queued', async () => {
      const { send, createMessageHandler } = fakeHandler(async () => batchBody([]));
      const client = new DataClient({ baseUrl, createMessageHandler }, { batch: true });
      await client.dispose();

      const [err, batch] = await client.commit();

      expect(err).toBeInstanceOf(DisposedError);
      expect(batch).toBeNull();
      expect(send).not.toHaveBeenCalled();
    });

    it('refuses a malformed request at once and still commits the others', async () => {
      const { send, createMessageHandler } = fakeHandler(async () =>
        batchBody([httpPart('1', 'HTTP/1.1 200 OK\r\n\r\n{"ID":3}')]),
      );
      const client = new DataClient({ baseUrl, createMessageHandler }, { batch: true });

      const good = client.execute(read);
      const [errBad] = await client.execute({ method: 'GET', uri: 'Products(4)', headers: { 'X-Bad': 'a\nb' } });
      const [errCommit, batch] = await client.commit();
      const [errGood, goodResponse] = await good;

      expect(errBad).toBeInstanceOf(InvalidRequestError);
      expect(errCommit).toBeNull();
      expect(batch?.size).toBe(1);
      expect(errGood).toBeNull();
      expect(goodResponse?.status).toBe(200);
      expect(send).toHaveBeenCalledTimes(1);
    });
  });

  describe('response mode', () => {
    it('answers requests from a committed batch', async () => {
      const { createMessageHandler } = fakeHandler(async () =>
        batchBody([httpPart('1', 'HTTP/1.1 200 OK\r\n\r\n{"ID":3}'), httpPart('2', 'HTTP/1.1 404 Not Found\r\n\r\n')]),
      );
      const live = new DataClient({ baseUrl, createMessageHandler }, { batch: true });
      const other: LogicalRequest = { method: 'GET', uri: 'Products(4)' };
      const queued = [live.execute(read), live.execute(other)];
      const [, batch] = await live.commit();
      await Promise.all(queued);
      if (!batch) {
        throw new Error('expected a committed batch');
      }

      const replay = new DataClient(batch);
      const [, found] = await replay.execute(read);
      const [errMissing] = await replay.execute(other);
      const [errUnknown] = await replay.execute({ method: 'GET', uri: 'Products(3)' });

      expect(replay.mode).toBe('response');
      expect(found?.status).toBe(200);
      expect(errMissing).toBeInstanceOf(ProtocolError);
      expect(errUnknown).toBeInstanceOf(BatchStateError);
      expect(errUnknown?.message).toBe('error request is not part of the batch');
    });

    it('holds no transport', async () => {
      const replay = new DataClient(BatchResponse.empty());

      await replay.dispose();

      expect(replay.state).toBe('uninitialized');
      expect(replay.settings).toBeUndefined();
    });
  });

  describe('create', () => {
    it('validates settings first', async () => {
      const [err, client] = await DataClient.create({ baseUrl: 'not a url' });

      expect(client).toBeNull();
      expect(err).toBeInstanceOf(ValidationError);
    });

    it('builds a client from valid settings', async () => {
      const [err, client] = await DataClient.create(baseUrl, { batch: true });

      expect(err).toBeNull();
      expect(client?.mode).toBe('batch');
      expect(client?.settings?.baseUrl).toBe(baseUrl);
    });
  });

  it('uses the shared metadata cache unless one is injected', () => {
    const metadataCache = new MetadataCache();

    expect(new DataClient(baseUrl).metadataCache).toBe(sharedMetadataCache);
    expect(new DataClient({ baseUrl, metadataCache }).metadataCache).toBe(metadataCache);
  });

  it('exposes the naming strategy', () => {
    const client = new DataClient(baseUrl);
    const pluralizer = { pluralize: (word: string) => `${word}s`, singularize: (word: string) => word.slice(0, -1) };

    expect(client.pluralizer).toBeUndefined();
    client.setPluralizer(pluralizer);

    expect(client.pluralizer).toBe(pluralizer);
  });
});
