import { Agent, type Dispatcher, fetch, Headers, type Response } from 'undici';
import type { Credentials, OutgoingRequest } from '../types/request.js';

/**
 * Sends one outgoing request. The transport wraps a handler with its timeout
 * and disposal; a custom factory can replace the default pooling handler.
 */
export interface MessageHandler {
  send(request: OutgoingRequest, signal: AbortSignal): Promise<Response>;
  /** Releases connections held by the handler. */
  dispose?(): void | Promise<void>;
}

/** Factory producing a configured handler; called once per client. */
export type MessageHandlerFactory = () => MessageHandler;

/** Connection pool options for {@link PoolingMessageHandler}. */
export interface PoolingMessageHandlerOptions {
  /** Maximum sockets per origin, unlimited when unset. */
  connections?: number;
  /** Idle keep-alive timeout in milliseconds. @default 4000 */
  keepAliveTimeout?: number;
  /** Dispatcher to send through instead of a new {@link Agent}; the pool options are then ignored. */
  dispatcher?: Dispatcher;
}

/**
 * Returns the `Authorization` header value for the given credentials.
 */
export function authorizationHeader(credentials: Credentials): string {
  switch (credentials.type) {
    case 'basic':
      return `Basic ${Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64')}`;
    case 'bearer':
      return `Bearer ${credentials.token}`;
  }
}

/**
 * Default handler: undici `fetch` over a keep-alive {@link Agent}, so every
 * request of one client reuses the same connection pool.
 */
export class PoolingMessageHandler implements MessageHandler {
  #dispatcher: Dispatcher;

  constructor({ connections, keepAliveTimeout = 4_000, dispatcher }: PoolingMessageHandlerOptions = {}) {
    this.#dispatcher = dispatcher ?? new Agent({ connections, keepAliveTimeout });
  }

  send(request: OutgoingRequest, signal: AbortSignal): Promise<Response> {
    const headers = new Headers(request.headers);
    if (request.credentials && !headers.has('Authorization')) {
      headers.set('Authorization', authorizationHeader(request.credentials));
    }

    return fetch(request.url, {
      method: request.method,
      headers,
      body: request.body,
      signal,
      dispatcher: this.#dispatcher,
    });
  }

  async dispose(): Promise<void> {
    await this.#dispatcher.close();
  }
}
