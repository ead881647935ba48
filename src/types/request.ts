import type { Headers, Response } from 'undici';

/** Verbs understood by the protocol. `PUT` is a full update, `PATCH` a partial one. */
export type RestVerb = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Header options accepted on a logical request, either a record or ordered pairs. */
export type HeaderOptions = Readonly<Record<string, string>> | ReadonlyArray<readonly [string, string]>;

/** Credential material applied by the message handler. */
export type Credentials =
  | { readonly type: 'basic'; readonly username: string; readonly password: string }
  | { readonly type: 'bearer'; readonly token: string };

/**
 * Immutable description of one protocol operation, produced by the query layer
 * and consumed (never mutated) by the executor and batch coordinator.
 */
export interface LogicalRequest {
  readonly method: RestVerb;
  /** Absolute URL, or a path relative to the client's base address. */
  readonly uri: string;
  readonly headers?: HeaderOptions;
  readonly body?: string;
  readonly credentials?: Credentials;
  /**
   * Requests `If-Match: *` on PUT/PATCH/DELETE.
   * Falls back to the client setting when left undefined.
   */
  readonly checkOptimisticConcurrency?: boolean;
  /** Media types sent as `Accept`, in order. */
  readonly accept?: readonly string[];
}

/**
 * Fully assembled request handed to the `beforeRequest` hook and then to the
 * message handler. Headers may still be changed by the hook.
 */
export interface OutgoingRequest {
  readonly method: RestVerb;
  readonly url: URL;
  readonly headers: Headers;
  body?: string;
  credentials?: Credentials;
}

/** Options accepted per execution. */
export interface ExecuteOptions {
  /** Cancels the exchange; an aborted signal yields a `CancellationError`. */
  signal?: AbortSignal;
}

/** Called with the outgoing request right before it is sent. */
export type BeforeRequestHook = (request: OutgoingRequest) => void | Promise<void>;

/** Called with the raw response before its status is checked. */
export type AfterResponseHook = (response: Response) => void | Promise<void>;

/** Optional user hooks; an absent member means no hook for that phase. */
export interface RequestHooks {
  beforeRequest?: BeforeRequestHook;
  afterResponse?: AfterResponseHook;
}

/** Naming strategy consumed by the query layer when resolving resource names. */
export interface Pluralizer {
  pluralize(word: string): string;
  singularize(word: string): string;
}
