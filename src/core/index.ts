/**
 * Core entrypoint: the session facade, its settings and the request executor.
 * Import from here if you only need the client without error helpers.
 * @module
 */

/**
 * Session facade for the query layer, in request, batch or response mode.
 */
export { DataClient, type DataClientOptions } from './client.js';

/**
 * Runs one logical request through hooks, transport and status check.
 */
export { RequestExecutor, type RequestExecutorOptions } from './executor.js';

/** Header assembly shared by single requests and batch parts. */
export { assembleHeaders, requiresIfMatch } from './headers.js';

/**
 * Client configuration and the schema it is validated against.
 */
export { type ClientSettings, clientSettingsSchema } from './settings.js';

export type {
  AfterResponseHook,
  BeforeRequestHook,
  Credentials,
  ExecuteOptions,
  HeaderOptions,
  LogicalRequest,
  OutgoingRequest,
  Pluralizer,
  RequestHooks,
  RestVerb,
} from '../types/request.js';
