import type { Logger } from 'pino';
import { z } from 'zod';
import { MetadataCache } from '../cache/metadata.js';
import type { MessageHandlerFactory } from '../transport/handler.js';
import type {
  AfterResponseHook,
  BeforeRequestHook,
  Credentials,
  Pluralizer,
  RequestHooks,
} from '../types/request.js';
import type { LogLevel } from '../utils/logger.js';

/** Configuration of one {@link DataClient}, frozen once the client is built. */
export interface ClientSettings {
  /** Service root, e.g. `https://services.example.com/odata/`. */
  baseUrl: string;
  /** Exchange timeout in milliseconds; values below 1 keep the 100 s default. */
  timeout?: number;
  /** Replaces the default pooling handler. Called once, on the first request. */
  createMessageHandler?: MessageHandlerFactory;
  /** Applied to every request that carries none of its own. */
  credentials?: Credentials;
  hooks?: RequestHooks;
  /** Naming strategy handed to the query layer. */
  pluralizer?: Pluralizer;
  /**
   * Sends `If-Match: *` on updates and deletes whose request leaves the flag unset.
   * @default false
   */
  checkOptimisticConcurrency?: boolean;
  /** pino logger requests are traced through. */
  logger?: Logger;
  /**
   * Level of the logger created when none is given.
   * @default 'silent'
   */
  logLevel?: LogLevel;
  /** Also logs request and response bodies, at `trace`. */
  traceContent?: boolean;
  /** Cache of parsed service models; the process-wide one when unset. */
  metadataCache?: MetadataCache;
}

function isFunction(value: unknown): value is (...args: never[]) => unknown {
  return typeof value === 'function';
}

function hasMethods(value: unknown, ...names: string[]): boolean {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return names.every((name) => isFunction(Reflect.get(value, name)));
}

const credentialsSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('basic'), username: z.string().min(1), password: z.string() }),
  z.object({ type: z.literal('bearer'), token: z.string().min(1) }),
]);

/**
 * Schema of {@link ClientSettings}, consumed through the standard-schema
 * contract by `DataClient.create`.
 */
export const clientSettingsSchema = z.object({
  baseUrl: z.string().url(),
  timeout: z.number().finite().optional(),
  createMessageHandler: z
    .custom<MessageHandlerFactory>(isFunction, { message: 'createMessageHandler must be a function' })
    .optional(),
  credentials: credentialsSchema.optional(),
  hooks: z
    .object({
      beforeRequest: z
        .custom<BeforeRequestHook>(isFunction, { message: 'beforeRequest must be a function' })
        .optional(),
      afterResponse: z
        .custom<AfterResponseHook>(isFunction, { message: 'afterResponse must be a function' })
        .optional(),
    })
    .optional(),
  pluralizer: z
    .custom<Pluralizer>((value) => hasMethods(value, 'pluralize', 'singularize'), {
      message: 'pluralizer must implement pluralize and singularize',
    })
    .optional(),
  checkOptimisticConcurrency: z.boolean().optional(),
  logger: z
    .custom<Logger>((value) => hasMethods(value, 'child', 'debug', 'trace'), { message: 'logger must be a pino logger' })
    .optional(),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  traceContent: z.boolean().optional(),
  metadataCache: z.instanceof(MetadataCache).optional(),
});

/**
 * Turns a bare service address into settings.
 */
export function normalizeSettings(settings: ClientSettings | string): ClientSettings {
  return typeof settings === 'string' ? { baseUrl: settings } : settings;
}

/**
 * Returns a frozen copy of the settings; the hooks container is frozen too.
 */
export function freezeSettings(settings: ClientSettings): Readonly<ClientSettings> {
  const { hooks } = settings;

  return Object.freeze({ ...settings, hooks: hooks ? Object.freeze({ ...hooks }) : undefined });
}
