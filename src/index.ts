/**
 * Root entrypoint: re-exports the client, batch, transport, metadata cache
 * and error utilities from a single module surface.
 * @module
 */

export * from './batch/index.js';
export * from './core/index.js';
export * from './error/index.js';

/**
 * Process-wide store of parsed service models.
 */
export { type FingerprintSource, MetadataCache, sharedMetadataCache } from './cache/metadata.js';

/**
 * Transport building blocks; supply a {@link MessageHandlerFactory} to replace the default pool.
 */
export {
  authorizationHeader,
  type MessageHandler,
  type MessageHandlerFactory,
  PoolingMessageHandler,
  type PoolingMessageHandlerOptions,
} from './transport/handler.js';
export { DEFAULT_TIMEOUT, TransportClient } from './transport/client.js';
export { MIN_TIMEOUT, TransportManager, type TransportState } from './transport/manager.js';

export type { LogLevel } from './utils/logger.js';
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
