/**
 * Batch entrypoint: units, the coordinator and committed results.
 * @module
 */
export { type BatchCoordinatorOptions, BatchCoordinator, type BatchEntry, BatchUnit } from './coordinator.js';
export { type BatchResult, BatchResponse } from './response.js';
