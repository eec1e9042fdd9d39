/**
 * Bulk Engine Module
 * Groups commands into bulks and delivers them to consumers
 */

export { BulkEngine, describeConsumer } from './BulkEngine';
export { createCommand, commandTexts } from './command';
export { SubscriberRegistry } from './subscriber-registry';
export { dispatchBatch, runPooled, toError } from './fan-out';
export {
  BulkEngineError,
  InvalidBulkSizeError,
  UnbalancedBlockError,
  BulkEngineClosedError,
} from './types';
export type {
  Command,
  Batch,
  FlushReason,
  Consumer,
  UnsubscribeFn,
  ConsumerPhase,
  ConsumerFailure,
  ConsumerErrorContext,
  ConsumerErrorHandler,
  FlushReport,
  UnbalancedBlockPolicy,
  BulkEngineOptions,
  EngineStats,
} from './types';
