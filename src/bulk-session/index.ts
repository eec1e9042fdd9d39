/**
 * Bulk Session Module
 * Turns raw input into engine calls
 */

export { BulkSession } from './BulkSession';
export { SessionManager, generateHandle, defaultConsumerFactory } from './SessionManager';
export { ingestStream } from './stream-input';
export { splitCommands, classify, START_BLOCK, END_BLOCK } from './line-splitter';
export type { Token } from './line-splitter';
export { SessionNotFoundError } from './types';
export type {
  Clock,
  BulkSessionOptions,
  ConsumerFactory,
  SessionManagerOptions,
  ConnectOptions,
} from './types';
