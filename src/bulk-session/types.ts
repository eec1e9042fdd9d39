/**
 * Type definitions for Bulk Sessions
 */

import type { BulkEngine } from '../bulk-engine/BulkEngine';
import type { BulkEngineOptions, Consumer } from '../bulk-engine/types';
import { BulkEngineError } from '../bulk-engine/types';

/**
 * Timestamp source for new commands (epoch ms)
 */
export type Clock = () => number;

export type BulkSessionOptions =
  | (BulkEngineOptions & { clock?: Clock })
  | { engine: BulkEngine; clock?: Clock };

/**
 * Builds the consumers for a new session
 */
export type ConsumerFactory = () => Consumer[];

export interface SessionManagerOptions {
  /** Consumers for each connected session (default: console + file) */
  consumerFactory?: ConsumerFactory;
  /** Engine options applied to every session */
  engineDefaults?: Omit<BulkEngineOptions, 'bulkSize' | 'consumers'>;
  clock?: Clock;
}

export type ConnectOptions = Omit<BulkEngineOptions, 'bulkSize'>;

export class SessionNotFoundError extends BulkEngineError {
  constructor(handle: string) {
    super(`Session not found: ${handle}`, 'SESSION_NOT_FOUND', { handle });
    this.name = 'SessionNotFoundError';
  }
}
