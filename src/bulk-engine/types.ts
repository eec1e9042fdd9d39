/**
 * Type definitions for the Bulk Engine
 */

// ============================================================================
// Commands & Batches
// ============================================================================

/**
 * A single command as received from the input
 */
export interface Command {
  readonly text: string;
  /** Epoch milliseconds */
  readonly createdAt: number;
}

/**
 * Frozen, ordered group of commands (arrival order)
 */
export type Batch = readonly Command[];

/**
 * Why a flush happened
 */
export type FlushReason = 'size' | 'block-open' | 'block-close' | 'shutdown';

// ============================================================================
// Consumer
// ============================================================================

/**
 * Output consumer.
 *
 * The engine calls `update` with a completed batch and then `process`,
 * never `process` alone. Consumers may keep the batch reference; it is frozen.
 */
export interface Consumer {
  /** Used in logs and failure reports */
  readonly name?: string;

  /** Record the batch to act on next. Must be cheap and synchronous. */
  update(batch: Batch): void;

  /** Act on the last recorded batch (render, persist, ...) */
  process(): void | Promise<void>;

  /** Optional: sees the in-progress buffer after each submit */
  observe?(pending: Batch): void;
}

/**
 * Unsubscribe function returned by subscribe()
 */
export type UnsubscribeFn = () => void;

// ============================================================================
// Failures & Reports
// ============================================================================

export type ConsumerPhase = 'observe' | 'update' | 'process';

export interface ConsumerFailure {
  consumer: Consumer;
  phase: ConsumerPhase;
  error: Error;
}

/**
 * Context passed to the error handler
 */
export interface ConsumerErrorContext {
  consumer: Consumer;
  phase: ConsumerPhase;
  batch: Batch;
}

export type ConsumerErrorHandler = (error: Error, context: ConsumerErrorContext) => void;

export interface FlushReport {
  batch: Batch;
  reason: FlushReason;
  /** Consumers whose process() completed */
  delivered: number;
  failures: ConsumerFailure[];
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * What to do with an end-of-block marker at depth 0
 */
export type UnbalancedBlockPolicy = 'ignore' | 'reject';

export interface BulkEngineOptions {
  /** Batch-size threshold, a positive integer */
  bulkSize: number;
  /** Consumers subscribed at construction */
  consumers?: Consumer[];
  unbalancedBlocks?: UnbalancedBlockPolicy;
  /** Max process() tasks running at once per flush (default: one per consumer) */
  maxConcurrency?: number;
  onError?: ConsumerErrorHandler;
  debug?: boolean;
}

export interface EngineStats {
  /** Commands submitted since construction */
  commands: number;
  /** Flushes that dispatched a batch */
  flushes: number;
  /** Contained consumer failures */
  failures: number;
  depth: number;
  /** Commands currently buffered */
  pending: number;
  subscribers: number;
  closed: boolean;
}

// ============================================================================
// Errors
// ============================================================================

export class BulkEngineError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'BulkEngineError';
  }
}

export class InvalidBulkSizeError extends BulkEngineError {
  constructor(bulkSize: unknown) {
    super(`Bulk size must be a positive integer, got: ${String(bulkSize)}`, 'INVALID_BULK_SIZE', { bulkSize });
    this.name = 'InvalidBulkSizeError';
  }
}

export class UnbalancedBlockError extends BulkEngineError {
  constructor() {
    super('End of block without a matching start of block', 'UNBALANCED_BLOCK');
    this.name = 'UnbalancedBlockError';
  }
}

export class BulkEngineClosedError extends BulkEngineError {
  constructor(operation: string) {
    super(`Cannot ${operation}: engine is closed`, 'ENGINE_CLOSED', { operation });
    this.name = 'BulkEngineClosedError';
  }
}
