/**
 * BulkEngine - groups commands into bulks and fans them out to consumers
 *
 * Features:
 * - Size-threshold flushing
 * - Nested explicit blocks ({ ... }) that form one bulk regardless of size
 * - Concurrent per-consumer processing with a join barrier per flush
 * - Contained consumer failures
 * - Explicit shutdown via close()
 *
 * Precondition: submit/enterBlock/exitBlock/close must not interleave.
 * Await each call before making the next (BulkSession does this for you).
 */

import type {
  Batch,
  BulkEngineOptions,
  Command,
  Consumer,
  ConsumerErrorContext,
  ConsumerErrorHandler,
  EngineStats,
  FlushReason,
  FlushReport,
  UnbalancedBlockPolicy,
  UnsubscribeFn,
} from './types';
import {
  BulkEngineClosedError,
  BulkEngineError,
  InvalidBulkSizeError,
  UnbalancedBlockError,
} from './types';
import { SubscriberRegistry } from './subscriber-registry';
import { dispatchBatch, toError } from './fan-out';

export class BulkEngine {
  private readonly bulkSize: number;
  private readonly unbalancedBlocks: UnbalancedBlockPolicy;
  private readonly maxConcurrency?: number;
  private readonly debug: boolean;

  private errorHandler?: ConsumerErrorHandler;
  private registry = new SubscriberRegistry();

  /** Commands of the bulk being accumulated */
  private buffer: Command[] = [];

  /** Block nesting depth; > 0 means forced-block mode */
  private depth = 0;

  private closed = false;

  private counters = { commands: 0, flushes: 0, failures: 0 };

  constructor(options: BulkEngineOptions) {
    if (!isPositiveInteger(options.bulkSize)) {
      throw new InvalidBulkSizeError(options.bulkSize);
    }
    if (options.maxConcurrency !== undefined && !isPositiveInteger(options.maxConcurrency)) {
      throw new BulkEngineError(
        `maxConcurrency must be a positive integer, got: ${options.maxConcurrency}`,
        'INVALID_CONCURRENCY',
        { maxConcurrency: options.maxConcurrency }
      );
    }

    this.bulkSize = options.bulkSize;
    this.unbalancedBlocks = options.unbalancedBlocks ?? 'ignore';
    this.maxConcurrency = options.maxConcurrency;
    this.debug = options.debug ?? process.env.DEBUG === 'true';
    this.errorHandler = options.onError;

    for (const consumer of options.consumers ?? []) {
      this.subscribe(consumer);
    }
  }

  // ==========================================================================
  // Ingestion
  // ==========================================================================

  /**
   * Append a command; flushes when the threshold is reached outside a block
   */
  async submit(command: Command): Promise<FlushReport | null> {
    this.assertOpen('submit command');

    this.buffer.push(command);
    this.counters.commands++;
    this.notifyPending();

    if (this.depth === 0 && this.buffer.length >= this.bulkSize) {
      return this.flush('size');
    }
    return null;
  }

  /**
   * Start of block. Only the outermost one flushes what came before it.
   */
  async enterBlock(): Promise<FlushReport | null> {
    this.assertOpen('enter block');

    this.depth++;
    if (this.depth === 1) {
      return this.flush('block-open');
    }
    return null;
  }

  /**
   * End of block. Only the outermost one flushes the block's content.
   */
  async exitBlock(): Promise<FlushReport | null> {
    this.assertOpen('exit block');

    if (this.depth === 0) {
      if (this.unbalancedBlocks === 'reject') {
        throw new UnbalancedBlockError();
      }
      console.warn('[BulkEngine] Ignoring end of block outside of any block');
      return null;
    }

    this.depth--;
    if (this.depth === 0) {
      return this.flush('block-close');
    }
    return null;
  }

  /**
   * Final flush and teardown.
   *
   * Flushes pending commands once, unless a block is still open: an
   * unterminated block is not a complete bulk and is discarded.
   */
  async close(): Promise<FlushReport | null> {
    if (this.closed) {
      return null;
    }
    this.closed = true;

    try {
      if (this.depth > 0) {
        if (this.buffer.length > 0) {
          console.warn(
            `[BulkEngine] Discarding ${this.buffer.length} command(s) of an unterminated block`
          );
        }
        this.buffer = [];
        return null;
      }
      return await this.flush('shutdown');
    } finally {
      this.registry.clear();
    }
  }

  // ==========================================================================
  // Subscribers
  // ==========================================================================

  /**
   * Subscribe a consumer
   * @returns Unsubscribe function
   */
  subscribe(consumer: Consumer): UnsubscribeFn {
    this.assertOpen('subscribe');
    this.registry.add(consumer);
    return () => {
      this.unsubscribe(consumer);
    };
  }

  /**
   * Unsubscribe a consumer. Takes effect for every flush that starts later.
   */
  unsubscribe(consumer: Consumer): boolean {
    return this.registry.remove(consumer);
  }

  /**
   * Set handler for contained consumer failures
   */
  onError(handler: ConsumerErrorHandler): void {
    this.errorHandler = handler;
  }

  // ==========================================================================
  // Introspection
  // ==========================================================================

  getStats(): EngineStats {
    return {
      ...this.counters,
      depth: this.depth,
      pending: this.buffer.length,
      subscribers: this.registry.size,
      closed: this.closed,
    };
  }

  getDepth(): number {
    return this.depth;
  }

  isInBlock(): boolean {
    return this.depth > 0;
  }

  isClosed(): boolean {
    return this.closed;
  }

  getBulkSize(): number {
    return this.bulkSize;
  }

  /**
   * Copy of the commands buffered so far
   */
  getPendingCommands(): Command[] {
    return [...this.buffer];
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async flush(reason: FlushReason): Promise<FlushReport | null> {
    if (this.buffer.length === 0) {
      return null;
    }

    const batch: Batch = Object.freeze(this.buffer);
    this.buffer = [];
    const consumers = this.registry.snapshot();

    if (this.debug) {
      console.log(
        `[BulkEngine] Flushing ${batch.length} command(s) to ${consumers.length} consumer(s) (${reason})`
      );
    }

    const { delivered, failures } = await dispatchBatch(batch, consumers, {
      isLive: consumer => this.registry.has(consumer),
      maxConcurrency: this.maxConcurrency,
    });

    this.counters.flushes++;
    for (const failure of failures) {
      this.handleError(failure.error, { consumer: failure.consumer, phase: failure.phase, batch });
    }

    return { batch, reason, delivered, failures };
  }

  /**
   * Show the in-progress buffer to consumers that observe it
   */
  private notifyPending(): void {
    const observers = this.registry.snapshot().filter(consumer => consumer.observe);
    if (observers.length === 0) {
      return;
    }

    const pending: Batch = Object.freeze([...this.buffer]);
    for (const consumer of observers) {
      try {
        consumer.observe?.(pending);
      } catch (error) {
        this.handleError(toError(error), { consumer, phase: 'observe', batch: pending });
      }
    }
  }

  private handleError(error: Error, context: ConsumerErrorContext): void {
    this.counters.failures++;

    if (this.errorHandler) {
      try {
        this.errorHandler(error, context);
      } catch (handlerError) {
        console.error('[BulkEngine] Error in error handler:', handlerError);
        console.error('[BulkEngine] Original error:', error);
      }
    } else {
      console.error(
        `[BulkEngine] Consumer "${describeConsumer(context.consumer)}" failed during ${context.phase}:`,
        error
      );
    }
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new BulkEngineClosedError(operation);
    }
  }
}

/**
 * Name used for a consumer in logs. Prototype-less consumers have no constructor.
 */
export function describeConsumer(consumer: Consumer): string {
  return consumer.name ?? consumer.constructor?.name ?? 'anonymous';
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
