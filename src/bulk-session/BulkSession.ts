/**
 * Bulk Session
 *
 * Ingestion adapter in front of a BulkEngine: splits raw input into
 * commands, routes block markers, and serializes calls so the engine
 * only ever sees one operation at a time.
 */

import { BulkEngine } from '../bulk-engine/BulkEngine';
import { createCommand } from '../bulk-engine/command';
import { BulkEngineClosedError } from '../bulk-engine/types';
import type { FlushReport } from '../bulk-engine/types';
import type { BulkSessionOptions, Clock } from './types';
import { classify, splitCommands } from './line-splitter';

export class BulkSession {
  private readonly bulkEngine: BulkEngine;
  private readonly clock: Clock;

  /** Settles when all input received so far has been processed */
  private tail: Promise<void> = Promise.resolve();
  private closing: Promise<FlushReport | null> | null = null;

  constructor(options: BulkSessionOptions) {
    if ('engine' in options) {
      this.bulkEngine = options.engine;
    } else {
      this.bulkEngine = new BulkEngine(options);
    }
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Feed raw text. Resolves once every command in it has been handled,
   * including any flush it caused.
   */
  receive(data: string): Promise<void> {
    return this.enqueue(() => this.ingest(splitCommands(data)));
  }

  /**
   * Feed exactly one line (no splitting)
   */
  pushLine(line: string): Promise<void> {
    return this.enqueue(() => this.ingest(line.length > 0 ? [line] : []));
  }

  /**
   * Wait for queued input to drain
   */
  idle(): Promise<void> {
    return this.tail;
  }

  /**
   * Drain queued input, then close the engine (final flush)
   */
  close(): Promise<FlushReport | null> {
    if (!this.closing) {
      this.closing = this.tail.then(() => this.bulkEngine.close());
    }
    return this.closing;
  }

  get engine(): BulkEngine {
    return this.bulkEngine;
  }

  isClosed(): boolean {
    return this.closing !== null;
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    if (this.closing) {
      return Promise.reject(new BulkEngineClosedError('receive input'));
    }

    const run = this.tail.then(task);
    // A failed call rejects its own promise only; later input still runs
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async ingest(parts: string[]): Promise<void> {
    for (const part of parts) {
      const token = classify(part);
      switch (token.type) {
        case 'start-block':
          await this.bulkEngine.enterBlock();
          break;
        case 'end-block':
          await this.bulkEngine.exitBlock();
          break;
        case 'command':
          await this.bulkEngine.submit(createCommand(token.text, this.clock()));
          break;
      }
    }
  }
}
