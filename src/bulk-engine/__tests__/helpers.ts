/**
 * Shared test doubles for engine tests
 */

import { BulkEngine } from '../BulkEngine';
import { commandTexts, createCommand } from '../command';
import type { Batch, Consumer } from '../types';

/**
 * Records every call the engine makes
 */
export class RecordingConsumer implements Consumer {
  readonly name: string;
  calls: Array<'update' | 'process'> = [];
  updates: string[][] = [];
  processed: string[][] = [];
  private current: Batch = [];

  constructor(name: string = 'recorder') {
    this.name = name;
  }

  update(batch: Batch): void {
    this.calls.push('update');
    this.updates.push(commandTexts(batch));
    this.current = batch;
  }

  process(): void {
    this.calls.push('process');
    this.processed.push(commandTexts(this.current));
  }
}

/**
 * Feed tokens to the engine the way the ingestion adapter does
 */
export async function feed(engine: BulkEngine, tokens: string[]): Promise<void> {
  for (const token of tokens) {
    if (token === '{') {
      await engine.enterBlock();
    } else if (token === '}') {
      await engine.exitBlock();
    } else {
      await engine.submit(createCommand(token));
    }
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * Let pending promise callbacks and immediates run
 */
export function tick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
