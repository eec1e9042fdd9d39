/**
 * Console Consumer
 *
 * Renders each bulk as one line on a writable stream (stdout by default).
 */

import type { Batch, Consumer } from '../bulk-engine/types';
import { formatBulk } from './format';

export interface ConsoleConsumerOptions {
  output?: NodeJS.WritableStream;
}

export class ConsoleConsumer implements Consumer {
  readonly name = 'console';

  private output: NodeJS.WritableStream;
  private batch: Batch = [];

  constructor(options: ConsoleConsumerOptions = {}) {
    this.output = options.output ?? process.stdout;
  }

  update(batch: Batch): void {
    this.batch = batch;
  }

  /**
   * Settles once the line is flushed; write errors (EPIPE) reject
   */
  process(): Promise<void> {
    if (this.batch.length === 0) {
      return Promise.resolve();
    }

    const line = formatBulk(this.batch) + '\n';
    return new Promise((resolve, reject) => {
      // A failed write also emits 'error'; this listener takes it
      const onError = (error: Error): void => reject(error);
      this.output.once('error', onError);

      this.output.write(line, error => {
        if (error) {
          reject(error);
          return;
        }
        this.output.removeListener('error', onError);
        resolve();
      });
    });
  }
}
