/**
 * Batch fan-out
 *
 * Delivers one batch to a snapshot of consumers: a synchronous update pass,
 * then one process() task per updated consumer, awaited as a barrier.
 */

import type { Batch, Consumer, ConsumerFailure } from './types';

export interface DispatchOptions {
  /** Consumers failing this check at update time are skipped */
  isLive: (consumer: Consumer) => boolean;
  /** Max tasks at once; undefined runs all together */
  maxConcurrency?: number;
}

export interface DispatchResult {
  delivered: number;
  failures: ConsumerFailure[];
}

export async function dispatchBatch(
  batch: Batch,
  consumers: readonly Consumer[],
  options: DispatchOptions
): Promise<DispatchResult> {
  const failures: ConsumerFailure[] = [];
  const updated: Consumer[] = [];

  for (const consumer of consumers) {
    // Unsubscribed after the snapshot was taken
    if (!options.isLive(consumer)) {
      continue;
    }

    try {
      consumer.update(batch);
      updated.push(consumer);
    } catch (error) {
      failures.push({ consumer, phase: 'update', error: toError(error) });
    }
  }

  let delivered = 0;

  const processOne = async (consumer: Consumer): Promise<void> => {
    try {
      await consumer.process();
      delivered++;
    } catch (error) {
      failures.push({ consumer, phase: 'process', error: toError(error) });
    }
  };

  await runPooled(updated, processOne, options.maxConcurrency);

  return { delivered, failures };
}

/**
 * Run `worker` over all items with at most `limit` in flight.
 * Workers must not reject.
 */
export async function runPooled<T>(
  items: readonly T[],
  worker: (item: T) => Promise<void>,
  limit?: number
): Promise<void> {
  if (limit === undefined || limit >= items.length) {
    await Promise.all(items.map(worker));
    return;
  }

  let next = 0;
  const lanes = Array.from({ length: limit }, async () => {
    while (next < items.length) {
      const item = items[next++];
      await worker(item);
    }
  });

  await Promise.all(lanes);
}

/**
 * Normalize a thrown value
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
