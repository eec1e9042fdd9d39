/**
 * Subscriber Registry
 *
 * Insertion-ordered set of consumers. The engine never owns consumer
 * lifetime; callers remove consumers through the unsubscribe function.
 */

import type { Consumer } from './types';

export class SubscriberRegistry {
  private consumers = new Set<Consumer>();

  /**
   * Add consumer. Returns false if it was already registered.
   */
  add(consumer: Consumer): boolean {
    if (this.consumers.has(consumer)) {
      return false;
    }
    this.consumers.add(consumer);
    return true;
  }

  remove(consumer: Consumer): boolean {
    return this.consumers.delete(consumer);
  }

  has(consumer: Consumer): boolean {
    return this.consumers.has(consumer);
  }

  /**
   * Copy of the current subscribers, safe to iterate while the set changes
   */
  snapshot(): Consumer[] {
    return Array.from(this.consumers);
  }

  clear(): void {
    this.consumers.clear();
  }

  get size(): number {
    return this.consumers.size;
  }
}
