/**
 * Session Manager
 *
 * Handle-based API over sessions: connect(bulkSize) → handle,
 * receive(handle, data), disconnect(handle).
 */

import { customAlphabet } from 'nanoid';
import { ConsoleConsumer } from '../consumers/ConsoleConsumer';
import { FileConsumer } from '../consumers/FileConsumer';
import { BulkSession } from './BulkSession';
import type { ConnectOptions, ConsumerFactory, SessionManagerOptions } from './types';
import { SessionNotFoundError } from './types';

// ============================================================================
// Handles
// ============================================================================

const HANDLE_PREFIX = 'bulk_';
const HANDLE_LENGTH = 12;
const ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyz';

const nanoid = customAlphabet(ALPHABET, HANDLE_LENGTH);

export function generateHandle(): string {
  return `${HANDLE_PREFIX}${nanoid()}`;
}

export const defaultConsumerFactory: ConsumerFactory = () => [
  new ConsoleConsumer(),
  new FileConsumer(),
];

// ============================================================================
// Session Manager
// ============================================================================

export class SessionManager {
  private sessions = new Map<string, BulkSession>();
  private options: SessionManagerOptions;

  constructor(options: SessionManagerOptions = {}) {
    this.options = options;
  }

  /**
   * Open a session with its own engine and consumers
   * @returns Session handle
   */
  connect(bulkSize: number, options: ConnectOptions = {}): string {
    const consumerFactory = this.options.consumerFactory ?? defaultConsumerFactory;

    // Validates bulkSize before a handle is handed out
    const session = new BulkSession({
      ...this.options.engineDefaults,
      ...options,
      bulkSize,
      consumers: options.consumers ?? consumerFactory(),
      clock: this.options.clock,
    });

    const handle = generateHandle();
    this.sessions.set(handle, session);
    return handle;
  }

  async receive(handle: string, data: string): Promise<void> {
    await this.getSession(handle).receive(data);
  }

  /**
   * Close the session (final flush) and forget the handle
   * @returns false if the handle is unknown
   */
  async disconnect(handle: string): Promise<boolean> {
    const session = this.sessions.get(handle);
    if (!session) {
      return false;
    }

    this.sessions.delete(handle);
    await session.close();
    return true;
  }

  async disconnectAll(): Promise<void> {
    const handles = Array.from(this.sessions.keys());
    await Promise.all(handles.map(handle => this.disconnect(handle)));
  }

  getSession(handle: string): BulkSession {
    const session = this.sessions.get(handle);
    if (!session) {
      throw new SessionNotFoundError(handle);
    }
    return session;
  }

  has(handle: string): boolean {
    return this.sessions.has(handle);
  }

  get size(): number {
    return this.sessions.size;
  }
}
