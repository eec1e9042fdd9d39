/**
 * Command factory
 */

import type { Command } from './types';

/**
 * Create a frozen command stamped with `createdAt` (defaults to now)
 */
export function createCommand(text: string, createdAt: number = Date.now()): Command {
  return Object.freeze({ text, createdAt });
}

/**
 * Command texts of a batch, in order
 */
export function commandTexts(batch: readonly Command[]): string[] {
  return batch.map(command => command.text);
}
