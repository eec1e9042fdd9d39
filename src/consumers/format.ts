/**
 * Bulk rendering shared by the built-in consumers
 */

import { commandTexts } from '../bulk-engine/command';
import type { Batch } from '../bulk-engine/types';

export const BULK_PREFIX = 'bulk: ';

/**
 * "bulk: cmd1, cmd2, cmd3"
 */
export function formatBulk(batch: Batch): string {
  return BULK_PREFIX + commandTexts(batch).join(', ');
}
