/**
 * Feed a readable stream into a session, one line per command
 */

import * as readline from 'readline';
import type { BulkSession } from './BulkSession';

/**
 * Read `input` to the end, pushing each line in order.
 * Does not close the session.
 * @returns Number of lines read
 */
export async function ingestStream(
  session: BulkSession,
  input: NodeJS.ReadableStream
): Promise<number> {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  let lines = 0;

  try {
    for await (const line of rl) {
      lines++;
      await session.pushLine(line);
    }
  } finally {
    rl.close();
  }

  return lines;
}
