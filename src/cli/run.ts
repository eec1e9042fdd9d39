/**
 * bulkline runner
 *
 * Wires configuration, consumers and a session to an input stream.
 */

import type { Consumer, FlushReport } from '../bulk-engine/types';
import { BulkSession } from '../bulk-session/BulkSession';
import { ingestStream } from '../bulk-session/stream-input';
import { ConsoleConsumer } from '../consumers/ConsoleConsumer';
import { FileConsumer } from '../consumers/FileConsumer';
import type { FileSystem } from '../consumers/file-system';
import type { BulkConfig } from '../config';
import { parsePositiveInt } from '../config';

export interface CliOptions {
  logDir?: string;
  maxConcurrency?: string;
  strictBlocks?: boolean;
  /** false when --no-files is given */
  files?: boolean;
  debug?: boolean;
}

export interface RunIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  fileSystem?: FileSystem;
}

export interface RunSummary {
  lines: number;
  commands: number;
  flushes: number;
  failures: number;
  final: FlushReport | null;
}

/**
 * Translate CLI arguments into config overrides
 */
export function toOverrides(bulkSize: string | undefined, options: CliOptions): Partial<BulkConfig> {
  const overrides: Partial<BulkConfig> = {};

  if (bulkSize !== undefined) {
    overrides.bulkSize = parsePositiveInt('bulkSize', bulkSize);
  }
  if (options.logDir !== undefined) {
    overrides.logDir = options.logDir;
  }
  if (options.maxConcurrency !== undefined) {
    overrides.maxConcurrency = parsePositiveInt('maxConcurrency', options.maxConcurrency);
  }
  if (options.strictBlocks) {
    overrides.unbalancedBlocks = 'reject';
  }
  if (options.files === false) {
    overrides.writeFiles = false;
  }
  if (options.debug) {
    overrides.debug = true;
  }

  return overrides;
}

export function createConsumers(config: BulkConfig, io: Pick<RunIO, 'output' | 'fileSystem'>): Consumer[] {
  const consumers: Consumer[] = [new ConsoleConsumer({ output: io.output })];

  if (config.writeFiles) {
    consumers.push(new FileConsumer({ directory: config.logDir, fileSystem: io.fileSystem }));
  }

  return consumers;
}

/**
 * Read all input, then close the session (final flush)
 */
export async function run(config: BulkConfig, io: RunIO): Promise<RunSummary> {
  const session = new BulkSession({
    bulkSize: config.bulkSize,
    consumers: createConsumers(config, io),
    unbalancedBlocks: config.unbalancedBlocks,
    maxConcurrency: config.maxConcurrency,
    debug: config.debug,
  });

  let lines: number;
  try {
    lines = await ingestStream(session, io.input);
  } finally {
    // Pending commands are still flushed when ingestion fails
    await session.close();
  }

  const final = await session.close();
  const stats = session.engine.getStats();

  return {
    lines,
    commands: stats.commands,
    flushes: stats.flushes,
    failures: stats.failures,
    final,
  };
}
