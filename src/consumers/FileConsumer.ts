/**
 * File Consumer
 *
 * Persists each bulk to its own file: <dir>/bulk<seconds>_<id>.log, where
 * <seconds> is the first command's timestamp and <id> a random suffix that
 * keeps bulks from the same second apart.
 */

import * as path from 'path';
import { customAlphabet } from 'nanoid';
import type { Batch, Consumer } from '../bulk-engine/types';
import type { FileSystem } from './file-system';
import { RealFileSystem } from './file-system';
import { formatBulk } from './format';

// ============================================================================
// Constants
// ============================================================================

const FILE_PREFIX = 'bulk';
const FILE_EXTENSION = '.log';
const SUFFIX_LENGTH = 8;
const ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyz';

const FILE_NAME_PATTERN = new RegExp(
  `^${FILE_PREFIX}(\\d+)_([${ALPHABET}]{${SUFFIX_LENGTH}})\\${FILE_EXTENSION}$`
);

const nanoid = customAlphabet(ALPHABET, SUFFIX_LENGTH);

// ============================================================================
// File names
// ============================================================================

/**
 * File name for a bulk whose first command was created at `createdAt` (ms)
 */
export function bulkFileName(createdAt: number, suffix: string = nanoid()): string {
  const seconds = Math.floor(createdAt / 1000);
  return `${FILE_PREFIX}${seconds}_${suffix}${FILE_EXTENSION}`;
}

/**
 * Parse a bulk file name into its components
 */
export function parseBulkFileName(fileName: string): { seconds: number; suffix: string } | null {
  const match = FILE_NAME_PATTERN.exec(fileName);
  if (!match) {
    return null;
  }
  return { seconds: parseInt(match[1], 10), suffix: match[2] };
}

// ============================================================================
// File Consumer
// ============================================================================

export interface FileConsumerOptions {
  /** Target directory (default: current working directory) */
  directory?: string;
  fileSystem?: FileSystem;
  /** Overrides the random file name suffix */
  suffix?: () => string;
}

export class FileConsumer implements Consumer {
  readonly name = 'file';

  private directory: string;
  private fs: FileSystem;
  private suffix: () => string;
  private batch: Batch = [];
  private lastPath: string | null = null;

  constructor(options: FileConsumerOptions = {}) {
    this.directory = options.directory ?? process.cwd();
    this.fs = options.fileSystem ?? new RealFileSystem();
    this.suffix = options.suffix ?? (() => nanoid());
  }

  update(batch: Batch): void {
    this.batch = batch;
  }

  async process(): Promise<void> {
    const batch = this.batch;
    if (batch.length === 0) {
      return;
    }

    const filePath = path.join(this.directory, bulkFileName(batch[0].createdAt, this.suffix()));
    await this.fs.write(filePath, formatBulk(batch));
    this.lastPath = filePath;
  }

  /**
   * Path of the most recent file written, if any
   */
  get lastWrittenPath(): string | null {
    return this.lastPath;
  }
}
