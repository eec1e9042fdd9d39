/**
 * Consumers Module
 * Built-in outputs for completed bulks
 */

export { ConsoleConsumer } from './ConsoleConsumer';
export type { ConsoleConsumerOptions } from './ConsoleConsumer';
export { FileConsumer, bulkFileName, parseBulkFileName } from './FileConsumer';
export type { FileConsumerOptions } from './FileConsumer';
export { RealFileSystem, InMemoryFileSystem } from './file-system';
export type { FileSystem } from './file-system';
export { formatBulk, BULK_PREFIX } from './format';
