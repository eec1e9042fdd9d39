/**
 * bulkline
 *
 * Command batching: fixed-size bulks, explicit { } blocks, concurrent
 * delivery to pluggable consumers.
 */

export * from './bulk-engine';
export * from './bulk-session';
export * from './consumers';
export { loadConfig, DEFAULT_CONFIG, ConfigError, parsePositiveInt, parseUnbalancedPolicy } from './config';
export type { BulkConfig } from './config';
export { run, toOverrides, createConsumers } from './cli/run';
export type { CliOptions, RunIO, RunSummary } from './cli/run';
