/**
 * @module reindex-urls
 * Library entry point. Exports the reindex pipeline and its building blocks.
 */

export {
  BatchOrchestrator,
  RESULT_COLUMNS,
  URL_COLUMN,
} from './lib/BatchOrchestrator.js';
export type {
  BatchOrchestratorOptions,
  RunState,
  RunSummary,
} from './lib/BatchOrchestrator.js';
export { createOrchestrator, runReindex } from './lib/app.js';
export type { ReindexRunOptions } from './lib/app.js';
export { loadConfig } from './lib/config.js';
export type { AppConfig } from './lib/config.js';
export { CsvParser } from './lib/CsvParser.js';
export { formatCsv, readTable, writeTable } from './lib/CsvTable.js';
export {
  ConfigurationError,
  InputError,
  OutputError,
  ReindexError,
  ResolutionError,
  UpstreamError,
  describeFailure,
} from './lib/errors.js';
export { IdentityResolver, deriveHostId } from './lib/IdentityResolver.js';
export { Logger, consoleSink, openFileSink } from './lib/Logger.js';
export type { LogLevel, LogSink } from './lib/Logger.js';
export { PrimarySubmitter } from './lib/PrimarySubmitter.js';
export { FixedDelayRateLimiter } from './lib/RateLimiter.js';
export type { RateLimiter, Sleep } from './lib/RateLimiter.js';
export {
  SecondarySubmitter,
  ServiceAccountTokenProvider,
} from './lib/SecondarySubmitter.js';
export type { TokenProvider } from './lib/SecondarySubmitter.js';
export { SubmissionStatus } from './lib/types.js';
export type {
  NotificationType,
  ResultRow,
  SiteIdentity,
  SubmissionOutcome,
} from './lib/types.js';
