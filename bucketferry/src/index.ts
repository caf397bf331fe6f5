/**
 * bucketferry - mirror S3 buckets to local storage
 */

export {
  AppConfigSchema,
  IgnorePatternSchema,
  RetrySchema,
  type AppConfig,
  type AppConfigInput,
  type IgnorePatternConfig,
} from './config/schema.js';
export {
  DEFAULT_CONFIG_PATH,
  DEFAULT_CONFIG_DOCUMENT,
  loadAppConfig,
  writeDefaultConfig,
} from './config/loader.js';

export {
  EMPTY_IGNORE_RULES,
  evaluateBucket,
  ignoreRulesFromConfig,
  shouldIncludeBucket,
  type BucketDecision,
  type IgnoreRuleKind,
  type IgnoreRuleSet,
} from './core/bucket-filter.js';
export { bucketDirectory, destinationFor, isDirectoryMarker } from './core/destination.js';
export { PostTransferDeleter, type DeletionResult } from './core/deleter.js';
export {
  DownloadOrchestrator,
  createRunSummary,
  type FinalOutcome,
  type ObjectResult,
  type OrchestratorConfig,
  type RetrySettings,
  type RunFailure,
  type RunSummary,
} from './core/orchestrator.js';
