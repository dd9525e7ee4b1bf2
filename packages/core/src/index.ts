/**
 * @verisql/core: barrel export
 *
 * Task routing and two-model verification shared by the CLI and the bench.
 */

// Errors
export {
  BackendError,
  BackendSaturatedError,
  ConfigError,
  GenerationFailedError,
  InvariantViolationError,
  NoAvailableBackendError,
  LOW_CONFIDENCE_REASON,
  UNPARSEABLE_CRITIC_REASON,
  isBackendError,
  isBackendSaturatedError,
  isConfigError,
  isGenerationFailedError,
  isNoAvailableBackendError,
  toBackendError,
} from './errors.js';
export type { BackendErrorKind } from './errors.js';

// Configuration
export type {
  ClassifierConfig,
  ClassifierKeywords,
  ContextConfig,
  GenerationConfig,
  LoadedConfig,
  LoggingConfig,
  LogLevel,
  OrchestratorConfig,
  PoolConfig,
  ProviderRateLimit,
  RateLimitConfig,
  ResolvedEndpoint,
  SignalWeights,
  VerisqlConfig,
} from './config/types.js';
export { defaultConfig } from './config/defaults.js';
export { PROVIDERS, PROVIDER_NAMES, isProviderName } from './config/providers.js';
export {
  LOG_LEVEL_ENV,
  configWarnings,
  deepMerge,
  loadConfig,
  resolveEndpoints,
  validateConfigObject,
} from './config/load.js';
export type { Env, LoadConfigOptions } from './config/load.js';

// Logging and metrics
export { createLogger, createTaskLogger, silentLogger } from './logger.js';
export type { LogEvent, Logger, TaskLogger } from './logger.js';
export { InMemoryMetricsCollector, costUnits, summarizeCalls } from './metrics.js';
export type { CallRecord, MetricsCollector, MetricsSummary, RunMetrics } from './metrics.js';

// Routing
export {
  TIER_ORDER,
  getNextTier,
  maxTier,
  tierRank,
} from './routing/types.js';
export type { CallRole, ComplexityTier, ModelProfile, ProviderName } from './routing/types.js';
export { classifyTask, estimateTokens, isUnclassifiable } from './routing/classify.js';
export type {
  ClassificationResult,
  ClassifierInput,
  SignalName,
  SignalScore,
} from './routing/classify.js';
export { Semaphore, SemaphoreTimeoutError } from './routing/semaphore.js';
export type { SemaphoreStats } from './routing/semaphore.js';
export { RateLimiter, TokenBucket, estimateRequestTokens } from './routing/rate_limit.js';
export type { ProviderUsage } from './routing/rate_limit.js';
export { ModelPool } from './routing/pool.js';
export type { BackendLease, PoolRequest } from './routing/pool.js';

// Context
export { fitContext, renderContext } from './context/supplier.js';
export type { ContextItem, ContextKind, ContextSupplier, FittedContext } from './context/supplier.js';
export {
  SchemaSnapshotSupplier,
  parseDocuments,
  parseSchemaSnapshot,
  schemaContextItems,
} from './context/schema.js';
export type {
  ColumnInfo,
  DocumentSnippet,
  SchemaSnapshot,
  SchemaSupplierOpts,
  TableInfo,
} from './context/schema.js';

// LLM module
export * from './llm/index.js';

// Static inspection
export { parseSql } from './policy/parse.js';
export type { ParseOutcome, ParseResult, SqlKind } from './policy/parse.js';
export { classifyStatement } from './policy/classify.js';
export type { StatementClassification, StatementInfo } from './policy/classify.js';
export { DANGEROUS_FUNCTIONS, formatFindings, inspectSql } from './policy/inspect.js';
export type { Finding, FindingRule, FindingSeverity, Inspection } from './policy/inspect.js';

// Verification
export { createTask, contextSize, schemaItemCount } from './verify/task.js';
export type { TaskInput } from './verify/task.js';
export { parseVerdict } from './verify/verdict.js';
export type { ParsedVerdict, VerdictParse } from './verify/verdict.js';
export { Generator } from './verify/generator.js';
export type { GenerateOptions } from './verify/generator.js';
export { Critic } from './verify/critic.js';
export type { CriticConfig, CritiqueOptions } from './verify/critic.js';
export { Orchestrator } from './verify/orchestrator.js';
export type { OrchestratorDeps, ResolveOptions } from './verify/orchestrator.js';
export type {
  AcceptedRun,
  AttemptRecord,
  CancelledRun,
  Candidate,
  FailedRun,
  FailureKind,
  GenerationFailure,
  PriorFeedback,
  RunFailure,
  RunResult,
  RunState,
  Task,
  TaskContext,
  Transition,
  Verdict,
  VerdictDecision,
} from './verify/types.js';

// Run history
export { RunStore, defaultDbPath } from './storage/sqlite.js';
export type { StoredAttempt, StoredRun } from './storage/sqlite.js';
