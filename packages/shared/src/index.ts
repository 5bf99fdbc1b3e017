/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  setContextDocumentId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Errors
export {
  PipelineError,
  PipelineErrorCode,
  type PipelineErrorCodeType,
  ExtractionFailure,
  ServiceTimeout,
  EngineFailure,
  QualityRegression,
  CostCeilingExceeded,
  InvalidRecord,
  UnknownEngine,
  DuplicateDocumentId,
  isPipelineError,
} from './errors';

// Retry
export { withRetry, withTimeout, sleep, type RetryOptions } from './retry';

// Types
export * from './types';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ProcessDocumentJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  documentsProcessedCounter,
  engineAttemptsCounter,
  engineDurationHistogram,
  fidelityTierCounter,
  qualityRegressionsCounter,
  runCostGauge,
  graphEdgesGauge,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateDocumentRecord,
  validateSyntheticSections,
  validateRegistryEntry,
  type ValidationResult,
  type SyntheticSectionsPayload,
} from './schemas';

// Quality
export {
  scoreQuality,
  escalationReasons,
  escalationSettingsFromConfig,
  splitWords,
  stripChars,
  classifyWord,
  type QualityMetrics,
  type ScoreOptions,
  type EscalationSettings,
} from './quality/scorer';
export { loadDictionary, parseWordList } from './quality/dictionary';
export { piecewiseLinear, type Curve, type CurvePoint } from './quality/curves';

// Engines
export * from './engines';

// Fidelity
export * from './fidelity';

// Extraction
export * from './extraction';

// Sections
export * from './sections';

// Citations
export * from './citations';

// Classification
export * from './classification';

// Metadata
export * from './metadata';

// Store
export * from './store';

// Pipeline
export * from './pipeline';
