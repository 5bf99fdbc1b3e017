export {
  processDocument,
  buildDocumentRecord,
  type PipelineDeps,
  type ProcessOptions,
  type ProcessOutcome,
  type ProcessStatus,
  type StructuredFields,
} from './process-document';
export {
  planBatch,
  planFromStore,
  planTypeFor,
  runBatch,
  backupBeforeForcedRun,
  assertWithinBudget,
  batchOptionsFromConfig,
  type BatchOptions,
  type BatchPlan,
  type BatchReport,
  type PlannedSkip,
  type PlanType,
  type RunBatchOptions,
} from './batch';
export {
  mergeSyntheticSections,
  needsSyntheticFallback,
  withoutSynthetic,
  type SyntheticSectionGenerator,
  type SyntheticSectionRequest,
  type SyntheticSectionResult,
  type MergedSections,
} from './synthetic';
