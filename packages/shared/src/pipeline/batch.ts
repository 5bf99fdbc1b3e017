/**
 * Batch planning and in-process execution
 *
 * planBatch decides which registry entries a run touches (resume, force,
 * per-type and total limits). runBatch works through a plan with a bounded
 * pool, sized to the external engines' limits, and stops starting new
 * documents once the run's spend reaches the ceiling. Documents already
 * committed stay as written.
 */

import pLimit from 'p-limit';
import { ulid } from 'ulid';
import type { DocumentType, ExtractionStatus, RegistryEntry } from '../types';
import type { DocumentStore } from '../store/types';
import { config } from '../config';
import { logger } from '../logger';
import { runWithContextAsync } from '../context';
import { CostCeilingExceeded } from '../errors';
import { parseIdentifierCore } from '../citations/identifiers';
import { processDocument, type PipelineDeps, type ProcessOutcome } from './process-document';

export interface BatchOptions {
  resume: boolean;
  force: boolean;
  dryRun: boolean;
  /** Max entries per document type, 0 for no limit */
  perTypeLimit: number;
  /** Max entries in the run, 0 or undefined for no limit */
  limit?: number;
}

export function batchOptionsFromConfig(overrides: Partial<BatchOptions> = {}): BatchOptions {
  return {
    resume: config.resume,
    force: config.force,
    dryRun: config.dryRun,
    perTypeLimit: config.perTypeLimit,
    ...overrides,
  };
}

export type PlanType = DocumentType | 'unknown';

export interface PlannedSkip {
  registry_key: string;
  reason: 'already_extracted' | 'type_limit' | 'run_limit';
}

export interface BatchPlan {
  entries: RegistryEntry[];
  skipped: PlannedSkip[];
  byType: Partial<Record<PlanType, number>>;
  dryRun: boolean;
  force: boolean;
}

const PREFIX_PLAN_TYPES: Record<string, PlanType> = {
  A: 'advice_letter',
  I: 'informal_advice',
  M: 'opinion',
};

/** Type from the registry identifier's prefix, before any text is read */
export function planTypeFor(entry: RegistryEntry): PlanType {
  const core = entry.letter_id ? parseIdentifierCore(entry.letter_id) : null;
  return core?.prefix ? PREFIX_PLAN_TYPES[core.prefix] : 'unknown';
}

/**
 * @param statuses extraction status of stored records, by registry key
 */
export function planBatch(
  entries: readonly RegistryEntry[],
  statuses: ReadonlyMap<string, ExtractionStatus>,
  options: BatchOptions
): BatchPlan {
  const planned: RegistryEntry[] = [];
  const skipped: PlannedSkip[] = [];
  const byType: Partial<Record<PlanType, number>> = {};

  for (const entry of entries) {
    if (options.resume && !options.force && statuses.get(entry.registry_key) === 'extracted') {
      skipped.push({ registry_key: entry.registry_key, reason: 'already_extracted' });
      continue;
    }

    const type = planTypeFor(entry);
    const typeCount = byType[type] ?? 0;
    if (options.perTypeLimit > 0 && typeCount >= options.perTypeLimit) {
      skipped.push({ registry_key: entry.registry_key, reason: 'type_limit' });
      continue;
    }

    if (options.limit && planned.length >= options.limit) {
      skipped.push({ registry_key: entry.registry_key, reason: 'run_limit' });
      continue;
    }

    planned.push(entry);
    byType[type] = typeCount + 1;
  }

  logger.info('Batch planned', {
    planned: planned.length,
    skipped: skipped.length,
    by_type: byType,
    dry_run: options.dryRun,
    force: options.force,
  });

  return { entries: planned, skipped, byType, dryRun: options.dryRun, force: options.force };
}

export async function planFromStore(store: DocumentStore, options: BatchOptions): Promise<BatchPlan> {
  const [entries, records] = await Promise.all([store.listRegistry(), store.listRecords()]);
  const statuses = new Map(records.map((r) => [r.registry_key, r.extraction.status] as const));
  return planBatch(entries, statuses, options);
}

/**
 * A forced run overwrites records in place, so the corpus is snapshotted
 * first. Returns the backup name, or null when none was needed.
 */
export async function backupBeforeForcedRun(
  store: DocumentStore,
  plan: BatchPlan,
  runId: string
): Promise<string | null> {
  if (!plan.force || plan.dryRun || plan.entries.length === 0) return null;
  const backup = await store.backupCorpus(`pre-force-${runId}`);
  logger.info('Corpus backed up before forced run', { backup, run_id: runId });
  return backup;
}

/**
 * @throws CostCeilingExceeded when the run has already spent the ceiling
 */
export async function assertWithinBudget(
  store: DocumentStore,
  runId: string,
  ceilingUsd: number = config.costCeilingUsd
): Promise<number> {
  const spent = await store.getRunCost(runId);
  if (spent >= ceilingUsd) {
    throw new CostCeilingExceeded(runId, spent, ceilingUsd);
  }
  return spent;
}

export interface RunBatchOptions {
  runId: string;
  ceilingUsd?: number;
  concurrency?: number;
}

export interface BatchReport {
  runId: string;
  outcomes: ProcessOutcome[];
  errors: Array<{ registry_key: string; error: string }>;
  notStarted: string[];
  halted: 'cost_ceiling' | null;
  backup: string | null;
  runCost: number;
}

export async function runBatch(plan: BatchPlan, deps: PipelineDeps, options: RunBatchOptions): Promise<BatchReport> {
  const { store } = deps;
  const ceiling = options.ceilingUsd ?? config.costCeilingUsd;
  const report: BatchReport = {
    runId: options.runId,
    outcomes: [],
    errors: [],
    notStarted: [],
    halted: null,
    backup: null,
    runCost: 0,
  };

  if (plan.dryRun) {
    report.notStarted = plan.entries.map((e) => e.registry_key);
    logger.info('Dry run, nothing processed', { run_id: options.runId, planned: plan.entries.length });
    return report;
  }

  report.backup = await backupBeforeForcedRun(store, plan, options.runId);

  const limit = pLimit(options.concurrency ?? config.engineConcurrency);
  await Promise.all(
    plan.entries.map((entry) =>
      limit(() =>
        runWithContextAsync(
          { correlationId: ulid(), runId: options.runId, registryKey: entry.registry_key },
          async () => {
            if (report.halted) {
              report.notStarted.push(entry.registry_key);
              return;
            }
            try {
              await assertWithinBudget(store, options.runId, ceiling);
            } catch (error) {
              if (!(error instanceof CostCeilingExceeded)) throw error;
              report.halted = 'cost_ceiling';
              report.notStarted.push(entry.registry_key);
              logger.warn('Cost ceiling reached, no further documents start', { ...error.details });
              return;
            }

            try {
              report.outcomes.push(await processDocument(entry, deps, { runId: options.runId, force: plan.force }));
            } catch (error) {
              // One document's failure never aborts the batch
              logger.error('Document failed', error, { registry_key: entry.registry_key });
              report.errors.push({
                registry_key: entry.registry_key,
                error: error instanceof Error ? error.message : String(error),
              });
            }
          }
        )
      )
    )
  );

  report.runCost = await store.getRunCost(options.runId);
  logger.info('Batch complete', {
    run_id: options.runId,
    committed: report.outcomes.filter((o) => o.status === 'committed').length,
    skipped: report.outcomes.filter((o) => o.status === 'skipped').length,
    regressions: report.outcomes.filter((o) => o.status === 'regression').length,
    duplicates: report.outcomes.filter((o) => o.status === 'duplicate').length,
    failed: report.outcomes.filter((o) => o.status === 'failed').length,
    errors: report.errors.length,
    not_started: report.notStarted.length,
    halted: report.halted,
    run_cost: report.runCost,
  });
  return report;
}
