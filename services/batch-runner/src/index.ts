/**
 * Batch Runner
 *
 * Plans a run over the registry and enqueues one process_document job per
 * planned entry. Resume skips extracted records, a forced run snapshots the
 * corpus first, and a dry run only reports the plan.
 *
 *   REGISTRY_FILE   crawler hand-off (JSON array or JSON lines) imported first
 *   BATCH_LIMIT     max entries in the run
 */

import fs from 'fs';
import { ulid } from 'ulid';
import {
  logger,
  backupBeforeForcedRun,
  batchOptionsFromConfig,
  createQueue,
  planFromStore,
  validateRegistryEntry,
  PgDocumentStore,
  QUEUE_NAMES,
  type ProcessDocumentJob,
  type ProcessOutcome,
  type RegistryEntry,
} from '@advice-corpus/shared';

function parseRegistryFile(filePath: string): RegistryEntry[] {
  const content = fs.readFileSync(filePath, 'utf-8').trim();
  let raw: unknown[];
  if (content.startsWith('[')) {
    const parsed: unknown = JSON.parse(content);
    if (!Array.isArray(parsed)) {
      throw new Error(`Registry file ${filePath} is not a JSON array`);
    }
    raw = parsed;
  } else {
    raw = content
      .split(/\r?\n/)
      .filter((line) => line.trim().length > 0)
      .map((line): unknown => JSON.parse(line));
  }

  const entries: RegistryEntry[] = [];
  raw.forEach((item, index) => {
    const validation = validateRegistryEntry(item);
    if (validation.valid) {
      entries.push(validation.value);
    } else {
      logger.warn('Skipping invalid registry entry', { index, errors: validation.errors });
    }
  });
  return entries;
}

/** BullMQ reserves ':' in job ids */
function jobIdFor(runId: string, registryKey: string): string {
  return `${runId}-${registryKey.replace(/:/g, '_')}`;
}

async function main(): Promise<void> {
  const runId = ulid();
  const store = new PgDocumentStore();
  const queue = createQueue<ProcessDocumentJob, ProcessOutcome>(QUEUE_NAMES.PROCESS_DOCUMENT);

  try {
    const registryFile = process.env.REGISTRY_FILE;
    if (registryFile) {
      const imported = await store.importRegistry(parseRegistryFile(registryFile));
      logger.info('Registry imported', { file: registryFile, entries: imported });
    }

    const limit = parseInt(process.env.BATCH_LIMIT || '0', 10);
    const options = batchOptionsFromConfig({ limit });
    const plan = await planFromStore(store, options);

    if (plan.dryRun) {
      logger.info('Dry run plan', {
        run_id: runId,
        planned: plan.entries.map((e) => e.registry_key),
        skipped: plan.skipped,
        by_type: plan.byType,
      });
      return;
    }

    await backupBeforeForcedRun(store, plan, runId);

    // A previous run may have paused the queue on its cost ceiling
    if (await queue.isPaused()) {
      await queue.resume();
    }

    await queue.addBulk(
      plan.entries.map((entry) => ({
        name: QUEUE_NAMES.PROCESS_DOCUMENT,
        data: {
          correlation_id: ulid(),
          run_id: runId,
          registry_key: entry.registry_key,
          force: plan.force,
        },
        opts: { jobId: jobIdFor(runId, entry.registry_key) },
      }))
    );

    logger.info('Run enqueued', {
      run_id: runId,
      jobs: plan.entries.length,
      skipped: plan.skipped.length,
      force: plan.force,
    });
  } finally {
    await queue.close();
    await store.close();
  }
}

main()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    logger.error('Batch runner failed', error);
    process.exit(1);
  });
