/**
 * Pipeline Worker
 *
 * Consumes process_document jobs: one registry entry per job through
 * extraction, verification, structuring and commit. Concurrency and the
 * limiter follow the external engines' limits, not CPU count.
 */

import { Job, UnrecoverableError } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createQueue,
  createWorker,
  serveMetrics,
  reportQueueMetrics,
  assertWithinBudget,
  processDocument,
  CostCeilingExceeded,
  ExtractionOrchestrator,
  PgDocumentStore,
  QUEUE_NAMES,
  jobsProcessedCounter,
  jobDurationHistogram,
  type ProcessDocumentJob,
  type ProcessOutcome,
} from '@advice-corpus/shared';
import { registerEngines } from './lib/engines';
import { OpenAiSyntheticGenerator } from './lib/synthetic';

const store = new PgDocumentStore();
const { registry, ocr } = registerEngines();
const orchestrator = new ExtractionOrchestrator(registry);
const synthetic = config.openaiApiKey ? new OpenAiSyntheticGenerator() : undefined;
const queue = createQueue<ProcessDocumentJob, ProcessOutcome>(QUEUE_NAMES.PROCESS_DOCUMENT);

/**
 * Process process_document job
 */
async function processDocumentJob(job: Job<ProcessDocumentJob, ProcessOutcome>): Promise<ProcessOutcome> {
  const { correlation_id, run_id, registry_key, force } = job.data;

  return runWithContextAsync(
    { correlationId: correlation_id, runId: run_id, registryKey: registry_key },
    async () => {
      const startTime = Date.now();

      logger.info('Processing process_document', {
        jobId: job.id,
        attempt: job.attemptsMade + 1,
        force,
      });

      try {
        await assertWithinBudget(store, run_id);
      } catch (error) {
        if (error instanceof CostCeilingExceeded) {
          // Stop the run: nothing else starts, committed documents stay as written
          await queue.pause();
          logger.warn('Cost ceiling reached, queue paused', { ...error.details });
          throw new UnrecoverableError(error.message);
        }
        throw error;
      }

      const entry = await store.getRegistryEntry(registry_key);
      if (!entry) {
        throw new UnrecoverableError(`Unknown registry key: ${registry_key}`);
      }

      try {
        const outcome = await processDocument(entry, { store, orchestrator, synthetic }, { runId: run_id, force });

        const duration = (Date.now() - startTime) / 1000;
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PROCESS_DOCUMENT, status: outcome.status });
        jobDurationHistogram.observe({ queue: QUEUE_NAMES.PROCESS_DOCUMENT, status: outcome.status }, duration);

        logger.info('process_document complete', {
          status: outcome.status,
          document_id: outcome.documentId,
          cost: outcome.cost,
          run_cost: outcome.runCost,
          duration_seconds: duration,
        });
        return outcome;
      } catch (error) {
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PROCESS_DOCUMENT, status: 'error' });
        throw error;
      }
    }
  );
}

// Expose /metrics for Prometheus
serveMetrics(config.metricsPort, () => reportQueueMetrics([{ name: QUEUE_NAMES.PROCESS_DOCUMENT, queue }]));

const worker = createWorker<ProcessDocumentJob, ProcessOutcome>(QUEUE_NAMES.PROCESS_DOCUMENT, processDocumentJob, {
  concurrency: config.engineConcurrency,
  limiter: { max: config.engineConcurrency, duration: 1000 },
});

logger.info('Pipeline worker started', { engines: registry.roles() });

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await queue.close();
  await ocr.terminate();
  await store.close();
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
