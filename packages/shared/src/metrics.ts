/**
 * Prometheus Metrics
 *
 * Metrics for queue depth, per-document processing, engine calls, fidelity
 * routing and the citation graph pass.
 */

import http from 'node:http';
import type { Queue } from 'bullmq';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { getQueueMetrics } from './queues';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'advice_corpus_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

export const queueMetricsGauge = new promClient.Gauge({
  name: 'advice_corpus_queue_metrics',
  help: 'Queue metrics by state',
  labelNames: ['queue', 'state'],
  registers: [register],
});

// ============================================================================
// Job Processing Metrics
// ============================================================================

export const jobDurationHistogram = new promClient.Histogram({
  name: 'advice_corpus_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [1, 5, 10, 30, 60, 120, 300, 600],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'advice_corpus_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'advice_corpus_documents_processed_total',
  help: 'Documents run through the pipeline, by outcome',
  labelNames: ['status', 'method'],
  registers: [register],
});

export const engineAttemptsCounter = new promClient.Counter({
  name: 'advice_corpus_engine_attempts_total',
  help: 'Extraction engine calls by method, pass and outcome',
  labelNames: ['method', 'pass', 'outcome'],
  registers: [register],
});

export const engineDurationHistogram = new promClient.Histogram({
  name: 'advice_corpus_engine_duration_seconds',
  help: 'Duration of extraction engine calls, retries included',
  labelNames: ['method', 'pass'],
  buckets: [0.5, 1, 2, 5, 10, 30, 60, 120, 300],
  registers: [register],
});

export const fidelityTierCounter = new promClient.Counter({
  name: 'advice_corpus_fidelity_tier_total',
  help: 'Fidelity assessments by risk tier and method',
  labelNames: ['tier', 'method'],
  registers: [register],
});

export const qualityRegressionsCounter = new promClient.Counter({
  name: 'advice_corpus_quality_regressions_total',
  help: 'Forced reruns discarded because the candidate scored below the stored record',
  registers: [register],
});

export const runCostGauge = new promClient.Gauge({
  name: 'advice_corpus_run_cost_usd',
  help: 'Accumulated engine spend for the active run',
  labelNames: ['run_id'],
  registers: [register],
});

export const graphEdgesGauge = new promClient.Gauge({
  name: 'advice_corpus_citation_edges',
  help: 'Prior-decision citation edges from the last graph pass',
  labelNames: ['state'],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'advice_corpus_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'advice_corpus_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

// ============================================================================
// Database Metrics
// ============================================================================

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'advice_corpus_db_query_duration_seconds',
  help: 'Duration of database queries',
  labelNames: ['operation'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

/**
 * Report queue depths and state metrics to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export async function reportQueueMetrics(queues: Array<{ name: string; queue: Queue }>): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const m = await getQueueMetrics(queue);
      queueDepthGauge.set({ queue: name }, m.waiting + m.active);
      queueMetricsGauge.set({ queue: name, state: 'waiting' }, m.waiting);
      queueMetricsGauge.set({ queue: name, state: 'active' }, m.active);
      queueMetricsGauge.set({ queue: name, state: 'completed' }, m.completed);
      queueMetricsGauge.set({ queue: name, state: 'failed' }, m.failed);
      queueMetricsGauge.set({ queue: name, state: 'delayed' }, m.delayed);
      queueMetricsGauge.set({ queue: name, state: 'paused' }, m.paused);
    } catch (err) {
      logger.warn('Queue metrics unavailable', {
        queue: name,
        error: err instanceof Error ? err.message : String(err),
      });
      queueDepthGauge.set({ queue: name }, -1);
    }
  }
}

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 * Uses Node built-in http - no express required.
 *
 * @param beforeScrape refreshes gauges that are sampled rather than pushed
 */
export function serveMetrics(port: number, beforeScrape?: () => Promise<void>): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      (beforeScrape ? beforeScrape() : Promise.resolve())
        .then(() => getMetrics())
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
        .catch((err: unknown) => {
          logger.error('Metrics scrape failed', err);
          res.statusCode = 500;
          res.end();
        });
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
