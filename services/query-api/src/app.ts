/**
 * Query API
 *
 * Read-only API over stored document records and the known-gaps ledger.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  type DocumentListResponse,
  type DocumentStore,
  type ErrorEnvelope,
  type RecordFilter,
  type RiskTier,
  type Topic,
} from '@advice-corpus/shared';

const TOPICS: readonly Topic[] = ['conflicts_of_interest', 'campaign_finance', 'lobbying', 'other'];
const TIERS: readonly RiskTier[] = ['verified', 'low', 'medium', 'high', 'critical'];
const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

function isTopic(value: string): value is Topic {
  return TOPICS.some((t) => t === value);
}

function isTier(value: string): value is RiskTier {
  return TIERS.some((t) => t === value);
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function correlationIdOf(res: Response): string {
  const value = res.getHeader('X-Correlation-Id');
  return typeof value === 'string' ? value : '';
}

function sendError(res: Response, status: number, code: ErrorEnvelope['error']['code'], message: string): void {
  const body: ErrorEnvelope = {
    error: { code, message, correlation_id: correlationIdOf(res) },
  };
  res.status(status).json(body);
}

export type FilterParse = { ok: true; filter: RecordFilter } | { ok: false; message: string };

export function parseRecordFilter(query: Request['query']): FilterParse {
  const filter: RecordFilter = {};

  const topic = queryString(query.topic);
  if (topic !== undefined) {
    if (!isTopic(topic)) return { ok: false, message: `topic must be one of ${TOPICS.join(', ')}` };
    filter.topic = topic;
  }

  const tier = queryString(query.tier);
  if (tier !== undefined) {
    if (!isTier(tier)) return { ok: false, message: `tier must be one of ${TIERS.join(', ')}` };
    filter.tier = tier;
  }

  const year = queryString(query.year);
  if (year !== undefined) {
    if (!/^\d{4}$/.test(year)) return { ok: false, message: 'year must be a four-digit year' };
    filter.year = parseInt(year, 10);
  }

  const limit = queryString(query.limit);
  const parsedLimit = limit === undefined ? DEFAULT_LIMIT : parseInt(limit, 10);
  if (!Number.isInteger(parsedLimit) || parsedLimit < 1) {
    return { ok: false, message: 'limit must be a positive integer' };
  }
  filter.limit = Math.min(parsedLimit, MAX_LIMIT);

  return { ok: true, filter };
}

export interface AppOptions {
  /** Liveness probe for the backing database */
  ping?: () => Promise<void>;
}

export function createApp(store: DocumentStore, options: AppOptions = {}): Express {
  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header ? header : ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? routePath : req.path;
      const labels = { method: req.method, path, status: res.statusCode.toString() };

      httpRequestDurationHistogram.observe(labels, duration);
      httpRequestsCounter.inc(labels);

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', async (_req: Request, res: Response) => {
    try {
      if (options.ping) await options.ping();
      res.json({
        status: 'healthy',
        service: 'query-api',
        database: 'connected',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'query-api',
        database: 'disconnected',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (_req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * GET /documents/:id
   * Returns the stored record for one document
   */
  app.get('/documents/:id', async (req: Request, res: Response) => {
    const { id } = req.params;
    try {
      const record = await store.getRecord(id);
      if (!record) {
        sendError(res, 404, 'not_found', `Document ${id} not found`);
        return;
      }
      res.json(record);
    } catch (error) {
      logger.error('Failed to get document', error, { document_id: id });
      sendError(res, 500, 'internal_error', 'Failed to retrieve document');
    }
  });

  /**
   * GET /documents?topic=&tier=&year=&limit=
   */
  app.get('/documents', async (req: Request, res: Response) => {
    const parsed = parseRecordFilter(req.query);
    if (!parsed.ok) {
      sendError(res, 400, 'invalid_request', parsed.message);
      return;
    }

    try {
      const items = await store.listRecords(parsed.filter);
      const response: DocumentListResponse = { items, count: items.length };
      res.json(response);
    } catch (error) {
      logger.error('Failed to list documents', error);
      sendError(res, 500, 'internal_error', 'Failed to list documents');
    }
  });

  /**
   * GET /known-gaps
   * Citation targets absent from the corpus, most cited first
   */
  app.get('/known-gaps', async (_req: Request, res: Response) => {
    try {
      res.json({ items: await store.listKnownGaps() });
    } catch (error) {
      logger.error('Failed to list known gaps', error);
      sendError(res, 500, 'internal_error', 'Failed to list known gaps');
    }
  });

  return app;
}
