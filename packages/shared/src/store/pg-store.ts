/**
 * PostgreSQL DocumentStore
 *
 * Records are stored whole as JSONB beside the columns the read API filters
 * on. Each commit, the graph write and each backup run in their own
 * transaction.
 */

import { Pool, type PoolClient } from 'pg';
import type { DocumentRecord, ExtractionAttempt, KnownGap, RegistryEntry } from '../types';
import type { CitationGraphWrite, CommitResult, DocumentStore, RecordFilter } from './types';
import { config } from '../config';
import { logger } from '../logger';
import { dbQueryDurationHistogram } from '../metrics';

interface RegistryRow {
  registry_key: string;
  letter_id: string | null;
  year: number | null;
  source_reference: string;
  source: RegistryEntry['source'];
  metadata: RegistryEntry['metadata'];
}

interface RecordRow {
  record: DocumentRecord;
}

interface AttemptRow {
  attempt: ExtractionAttempt;
}

interface HolderRow {
  registry_key: string;
}

interface QualityRow {
  quality_score: number;
}

interface GapRow {
  identifier: string;
  cited_by_count: number;
  example_citing: string[];
}

function toEntry(row: RegistryRow): RegistryEntry {
  return {
    registry_key: row.registry_key,
    letter_id: row.letter_id,
    year: row.year,
    source_reference: row.source_reference,
    source: row.source,
    metadata: row.metadata,
  };
}

/** unique_violation, raised when two writers race for the same document id */
function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}

export function createPool(): Pool {
  return new Pool({
    connectionString: process.env.DATABASE_URL || config.databaseUrl,
    max: 20,
    idleTimeoutMillis: 30000,
  });
}

export class PgDocumentStore implements DocumentStore {
  constructor(private readonly pool: Pool = createPool()) {}

  private async timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    try {
      return await fn();
    } finally {
      dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
    }
  }

  private async transaction<T>(operation: string, fn: (client: PoolClient) => Promise<T>): Promise<T> {
    return this.timed(operation, async () => {
      const client = await this.pool.connect();
      try {
        await client.query('BEGIN');
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await client.query('ROLLBACK');
        logger.error('Transaction rolled back', error, { operation });
        throw error;
      } finally {
        client.release();
      }
    });
  }

  async getRegistryEntry(registryKey: string): Promise<RegistryEntry | null> {
    const result = await this.timed('get_registry_entry', () =>
      this.pool.query<RegistryRow>(
        `SELECT registry_key, letter_id, year, source_reference, source, metadata
         FROM registry WHERE registry_key = $1`,
        [registryKey]
      )
    );
    return result.rows[0] ? toEntry(result.rows[0]) : null;
  }

  async listRegistry(): Promise<RegistryEntry[]> {
    const result = await this.timed('list_registry', () =>
      this.pool.query<RegistryRow>(
        `SELECT registry_key, letter_id, year, source_reference, source, metadata
         FROM registry ORDER BY registry_key`
      )
    );
    return result.rows.map(toEntry);
  }

  async importRegistry(entries: readonly RegistryEntry[]): Promise<number> {
    return this.transaction('import_registry', async (client) => {
      for (const entry of entries) {
        await client.query(
          `INSERT INTO registry (registry_key, letter_id, year, source_reference, source, metadata)
           VALUES ($1, $2, $3, $4, $5, $6)
           ON CONFLICT (registry_key) DO UPDATE SET
             letter_id = EXCLUDED.letter_id,
             year = EXCLUDED.year,
             source_reference = EXCLUDED.source_reference,
             source = EXCLUDED.source,
             metadata = EXCLUDED.metadata`,
          [
            entry.registry_key,
            entry.letter_id,
            entry.year,
            entry.source_reference,
            JSON.stringify(entry.source),
            JSON.stringify(entry.metadata),
          ]
        );
      }
      return entries.length;
    });
  }

  async getRecord(documentId: string): Promise<DocumentRecord | null> {
    const result = await this.timed('get_record', () =>
      this.pool.query<RecordRow>('SELECT record FROM documents WHERE id = $1', [documentId])
    );
    return result.rows[0]?.record ?? null;
  }

  async getRecordByRegistryKey(registryKey: string): Promise<DocumentRecord | null> {
    const result = await this.timed('get_record', () =>
      this.pool.query<RecordRow>('SELECT record FROM documents WHERE registry_key = $1', [registryKey])
    );
    return result.rows[0]?.record ?? null;
  }

  async listRecords(filter: RecordFilter = {}): Promise<DocumentRecord[]> {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (filter.topic !== undefined) {
      params.push(filter.topic);
      conditions.push(`topic = $${params.length}`);
    }
    if (filter.tier !== undefined) {
      params.push(filter.tier);
      conditions.push(`risk_tier = $${params.length}`);
    }
    if (filter.year !== undefined) {
      params.push(filter.year);
      conditions.push(`year = $${params.length}`);
    }

    let sql = 'SELECT record FROM documents';
    if (conditions.length > 0) sql += ` WHERE ${conditions.join(' AND ')}`;
    sql += ' ORDER BY id';
    if (filter.limit !== undefined) {
      params.push(filter.limit);
      sql += ` LIMIT $${params.length}`;
    }

    const result = await this.timed('list_records', () => this.pool.query<RecordRow>(sql, params));
    return result.rows.map((r) => r.record);
  }

  async commitRecord(record: DocumentRecord, attempts: readonly ExtractionAttempt[]): Promise<CommitResult> {
    let result: CommitResult;
    try {
      result = await this.transaction('commit_record', async (client): Promise<CommitResult> => {
        const holder = await client.query<HolderRow>(
          'SELECT registry_key FROM documents WHERE id = $1 AND registry_key <> $2',
          [record.id, record.registry_key]
        );
        await this.insertAttempts(client, record.registry_key, attempts);
        if (holder.rows[0]) {
          return { status: 'duplicate_id', heldBy: holder.rows[0].registry_key };
        }

        // The conflict row is locked, so concurrent commits for one entry
        // apply in turn and each sees the score the previous one left
        const written = await client.query(
          `INSERT INTO documents (registry_key, id, year, status, quality_score, risk_tier, topic, record, updated_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, now())
           ON CONFLICT (registry_key) DO UPDATE SET
             id = EXCLUDED.id,
             year = EXCLUDED.year,
             status = EXCLUDED.status,
             quality_score = EXCLUDED.quality_score,
             risk_tier = EXCLUDED.risk_tier,
             topic = EXCLUDED.topic,
             record = EXCLUDED.record,
             updated_at = now()
           WHERE documents.status <> 'extracted' OR documents.quality_score <= EXCLUDED.quality_score
           RETURNING registry_key`,
          [
            record.registry_key,
            record.id,
            record.year,
            record.extraction.status,
            record.extraction.quality_score,
            record.fidelity?.risk_tier ?? null,
            record.classification.topic,
            JSON.stringify(record),
          ]
        );

        if ((written.rowCount ?? 0) === 0) {
          const stored = await client.query<QualityRow>(
            'SELECT quality_score FROM documents WHERE registry_key = $1',
            [record.registry_key]
          );
          return { status: 'regression', storedQuality: stored.rows[0]?.quality_score ?? 0 };
        }
        return { status: 'written' };
      });
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
      // Lost a race for the id; the attempts rolled back with the row
      await this.appendAttempts(record.registry_key, attempts);
      result = { status: 'duplicate_id', heldBy: null };
    }

    logger.debug('Record commit finished', {
      document_id: record.id,
      status: result.status,
      attempts: attempts.length,
    });
    return result;
  }

  async appendAttempts(registryKey: string, attempts: readonly ExtractionAttempt[]): Promise<void> {
    await this.transaction('append_attempts', (client) => this.insertAttempts(client, registryKey, attempts));
  }

  private async insertAttempts(
    client: PoolClient,
    registryKey: string,
    attempts: readonly ExtractionAttempt[]
  ): Promise<void> {
    for (const attempt of attempts) {
      await client.query(
        `INSERT INTO extraction_attempts
           (attempt_id, registry_key, method, pass, word_count, quality_score, cost, attempt, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         ON CONFLICT (attempt_id) DO NOTHING`,
        [
          attempt.attempt_id,
          registryKey,
          attempt.method,
          attempt.pass,
          attempt.word_count,
          attempt.quality_score,
          attempt.cost,
          JSON.stringify(attempt),
          attempt.created_at,
        ]
      );
    }
  }

  async listAttempts(registryKey: string): Promise<ExtractionAttempt[]> {
    const result = await this.timed('list_attempts', () =>
      this.pool.query<AttemptRow>(
        'SELECT attempt FROM extraction_attempts WHERE registry_key = $1 ORDER BY created_at, attempt_id',
        [registryKey]
      )
    );
    return result.rows.map((r) => r.attempt);
  }

  async writeCitationGraph(graph: CitationGraphWrite): Promise<void> {
    await this.transaction('write_citation_graph', async (client) => {
      // Serialize graph passes; a second writer waits for the first to finish
      await client.query(`SELECT pg_advisory_xact_lock(hashtext('citation_graph'))`);

      for (const [id, citedBy] of graph.citedBy) {
        await client.query(
          `UPDATE documents SET
             record = jsonb_set(record, '{citations,cited_by}', $2::jsonb),
             updated_at = now()
           WHERE id = $1`,
          [id, JSON.stringify(citedBy)]
        );
      }
      for (const [registryKey, forward] of graph.forward) {
        await client.query(
          `UPDATE documents SET
             record = jsonb_set(record, '{citations,prior_decision}', $2::jsonb),
             updated_at = now()
           WHERE registry_key = $1`,
          [registryKey, JSON.stringify(forward)]
        );
      }

      await client.query('DELETE FROM known_gaps');
      for (const gap of graph.knownGaps) {
        await client.query(
          `INSERT INTO known_gaps (identifier, cited_by_count, example_citing, updated_at)
           VALUES ($1, $2, $3, now())`,
          [gap.identifier, gap.cited_by_count, gap.example_citing]
        );
      }
    });
  }

  async listKnownGaps(): Promise<KnownGap[]> {
    const result = await this.timed('list_known_gaps', () =>
      this.pool.query<GapRow>(
        'SELECT identifier, cited_by_count, example_citing FROM known_gaps ORDER BY cited_by_count DESC, identifier'
      )
    );
    return result.rows.map((r) => ({
      identifier: r.identifier,
      cited_by_count: r.cited_by_count,
      example_citing: r.example_citing,
    }));
  }

  async backupCorpus(label: string): Promise<string> {
    const name = `${label}-${new Date().toISOString()}`;
    const copied = await this.transaction('backup_corpus', async (client) => {
      const result = await client.query(
        `INSERT INTO corpus_backups (backup_name, registry_key, record)
         SELECT $1, registry_key, record FROM documents`,
        [name]
      );
      return result.rowCount ?? 0;
    });
    logger.info('Corpus backup written', { backup: name, records: copied });
    return name;
  }

  async addRunCost(runId: string, usd: number): Promise<number> {
    const result = await this.timed('add_run_cost', () =>
      this.pool.query<{ cost_usd: number }>(
        `INSERT INTO run_costs (run_id, cost_usd, updated_at) VALUES ($1, $2, now())
         ON CONFLICT (run_id) DO UPDATE SET cost_usd = run_costs.cost_usd + EXCLUDED.cost_usd, updated_at = now()
         RETURNING cost_usd`,
        [runId, usd]
      )
    );
    return result.rows[0]?.cost_usd ?? usd;
  }

  async getRunCost(runId: string): Promise<number> {
    const result = await this.timed('get_run_cost', () =>
      this.pool.query<{ cost_usd: number }>('SELECT cost_usd FROM run_costs WHERE run_id = $1', [runId])
    );
    return result.rows[0]?.cost_usd ?? 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
