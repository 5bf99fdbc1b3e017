/**
 * Document Store Contract
 *
 * Narrow read/write surface the pipeline needs from the corpus database.
 * Every write that changes a document's current state is a single
 * transaction, so an interrupted run never leaves a partial record.
 */

import type { DocumentRecord, ExtractionAttempt, KnownGap, RegistryEntry, RiskTier, Topic } from '../types';

export interface RecordFilter {
  topic?: Topic;
  tier?: RiskTier;
  year?: number;
  limit?: number;
}

export interface CitationGraphWrite {
  /** cited_by for every document, empty lists included */
  citedBy: ReadonlyMap<string, readonly string[]>;
  /** prior_decision lists after the self-citation filter, by registry key */
  forward: ReadonlyMap<string, readonly string[]>;
  knownGaps: readonly KnownGap[];
}

/**
 * What a commit did. The store re-checks the no-regression rule and id
 * uniqueness at write time, so a concurrent writer that read older state
 * cannot overwrite a better record.
 */
export type CommitResult =
  | { status: 'written' }
  /** An extracted record with a higher quality score is stored */
  | { status: 'regression'; storedQuality: number }
  /** Another registry entry holds the id; null when the holder is not known */
  | { status: 'duplicate_id'; heldBy: string | null };

export interface DocumentStore {
  getRegistryEntry(registryKey: string): Promise<RegistryEntry | null>;
  listRegistry(): Promise<RegistryEntry[]>;
  /** Upsert entries handed over by the crawler; returns the count written */
  importRegistry(entries: readonly RegistryEntry[]): Promise<number>;

  getRecord(documentId: string): Promise<DocumentRecord | null>;
  getRecordByRegistryKey(registryKey: string): Promise<DocumentRecord | null>;
  listRecords(filter?: RecordFilter): Promise<DocumentRecord[]>;

  /**
   * Write the record and its attempts atomically, unless an extracted record
   * for the same registry key scores higher or the id belongs to another
   * entry. Attempts are kept either way. A record stored under a different id
   * for the same registry key (an upgraded placeholder) is replaced.
   */
  commitRecord(record: DocumentRecord, attempts: readonly ExtractionAttempt[]): Promise<CommitResult>;
  /** Audit trail only; the current record is untouched */
  appendAttempts(registryKey: string, attempts: readonly ExtractionAttempt[]): Promise<void>;
  listAttempts(registryKey: string): Promise<ExtractionAttempt[]>;

  /** Graph pass output, written in one transaction. Forward lists are keyed by registry key */
  writeCitationGraph(graph: CitationGraphWrite): Promise<void>;
  listKnownGaps(): Promise<KnownGap[]>;

  /** Snapshot of every current record before an in-place overwrite run */
  backupCorpus(label: string): Promise<string>;

  /** Returns the run's new total */
  addRunCost(runId: string, usd: number): Promise<number>;
  getRunCost(runId: string): Promise<number>;
}
