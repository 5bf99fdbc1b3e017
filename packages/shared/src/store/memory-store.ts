/**
 * In-process DocumentStore
 *
 * Backs the tests and dry runs. Values are cloned on the way in and out so
 * callers cannot mutate stored state.
 */

import type { DocumentRecord, ExtractionAttempt, KnownGap, RegistryEntry } from '../types';
import type { CitationGraphWrite, CommitResult, DocumentStore, RecordFilter } from './types';

export class MemoryDocumentStore implements DocumentStore {
  private readonly registry = new Map<string, RegistryEntry>();
  private readonly records = new Map<string, DocumentRecord>();
  private readonly attempts = new Map<string, ExtractionAttempt[]>();
  private readonly runCosts = new Map<string, number>();
  private knownGaps: KnownGap[] = [];
  readonly backups = new Map<string, DocumentRecord[]>();

  constructor(entries: readonly RegistryEntry[] = []) {
    for (const entry of entries) this.addRegistryEntry(entry);
  }

  addRegistryEntry(entry: RegistryEntry): void {
    this.registry.set(entry.registry_key, structuredClone(entry));
  }

  async importRegistry(entries: readonly RegistryEntry[]): Promise<number> {
    for (const entry of entries) this.addRegistryEntry(entry);
    return entries.length;
  }

  async getRegistryEntry(registryKey: string): Promise<RegistryEntry | null> {
    const entry = this.registry.get(registryKey);
    return entry ? structuredClone(entry) : null;
  }

  async listRegistry(): Promise<RegistryEntry[]> {
    return Array.from(this.registry.values())
      .sort((a, b) => a.registry_key.localeCompare(b.registry_key))
      .map((e) => structuredClone(e));
  }

  async getRecord(documentId: string): Promise<DocumentRecord | null> {
    for (const record of this.records.values()) {
      if (record.id === documentId) return structuredClone(record);
    }
    return null;
  }

  async getRecordByRegistryKey(registryKey: string): Promise<DocumentRecord | null> {
    const record = this.records.get(registryKey);
    return record ? structuredClone(record) : null;
  }

  async listRecords(filter: RecordFilter = {}): Promise<DocumentRecord[]> {
    const matches = Array.from(this.records.values())
      .filter((r) => filter.topic === undefined || r.classification.topic === filter.topic)
      .filter((r) => filter.tier === undefined || r.fidelity?.risk_tier === filter.tier)
      .filter((r) => filter.year === undefined || r.year === filter.year)
      .sort((a, b) => a.id.localeCompare(b.id));
    const limited = filter.limit !== undefined ? matches.slice(0, filter.limit) : matches;
    return limited.map((r) => structuredClone(r));
  }

  async commitRecord(record: DocumentRecord, attempts: readonly ExtractionAttempt[]): Promise<CommitResult> {
    // Check and write with no await in between
    const result = this.compareAndSet(record);
    await this.appendAttempts(record.registry_key, attempts);
    return result;
  }

  private compareAndSet(record: DocumentRecord): CommitResult {
    for (const other of this.records.values()) {
      if (other.id === record.id && other.registry_key !== record.registry_key) {
        return { status: 'duplicate_id', heldBy: other.registry_key };
      }
    }

    const stored = this.records.get(record.registry_key);
    if (
      stored &&
      stored.extraction.status === 'extracted' &&
      stored.extraction.quality_score > record.extraction.quality_score
    ) {
      return { status: 'regression', storedQuality: stored.extraction.quality_score };
    }

    this.records.set(record.registry_key, structuredClone(record));
    return { status: 'written' };
  }

  async appendAttempts(registryKey: string, attempts: readonly ExtractionAttempt[]): Promise<void> {
    const existing = this.attempts.get(registryKey) ?? [];
    const known = new Set(existing.map((a) => a.attempt_id));
    for (const attempt of attempts) {
      if (!known.has(attempt.attempt_id)) existing.push(structuredClone(attempt));
    }
    this.attempts.set(registryKey, existing);
  }

  async listAttempts(registryKey: string): Promise<ExtractionAttempt[]> {
    return (this.attempts.get(registryKey) ?? []).map((a) => structuredClone(a));
  }

  async writeCitationGraph(graph: CitationGraphWrite): Promise<void> {
    for (const record of this.records.values()) {
      const citedBy = graph.citedBy.get(record.id);
      const forward = graph.forward.get(record.registry_key);
      if (citedBy) record.citations.cited_by = [...citedBy];
      if (forward) record.citations.prior_decision = [...forward];
    }
    this.knownGaps = graph.knownGaps.map((g) => structuredClone(g));
  }

  async listKnownGaps(): Promise<KnownGap[]> {
    return this.knownGaps.map((g) => structuredClone(g));
  }

  async backupCorpus(label: string): Promise<string> {
    const name = `${label}-${this.backups.size + 1}`;
    this.backups.set(
      name,
      Array.from(this.records.values()).map((r) => structuredClone(r))
    );
    return name;
  }

  async addRunCost(runId: string, usd: number): Promise<number> {
    const total = (this.runCosts.get(runId) ?? 0) + usd;
    this.runCosts.set(runId, total);
    return total;
  }

  async getRunCost(runId: string): Promise<number> {
    return this.runCosts.get(runId) ?? 0;
  }
}
