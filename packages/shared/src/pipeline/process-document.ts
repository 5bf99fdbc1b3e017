/**
 * Per-document pipeline
 *
 * extraction -> fidelity routing (inside the orchestrator) -> identity ->
 * sections + citations -> classification -> record. The record is validated
 * and committed in one write; nothing is persisted before that point, so an
 * interrupted document leaves its previous state untouched.
 */

import type {
  CitationSet,
  DocumentRecord,
  ExtractionRecord,
  RegistryEntry,
  SectionResult,
} from '../types';
import type { DocumentStore } from '../store/types';
import { logger } from '../logger';
import { setContextDocumentId } from '../context';
import { DuplicateDocumentId, ExtractionFailure, InvalidRecord, QualityRegression } from '../errors';
import { documentsProcessedCounter, qualityRegressionsCounter, runCostGauge } from '../metrics';
import { validateDocumentRecord } from '../schemas';
import { ExtractionOrchestrator } from '../extraction/orchestrator';
import { hashedPlaceholderId, resolveDocumentId } from '../extraction/identifier';
import { parseSections } from '../sections/parser';
import { emptyCitationSet, extractCitations } from '../citations/extractor';
import { filterCoRecipients, filterSelfCitations } from '../citations/self-citation';
import { classify } from '../classification/classifier';
import { buildEmbeddingContent, determineDocumentType, parseLetterDate, parseRequestor } from '../metadata/parse';
import {
  mergeSyntheticSections,
  needsSyntheticFallback,
  withoutSynthetic,
  type MergedSections,
  type SyntheticSectionGenerator,
} from './synthetic';

export interface PipelineDeps {
  store: DocumentStore;
  orchestrator: ExtractionOrchestrator;
  synthetic?: SyntheticSectionGenerator;
}

export interface ProcessOptions {
  runId: string;
  force?: boolean;
}

export type ProcessStatus = 'committed' | 'skipped' | 'regression' | 'duplicate' | 'failed';

export interface ProcessOutcome {
  status: ProcessStatus;
  registryKey: string;
  documentId: string | null;
  qualityScore: number | null;
  /** Engine and generator spend for this document */
  cost: number;
  runCost: number;
}

export interface StructuredFields {
  sections: MergedSections;
  citations: CitationSet & { notes: string[] };
  syntheticCost: number;
}

function emptySections(note: string): SectionResult {
  return {
    question: null,
    conclusion: null,
    facts: null,
    analysis: null,
    extraction_method: 'none',
    extraction_confidence: 0,
    has_standard_format: false,
    parsing_notes: note,
  };
}

async function structure(
  documentId: string,
  text: string,
  year: number | null,
  previousCitedBy: string[],
  synthetic: SyntheticSectionGenerator | undefined
): Promise<StructuredFields> {
  const parsed = parseSections(text, year);
  let sections = withoutSynthetic(parsed);
  let syntheticCost = 0;

  if (synthetic && needsSyntheticFallback(parsed)) {
    try {
      const result = await synthetic.generate({ documentId, text, sections: parsed });
      sections = mergeSyntheticSections(parsed, result);
      syntheticCost = result.cost ?? 0;
    } catch (error) {
      // The generator is optional; the regex result stands on its own
      logger.warn('Synthetic section generation failed', {
        document_id: documentId,
        error: error instanceof Error ? error.message : String(error),
      });
      const note = `Synthetic fallback failed: ${error instanceof Error ? error.message : String(error)}`;
      sections = { ...sections, parsing_notes: sections.parsing_notes ? `${sections.parsing_notes}; ${note}` : note };
    }
  }

  const notes: string[] = [];
  const extracted = extractCitations(text);
  const withoutSelf = filterSelfCitations(extracted, documentId);
  const selfRemoved = extracted.prior_decision.length - withoutSelf.prior_decision.length;
  if (selfRemoved > 0) notes.push(`Removed ${selfRemoved} self-citation(s)`);

  const coRecipients = filterCoRecipients(withoutSelf, documentId, text);
  if (coRecipients.removed.length > 0) {
    notes.push(`Removed co-recipient file numbers: ${coRecipients.removed.join(', ')}`);
  }

  return {
    sections,
    citations: { ...coRecipients.citations, cited_by: previousCitedBy, notes },
    syntheticCost,
  };
}

export function buildDocumentRecord(
  entry: RegistryEntry,
  identity: { id: string; source: DocumentRecord['id_source'] },
  extraction: ExtractionRecord,
  fields: StructuredFields,
  idNotes: string[]
): DocumentRecord {
  const current = extraction.current;
  const text = current?.text ?? '';
  const now = new Date().toISOString();
  const letterDate = parseLetterDate(text, entry.metadata.letterDate ?? null);
  const requestor = parseRequestor(text, entry.metadata);
  const { sections } = fields;

  return {
    schema_version: '1.0',
    id: identity.id,
    id_source: identity.source,
    registry_key: entry.registry_key,
    year: entry.year,
    source_reference: entry.source_reference,
    extraction: {
      status: extraction.status,
      method: current?.method ?? null,
      pass: current?.pass ?? null,
      page_count: current?.page_count ?? extraction.page_count,
      word_count: current?.word_count ?? 0,
      char_count: text.length,
      quality_score: current?.quality_score ?? 0,
      cost: extraction.total_cost,
      attempt_count: extraction.attempts.length,
      escalation_reasons: [...extraction.escalation_reasons],
      notes: [...extraction.notes, ...idNotes],
      extracted_at: now,
    },
    fidelity: extraction.fidelity
      ? {
          risk_tier: extraction.fidelity.risk_tier,
          canary_score: extraction.fidelity.canary_score,
          method: extraction.fidelity.method,
          description_mode: extraction.fidelity.description_mode,
          notes: [...extraction.fidelity.notes],
        }
      : null,
    content: { full_text: text },
    parsed: {
      date: letterDate.date,
      date_raw: letterDate.raw,
      requestor_name: requestor.name,
      requestor_title: requestor.title,
      requestor_city: requestor.city,
      document_type: determineDocumentType(text, identity.id),
    },
    sections: {
      question: sections.question,
      conclusion: sections.conclusion,
      facts: sections.facts,
      analysis: sections.analysis,
      question_synthetic: sections.question_synthetic,
      conclusion_synthetic: sections.conclusion_synthetic,
      extraction_method: sections.extraction_method,
      extraction_confidence: sections.extraction_confidence,
      has_standard_format: sections.has_standard_format,
      parsing_notes: sections.parsing_notes,
    },
    citations: fields.citations,
    classification: classify(fields.citations),
    embedding: buildEmbeddingContent(text, sections, sections),
    processed_at: now,
  };
}

function outcome(
  status: ProcessStatus,
  entry: RegistryEntry,
  documentId: string | null,
  qualityScore: number | null,
  cost: number,
  runCost: number
): ProcessOutcome {
  return { status, registryKey: entry.registry_key, documentId, qualityScore, cost, runCost };
}

/**
 * Run one registry entry through the pipeline and commit the result.
 *
 * Without `force` an entry whose record is already extracted is skipped. With
 * `force`, a candidate scoring below the stored record is discarded
 * (QualityRegression): the stored record stays and the new attempts are kept
 * for audit. The store repeats that comparison when it writes, so a better
 * record committed concurrently is not overwritten.
 *
 * An identifier held by another entry is never overwritten. A colliding
 * placeholder falls back to the hashed form; any other collision leaves the
 * document unstored with status `duplicate`.
 */
export async function processDocument(
  entry: RegistryEntry,
  deps: PipelineDeps,
  options: ProcessOptions
): Promise<ProcessOutcome> {
  const { store, orchestrator, synthetic } = deps;
  const existing = await store.getRecordByRegistryKey(entry.registry_key);

  if (existing && existing.extraction.status === 'extracted' && !options.force) {
    logger.info('Already extracted, skipping', { registry_key: entry.registry_key, document_id: existing.id });
    return outcome('skipped', entry, existing.id, existing.extraction.quality_score, 0, await store.getRunCost(options.runId));
  }

  const extraction = await orchestrator.extract(entry);
  let runCost = await store.addRunCost(options.runId, extraction.total_cost);
  runCostGauge.set({ run_id: options.runId }, runCost);

  const candidateScore = extraction.current?.quality_score ?? 0;
  if (existing && existing.extraction.status === 'extracted' && candidateScore < existing.extraction.quality_score) {
    const regression = new QualityRegression(existing.id, existing.extraction.quality_score, candidateScore);
    qualityRegressionsCounter.inc();
    logger.warn('Candidate below stored record, keeping current', {
      code: regression.code,
      ...regression.details,
    });
    await store.appendAttempts(entry.registry_key, extraction.attempts);
    documentsProcessedCounter.inc({ status: 'regression', method: extraction.current?.method ?? 'none' });
    return outcome('regression', entry, existing.id, existing.extraction.quality_score, extraction.total_cost, runCost);
  }

  const text = extraction.current?.text ?? '';
  const identity = resolveDocumentId(entry, text, existing);
  setContextDocumentId(identity.id);

  let fields: StructuredFields;
  if (extraction.current) {
    fields = await structure(identity.id, text, entry.year, existing?.citations.cited_by ?? [], synthetic);
    if (fields.syntheticCost > 0) {
      runCost = await store.addRunCost(options.runId, fields.syntheticCost);
      runCostGauge.set({ run_id: options.runId }, runCost);
    }
  } else {
    fields = {
      sections: withoutSynthetic(emptySections('No trusted text')),
      citations: { ...emptyCitationSet(), cited_by: existing?.citations.cited_by ?? [], notes: [] },
      syntheticCost: 0,
    };
  }

  const record = buildDocumentRecord(entry, identity, extraction, fields, identity.notes);
  const validation = validateDocumentRecord(record);
  if (!validation.valid) {
    throw new InvalidRecord(identity.id, validation.errors);
  }

  let committed = record;
  let commit = await store.commitRecord(committed, extraction.attempts);
  const fallback = hashedPlaceholderId(entry.registry_key, entry.year);
  if (commit.status === 'duplicate_id' && identity.source === 'placeholder' && identity.id !== fallback) {
    const note = `Placeholder ${identity.id} already held by ${commit.heldBy ?? 'another entry'}; stored as ${fallback}`;
    logger.warn('Placeholder collision, using hashed placeholder', {
      registry_key: entry.registry_key,
      placeholder: identity.id,
      held_by: commit.heldBy,
      fallback,
    });
    committed = buildDocumentRecord(entry, { id: fallback, source: 'placeholder' }, extraction, fields, [
      ...identity.notes,
      note,
    ]);
    commit = await store.commitRecord(committed, extraction.attempts);
  }

  if (commit.status === 'duplicate_id') {
    const duplicate = new DuplicateDocumentId(committed.id, entry.registry_key, commit.heldBy);
    logger.warn('Identifier held by another entry, record not stored', {
      code: duplicate.code,
      ...duplicate.details,
    });
    documentsProcessedCounter.inc({ status: 'duplicate', method: committed.extraction.method ?? 'none' });
    return outcome('duplicate', entry, null, null, extraction.total_cost + fields.syntheticCost, runCost);
  }

  if (commit.status === 'regression') {
    // A concurrent run committed a better record after the check above
    const regression = new QualityRegression(committed.id, commit.storedQuality, committed.extraction.quality_score);
    qualityRegressionsCounter.inc();
    logger.warn('Stored record outscored candidate at commit, keeping current', {
      code: regression.code,
      ...regression.details,
    });
    documentsProcessedCounter.inc({ status: 'regression', method: committed.extraction.method ?? 'none' });
    return outcome(
      'regression',
      entry,
      committed.id,
      commit.storedQuality,
      extraction.total_cost + fields.syntheticCost,
      runCost
    );
  }

  const status: ProcessStatus = extraction.current ? 'committed' : 'failed';
  if (!extraction.current) {
    // Recorded, not thrown: the batch carries on and a later run retries
    const failure = new ExtractionFailure(entry.registry_key, { notes: committed.extraction.notes });
    logger.warn('No usable text, failed record committed', { code: failure.code, ...failure.details });
  }
  documentsProcessedCounter.inc({ status, method: committed.extraction.method ?? 'none' });
  logger.info('Document committed', {
    document_id: committed.id,
    id_source: committed.id_source,
    status: committed.extraction.status,
    method: committed.extraction.method,
    quality_score: committed.extraction.quality_score,
    risk_tier: committed.fidelity?.risk_tier ?? null,
    section_method: committed.sections.extraction_method,
    topic: committed.classification.topic,
    prior_decisions: committed.citations.prior_decision.length,
  });

  return outcome(
    status,
    entry,
    committed.id,
    committed.extraction.quality_score,
    extraction.total_cost + fields.syntheticCost,
    runCost
  );
}
