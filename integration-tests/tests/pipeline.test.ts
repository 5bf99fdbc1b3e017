/**
 * Per-document pipeline against the in-process store: commit, skip,
 * no-regression, identity upgrades and the synthetic section fallback.
 */

import {
  EngineRegistry,
  ExtractionOrchestrator,
  MemoryDocumentStore,
  processDocument,
  type EscalationSettings,
  type ExtractionAttempt,
  type PipelineDeps,
  type SyntheticSectionGenerator,
  type SyntheticSectionResult,
} from '@advice-corpus/shared';
import { FakeEngine, LETTER, makeAttempt, makeEntry } from './fixtures';

const NEVER: EscalationSettings = {
  yearThreshold: 0,
  qualityFloor: 0,
  minWordsPerPage: 0,
  minAlphaRatio: 0,
  maxGarbageWords: 100000,
};

const NO_HEADERS = [
  'June 12, 2003',
  '',
  'Dear Ms. Alvarez:',
  '',
  'You asked whether the council member may vote. The council member may not vote on the ordinance.',
].join('\n');

interface Harness {
  registry: EngineRegistry;
  store: MemoryDocumentStore;
  deps: PipelineDeps;
  useText(attempt: ExtractionAttempt): FakeEngine;
}

function harness(synthetic?: SyntheticSectionGenerator): Harness {
  const registry = new EngineRegistry();
  const store = new MemoryDocumentStore();
  const orchestrator = new ExtractionOrchestrator(registry, { minUsableWords: 5, escalation: NEVER });
  return {
    registry,
    store,
    deps: { store, orchestrator, synthetic },
    useText(attempt) {
      const engine = new FakeEngine('text-layer', attempt);
      registry.register(engine);
      return engine;
    },
  };
}

function orchestratorWith(engine: FakeEngine): ExtractionOrchestrator {
  const registry = new EngineRegistry();
  registry.register(engine);
  return new ExtractionOrchestrator(registry, { minUsableWords: 5, escalation: NEVER });
}

const NO_FILE_NUMBER = LETTER.replace('Our File No. A-03-101', 'Re: zoning');

describe('processDocument', () => {
  it('commits a fully structured record', async () => {
    const h = harness();
    h.useText(makeAttempt({ method: 'text-layer', text: LETTER }));
    const entry = makeEntry('reg-0101', { letter_id: 'A-03-101', metadata: { city: 'Fresno' } });

    const outcome = await processDocument(entry, h.deps, { runId: 'run-1' });
    expect(outcome.status).toBe('committed');
    expect(outcome.documentId).toBe('A-03-101');

    const record = await h.store.getRecord('A-03-101');
    expect(record?.id_source).toBe('registry');
    expect(record?.extraction.method).toBe('text-layer');
    expect(record?.fidelity?.risk_tier).toBe('verified');
    expect(record?.parsed).toEqual({
      date: '2003-06-12',
      date_raw: 'June 12, 2003',
      requestor_name: 'Alvarez',
      requestor_title: 'General Counsel',
      requestor_city: 'Fresno',
      document_type: 'advice_letter',
    });
    expect(record?.sections.question).toBe('May the council member vote on the zoning ordinance under Section 87100?');
    expect(record?.sections.extraction_method).toBe('regex_validated');
    expect(record?.citations).toEqual({
      statute: ['87100', '87103'],
      regulation: ['18702'],
      prior_decision: ['A-98-200'],
      external: [],
      cited_by: [],
      notes: ['Removed 1 self-citation(s)'],
    });
    expect(record?.classification).toEqual({
      topic: 'conflicts_of_interest',
      confidence: 1,
      method: 'heuristic:citation_based',
      reason: 'plurality',
    });
    expect(record?.embedding.qa_source).toBe('extracted');
  });

  it('skips an extracted record unless forced', async () => {
    const h = harness();
    const engine = h.useText(makeAttempt({ method: 'text-layer', text: LETTER }));
    const entry = makeEntry('reg-0102', { letter_id: 'A-03-102' });

    await processDocument(entry, h.deps, { runId: 'run-1' });
    const second = await processDocument(entry, h.deps, { runId: 'run-1' });

    expect(second.status).toBe('skipped');
    expect(engine.calls).toBe(1);
  });

  it('keeps the stored record when a forced rerun scores lower', async () => {
    const h = harness();
    const entry = makeEntry('reg-0103', { letter_id: 'A-03-103' });

    h.useText(makeAttempt({ method: 'text-layer', text: LETTER, qualityScore: 0.75 }));
    await processDocument(entry, h.deps, { runId: 'run-1' });

    h.useText(makeAttempt({ method: 'text-layer', text: LETTER, qualityScore: 0.6 }));
    const rerun = await processDocument(entry, h.deps, { runId: 'run-2', force: true });

    expect(rerun.status).toBe('regression');
    expect(rerun.qualityScore).toBe(0.75);
    expect((await h.store.getRecord('A-03-103'))?.extraction.quality_score).toBe(0.75);
    expect(await h.store.listAttempts('reg-0103')).toHaveLength(2);
  });

  it('replaces the stored record when a forced rerun scores higher', async () => {
    const h = harness();
    const entry = makeEntry('reg-0104', { letter_id: 'A-03-104' });

    h.useText(makeAttempt({ method: 'text-layer', text: LETTER, qualityScore: 0.75 }));
    await processDocument(entry, h.deps, { runId: 'run-1' });

    h.useText(makeAttempt({ method: 'text-layer', text: LETTER, qualityScore: 0.9 }));
    const rerun = await processDocument(entry, h.deps, { runId: 'run-2', force: true });

    expect(rerun.status).toBe('committed');
    expect((await h.store.getRecord('A-03-104'))?.extraction.quality_score).toBe(0.9);
  });

  it('keeps the better record when concurrent forced runs finish out of order', async () => {
    const store = new MemoryDocumentStore();
    const entry = makeEntry('reg-0105', { letter_id: 'A-03-105' });
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const slow = orchestratorWith(
      new FakeEngine('text-layer', makeAttempt({ method: 'text-layer', text: LETTER, qualityScore: 0.6 }), gate)
    );
    const fast = orchestratorWith(
      new FakeEngine('text-layer', makeAttempt({ method: 'text-layer', text: LETTER, qualityScore: 0.75 }))
    );

    const slowRun = processDocument(entry, { store, orchestrator: slow }, { runId: 'run-slow', force: true });
    const fastOutcome = await processDocument(entry, { store, orchestrator: fast }, { runId: 'run-fast', force: true });
    release();
    const slowOutcome = await slowRun;

    expect(fastOutcome.status).toBe('committed');
    expect(slowOutcome.status).toBe('regression');
    expect(slowOutcome.qualityScore).toBe(0.75);
    expect((await store.getRecord('A-03-105'))?.extraction.quality_score).toBe(0.75);
    expect(await store.listAttempts('reg-0105')).toHaveLength(2);
  });

  it('leaves a second entry with a taken registry id unstored', async () => {
    const h = harness();
    h.useText(makeAttempt({ method: 'text-layer', text: LETTER }));

    const first = await processDocument(makeEntry('reg-0106', { letter_id: 'A-03-106' }), h.deps, { runId: 'run-1' });
    const second = await processDocument(makeEntry('reg-0116', { letter_id: 'A-03-106' }), h.deps, { runId: 'run-1' });

    expect(first.status).toBe('committed');
    expect(second).toMatchObject({ status: 'duplicate', registryKey: 'reg-0116', documentId: null });
    expect((await h.store.getRecord('A-03-106'))?.registry_key).toBe('reg-0106');
    expect(await h.store.getRecordByRegistryKey('reg-0116')).toBeNull();
    expect(await h.store.listAttempts('reg-0116')).toHaveLength(1);
  });

  it('moves a colliding placeholder to the hashed form', async () => {
    const h = harness();
    h.useText(makeAttempt({ method: 'text-layer', text: NO_FILE_NUMBER }));

    const first = await processDocument(makeEntry('reg-42'), h.deps, { runId: 'run-1' });
    const second = await processDocument(makeEntry('reg-042'), h.deps, { runId: 'run-1' });

    expect(first.documentId).toBe('UNK-03-00042');
    expect(second).toMatchObject({ status: 'committed', documentId: 'UNK-03-154ecd897d' });
    const record = await h.store.getRecordByRegistryKey('reg-042');
    expect(record?.id).toBe('UNK-03-154ecd897d');
    expect(record?.extraction.notes).toContain(
      'Placeholder UNK-03-00042 already held by reg-42; stored as UNK-03-154ecd897d'
    );

    const rerun = await processDocument(makeEntry('reg-042'), h.deps, { runId: 'run-2', force: true });
    expect(rerun.documentId).toBe('UNK-03-154ecd897d');
  });

  it('upgrades a placeholder once the letter yields its file number', async () => {
    const h = harness();
    const entry = makeEntry('reg-0007');

    h.useText(makeAttempt({ method: 'text-layer', text: NO_FILE_NUMBER }));
    const first = await processDocument(entry, h.deps, { runId: 'run-1' });
    expect(first.documentId).toBe('UNK-03-00007');

    h.useText(makeAttempt({ method: 'text-layer', text: LETTER, qualityScore: 0.9 }));
    const second = await processDocument(entry, h.deps, { runId: 'run-2', force: true });

    expect(second.documentId).toBe('A-03-101');
    const record = await h.store.getRecord('A-03-101');
    expect(record?.id_source).toBe('recovered');
    expect(record?.extraction.notes).toContain('Placeholder UNK-03-00007 upgraded to A-03-101');
    expect(await h.store.getRecord('UNK-03-00007')).toBeNull();
  });

  it('commits a failed extraction and retries it on the next run', async () => {
    const h = harness();
    const engine = h.useText(makeAttempt({ method: 'text-layer', text: 'tiny' }));
    const entry = makeEntry('reg-0008', { letter_id: 'A-03-108' });

    const outcome = await processDocument(entry, h.deps, { runId: 'run-1' });
    expect(outcome.status).toBe('failed');

    const record = await h.store.getRecord('A-03-108');
    expect(record?.extraction.status).toBe('extraction_failed');
    expect(record?.fidelity).toBeNull();
    expect(record?.sections.parsing_notes).toBe('No trusted text');
    expect(record?.classification.reason).toBe('no_citations');

    await processDocument(entry, h.deps, { runId: 'run-2' });
    expect(engine.calls).toBe(2);
  });

  describe('synthetic sections', () => {
    const response: SyntheticSectionResult = {
      document_type: 'advice_letter',
      question: 'You asked whether the council member may vote.',
      question_synthetic: null,
      conclusion: null,
      conclusion_synthetic: 'The member must abstain.',
      summary: 'Abstention required.',
      extraction_confidence: 0.7,
      notes: null,
      cost: 0.001,
      model: 'test-model',
    };

    it('fills missing sections and keeps paraphrases apart', async () => {
      const generator: SyntheticSectionGenerator = { generate: jest.fn().mockResolvedValue(response) };
      const h = harness(generator);
      h.useText(makeAttempt({ method: 'text-layer', text: NO_HEADERS }));

      const outcome = await processDocument(makeEntry('reg-0110', { letter_id: 'A-03-110' }), h.deps, {
        runId: 'run-s',
      });
      const record = await h.store.getRecord('A-03-110');

      expect(record?.sections).toMatchObject({
        question: 'You asked whether the council member may vote.',
        conclusion: null,
        question_synthetic: null,
        conclusion_synthetic: 'The member must abstain.',
        extraction_method: 'llm',
        extraction_confidence: 0.7,
        parsing_notes: 'No section headers found',
      });
      expect(record?.embedding).toMatchObject({ qa_source: 'mixed', summary: 'Abstention required.' });
      expect(outcome.cost).toBeCloseTo(0.001, 10);
      expect(outcome.runCost).toBeCloseTo(0.001, 10);
    });

    it('keeps the parser result when the generator fails', async () => {
      const generator: SyntheticSectionGenerator = {
        generate: jest.fn().mockRejectedValue(new Error('quota exhausted')),
      };
      const h = harness(generator);
      h.useText(makeAttempt({ method: 'text-layer', text: NO_HEADERS }));

      await processDocument(makeEntry('reg-0111', { letter_id: 'A-03-111' }), h.deps, { runId: 'run-s' });
      const record = await h.store.getRecord('A-03-111');

      expect(record?.sections.extraction_method).toBe('none');
      expect(record?.sections.parsing_notes).toBe('No section headers found; Synthetic fallback failed: quota exhausted');
    });
  });
});
