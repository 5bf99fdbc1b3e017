/**
 * Extraction orchestrator: escalation, selection and fidelity routing with
 * in-process engines.
 */

import {
  EngineFailure,
  EngineRegistry,
  ExtractionOrchestrator,
  selectBest,
  type EscalationSettings,
  type FidelityThresholds,
} from '@advice-corpus/shared';
import { FakeEngine, LETTER, makeAttempt, makeEntry, words } from './fixtures';

const RELAXED = { qualityFloor: 0, minWordsPerPage: 0, minAlphaRatio: 0, maxGarbageWords: 100000 };
const NEVER: EscalationSettings = { yearThreshold: 0, ...RELAXED };
const ALWAYS: EscalationSettings = { yearThreshold: 3000, ...RELAXED };
const THRESHOLDS: FidelityThresholds = { criticalBelow: 0.3, highBelow: 0.5, mediumBelow: 0.7 };

const BASELINE_TEXT = words('term', 12);

function orchestrator(registry: EngineRegistry, escalation: EscalationSettings): ExtractionOrchestrator {
  return new ExtractionOrchestrator(registry, { minUsableWords: 5, escalation, thresholds: THRESHOLDS });
}

describe('selectBest', () => {
  it('prefers more words, then higher quality, then the cheaper engine', () => {
    const text = makeAttempt({ method: 'text-layer', text: words('w', 6), qualityScore: 0.8 });
    const ocr = makeAttempt({ method: 'baseline-ocr', text: words('w', 6), qualityScore: 0.8 });
    const betterOcr = makeAttempt({ method: 'baseline-ocr', text: words('w', 6), qualityScore: 0.9 });
    const longer = makeAttempt({ method: 'vision-transcription', text: words('w', 7), qualityScore: 0.1 });

    expect(selectBest([ocr, text], 5)).toBe(text);
    expect(selectBest([text, betterOcr], 5)).toBe(betterOcr);
    expect(selectBest([text, longer], 5)).toBe(longer);
  });

  it('returns null when nothing reaches the word floor', () => {
    expect(selectBest([makeAttempt({ method: 'text-layer', text: 'too short' })], 5)).toBeNull();
  });
});

describe('ExtractionOrchestrator', () => {
  let registry: EngineRegistry;

  beforeEach(() => {
    registry = new EngineRegistry();
  });

  it('keeps a good text layer without escalating', async () => {
    const textLayer = makeAttempt({ method: 'text-layer', text: LETTER });
    const baselineEngine = new FakeEngine('baseline-ocr', makeAttempt({ method: 'baseline-ocr', text: LETTER }));
    registry.register(new FakeEngine('text-layer', textLayer)).register(baselineEngine);

    const record = await orchestrator(registry, NEVER).extract(makeEntry('reg-0001'));

    expect(record.status).toBe('extracted');
    expect(record.current).toBe(textLayer);
    expect(record.fidelity?.risk_tier).toBe('verified');
    expect(record.fidelity?.method).toBe('native-trusted');
    expect(record.escalation_reasons).toEqual([]);
    expect(baselineEngine.calls).toBe(0);
  });

  it('accepts a vision transcription that agrees with the baseline', async () => {
    const vision = makeAttempt({ method: 'vision-transcription', text: `${BASELINE_TEXT} term13`, cost: 0.02 });
    registry
      .register(new FakeEngine('text-layer', makeAttempt({ method: 'text-layer', text: '' })))
      .register(new FakeEngine('baseline-ocr', makeAttempt({ method: 'baseline-ocr', text: BASELINE_TEXT })))
      .register(new FakeEngine('vision-transcription', vision));

    const record = await orchestrator(registry, ALWAYS).extract(makeEntry('reg-0002'));

    expect(record.current).toBe(vision);
    expect(record.fidelity?.risk_tier).toBe('low');
    expect(record.fidelity?.canary_score).toBe(0.96);
    expect(record.escalation_reasons).toEqual(['pre_threshold_year']);
    expect(record.notes).toEqual(['Escalated: pre_threshold_year', 'Vision fidelity low (canary 0.96)']);
    expect(record.total_cost).toBeCloseTo(0.02, 10);
  });

  it('replaces fabricated output with a constrained pass that verifies', async () => {
    const vision = makeAttempt({ method: 'vision-transcription', text: words('invented', 15), cost: 0.02 });
    const constrained = makeAttempt({
      method: 'vision-transcription',
      pass: 'constrained',
      text: BASELINE_TEXT,
      cost: 0.03,
    });
    registry
      .register(new FakeEngine('text-layer', makeAttempt({ method: 'text-layer', text: '' })))
      .register(new FakeEngine('baseline-ocr', makeAttempt({ method: 'baseline-ocr', text: BASELINE_TEXT })))
      .register(new FakeEngine('vision-transcription', vision))
      .register(new FakeEngine('constrained-transcription', constrained));

    const record = await orchestrator(registry, ALWAYS).extract(makeEntry('reg-0003'));

    expect(record.current).toBe(constrained);
    expect(record.fidelity?.risk_tier).toBe('verified');
    expect(record.fidelity?.method).toBe('replaced');
    expect(record.fidelity?.notes).toContain(`replaced critical transcription ${vision.attempt_id}`);
    expect(record.attempts).toHaveLength(4);
    expect(record.total_cost).toBeCloseTo(0.05, 10);
  });

  it('demotes critical output to the best native attempt', async () => {
    const baseline = makeAttempt({ method: 'baseline-ocr', text: BASELINE_TEXT });
    const vision = makeAttempt({ method: 'vision-transcription', text: words('invented', 15) });
    registry
      .register(new FakeEngine('text-layer', makeAttempt({ method: 'text-layer', text: '' })))
      .register(new FakeEngine('baseline-ocr', baseline))
      .register(new FakeEngine('vision-transcription', vision));

    const record = await orchestrator(registry, ALWAYS).extract(makeEntry('reg-0004'));

    expect(record.current).toBe(baseline);
    expect(record.fidelity?.method).toBe('native-trusted');
    expect(record.notes).toContain('No constrained-transcription engine registered');
    expect(record.notes).toContain(`Demoted critical vision transcription ${vision.attempt_id}`);
  });

  it('keeps flagged output when the constrained pass verifies worse', async () => {
    const vision = makeAttempt({
      method: 'vision-transcription',
      text: 'alpha bravo charlie delta echo foxtrot one two three four five',
    });
    registry
      .register(new FakeEngine('text-layer', makeAttempt({ method: 'text-layer', text: '' })))
      .register(
        new FakeEngine(
          'baseline-ocr',
          makeAttempt({ method: 'baseline-ocr', text: 'alpha bravo charlie delta echo foxtrot golf hotel india juliet' })
        )
      )
      .register(new FakeEngine('vision-transcription', vision))
      .register(
        new FakeEngine(
          'constrained-transcription',
          makeAttempt({ method: 'vision-transcription', pass: 'constrained', text: words('invented', 12) })
        )
      );

    const record = await orchestrator(registry, ALWAYS).extract(makeEntry('reg-0005'));

    expect(record.current).toBe(vision);
    expect(record.fidelity?.risk_tier).toBe('medium');
    expect(record.fidelity?.canary_score).toBe(0.5714);
    expect(record.notes).toContain('Constrained pass fidelity critical (canary 0)');
  });

  it('records a failed engine and skips vision without a witness', async () => {
    const textLayer = makeAttempt({ method: 'text-layer', text: LETTER });
    const visionEngine = new FakeEngine(
      'vision-transcription',
      makeAttempt({ method: 'vision-transcription', text: LETTER })
    );
    registry
      .register(new FakeEngine('text-layer', textLayer))
      .register(new FakeEngine('baseline-ocr', new EngineFailure('baseline-ocr', new Error('tesseract crashed'))))
      .register(visionEngine);

    const record = await orchestrator(registry, ALWAYS).extract(makeEntry('reg-0006'));

    expect(record.current).toBe(textLayer);
    expect(record.notes).toEqual([
      'Escalated: pre_threshold_year',
      'baseline-ocr failed: Engine baseline-ocr failed: tesseract crashed',
      'vision-transcription skipped: no baseline witness',
    ]);
    expect(visionEngine.calls).toBe(0);
  });

  it('propagates errors that are not pipeline errors', async () => {
    registry.register(new FakeEngine('text-layer', new Error('disk on fire')));
    await expect(orchestrator(registry, NEVER).extract(makeEntry('reg-0007'))).rejects.toThrow('disk on fire');
  });

  it('fails the document when no attempt is usable', async () => {
    registry.register(new FakeEngine('text-layer', makeAttempt({ method: 'text-layer', text: 'tiny' })));

    const record = await orchestrator(registry, ALWAYS).extract(makeEntry('reg-0008'));

    expect(record.status).toBe('extraction_failed');
    expect(record.current).toBeNull();
    expect(record.fidelity).toBeNull();
    expect(record.notes).toEqual([
      'Escalated: pre_threshold_year',
      'baseline-ocr skipped: no engine registered',
      'No attempt reached 5 words',
    ]);
  });
});
