/**
 * Test fixtures: registry entries, hand-built attempts and in-process engines.
 */

import {
  splitWords,
  type EngineRole,
  type ExtractionAttempt,
  type ExtractionEngine,
  type ExtractionMethod,
  type RegistryEntry,
  type SourceAsset,
  type TranscriptionPass,
} from '@advice-corpus/shared';

export const LETTER = [
  'June 12, 2003',
  '',
  'Dear Ms. Alvarez:',
  '',
  'Our File No. A-03-101',
  '',
  'QUESTION',
  '',
  'May the council member vote on the zoning ordinance under Section 87100?',
  '',
  'CONCLUSION',
  '',
  'No. The council member has a disqualifying financial interest under Section 87103.',
  '',
  'FACTS',
  '',
  'The council member owns property near the project, as in the Baker Advice Letter, No. A-98-200.',
  '',
  'ANALYSIS',
  '',
  'Regulation 18702 sets out the steps for deciding whether a conflict exists.',
  '',
  'Sincerely,',
  '',
  'General Counsel',
].join('\n');

export function makeEntry(registryKey: string, overrides: Partial<RegistryEntry> = {}): RegistryEntry {
  return {
    registry_key: registryKey,
    letter_id: null,
    year: 2003,
    source_reference: `https://letters.example.test/${registryKey}.pdf`,
    source: { pdfPath: null, pageImages: [] },
    metadata: {},
    ...overrides,
  };
}

let sequence = 0;

export interface AttemptSpec {
  method: ExtractionMethod;
  text: string;
  pass?: TranscriptionPass;
  qualityScore?: number;
  cost?: number | null;
  pages?: string[];
}

export function makeAttempt(spec: AttemptSpec): ExtractionAttempt {
  sequence++;
  const pages = spec.pages ?? [spec.text];
  return Object.freeze({
    attempt_id: `${spec.method}-${sequence}`,
    method: spec.method,
    pass: spec.pass ?? 'standard',
    text: spec.text,
    pages: Object.freeze(pages),
    page_count: pages.length,
    word_count: splitWords(spec.text).length,
    quality_score: spec.qualityScore ?? 0.8,
    cost: spec.cost ?? null,
    model: spec.method === 'vision-transcription' ? 'test-model' : null,
    duration_ms: 1,
    created_at: '2024-01-01T00:00:00.000Z',
  });
}

/**
 * Engine that returns a fixed attempt, or fails with a fixed error. With a
 * gate it waits for the gate to resolve first.
 */
export class FakeEngine implements ExtractionEngine {
  calls = 0;
  readonly description = 'in-process fake';

  constructor(
    readonly role: EngineRole,
    private readonly result: ExtractionAttempt | Error,
    private readonly gate: Promise<void> = Promise.resolve()
  ) {}

  get method(): ExtractionMethod {
    return this.result instanceof Error ? roleMethod(this.role) : this.result.method;
  }

  get pass(): TranscriptionPass {
    return this.role === 'constrained-transcription' ? 'constrained' : 'standard';
  }

  async attempt(_source: SourceAsset): Promise<ExtractionAttempt> {
    this.calls++;
    await this.gate;
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

function roleMethod(role: EngineRole): ExtractionMethod {
  if (role === 'text-layer') return 'text-layer';
  if (role === 'baseline-ocr') return 'baseline-ocr';
  return 'vision-transcription';
}

/** Space-separated words w1..wN with the given stem */
export function words(stem: string, count: number): string {
  return Array.from({ length: count }, (_, i) => `${stem}${i + 1}`).join(' ');
}
