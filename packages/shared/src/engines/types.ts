/**
 * Extraction Engine Types
 *
 * Every engine offers the same capability: turn a source asset into an
 * immutable ExtractionAttempt, or fail. The orchestrator only sees this
 * interface, never a concrete adapter.
 */

import type { ExtractionAttempt, ExtractionMethod, SourceAsset, TranscriptionPass } from '../types';

/**
 * Slot an engine fills in the escalation ladder. The constrained role is the
 * verbatim-only remediation pass run on flagged vision output.
 */
export type EngineRole = 'text-layer' | 'baseline-ocr' | 'vision-transcription' | 'constrained-transcription';

/**
 * Per-call context passed to engines
 */
export interface EngineContext {
  registryKey: string;
  year: number | null;
}

/**
 * Raw engine output before scoring
 */
export interface EngineOutput {
  /** Text per page, in page order */
  pages: string[];
  /** Pages in the source document, which may exceed pages transcribed */
  pageCount: number;
  cost: number | null;
  model: string | null;
}

export interface ExtractionEngine {
  readonly role: EngineRole;
  readonly method: ExtractionMethod;
  readonly pass: TranscriptionPass;
  readonly description: string;

  attempt(source: SourceAsset, ctx: EngineContext): Promise<ExtractionAttempt>;
}

export interface EngineCallOptions {
  timeoutMs?: number;
  maxRetries?: number;
  backoffMs?: number;
}
