/**
 * Synthetic section fallback
 *
 * When the parser finds no standard format, or its confidence is low, an
 * external generator may read the letter and return the question and
 * conclusion. Verbatim passages it locates only fill sections the parser left
 * empty; paraphrases are kept apart as `*_synthetic` and never pass for
 * extracted text.
 */

import type { SectionResult } from '../types';
import type { SyntheticSectionsPayload } from '../schemas';
import { config } from '../config';
import { cleanSectionContent } from '../sections/parser';

export interface SyntheticSectionRequest {
  documentId: string;
  text: string;
  sections: SectionResult;
}

export interface SyntheticSectionResult extends SyntheticSectionsPayload {
  cost: number | null;
  model: string | null;
}

export interface SyntheticSectionGenerator {
  generate(request: SyntheticSectionRequest): Promise<SyntheticSectionResult>;
}

export interface MergedSections extends SectionResult {
  question_synthetic: string | null;
  conclusion_synthetic: string | null;
  summary: string | null;
}

export function needsSyntheticFallback(
  sections: SectionResult,
  threshold: number = config.syntheticConfidenceBelow
): boolean {
  return sections.extraction_confidence < threshold || !sections.has_standard_format;
}

function verbatim(value: string | null): string | null {
  if (!value) return null;
  const cleaned = cleanSectionContent(value);
  return cleaned.length > 0 ? cleaned : null;
}

export function withoutSynthetic(sections: SectionResult): MergedSections {
  return { ...sections, question_synthetic: null, conclusion_synthetic: null, summary: null };
}

export function mergeSyntheticSections(sections: SectionResult, result: SyntheticSectionResult): MergedSections {
  const question = sections.question ?? verbatim(result.question);
  const conclusion = sections.conclusion ?? verbatim(result.conclusion);

  const notes = [sections.parsing_notes, result.notes ? `Generator: ${result.notes}` : null]
    .filter((n): n is string => Boolean(n))
    .join('; ');

  return {
    ...sections,
    question,
    conclusion,
    question_synthetic: result.question_synthetic,
    conclusion_synthetic: result.conclusion_synthetic,
    summary: result.summary,
    extraction_method: 'llm',
    extraction_confidence: Math.min(1, Math.max(0, result.extraction_confidence)),
    parsing_notes: notes || null,
  };
}
