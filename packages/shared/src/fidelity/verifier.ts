/**
 * Fidelity Verifier
 *
 * Cross-checks a vision transcription against the baseline OCR of the same
 * pages. The baseline is noisy but independent, so fluent output that shares
 * little word order with it is treated as presumptively fabricated. The
 * resulting risk tier is kept apart from the quality score: a high quality
 * score with a high risk tier is exactly the case to surface.
 */

import type { ExtractionAttempt, FidelityAssessment, RiskTier } from '../types';
import { config } from '../config';
import { sequenceRatio } from './sequence-matcher';

export interface FidelityThresholds {
  /** Scores below this are critical */
  criticalBelow: number;
  /** Scores below this (and at or above criticalBelow) are high */
  highBelow: number;
  /** Scores below this (and at or above highBelow) are medium; the rest are low */
  mediumBelow: number;
}

export function fidelityThresholdsFromConfig(): FidelityThresholds {
  return {
    criticalBelow: config.fidelityCriticalBelow,
    highBelow: config.fidelityHighBelow,
    mediumBelow: config.fidelityMediumBelow,
  };
}

// Phrases a vision model uses when it describes the page instead of reading it
const DESCRIPTION_MODE_PATTERNS = [
  /The image (?:is|shows|contains|appears|displays|presents)/i,
  /This (?:is a|appears to be a) scanned/i,
  /The document (?:is|appears|shows|contains)/i,
  /(?:scanned|photographed) (?:image|copy|document) of/i,
  /The (?:text|content) (?:of the|in the) (?:image|document)/i,
  /This image (?:is|shows|contains)/i,
];

const DESCRIPTION_WINDOW = 500;

export function normalizeForComparison(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Word-level alignment ratio between two texts. Both empty agree (1.0); one
 * empty and the other not disagree completely (0.0).
 */
export function canaryScore(candidateText: string, baselineText: string): number {
  const candidate = normalizeForComparison(candidateText);
  const baseline = normalizeForComparison(baselineText);

  if (!candidate && !baseline) return 1;
  if (!candidate || !baseline) return 0;

  return sequenceRatio(baseline.split(' '), candidate.split(' '));
}

export function detectDescriptionMode(text: string): boolean {
  const head = text.slice(0, DESCRIPTION_WINDOW);
  return DESCRIPTION_MODE_PATTERNS.some((p) => p.test(head));
}

/** 1-based page numbers whose opening carries description markers */
export function descriptionModePages(pages: readonly string[]): number[] {
  const flagged: number[] = [];
  pages.forEach((page, index) => {
    if (detectDescriptionMode(page)) flagged.push(index + 1);
  });
  return flagged;
}

export function tierForScore(
  score: number,
  descriptionMode: boolean,
  thresholds: FidelityThresholds = fidelityThresholdsFromConfig()
): RiskTier {
  if (descriptionMode) return 'critical';
  if (score < thresholds.criticalBelow) return 'critical';
  if (score < thresholds.highBelow) return 'high';
  if (score < thresholds.mediumBelow) return 'medium';
  return 'low';
}

/**
 * Assess a vision transcription against its baseline witness.
 *
 * @throws Error when the witness is not an independent baseline OCR attempt
 */
export function verify(
  vision: ExtractionAttempt,
  baseline: ExtractionAttempt,
  thresholds: FidelityThresholds = fidelityThresholdsFromConfig()
): FidelityAssessment {
  if (vision.method !== 'vision-transcription') {
    throw new Error(`Only vision transcriptions are verified, got ${vision.method}`);
  }
  if (baseline.method !== 'baseline-ocr') {
    throw new Error(`Fidelity witness must be a baseline OCR attempt, got ${baseline.method}`);
  }

  const score = canaryScore(vision.text, baseline.text);
  const flaggedPages = descriptionModePages(vision.pages);
  const descriptionMode = detectDescriptionMode(vision.text) || flaggedPages.length > 0;
  const tier = tierForScore(score, descriptionMode, thresholds);

  const notes = [`canary ${score.toFixed(3)} against baseline ${baseline.attempt_id}`];
  if (descriptionMode) {
    notes.push(
      flaggedPages.length > 0
        ? `description-mode markers on page(s) ${flaggedPages.join(', ')}`
        : 'description-mode markers at start of text'
    );
  }

  return Object.freeze({
    canary_score: Math.round(score * 10000) / 10000,
    risk_tier: tier,
    method: 'baseline-compared',
    description_mode: descriptionMode,
    candidate_attempt_id: vision.attempt_id,
    baseline_attempt_id: baseline.attempt_id,
    notes: Object.freeze(notes),
  });
}

/** Text-layer and baseline OCR output is trusted by construction */
export function nativeTrusted(attempt: ExtractionAttempt): FidelityAssessment {
  return Object.freeze({
    canary_score: 1,
    risk_tier: 'verified',
    method: 'native-trusted',
    description_mode: false,
    candidate_attempt_id: attempt.attempt_id,
    baseline_attempt_id: null,
    notes: Object.freeze([`${attempt.method} output is not model-generated`]),
  });
}

/**
 * A constrained re-transcription that verified at the low tier replaces the
 * flagged output and is marked verified.
 */
export function replacedAssessment(remediated: FidelityAssessment, flagged: FidelityAssessment): FidelityAssessment {
  return Object.freeze({
    ...remediated,
    risk_tier: 'verified',
    method: 'replaced',
    notes: Object.freeze([
      ...remediated.notes,
      `replaced ${flagged.risk_tier} transcription ${flagged.candidate_attempt_id}`,
    ]),
  });
}
