/**
 * Citation Extractor
 *
 * Pulls statute, regulation, prior-decision and external citations out of
 * letter text. Statute and regulation numbers are checked against the ranges
 * the Act and its regulations occupy, which rejects most false positives
 * ("Section 99999", street numbers). Lists are deduplicated and sorted.
 */

import type { CitationSet } from '../types';
import {
  EXTERNAL_PATTERNS,
  PRIOR_DECISION_PATTERNS,
  REGULATION_PATTERNS,
  REGULATION_RANGE,
  STATUTE_PATTERNS,
  STATUTE_RANGE,
} from './patterns';
import { normalizePriorDecision } from './identifiers';

/** "87103 (a)" -> "87103(a)", runs of whitespace collapsed */
export function normalizeCitation(citation: string): string {
  return citation
    .trim()
    .replace(/\s+/g, ' ')
    .replace(/\s+\(/g, '(')
    .replace(/\)\s+/g, ')');
}

export function baseSectionNumber(citation: string): number | null {
  const m = /^\s*(\d+)/.exec(citation);
  return m ? parseInt(m[1], 10) : null;
}

function inRange(citation: string, range: { min: number; max: number }): boolean {
  const base = baseSectionNumber(citation);
  return base !== null && base >= range.min && base <= range.max;
}

function collect(
  text: string,
  patterns: readonly RegExp[],
  normalize: (value: string) => string,
  group: 0 | 1,
  accept: (value: string) => boolean = () => true
): string[] {
  const found = new Set<string>();
  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      const raw = match[group];
      if (raw === undefined) continue;
      const value = normalize(raw);
      if (accept(value)) found.add(value);
    }
  }
  return Array.from(found).sort();
}

export function emptyCitationSet(): CitationSet {
  return { statute: [], regulation: [], prior_decision: [], external: [], cited_by: [] };
}

/**
 * `cited_by` is always empty here; only the graph pass writes it.
 */
export function extractCitations(text: string): CitationSet {
  if (!text || !text.trim()) {
    return emptyCitationSet();
  }

  return {
    statute: collect(text, STATUTE_PATTERNS, normalizeCitation, 1, (c) => inRange(c, STATUTE_RANGE)),
    regulation: collect(text, REGULATION_PATTERNS, normalizeCitation, 1, (c) => inRange(c, REGULATION_RANGE)),
    prior_decision: collect(text, PRIOR_DECISION_PATTERNS, normalizePriorDecision, 1),
    external: collect(text, EXTERNAL_PATTERNS, normalizeCitation, 0),
    cited_by: [],
  };
}

export function citationCount(citations: CitationSet): number {
  return (
    citations.statute.length +
    citations.regulation.length +
    citations.prior_decision.length +
    citations.external.length
  );
}
