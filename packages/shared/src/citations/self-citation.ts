/**
 * Self-citation filtering
 *
 * A letter routinely names its own file number ("Our File No. A-90-753"),
 * often in a different form than the registry holds ("90-753"). Filtering on
 * the literal identifier leaks these into the prior-decision list, so the
 * filter compares against every variant of the identifier.
 */

import type { CitationSet } from '../types';
import { config } from '../config';
import { FILE_NUMBER_PATTERN } from './patterns';
import { identifierVariants, parseIdentifierCore } from './identifiers';

const HEADER_CHARS = 3000;

export function filterSelfCitations(citations: CitationSet, documentId: string): CitationSet {
  const variants = identifierVariants(documentId);
  return {
    ...citations,
    prior_decision: citations.prior_decision.filter((id) => !variants.has(id.toUpperCase())),
  };
}

/** Distinct "YY-NNN" file numbers named in the letter header */
export function headerFileNumbers(text: string): string[] {
  const header = text.slice(0, HEADER_CHARS);
  const pattern = new RegExp(FILE_NUMBER_PATTERN.source, 'gi');
  const found = new Set<string>();
  for (const match of header.matchAll(pattern)) {
    found.add(`${match[2]}-${match[3]}`);
  }
  return Array.from(found);
}

export interface CoRecipientResult {
  citations: CitationSet;
  removed: string[];
}

/**
 * A letter answering several requesters lists all their file numbers in the
 * header. Numbers from the same year close to the letter's own number are
 * sibling requests, not prior decisions, and are dropped. Applies only when
 * the header names two or more file numbers.
 */
export function filterCoRecipients(
  citations: CitationSet,
  documentId: string,
  text: string,
  window: number = config.coRecipientWindow
): CoRecipientResult {
  const own = parseIdentifierCore(documentId);
  if (!own || window <= 0 || headerFileNumbers(text).length < 2) {
    return { citations, removed: [] };
  }

  const ownNumber = parseInt(own.number, 10);
  const removed: string[] = [];
  const kept = citations.prior_decision.filter((id) => {
    const core = parseIdentifierCore(id);
    if (!core || core.year !== own.year) return true;
    const distance = Math.abs(parseInt(core.number, 10) - ownNumber);
    if (distance > 0 && distance <= window) {
      removed.push(id);
      return false;
    }
    return true;
  });

  return { citations: { ...citations, prior_decision: kept }, removed };
}
