/**
 * Citation Graph Builder
 *
 * Corpus-wide and two-pass. Pass 1 indexes every stored identifier (with all
 * of its written variants) and collects each document's forward citations,
 * re-applying the self-citation filter so that records written before the
 * filter existed are corrected. Pass 2 resolves every cited identifier: a
 * hit adds the citing document to the target's `cited_by`, a miss goes to the
 * known-gaps ledger. Nothing is dropped.
 *
 * Documents are counted per record, so two records sharing an identifier
 * both contribute their edges; the shared identifier is reported in
 * `duplicateIds`.
 *
 * Pure: the caller persists the result. Run it as a single writer.
 */

import type { KnownGap } from '../types';
import { buildVariantLookup } from './identifiers';
import { filterSelfCitations } from './self-citation';
import { emptyCitationSet } from './extractor';

export interface GraphDocument {
  id: string;
  registry_key: string;
  prior_decision: readonly string[];
}

export interface GraphStats {
  documents: number;
  total_edges: number;
  resolved_edges: number;
  dangling_edges: number;
  self_citations_removed: number;
}

export interface GraphResult {
  /** Sorted, unique citing ids for every document, empty lists included */
  citedBy: Map<string, string[]>;
  /** Forward lists after the self-citation filter, by registry key */
  forward: Map<string, string[]>;
  knownGaps: KnownGap[];
  /** Identifiers held by more than one record, sorted */
  duplicateIds: string[];
  stats: GraphStats;
}

const MAX_GAP_EXAMPLES = 5;

export function buildCitationGraph(documents: readonly GraphDocument[]): GraphResult {
  // Pass 1: identifier index and forward lists
  const lookup = buildVariantLookup(documents.map((d) => d.id));
  const forward = new Map<string, string[]>();
  let selfRemoved = 0;

  for (const doc of documents) {
    const filtered = filterSelfCitations(
      { ...emptyCitationSet(), prior_decision: [...doc.prior_decision] },
      doc.id
    ).prior_decision;
    selfRemoved += doc.prior_decision.length - filtered.length;
    forward.set(doc.registry_key, filtered);
  }

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const doc of documents) {
    if (seen.has(doc.id)) duplicates.add(doc.id);
    seen.add(doc.id);
  }

  // Pass 2: resolve
  const citedBy = new Map<string, Set<string>>();
  for (const doc of documents) citedBy.set(doc.id, new Set());
  const dangling = new Map<string, { edges: number; citing: Set<string> }>();

  let totalEdges = 0;
  let resolvedEdges = 0;
  let danglingEdges = 0;

  for (const doc of documents) {
    const citingId = doc.id;
    for (const citedId of forward.get(doc.registry_key) ?? []) {
      totalEdges++;
      const target = lookup.get(citedId.toUpperCase());
      const targetSet = target !== undefined ? citedBy.get(target) : undefined;
      if (targetSet) {
        targetSet.add(citingId);
        resolvedEdges++;
      } else {
        const gap = dangling.get(citedId) ?? { edges: 0, citing: new Set<string>() };
        gap.edges++;
        gap.citing.add(citingId);
        dangling.set(citedId, gap);
        danglingEdges++;
      }
    }
  }

  const knownGaps: KnownGap[] = Array.from(dangling.entries())
    .map(([identifier, gap]) => {
      const examples = Array.from(gap.citing).sort();
      return {
        identifier,
        cited_by_count: gap.edges,
        example_citing: examples.slice(0, MAX_GAP_EXAMPLES),
      };
    })
    .sort((a, b) => b.cited_by_count - a.cited_by_count || a.identifier.localeCompare(b.identifier));

  const sortedCitedBy = new Map<string, string[]>();
  for (const [id, citing] of citedBy) {
    sortedCitedBy.set(id, Array.from(citing).sort());
  }

  return {
    citedBy: sortedCitedBy,
    forward,
    knownGaps,
    duplicateIds: Array.from(duplicates).sort(),
    stats: {
      documents: documents.length,
      total_edges: totalEdges,
      resolved_edges: resolvedEdges,
      dangling_edges: danglingEdges,
      self_citations_removed: selfRemoved,
    },
  };
}
