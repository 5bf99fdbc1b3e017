/**
 * Citation Graph Pass
 *
 * Single-writer, corpus-wide. Reads every stored record, rebuilds cited_by
 * and the known-gaps ledger, and writes both in one transaction. Safe to
 * rerun: the output depends only on the stored forward citations.
 */

import {
  logger,
  buildCitationGraph,
  graphEdgesGauge,
  PgDocumentStore,
  type DocumentStore,
  type GraphStats,
} from '@advice-corpus/shared';

export async function runGraphPass(store: DocumentStore): Promise<GraphStats> {
  const records = await store.listRecords();
  const graph = buildCitationGraph(
    records.map((r) => ({ id: r.id, registry_key: r.registry_key, prior_decision: r.citations.prior_decision }))
  );
  if (graph.duplicateIds.length > 0) {
    logger.warn('Identifiers held by more than one record', { duplicate_ids: graph.duplicateIds });
  }

  await store.writeCitationGraph({
    citedBy: graph.citedBy,
    forward: graph.forward,
    knownGaps: graph.knownGaps,
  });

  graphEdgesGauge.set({ state: 'resolved' }, graph.stats.resolved_edges);
  graphEdgesGauge.set({ state: 'dangling' }, graph.stats.dangling_edges);

  logger.info('Citation graph written', {
    ...graph.stats,
    known_gaps: graph.knownGaps.length,
    top_gaps: graph.knownGaps.slice(0, 5).map((g) => `${g.identifier} (${g.cited_by_count})`),
  });
  return graph.stats;
}

if (require.main === module) {
  const store = new PgDocumentStore();
  runGraphPass(store)
    .then(async () => {
      await store.close();
      process.exit(0);
    })
    .catch(async (error: unknown) => {
      logger.error('Citation graph pass failed', error);
      await store.close();
      process.exit(1);
    });
}
