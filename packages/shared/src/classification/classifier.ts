/**
 * Topic Classifier
 *
 * Each statute citation votes for the topic whose section range contains its
 * base number; the plurality wins. Ties fall to the fixed priority order.
 * "No citations" and "citations but no matching range" are reported
 * separately so consumers can tell them apart.
 */

import type { CitationSet, Classification, Topic } from '../types';
import { baseSectionNumber } from '../citations/extractor';

export interface TopicRange {
  topic: Exclude<Topic, 'other'>;
  min: number;
  max: number;
}

export const TOPIC_RANGES: readonly TopicRange[] = [
  { topic: 'conflicts_of_interest', min: 87100, max: 87500 },
  { topic: 'campaign_finance', min: 84100, max: 84600 },
  { topic: 'campaign_finance', min: 85100, max: 85800 },
  { topic: 'campaign_finance', min: 89500, max: 89600 },
  { topic: 'lobbying', min: 86100, max: 86400 },
];

/** Tie-break order, highest priority first */
export const TOPIC_PRIORITY: readonly Exclude<Topic, 'other'>[] = [
  'conflicts_of_interest',
  'campaign_finance',
  'lobbying',
];

const METHOD = 'heuristic:citation_based';
const NO_MATCH_CONFIDENCE = 0.1;

export function topicForSection(section: number): Exclude<Topic, 'other'> | null {
  const range = TOPIC_RANGES.find((r) => section >= r.min && section <= r.max);
  return range ? range.topic : null;
}

export function classify(citations: Pick<CitationSet, 'statute'> & Partial<CitationSet>): Classification {
  const statutes = citations.statute;
  if (statutes.length === 0) {
    return { topic: null, confidence: null, method: METHOD, reason: 'no_citations' };
  }

  const votes = new Map<Exclude<Topic, 'other'>, number>();
  for (const statute of statutes) {
    const section = baseSectionNumber(statute);
    const topic = section === null ? null : topicForSection(section);
    if (topic) votes.set(topic, (votes.get(topic) ?? 0) + 1);
  }

  if (votes.size === 0) {
    return { topic: 'other', confidence: NO_MATCH_CONFIDENCE, method: METHOD, reason: 'no_matching_ranges' };
  }

  let best: Exclude<Topic, 'other'> = TOPIC_PRIORITY[0];
  let bestVotes = -1;
  for (const topic of TOPIC_PRIORITY) {
    const count = votes.get(topic) ?? 0;
    if (count > bestVotes) {
      best = topic;
      bestVotes = count;
    }
  }

  return {
    topic: best,
    confidence: Math.round((bestVotes / statutes.length) * 1000) / 1000,
    method: METHOD,
    reason: 'plurality',
  };
}
