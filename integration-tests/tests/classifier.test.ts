/**
 * Topic classifier
 */

import { classify, emptyCitationSet, topicForSection } from '@advice-corpus/shared';

describe('Classifier', () => {
  it('picks the plurality topic', () => {
    expect(classify({ statute: ['84200', '87100', '87103(a)'] })).toEqual({
      topic: 'conflicts_of_interest',
      confidence: 0.667,
      method: 'heuristic:citation_based',
      reason: 'plurality',
    });
  });

  it('breaks ties by the fixed priority order', () => {
    expect(classify({ statute: ['84200', '87100'] }).topic).toBe('conflicts_of_interest');
    expect(classify({ statute: ['86200', '84200'] })).toMatchObject({ topic: 'campaign_finance', confidence: 0.5 });
  });

  it('separates no citations from no matching range', () => {
    expect(classify({ statute: [] })).toEqual({
      topic: null,
      confidence: null,
      method: 'heuristic:citation_based',
      reason: 'no_citations',
    });
    expect(classify({ statute: ['81000', '82048'] })).toEqual({
      topic: 'other',
      confidence: 0.1,
      method: 'heuristic:citation_based',
      reason: 'no_matching_ranges',
    });
  });

  it('counts statutes only, never regulations', () => {
    expect(classify({ ...emptyCitationSet(), regulation: ['18700', '18702.1'] }).reason).toBe('no_citations');
    expect(classify({ ...emptyCitationSet(), statute: ['84200'], regulation: ['18700', '18701', '18702'] })).toEqual({
      topic: 'campaign_finance',
      confidence: 1,
      method: 'heuristic:citation_based',
      reason: 'plurality',
    });
  });

  it('maps section numbers to topic ranges', () => {
    expect(topicForSection(87100)).toBe('conflicts_of_interest');
    expect(topicForSection(85300)).toBe('campaign_finance');
    expect(topicForSection(89550)).toBe('campaign_finance');
    expect(topicForSection(86300)).toBe('lobbying');
    expect(topicForSection(83100)).toBeNull();
  });
});
