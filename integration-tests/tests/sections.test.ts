/**
 * Section parser
 */

import { parseSections, sectionConfidence, stripBoilerplate } from '@advice-corpus/shared';
import { LETTER } from './fixtures';

const FOOTNOTE =
  'The Political Reform Act is contained in Government Code Sections 81000 through 91014. ' +
  'All statutory references are to the Government Code, unless otherwise indicated.';

describe('Section parser', () => {
  it('extracts all four sections of a modern letter', () => {
    const result = parseSections(LETTER, 2015);

    expect(result.question).toBe('May the council member vote on the zoning ordinance under Section 87100?');
    expect(result.conclusion).toBe(
      'No. The council member has a disqualifying financial interest under Section 87103.'
    );
    expect(result.facts).toBe(
      'The council member owns property near the project, as in the Baker Advice Letter, No. A-98-200.'
    );
    expect(result.analysis).toBe('Regulation 18702 sets out the steps for deciding whether a conflict exists.');
    expect(result.extraction_method).toBe('regex_validated');
    expect(result.extraction_confidence).toBe(1);
    expect(result.has_standard_format).toBe(true);
    expect(result.parsing_notes).toBe('Format: modern');
  });

  it('reads headers each followed by a single line', () => {
    const result = parseSections(
      'QUESTION\nMay the official vote?\n\nCONCLUSION\nNo.\n\nFACTS\nThe official is a council member.'
    );

    expect(result.question).toBe('May the official vote?');
    expect(result.conclusion).toBe('No.');
    expect(result.facts).toBe('The official is a council member.');
    expect(result.analysis).toBeNull();
    expect(result.has_standard_format).toBe(true);
    expect(result.extraction_confidence).toBeGreaterThanOrEqual(0.8);
    expect(result.extraction_confidence).toBeCloseTo(0.9);
  });

  it('keeps sections apart when a footnote sits between them', () => {
    const text = [
      'FACTS',
      '',
      'The requester is a planning commissioner.',
      FOOTNOTE,
      '',
      'ANALYSIS',
      '',
      'The commissioner may not take part in the decision.',
    ].join('\n');

    const result = parseSections(text, null);
    expect(result.facts).toBe('The requester is a planning commissioner.');
    expect(result.analysis).toBe('The commissioner may not take part in the decision.');
  });

  it('removes footnote boilerplate from the whole text', () => {
    expect(stripBoilerplate(`Intro.\n${FOOTNOTE}\nRest.`)).toBe('Intro.\nRest.');
  });

  it('reports a conclusion that precedes the question', () => {
    const text = [
      'CONCLUSION',
      '',
      'The official must disclose the gift.',
      '',
      'QUESTION',
      '',
      'Must the official disclose the gift?',
    ].join('\n');

    const result = parseSections(text, null);
    expect(result.extraction_method).toBe('regex');
    expect(result.extraction_confidence).toBeCloseTo(0.8, 10);
    expect(result.parsing_notes).toBe('Format: modern; CONCLUSION appears before QUESTION');
  });

  it('returns an empty result for blank input', () => {
    const result = parseSections('   \n  ');
    expect(result.extraction_method).toBe('none');
    expect(result.extraction_confidence).toBe(0);
    expect(result.has_standard_format).toBe(false);
    expect(result.parsing_notes).toBe('Empty or whitespace-only input');
  });

  it('returns an empty result when no header is present', () => {
    const result = parseSections('This letter confirms receipt of your request.');
    expect(result.question).toBeNull();
    expect(result.parsing_notes).toBe('No section headers found');
  });

  it('skips sections below the word floor', () => {
    const text = ['QUESTION', '', 'Gifts?', '', 'CONCLUSION', '', 'The gift must be reported on the statement.'].join('\n');
    const result = parseSections(text, null, { minSectionWords: 3 });

    expect(result.question).toBeNull();
    expect(result.conclusion).toBe('The gift must be reported on the statement.');
    expect(result.parsing_notes).toBe('Format: modern; Skipped (too short): question; QUESTION has only 1 words');
  });

  describe('confidence', () => {
    it('lowers confidence for older letters and per issue', () => {
      const both = new Set(['question', 'conclusion'] as const);
      expect(sectionConfidence(both, 0, 1980)).toBeCloseTo(0.75, 10);
      expect(sectionConfidence(both, 0, 1995)).toBeCloseTo(0.85, 10);
      expect(sectionConfidence(both, 2, 2005)).toBeCloseTo(0.7, 10);
      expect(sectionConfidence(new Set(['facts'] as const), 0, null)).toBeCloseTo(0.4, 10);
    });
  });
});
