/**
 * Letter metadata: dates, requestor, document type and embedding text.
 */

import {
  buildEmbeddingContent,
  determineDocumentType,
  expandYear,
  firstWords,
  fixOcrYear,
  monthNumber,
  parseLetterDate,
  parseRequestor,
} from '@advice-corpus/shared';
import { LETTER, words } from './fixtures';

describe('Letter date', () => {
  it('reads a long-form date', () => {
    expect(parseLetterDate(LETTER)).toEqual({ date: '2003-06-12', raw: 'June 12, 2003' });
  });

  it('repairs misread month names and years', () => {
    expect(parseLetterDate('Septernber 5, l989\n\nDear Mr. Cho:')).toEqual({
      date: '1989-09-05',
      raw: 'Septernber 5, l989',
    });
    expect(fixOcrYear('2O1O')).toBe('2010');
    expect(monthNumber('Decernber')).toBe('12');
  });

  it('reads numeric dates with two-digit years', () => {
    expect(parseLetterDate('Dated 3/7/91')).toEqual({ date: '1991-03-07', raw: '3/7/91' });
    expect(expandYear('25')).toBe(2025);
    expect(expandYear('26')).toBe(1926);
  });

  it('rejects impossible dates and falls back to the registry date', () => {
    expect(parseLetterDate('February 31, 1990', '1990-02-01')).toEqual({ date: '1990-02-01', raw: null });
    expect(parseLetterDate('January 3, 1962', null)).toEqual({ date: null, raw: null });
  });

  it('ignores a fallback that is not an ISO date', () => {
    expect(parseLetterDate('No date here', 'Feb 1990')).toEqual({ date: null, raw: null });
  });
});

describe('Requestor', () => {
  it('takes the name from the salutation and the city from the registry', () => {
    expect(parseRequestor(LETTER, { city: 'Fresno' })).toEqual({
      name: 'Alvarez',
      title: 'General Counsel',
      city: 'Fresno',
    });
  });

  it('falls back to the registry name', () => {
    expect(parseRequestor('To whom it may concern:', { requestorName: 'Pat Quinn' }).name).toBe('Pat Quinn');
  });
});

describe('Document type', () => {
  it('follows the identifier prefix', () => {
    expect(determineDocumentType(LETTER, 'A-03-101')).toBe('advice_letter');
    expect(determineDocumentType(LETTER, 'I-91-003')).toBe('informal_advice');
    expect(determineDocumentType(LETTER, 'M-84-001')).toBe('opinion');
  });

  it('detects withdrawn requests before the prefix', () => {
    expect(determineDocumentType('We understand you have withdrawn your request for advice.', 'A-03-101')).toBe(
      'correspondence'
    );
  });

  it('reads the body when the identifier carries no prefix', () => {
    expect(determineDocumentType('This letter provides informal assistance only.', 'UNK-03-00007')).toBe(
      'informal_advice'
    );
    expect(determineDocumentType('Plain letter.', 'UNK-03-00007')).toBe('advice_letter');
  });
});

describe('Embedding content', () => {
  it('prefers verbatim sections and marks synthetic fill-ins', () => {
    const content = buildEmbeddingContent(
      'one two three',
      { question: 'May I accept the gift?', conclusion: null },
      { question_synthetic: null, conclusion_synthetic: 'The gift is reportable.', summary: 'Gift rules.' }
    );
    expect(content).toEqual({
      qa_text: 'QUESTION: May I accept the gift?\n\nCONCLUSION: The gift is reportable.',
      qa_source: 'mixed',
      first_500_words: 'one two three',
      summary: 'Gift rules.',
    });
  });

  it('falls back to the opening words without sections', () => {
    const content = buildEmbeddingContent('alpha beta gamma', { question: null, conclusion: null });
    expect(content.qa_text).toBe('alpha beta gamma');
    expect(content.qa_source).toBe('extracted');
    expect(content.summary).toBeNull();
  });

  it('caps the opening at 500 words', () => {
    expect(firstWords(words('w', 600)).split(' ')).toHaveLength(500);
  });
});
