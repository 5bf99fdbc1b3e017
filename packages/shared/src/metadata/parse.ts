/**
 * Letter metadata read from the document body: letter date, requestor,
 * document type, and the text used for embeddings.
 *
 * Scanned letters corrupt month names and years in predictable ways
 * ("Septernber 5, l989"), so the date patterns accept the common misreads
 * and repair the year before validating it.
 */

import type { DocumentType, RegistryMetadata, SectionResult } from '../types';
import { splitWords } from '../quality/scorer';
import { cleanSectionContent } from '../sections/parser';
import { parseIdentifierCore, type LetterPrefix } from '../citations/identifiers';

const DATE_SEARCH_CHARS = 2000;
const REQUESTOR_SEARCH_CHARS = 3000;
const TYPE_SEARCH_CHARS = 5000;
const EMBEDDING_WORDS = 500;

export const MIN_LETTER_YEAR = 1975;
export const MAX_LETTER_YEAR = 2026;

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

/** Misreads seen in scanned letters, keyed by lowercase form */
const OCR_MONTHS: Record<string, string> = {
  ianuary: 'january',
  lanuary: 'january',
  januarv: 'january',
  februarv: 'february',
  febniary: 'february',
  iarch: 'march',
  inarch: 'march',
  aprii: 'april',
  apnl: 'april',
  mav: 'may',
  iune: 'june',
  lune: 'june',
  iuly: 'july',
  luly: 'july',
  idy: 'july',
  htly: 'july',
  julv: 'july',
  jidy: 'july',
  juiy: 'july',
  augusl: 'august',
  augusi: 'august',
  septeinber: 'september',
  septernber: 'september',
  octoher: 'october',
  noveinber: 'november',
  novernber: 'november',
  deceinber: 'december',
  decernber: 'december',
};

const MONTH_ALTERNATION = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
  ...Object.keys(OCR_MONTHS).map((m) => m[0].toUpperCase() + m.slice(1)),
].join('|');

const OCR_DATE = new RegExp(`(${MONTH_ALTERNATION})\\s*(\\d{1,2})[,.\\s]\\s*(\\d{4}|[Ll0-9O]{4})`);
const LONG_DATE = new RegExp(`(${MONTH_ALTERNATION})\\s*(\\d{1,2}),?\\s*(\\d{4})`);
const NUMERIC_DATE = /(\d{1,2})\/(\d{1,2})\/(\d{2,4})/;

export interface LetterDate {
  /** ISO date, YYYY-MM-DD */
  date: string | null;
  /** Text the date was read from */
  raw: string | null;
}

/** "l989" -> "1989", "2O1O" -> "2010" */
export function fixOcrYear(year: string): string {
  return year.replace(/[Ll]/g, '1').replace(/[Oo]/g, '0').replace(/[\s-]/g, '');
}

/** Two-digit years up to 25 are 20xx, the rest 19xx */
export function expandYear(year: string): number {
  const value = parseInt(year, 10);
  if (year.length > 2) return value;
  return value <= 25 ? 2000 + value : 1900 + value;
}

export function monthNumber(name: string): string {
  const lower = name.toLowerCase();
  const canonical = OCR_MONTHS[lower] ?? lower;
  const index = MONTHS.indexOf(canonical);
  return index === -1 ? '01' : String(index + 1).padStart(2, '0');
}

function isoDate(year: number, month: string, day: string): string | null {
  if (!Number.isFinite(year) || year < MIN_LETTER_YEAR || year > MAX_LETTER_YEAR) return null;
  const dayNum = parseInt(day, 10);
  const monthNum = parseInt(month, 10);
  if (monthNum < 1 || monthNum > 12) return null;
  const daysInMonth = new Date(Date.UTC(year, monthNum, 0)).getUTCDate();
  if (dayNum < 1 || dayNum > daysInMonth) return null;
  return `${year}-${month}-${String(dayNum).padStart(2, '0')}`;
}

export function parseLetterDate(text: string, fallback: string | null = null): LetterDate {
  const head = text.slice(0, DATE_SEARCH_CHARS);

  for (const pattern of [OCR_DATE, LONG_DATE]) {
    const m = pattern.exec(head);
    if (!m) continue;
    const date = isoDate(parseInt(fixOcrYear(m[3]), 10), monthNumber(m[1]), m[2]);
    if (date) return { date, raw: m[0] };
  }

  const numeric = NUMERIC_DATE.exec(head);
  if (numeric) {
    const date = isoDate(expandYear(numeric[3]), numeric[1].padStart(2, '0'), numeric[2]);
    if (date) return { date, raw: numeric[0] };
  }

  if (fallback && /^\d{4}-\d{2}-\d{2}$/.test(fallback)) {
    return { date: fallback, raw: null };
  }
  return { date: null, raw: null };
}

// ============================================================================
// Requestor
// ============================================================================

const SALUTATION = /Dear\s+(?:Mr\.|Ms\.|Mrs\.|Dr\.)\s+([A-Z][a-z]+(?:\s+[A-Z][a-z]+)?)/;

const TITLE_PATTERNS = [
  /(?:City|County|District)\s+(?:Attorney|Counsel)/i,
  /(?:General|Chief)\s+Counsel/i,
  /(?:Assistant|Deputy)\s+(?:City|County)\s+(?:Attorney|Manager)/i,
];

export interface Requestor {
  name: string | null;
  title: string | null;
  city: string | null;
}

export function parseRequestor(text: string, metadata: RegistryMetadata = {}): Requestor {
  const head = text.slice(0, REQUESTOR_SEARCH_CHARS);

  const salutation = SALUTATION.exec(head);
  let title: string | null = null;
  for (const pattern of TITLE_PATTERNS) {
    const m = pattern.exec(head);
    if (m) {
      title = m[0];
      break;
    }
  }

  return {
    name: salutation ? salutation[1] : metadata.requestorName ?? null,
    title,
    city: metadata.city ?? null,
  };
}

// ============================================================================
// Document type
// ============================================================================

const WITHDRAWAL_PATTERNS = [
  /WITHDRAW(?:N|AL|ING)\s+(?:YOUR|THE|THIS)\s+REQUEST/,
  /DECLINE\s+TO\s+(?:ISSUE|PROVIDE)/,
  /REQUEST\s+(?:HAS\s+BEEN|IS)\s+WITHDRAW/,
  /WITHDRAWAL\s+OF\s+(?:YOUR\s+)?REQUEST/,
];

const PREFIX_TYPES: Record<LetterPrefix, DocumentType> = {
  A: 'advice_letter',
  I: 'informal_advice',
  M: 'opinion',
};

export function determineDocumentType(text: string, documentId: string): DocumentType {
  const head = text.slice(0, TYPE_SEARCH_CHARS).toUpperCase();
  if (WITHDRAWAL_PATTERNS.some((p) => p.test(head))) {
    return 'correspondence';
  }

  const core = parseIdentifierCore(documentId);
  if (core?.prefix) {
    return PREFIX_TYPES[core.prefix];
  }

  if (head.includes('INFORMAL ASSISTANCE')) return 'informal_advice';
  if (head.includes('FORMAL OPINION')) return 'opinion';
  return 'advice_letter';
}

// ============================================================================
// Embedding content
// ============================================================================

export interface EmbeddingContent {
  qa_text: string;
  qa_source: 'extracted' | 'synthetic' | 'mixed';
  first_500_words: string;
  summary: string | null;
}

export interface SyntheticSections {
  question_synthetic: string | null;
  conclusion_synthetic: string | null;
  summary: string | null;
}

export function firstWords(text: string, count: number = EMBEDDING_WORDS): string {
  return splitWords(text).slice(0, count).join(' ');
}

/**
 * Verbatim sections win over synthetic ones. With neither, the opening of
 * the letter stands in for the question/answer text.
 */
export function buildEmbeddingContent(
  fullText: string,
  sections: Pick<SectionResult, 'question' | 'conclusion'>,
  synthetic: SyntheticSections = { question_synthetic: null, conclusion_synthetic: null, summary: null }
): EmbeddingContent {
  const first500 = firstWords(fullText);

  const question = sections.question ?? synthetic.question_synthetic;
  const conclusion = sections.conclusion ?? synthetic.conclusion_synthetic;

  const parts: string[] = [];
  if (question) parts.push(`QUESTION: ${cleanSectionContent(question)}`);
  if (conclusion) parts.push(`CONCLUSION: ${cleanSectionContent(conclusion)}`);

  const usedSynthetic =
    (!sections.question && Boolean(synthetic.question_synthetic)) ||
    (!sections.conclusion && Boolean(synthetic.conclusion_synthetic));
  const usedExtracted = Boolean(sections.question) || Boolean(sections.conclusion);

  let qaSource: EmbeddingContent['qa_source'] = 'extracted';
  if (usedSynthetic) qaSource = usedExtracted ? 'mixed' : 'synthetic';

  return {
    qa_text: parts.length > 0 ? parts.join('\n\n') : first500,
    qa_source: qaSource,
    first_500_words: first500,
    summary: synthetic.summary,
  };
}
