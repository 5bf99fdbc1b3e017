/**
 * Section Parser
 *
 * Extracts QUESTION / CONCLUSION / FACTS / ANALYSIS spans from trusted text.
 *
 * 1. Boilerplate is stripped from the whole text first, so that removing a
 *    footnote can never merge two neighbouring sections.
 * 2. Header patterns are tried in priority order; the first match per section
 *    type is kept.
 * 3. Each section runs from the end of its header to the next header, or to
 *    the first closing phrase after it.
 * 4. Validation (minimum words, question before conclusion) lowers confidence
 *    and is reported in the notes; it never throws.
 */

import type { SectionResult, SectionType } from '../types';
import { config } from '../config';
import { BOILERPLATE_PATTERNS, DOCUMENT_END_PATTERNS, SECTION_PATTERNS, type FormatEra } from './patterns';

export interface SectionParseOptions {
  minSectionWords?: number;
}

interface SectionMatch {
  section: SectionType;
  headerStart: number;
  headerEnd: number;
  era: FormatEra;
}

const END_PATTERNS_GLOBAL = DOCUMENT_END_PATTERNS.map((p) => new RegExp(p.source, 'gi'));

function emptyResult(notes: string | null): SectionResult {
  return {
    question: null,
    conclusion: null,
    facts: null,
    analysis: null,
    extraction_method: 'none',
    extraction_confidence: 0,
    has_standard_format: false,
    parsing_notes: notes,
  };
}

function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

export function containsSectionHeader(text: string): boolean {
  return SECTION_PATTERNS.some(({ pattern }) => pattern.test(text));
}

/**
 * Remove boilerplate from the full text. Each removed span becomes a line
 * break; a span that would take a section header with it is left alone.
 */
export function stripBoilerplate(text: string): string {
  let result = text;
  for (const pattern of BOILERPLATE_PATTERNS) {
    result = result.replace(pattern, (span: string) => (containsSectionHeader(span) ? span : '\n'));
  }
  return result;
}

export function cleanSectionContent(content: string): string {
  if (!content) return '';

  let cleaned = content
    .replace(/\f/g, '\n')
    .replace(/\n[ \t]*-?\d+-[ \t]*\n/g, '\n')
    .replace(/\n[ \t]*Page \d+ of \d+[ \t]*\n/gi, '\n');

  for (const pattern of BOILERPLATE_PATTERNS) {
    cleaned = cleaned.replace(pattern, '');
  }

  return cleaned
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .replace(/\n{4,}/g, '\n\n\n')
    .trim();
}

function findSectionMatches(text: string): SectionMatch[] {
  const matches: SectionMatch[] = [];
  const seen = new Set<SectionType>();

  for (const { pattern, section, era } of SECTION_PATTERNS) {
    if (seen.has(section)) continue;

    const match = pattern.exec(text);
    if (match) {
      matches.push({
        section,
        headerStart: match.index,
        headerEnd: match.index + match[0].length,
        era,
      });
      seen.add(section);
    }
  }

  return matches.sort((a, b) => a.headerStart - b.headerStart);
}

/**
 * Earliest closing phrase at or after the given offset. Closing phrases can
 * also appear inside quoted correspondence in the facts, hence the offset.
 */
function findDocumentEnd(text: string, after: number): number | null {
  let earliest: number | null = null;
  for (const pattern of END_PATTERNS_GLOBAL) {
    pattern.lastIndex = after;
    const match = pattern.exec(text);
    if (match && (earliest === null || match.index < earliest)) {
      earliest = match.index;
    }
  }
  return earliest;
}

function extractSections(
  text: string,
  matches: SectionMatch[],
  minWords: number
): { extracted: Map<SectionType, string>; issues: string[] } {
  const extracted = new Map<SectionType, string>();
  const issues: string[] = [];

  const question = matches.find((m) => m.section === 'question');
  const conclusion = matches.find((m) => m.section === 'conclusion');
  if (question && conclusion && conclusion.headerStart < question.headerStart) {
    issues.push('CONCLUSION appears before QUESTION');
  }

  matches.forEach((match, i) => {
    const next = matches[i + 1];
    const documentEnd = findDocumentEnd(text, match.headerEnd);

    let end = text.length;
    if (next) end = Math.min(end, next.headerStart);
    if (documentEnd !== null && documentEnd > match.headerEnd) end = Math.min(end, documentEnd);

    const content = cleanSectionContent(text.slice(match.headerEnd, end));
    const words = countWords(content);
    if (words < minWords) {
      issues.push(`${match.section.toUpperCase()} has only ${words} words`);
      return;
    }
    extracted.set(match.section, content);
  });

  return { extracted, issues };
}

/**
 * Confidence follows from which sections were found, the era of the letter
 * and the number of validation issues.
 */
export function sectionConfidence(found: ReadonlySet<SectionType>, issueCount: number, year: number | null): number {
  const hasQuestion = found.has('question');
  const hasConclusion = found.has('conclusion');
  const hasFacts = found.has('facts');
  const hasAnalysis = found.has('analysis');

  let base = 0;
  if (hasQuestion && hasConclusion) base = 0.9;
  else if (hasQuestion || hasConclusion) base = 0.6;
  else if (hasFacts || hasAnalysis) base = 0.4;

  if (hasQuestion && hasConclusion && hasFacts && hasAnalysis) {
    base = Math.min(base + 0.05, 1);
  }

  // 2000s letters get no era adjustment
  if (year !== null) {
    if (year >= 2010) base = Math.min(base + 0.05, 1);
    else if (year < 1985) base = Math.max(base - 0.15, 0);
    else if (year < 2000) base = Math.max(base - 0.05, 0);
  }

  base -= 0.1 * issueCount;
  return Math.max(0, Math.min(1, base));
}

function buildNotes(matches: SectionMatch[], extracted: Map<SectionType, string>, issues: string[]): string | null {
  const notes: string[] = [];

  if (matches.length > 0) {
    const eras = Array.from(new Set(matches.map((m) => m.era))).sort();
    notes.push(eras.length === 1 ? `Format: ${eras[0]}` : `Mixed formats: ${eras.join(', ')}`);
  }

  const skipped = matches
    .map((m) => m.section)
    .filter((s) => !extracted.has(s))
    .sort();
  if (skipped.length > 0) {
    notes.push(`Skipped (too short): ${skipped.join(', ')}`);
  }

  notes.push(...issues);
  return notes.length > 0 ? notes.join('; ') : null;
}

export function parseSections(text: string, year: number | null = null, options: SectionParseOptions = {}): SectionResult {
  if (!text || !text.trim()) {
    return emptyResult('Empty or whitespace-only input');
  }

  const minWords = options.minSectionWords ?? config.minSectionWords;
  const cleaned = stripBoilerplate(text);
  const matches = findSectionMatches(cleaned);

  if (matches.length === 0) {
    return emptyResult('No section headers found');
  }

  const { extracted, issues } = extractSections(cleaned, matches, minWords);
  const notes = buildNotes(matches, extracted, issues);

  if (extracted.size === 0) {
    return emptyResult(notes);
  }

  return {
    question: extracted.get('question') ?? null,
    conclusion: extracted.get('conclusion') ?? null,
    facts: extracted.get('facts') ?? null,
    analysis: extracted.get('analysis') ?? null,
    extraction_method: issues.length > 0 ? 'regex' : 'regex_validated',
    extraction_confidence: sectionConfidence(new Set(extracted.keys()), issues.length, year),
    has_standard_format: extracted.has('question') || extracted.has('conclusion'),
    parsing_notes: notes,
  };
}
