/**
 * Quality Scorer
 *
 * Scores extracted text in [0, 1] without ground truth. Five positively
 * oriented sub-scores (density, character cleanliness, structural word
 * validity, dictionary validity, expected content markers) are mapped through
 * calibration curves and combined with fixed weights. Dictionary validity
 * carries the largest weight: it is the only signal that catches plausible
 * looking character substitutions ("Califomia", "poritical").
 *
 * Pure and deterministic; empty text or a non-positive page count scores 0.
 */

import { config } from '../config';
import type { EscalationReason } from '../types';
import {
  piecewiseLinear,
  DENSITY_CURVE,
  CHAR_CURVE,
  WORD_CURVE,
  DICTIONARY_CURVE,
  QUALITY_WEIGHTS,
  DENSITY_GATE,
} from './curves';
import { loadDictionary } from './dictionary';

export interface QualityMetrics {
  total_chars: number;
  total_words: number;
  page_count: number;
  words_per_page: number;
  alpha_ratio: number;

  density_score: number;
  char_quality_score: number;
  word_quality_score: number;
  dict_score: number;
  content_score: number;

  final_score: number;

  has_date_pattern: boolean;
  has_regulator_mention: boolean;
  has_section_headers: boolean;
  garbage_word_count: number;
  non_latin_word_count: number;
  dict_miss_ratio: number;
}

export interface ScoreOptions {
  /** Overrides the bundled word list */
  dictionary?: ReadonlySet<string>;
}

const STRIP_CHARS = '.,;:!?()[]{}"\'-/';
const DICTIONARY_SAMPLE_SIZE = 200;
const DICTIONARY_MIN_WORDS = 10;

// Cyrillic, CJK, Hangul, Arabic, Devanagari, fullwidth forms, kana
const RE_NON_LATIN =
  /[\u0400-\u04FF\u3000-\u9FFF\uF900-\uFAFF\uAC00-\uD7AF\u0600-\u06FF\u0900-\u097F\uFF00-\uFFEF\u3040-\u309F\u30A0-\u30FF]/;
const RE_REPEATED_CHARS = /(.)\1{3,}/;
const RE_CONSONANT_CLUSTER = /[bcdfghjklmnpqrstvwxz]{5,}/;
const RE_HAS_VOWEL = /[aeiouy]/i;
const RE_LETTER = /\p{L}/u;
const RE_NON_PRINTABLE_OR_SPACE = /[\s\p{C}]/u;
const RE_DICT_SPECIAL = /[@#$%&*=+<>]/;

const DATE_PATTERNS = [
  /\b(?:January|February|March|April|May|June|July|August|September|October|November|December)\s+\d{1,2},?\s+\d{4}\b/i,
  /\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/,
];

const REGULATOR_PATTERNS = [/\bFPPC\b/, /FAIR\s+POLITICAL\s+PRACTICES\s+COMMISSION/, /POLITICAL\s+REFORM\s+ACT/];

const HEADER_WORD_PATTERNS = [/\bQUESTION\b/, /\bCONCLUSION\b/, /\bFACTS\b/, /\bANALYSIS\b/, /\bSHORT\s+ANSWER\b/];

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

export function stripChars(word: string, chars: string = STRIP_CHARS): string {
  let start = 0;
  let end = word.length;
  while (start < end && chars.includes(word[start])) start++;
  while (end > start && chars.includes(word[end - 1])) end--;
  return word.slice(start, end);
}

function isNumberToken(token: string, separators: RegExp): boolean {
  return /^\d+$/.test(token.replace(separators, ''));
}

function densityScore(wordsPerPage: number): number {
  return piecewiseLinear(wordsPerPage, DENSITY_CURVE);
}

function charQuality(text: string): { score: number; alphaRatio: number } {
  let alpha = 0;
  let printable = 0;
  for (const c of text) {
    if (RE_LETTER.test(c)) alpha++;
    if (!RE_NON_PRINTABLE_OR_SPACE.test(c)) printable++;
  }
  if (printable === 0) return { score: 0, alphaRatio: 0 };

  const alphaRatio = alpha / printable;
  return { score: piecewiseLinear(alphaRatio, CHAR_CURVE), alphaRatio };
}

/**
 * Structural garbage check for one token. Returns 'non_latin' separately so
 * the caller can count script corruption on its own.
 */
export function classifyWord(word: string): 'ok' | 'garbage' | 'non_latin' {
  const clean = stripChars(word);
  if (clean.length <= 2) return 'ok';

  if (RE_NON_LATIN.test(clean)) return 'non_latin';

  if (clean.length > 25) {
    const isLink = /^(?:https?:\/\/|www\.)/.test(clean) || clean.includes('@');
    if (!isLink) return 'garbage';
  }

  if (!RE_HAS_VOWEL.test(clean) && !isNumberToken(clean, /[-.]/g)) return 'garbage';
  if (RE_REPEATED_CHARS.test(clean)) return 'garbage';
  if (RE_CONSONANT_CLUSTER.test(clean.toLowerCase())) return 'garbage';

  return 'ok';
}

function wordQuality(words: string[]): { score: number; garbage: number; nonLatin: number } {
  if (words.length === 0) return { score: 0, garbage: 0, nonLatin: 0 };

  let garbage = 0;
  let nonLatin = 0;
  for (const word of words) {
    const verdict = classifyWord(word);
    if (verdict === 'non_latin') {
      nonLatin++;
      garbage++;
    } else if (verdict === 'garbage') {
      garbage++;
    }
  }

  const validRatio = 1 - garbage / words.length;
  return { score: piecewiseLinear(validRatio, WORD_CURVE), garbage, nonLatin };
}

function sampleEvenly(words: string[], size: number): string[] {
  if (words.length <= size) return words;
  const step = words.length / size;
  const sample: string[] = [];
  for (let i = 0; i < size; i++) {
    sample.push(words[Math.floor(i * step)]);
  }
  return sample;
}

function dictionaryScore(words: string[], dictionary: ReadonlySet<string>): { score: number; missRatio: number } {
  if (dictionary.size === 0) return { score: 1, missRatio: 0 };
  if (words.length < DICTIONARY_MIN_WORDS) return { score: 0.5, missRatio: 0.5 };

  let checked = 0;
  let misses = 0;
  for (const word of sampleEvenly(words, DICTIONARY_SAMPLE_SIZE)) {
    const clean = stripChars(word).toLowerCase();
    if (!clean) continue;
    if (isNumberToken(clean, /[-.,]/g)) continue;
    if (clean.length <= 2) continue;
    if (RE_DICT_SPECIAL.test(clean)) continue;

    checked++;
    if (!dictionary.has(clean)) misses++;
  }

  if (checked === 0) return { score: 0.5, missRatio: 0.5 };

  const missRatio = misses / checked;
  return { score: piecewiseLinear(1 - missRatio, DICTIONARY_CURVE), missRatio };
}

function contentScore(text: string): { score: number; hasDate: boolean; hasRegulator: boolean; hasSections: boolean } {
  const upper = text.toUpperCase();
  const hasDate = DATE_PATTERNS.some((p) => p.test(text));
  const hasRegulator = REGULATOR_PATTERNS.some((p) => p.test(upper));
  const hasSections = HEADER_WORD_PATTERNS.filter((p) => p.test(upper)).length >= 2;

  let score = 0;
  if (hasDate) score += 0.33;
  if (hasRegulator) score += 0.34;
  if (hasSections) score += 0.33;

  return { score, hasDate, hasRegulator, hasSections };
}

function emptyMetrics(pageCount: number): QualityMetrics {
  return {
    total_chars: 0,
    total_words: 0,
    page_count: pageCount,
    words_per_page: 0,
    alpha_ratio: 0,
    density_score: 0,
    char_quality_score: 0,
    word_quality_score: 0,
    dict_score: 0,
    content_score: 0,
    final_score: 0,
    has_date_pattern: false,
    has_regulator_mention: false,
    has_section_headers: false,
    garbage_word_count: 0,
    non_latin_word_count: 0,
    dict_miss_ratio: 1,
  };
}

export function scoreQuality(text: string, pageCount: number, options: ScoreOptions = {}): QualityMetrics {
  if (!text || pageCount <= 0) {
    return emptyMetrics(pageCount);
  }

  const words = splitWords(text);
  const wordsPerPage = words.length / pageCount;

  const density = densityScore(wordsPerPage);
  const chars = charQuality(text);
  const wordCheck = wordQuality(words);
  const dict = dictionaryScore(words, options.dictionary ?? loadDictionary());
  const content = contentScore(text);

  let finalScore =
    QUALITY_WEIGHTS.density * density +
    QUALITY_WEIGHTS.char * chars.score +
    QUALITY_WEIGHTS.word * wordCheck.score +
    QUALITY_WEIGHTS.dictionary * dict.score +
    QUALITY_WEIGHTS.content * content.score;

  // Near-empty documents must not score well on the other axes
  if (density < DENSITY_GATE) {
    finalScore *= density / DENSITY_GATE;
  }

  return {
    total_chars: text.length,
    total_words: words.length,
    page_count: pageCount,
    words_per_page: wordsPerPage,
    alpha_ratio: chars.alphaRatio,
    density_score: density,
    char_quality_score: chars.score,
    word_quality_score: wordCheck.score,
    dict_score: dict.score,
    content_score: content.score,
    final_score: Math.min(1, Math.max(0, finalScore)),
    has_date_pattern: content.hasDate,
    has_regulator_mention: content.hasRegulator,
    has_section_headers: content.hasSections,
    garbage_word_count: wordCheck.garbage,
    non_latin_word_count: wordCheck.nonLatin,
    dict_miss_ratio: dict.missRatio,
  };
}

// ============================================================================
// Escalation
// ============================================================================

export interface EscalationSettings {
  yearThreshold: number;
  qualityFloor: number;
  minWordsPerPage: number;
  minAlphaRatio: number;
  maxGarbageWords: number;
}

export function escalationSettingsFromConfig(): EscalationSettings {
  return {
    yearThreshold: config.ocrYearThreshold,
    qualityFloor: config.ocrQualityFloor,
    minWordsPerPage: config.ocrMinWordsPerPage,
    minAlphaRatio: config.ocrMinAlphaRatio,
    maxGarbageWords: config.ocrMaxGarbageWords,
  };
}

/**
 * Reasons to escalate past the text layer. An empty list means the cheaper
 * result is good enough.
 */
export function escalationReasons(
  year: number | null,
  metrics: QualityMetrics,
  settings: EscalationSettings = escalationSettingsFromConfig()
): EscalationReason[] {
  const reasons: EscalationReason[] = [];
  if (year !== null && year < settings.yearThreshold) reasons.push('pre_threshold_year');
  if (metrics.final_score < settings.qualityFloor) reasons.push('low_quality');
  if (metrics.words_per_page < settings.minWordsPerPage) reasons.push('low_density');
  if (metrics.alpha_ratio < settings.minAlphaRatio) reasons.push('low_alpha_ratio');
  if (metrics.garbage_word_count > settings.maxGarbageWords) reasons.push('garbage_words');
  return reasons;
}
