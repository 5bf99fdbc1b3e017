export {
  parseLetterDate,
  fixOcrYear,
  expandYear,
  monthNumber,
  parseRequestor,
  determineDocumentType,
  buildEmbeddingContent,
  firstWords,
  MIN_LETTER_YEAR,
  MAX_LETTER_YEAR,
  type LetterDate,
  type Requestor,
  type EmbeddingContent,
  type SyntheticSections,
} from './parse';
