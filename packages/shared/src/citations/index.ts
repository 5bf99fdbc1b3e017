export { extractCitations, normalizeCitation, baseSectionNumber, emptyCitationSet, citationCount } from './extractor';
export { filterSelfCitations, filterCoRecipients, headerFileNumbers, type CoRecipientResult } from './self-citation';
export {
  parseIdentifierCore,
  identifierVariants,
  normalizePriorDecision,
  buildVariantLookup,
  LETTER_PREFIXES,
  type LetterPrefix,
  type IdentifierCore,
} from './identifiers';
export { buildCitationGraph, type GraphDocument, type GraphResult, type GraphStats } from './graph';
export { FILE_NUMBER_PATTERN, STATUTE_RANGE, REGULATION_RANGE } from './patterns';
