export { sequenceRatio, matchingBlocks, type MatchingBlock } from './sequence-matcher';
export {
  verify,
  nativeTrusted,
  replacedAssessment,
  canaryScore,
  normalizeForComparison,
  detectDescriptionMode,
  descriptionModePages,
  tierForScore,
  fidelityThresholdsFromConfig,
  type FidelityThresholds,
} from './verifier';
export { STANDARD_TRANSCRIPTION_PROMPT, CONSTRAINED_TRANSCRIPTION_PROMPT } from './prompts';
