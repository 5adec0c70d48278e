/**
 * Classification and message synthesis module
 */

export { classifyChangeSet, inferScopes, isSmallModification, MULTI_SCOPE, AMBIGUITY_PENALTY } from './heuristics';
export { calculateAdditionRatio, findDominantHunk } from './pattern-detector';
export {
  draftMessage,
  synthesize,
  validateMessage,
  deriveConstraints,
  extractIdentifier,
  truncateWords,
  SUMMARY_PLACEHOLDER,
  BODY_PLACEHOLDER,
  type DraftMessage,
  type SynthesisConstraints,
  type ValidateContext,
} from './message-synthesizer';
