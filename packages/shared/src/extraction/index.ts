export { ExtractionOrchestrator, selectBest, type OrchestratorOptions } from './orchestrator';
export {
  resolveDocumentId,
  recoverLetterId,
  placeholderId,
  hashedPlaceholderId,
  isPlaceholderId,
  type ResolvedId,
  type StoredIdentity,
} from './identifier';
