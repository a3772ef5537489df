/**
 * Concierge safety core - public API
 */

// Turn orchestration
export { ConciergeTurnService, annotateCandidate } from './pipeline/conciergeTurn.service';
export type { ConciergeTurnConfig, ConciergeTurnDeps } from './pipeline/conciergeTurn.service';
export { nextStage, parseIntent, requiresSafetyPath, stagePlan } from './pipeline/pipelineRouter';
export { createPipelineState, reducePipelineState } from './pipeline/pipelineState.reducer';
export { classifyIntent } from './pipeline/intentClassifier';
export { extractSearchQuery, parseSearchIntent, buildSearchQuery } from './pipeline/searchIntent';
export { buildResponseContext, buildResponseSystemPrompt } from './pipeline/responseContext';
export type {
  AnnotatedCandidate,
  CandidateSource,
  Intent,
  PipelineStage,
  PipelineState,
  StageOutput,
  TurnContext,
  TurnInput,
  TurnResult,
} from './pipeline/pipeline.types';

// Safety
export {
  createAllergenMatcher,
  getDefaultAllergenMatcher,
  expandAllergens,
  findAllergenMatches,
  getAllergenGroup,
} from './allergens/allergenMatcher';
export type { AllergenMatch, AllergenMatcher } from './allergens/allergenMatcher';
export { loadAllergenOntology, getBundledAllergenOntology } from './allergens/allergenOntology.loader';
export { parseIngredients, normalizeIngredient, toIngredientList } from './allergens/ingredientParser';
export { runDualGateFilter, parseGate2Response } from './safety-filter/dualGateFilter';
export type {
  Candidate,
  DualGateResult,
  Gate2Status,
  Violation,
} from './safety-filter/safetyFilter.types';
export {
  createOverrideDetector,
  detectOverrideAttempt,
  isOverrideAttempt,
  OVERRIDE_REFUSAL,
} from './override/overrideDetector';
export {
  findIngredientInteractions,
  findAsymmetricPairs,
  loadInteractionTable,
} from './interactions/interactionAnalyzer';
export type { InteractionWarning } from './interactions/interactions.schemas';
export { computeSafetyScore, loadSafetyIndexTable } from './safety-index/safetyIndex';
export type { SafetyFlag, SafetyScore } from './safety-index/safetyIndex';

// Memory
export type { LongTermFactStore, MemoryItem, MemoryNamespace } from './memory/factStore.types';
export { InMemoryFactStore } from './memory/inMemoryFactStore';
export { SupabaseFactStore } from './memory/supabaseFactStore';
export {
  loadActiveConstraints,
  addConstraint,
  deleteConstraint,
} from './memory/constraintStore';
export type { ConstraintLoadResult } from './memory/constraintStore';
export {
  checkAndStoreConflict,
  loadPendingConfirmations,
  formatConflictPrompt,
  resolveConflict,
  surfacePendingConfirmations,
} from './memory/conflictResolver';
export { detectUserFacts } from './memory/factDetection';
export { storeDetectedFacts } from './memory/factIngestion';
export {
  extractConversationFacts,
  scheduleConversationExtraction,
} from './memory/backgroundExtraction';
export { ExtractionTaskQueue } from './tasks/extractionTaskQueue';

// Ambient
export { AppError } from './errors/app-error';
export type { AppErrorCode } from './errors/app-error';
export { getConciergeConfig, parseConciergeConfig } from './config/concierge.config';
export type { ConciergeConfig } from './config/concierge.config';
export { GeminiClient, getGeminiClient } from './ai/gemini/gemini.client';
export type { GenerativeTextService, ChatMessage } from './ai/generative.types';
export { createAdminClient } from './supabase/admin';
