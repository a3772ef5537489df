/**
 * Dual-Gate Safety Filter - Types
 */

import type { AllergenMatch, AllergenMatcher } from '@/src/lib/allergens/allergenMatcher';
import type { GenerativeTextService } from '@/src/lib/ai/generative.types';

/**
 * Candidate recommendation as returned by the candidate source
 */
export type Candidate = {
  id?: string;
  name: string;
  brand?: string;
  /** Parsed list, or the raw label text */
  ingredients: string[] | string;
  categories?: string[];
};

export type SafetyGate = 'rule_based' | 'llm_check';

export type RuleBasedViolation = {
  gate: 'rule_based';
  product: string;
  candidate: Candidate;
  /** All matches, in ingredient order; first one mirrored below */
  matches: AllergenMatch[];
  matchedIngredient: string;
  matchedAllergen: string;
  matchType: AllergenMatch['matchType'];
};

export type LlmCheckViolation = {
  gate: 'llm_check';
  product: string;
  candidate: Candidate;
  /** The model's UNSAFE line, trimmed */
  reason: string;
};

/**
 * One violation per vetoed candidate per run. Never persisted.
 */
export type Violation = RuleBasedViolation | LlmCheckViolation;

/**
 * - skipped: no Gate-1 survivors or no constraints
 * - completed: response parsed (with or without UNSAFE lines)
 * - unparseable: no SAFE/UNSAFE verdict in the response
 * - failed / timeout: service error; Gate-1 results stand
 */
export type Gate2Status = 'skipped' | 'completed' | 'unparseable' | 'failed' | 'timeout';

export type DualGateInput = {
  candidates: Candidate[];
  /** Constraint ingredients (allergen names as declared) */
  constraints: string[];
  llm: GenerativeTextService;
  timeoutMs: number;
  matcher?: AllergenMatcher;
};

export type DualGateResult = {
  survivors: Candidate[];
  violations: Violation[];
  /** candidates non-empty and nothing survived */
  allVetoed: boolean;
  gate2Status: Gate2Status;
};
