/**
 * Pipeline Types - stages, intents, typed stage outputs and the turn result
 */

import type { ChatMessage } from '@/src/lib/ai/generative.types';
import type { InteractionWarning } from '@/src/lib/interactions/interactions.schemas';
import type { OverrideCategory } from '@/src/lib/override/overrideDetector';
import type { SafetyFlag } from '@/src/lib/safety-index/safetyIndex';
import type {
  Candidate,
  Gate2Status,
  Violation,
} from '@/src/lib/safety-filter/safetyFilter.types';

export const PIPELINE_INTENTS = [
  'product_search',
  'ingredient_check',
  'routine_advice',
  'general_chat',
  'memory_query',
] as const;

export type Intent = (typeof PIPELINE_INTENTS)[number];

export type PipelineStage =
  | 'intent_classification'
  | 'pre_filter'
  | 'discovery'
  | 'post_filter'
  | 'response';

/**
 * Survivor of the dual gate, annotated for the response layer
 */
export type AnnotatedCandidate = Candidate & {
  interactions: InteractionWarning[];
  safetyScore: number;
  safetyFlags: SafetyFlag[];
};

/**
 * Output of one step of the turn. Each variant is merged into the
 * PipelineState by reducePipelineState.
 */
export type StageOutput =
  | {
      kind: 'memory_loaded';
      constraints: string[];
      constraintsUnavailable: boolean;
      memoryContext: string[];
      conflictPrompt: string;
    }
  | { kind: 'intent_classified'; intent: Intent }
  | { kind: 'constraints_expanded'; expandedConstraints: string[] }
  | { kind: 'candidates_fetched'; searchQuery: string; candidates: Candidate[] }
  | {
      kind: 'candidates_filtered';
      survivors: AnnotatedCandidate[];
      violations: Violation[];
      allVetoed: boolean;
      gate2Status: Gate2Status;
    }
  | { kind: 'facts_ingested'; notifications: string[] };

export type PipelineState = {
  userId: string;
  message: string;
  intent: Intent;
  /** Stages entered, in order */
  stages: PipelineStage[];
  /** Constraint ingredients as declared by the user */
  constraints: string[];
  constraintsUnavailable: boolean;
  expandedConstraints: string[];
  searchQuery: string | null;
  candidates: Candidate[];
  survivors: AnnotatedCandidate[];
  violations: Violation[];
  allVetoed: boolean;
  gate2Status: Gate2Status;
  memoryContext: string[];
  conflictPrompt: string;
  notifications: string[];
};

/**
 * External product search. `excludeIngredients` is the expanded constraint
 * list; the dual gate still checks everything returned.
 */
export interface CandidateSource {
  fetchCandidates(args: {
    query: string;
    excludeIngredients: string[];
    limit: number;
  }): Promise<Candidate[]>;
}

export type TurnInput = {
  userId: string;
  message: string;
  history?: ChatMessage[];
  /** Enables background extraction when a task queue is configured */
  conversationId?: string;
};

export type TurnContext = {
  kind: 'context';
  intent: Intent;
  stages: PipelineStage[];
  survivors: AnnotatedCandidate[];
  violations: Violation[];
  allVetoed: boolean;
  gate2Status: Gate2Status;
  conflictPrompt: string;
  memoryContext: string[];
  notifications: string[];
  constraintsUnavailable: boolean;
};

export type TurnResult =
  | { kind: 'override_refused'; response: string; category: OverrideCategory }
  | TurnContext;
