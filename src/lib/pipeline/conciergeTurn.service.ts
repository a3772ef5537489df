/**
 * Concierge Turn Service
 *
 * Runs one conversational turn through the safety core and returns the
 * context the response-generation model needs. The override check runs
 * before anything is loaded or generated.
 */

import { z } from 'zod';
import type { ChatMessage, GenerativeTextService } from '@/src/lib/ai/generative.types';
import {
  getDefaultAllergenMatcher,
  type AllergenMatcher,
} from '@/src/lib/allergens/allergenMatcher';
import { toIngredientList } from '@/src/lib/allergens/ingredientParser';
import { getConciergeConfig, type ConciergeConfig } from '@/src/lib/config/concierge.config';
import { AppError, errorMessage } from '@/src/lib/errors/app-error';
import { findIngredientInteractions } from '@/src/lib/interactions/interactionAnalyzer';
import type { InteractionTable } from '@/src/lib/interactions/interactions.schemas';
import { scheduleConversationExtraction } from '@/src/lib/memory/backgroundExtraction';
import { surfacePendingConfirmations } from '@/src/lib/memory/conflictResolver';
import { constraintIngredients, loadActiveConstraints } from '@/src/lib/memory/constraintStore';
import { detectUserFacts } from '@/src/lib/memory/factDetection';
import { storeDetectedFacts } from '@/src/lib/memory/factIngestion';
import { userFactsNamespace, type LongTermFactStore } from '@/src/lib/memory/factStore.types';
import { storedFactSchema } from '@/src/lib/memory/memory.schemas';
import {
  createOverrideDetector,
  OVERRIDE_REFUSAL,
  type OverrideDetector,
} from '@/src/lib/override/overrideDetector';
import { runDualGateFilter } from '@/src/lib/safety-filter/dualGateFilter';
import type { Candidate } from '@/src/lib/safety-filter/safetyFilter.types';
import { computeSafetyScore, type SafetyIndexTable } from '@/src/lib/safety-index/safetyIndex';
import type { ExtractionTaskQueue } from '@/src/lib/tasks/extractionTaskQueue';
import { withTimeout } from '@/src/lib/utils/withTimeout';
import { classifyIntent } from './intentClassifier';
import { nextStage } from './pipelineRouter';
import { createPipelineState, enterStage, reducePipelineState } from './pipelineState.reducer';
import { extractSearchQuery } from './searchIntent';
import type {
  AnnotatedCandidate,
  CandidateSource,
  PipelineStage,
  PipelineState,
  StageOutput,
  TurnInput,
  TurnResult,
} from './pipeline.types';

const turnInputSchema = z.object({
  userId: z.string().trim().min(1, 'userId is required'),
  message: z.string().trim().min(1, 'message is required'),
});

/** Facts loaded into the response context per turn */
export const MEMORY_CONTEXT_LIMIT = 10;

export type ConciergeTurnConfig = Pick<
  ConciergeConfig,
  'llmTimeoutMs' | 'storeTimeoutMs' | 'constraintLoadPolicy' | 'candidateLimit' | 'extractionDelayMs'
>;

export type ConciergeTurnDeps = {
  store: LongTermFactStore;
  llm: GenerativeTextService;
  candidateSource: CandidateSource;
  /** Defaults to the env config */
  config?: ConciergeTurnConfig;
  matcher?: AllergenMatcher;
  overrideDetector?: OverrideDetector;
  interactionTable?: InteractionTable;
  safetyIndexTable?: SafetyIndexTable;
  /** Background extraction runs only when a queue is given */
  extractionQueue?: ExtractionTaskQueue;
};

/**
 * Attach interaction warnings and the safety index to a survivor
 */
export function annotateCandidate(
  candidate: Candidate,
  tables: { interactionTable?: InteractionTable; safetyIndexTable?: SafetyIndexTable } = {},
): AnnotatedCandidate {
  const ingredients = toIngredientList(candidate.ingredients);
  const { score, flags } = computeSafetyScore(ingredients, tables.safetyIndexTable);
  return {
    ...candidate,
    interactions: findIngredientInteractions(ingredients, tables.interactionTable),
    safetyScore: score,
    safetyFlags: flags,
  };
}

export class ConciergeTurnService {
  private readonly config: ConciergeTurnConfig;
  private readonly matcher: AllergenMatcher;
  private readonly overrideDetector: OverrideDetector;

  constructor(private readonly deps: ConciergeTurnDeps) {
    this.config = deps.config ?? getConciergeConfig();
    this.matcher = deps.matcher ?? getDefaultAllergenMatcher();
    this.overrideDetector = deps.overrideDetector ?? createOverrideDetector();
  }

  async handleTurn(input: TurnInput): Promise<TurnResult> {
    const { userId, message } = input;

    const validated = turnInputSchema.safeParse({ userId, message });
    if (!validated.success) {
      throw new AppError(
        'VALIDATION_ERROR',
        `Invalid turn input: ${validated.error.issues.map((i) => i.message).join('; ')}`,
      );
    }

    // Step 1: Override check (no store or model call before this)
    const override = this.overrideDetector.detect(message);
    if (override.isOverride) {
      console.warn('[ConciergeTurn] Override attempt refused', {
        userId,
        category: override.category,
      });
      return { kind: 'override_refused', response: OVERRIDE_REFUSAL, category: override.category };
    }

    // Step 2: Memory (constraints, facts, pending confirmations)
    let state = createPipelineState(userId, message);
    state = reducePipelineState(state, await this.loadMemory(userId));

    // Step 3: Intent classification and routing
    state = enterStage(state, 'intent_classification');
    state = reducePipelineState(state, {
      kind: 'intent_classified',
      intent: await classifyIntent(this.deps.llm, message, this.config.llmTimeoutMs),
    });

    let stage: PipelineStage = nextStage('intent_classification', state.intent);
    while (stage !== 'response') {
      if (stage === 'discovery' && state.constraintsUnavailable) {
        console.warn('[ConciergeTurn] Constraints unavailable, skipping recommendations', { userId });
        break;
      }
      state = await this.runStage(enterStage(state, stage), stage);
      stage = nextStage(stage, state.intent);
    }
    state = enterStage(state, 'response');

    // Step 4: Facts stated in this message
    state = reducePipelineState(state, {
      kind: 'facts_ingested',
      notifications: await this.ingestFacts(userId, message),
    });

    // Step 5: Background extraction after the conversation goes quiet
    if (this.deps.extractionQueue && input.conversationId) {
      const messages: ChatMessage[] = [...(input.history ?? []), { role: 'user', content: message }];
      scheduleConversationExtraction(
        this.deps.extractionQueue,
        input.conversationId,
        this.config.extractionDelayMs,
        {
          store: this.deps.store,
          llm: this.deps.llm,
          userId,
          messages,
          timeoutMs: this.config.llmTimeoutMs,
        },
      );
    }

    return {
      kind: 'context',
      intent: state.intent,
      stages: state.stages,
      survivors: state.survivors,
      violations: state.violations,
      allVetoed: state.allVetoed,
      gate2Status: state.gate2Status,
      conflictPrompt: state.conflictPrompt,
      memoryContext: state.memoryContext,
      notifications: state.notifications,
      constraintsUnavailable: state.constraintsUnavailable,
    };
  }

  private async runStage(state: PipelineState, stage: PipelineStage): Promise<PipelineState> {
    switch (stage) {
      case 'pre_filter':
        return reducePipelineState(state, {
          kind: 'constraints_expanded',
          expandedConstraints: this.matcher.expandAllergens(state.constraints),
        });

      case 'discovery': {
        const searchQuery = await extractSearchQuery(
          this.deps.llm,
          state.message,
          this.config.llmTimeoutMs,
        );
        return reducePipelineState(state, {
          kind: 'candidates_fetched',
          searchQuery,
          candidates: await this.fetchCandidates(state.userId, searchQuery, state.expandedConstraints),
        });
      }

      case 'post_filter': {
        const result = await runDualGateFilter({
          candidates: state.candidates,
          constraints: state.expandedConstraints,
          llm: this.deps.llm,
          timeoutMs: this.config.llmTimeoutMs,
          matcher: this.matcher,
        });
        const tables = {
          interactionTable: this.deps.interactionTable,
          safetyIndexTable: this.deps.safetyIndexTable,
        };
        return reducePipelineState(state, {
          kind: 'candidates_filtered',
          survivors: result.survivors.map((candidate) => annotateCandidate(candidate, tables)),
          violations: result.violations,
          allVetoed: result.allVetoed,
          gate2Status: result.gate2Status,
        });
      }

      case 'intent_classification':
      case 'response':
        return state;
    }
  }

  private async loadMemory(
    userId: string,
  ): Promise<Extract<StageOutput, { kind: 'memory_loaded' }>> {
    const { store } = this.deps;
    const { storeTimeoutMs } = this.config;

    const loaded = await loadActiveConstraints(
      store,
      userId,
      this.config.constraintLoadPolicy,
      storeTimeoutMs,
    );

    let memoryContext: string[] = [];
    try {
      const items = await withTimeout(
        store.search(userFactsNamespace(userId), { limit: MEMORY_CONTEXT_LIMIT }),
        storeTimeoutMs,
        'fact-load',
      );
      memoryContext = items.flatMap((item) => {
        const fact = storedFactSchema.safeParse(item.value);
        return fact.success ? [fact.data.content] : [];
      });
    } catch (error) {
      console.warn('[ConciergeTurn] Failed to load user facts', { userId, error: errorMessage(error) });
    }

    let conflictPrompt = '';
    try {
      const surfaced = await withTimeout(
        surfacePendingConfirmations(store, userId),
        storeTimeoutMs,
        'confirmation-load',
      );
      conflictPrompt = surfaced.prompt;
    } catch (error) {
      console.warn('[ConciergeTurn] Failed to surface pending confirmations', {
        userId,
        error: errorMessage(error),
      });
    }

    return {
      kind: 'memory_loaded',
      constraints: constraintIngredients(loaded.constraints),
      constraintsUnavailable: loaded.status === 'unavailable',
      memoryContext,
      conflictPrompt,
    };
  }

  private async fetchCandidates(
    userId: string,
    query: string,
    excludeIngredients: string[],
  ): Promise<Candidate[]> {
    try {
      return await withTimeout(
        this.deps.candidateSource.fetchCandidates({
          query,
          excludeIngredients,
          limit: this.config.candidateLimit,
        }),
        this.config.storeTimeoutMs,
        'candidate-fetch',
      );
    } catch (error) {
      console.error('[ConciergeTurn] Candidate fetch failed', { userId, error: errorMessage(error) });
      return [];
    }
  }

  private async ingestFacts(userId: string, message: string): Promise<string[]> {
    const facts = detectUserFacts(message);
    if (facts.length === 0) return [];

    try {
      const notifications = await storeDetectedFacts(this.deps.store, userId, facts);
      console.info('[ConciergeTurn] User facts stored', { userId, count: facts.length });
      return notifications;
    } catch (error) {
      console.error('[ConciergeTurn] Failed to store user facts', { userId, error: errorMessage(error) });
      return [];
    }
  }
}
