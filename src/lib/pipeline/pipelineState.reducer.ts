/**
 * Pipeline State Reducer
 *
 * Merge rules, per field:
 * - append: violations, notifications, memoryContext
 * - overwrite: everything else a stage output carries
 */

import type { PipelineStage, PipelineState, StageOutput } from './pipeline.types';

export function createPipelineState(userId: string, message: string): PipelineState {
  return {
    userId,
    message,
    intent: 'general_chat',
    stages: [],
    constraints: [],
    constraintsUnavailable: false,
    expandedConstraints: [],
    searchQuery: null,
    candidates: [],
    survivors: [],
    violations: [],
    allVetoed: false,
    gate2Status: 'skipped',
    memoryContext: [],
    conflictPrompt: '',
    notifications: [],
  };
}

export function enterStage(state: PipelineState, stage: PipelineStage): PipelineState {
  return { ...state, stages: [...state.stages, stage] };
}

export function reducePipelineState(state: PipelineState, output: StageOutput): PipelineState {
  switch (output.kind) {
    case 'memory_loaded':
      return {
        ...state,
        constraints: output.constraints,
        constraintsUnavailable: output.constraintsUnavailable,
        memoryContext: [...state.memoryContext, ...output.memoryContext],
        conflictPrompt: output.conflictPrompt,
      };
    case 'intent_classified':
      return { ...state, intent: output.intent };
    case 'constraints_expanded':
      return { ...state, expandedConstraints: output.expandedConstraints };
    case 'candidates_fetched':
      return { ...state, searchQuery: output.searchQuery, candidates: output.candidates };
    case 'candidates_filtered':
      return {
        ...state,
        survivors: output.survivors,
        violations: [...state.violations, ...output.violations],
        allVetoed: output.allVetoed,
        gate2Status: output.gate2Status,
      };
    case 'facts_ingested':
      return { ...state, notifications: [...state.notifications, ...output.notifications] };
    default: {
      const unhandled: never = output;
      throw new Error(`Unhandled stage output: ${JSON.stringify(unhandled)}`);
    }
  }
}
