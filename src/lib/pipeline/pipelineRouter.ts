/**
 * Pipeline Router
 *
 * intent_classification -> pre_filter -> discovery -> post_filter -> response
 * for product-relevant intents; straight to response otherwise.
 */

import { PIPELINE_INTENTS, type Intent, type PipelineStage } from './pipeline.types';

export const SAFETY_PATH_INTENTS: ReadonlySet<Intent> = new Set<Intent>([
  'product_search',
  'ingredient_check',
  'routine_advice',
]);

export function requiresSafetyPath(intent: Intent): boolean {
  return SAFETY_PATH_INTENTS.has(intent);
}

function isIntent(value: string): value is Intent {
  return PIPELINE_INTENTS.some((intent) => intent === value);
}

/**
 * Map raw classifier output to the intent vocabulary. Anything else is
 * general_chat: no recommendations, never an error.
 */
export function parseIntent(raw: string): Intent {
  const label = raw
    .trim()
    .toLowerCase()
    .replace(/^["'`*\s]+|["'`*.\s]+$/g, '');
  if (isIntent(label)) return label;

  console.warn('[PipelineRouter] Unknown intent, defaulting to general_chat', { raw });
  return 'general_chat';
}

/**
 * Pure transition function. `response` is terminal.
 */
export function nextStage(stage: PipelineStage, intent: Intent): PipelineStage {
  if (!requiresSafetyPath(intent)) return 'response';

  switch (stage) {
    case 'intent_classification':
      return 'pre_filter';
    case 'pre_filter':
      return 'discovery';
    case 'discovery':
      return 'post_filter';
    case 'post_filter':
    case 'response':
      return 'response';
  }
}

/**
 * Every stage a turn with this intent passes through
 */
export function stagePlan(intent: Intent): PipelineStage[] {
  const plan: PipelineStage[] = ['intent_classification'];
  let stage: PipelineStage = 'intent_classification';
  while (stage !== 'response') {
    stage = nextStage(stage, intent);
    plan.push(stage);
  }
  return plan;
}
