/**
 * Response context - what the response-generation model is told about
 * this turn's safety and memory outcome.
 */

import { candidateDisplayName } from '@/src/lib/safety-filter/safetyFilter.prompts';
import type { Violation } from '@/src/lib/safety-filter/safetyFilter.types';
import { requiresSafetyPath } from './pipelineRouter';
import type { AnnotatedCandidate, TurnContext } from './pipeline.types';

export const RESPONSE_SYSTEM_PROMPT = `You are a friendly AI beauty and skincare concierge.
You help users find the right beauty products for their skin type, concerns, and preferences.

Guidelines:
- Be warm, conversational, and knowledgeable
- Always prioritize user safety and respect allergies and sensitivities
- When recommending products, explain WHY each product fits the user
- If products were vetoed for safety, explain clearly and offer alternatives
- Never pressure the user to buy anything
- If you don't know something, say so honestly
- Reference the user's profile/preferences when available`;

export const CONSTRAINTS_UNAVAILABLE_NOTICE =
  "The user's allergy and sensitivity constraints could not be loaded. " +
  'Do not recommend specific products in this response; explain that ' +
  'recommendations are temporarily unavailable and offer general advice.';

export const ALL_VETOED_NOTICE =
  'All products were filtered out due to safety constraints. ' +
  'Suggest the user broaden their search or offer general advice.';

function formatViolation(violation: Violation): string {
  if (violation.gate === 'rule_based') {
    const via = violation.matchType === 'group' ? ` (${violation.matchedAllergen})` : '';
    return `- ${violation.product}: flagged for ${violation.matchedIngredient}${via}`;
  }
  return `- ${violation.product}: flagged by safety review (${violation.reason})`;
}

function formatSurvivor(candidate: AnnotatedCandidate): string {
  const lines = [
    `- ${candidateDisplayName(candidate)} by ${candidate.brand?.trim() || 'Unknown'} ` +
      `(safety: ${candidate.safetyScore.toFixed(1)}/10)`,
  ];
  for (const warning of candidate.interactions) {
    lines.push(`  - ${warning.label} (${warning.severity}): ${warning.concern}`);
  }
  return lines.join('\n');
}

/**
 * Context sections, blank-line separated. Empty string when there is nothing
 * to add.
 */
export function buildResponseContext(result: TurnContext): string {
  const parts: string[] = [];

  if (result.memoryContext.length > 0) {
    parts.push(
      `User context from previous conversations:\n${result.memoryContext.map((m) => `- ${m}`).join('\n')}`,
    );
  }
  if (result.conflictPrompt) parts.push(result.conflictPrompt);
  if (result.notifications.length > 0) {
    parts.push(
      `Acknowledge these memory updates:\n${result.notifications.map((n) => `- ${n}`).join('\n')}`,
    );
  }

  if (requiresSafetyPath(result.intent) && result.constraintsUnavailable) {
    parts.push(CONSTRAINTS_UNAVAILABLE_NOTICE);
  } else if (requiresSafetyPath(result.intent)) {
    if (result.violations.length > 0) {
      parts.push(`Safety violations found:\n${result.violations.map(formatViolation).join('\n')}`);
    }
    if (result.survivors.length > 0) {
      parts.push(`Safe products found:\n${result.survivors.map(formatSurvivor).join('\n')}`);
    } else if (result.allVetoed) {
      parts.push(ALL_VETOED_NOTICE);
    }
  }

  return parts.join('\n\n');
}

export function buildResponseSystemPrompt(result: TurnContext): string {
  const context = buildResponseContext(result);
  return context ? `${RESPONSE_SYSTEM_PROMPT}\n\n${context}` : RESPONSE_SYSTEM_PROMPT;
}
