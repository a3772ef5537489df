/**
 * Prompt for the probabilistic second gate.
 */

import type { Candidate } from './safetyFilter.types';
import { toIngredientList } from '@/src/lib/allergens/ingredientParser';

/** Ingredients per product sent to the model */
export const GATE2_MAX_INGREDIENTS = 30;

export const GATE2_USER_MESSAGE = 'Check these products for safety.';

export function candidateDisplayName(candidate: Candidate): string {
  return candidate.name.trim() || 'Unknown';
}

export function buildGate2Prompt(candidates: Candidate[], constraints: string[]): string {
  const products = candidates
    .map(
      (c) =>
        `- ${candidateDisplayName(c)}: ${toIngredientList(c.ingredients)
          .slice(0, GATE2_MAX_INGREDIENTS)
          .join(', ')}`,
    )
    .join('\n');

  return `You are a safety checker for beauty products.
Given the user's known allergies/sensitivities and a list of products with their ingredients,
identify any products that may be unsafe.

User allergies: ${constraints.join(', ')}

Products:
${products}

For each product, respond with:
- SAFE if no concerns
- UNSAFE: <reason> if there are concerns

Be thorough: check for ingredient synonyms, chemical derivatives and related compounds.
For example, "paraben allergy" means ALL parabens (methylparaben, ethylparaben, etc.) are unsafe.`;
}
