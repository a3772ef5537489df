/**
 * Ingredient Safety Index
 *
 * Scores a product 0-10 from its ingredient list using an irritant table and
 * comedogenic ratings. Advisory annotation for survivors; never a veto.
 */

import { z } from 'zod';
import safetyData from './data/safety-index.json';
import { AppError } from '@/src/lib/errors/app-error';
import { normalizeIngredient } from '@/src/lib/allergens/ingredientParser';

const riskLevelSchema = z.enum(['high', 'medium', 'low']);
export type RiskLevel = z.infer<typeof riskLevelSchema>;

const safetyIndexTableSchema = z.object({
  version: z.number().int().positive(),
  irritants: z.record(z.object({ risk: riskLevelSchema, concern: z.string().min(1) })),
  comedogenic: z.record(z.number().int().min(0).max(5)),
});

export type SafetyIndexTable = z.infer<typeof safetyIndexTableSchema>;

export type SafetyFlag =
  | { ingredient: string; type: 'irritant'; risk: RiskLevel; concern: string }
  | { ingredient: string; type: 'comedogenic'; rating: number; concern: string };

export type SafetyScore = {
  /** 0-10, one decimal */
  score: number;
  flags: SafetyFlag[];
};

const IRRITANT_PENALTY: Record<RiskLevel, number> = {
  high: 2.0,
  medium: 1.0,
  low: 0.5,
};

/** Score for a product with no ingredient data */
export const UNKNOWN_SAFETY_SCORE = 5.0;

export function loadSafetyIndexTable(raw: unknown): SafetyIndexTable {
  const parsed = safetyIndexTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError(
      'ONTOLOGY_INVALID',
      `Safety index table failed validation: ${parsed.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ')}`,
    );
  }
  return parsed.data;
}

let bundledTable: SafetyIndexTable | null = null;

function getBundledSafetyIndexTable(): SafetyIndexTable {
  if (!bundledTable) {
    bundledTable = loadSafetyIndexTable(safetyData);
  }
  return bundledTable;
}

export function computeSafetyScore(
  ingredients: readonly string[],
  table: SafetyIndexTable = getBundledSafetyIndexTable(),
): SafetyScore {
  if (ingredients.length === 0) {
    return { score: UNKNOWN_SAFETY_SCORE, flags: [] };
  }

  let score = 10.0;
  const flags: SafetyFlag[] = [];

  for (const ingredient of ingredients) {
    const key = normalizeIngredient(ingredient);

    const irritant = table.irritants[key];
    if (irritant) {
      score -= IRRITANT_PENALTY[irritant.risk];
      flags.push({ ingredient, type: 'irritant', risk: irritant.risk, concern: irritant.concern });
    }

    const rating = table.comedogenic[key];
    if (rating !== undefined && rating >= 3) {
      score -= rating >= 4 ? 1.5 : 0.5;
      flags.push({
        ingredient,
        type: 'comedogenic',
        rating,
        concern: `comedogenic rating ${rating}/5`,
      });
    }
  }

  const clamped = Math.max(0, Math.min(10, score));
  return { score: Math.round(clamped * 10) / 10, flags };
}
