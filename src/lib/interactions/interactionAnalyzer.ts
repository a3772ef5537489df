/**
 * Ingredient Interaction Analyzer
 *
 * Flags incompatible active combinations inside one product. Entries are
 * directional as authored: groupA is searched first, then groupB.
 */

import interactionData from './data/ingredient-interactions.json';
import { AppError } from '@/src/lib/errors/app-error';
import { normalizeIngredient } from '@/src/lib/allergens/ingredientParser';
import {
  interactionTableSchema,
  type InteractionTable,
  type InteractionWarning,
} from './interactions.schemas';

export function loadInteractionTable(raw: unknown): InteractionTable {
  const parsed = interactionTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError(
      'ONTOLOGY_INVALID',
      `Interaction table failed validation: ${parsed.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ')}`,
    );
  }
  return Object.freeze({
    version: parsed.data.version,
    interactions: Object.freeze(parsed.data.interactions.map((e) => Object.freeze(e))),
  });
}

let bundledTable: InteractionTable | null = null;

export function getBundledInteractionTable(): InteractionTable {
  if (!bundledTable) {
    bundledTable = loadInteractionTable(interactionData);
  }
  return bundledTable;
}

/**
 * Find interaction warnings for one product's ingredient list.
 *
 * At most one warning per label; the first present member of each side is
 * reported with the product's own spelling.
 */
export function findIngredientInteractions(
  ingredients: readonly string[],
  table: InteractionTable = getBundledInteractionTable(),
): InteractionWarning[] {
  const originals = new Map<string, string>();
  for (const ingredient of ingredients) {
    const normalized = normalizeIngredient(ingredient);
    if (!originals.has(normalized)) originals.set(normalized, ingredient);
  }

  const warnings: InteractionWarning[] = [];
  const seenLabels = new Set<string>();

  for (const entry of table.interactions) {
    if (seenLabels.has(entry.label)) continue;

    const matchA = entry.groupA.find((member) => originals.has(member));
    const matchB = entry.groupB.find((member) => originals.has(member));
    if (matchA === undefined || matchB === undefined) continue;

    seenLabels.add(entry.label);
    warnings.push({
      ingredientA: originals.get(matchA) ?? matchA,
      ingredientB: originals.get(matchB) ?? matchB,
      severity: entry.severity,
      label: entry.label,
      concern: entry.concern,
    });
  }

  return warnings;
}

export type AsymmetricPair = {
  label: string;
  ingredientA: string;
  ingredientB: string;
};

/**
 * List (a, b) member pairs authored in one direction only, i.e. no entry
 * pairs b on its A side with a on its B side. Detection over a product list
 * does not depend on direction; this keeps the table layout auditable.
 */
export function findAsymmetricPairs(
  table: InteractionTable = getBundledInteractionTable(),
): AsymmetricPair[] {
  const covered = new Set<string>();
  for (const entry of table.interactions) {
    for (const a of entry.groupA) {
      for (const b of entry.groupB) covered.add(`${a}\u0000${b}`);
    }
  }

  const pairs: AsymmetricPair[] = [];
  for (const entry of table.interactions) {
    for (const a of entry.groupA) {
      for (const b of entry.groupB) {
        if (!covered.has(`${b}\u0000${a}`)) {
          pairs.push({ label: entry.label, ingredientA: a, ingredientB: b });
        }
      }
    }
  }
  return pairs;
}
