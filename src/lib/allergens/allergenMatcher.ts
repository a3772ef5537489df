/**
 * Allergen Matcher
 *
 * Closure expansion over the synonym ontology and per-ingredient match
 * detection. Groups are flat, so one hop (member → group → members) is the
 * full reflexive-transitive closure.
 */

import { normalizeIngredient } from './ingredientParser';
import { getBundledAllergenOntology } from './allergenOntology.loader';
import type { AllergenOntology } from './allergenOntology.schemas';

export type AllergenMatchType = 'direct' | 'group';

/**
 * Allergen Match - one flagged ingredient
 */
export type AllergenMatch = {
  /** Ingredient as it appeared in the product list */
  ingredient: string;
  /** Direct: the caller's allergen string. Group: the group name. */
  allergen: string;
  matchType: AllergenMatchType;
};

export type AllergenMatcher = {
  readonly ontologyVersion: number;
  getAllergenGroup(ingredient: string): string | null;
  expandAllergens(allergens: readonly string[]): string[];
  findAllergenMatches(
    ingredients: readonly string[],
    allergens: readonly string[],
  ): AllergenMatch[];
};

/**
 * Build a matcher bound to one ontology. The matcher holds no mutable state.
 */
export function createAllergenMatcher(ontology: AllergenOntology): AllergenMatcher {
  const getAllergenGroup = (ingredient: string): string | null =>
    ontology.reverseIndex.get(normalizeIngredient(ingredient)) ?? null;

  /**
   * Expand allergen names into the full synonym closure.
   *
   * ["paraben"] → ["butylparaben", "ethylparaben", ..., "paraben", "propylparaben"]
   * ["methylparaben"] → same set (member pulls in its group and siblings)
   */
  const expandAllergens = (allergens: readonly string[]): string[] => {
    const expanded = new Set<string>();
    for (const allergen of allergens) {
      const normalized = normalizeIngredient(allergen);
      if (!normalized) continue;
      expanded.add(normalized);

      const groupName = ontology.reverseIndex.get(normalized);
      const group = groupName ? ontology.groups.get(groupName) : undefined;
      if (!group) continue;

      expanded.add(group.name);
      for (const member of group.members) expanded.add(member);
    }
    return [...expanded].sort();
  };

  const findAllergenMatches = (
    ingredients: readonly string[],
    allergens: readonly string[],
  ): AllergenMatch[] => {
    const normalizedAllergens = allergens.map((a) => ({
      raw: a,
      normalized: normalizeIngredient(a),
    }));

    // Unknown tokens stand for themselves
    const allergenGroups = new Set<string>();
    for (const { normalized } of normalizedAllergens) {
      allergenGroups.add(ontology.reverseIndex.get(normalized) ?? normalized);
    }

    const matches: AllergenMatch[] = [];
    for (const ingredient of ingredients) {
      const normalized = normalizeIngredient(ingredient);

      const direct = normalizedAllergens.find((a) => a.normalized === normalized);
      if (direct) {
        matches.push({ ingredient, allergen: direct.raw, matchType: 'direct' });
        continue;
      }

      const group = ontology.reverseIndex.get(normalized);
      if (group && allergenGroups.has(group)) {
        matches.push({ ingredient, allergen: group, matchType: 'group' });
      }
    }
    return matches;
  };

  return {
    ontologyVersion: ontology.version,
    getAllergenGroup,
    expandAllergens,
    findAllergenMatches,
  };
}

let defaultMatcher: AllergenMatcher | null = null;

/**
 * Matcher over the bundled ontology
 */
export function getDefaultAllergenMatcher(): AllergenMatcher {
  if (!defaultMatcher) {
    defaultMatcher = createAllergenMatcher(getBundledAllergenOntology());
  }
  return defaultMatcher;
}

export function expandAllergens(allergens: readonly string[]): string[] {
  return getDefaultAllergenMatcher().expandAllergens(allergens);
}

export function findAllergenMatches(
  ingredients: readonly string[],
  allergens: readonly string[],
): AllergenMatch[] {
  return getDefaultAllergenMatcher().findAllergenMatches(ingredients, allergens);
}

export function getAllergenGroup(ingredient: string): string | null {
  return getDefaultAllergenMatcher().getAllergenGroup(ingredient);
}
