/**
 * Loader for the allergen synonym ontology.
 *
 * The bundled resource lives in ./data/allergen-ontology.json. Tests and
 * admin tooling may pass their own raw ontology; it goes through the same
 * validation.
 */

import bundledOntology from './data/allergen-ontology.json';
import { AppError } from '@/src/lib/errors/app-error';
import { normalizeIngredient } from './ingredientParser';
import {
  allergenOntologySchema,
  type AllergenGroup,
  type AllergenOntology,
} from './allergenOntology.schemas';

/**
 * Validate and index a raw ontology.
 *
 * Membership must be symmetric: an ingredient resolves to exactly one group,
 * so a member listed under two groups (or a group name listed as another
 * group's member) is rejected with ONTOLOGY_INVALID.
 */
export function loadAllergenOntology(raw: unknown): AllergenOntology {
  const parsed = allergenOntologySchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError(
      'ONTOLOGY_INVALID',
      `Allergen ontology failed validation: ${parsed.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ')}`,
    );
  }

  const groups = new Map<string, AllergenGroup>();
  const reverseIndex = new Map<string, string>();
  const problems: string[] = [];

  for (const group of parsed.data.groups) {
    const name = normalizeIngredient(group.name);
    if (groups.has(name)) {
      problems.push(`duplicate group "${name}"`);
      continue;
    }
    const owner = reverseIndex.get(name);
    if (owner !== undefined && owner !== name) {
      problems.push(`group "${name}" is already a member of "${owner}"`);
    }
    reverseIndex.set(name, name);

    const members = [...new Set(group.members.map(normalizeIngredient))];
    for (const member of members) {
      const existing = reverseIndex.get(member);
      if (existing !== undefined && existing !== name) {
        problems.push(`"${member}" belongs to both "${existing}" and "${name}"`);
        continue;
      }
      reverseIndex.set(member, name);
    }
    groups.set(name, Object.freeze({ name, members: Object.freeze(members) }));
  }

  if (problems.length > 0) {
    throw new AppError(
      'ONTOLOGY_INVALID',
      `Allergen ontology is not symmetric: ${problems.join('; ')}`,
    );
  }

  return Object.freeze({
    version: parsed.data.version,
    groups,
    reverseIndex,
  });
}

let bundled: AllergenOntology | null = null;

/**
 * The bundled ontology, validated once on first use
 */
export function getBundledAllergenOntology(): AllergenOntology {
  if (!bundled) {
    bundled = loadAllergenOntology(bundledOntology);
    console.info('[AllergenOntology] Loaded bundled ontology', {
      version: bundled.version,
      groups: bundled.groups.size,
      tokens: bundled.reverseIndex.size,
    });
  }
  return bundled;
}
