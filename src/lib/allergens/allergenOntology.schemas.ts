/**
 * Allergen Ontology Schemas - Zod validation for the synonym resource
 */

import { z } from 'zod';

export const allergenGroupSchema = z.object({
  name: z.string().trim().min(1),
  members: z.array(z.string().trim().min(1)).min(1),
});

export const allergenOntologySchema = z.object({
  version: z.number().int().positive(),
  groups: z.array(allergenGroupSchema).min(1),
});

export type AllergenGroupInput = z.infer<typeof allergenGroupSchema>;
export type AllergenOntologyInput = z.infer<typeof allergenOntologySchema>;

/**
 * Allergen Group - named set of chemically related ingredient synonyms
 */
export type AllergenGroup = {
  /** Canonical group name (normalized) */
  readonly name: string;
  /** Member ingredient tokens (normalized) */
  readonly members: readonly string[];
};

/**
 * Loaded ontology – frozen, safe to share across concurrent turns
 */
export type AllergenOntology = {
  readonly version: number;
  readonly groups: ReadonlyMap<string, AllergenGroup>;
  /** member → group name; every group name also maps to itself */
  readonly reverseIndex: ReadonlyMap<string, string>;
};
