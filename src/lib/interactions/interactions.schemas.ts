/**
 * Ingredient Interaction Schemas
 */

import { z } from 'zod';

export const interactionSeveritySchema = z.enum(['high', 'medium', 'low']);
export type InteractionSeverity = z.infer<typeof interactionSeveritySchema>;

export const interactionEntrySchema = z.object({
  groupA: z.array(z.string().trim().toLowerCase().min(1)).min(1),
  groupB: z.array(z.string().trim().toLowerCase().min(1)).min(1),
  severity: interactionSeveritySchema,
  label: z.string().min(1),
  concern: z.string().min(1),
});

export const interactionTableSchema = z.object({
  version: z.number().int().positive(),
  interactions: z.array(interactionEntrySchema),
});

export type InteractionEntry = Readonly<z.infer<typeof interactionEntrySchema>>;

export type InteractionTable = {
  readonly version: number;
  readonly interactions: readonly InteractionEntry[];
};

/**
 * Interaction Warning - advisory, never a veto
 */
export type InteractionWarning = {
  /** Original spelling from the product list */
  ingredientA: string;
  ingredientB: string;
  severity: InteractionSeverity;
  label: string;
  concern: string;
};
