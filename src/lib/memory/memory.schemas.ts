/**
 * Memory Schemas - Zod validation for values read from the fact store
 *
 * Stored records use snake_case; the rest of the code works with the
 * camelCase domain types below.
 */

import { z } from 'zod';

export const factCategorySchema = z.enum([
  'skin_type',
  'age',
  'allergy',
  'sensitivity',
  'preference',
  'aversion',
]);
export type FactCategory = z.infer<typeof factCategorySchema>;

export const constraintSeveritySchema = z.enum(['absolute', 'high', 'preference']);
export type ConstraintSeverity = z.infer<typeof constraintSeveritySchema>;

export const constraintSourceSchema = z.enum(['user_stated', 'user_api', 'migrated']);
export type ConstraintSource = z.infer<typeof constraintSourceSchema>;

/**
 * Constraint - never mutated, only superseded (same key) or deleted.
 * Rows written before severity/source existed load as absolute/migrated.
 */
export const constraintSchema = z.object({
  ingredient: z.string().trim().min(1),
  severity: constraintSeveritySchema.default('absolute'),
  source: constraintSourceSchema.default('migrated'),
  content: z.string().optional(),
});
export type Constraint = {
  ingredient: string;
  severity: ConstraintSeverity;
  source: ConstraintSource;
  content: string;
};

export const storedFactSchema = z.object({
  category: factCategorySchema,
  value: z.string(),
  content: z.string(),
});
export type StoredFact = z.infer<typeof storedFactSchema>;

/**
 * Fact - one explicit self-statement detected in a user message
 */
export type Fact = {
  category: FactCategory;
  value: string;
  sourceText: string;
};

export const pendingConfirmationRecordSchema = z.object({
  old_key: z.string(),
  old_value: z.string(),
  new_value: z.string(),
  category: factCategorySchema,
  detected_at: z.string(),
  attempts: z.number().int().min(0),
  source_message: z.string().default(''),
});
export type PendingConfirmationRecord = z.infer<typeof pendingConfirmationRecordSchema>;

export type PendingConfirmation = {
  /** Store key, `conflict_<category>_<oldKey>` */
  key: string;
  category: FactCategory;
  oldKey: string;
  oldValue: string;
  newValue: string;
  detectedAt: string;
  attempts: number;
  sourceQuote: string;
};

export function toPendingConfirmation(
  key: string,
  record: PendingConfirmationRecord,
): PendingConfirmation {
  return {
    key,
    category: record.category,
    oldKey: record.old_key,
    oldValue: record.old_value,
    newValue: record.new_value,
    detectedAt: record.detected_at,
    attempts: record.attempts,
    sourceQuote: record.source_message,
  };
}

export function toPendingConfirmationRecord(
  confirmation: PendingConfirmation,
): PendingConfirmationRecord {
  return {
    old_key: confirmation.oldKey,
    old_value: confirmation.oldValue,
    new_value: confirmation.newValue,
    category: confirmation.category,
    detected_at: confirmation.detectedAt,
    attempts: confirmation.attempts,
    source_message: confirmation.sourceQuote,
  };
}
