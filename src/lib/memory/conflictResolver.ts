/**
 * Memory Conflict Resolver
 *
 * When a newly stated fact contradicts a stored one (skin type, age), a
 * pending confirmation is stored. Each turn surfaces open confirmations to
 * the response layer and counts an ignore; after MAX_IGNORED_ATTEMPTS the
 * newer value wins, so every confirmation converges.
 */

import { z } from 'zod';
import { errorMessage } from '@/src/lib/errors/app-error';
import {
  pendingConfirmationsNamespace,
  userFactsNamespace,
  type LongTermFactStore,
  type MemoryItem,
} from './factStore.types';
import {
  pendingConfirmationRecordSchema,
  storedFactSchema,
  toPendingConfirmation,
  toPendingConfirmationRecord,
  type FactCategory,
  type PendingConfirmation,
  type StoredFact,
} from './memory.schemas';

/** Fact categories where a second value is a contradiction */
export const CONTRADICTION_CATEGORIES: ReadonlySet<FactCategory> = new Set<FactCategory>([
  'skin_type',
  'age',
]);

export const MAX_IGNORED_ATTEMPTS = 3;

const FACT_SEARCH_LIMIT = 50;
const CONFIRMATION_SEARCH_LIMIT = 20;

export const conflictResolutionSchema = z.enum(['accept_new', 'keep_both', 'ignore']);
export type ConflictResolution = z.infer<typeof conflictResolutionSchema>;

export type ConflictOutcome = 'accepted_new' | 'kept_both' | 'ignored' | 'auto_resolved';

export function conflictKey(category: FactCategory, oldKey: string): string {
  return `conflict_${category}_${oldKey}`;
}

/**
 * Store a pending confirmation if `newFact` contradicts a stored fact of the
 * same category. At most one confirmation per call.
 *
 * @returns true if a conflict was stored
 */
export async function checkAndStoreConflict(
  store: LongTermFactStore,
  userId: string,
  newKey: string,
  newFact: StoredFact,
  now: () => Date = () => new Date(),
): Promise<boolean> {
  if (!CONTRADICTION_CATEGORIES.has(newFact.category)) return false;

  let existing: MemoryItem[];
  try {
    existing = await store.search(userFactsNamespace(userId), { limit: FACT_SEARCH_LIMIT });
  } catch (error) {
    console.warn('[ConflictResolver] Failed to search for conflicts', {
      userId,
      error: errorMessage(error),
    });
    return false;
  }

  for (const item of existing) {
    const parsed = storedFactSchema.safeParse(item.value);
    if (!parsed.success) continue;
    const old = parsed.data;
    if (old.category !== newFact.category || old.value === newFact.value || item.key === newKey) {
      continue;
    }

    const confirmation: PendingConfirmation = {
      key: conflictKey(newFact.category, item.key),
      category: newFact.category,
      oldKey: item.key,
      oldValue: old.value,
      newValue: newFact.value,
      detectedAt: now().toISOString(),
      attempts: 0,
      sourceQuote: newFact.content,
    };
    await store.put(
      pendingConfirmationsNamespace(userId),
      confirmation.key,
      toPendingConfirmationRecord(confirmation),
    );
    console.info('[ConflictResolver] Memory conflict detected', {
      userId,
      category: newFact.category,
    });
    return true;
  }

  return false;
}

/**
 * Open confirmations for a user. Read failures yield an empty list.
 */
export async function loadPendingConfirmations(
  store: LongTermFactStore,
  userId: string,
): Promise<PendingConfirmation[]> {
  try {
    const items = await store.search(pendingConfirmationsNamespace(userId), {
      limit: CONFIRMATION_SEARCH_LIMIT,
    });
    const confirmations: PendingConfirmation[] = [];
    for (const item of items) {
      const parsed = pendingConfirmationRecordSchema.safeParse(item.value);
      if (parsed.success) {
        confirmations.push(toPendingConfirmation(item.key, parsed.data));
      } else {
        console.warn('[ConflictResolver] Skipping malformed confirmation', { userId, key: item.key });
      }
    }
    return confirmations;
  } catch (error) {
    console.warn('[ConflictResolver] Failed to load pending confirmations', {
      userId,
      error: errorMessage(error),
    });
    return [];
  }
}

/**
 * Render confirmations as system-prompt context; empty string when none
 */
export function formatConflictPrompt(confirmations: PendingConfirmation[]): string {
  if (confirmations.length === 0) return '';

  const lines = confirmations.map(
    ({ oldValue, newValue, category }) =>
      `- The user previously mentioned having ${oldValue} ${category}, ` +
      `but recently indicated ${newValue} ${category}. ` +
      `Naturally ask if their ${category} has changed or if it varies seasonally.`,
  );
  return `PENDING CONFIRMATIONS — address these naturally in your response:\n${lines.join('\n')}`;
}

/**
 * Apply a resolution. Every branch except a non-final `ignore` deletes the
 * confirmation.
 */
export async function resolveConflict(
  store: LongTermFactStore,
  userId: string,
  key: string,
  action: ConflictResolution,
  confirmation: PendingConfirmation,
): Promise<ConflictOutcome> {
  const factsNs = userFactsNamespace(userId);
  const confirmationsNs = pendingConfirmationsNamespace(userId);
  const { category, oldKey, oldValue } = confirmation;

  switch (action) {
    case 'accept_new':
      if (oldKey) await store.delete(factsNs, oldKey);
      await store.delete(confirmationsNs, key);
      console.info('[ConflictResolver] Conflict resolved: accepted new value', { userId, category });
      return 'accepted_new';

    case 'keep_both':
      if (oldKey) {
        const qualified: StoredFact = {
          category,
          value: `${oldValue} (sometimes)`,
          content: `${category}: ${oldValue} (varies)`,
        };
        await store.put(factsNs, oldKey, qualified);
      }
      await store.delete(confirmationsNs, key);
      console.info('[ConflictResolver] Conflict resolved: keeping both', { userId, category });
      return 'kept_both';

    case 'ignore': {
      const attempts = confirmation.attempts + 1;
      if (attempts >= MAX_IGNORED_ATTEMPTS) {
        if (oldKey) await store.delete(factsNs, oldKey);
        await store.delete(confirmationsNs, key);
        console.info('[ConflictResolver] Conflict auto-resolved after max attempts', {
          userId,
          category,
          attempts,
        });
        return 'auto_resolved';
      }
      // Concurrent turns for one user race here; the last write wins
      await store.put(
        confirmationsNs,
        key,
        toPendingConfirmationRecord({ ...confirmation, key, attempts }),
      );
      return 'ignored';
    }
  }
}

/**
 * Load open confirmations, render the prompt and count one ignore on each.
 * The prompt reflects the state before this turn's ignores were applied.
 */
export async function surfacePendingConfirmations(
  store: LongTermFactStore,
  userId: string,
): Promise<{ confirmations: PendingConfirmation[]; prompt: string }> {
  const confirmations = await loadPendingConfirmations(store, userId);
  const prompt = formatConflictPrompt(confirmations);
  for (const confirmation of confirmations) {
    await resolveConflict(store, userId, confirmation.key, 'ignore', confirmation);
  }
  return { confirmations, prompt };
}
