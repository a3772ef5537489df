/**
 * Fact ingestion - persist detected facts and build the notifications shown
 * to the user. Allergies and sensitivities become constraints; other facts
 * go through the conflict check before they are stored.
 */

import { randomUUID } from 'node:crypto';
import { userFactsNamespace, type LongTermFactStore } from './factStore.types';
import { addConstraint } from './constraintStore';
import { checkAndStoreConflict } from './conflictResolver';
import type { Fact, StoredFact } from './memory.schemas';

export type FactIngestionOptions = {
  /** Short id for fact keys (default: 8 hex chars) */
  newId?: () => string;
  now?: () => Date;
};

const shortId = (): string => randomUUID().replace(/-/g, '').slice(0, 8);

export async function storeDetectedFacts(
  store: LongTermFactStore,
  userId: string,
  facts: Fact[],
  options: FactIngestionOptions = {},
): Promise<string[]> {
  const newId = options.newId ?? shortId;
  const notifications: string[] = [];

  for (const { category, value } of facts) {
    switch (category) {
      case 'allergy':
        await addConstraint(store, userId, {
          ingredient: value,
          severity: 'absolute',
          source: 'user_stated',
          content: `Allergic to ${value}`,
        });
        notifications.push(
          `I've noted your ${value} allergy — I'll filter out products containing ${value} going forward.`,
        );
        break;

      case 'sensitivity':
        await addConstraint(store, userId, {
          ingredient: value,
          severity: 'high',
          source: 'user_stated',
          content: `Sensitive to ${value}`,
        });
        notifications.push(
          `I've noted your sensitivity to ${value} — I'll avoid recommending products with ${value}.`,
        );
        break;

      default: {
        const key = `${category}_${newId()}`;
        const fact: StoredFact = { category, value, content: `${category}: ${value}` };
        await checkAndStoreConflict(store, userId, key, fact, options.now);
        await store.put(userFactsNamespace(userId), key, fact);

        if (category === 'skin_type') {
          notifications.push(`I've noted that you have ${value} skin.`);
        } else if (category === 'preference') {
          notifications.push(`I've noted your preference for ${value}.`);
        } else if (category === 'aversion') {
          notifications.push(`I've noted that you prefer to avoid ${value}.`);
        }
      }
    }
  }

  return notifications;
}
