/**
 * Constraint store - the user's allergy and sensitivity constraints in the
 * `constraints` namespace.
 *
 * A failed load is never silently an empty set: the configured policy
 * decides whether the turn blocks recommendations (fail_closed) or proceeds
 * unfiltered with a warning (fail_open).
 */

import { AppError, errorMessage } from '@/src/lib/errors/app-error';
import type { ConstraintLoadPolicy } from '@/src/lib/config/concierge.config';
import { normalizeIngredient } from '@/src/lib/allergens/ingredientParser';
import { withTimeout } from '@/src/lib/utils/withTimeout';
import { constraintsNamespace, type LongTermFactStore } from './factStore.types';
import {
  constraintSchema,
  type Constraint,
  type ConstraintSeverity,
  type ConstraintSource,
} from './memory.schemas';

export type ConstraintLoadResult =
  | { status: 'loaded'; constraints: Constraint[] }
  /** fail_closed: recommendations must be blocked this turn */
  | { status: 'unavailable'; constraints: []; error: AppError }
  /** fail_open: proceeding with no constraints */
  | { status: 'degraded'; constraints: []; error: string };

const KEY_PREFIX: Record<ConstraintSeverity, string> = {
  absolute: 'allergy',
  high: 'sensitivity',
  preference: 'preference',
};

export function constraintKey(ingredient: string, severity: ConstraintSeverity): string {
  return `${KEY_PREFIX[severity]}_${ingredient.replace(/ /g, '_')}`;
}

export async function loadActiveConstraints(
  store: LongTermFactStore,
  userId: string,
  policy: ConstraintLoadPolicy,
  timeoutMs?: number,
): Promise<ConstraintLoadResult> {
  try {
    const search = store.search(constraintsNamespace(userId));
    const items = await (timeoutMs === undefined
      ? search
      : withTimeout(search, timeoutMs, 'constraint-load'));

    const constraints: Constraint[] = [];
    for (const item of items) {
      const parsed = constraintSchema.safeParse(item.value);
      if (!parsed.success) {
        console.warn('[ConstraintStore] Skipping malformed constraint', { userId, key: item.key });
        continue;
      }
      const { ingredient, severity, source, content } = parsed.data;
      constraints.push({ ingredient, severity, source, content: content ?? `Allergic to ${ingredient}` });
    }
    return { status: 'loaded', constraints };
  } catch (error) {
    const message = errorMessage(error);
    if (policy === 'fail_open') {
      console.warn('[ConstraintStore] Constraint load failed, continuing without constraints', {
        userId,
        error: message,
      });
      return { status: 'degraded', constraints: [], error: message };
    }
    console.error('[ConstraintStore] Constraint load failed, blocking recommendations', {
      userId,
      error: message,
    });
    return {
      status: 'unavailable',
      constraints: [],
      error: new AppError('CONSTRAINTS_UNAVAILABLE', 'Safety constraints could not be loaded', error),
    };
  }
}

/**
 * Distinct constraint ingredients, first spelling kept
 */
export function constraintIngredients(constraints: Constraint[]): string[] {
  const seen = new Set<string>();
  const ingredients: string[] = [];
  for (const { ingredient } of constraints) {
    const normalized = normalizeIngredient(ingredient);
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);
    ingredients.push(ingredient);
  }
  return ingredients;
}

export type AddConstraintInput = {
  ingredient: string;
  severity?: ConstraintSeverity;
  source?: ConstraintSource;
  content?: string;
};

/**
 * Store a constraint. A constraint with the same key is superseded.
 */
export async function addConstraint(
  store: LongTermFactStore,
  userId: string,
  input: AddConstraintInput,
): Promise<{ key: string; constraint: Constraint }> {
  const ingredient = input.ingredient.trim();
  const severity = input.severity ?? 'absolute';
  const constraint: Constraint = {
    ingredient,
    severity,
    source: input.source ?? 'user_stated',
    content:
      input.content ?? (severity === 'high' ? `Sensitive to ${ingredient}` : `Allergic to ${ingredient}`),
  };
  const key = constraintKey(ingredient, severity);

  await store.put(constraintsNamespace(userId), key, constraint);
  console.info('[ConstraintStore] Constraint added', { userId, key, severity });
  return { key, constraint };
}

export async function deleteConstraint(
  store: LongTermFactStore,
  userId: string,
  key: string,
): Promise<void> {
  await store.delete(constraintsNamespace(userId), key);
}
