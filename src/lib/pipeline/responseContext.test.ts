import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  ALL_VETOED_NOTICE,
  buildResponseContext,
  buildResponseSystemPrompt,
  CONSTRAINTS_UNAVAILABLE_NOTICE,
  RESPONSE_SYSTEM_PROMPT,
} from './responseContext';
import type { AnnotatedCandidate, TurnContext } from './pipeline.types';
import type { Violation } from '@/src/lib/safety-filter/safetyFilter.types';

function turnContext(overrides: Partial<TurnContext> = {}): TurnContext {
  return {
    kind: 'context',
    intent: 'general_chat',
    stages: ['intent_classification', 'response'],
    survivors: [],
    violations: [],
    allVetoed: false,
    gate2Status: 'skipped',
    conflictPrompt: '',
    memoryContext: [],
    notifications: [],
    constraintsUnavailable: false,
    ...overrides,
  };
}

const parabenViolation: Violation = {
  gate: 'rule_based',
  product: 'Paraben Cream',
  candidate: { name: 'Paraben Cream', ingredients: ['water', 'methylparaben'] },
  matches: [{ ingredient: 'methylparaben', allergen: 'paraben', matchType: 'group' }],
  matchedIngredient: 'methylparaben',
  matchedAllergen: 'paraben',
  matchType: 'group',
};

const reviewViolation: Violation = {
  gate: 'llm_check',
  product: 'Mystery Serum',
  candidate: { name: 'Mystery Serum', ingredients: ['aqua'] },
  reason: 'Mystery Serum: UNSAFE contains a fragrance allergen',
};

const lotion: AnnotatedCandidate = {
  name: 'Gentle Lotion',
  ingredients: ['water', 'retinol', 'glycolic acid'],
  interactions: [
    {
      ingredientA: 'retinol',
      ingredientB: 'glycolic acid',
      severity: 'high',
      label: 'Retinoid + AHA',
      concern: 'Too irritating together',
    },
  ],
  safetyScore: 8,
  safetyFlags: [],
};

describe('buildResponseContext', () => {
  it('is empty when there is nothing to say', () => {
    assert.strictEqual(buildResponseContext(turnContext()), '');
  });

  it('renders memory, confirmations and notifications', () => {
    const context = buildResponseContext(
      turnContext({
        memoryContext: ['skin_type: oily'],
        conflictPrompt: 'PENDING CONFIRMATIONS',
        notifications: ["I've noted that you have dry skin."],
      }),
    );

    assert.strictEqual(
      context,
      'User context from previous conversations:\n- skin_type: oily\n\n' +
        'PENDING CONFIRMATIONS\n\n' +
        "Acknowledge these memory updates:\n- I've noted that you have dry skin.",
    );
  });

  it('lists violations and annotated survivors on the safety path', () => {
    const context = buildResponseContext(
      turnContext({
        intent: 'product_search',
        violations: [parabenViolation, reviewViolation],
        survivors: [lotion],
      }),
    );

    assert.strictEqual(
      context,
      'Safety violations found:\n' +
        '- Paraben Cream: flagged for methylparaben (paraben)\n' +
        '- Mystery Serum: flagged by safety review (Mystery Serum: UNSAFE contains a fragrance allergen)\n\n' +
        'Safe products found:\n' +
        '- Gentle Lotion by Unknown (safety: 8.0/10)\n' +
        '  - Retinoid + AHA (high): Too irritating together',
    );
  });

  it('explains when every candidate was vetoed', () => {
    const context = buildResponseContext(
      turnContext({ intent: 'product_search', violations: [parabenViolation], allVetoed: true }),
    );

    assert.strictEqual(
      context,
      `Safety violations found:\n- Paraben Cream: flagged for methylparaben (paraben)\n\n${ALL_VETOED_NOTICE}`,
    );
  });

  it('blocks recommendations when constraints were unavailable', () => {
    const context = buildResponseContext(
      turnContext({ intent: 'product_search', constraintsUnavailable: true }),
    );

    assert.strictEqual(context, CONSTRAINTS_UNAVAILABLE_NOTICE);
  });

  it('leaves chat and memory turns alone when constraints were unavailable', () => {
    for (const intent of ['general_chat', 'memory_query'] as const) {
      assert.strictEqual(buildResponseContext(turnContext({ intent, constraintsUnavailable: true })), '');
    }
  });

  it('ignores safety results outside the safety path', () => {
    const context = buildResponseContext(
      turnContext({ intent: 'memory_query', survivors: [lotion] }),
    );

    assert.strictEqual(context, '');
  });
});

describe('buildResponseSystemPrompt', () => {
  it('is the base prompt without context', () => {
    assert.strictEqual(buildResponseSystemPrompt(turnContext()), RESPONSE_SYSTEM_PROMPT);
  });

  it('appends the context after a blank line', () => {
    assert.strictEqual(
      buildResponseSystemPrompt(turnContext({ memoryContext: ['age: 34'] })),
      `${RESPONSE_SYSTEM_PROMPT}\n\nUser context from previous conversations:\n- age: 34`,
    );
  });
});
