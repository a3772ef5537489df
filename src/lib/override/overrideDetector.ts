/**
 * Override-Attempt Detector
 *
 * Deterministic check for messages that try to talk the concierge out of
 * enforcing allergy constraints. Runs before any other stage of a turn and
 * before any generative call; a match short-circuits the turn with
 * OVERRIDE_REFUSAL.
 */

import { AppError } from '@/src/lib/errors/app-error';

export const OVERRIDE_REFUSAL =
  "I understand you'd like to see those products, but I can't recommend items " +
  "containing ingredients you're allergic to. Your safety is my top priority. " +
  'I can help you find alternatives that work for your skin without those ingredients.';

export type OverrideCategory =
  | 'show_anyway'
  | 'disable_safety'
  | 'risk_acceptance'
  | 'dismiss_allergies'
  | 'deny_allergy'
  | 'show_unsafe'
  | 'include_filtered'
  | 'erase_constraints'
  | 'pretend_not_allergic'
  | 'stop_filtering';

export type OverrideRule = {
  readonly category: OverrideCategory;
  readonly pattern: RegExp;
};

export type OverrideDetection =
  | { isOverride: false }
  | { isOverride: true; category: OverrideCategory; pattern: string };

const SAFETY_TARGET = '\\b(?:safety|allerg|sensitiv|filter|check)';

/**
 * Ordered rule table. Patterns run on normalized text (see
 * normalizeForOverrideCheck), so they only need to handle lowercase words,
 * single spaces and apostrophes.
 */
const RULE_SOURCES: Array<[OverrideCategory, RegExp]> = [
  ['show_anyway', /\b(?:show|give|list|recommend|tell)\b.{0,30}\banyway\b/],
  ['disable_safety', new RegExp(`\\bignore\\b.{0,15}${SAFETY_TARGET}`)],
  ['disable_safety', /\boverride\b.{0,15}\b(?:safety|allerg|filter|check)/],
  ['disable_safety', /\bbypass\b.{0,15}\b(?:safety|allerg|filter|check)/],
  ['disable_safety', /\bskip\b.{0,15}\b(?:safety|allerg|filter|check)/],
  ['disable_safety', /\bdisable\b.{0,15}\b(?:safety|allerg|filter|check)/],
  ['disable_safety', /\bturn\s+off\b.{0,15}\b(?:safety|allerg|filter|check)/],
  ['risk_acceptance', /\b(?:i'?ll|i\s+will|willing\s+to)\b.{0,15}\b(?:take|accept)\b.{0,10}\brisk/],
  ['dismiss_allergies', /\bdon'?t\s+care\b.{0,15}\b(?:allerg|safety|sensitiv|ingredient|reaction)/],
  ['deny_allergy', /\bi\s+(?:don'?t|do\s+not)\s+(?:actually\s+)?have\b.{0,10}\ballerg/],
  ['show_unsafe', /\bshow\b.{0,15}\bunsafe\b/],
  ['show_unsafe', /\bjust\s+give\b.{0,15}\b(?:all|every)\b.{0,10}\bproduct/],
  ['include_filtered', /\b(?:include|add)\b.{0,15}\b(?:unsafe|flagged|blocked|filtered|removed)\b/],
  [
    'erase_constraints',
    /\b(?:remove|delete|clear)\b.{0,15}\b(?:my\s+)?(?:allerg|constraint|restriction|safety\s+(?:filter|check))/,
  ],
  ['erase_constraints', /\bforget\b.{0,15}\b(?:my\s+)?allerg/],
  ['pretend_not_allergic', /\bpretend\b.{0,15}\b(?:not\s+allergic|no\s+allerg)/],
  ['pretend_not_allergic', /\bnot\s+(?:really|actually)\s+allergic\b/],
  ['stop_filtering', /\bstop\b.{0,10}\b(?:filter|block|check|flag)/],
  ['show_unsafe', /\b(?:show|give|list)\b.{0,15}\b(?:everything|all)\b.{0,15}\bregardless\b/],
];

export const OVERRIDE_RULES: readonly OverrideRule[] = Object.freeze(
  RULE_SOURCES.map(([category, pattern]) => Object.freeze({ category, pattern })),
);

/**
 * Lowercase, straighten curly quotes, drop punctuation other than
 * apostrophes and collapse whitespace.
 */
export function normalizeForOverrideCheck(message: string): string {
  return message
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[^\w\s']/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export type OverrideDetector = {
  detect(message: string): OverrideDetection;
  isOverrideAttempt(message: string): boolean;
};

export function createOverrideDetector(
  rules: readonly OverrideRule[] = OVERRIDE_RULES,
): OverrideDetector {
  const detect = (message: string): OverrideDetection => {
    try {
      const normalized = normalizeForOverrideCheck(message);
      for (const rule of rules) {
        if (rule.pattern.test(normalized)) {
          return { isOverride: true, category: rule.category, pattern: rule.pattern.source };
        }
      }
      return { isOverride: false };
    } catch (error) {
      // Never fall through to "not an override" on a failed check
      throw new AppError('OVERRIDE_CHECK_FAILED', 'Override check failed', error);
    }
  };

  return {
    detect,
    isOverrideAttempt: (message) => detect(message).isOverride,
  };
}

const defaultDetector = createOverrideDetector();

export function detectOverrideAttempt(message: string): OverrideDetection {
  return defaultDetector.detect(message);
}

export function isOverrideAttempt(message: string): boolean {
  return defaultDetector.isOverrideAttempt(message);
}
