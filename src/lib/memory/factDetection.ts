/**
 * Fact detection - explicit self-statements ("I have oily skin",
 * "I'm allergic to parabens") found by pattern, no model call.
 */

import type { Fact, FactCategory } from './memory.schemas';

/** Ordered; every pattern contributes at most its first match */
export const FACT_PATTERNS: ReadonlyArray<readonly [RegExp, FactCategory]> = [
  [/\bi(?:'m| am) (\d+)\b/, 'age'],
  [/\bmy skin (?:is|type is) (\w+)/, 'skin_type'],
  [/\bi have (\w+) skin\b/, 'skin_type'],
  [/\bi(?:'m| am) allergic to (.+?)(?:\.|,|$)/, 'allergy'],
  [/\bi have (?:an? )?allergy to (.+?)(?:\.|,|$)/, 'allergy'],
  [/\bi(?:'m| am) sensitive to (.+?)(?:\.|,|$)/, 'sensitivity'],
  [/\bi prefer (.+?)(?:\.|,|$)/, 'preference'],
  [/\bi like (.+?)(?:\.|,|!|$)/, 'preference'],
  [/\bi don'?t like (.+?)(?:\.|,|!|$)/, 'aversion'],
];

export function detectUserFacts(text: string): Fact[] {
  const lower = text.toLowerCase();
  const facts: Fact[] = [];
  for (const [pattern, category] of FACT_PATTERNS) {
    const match = pattern.exec(lower);
    const value = match?.[1]?.trim();
    if (value) {
      facts.push({ category, value, sourceText: text });
    }
  }
  return facts;
}
