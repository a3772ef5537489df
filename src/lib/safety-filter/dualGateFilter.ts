/**
 * Dual-Gate Safety Filter
 *
 * Gate 1 (rule_based): deterministic ontology match per candidate.
 * Gate 2 (llm_check): generative review of Gate-1 survivors for synonyms the
 * ontology misses. Gate 2 can only remove candidates; when it fails the
 * Gate-1 result stands.
 */

import { AppError, errorMessage } from '@/src/lib/errors/app-error';
import { toIngredientList } from '@/src/lib/allergens/ingredientParser';
import { getDefaultAllergenMatcher } from '@/src/lib/allergens/allergenMatcher';
import { withTimeout } from '@/src/lib/utils/withTimeout';
import { buildGate2Prompt, candidateDisplayName, GATE2_USER_MESSAGE } from './safetyFilter.prompts';
import type {
  Candidate,
  DualGateInput,
  DualGateResult,
  Gate2Status,
  LlmCheckViolation,
  Violation,
} from './safetyFilter.types';

const VERDICT = /\b(?:UN)?SAFE\b/i;

/**
 * Parse the Gate-2 response. Each line mentioning UNSAFE removes every
 * still-surviving candidate whose name appears in that line.
 */
export function parseGate2Response(
  response: string,
  survivors: Candidate[],
): { survivors: Candidate[]; violations: LlmCheckViolation[]; parsed: boolean } {
  const remaining = [...survivors];
  const violations: LlmCheckViolation[] = [];
  let parsed = false;

  for (const line of response.split('\n')) {
    if (VERDICT.test(line)) parsed = true;
    if (!line.toUpperCase().includes('UNSAFE')) continue;

    const lowerLine = line.toLowerCase();
    for (const candidate of [...remaining]) {
      const name = candidateDisplayName(candidate);
      if (!lowerLine.includes(name.toLowerCase())) continue;

      remaining.splice(remaining.indexOf(candidate), 1);
      violations.push({
        gate: 'llm_check',
        product: name,
        candidate,
        reason: line.trim(),
      });
    }
  }

  return { survivors: remaining, violations, parsed };
}

export async function runDualGateFilter(input: DualGateInput): Promise<DualGateResult> {
  const { candidates, constraints, llm, timeoutMs } = input;
  const matcher = input.matcher ?? getDefaultAllergenMatcher();

  if (constraints.length === 0 || candidates.length === 0) {
    return { survivors: [...candidates], violations: [], allVetoed: false, gate2Status: 'skipped' };
  }

  // Gate 1
  let survivors: Candidate[] = [];
  const violations: Violation[] = [];

  for (const candidate of candidates) {
    const matches = matcher.findAllergenMatches(toIngredientList(candidate.ingredients), constraints);
    const [first] = matches;
    if (!first) {
      survivors.push(candidate);
      continue;
    }
    violations.push({
      gate: 'rule_based',
      product: candidateDisplayName(candidate),
      candidate,
      matches,
      matchedIngredient: first.ingredient,
      matchedAllergen: first.allergen,
      matchType: first.matchType,
    });
    console.info('[DualGateFilter] Candidate vetoed by rule-based gate', {
      product: candidate.name,
      matches: matches.length,
    });
  }

  // Gate 2
  let gate2Status: Gate2Status = 'skipped';
  if (survivors.length > 0) {
    try {
      const response = await withTimeout(
        llm.generate({
          systemPrompt: buildGate2Prompt(survivors, constraints),
          messages: [{ role: 'user', content: GATE2_USER_MESSAGE }],
          temperature: 0,
          purpose: 'safety',
        }),
        timeoutMs,
        'safety-gate-2',
      );

      const gate2 = parseGate2Response(response, survivors);
      if (gate2.parsed) {
        survivors = gate2.survivors;
        violations.push(...gate2.violations);
        gate2Status = 'completed';
      } else {
        gate2Status = 'unparseable';
        console.warn('[DualGateFilter] Gate 2 response had no verdicts, keeping rule-based results', {
          survivors: survivors.length,
        });
      }
    } catch (error) {
      gate2Status = error instanceof AppError && error.code === 'TIMEOUT' ? 'timeout' : 'failed';
      console.error('[DualGateFilter] Gate 2 check failed, keeping rule-based results', {
        status: gate2Status,
        error: errorMessage(error),
      });
    }
  }

  return {
    survivors,
    violations,
    allVetoed: survivors.length === 0,
    gate2Status,
  };
}
