/**
 * Search intent - turn the user's message into a catalog query.
 */

import type { GenerativeTextService } from '@/src/lib/ai/generative.types';
import { errorMessage } from '@/src/lib/errors/app-error';
import { withTimeout } from '@/src/lib/utils/withTimeout';

export const SEARCH_INTENT_PROMPT = `You are a search intent extractor for a beauty product database.
Given the user's message and conversation context, extract the search parameters.
Respond in this exact format (one per line):
product_type: <type of product, e.g. moisturizer, cleanser, serum>
properties: <desired properties, e.g. hydrating, oil-free, anti-aging>
skin_type: <user's skin type if mentioned, e.g. oily, dry, combination, sensitive>

If a field is not mentioned, write "unknown" for that field.`;

export type SearchIntent = {
  productType?: string;
  properties?: string;
  skinType?: string;
};

const FIELD_BY_KEY = new Map<string, keyof SearchIntent>([
  ['product_type', 'productType'],
  ['properties', 'properties'],
  ['skin_type', 'skinType'],
]);

/**
 * Parse `field: value` lines. Unknown fields and "unknown" values are dropped.
 */
export function parseSearchIntent(text: string): SearchIntent {
  const intent: SearchIntent = {};
  for (const line of text.trim().split('\n')) {
    const separator = line.indexOf(':');
    if (separator === -1) continue;

    const field = FIELD_BY_KEY.get(line.slice(0, separator).trim().toLowerCase());
    const value = line.slice(separator + 1).trim();
    if (!field || !value || value.toLowerCase() === 'unknown') continue;
    intent[field] = value;
  }
  return intent;
}

/**
 * "<product type> <properties> for <skin type> skin", or the fallback when
 * nothing was extracted.
 */
export function buildSearchQuery(intent: SearchIntent, fallback: string): string {
  const parts: string[] = [];
  if (intent.productType) parts.push(intent.productType);
  if (intent.properties) parts.push(intent.properties);
  if (intent.skinType) parts.push(`for ${intent.skinType} skin`);
  return parts.length > 0 ? parts.join(' ') : fallback.trim();
}

export async function extractSearchQuery(
  llm: GenerativeTextService,
  message: string,
  timeoutMs: number,
): Promise<string> {
  let intent: SearchIntent = {};
  try {
    const response = await withTimeout(
      llm.generate({
        systemPrompt: SEARCH_INTENT_PROMPT,
        messages: [{ role: 'user', content: message }],
        temperature: 0,
        purpose: 'extract',
      }),
      timeoutMs,
      'search-intent',
    );
    intent = parseSearchIntent(response);
  } catch (error) {
    console.error('[SearchIntent] Extraction failed, searching with the message text', {
      error: errorMessage(error),
    });
  }

  const query = buildSearchQuery(intent, message);
  console.info('[SearchIntent] Search query built', { query });
  return query;
}
