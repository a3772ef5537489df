/**
 * Background extraction - after a conversation goes quiet, ask the model
 * for durable facts the pattern detector missed and ingest them like
 * stated facts. Scheduled through ExtractionTaskQueue, keyed by conversation.
 */

import type { ChatMessage, GenerativeTextService } from '@/src/lib/ai/generative.types';
import type { ExtractionTaskQueue, ScheduledTask } from '@/src/lib/tasks/extractionTaskQueue';
import { withTimeout } from '@/src/lib/utils/withTimeout';
import type { LongTermFactStore } from './factStore.types';
import { factCategorySchema, type Fact } from './memory.schemas';
import { storeDetectedFacts } from './factIngestion';

export const EXTRACTION_PROMPT = `Extract noteworthy facts the user stated about themselves in this beauty consultation.

Only extract:
- skin_type (oily, dry, combination, sensitive, normal)
- age
- allergy (ingredients the user is allergic to)
- sensitivity (ingredients the user reacts to)
- preference (textures, formats, brands the user likes)
- aversion (things the user wants to avoid)

Do not extract one-time search queries, shopping context for other people,
conversational filler, or anything the assistant said.

Respond with one fact per line as <category>: <value>, lowercase.
Respond with NONE if there is nothing to extract.`;

/**
 * Parse `<category>: <value>` lines. Unknown categories and blank values
 * are dropped; a fact is kept once per category/value pair.
 */
export function parseExtractedFacts(response: string, sourceText: string): Fact[] {
  const facts: Fact[] = [];
  const seen = new Set<string>();

  for (const line of response.split('\n')) {
    const separator = line.indexOf(':');
    if (separator === -1) continue;

    const category = factCategorySchema.safeParse(
      line.slice(0, separator).replace(/^[\s*-]+/, '').trim().toLowerCase(),
    );
    const value = line.slice(separator + 1).trim().toLowerCase().replace(/\.$/, '');
    if (!category.success || !value) continue;

    const id = `${category.data}:${value}`;
    if (seen.has(id)) continue;
    seen.add(id);
    facts.push({ category: category.data, value, sourceText });
  }
  return facts;
}

export type ConversationExtractionInput = {
  store: LongTermFactStore;
  llm: GenerativeTextService;
  userId: string;
  messages: ChatMessage[];
  timeoutMs: number;
};

/**
 * Run one extraction pass over a conversation. Returns the notifications
 * ingestion produced (not shown to the user; useful for logs and tests).
 */
export async function extractConversationFacts(
  input: ConversationExtractionInput,
  signal?: AbortSignal,
): Promise<string[]> {
  const userText = input.messages
    .filter((m) => m.role === 'user')
    .map((m) => m.content)
    .join('\n');
  if (!userText.trim()) return [];

  const response = await withTimeout(
    input.llm.generate({
      systemPrompt: EXTRACTION_PROMPT,
      messages: input.messages,
      temperature: 0,
      purpose: 'extract',
    }),
    input.timeoutMs,
    'background-extraction',
  );
  if (signal?.aborted) return [];

  const facts = parseExtractedFacts(response, userText);
  if (facts.length === 0) return [];

  const notifications = await storeDetectedFacts(input.store, input.userId, facts);
  console.info('[BackgroundExtraction] Facts extracted', {
    userId: input.userId,
    count: facts.length,
  });
  return notifications;
}

/**
 * Schedule extraction for a conversation; a newer message restarts the delay.
 */
export function scheduleConversationExtraction(
  queue: ExtractionTaskQueue,
  conversationId: string,
  delayMs: number,
  input: ConversationExtractionInput,
): ScheduledTask {
  return queue.schedule({
    idempotencyKey: conversationId,
    delayMs,
    run: async (signal) => {
      await extractConversationFacts(input, signal);
    },
  });
}
