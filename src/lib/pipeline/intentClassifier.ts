/**
 * Intent classification - one low-temperature model call per turn.
 */

import type { GenerativeTextService } from '@/src/lib/ai/generative.types';
import { errorMessage } from '@/src/lib/errors/app-error';
import { withTimeout } from '@/src/lib/utils/withTimeout';
import { parseIntent } from './pipelineRouter';
import type { Intent } from './pipeline.types';

export const TRIAGE_SYSTEM_PROMPT = `You are a triage router for an AI beauty and skincare concierge.
Classify the user's message into exactly one intent.

Intents:
- product_search: User wants product recommendations or is looking for specific products
- ingredient_check: User asks about specific ingredients, safety, or compatibility
- routine_advice: User wants skincare routine help, ordering, or regimen advice
- memory_query: User asks what you remember or know about them
- general_chat: Greetings, thanks, off-topic, or general conversation

Respond with ONLY the intent name, nothing else.`;

/**
 * Classify a user message. Failures and timeouts classify as general_chat.
 */
export async function classifyIntent(
  llm: GenerativeTextService,
  message: string,
  timeoutMs: number,
): Promise<Intent> {
  try {
    const raw = await withTimeout(
      llm.generate({
        systemPrompt: TRIAGE_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: message }],
        temperature: 0,
        purpose: 'classify',
      }),
      timeoutMs,
      'intent-classification',
    );
    const intent = parseIntent(raw);
    console.info('[IntentClassifier] Intent classified', { intent });
    return intent;
  } catch (error) {
    console.error('[IntentClassifier] Classification failed, defaulting to general_chat', {
      error: errorMessage(error),
    });
    return 'general_chat';
  }
}
