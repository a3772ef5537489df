import { describe, it } from 'node:test';
import assert from 'node:assert';
import { classifyIntent } from './intentClassifier';
import type { GenerateTextArgs, GenerativeTextService } from '@/src/lib/ai/generative.types';

function createFakeLlm(
  reply: () => Promise<string>,
): GenerativeTextService & { calls: GenerateTextArgs[] } {
  const calls: GenerateTextArgs[] = [];
  return {
    calls,
    generate(args) {
      calls.push(args);
      return reply();
    },
  };
}

describe('classifyIntent', () => {
  it('classifies with a deterministic classify call', async () => {
    const llm = createFakeLlm(async () => 'routine_advice\n');

    assert.strictEqual(await classifyIntent(llm, 'What order should I apply serums?', 1000), 'routine_advice');
    assert.strictEqual(llm.calls[0].purpose, 'classify');
    assert.strictEqual(llm.calls[0].temperature, 0);
  });

  it('maps out-of-vocabulary labels to general_chat', async () => {
    const llm = createFakeLlm(async () => 'shopping');
    assert.strictEqual(await classifyIntent(llm, 'hi', 1000), 'general_chat');
  });

  it('falls back to general_chat on failure', async () => {
    const llm = createFakeLlm(async () => {
      throw new Error('service unavailable');
    });
    assert.strictEqual(await classifyIntent(llm, 'hi', 1000), 'general_chat');
  });

  it('falls back to general_chat on timeout', async () => {
    const llm = createFakeLlm(() => new Promise<string>(() => undefined));
    assert.strictEqual(await classifyIntent(llm, 'hi', 10), 'general_chat');
  });
});
