/**
 * Gemini Client - GenerativeTextService backed by Google Gemini
 *
 * Models are configured via env (see concierge.config.ts). No model names are
 * hardcoded in call sites.
 *
 *   GEMINI_API_KEY           - Required for the default client
 *   GEMINI_MODEL             - Default model for all purposes
 *   GEMINI_MODEL_SAFETY      - Safety second gate (falls back to GEMINI_MODEL)
 *   GEMINI_MAX_OUTPUT_TOKENS - Max tokens per response (default 2048)
 */

import { GoogleGenAI, type Content, type GenerateContentParameters } from '@google/genai';
import { AppError, errorMessage } from '@/src/lib/errors/app-error';
import { getConciergeConfig, type ConciergeConfig } from '@/src/lib/config/concierge.config';
import type {
  ChatMessage,
  GenerateTextArgs,
  GenerativeTextService,
  ModelPurpose,
} from '../generative.types';

/**
 * The slice of `GoogleGenAI['models']` this client calls
 */
export type GeminiModelsApi = {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
};

export type GeminiClientOptions = {
  config: ConciergeConfig['gemini'];
  /** Defaults to `new GoogleGenAI({ apiKey }).models` */
  models?: GeminiModelsApi;
  /** Backoff wait; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
};

const MAX_RETRIES = 3;
const BASE_DELAY_MS = 2000;

/**
 * 429 / RESOURCE_EXHAUSTED / quota messages from the Gemini API
 */
export function isRateLimitError(message: string): boolean {
  return (
    message.includes('429') ||
    message.includes('RESOURCE_EXHAUSTED') ||
    message.includes('quota') ||
    message.includes('rate limit') ||
    message.includes('RPM')
  );
}

/**
 * Map chat history to Gemini contents (assistant turns use the `model` role)
 */
export function toGeminiContents(messages: ChatMessage[]): Content[] {
  return messages.map((message) => ({
    role: message.role === 'assistant' ? 'model' : 'user',
    parts: [{ text: message.content }],
  }));
}

export class GeminiClient implements GenerativeTextService {
  private readonly models: GeminiModelsApi;
  private readonly config: ConciergeConfig['gemini'];
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: GeminiClientOptions) {
    this.config = options.config;
    this.sleep =
      options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));

    if (options.models) {
      this.models = options.models;
    } else {
      const apiKey = options.config.apiKey;
      if (!apiKey) {
        throw new AppError(
          'CONFIG_ERROR',
          'GEMINI_API_KEY environment variable is required. Please set it in your .env file.',
        );
      }
      this.models = new GoogleGenAI({ apiKey }).models;
    }
  }

  /**
   * Get model name for a purpose. Only `safety` has its own override.
   */
  getModelName(purpose: ModelPurpose = 'chat'): string {
    switch (purpose) {
      case 'safety':
        return this.config.safetyModel ?? this.config.model;
      default:
        return this.config.model;
    }
  }

  /**
   * Generate plain text from a system prompt and chat messages.
   * Rate limits are retried with exponential backoff (2s, 4s, 8s); any other
   * failure surfaces as LLM_ERROR. The safety purpose gets a single attempt
   * per call.
   */
  async generate(args: GenerateTextArgs): Promise<string> {
    const { systemPrompt, messages, temperature = 0, purpose = 'chat' } = args;
    const modelName = this.getModelName(purpose);
    const maxRetries = purpose === 'safety' ? 0 : MAX_RETRIES;

    for (let attempt = 0; ; attempt++) {
      try {
        const response = await this.models.generateContent({
          model: modelName,
          contents: toGeminiContents(messages),
          config: {
            systemInstruction: systemPrompt,
            temperature,
            maxOutputTokens: this.config.maxOutputTokens,
          },
        });

        const text = response.text;
        if (!text) {
          throw new Error('Empty response from Gemini API');
        }
        return text;
      } catch (error) {
        const message = errorMessage(error);
        const isRateLimit = isRateLimitError(message);

        if (isRateLimit && attempt < maxRetries) {
          const delayMs = BASE_DELAY_MS * Math.pow(2, attempt);
          console.warn(
            `[GeminiClient] generate rate limit (attempt ${attempt + 1}/${maxRetries + 1}), retrying in ${delayMs}ms...`,
          );
          await this.sleep(delayMs);
          continue;
        }

        if (!isRateLimit) {
          console.error('[GeminiClient] generate error:', message);
          throw new AppError('LLM_ERROR', `Gemini API error: ${message}`, error);
        }

        throw new AppError(
          'LLM_ERROR',
          `Gemini API rate limit exceeded after ${maxRetries + 1} attempts (model ${modelName})`,
          error,
        );
      }
    }
  }
}

let clientInstance: GeminiClient | null = null;

/**
 * Get or create the Gemini client from env config
 */
export function getGeminiClient(): GeminiClient {
  if (!clientInstance) {
    clientInstance = new GeminiClient({ config: getConciergeConfig().gemini });
  }
  return clientInstance;
}
