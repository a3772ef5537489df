/**
 * Concierge config – read from env (see .env.example).
 * Scripts load .env through dotenv before the first call; the library itself
 * never touches the filesystem for config.
 */

import { z } from 'zod';
import { AppError } from '@/src/lib/errors/app-error';

export const constraintLoadPolicySchema = z.enum(['fail_closed', 'fail_open']);

export type ConstraintLoadPolicy = z.infer<typeof constraintLoadPolicySchema>;

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().min(1).default('gemini-2.0-flash'),
  GEMINI_MODEL_SAFETY: z.string().min(1).optional(),
  GEMINI_MAX_OUTPUT_TOKENS: positiveInt(2048),
  CONCIERGE_LLM_TIMEOUT_MS: positiveInt(60_000),
  CONCIERGE_STORE_TIMEOUT_MS: positiveInt(5_000),
  CONCIERGE_CONSTRAINT_LOAD_POLICY: constraintLoadPolicySchema.default('fail_closed'),
  CONCIERGE_CANDIDATE_LIMIT: positiveInt(10),
  CONCIERGE_EXTRACTION_DELAY_MS: z.coerce.number().int().min(0).default(30_000),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
  CONCIERGE_MEMORY_TABLE: z.string().min(1).default('memory_items'),
});

export type ConciergeConfig = {
  gemini: {
    apiKey?: string;
    model: string;
    safetyModel?: string;
    maxOutputTokens: number;
  };
  llmTimeoutMs: number;
  storeTimeoutMs: number;
  constraintLoadPolicy: ConstraintLoadPolicy;
  candidateLimit: number;
  extractionDelayMs: number;
  supabase: {
    url?: string;
    serviceRoleKey?: string;
    memoryTable: string;
  };
};

/** Empty strings in env mean "unset". */
function withoutBlanks(
  env: Record<string, string | undefined>,
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

/**
 * Parse a config from an env-like record. Throws CONFIG_ERROR on invalid values.
 */
export function parseConciergeConfig(
  env: Record<string, string | undefined>,
): ConciergeConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new AppError('CONFIG_ERROR', `Invalid concierge configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    gemini: {
      apiKey: e.GEMINI_API_KEY,
      model: e.GEMINI_MODEL,
      safetyModel: e.GEMINI_MODEL_SAFETY,
      maxOutputTokens: e.GEMINI_MAX_OUTPUT_TOKENS,
    },
    llmTimeoutMs: e.CONCIERGE_LLM_TIMEOUT_MS,
    storeTimeoutMs: e.CONCIERGE_STORE_TIMEOUT_MS,
    constraintLoadPolicy: e.CONCIERGE_CONSTRAINT_LOAD_POLICY,
    candidateLimit: e.CONCIERGE_CANDIDATE_LIMIT,
    extractionDelayMs: e.CONCIERGE_EXTRACTION_DELAY_MS,
    supabase: {
      url: e.SUPABASE_URL,
      serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
      memoryTable: e.CONCIERGE_MEMORY_TABLE,
    },
  };
}

let cached: ConciergeConfig | null = null;

/** Get concierge config (process.env). Reset cache for tests with resetConciergeConfigCache(). */
export function getConciergeConfig(): ConciergeConfig {
  if (!cached) {
    cached = parseConciergeConfig(process.env);
  }
  return cached;
}

/** Only for tests – reset in-memory cache so config is re-read. */
export function resetConciergeConfigCache(): void {
  cached = null;
}
