#!/usr/bin/env tsx
/**
 * Run one concierge turn from the command line
 *
 * Loads .env.local / .env, then runs the message through the safety core
 * against the sample catalog and prints the turn result and the response
 * system prompt. Uses Supabase memory when SUPABASE_URL is set, otherwise an
 * in-process store seeded with --allergy values.
 *
 * Usage: npm run turn -- "Can you recommend a moisturizer?" --allergy paraben
 * Or: tsx scripts/run-turn.ts "<message>" [--user <id>] [--allergy <ingredient>]...
 */

import * as fs from 'fs';
import * as path from 'path';
import { config } from 'dotenv';
import { z } from 'zod';
import { getGeminiClient } from '@/src/lib/ai/gemini/gemini.client';
import { getConciergeConfig } from '@/src/lib/config/concierge.config';
import { addConstraint } from '@/src/lib/memory/constraintStore';
import type { LongTermFactStore } from '@/src/lib/memory/factStore.types';
import { InMemoryFactStore } from '@/src/lib/memory/inMemoryFactStore';
import { SupabaseFactStore } from '@/src/lib/memory/supabaseFactStore';
import { ConciergeTurnService } from '@/src/lib/pipeline/conciergeTurn.service';
import type { CandidateSource } from '@/src/lib/pipeline/pipeline.types';
import { buildResponseSystemPrompt } from '@/src/lib/pipeline/responseContext';
import { createAdminClient } from '@/src/lib/supabase/admin';

config({ path: path.join(process.cwd(), '.env.local') });
config();

const candidatesSchema = z.array(
  z.object({
    id: z.string().optional(),
    name: z.string(),
    brand: z.string().optional(),
    ingredients: z.union([z.array(z.string()), z.string()]),
    categories: z.array(z.string()).optional(),
  }),
);

function parseArgs(argv: string[]): { message: string; userId: string; allergies: string[] } {
  const words: string[] = [];
  const allergies: string[] = [];
  let userId = 'local-user';

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--allergy' && argv[i + 1]) {
      allergies.push(argv[++i]);
    } else if (arg === '--user' && argv[i + 1]) {
      userId = argv[++i];
    } else {
      words.push(arg);
    }
  }
  return { message: words.join(' '), userId, allergies };
}

/** Keyword match over name and categories; the real catalog search lives elsewhere */
function createSampleCatalog(): CandidateSource {
  const raw: unknown = JSON.parse(
    fs.readFileSync(path.join(process.cwd(), 'scripts', 'data', 'sample-candidates.json'), 'utf-8'),
  );
  const catalog = candidatesSchema.parse(raw);

  return {
    async fetchCandidates({ query, limit }) {
      const terms = query.toLowerCase().split(/\s+/).filter(Boolean);
      const hits = catalog.filter((candidate) => {
        const haystack = [candidate.name, ...(candidate.categories ?? [])].join(' ').toLowerCase();
        return terms.some((term) => haystack.includes(term));
      });
      return (hits.length > 0 ? hits : catalog).slice(0, limit);
    },
  };
}

async function runTurn() {
  const { message, userId, allergies } = parseArgs(process.argv.slice(2));
  if (!message) {
    console.error('❌ Usage: tsx scripts/run-turn.ts "<message>" [--user <id>] [--allergy <ingredient>]');
    process.exit(1);
  }

  const conciergeConfig = getConciergeConfig();
  const store: LongTermFactStore = conciergeConfig.supabase.url
    ? new SupabaseFactStore(createAdminClient(conciergeConfig.supabase), {
        table: conciergeConfig.supabase.memoryTable,
      })
    : new InMemoryFactStore();

  for (const ingredient of allergies) {
    await addConstraint(store, userId, { ingredient, source: 'user_api' });
  }

  const service = new ConciergeTurnService({
    store,
    llm: getGeminiClient(),
    candidateSource: createSampleCatalog(),
    config: conciergeConfig,
  });

  const result = await service.handleTurn({ userId, message });

  console.log('\n' + '='.repeat(50));
  if (result.kind === 'override_refused') {
    console.log(`🛑 Override refused (${result.category})`);
    console.log(result.response);
    console.log('='.repeat(50));
    return;
  }

  console.log(`🧭 Intent:   ${result.intent}`);
  console.log(`🪜 Stages:   ${result.stages.join(' → ')}`);
  console.log(`✅ Safe:     ${result.survivors.map((s) => `${s.name} (${s.safetyScore}/10)`).join(', ') || '-'}`);
  console.log(`⛔ Vetoed:   ${result.violations.map((v) => `${v.product} [${v.gate}]`).join(', ') || '-'}`);
  console.log(`🔎 Gate 2:   ${result.gate2Status}`);
  if (result.constraintsUnavailable) console.log('⚠️  Constraints unavailable: recommendations blocked');
  console.log('='.repeat(50));
  console.log(buildResponseSystemPrompt(result));
}

runTurn().catch((err) => {
  console.error('💥 Fatal error:', err);
  process.exit(1);
});
