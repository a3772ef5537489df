/**
 * Supabase-backed LongTermFactStore
 *
 * Table (default `memory_items`):
 *   namespace text, key text, value jsonb, updated_at timestamptz,
 *   primary key (namespace, key)
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { AppError } from '@/src/lib/errors/app-error';
import {
  namespaceKey,
  type JsonObject,
  type LongTermFactStore,
  type MemoryItem,
  type MemoryNamespace,
  type MemorySearchOptions,
} from './factStore.types';

const memoryRowSchema = z.object({
  key: z.string(),
  value: z.record(z.unknown()),
});

export type SupabaseFactStoreOptions = {
  table?: string;
  /** Clock for updated_at */
  now?: () => Date;
};

export class SupabaseFactStore implements LongTermFactStore {
  private readonly table: string;
  private readonly now: () => Date;

  constructor(
    private readonly supabase: SupabaseClient,
    options: SupabaseFactStoreOptions = {},
  ) {
    this.table = options.table ?? 'memory_items';
    this.now = options.now ?? (() => new Date());
  }

  async search(namespace: MemoryNamespace, options: MemorySearchOptions = {}): Promise<MemoryItem[]> {
    let query = this.supabase
      .from(this.table)
      .select('key, value')
      .eq('namespace', namespaceKey(namespace))
      .order('updated_at', { ascending: true });
    if (options.limit !== undefined) query = query.limit(options.limit);

    const { data, error } = await query;
    if (error) {
      throw new AppError('STORE_ERROR', `Memory search failed: ${error.message}`, {
        namespace: namespaceKey(namespace),
      });
    }
    return this.toItems(data ?? [], namespace);
  }

  async get(namespace: MemoryNamespace, key: string): Promise<MemoryItem | null> {
    const { data, error } = await this.supabase
      .from(this.table)
      .select('key, value')
      .eq('namespace', namespaceKey(namespace))
      .eq('key', key)
      .limit(1);

    if (error) {
      throw new AppError('STORE_ERROR', `Memory read failed: ${error.message}`, {
        namespace: namespaceKey(namespace),
        key,
      });
    }
    const [item] = this.toItems(data ?? [], namespace);
    return item ?? null;
  }

  async put(namespace: MemoryNamespace, key: string, value: JsonObject): Promise<void> {
    const { error } = await this.supabase.from(this.table).upsert(
      {
        namespace: namespaceKey(namespace),
        key,
        value,
        updated_at: this.now().toISOString(),
      },
      { onConflict: 'namespace,key' },
    );

    if (error) {
      throw new AppError('STORE_ERROR', `Memory write failed: ${error.message}`, {
        namespace: namespaceKey(namespace),
        key,
      });
    }
  }

  async delete(namespace: MemoryNamespace, key: string): Promise<void> {
    const { error } = await this.supabase
      .from(this.table)
      .delete()
      .eq('namespace', namespaceKey(namespace))
      .eq('key', key);

    if (error) {
      throw new AppError('STORE_ERROR', `Memory delete failed: ${error.message}`, {
        namespace: namespaceKey(namespace),
        key,
      });
    }
  }

  private toItems(rows: unknown[], namespace: MemoryNamespace): MemoryItem[] {
    const items: MemoryItem[] = [];
    for (const row of rows) {
      const parsed = memoryRowSchema.safeParse(row);
      if (!parsed.success) {
        console.warn('[SupabaseFactStore] Skipping malformed memory row', {
          namespace: namespaceKey(namespace),
        });
        continue;
      }
      items.push(parsed.data);
    }
    return items;
  }
}
