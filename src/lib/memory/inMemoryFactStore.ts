/**
 * In-process LongTermFactStore for tests, scripts and single-node use.
 * Values are cloned on the way in and out so callers cannot mutate stored
 * state.
 */

import {
  namespaceKey,
  type JsonObject,
  type LongTermFactStore,
  type MemoryItem,
  type MemoryNamespace,
  type MemorySearchOptions,
} from './factStore.types';

export class InMemoryFactStore implements LongTermFactStore {
  private readonly namespaces = new Map<string, Map<string, JsonObject>>();

  async search(namespace: MemoryNamespace, options: MemorySearchOptions = {}): Promise<MemoryItem[]> {
    const items = this.namespaces.get(namespaceKey(namespace));
    if (!items) return [];

    const result: MemoryItem[] = [];
    for (const [key, value] of items) {
      if (options.limit !== undefined && result.length >= options.limit) break;
      result.push({ key, value: structuredClone(value) });
    }
    return result;
  }

  async get(namespace: MemoryNamespace, key: string): Promise<MemoryItem | null> {
    const value = this.namespaces.get(namespaceKey(namespace))?.get(key);
    return value ? { key, value: structuredClone(value) } : null;
  }

  async put(namespace: MemoryNamespace, key: string, value: JsonObject): Promise<void> {
    const nsKey = namespaceKey(namespace);
    let items = this.namespaces.get(nsKey);
    if (!items) {
      items = new Map();
      this.namespaces.set(nsKey, items);
    }
    items.set(key, structuredClone(value));
  }

  async delete(namespace: MemoryNamespace, key: string): Promise<void> {
    const nsKey = namespaceKey(namespace);
    const items = this.namespaces.get(nsKey);
    if (!items) return;
    items.delete(key);
    if (items.size === 0) this.namespaces.delete(nsKey);
  }

  /** Number of stored items across all namespaces */
  get size(): number {
    let total = 0;
    for (const items of this.namespaces.values()) total += items.size;
    return total;
  }
}
