/**
 * Long-term fact store - the only way the safety core reaches persisted
 * user memory. Values are plain JSON objects; callers validate on read.
 */

export type JsonObject = Record<string, unknown>;

export type MemoryNamespaceKind = 'user_facts' | 'constraints' | 'pending_confirmations';

/** [kind, userId] */
export type MemoryNamespace = readonly [kind: MemoryNamespaceKind, userId: string];

export type MemoryItem = {
  key: string;
  value: JsonObject;
};

export type MemorySearchOptions = {
  /** Max items returned; unlimited when unset */
  limit?: number;
};

export interface LongTermFactStore {
  /** Items of one namespace, oldest first */
  search(namespace: MemoryNamespace, options?: MemorySearchOptions): Promise<MemoryItem[]>;
  get(namespace: MemoryNamespace, key: string): Promise<MemoryItem | null>;
  /** Insert or replace */
  put(namespace: MemoryNamespace, key: string, value: JsonObject): Promise<void>;
  /** No-op when the key is absent */
  delete(namespace: MemoryNamespace, key: string): Promise<void>;
}

export const userFactsNamespace = (userId: string): MemoryNamespace => ['user_facts', userId];

export const constraintsNamespace = (userId: string): MemoryNamespace => ['constraints', userId];

export const pendingConfirmationsNamespace = (userId: string): MemoryNamespace => [
  'pending_confirmations',
  userId,
];

/**
 * Flat storage form of a namespace ("constraints:user-1")
 */
export function namespaceKey(namespace: MemoryNamespace): string {
  return namespace.join(':');
}
