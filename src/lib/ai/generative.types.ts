/**
 * Generative text service - the opaque model behind classification, the
 * safety second gate and search extraction. Call sites depend on this
 * interface only.
 */

export type ChatRole = 'user' | 'assistant';

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

/**
 * Model selection policy. `safety` may run on a separate (stronger) model.
 */
export type ModelPurpose = 'chat' | 'classify' | 'extract' | 'safety';

export type GenerateTextArgs = {
  systemPrompt: string;
  messages: ChatMessage[];
  /** 0.0-1.0, default 0 */
  temperature?: number;
  purpose?: ModelPurpose;
};

export interface GenerativeTextService {
  generate(args: GenerateTextArgs): Promise<string>;
}
