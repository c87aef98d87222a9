/**
 * Language Model Interface
 * Layer: Domain
 *
 * Chat completions and embeddings behind one port, since both come from the
 * same provider account. OpenAiLanguageModel is the production adapter; the
 * tests use an in-process fake.
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  model?: string;
  temperature?: number;
}

export interface ILanguageModel {
  /** Returns the trimmed text of the first choice. */
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;

  embed(text: string): Promise<number[]>;

  /** One vector per input, in input order. */
  embedMany(texts: string[]): Promise<number[][]>;

  /** False when no API key is configured. */
  isConfigured(): boolean;
}
