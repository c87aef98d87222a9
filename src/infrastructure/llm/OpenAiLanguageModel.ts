/**
 * OpenAI Language Model
 * Layer: Infrastructure
 * Pattern: Adapter (implements ILanguageModel)
 *
 * Chat completions and embeddings through the official SDK. The client is
 * built once in the container with the configured timeout and retry count;
 * retries are the SDK's own, nothing is retried here. SDK errors are mapped
 * to ExternalServiceError so callers only deal with AppError subclasses.
 */
import OpenAI, { APIConnectionTimeoutError } from 'openai';
import { inject, injectable } from 'tsyringe';

import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { ChatMessage, CompletionOptions, ILanguageModel } from '@domain/interfaces/ILanguageModel';
import { AppError, errorMessage, ExternalServiceError } from '@shared/errors/AppError';

@injectable()
export class OpenAiLanguageModel implements ILanguageModel {
  constructor(
    @inject(TOKENS.OpenAI) private client: OpenAI,
    @inject(TOKENS.Config) private settings: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  isConfigured(): boolean {
    return this.settings.openai.apiKey.length > 0;
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const model = options.model ?? this.settings.openai.chatModel;
    const startMs = Date.now();

    const response = await this.call(() =>
      this.client.chat.completions.create({
        model,
        messages: messages.map((message) => ({ role: message.role, content: message.content })),
        temperature: options.temperature,
      }),
    );

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new ExternalServiceError('OpenAI', `empty completion from ${model}`);
    }

    this.log.debug({ model, ms: Date.now() - startMs, usage: response.usage }, 'Completion received');
    return content;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    if (!vector) throw new ExternalServiceError('OpenAI', 'no embedding returned');
    return vector;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const model = this.settings.openai.embeddingModel;

    const response = await this.call(() => this.client.embeddings.create({ model, input: texts }));
    if (response.data.length !== texts.length) {
      throw new ExternalServiceError(
        'OpenAI',
        `expected ${texts.length} embeddings, received ${response.data.length}`,
      );
    }

    this.log.debug({ model, count: texts.length }, 'Embeddings received');
    return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }

  private async call<T>(request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (err) {
      if (err instanceof AppError) throw err;
      if (err instanceof APIConnectionTimeoutError) {
        throw new ExternalServiceError('OpenAI', 'request timed out', err);
      }
      throw new ExternalServiceError('OpenAI', errorMessage(err), err);
    }
  }
}
