import OpenAI, { APIConnectionTimeoutError } from 'openai';

import { OpenAiLanguageModel } from '@infrastructure/llm/OpenAiLanguageModel';
import { ExternalServiceError } from '@shared/errors/AppError';

import { silentLogger, testConfig } from '../helpers/fixtures';

describe('OpenAiLanguageModel', () => {
  let completionsCreate: jest.Mock;
  let embeddingsCreate: jest.Mock;
  let model: OpenAiLanguageModel;

  beforeEach(() => {
    completionsCreate = jest.fn();
    embeddingsCreate = jest.fn();
    const client = {
      chat: { completions: { create: completionsCreate } },
      embeddings: { create: embeddingsCreate },
    } as unknown as OpenAI;
    model = new OpenAiLanguageModel(client, testConfig, silentLogger);
  });

  describe('complete', () => {
    it('should return the trimmed first choice from the chat model', async () => {
      completionsCreate.mockResolvedValue({ choices: [{ message: { content: '  SELECT 1  ' } }] });

      const answer = await model.complete([{ role: 'user', content: 'Say SELECT 1' }]);

      expect(answer).toBe('SELECT 1');
      expect(completionsCreate).toHaveBeenCalledWith({
        model: 'chat-model',
        messages: [{ role: 'user', content: 'Say SELECT 1' }],
        temperature: undefined,
      });
    });

    it('should use the model passed in the options', async () => {
      completionsCreate.mockResolvedValue({ choices: [{ message: { content: 'A table.' } }] });

      await model.complete([{ role: 'user', content: 'Describe' }], { model: 'description-model' });

      expect(completionsCreate).toHaveBeenCalledWith(expect.objectContaining({ model: 'description-model' }));
    });

    it('should treat an empty answer as a failure', async () => {
      completionsCreate.mockResolvedValue({ choices: [{ message: { content: '   ' } }] });

      await expect(model.complete([{ role: 'user', content: 'x' }])).rejects.toThrow(
        new ExternalServiceError('OpenAI', 'empty completion from chat-model'),
      );
    });

    it('should map timeouts and other SDK errors', async () => {
      completionsCreate.mockRejectedValueOnce(new APIConnectionTimeoutError());
      completionsCreate.mockRejectedValueOnce(new Error('boom'));

      await expect(model.complete([{ role: 'user', content: 'x' }])).rejects.toThrow(
        'OpenAI request failed: request timed out',
      );
      await expect(model.complete([{ role: 'user', content: 'x' }])).rejects.toThrow('OpenAI request failed: boom');
    });
  });

  describe('embeddings', () => {
    it('should return vectors in input order', async () => {
      embeddingsCreate.mockResolvedValue({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      });

      await expect(model.embedMany(['first', 'second'])).resolves.toEqual([
        [1, 0],
        [0, 1],
      ]);
      expect(embeddingsCreate).toHaveBeenCalledWith({ model: 'embedding-model', input: ['first', 'second'] });
    });

    it('should embed a single text', async () => {
      embeddingsCreate.mockResolvedValue({ data: [{ index: 0, embedding: [0.5, 0.5] }] });

      await expect(model.embed('question')).resolves.toEqual([0.5, 0.5]);
    });

    it('should not call the API for an empty batch', async () => {
      await expect(model.embedMany([])).resolves.toEqual([]);
      expect(embeddingsCreate).not.toHaveBeenCalled();
    });

    it('should reject a response with the wrong number of vectors', async () => {
      embeddingsCreate.mockResolvedValue({ data: [{ index: 0, embedding: [1] }] });

      await expect(model.embedMany(['a', 'b'])).rejects.toThrow(
        'OpenAI request failed: expected 2 embeddings, received 1',
      );
    });
  });

  it('should be configured only with an API key', () => {
    expect(model.isConfigured()).toBe(true);

    const unconfigured = new OpenAiLanguageModel(
      {} as unknown as OpenAI,
      { ...testConfig, openai: { ...testConfig.openai, apiKey: '' } },
      silentLogger,
    );
    expect(unconfigured.isConfigured()).toBe(false);
  });
});
