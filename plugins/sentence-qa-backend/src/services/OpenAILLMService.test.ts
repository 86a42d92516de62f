/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import OpenAI from 'openai';
import { LLMServiceError } from '../errors';
import { createTestConfig, createTestLogger } from '../testUtils';
import { OpenAIClient, OpenAILLMService, toLLMServiceError } from './OpenAILLMService';

function vectors(count: number, offset: number) {
  return Array.from({ length: count }, (_, index) => ({ index, embedding: [offset + index] })).reverse();
}

describe('OpenAILLMService', () => {
  const logger = createTestLogger();
  const create = jest.fn<OpenAIClient['chat']['completions']['create']>();
  const embed = jest.fn<OpenAIClient['embeddings']['create']>();
  const list = jest.fn<OpenAIClient['models']['list']>();
  const client: OpenAIClient = { chat: { completions: { create } }, embeddings: { create: embed }, models: { list } };

  function createService(maxAttempts = 1): OpenAILLMService {
    const config = createTestConfig({ llm: { provider: 'openai', openaiApiKey: 'test-key', maxAttempts } });
    return new OpenAILLMService({ logger, config }, client);
  }

  beforeEach(() => {
    create.mockReset();
    embed.mockReset();
    list.mockReset();
  });

  describe('chat', () => {
    it('sends the messages and options and trims the reply', async () => {
      create.mockResolvedValueOnce({ choices: [{ message: { content: '  Grace abounds.  ' } }] });

      const reply = await createService().chat(
        [
          { role: 'system', content: 'Be brief.' },
          { role: 'user', content: 'What is grace?' },
        ],
        { temperature: 0.2, maxTokens: 50 }
      );

      expect(reply).toBe('Grace abounds.');
      expect(create).toHaveBeenCalledWith(
        {
          model: 'test-chat',
          messages: [
            { role: 'system', content: 'Be brief.' },
            { role: 'user', content: 'What is grace?' },
          ],
          temperature: 0.2,
          max_tokens: 50,
        },
        { timeout: 1000 }
      );
    });

    it('retries server errors', async () => {
      create
        .mockRejectedValueOnce(new OpenAI.APIError(503, undefined, 'unavailable', undefined))
        .mockResolvedValueOnce({ choices: [{ message: { content: 'ok' } }] });

      await expect(createService(2).chat([{ role: 'user', content: 'hi' }])).resolves.toBe('ok');
      expect(create).toHaveBeenCalledTimes(2);
    });

    it('does not retry client errors', async () => {
      create.mockRejectedValue(new OpenAI.APIError(400, undefined, 'bad request', undefined));

      const chat = createService(3).chat([{ role: 'user', content: 'hi' }]);

      await expect(chat).rejects.toThrow('OpenAI API error (400): 400 bad request');
      expect(create).toHaveBeenCalledTimes(1);
    });

    it('rejects a completion without content', async () => {
      create.mockResolvedValueOnce({ choices: [] });

      await expect(createService().chat([{ role: 'user', content: 'hi' }])).rejects.toThrow(
        'Invalid chat completion response'
      );
    });
  });

  describe('generateEmbeddings', () => {
    it('batches inputs and restores input order', async () => {
      embed.mockResolvedValueOnce({ data: vectors(100, 0) }).mockResolvedValueOnce({ data: vectors(50, 100) });
      const inputs = Array.from({ length: 150 }, (_, index) => `sentence ${index}`);

      const result = await createService().generateEmbeddings(inputs);

      expect(result).toHaveLength(150);
      expect(result[0]).toEqual([0]);
      expect(result[99]).toEqual([99]);
      expect(result[149]).toEqual([149]);
      expect(embed.mock.calls.map(([body]) => body.input)).toEqual([inputs.slice(0, 100), inputs.slice(100)]);
      expect(embed.mock.calls[0][0].model).toBe('test-embed');
    });

    it('rejects a short response', async () => {
      embed.mockResolvedValueOnce({ data: vectors(1, 0) });

      await expect(createService().generateEmbeddings(['a', 'b'])).rejects.toThrow(
        'Unexpected response: expected 2 embeddings, got 1'
      );
    });
  });

  describe('healthCheck', () => {
    it('lists models to check the connection', async () => {
      list.mockResolvedValueOnce({ data: [] });
      await expect(createService().healthCheck()).resolves.toBe(true);

      list.mockRejectedValueOnce(new Error('unauthorized'));
      await expect(createService().healthCheck()).resolves.toBe(false);
    });
  });
});

describe('toLLMServiceError', () => {
  it('marks rate limits and server errors as retryable', () => {
    expect(toLLMServiceError(new OpenAI.APIError(429, undefined, 'slow down', undefined)).retryable).toBe(true);
    expect(toLLMServiceError(new OpenAI.APIError(500, undefined, 'oops', undefined)).retryable).toBe(true);
    expect(toLLMServiceError(new OpenAI.APIError(401, undefined, 'no key', undefined)).retryable).toBe(false);
  });

  it('wraps other failures', () => {
    const error = toLLMServiceError(new Error('socket hang up'));

    expect(error).toBeInstanceOf(LLMServiceError);
    expect(error.message).toBe('OpenAI request failed: socket hang up');
    expect(error.retryable).toBe(false);
  });
});
