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

/**
 * LLM Service implementation for OpenAI-compatible APIs
 * (OpenAI itself, or any provider reachable through a custom base URL)
 *
 * @packageDocumentation
 */

import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { EmbeddingCreateParams } from 'openai/resources/embeddings';
import type { Logger } from 'winston';
import { ILLMService, ServiceDependencies } from '../interfaces';
import { ChatMessage, ChatOptions, LLMConfig } from '../models';
import { LLMServiceError, errorMessage } from '../errors';
import { withRetry } from './retry';

const EMBEDDING_BATCH_SIZE = 100;

/**
 * The part of the OpenAI client this service calls
 */
export interface OpenAIClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { timeout?: number }
      ): Promise<{ choices: Array<{ message?: { content?: string | null } }> }>;
    };
  };
  embeddings: {
    create(body: EmbeddingCreateParams): Promise<{ data: Array<{ index: number; embedding: number[] }> }>;
  };
  models: {
    list(): Promise<unknown>;
  };
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

/**
 * Map client errors onto LLMServiceError; rate limits, server errors,
 * timeouts and connection failures are retryable
 */
export function toLLMServiceError(error: unknown): LLMServiceError {
  if (error instanceof LLMServiceError) {
    return error;
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    const retryable = status === undefined || status === 429 || status >= 500;
    return new LLMServiceError(`OpenAI API error${status ? ` (${status})` : ''}: ${error.message}`, retryable);
  }
  return new LLMServiceError(`OpenAI request failed: ${errorMessage(error)}`, false);
}

/**
 * Service for OpenAI-compatible chat and embedding endpoints
 */
export class OpenAILLMService implements ILLMService {
  private readonly logger: Logger;
  private readonly llmConfig: LLMConfig;
  private readonly client: OpenAIClient;

  constructor(dependencies: ServiceDependencies, client?: OpenAIClient) {
    this.logger = dependencies.logger;
    this.llmConfig = dependencies.config.getConfig().llm;
    this.client =
      client ??
      new OpenAI({
        apiKey: this.llmConfig.openaiApiKey,
        baseURL: this.llmConfig.openaiBaseUrl,
        timeout: this.llmConfig.timeoutMs,
        // retries are handled by withRetry
        maxRetries: 0,
      });
  }

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    const model = options.model || this.llmConfig.chatModel;
    this.logger.info(`[OpenAILLMService] Generating chat completion with model: ${model}`);

    return this.retry('chat', async () => {
      const completion = await this.client.chat.completions.create(
        {
          model,
          messages: messages.map(toMessageParam),
          ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
          ...(options.maxTokens !== undefined ? { max_tokens: options.maxTokens } : {}),
        },
        { timeout: options.timeoutMs ?? this.llmConfig.timeoutMs }
      );

      const content = completion.choices[0]?.message?.content;
      if (typeof content !== 'string') {
        throw new LLMServiceError('Invalid chat completion response', false);
      }
      return content.trim();
    });
  }

  async generateEmbeddings(inputs: string[], model?: string): Promise<number[][]> {
    if (inputs.length === 0) {
      return [];
    }

    const modelName = model || this.llmConfig.embeddingModel;
    const totalBatches = Math.ceil(inputs.length / EMBEDDING_BATCH_SIZE);
    this.logger.info(
      `[OpenAILLMService] Generating embeddings for ${inputs.length} inputs in ${totalBatches} batches with model: ${modelName}`
    );

    const embeddings: number[][] = [];
    for (let i = 0; i < inputs.length; i += EMBEDDING_BATCH_SIZE) {
      const batch = inputs.slice(i, i + EMBEDDING_BATCH_SIZE);
      const vectors = await this.retry('generateEmbeddings', async () => {
        const response = await this.client.embeddings.create({ model: modelName, input: batch });
        if (response.data.length !== batch.length) {
          throw new LLMServiceError(
            `Unexpected response: expected ${batch.length} embeddings, got ${response.data.length}`,
            false
          );
        }
        return [...response.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
      });
      embeddings.push(...vectors);
    }

    return embeddings;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch (error) {
      this.logger.error(`[OpenAILLMService] Health check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private retry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(
      async () => {
        try {
          return await fn();
        } catch (error) {
          throw toLLMServiceError(error);
        }
      },
      {
        maxAttempts: this.llmConfig.maxAttempts,
        baseDelayMs: this.llmConfig.retryBaseDelayMs,
        maxDelayMs: this.llmConfig.retryMaxDelayMs,
        logger: this.logger,
        label: `OpenAILLMService.${operation}`,
      }
    ).catch(error => {
      this.logger.error(`[OpenAILLMService] ${operation} failed: ${errorMessage(error)}`);
      throw error;
    });
  }
}
