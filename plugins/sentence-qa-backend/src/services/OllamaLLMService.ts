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
 * LLM Service implementation for Ollama integration
 * Handles all interactions with the Ollama API
 *
 * @packageDocumentation
 */

import fetch, { Response } from 'node-fetch';
import type { Logger } from 'winston';
import { ILLMService, ServiceDependencies } from '../interfaces';
import { ChatMessage, ChatOptions, LLMConfig, OllamaChatResponse, OllamaEmbedResponse } from '../models';
import { LLMServiceError, errorMessage } from '../errors';
import { withRetry } from './retry';

/**
 * Service for interacting with Ollama LLM
 * Follows Single Responsibility and Dependency Inversion principles
 */
export class OllamaLLMService implements ILLMService {
  private readonly logger: Logger;
  private readonly llmConfig: LLMConfig;
  private readonly baseUrl: string;

  constructor(dependencies: ServiceDependencies) {
    this.logger = dependencies.logger;
    this.llmConfig = dependencies.config.getConfig().llm;
    this.baseUrl = this.llmConfig.ollamaBaseUrl.replace(/\/+$/, '');
  }

  /**
   * Generate a chat completion using Ollama
   */
  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    const modelName = options.model || this.llmConfig.chatModel;

    this.logger.info(`[OllamaLLMService] Generating chat completion with model: ${modelName}`);

    return this.retry('chat', async () => {
      const response = await this.post(
        '/api/chat',
        {
          model: modelName,
          messages,
          stream: false,
          options: {
            ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
            ...(options.maxTokens !== undefined ? { num_predict: options.maxTokens } : {}),
          },
        },
        options.timeoutMs
      );

      const json = (await response.json()) as OllamaChatResponse;

      if (!json.message || typeof json.message.content !== 'string') {
        throw new LLMServiceError('Invalid response format from Ollama', false);
      }

      return json.message.content;
    });
  }

  /**
   * Generate embeddings using Ollama
   */
  async generateEmbeddings(inputs: string[], model?: string): Promise<number[][]> {
    if (inputs.length === 0) {
      return [];
    }

    const modelName = model || this.llmConfig.embeddingModel;

    this.logger.info(`[OllamaLLMService] Generating embeddings for ${inputs.length} inputs with model: ${modelName}`);

    return this.retry('generateEmbeddings', async () => {
      const response = await this.post('/api/embed', { model: modelName, input: inputs });
      const json = (await response.json()) as OllamaEmbedResponse;

      if (!json.embeddings || !Array.isArray(json.embeddings) || json.embeddings.length !== inputs.length) {
        throw new LLMServiceError('Invalid embeddings response format from Ollama', false);
      }

      this.logger.debug(`[OllamaLLMService] Generated ${json.embeddings.length} embeddings`);
      return json.embeddings;
    });
  }

  /**
   * Health check for Ollama service
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch (error) {
      this.logger.error(`[OllamaLLMService] Health check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private retry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      maxAttempts: this.llmConfig.maxAttempts,
      baseDelayMs: this.llmConfig.retryBaseDelayMs,
      maxDelayMs: this.llmConfig.retryMaxDelayMs,
      logger: this.logger,
      label: `OllamaLLMService.${operation}`,
    }).catch(error => {
      this.logger.error(`[OllamaLLMService] ${operation} failed: ${errorMessage(error)}`);
      throw error;
    });
  }

  /**
   * POST JSON with a timeout; failures become LLMServiceError
   */
  private async post(endpoint: string, body: unknown, timeoutMs?: number): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs ?? this.llmConfig.timeoutMs);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${endpoint}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new LLMServiceError(`Ollama request to ${endpoint} timed out`, true);
      }
      throw new LLMServiceError(`Ollama request to ${endpoint} failed: ${errorMessage(error)}`, true);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      throw new LLMServiceError(
        `Ollama API error (${response.status}): ${errorText.slice(0, 200)}`,
        response.status === 429 || response.status >= 500
      );
    }

    return response;
  }
}
