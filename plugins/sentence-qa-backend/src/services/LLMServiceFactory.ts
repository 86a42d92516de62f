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
 * Factory for creating language model providers
 *
 * @packageDocumentation
 */

import { ILLMService, ServiceDependencies } from '../interfaces';
import { OllamaLLMService } from './OllamaLLMService';
import { OpenAILLMService } from './OpenAILLMService';

export class LLMServiceFactory {
  /**
   * Create the provider named by `llm.provider`
   */
  static create(dependencies: ServiceDependencies): ILLMService {
    const { provider, chatModel, embeddingModel } = dependencies.config.getConfig().llm;
    dependencies.logger.info(`Creating LLM service: ${provider} (chat: ${chatModel}, embeddings: ${embeddingModel})`);

    switch (provider) {
      case 'openai':
        return new OpenAILLMService(dependencies);
      case 'ollama':
      default:
        return new OllamaLLMService(dependencies);
    }
  }
}
