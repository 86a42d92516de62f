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
 * Shared fixtures for the test suites
 *
 * @packageDocumentation
 */

import { JsonValue } from '@backstage/types';
import type { Logger } from 'winston';
import { IConfigService, ILLMService } from './interfaces';
import { createRootLogger } from './logger';
import { ChatMessage, ChatOptions, LLMConfig, RetrievalConfig, SentenceQaConfig, SentenceRecord } from './models';
import { DEFAULT_FILLER_WORDS_PATH } from './rag/FillerWords';

export function createTestLogger(): Logger {
  return createRootLogger({ level: 'debug', silent: true });
}

export interface TestConfigOverrides {
  llm?: Partial<LLMConfig>;
  retrieval?: Partial<RetrievalConfig>;
  ingestion?: Partial<SentenceQaConfig['ingestion']>;
  sessionTimeoutMinutes?: number;
}

export function createTestConfig(overrides: TestConfigOverrides = {}): IConfigService {
  const config: SentenceQaConfig = {
    port: 0,
    llm: {
      provider: 'ollama',
      chatModel: 'test-chat',
      embeddingModel: 'test-embed',
      ollamaBaseUrl: 'http://localhost:11434',
      timeoutMs: 1000,
      maxAttempts: 1,
      retryBaseDelayMs: 0,
      retryMaxDelayMs: 0,
      ...overrides.llm,
    },
    sentenceStore: { type: 'memory' },
    ingestion: { sentencesPerLevel: 5, embeddingBatchSize: 50, maxUploadBytes: 1024 * 1024, ...overrides.ingestion },
    retrieval: {
      defaultBatchSize: 15,
      semanticQuota: 5,
      dedupThreshold: 0.95,
      lengthTolerance: 0.15,
      maxComparisonsPerCheck: 200,
      fillerWordsPath: DEFAULT_FILLER_WORDS_PATH,
      protectedTerms: [],
      maxKeywords: 6,
      maxSynonymTerms: 6,
      proximityMaxBoost: 1,
      singleKeywordPolicy: 'stop',
      generateQuestionVariants: true,
      ...overrides.retrieval,
    },
    sessionTimeoutMinutes: overrides.sessionTimeoutMinutes ?? 30,
  };

  return {
    getConfig: () => config,
    get: <T extends JsonValue>(_key: string, defaultValue: T) => defaultValue,
  };
}

/**
 * 26 letter counts; similar wording gives similar vectors
 */
export function letterEmbedding(text: string): number[] {
  const vector = new Array<number>(26).fill(0);
  for (const char of text.toLowerCase()) {
    const index = char.charCodeAt(0) - 97;
    if (index >= 0 && index < 26) {
      vector[index]++;
    }
  }
  return vector;
}

export type ChatHandler = (messages: ChatMessage[], options?: ChatOptions) => string | Promise<string>;

/**
 * In-process language model. Chat replies come from `chatHandler`
 * (an empty JSON array by default); embeddings from `embed`.
 */
export class FakeLLMService implements ILLMService {
  readonly chatCalls: Array<{ messages: ChatMessage[]; options?: ChatOptions }> = [];
  readonly embeddingCalls: string[][] = [];
  chatHandler: ChatHandler;
  embed: (text: string) => number[];
  healthy = true;

  constructor(chatHandler: ChatHandler = () => '[]', embed: (text: string) => number[] = letterEmbedding) {
    this.chatHandler = chatHandler;
    this.embed = embed;
  }

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<string> {
    this.chatCalls.push({ messages, options });
    return this.chatHandler(messages, options);
  }

  async generateEmbeddings(inputs: string[]): Promise<number[][]> {
    this.embeddingCalls.push(inputs);
    return inputs.map(input => this.embed(input));
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}

/**
 * Records for `texts` in order, embedded with `embed`
 */
export function sentenceRecords(
  texts: readonly string[],
  embed: (text: string) => number[] = letterEmbedding,
  sentencesPerLevel = 5
): SentenceRecord[] {
  return texts.map((text, index) => ({
    id: `s-${index}`,
    text,
    embedding: embed(text),
    level: Math.floor(index / sentencesPerLevel),
    sentenceIndex: index,
    sourceFileId: 'file-1',
  }));
}
