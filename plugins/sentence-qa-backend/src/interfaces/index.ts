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
 * Service interfaces following SOLID principles
 *
 * @packageDocumentation
 */

import type { JsonValue } from '@backstage/types';
import type { Logger } from 'winston';
import {
  AnswerResponse,
  AskQuestionRequest,
  ChatMessage,
  ChatOptions,
  ContinueRequest,
  RetrievalLevel,
  RetrievalSessionState,
  SentenceHit,
  SentenceQaConfig,
  SentenceRecord,
  UploadResult,
} from '../models';

/**
 * Interface for LLM service operations
 * Single Responsibility: Handles all LLM-related operations
 */
export interface ILLMService {
  /**
   * Generate a chat completion
   */
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<string>;

  /**
   * Generate embeddings for text inputs, in input order
   */
  generateEmbeddings(inputs: string[], model?: string): Promise<number[][]>;

  /**
   * Whether the provider answers at all
   */
  healthCheck(): Promise<boolean>;
}

/**
 * Exact or sloppy phrase query. `slop` is the number of words allowed
 * between the phrase words; 0 means consecutive.
 */
export interface PhraseQuery {
  phrase: string;
  slop: number;
  limit: number;
  exclude?: ReadonlySet<string>;
}

/**
 * Boolean term query, optionally scored by cosine similarity
 */
export interface TermQuery {
  terms: string[];
  operator: 'and' | 'or';
  limit: number;
  exclude?: ReadonlySet<string>;
  queryVector?: number[];
}

/**
 * Nearest-neighbour query by cosine similarity
 */
export interface KnnQuery {
  vector: number[];
  k: number;
  exclude?: ReadonlySet<string>;
}

/**
 * Interface for the sentence store (full-text + vector search backend)
 * Single Responsibility: Manages sentence storage and retrieval
 */
export interface ISentenceStore {
  /**
   * Store sentence records in batch
   */
  storeBatch(records: SentenceRecord[]): Promise<void>;

  phraseSearch(query: PhraseQuery): Promise<SentenceHit[]>;

  termSearch(query: TermQuery): Promise<SentenceHit[]>;

  knnSearch(query: KnnQuery): Promise<SentenceHit[]>;

  /**
   * Delete every stored sentence
   */
  clear(): Promise<void>;

  /**
   * Get total count of stored sentences
   */
  count(): Promise<number>;

  /**
   * Highest document level present, 0 when empty
   */
  maxLevel(): Promise<number>;
}

/**
 * Interface for turning queries into search terms
 */
export interface IKeywordExtractor {
  extractKeywords(query: string): Promise<string[]>;

  generateSynonyms(term: string): Promise<string[]>;

  /**
   * Filler words in configured file order; the order is the auxiliary-word priority
   */
  getPriorityOrderedFillerWords(): string[];
}

/**
 * Interface for splitting raw text into sentences
 */
export interface ITextSplitter {
  splitIntoSentences(text: string, mode?: SplitMode): string[];
}

export type SplitMode = 'auto' | 'line' | 'sentence';

/**
 * Registry of retrieval sessions
 */
export interface ISessionStore {
  create(query: string, keywords: string[], enabledLevels: RetrievalLevel[]): RetrievalSessionState;

  /**
   * Look a session up and refresh its access time; undefined when unknown or expired
   */
  get(sessionId: string): RetrievalSessionState | undefined;

  update(sessionId: string, newUsedTexts: Iterable<string>, newState: RetrievalSessionState): void;

  delete(sessionId: string): void;

  sweepExpired(): number;

  clearAll(): void;

  count(): number;
}

/**
 * Interface for configuration management
 */
export interface IConfigService {
  /**
   * Get the complete configuration
   */
  getConfig(): SentenceQaConfig;

  /**
   * Get a specific configuration value
   */
  get<T extends JsonValue>(key: string, defaultValue: T): T;
}

/**
 * Interface for the question answering flow
 */
export interface IQuestionAnsweringService {
  ask(request: AskQuestionRequest): Promise<AnswerResponse>;

  continue(request: ContinueRequest): Promise<AnswerResponse>;
}

/**
 * Interface for corpus ingestion
 */
export interface IIngestionService {
  indexText(text: string, filename: string): Promise<UploadResult>;

  deleteAll(): Promise<number>;
}

/**
 * Dependencies for service construction
 */
export interface ServiceDependencies {
  logger: Logger;
  config: IConfigService;
}

/**
 * Dependencies for the retrieval pipeline
 */
export interface RetrievalDependencies extends ServiceDependencies {
  llmService: ILLMService;
  sentenceStore: ISentenceStore;
  keywordExtractor: IKeywordExtractor;
}

/**
 * Dependencies for the question answering service
 */
export interface QuestionServiceDependencies extends RetrievalDependencies {
  sessionStore: ISessionStore;
}
