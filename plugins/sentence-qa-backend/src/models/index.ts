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
 * Domain models and data structures
 *
 * @packageDocumentation
 */

/**
 * Represents a chat message in the conversation
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Per-call tuning for a chat completion
 */
export interface ChatOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

/**
 * One indexed sentence as the sentence store keeps it.
 *
 * `level` is the document level assigned at ingestion
 * (`position / sentencesPerLevel`), not a retrieval level.
 */
export interface SentenceRecord {
  id: string;
  text: string;
  embedding: number[];
  level: number;
  sentenceIndex: number;
  sourceFileId?: string;
}

/**
 * A stored sentence without its embedding, as returned by searches
 */
export type StoredSentence = Omit<SentenceRecord, 'embedding'>;

/**
 * A raw search hit from the sentence store
 */
export interface SentenceHit {
  sentence: StoredSentence;
  score: number;
}

/**
 * Retrieval levels of the cascade, loosest last
 */
export type RetrievalLevel = 0 | 1 | 2 | 3 | 4;

export const RETRIEVAL_LEVELS: readonly RetrievalLevel[] = [0, 1, 2, 3, 4];

export const MAX_RETRIEVAL_LEVEL: RetrievalLevel = 4;

/**
 * Which strategy produced a retrieved sentence
 */
export type MatchTag =
  | { kind: 'keyword_combo'; keywordCombo: string[] }
  | {
      kind: 'auxiliary_pair';
      term: string;
      termSource: 'keyword' | 'synonym';
      magicWordUsed: string;
      synonymUsed?: string;
    }
  | { kind: 'synonym_combo'; keywordCombo: string[]; synonymUsed: string }
  | { kind: 'semantic'; query: string };

/**
 * A sentence picked by the retriever for the current request
 */
export interface RetrievedSentence extends StoredSentence {
  score: number;
  retrievalLevel: RetrievalLevel;
  isPrimarySource: boolean;
  match: MatchTag;
}

/**
 * Mutable cursor over one conversation's retrieval progress
 */
export interface RetrievalSessionState {
  sessionId: string;
  originalQuery: string;
  extractedKeywords: string[];
  /** Frozen on first use of level 2/3 so offsets keep pointing at the same list */
  synonyms?: string[];
  /** 0..4, anything above 4 means the cascade is done */
  currentLevel: number;
  levelOffsets: Record<number, number>;
  usedSentenceTexts: Set<string>;
  enabledLevels: RetrievalLevel[];
  continueCount: number;
  usedQuestionVariants: string[];
  createdAt: number;
  lastAccessedAt: number;
}

/**
 * A source sentence as exposed through the HTTP API
 */
export interface SourceSentence {
  text: string;
  /** Retrieval level that produced the sentence */
  level: RetrievalLevel;
  documentLevel: number;
  score: number;
  sentenceIndex: number;
  sourceTypeLabel: string;
  isPrimarySource: boolean;
  magicWordUsed?: string;
  synonymUsed?: string;
  keywordCombo?: string[];
}

/**
 * Request payload for asking a question
 */
export interface AskQuestionRequest {
  query: string;
  limit?: number;
  customPrompt?: string;
  enabledLevels?: RetrievalLevel[];
}

/**
 * Request payload for "tell me more"
 */
export interface ContinueRequest {
  sessionId: string;
  limit?: number;
  customPrompt?: string;
}

/**
 * Response payload for /ask and /continue
 */
export interface AnswerResponse {
  sessionId: string;
  answer: string;
  keywords: string[];
  questionVariants: string;
  sourceSentences: SourceSentence[];
  currentLevel: number;
  maxLevel: number;
  levelUsed: number;
  canContinue: boolean;
  continueCount: number;
  sentencesRetrieved: number;
}

/**
 * Result of indexing one uploaded file
 */
export interface UploadResult {
  fileId: string;
  filename: string;
  totalSentences: number;
  maxLevel: number;
  message: string;
}

/**
 * Ollama chat API response structure
 */
export interface OllamaChatResponse {
  model: string;
  created_at: string;
  message: {
    role: string;
    content: string;
  };
  done: boolean;
}

/**
 * Ollama embed API response structure
 */
export interface OllamaEmbedResponse {
  model: string;
  embeddings: number[][];
}

/**
 * PostgreSQL connection configuration
 */
export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  maxConnections?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Sentence store configuration
 */
export interface SentenceStoreConfig {
  type: 'memory' | 'postgresql';
  postgresql?: PostgresConfig;
}

/**
 * Language model provider configuration
 */
export interface LLMConfig {
  provider: 'ollama' | 'openai';
  chatModel: string;
  embeddingModel: string;
  ollamaBaseUrl: string;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  timeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export type SingleKeywordPolicy = 'stop' | 'fall-through';

/**
 * Tuning for the multi-level retriever
 */
export interface RetrievalConfig {
  defaultBatchSize: number;
  semanticQuota: number;
  dedupThreshold: number;
  lengthTolerance: number;
  maxComparisonsPerCheck: number;
  fillerWordsPath: string;
  protectedTerms: string[];
  maxKeywords: number;
  maxSynonymTerms: number;
  proximityMaxBoost: number;
  singleKeywordPolicy: SingleKeywordPolicy;
  generateQuestionVariants: boolean;
}

/**
 * Configuration for the sentence Q&A service
 */
export interface SentenceQaConfig {
  port: number;
  llm: LLMConfig;
  sentenceStore: SentenceStoreConfig;
  ingestion: {
    sentencesPerLevel: number;
    embeddingBatchSize: number;
    maxUploadBytes: number;
  };
  retrieval: RetrievalConfig;
  sessionTimeoutMinutes: number;
}
