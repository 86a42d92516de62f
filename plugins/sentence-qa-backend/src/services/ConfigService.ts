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
 * Configuration service implementation
 * Manages service configuration with type-safe access
 *
 * @packageDocumentation
 */

import { Config, ConfigReader } from '@backstage/config';
import { JsonObject, JsonValue } from '@backstage/types';
import { IConfigService } from '../interfaces';
import { LLMConfig, PostgresConfig, RetrievalConfig, SentenceQaConfig, SentenceStoreConfig } from '../models';
import { DEFAULT_FILLER_WORDS_PATH } from '../rag/FillerWords';

const ROOT = 'sentenceQa';

type Env = Record<string, string | undefined>;

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid number in environment: "${value}"`);
  }
  return parsed;
}

function envBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function envList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.split(',').map(item => item.trim()).filter(Boolean);
}

/**
 * Drop undefined entries so the reader sees missing keys
 */
function compact(values: Record<string, JsonValue | undefined>): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Map environment variables (see .env.example) onto the configuration tree
 */
export function loadConfigFromEnv(env: Env = process.env): JsonObject {
  return {
    [ROOT]: compact({
      port: envNumber(env.PORT),
      sessionTimeoutMinutes: envNumber(env.SESSION_TIMEOUT_MINUTES),
      llm: compact({
        provider: env.LLM_PROVIDER,
        chatModel: env.CHAT_MODEL,
        embeddingModel: env.EMBEDDING_MODEL,
        ollamaBaseUrl: env.OLLAMA_BASE_URL,
        openaiApiKey: env.OPENAI_API_KEY,
        openaiBaseUrl: env.OPENAI_BASE_URL,
        timeoutMs: envNumber(env.LLM_TIMEOUT_MS),
        maxAttempts: envNumber(env.LLM_MAX_ATTEMPTS),
        retryBaseDelayMs: envNumber(env.LLM_RETRY_BASE_DELAY_MS),
        retryMaxDelayMs: envNumber(env.LLM_RETRY_MAX_DELAY_MS),
      }),
      sentenceStore: compact({
        type: env.SENTENCE_STORE,
        postgresql: compact({
          host: env.POSTGRES_HOST,
          port: envNumber(env.POSTGRES_PORT),
          database: env.POSTGRES_DB,
          user: env.POSTGRES_USER,
          password: env.POSTGRES_PASSWORD,
          ssl: envBoolean(env.POSTGRES_SSL),
          maxConnections: envNumber(env.POSTGRES_MAX_CONNECTIONS),
        }),
      }),
      ingestion: compact({
        sentencesPerLevel: envNumber(env.SENTENCES_PER_LEVEL),
        embeddingBatchSize: envNumber(env.EMBEDDING_BATCH_SIZE),
        maxUploadBytes: envNumber(env.MAX_UPLOAD_BYTES),
      }),
      retrieval: compact({
        defaultBatchSize: envNumber(env.DEFAULT_BATCH_SIZE),
        semanticQuota: envNumber(env.SEMANTIC_QUOTA),
        dedupThreshold: envNumber(env.DEDUP_THRESHOLD),
        lengthTolerance: envNumber(env.DEDUP_LENGTH_TOLERANCE),
        maxComparisonsPerCheck: envNumber(env.DEDUP_MAX_COMPARISONS),
        fillerWordsPath: env.FILLER_WORDS_PATH,
        protectedTerms: envList(env.PROTECTED_TERMS),
        maxKeywords: envNumber(env.MAX_KEYWORDS),
        maxSynonymTerms: envNumber(env.MAX_SYNONYM_TERMS),
        proximityMaxBoost: envNumber(env.PROXIMITY_MAX_BOOST),
        singleKeywordPolicy: env.SINGLE_KEYWORD_POLICY,
        generateQuestionVariants: envBoolean(env.GENERATE_QUESTION_VARIANTS),
      }),
    }),
  };
}

/**
 * Configuration service that wraps a ConfigReader
 * Follows Single Responsibility Principle
 */
export class ConfigService implements IConfigService {
  private readonly config: Config;
  private readonly cachedConfig: SentenceQaConfig;

  constructor(config: Config) {
    this.config = config;
    this.cachedConfig = this.loadConfig();
  }

  /**
   * Build a service from environment variables
   */
  static fromEnv(env: Env = process.env): ConfigService {
    return new ConfigService(new ConfigReader(loadConfigFromEnv(env), 'env'));
  }

  /**
   * Load and validate configuration
   */
  private loadConfig(): SentenceQaConfig {
    return {
      port: this.config.getOptionalNumber(`${ROOT}.port`) ?? 8000,
      llm: this.loadLLMConfig(),
      sentenceStore: this.loadSentenceStoreConfig(),
      ingestion: {
        sentencesPerLevel: this.config.getOptionalNumber(`${ROOT}.ingestion.sentencesPerLevel`) || 5,
        embeddingBatchSize: this.config.getOptionalNumber(`${ROOT}.ingestion.embeddingBatchSize`) || 50,
        maxUploadBytes: this.config.getOptionalNumber(`${ROOT}.ingestion.maxUploadBytes`) || 50 * 1024 * 1024,
      },
      retrieval: this.loadRetrievalConfig(),
      sessionTimeoutMinutes: this.config.getOptionalNumber(`${ROOT}.sessionTimeoutMinutes`) || 30,
    };
  }

  private loadLLMConfig(): LLMConfig {
    const key = `${ROOT}.llm`;
    const provider = this.config.getOptionalString(`${key}.provider`) ?? 'ollama';
    if (provider !== 'ollama' && provider !== 'openai') {
      throw new Error(`Unsupported LLM provider "${provider}", expected "ollama" or "openai"`);
    }

    const openaiApiKey = this.config.getOptionalString(`${key}.openaiApiKey`);
    if (provider === 'openai' && !openaiApiKey) {
      throw new Error('OpenAI API key is required when using the openai provider');
    }

    return {
      provider,
      chatModel: this.config.getOptionalString(`${key}.chatModel`) || (provider === 'openai' ? 'gpt-4o-mini' : 'llama3.2'),
      embeddingModel:
        this.config.getOptionalString(`${key}.embeddingModel`) ||
        (provider === 'openai' ? 'text-embedding-3-small' : 'all-minilm'),
      ollamaBaseUrl: this.config.getOptionalString(`${key}.ollamaBaseUrl`) || 'http://localhost:11434',
      openaiApiKey,
      openaiBaseUrl: this.config.getOptionalString(`${key}.openaiBaseUrl`),
      timeoutMs: this.config.getOptionalNumber(`${key}.timeoutMs`) || 60000,
      maxAttempts: this.config.getOptionalNumber(`${key}.maxAttempts`) || 3,
      retryBaseDelayMs: this.config.getOptionalNumber(`${key}.retryBaseDelayMs`) ?? 500,
      retryMaxDelayMs: this.config.getOptionalNumber(`${key}.retryMaxDelayMs`) ?? 8000,
    };
  }

  /**
   * Load sentence store configuration
   */
  private loadSentenceStoreConfig(): SentenceStoreConfig {
    const type = this.config.getOptionalString(`${ROOT}.sentenceStore.type`);

    if (type === 'postgresql') {
      return {
        type: 'postgresql',
        postgresql: this.loadPostgresConfig(),
      };
    }

    // Default to in-memory store
    return {
      type: 'memory',
    };
  }

  /**
   * Load PostgreSQL configuration with validation
   */
  private loadPostgresConfig(): PostgresConfig {
    const key = `${ROOT}.sentenceStore.postgresql`;
    const password = this.config.getOptionalString(`${key}.password`) || '';

    if (!password) {
      throw new Error('PostgreSQL password is required when using postgresql sentence store');
    }

    return {
      host: this.config.getOptionalString(`${key}.host`) || 'localhost',
      port: this.config.getOptionalNumber(`${key}.port`) || 5432,
      database: this.config.getOptionalString(`${key}.database`) || 'sentence_qa',
      user: this.config.getOptionalString(`${key}.user`) || 'sentence_qa',
      password,
      ssl: this.config.getOptionalBoolean(`${key}.ssl`) ?? false,
      maxConnections: this.config.getOptionalNumber(`${key}.maxConnections`) || 10,
      idleTimeoutMillis: this.config.getOptionalNumber(`${key}.idleTimeoutMillis`) || 30000,
      connectionTimeoutMillis: this.config.getOptionalNumber(`${key}.connectionTimeoutMillis`) || 5000,
    };
  }

  private loadRetrievalConfig(): RetrievalConfig {
    const key = `${ROOT}.retrieval`;
    const policy = this.config.getOptionalString(`${key}.singleKeywordPolicy`) ?? 'stop';
    if (policy !== 'stop' && policy !== 'fall-through') {
      throw new Error(`Unsupported single keyword policy "${policy}", expected "stop" or "fall-through"`);
    }

    return {
      defaultBatchSize: this.config.getOptionalNumber(`${key}.defaultBatchSize`) || 15,
      semanticQuota: this.config.getOptionalNumber(`${key}.semanticQuota`) ?? 5,
      dedupThreshold: this.config.getOptionalNumber(`${key}.dedupThreshold`) ?? 0.95,
      lengthTolerance: this.config.getOptionalNumber(`${key}.lengthTolerance`) ?? 0.15,
      maxComparisonsPerCheck: this.config.getOptionalNumber(`${key}.maxComparisonsPerCheck`) || 200,
      fillerWordsPath: this.config.getOptionalString(`${key}.fillerWordsPath`) || DEFAULT_FILLER_WORDS_PATH,
      protectedTerms: this.config.getOptionalStringArray(`${key}.protectedTerms`) ?? [],
      maxKeywords: this.config.getOptionalNumber(`${key}.maxKeywords`) || 6,
      maxSynonymTerms: this.config.getOptionalNumber(`${key}.maxSynonymTerms`) ?? 6,
      proximityMaxBoost: this.config.getOptionalNumber(`${key}.proximityMaxBoost`) ?? 1,
      singleKeywordPolicy: policy,
      generateQuestionVariants: this.config.getOptionalBoolean(`${key}.generateQuestionVariants`) ?? true,
    };
  }

  getConfig(): SentenceQaConfig {
    return this.cachedConfig;
  }

  get<T extends JsonValue>(key: string, defaultValue: T): T {
    return this.config.getOptional<T>(key) ?? defaultValue;
  }

  /**
   * Get PostgreSQL configuration
   * Throws error if not configured
   */
  getPostgresConfig(): PostgresConfig {
    const store = this.cachedConfig.sentenceStore;
    if (store.type !== 'postgresql' || !store.postgresql) {
      throw new Error('PostgreSQL sentence store is not configured');
    }
    return store.postgresql;
  }
}
