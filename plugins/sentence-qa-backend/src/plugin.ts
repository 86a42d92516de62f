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
 * Service wiring for the sentence Q&A backend
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  IConfigService,
  IIngestionService,
  ILLMService,
  IQuestionAnsweringService,
  ISentenceStore,
  ISessionStore,
} from './interfaces';
import { FillerWordList } from './rag/FillerWords';
import { KeywordExtractor } from './rag/KeywordExtractor';
import {
  InMemorySessionStore,
  IngestionService,
  LLMServiceFactory,
  QuestionAnsweringService,
  SentenceStoreFactory,
  TextSplitter,
} from './services';

/**
 * Everything the router needs
 */
export interface SentenceQaServices {
  logger: Logger;
  config: IConfigService;
  llmService: ILLMService;
  sentenceStore: ISentenceStore;
  sessionStore: ISessionStore;
  questionService: IQuestionAnsweringService;
  ingestionService: IIngestionService;
}

export interface PluginEnvironment {
  logger: Logger;
  config: IConfigService;
  /** Replaces the configured provider, mainly for tests */
  llmService?: ILLMService;
  /** Replaces the configured store, mainly for tests */
  sentenceStore?: ISentenceStore;
}

/**
 * Build the service graph following the Dependency Injection pattern
 */
export async function createServices(env: PluginEnvironment): Promise<SentenceQaServices> {
  const { logger, config } = env;
  const appConfig = config.getConfig();

  const llmService = env.llmService ?? LLMServiceFactory.create({ logger, config });
  // Create sentence store using factory (supports both in-memory and PostgreSQL)
  const sentenceStore = env.sentenceStore ?? (await SentenceStoreFactory.create(appConfig.sentenceStore, logger));
  const sessionStore = new InMemorySessionStore(appConfig.sessionTimeoutMinutes);

  const keywordExtractor = new KeywordExtractor({
    logger,
    llmService,
    fillerWords: FillerWordList.fromFile(appConfig.retrieval.fillerWordsPath, logger),
    protectedTerms: appConfig.retrieval.protectedTerms,
    maxKeywords: appConfig.retrieval.maxKeywords,
    chatModel: appConfig.llm.chatModel,
  });

  const questionService = new QuestionAnsweringService({
    logger,
    config,
    llmService,
    sentenceStore,
    keywordExtractor,
    sessionStore,
  });

  const ingestionService = new IngestionService({
    logger,
    config,
    llmService,
    sentenceStore,
    textSplitter: new TextSplitter(logger),
  });

  return { logger, config, llmService, sentenceStore, sessionStore, questionService, ingestionService };
}
