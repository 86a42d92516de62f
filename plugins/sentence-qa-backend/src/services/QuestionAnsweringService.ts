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
 * Question answering service
 * Runs the ask / "tell me more" flow on top of the batch orchestrator
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  IKeywordExtractor,
  ILLMService,
  IQuestionAnsweringService,
  ISentenceStore,
  ISessionStore,
  QuestionServiceDependencies,
} from '../interfaces';
import {
  AnswerResponse,
  AskQuestionRequest,
  ContinueRequest,
  MAX_RETRIEVAL_LEVEL,
  RETRIEVAL_LEVELS,
  RetrievalConfig,
  RetrievalSessionState,
} from '../models';
import { InputError, NoDocumentsError, NoMatchesError, SessionNotFoundError, errorMessage } from '../errors';
import { BatchOrchestrator } from '../rag/BatchOrchestrator';
import { LevelRetriever } from '../rag/LevelRetriever';
import {
  AnswerPromptInput,
  buildAnswerMessages,
  buildVariantMessages,
  exploredEverythingAnswer,
  toSourceSentence,
} from '../rag/PromptBuilder';
import { BatchResult } from '../rag/types';
import { SessionLocks } from './SessionStore';

export interface QuestionAnsweringServiceDependencies extends QuestionServiceDependencies {
  locks?: SessionLocks;
  orchestrator?: BatchOrchestrator;
}

/**
 * Service behind POST /ask and POST /continue
 * Follows Single Responsibility and Dependency Inversion principles
 */
export class QuestionAnsweringService implements IQuestionAnsweringService {
  private readonly logger: Logger;
  private readonly llmService: ILLMService;
  private readonly sentenceStore: ISentenceStore;
  private readonly keywordExtractor: IKeywordExtractor;
  private readonly sessionStore: ISessionStore;
  private readonly locks: SessionLocks;
  private readonly orchestrator: BatchOrchestrator;
  private readonly retrieval: RetrievalConfig;

  constructor(dependencies: QuestionAnsweringServiceDependencies) {
    const config = dependencies.config.getConfig();
    this.logger = dependencies.logger;
    this.llmService = dependencies.llmService;
    this.sentenceStore = dependencies.sentenceStore;
    this.keywordExtractor = dependencies.keywordExtractor;
    this.sessionStore = dependencies.sessionStore;
    this.locks = dependencies.locks ?? new SessionLocks();
    this.retrieval = config.retrieval;

    this.orchestrator =
      dependencies.orchestrator ??
      new BatchOrchestrator({
        logger: this.logger,
        keywordExtractor: this.keywordExtractor,
        retriever: new LevelRetriever({
          logger: this.logger,
          llmService: this.llmService,
          sentenceStore: this.sentenceStore,
          keywordExtractor: this.keywordExtractor,
          options: {
            dedupThreshold: this.retrieval.dedupThreshold,
            lengthTolerance: this.retrieval.lengthTolerance,
            maxComparisons: this.retrieval.maxComparisonsPerCheck,
            proximityMaxBoost: this.retrieval.proximityMaxBoost,
            embeddingModel: config.llm.embeddingModel,
          },
        }),
        options: {
          semanticQuota: this.retrieval.semanticQuota,
          dedupThreshold: this.retrieval.dedupThreshold,
          lengthTolerance: this.retrieval.lengthTolerance,
          maxSynonymTerms: this.retrieval.maxSynonymTerms,
          singleKeywordPolicy: this.retrieval.singleKeywordPolicy,
        },
      });
  }

  /**
   * Answer a new question and open a session for follow-ups
   */
  async ask(request: AskQuestionRequest): Promise<AnswerResponse> {
    const query = request.query.trim();
    if (!query) {
      throw new InputError('query is required');
    }
    if ((await this.sentenceStore.count()) === 0) {
      throw new NoDocumentsError();
    }

    this.logger.info(`[QuestionAnsweringService] Processing question: "${query.substring(0, 50)}"`);

    const keywords = await this.keywordExtractor.extractKeywords(query);
    const session = this.sessionStore.create(query, keywords, request.enabledLevels ?? [...RETRIEVAL_LEVELS]);

    return this.locks.runExclusive(session.sessionId, async () => {
      const batch = await this.nextBatch(session, request.limit);
      if (batch.results.length === 0) {
        this.sessionStore.delete(session.sessionId);
        throw new NoMatchesError();
      }
      return this.respond(session, batch, 0, request.customPrompt);
    });
  }

  /**
   * "Tell me more": the next non-repeating batch of an existing session
   */
  async continue(request: ContinueRequest): Promise<AnswerResponse> {
    return this.locks.runExclusive(request.sessionId, async () => {
      const session = this.sessionStore.get(request.sessionId);
      if (!session) {
        throw new SessionNotFoundError(request.sessionId);
      }

      const continueCount = session.continueCount + 1;
      this.logger.info(
        `[QuestionAnsweringService] Continue #${continueCount} for session ${session.sessionId} at level ${session.currentLevel}`
      );

      const batch = await this.nextBatch(session, request.limit);
      if (batch.results.length === 0) {
        this.sessionStore.update(session.sessionId, [], { ...batch.state, continueCount });
        return {
          sessionId: session.sessionId,
          answer: exploredEverythingAnswer(session.originalQuery),
          keywords: session.extractedKeywords,
          questionVariants: '',
          sourceSentences: [],
          currentLevel: batch.state.currentLevel,
          maxLevel: MAX_RETRIEVAL_LEVEL,
          levelUsed: batch.levelUsed,
          canContinue: false,
          continueCount,
          sentencesRetrieved: 0,
        };
      }

      return this.respond(session, batch, continueCount, request.customPrompt);
    });
  }

  private nextBatch(session: RetrievalSessionState, limit: number | undefined): Promise<BatchResult> {
    return this.orchestrator.getNextBatch(session, session.extractedKeywords, {
      batchSize: limit ?? this.retrieval.defaultBatchSize,
      semanticQuota: this.retrieval.semanticQuota,
      enabledLevels: session.enabledLevels,
    });
  }

  /**
   * Generate variants and the answer, then persist the advanced session
   */
  private async respond(
    session: RetrievalSessionState,
    batch: BatchResult,
    continueCount: number,
    customPrompt?: string
  ): Promise<AnswerResponse> {
    const questionVariants = await this.generateQuestionVariants(session.originalQuery, session.usedQuestionVariants);
    const answer = await this.generateAnswer({
      question: session.originalQuery,
      questionVariants,
      keywords: session.extractedKeywords,
      sources: batch.results,
      continueCount,
      customPrompt,
    });

    const newVariants = questionVariants
      .split('\n')
      .map(line => line.trim())
      .filter(Boolean);
    this.sessionStore.update(
      session.sessionId,
      batch.results.map(result => result.text),
      {
        ...batch.state,
        continueCount,
        usedQuestionVariants: [...session.usedQuestionVariants, ...newVariants],
      }
    );

    return {
      sessionId: session.sessionId,
      answer,
      keywords: session.extractedKeywords,
      questionVariants,
      sourceSentences: batch.results.map(toSourceSentence),
      currentLevel: batch.state.currentLevel,
      maxLevel: MAX_RETRIEVAL_LEVEL,
      levelUsed: batch.levelUsed,
      canContinue: !batch.exhausted,
      continueCount,
      sentencesRetrieved: batch.results.length,
    };
  }

  /**
   * Rewrites of the question for the prompt; empty when disabled or when the model fails
   */
  private async generateQuestionVariants(question: string, previous: readonly string[]): Promise<string> {
    if (!this.retrieval.generateQuestionVariants) {
      return '';
    }
    try {
      const variants = await this.llmService.chat(buildVariantMessages(question, previous), {
        temperature: 0.7,
        maxTokens: 200,
      });
      return variants.trim();
    } catch (error) {
      this.logger.warn(`[QuestionAnsweringService] Question variants skipped: ${errorMessage(error)}`);
      return '';
    }
  }

  /**
   * Final answer; a model failure becomes an explanatory answer instead of an error
   */
  private async generateAnswer(input: AnswerPromptInput): Promise<string> {
    try {
      const answer = await this.llmService.chat(buildAnswerMessages(input), { temperature: 0.3 });
      return answer.trim();
    } catch (error) {
      this.logger.error(`[QuestionAnsweringService] Answer generation failed: ${errorMessage(error)}`);
      return `Error generating answer: ${errorMessage(error)}`;
    }
  }
}
