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
 * Batch orchestrator
 * Combines the level cascade with a reserved quota of pure semantic results
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IKeywordExtractor } from '../interfaces';
import {
  MAX_RETRIEVAL_LEVEL,
  RETRIEVAL_LEVELS,
  RetrievalLevel,
  RetrievalSessionState,
  RetrievedSentence,
  SingleKeywordPolicy,
} from '../models';
import { DEFAULT_DEDUP_THRESHOLD, DEFAULT_LENGTH_TOLERANCE, deduplicate } from './Deduplicator';
import { LevelRetriever, semanticQueryText } from './LevelRetriever';
import { BatchRequest, BatchResult, SemanticSearchResult } from './types';

export const DEFAULT_SEMANTIC_QUOTA = 5;

export interface BatchOrchestratorOptions {
  semanticQuota?: number;
  dedupThreshold?: number;
  lengthTolerance?: number;
  maxSynonymTerms?: number;
  singleKeywordPolicy?: SingleKeywordPolicy;
}

export interface BatchOrchestratorDependencies {
  logger: Logger;
  retriever: LevelRetriever;
  keywordExtractor: IKeywordExtractor;
  options?: BatchOrchestratorOptions;
}

function cloneState(state: RetrievalSessionState): RetrievalSessionState {
  return {
    ...state,
    extractedKeywords: [...state.extractedKeywords],
    synonyms: state.synonyms ? [...state.synonyms] : undefined,
    levelOffsets: { ...state.levelOffsets },
    usedSentenceTexts: new Set(state.usedSentenceTexts),
    enabledLevels: [...state.enabledLevels],
    usedQuestionVariants: [...state.usedQuestionVariants],
  };
}

/**
 * Produces successive non-repeating batches for a session.
 *
 * The input state is never mutated; the returned state carries the
 * advanced cursor and the grown used-set.
 */
export class BatchOrchestrator {
  private readonly logger: Logger;
  private readonly retriever: LevelRetriever;
  private readonly keywordExtractor: IKeywordExtractor;
  private readonly semanticQuota: number;
  private readonly dedupThreshold: number;
  private readonly lengthTolerance: number;
  private readonly maxSynonymTerms: number;
  private readonly singleKeywordPolicy: SingleKeywordPolicy;

  constructor(dependencies: BatchOrchestratorDependencies) {
    const options = dependencies.options ?? {};
    this.logger = dependencies.logger;
    this.retriever = dependencies.retriever;
    this.keywordExtractor = dependencies.keywordExtractor;
    this.semanticQuota = options.semanticQuota ?? DEFAULT_SEMANTIC_QUOTA;
    this.dedupThreshold = options.dedupThreshold ?? DEFAULT_DEDUP_THRESHOLD;
    this.lengthTolerance = options.lengthTolerance ?? DEFAULT_LENGTH_TOLERANCE;
    this.maxSynonymTerms = options.maxSynonymTerms ?? 6;
    this.singleKeywordPolicy = options.singleKeywordPolicy ?? 'stop';
  }

  async getNextBatch(
    state: RetrievalSessionState,
    keywords: readonly string[],
    request: BatchRequest
  ): Promise<BatchResult> {
    const next = cloneState(state);
    const enabled = new Set<number>(request.enabledLevels ?? state.enabledLevels);
    const batchSize = Math.max(0, Math.floor(request.batchSize));
    const semanticQuota = enabled.has(4)
      ? Math.min(Math.max(0, request.semanticQuota ?? this.semanticQuota), batchSize)
      : 0;
    const cascadeQuota = batchSize - semanticQuota;
    const singleKeyword = keywords.length === 1;

    const used = new Set(state.usedSentenceTexts);
    const cascade: RetrievedSentence[] = [];
    let highestLevel: number | undefined;
    let level = next.currentLevel;

    while (cascade.length < cascadeQuota && level <= MAX_RETRIEVAL_LEVEL) {
      const current = toRetrievalLevel(level);
      if (current === undefined || !enabled.has(current) || this.isSkipped(current, singleKeyword)) {
        level++;
        continue;
      }

      if ((current === 2 || current === 3) && next.synonyms === undefined) {
        next.synonyms = await this.resolveSynonyms(keywords);
      }

      const fetched = await this.retriever.fetchLevel(
        current,
        { originalQuery: state.originalQuery, keywords: [...keywords], synonyms: next.synonyms ?? [] },
        next.levelOffsets[current] ?? 0,
        cascadeQuota - cascade.length,
        used
      );
      next.levelOffsets[current] = fetched.newOffset;

      for (const result of fetched.results) {
        cascade.push(result);
        used.add(result.text);
      }
      if (fetched.results.length > 0) {
        highestLevel = current;
      }
      if (fetched.exhausted || fetched.results.length === 0) {
        this.logger.debug(`[BatchOrchestrator] Level ${current} done for session ${state.sessionId}`);
        level++;
      }
    }
    next.currentLevel = level;

    const semantic: SemanticSearchResult = semanticQuota > 0
      ? await this.retriever.semanticSearch(
          semanticQueryText({ originalQuery: state.originalQuery, keywords: [...keywords] }),
          semanticQuota,
          used,
          true
        )
      : { results: [], complete: true };

    const { unique } = deduplicate([...semantic.results, ...cascade], state.usedSentenceTexts, this.dedupThreshold, {
      lengthTolerance: this.lengthTolerance,
    });
    for (const result of unique) {
      next.usedSentenceTexts.add(result.text);
    }

    // a short semantic pass that ran to the end has seen every sentence not yet used
    const exhausted =
      semanticQuota > 0 && semantic.complete
        ? semantic.results.length < semanticQuota
        : next.currentLevel > MAX_RETRIEVAL_LEVEL;

    this.logger.info(
      `[BatchOrchestrator] Session ${state.sessionId}: ${semantic.results.length} semantic + ${cascade.length} cascade -> ${unique.length} results, level ${state.currentLevel} -> ${next.currentLevel}${exhausted ? ' (exhausted)' : ''}`
    );

    return {
      results: unique,
      state: next,
      levelUsed: highestLevel ?? next.currentLevel,
      exhausted,
    };
  }

  /**
   * A single keyword has no combinations, so levels 0 and 2 are skipped.
   * Under the `stop` policy the cascade also ends after level 1.
   */
  private isSkipped(level: RetrievalLevel, singleKeyword: boolean): boolean {
    if (!singleKeyword) {
      return false;
    }
    if (level === 0 || level === 2) {
      return true;
    }
    return this.singleKeywordPolicy === 'stop' && level > 1;
  }

  /**
   * Synonyms of every keyword, flattened, without the keywords themselves
   */
  private async resolveSynonyms(keywords: readonly string[]): Promise<string[]> {
    const keywordSet = new Set(keywords.map(keyword => keyword.toLowerCase()));
    const synonyms: string[] = [];
    for (const keyword of keywords) {
      for (const synonym of await this.keywordExtractor.generateSynonyms(keyword)) {
        if (!keywordSet.has(synonym) && !synonyms.includes(synonym)) {
          synonyms.push(synonym);
        }
      }
    }
    const capped = synonyms.slice(0, this.maxSynonymTerms);
    this.logger.info(`[BatchOrchestrator] Synonyms: ${JSON.stringify(capped)}`);
    return capped;
  }
}

function toRetrievalLevel(level: number): RetrievalLevel | undefined {
  return RETRIEVAL_LEVELS.find(candidate => candidate === level);
}
