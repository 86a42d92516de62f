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
 * Level retriever
 * Runs one level of the retrieval cascade from a pagination cursor
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IKeywordExtractor, ILLMService, ISentenceStore } from '../interfaces';
import { MatchTag, RetrievalLevel, RetrievedSentence, SentenceHit } from '../models';
import { errorMessage } from '../errors';
import { CandidatePlanner } from './CandidatePlanner';
import { DEFAULT_DEDUP_THRESHOLD, DEFAULT_LENGTH_TOLERANCE, deduplicate, isDuplicate } from './Deduplicator';
import { containsPhrase, phraseProximityBoost } from './textMatching';
import { ComboCandidate, LevelCandidate, LevelFetchResult, LevelQuery, PairCandidate, SemanticSearchResult } from './types';

export interface LevelRetrieverOptions {
  dedupThreshold?: number;
  lengthTolerance?: number;
  /** Bound on similarity computations per duplicate check while paging */
  maxComparisons?: number;
  proximityMaxBoost?: number;
  embeddingModel?: string;
}

export interface LevelRetrieverDependencies {
  logger: Logger;
  llmService: ILLMService;
  sentenceStore: ISentenceStore;
  keywordExtractor: IKeywordExtractor;
  planner?: CandidatePlanner;
  options?: LevelRetrieverOptions;
}

interface CandidateSearch {
  hits: RetrievedSentence[];
  /** The backend had at least as many hits as were asked for */
  truncated: boolean;
  /** Hits that matched the backend query but failed local verification */
  rejected: string[];
}

const MAX_CACHED_EMBEDDINGS = 64;

/**
 * Text the semantic levels embed: the keywords, or the question itself
 * when no keyword was found
 */
export function semanticQueryText(query: Pick<LevelQuery, 'originalQuery' | 'keywords'>): string {
  return query.keywords.length > 0 ? query.keywords.join(' ') : query.originalQuery;
}

function withExclusions(...sets: Array<Iterable<string>>): Set<string> {
  const merged = new Set<string>();
  for (const set of sets) {
    for (const text of set) {
      merged.add(text);
    }
  }
  return merged;
}

/**
 * Fetches sentences for one retrieval level.
 *
 * The offset indexes the level's candidate list. A candidate is only
 * passed once every hit it has was consumed, so a partially used
 * candidate is resumed by the next call.
 */
export class LevelRetriever {
  private readonly logger: Logger;
  private readonly llmService: ILLMService;
  private readonly sentenceStore: ISentenceStore;
  private readonly keywordExtractor: IKeywordExtractor;
  private readonly planner: CandidatePlanner;
  private readonly dedupThreshold: number;
  private readonly lengthTolerance: number;
  private readonly maxComparisons?: number;
  private readonly proximityMaxBoost: number;
  private readonly embeddingModel?: string;
  private readonly embeddingCache = new Map<string, number[]>();

  constructor(dependencies: LevelRetrieverDependencies) {
    const options = dependencies.options ?? {};
    this.logger = dependencies.logger;
    this.llmService = dependencies.llmService;
    this.sentenceStore = dependencies.sentenceStore;
    this.keywordExtractor = dependencies.keywordExtractor;
    this.planner = dependencies.planner ?? new CandidatePlanner();
    this.dedupThreshold = options.dedupThreshold ?? DEFAULT_DEDUP_THRESHOLD;
    this.lengthTolerance = options.lengthTolerance ?? DEFAULT_LENGTH_TOLERANCE;
    this.maxComparisons = options.maxComparisons;
    this.proximityMaxBoost = options.proximityMaxBoost ?? 1;
    this.embeddingModel = options.embeddingModel;
  }

  /**
   * Candidate list of a text level (empty for level 4)
   */
  candidatesFor(level: RetrievalLevel, query: LevelQuery): LevelCandidate[] {
    return this.planner.candidatesFor(level, {
      keywords: query.keywords,
      synonyms: query.synonyms,
      auxiliaryWords: this.keywordExtractor.getPriorityOrderedFillerWords(),
    });
  }

  async fetchLevel(
    level: RetrievalLevel,
    query: LevelQuery,
    offset: number,
    limit: number,
    usedTexts: ReadonlySet<string>
  ): Promise<LevelFetchResult> {
    if (level === 4) {
      const { results, complete } = await this.semanticSearch(semanticQueryText(query), limit, usedTexts, false);
      return { results, newOffset: offset + results.length, exhausted: complete && results.length < limit };
    }

    const candidates = this.candidatesFor(level, query);
    const seen = new Set(usedTexts);
    const rejected = new Set<string>();
    const accepted: RetrievedSentence[] = [];
    let cursor = offset;
    let queryVector: number[] | undefined;
    let vectorResolved = false;

    while (cursor < candidates.length && accepted.length < limit) {
      const candidate = candidates[cursor];
      const remaining = limit - accepted.length;
      const exclude = withExclusions(seen, rejected);

      let search: CandidateSearch;
      if (candidate.kind === 'combo') {
        if (!vectorResolved) {
          queryVector = await this.embedOptional(semanticQueryText(query));
          vectorResolved = true;
        }
        search = await this.searchCombo(level, candidate, remaining + 1, exclude, queryVector);
      } else {
        search = await this.searchPair(level, candidate, remaining + 1, exclude);
      }
      search.rejected.forEach(text => rejected.add(text));

      let processed = 0;
      for (const hit of search.hits) {
        if (accepted.length >= limit) {
          break;
        }
        processed++;
        if (isDuplicate(hit.text, seen, this.dedupThreshold, {
          lengthTolerance: this.lengthTolerance,
          maxComparisons: this.maxComparisons,
        })) {
          rejected.add(hit.text);
          continue;
        }
        seen.add(hit.text);
        accepted.push(hit);
      }

      // a truncated candidate is queried again; every processed hit is excluded by then
      const madeProgress = search.hits.some(hit => !exclude.has(hit.text)) ||
        search.rejected.some(text => !exclude.has(text));
      if ((processed === search.hits.length && !search.truncated) || !madeProgress) {
        cursor++;
      }
    }

    const { unique } = deduplicate(accepted, usedTexts, this.dedupThreshold, {
      lengthTolerance: this.lengthTolerance,
    });

    this.logger.debug(
      `[LevelRetriever] Level ${level}: ${unique.length} results, cursor ${offset} -> ${cursor} of ${candidates.length}`
    );

    return { results: unique, newOffset: cursor, exhausted: cursor >= candidates.length };
  }

  /**
   * Nearest sentences to `queryText` that are not (near) duplicates of `exclude`.
   * `complete` is false when the search stopped on a failure.
   */
  async semanticSearch(
    queryText: string,
    k: number,
    exclude: ReadonlySet<string>,
    isPrimarySource: boolean
  ): Promise<SemanticSearchResult> {
    if (k <= 0 || !queryText.trim()) {
      return { results: [], complete: true };
    }

    const vector = await this.embedOptional(queryText);
    if (!vector) {
      return { results: [], complete: false };
    }

    const seen = new Set(exclude);
    const rejected = new Set<string>();
    const accepted: RetrievedSentence[] = [];
    const match: MatchTag = { kind: 'semantic', query: queryText };
    let complete = true;

    while (accepted.length < k) {
      const remaining = k - accepted.length;
      let hits: SentenceHit[];
      try {
        hits = await this.sentenceStore.knnSearch({ vector, k: remaining, exclude: withExclusions(seen, rejected) });
      } catch (error) {
        this.logger.warn(`[LevelRetriever] Semantic search failed: ${errorMessage(error)}`);
        complete = false;
        break;
      }

      let rejectedThisRound = 0;
      for (const hit of hits) {
        if (isDuplicate(hit.sentence.text, seen, this.dedupThreshold, { lengthTolerance: this.lengthTolerance })) {
          rejected.add(hit.sentence.text);
          rejectedThisRound++;
          continue;
        }
        seen.add(hit.sentence.text);
        accepted.push({ ...hit.sentence, score: hit.score, retrievalLevel: 4, isPrimarySource, match });
      }

      if (hits.length < remaining || rejectedThisRound === 0) {
        break;
      }
    }

    return { results: accepted, complete };
  }

  private async searchCombo(
    level: RetrievalLevel,
    candidate: ComboCandidate,
    limit: number,
    exclude: ReadonlySet<string>,
    queryVector: number[] | undefined
  ): Promise<CandidateSearch> {
    const hits = await this.runSearch(`${level}:${candidate.terms.join('+')}`, () =>
      this.sentenceStore.termSearch({ terms: candidate.terms, operator: 'and', limit, exclude, queryVector })
    );

    const match: MatchTag = candidate.fromSynonyms
      ? { kind: 'synonym_combo', keywordCombo: candidate.terms, synonymUsed: candidate.terms.join(', ') }
      : { kind: 'keyword_combo', keywordCombo: candidate.terms };

    const boosted = hits.map(hit => {
      const boost = candidate.terms.length > 1
        ? phraseProximityBoost(hit.sentence.text, candidate.terms, this.proximityMaxBoost)
        : 0;
      return {
        ...hit.sentence,
        score: hit.score * (1 + boost),
        retrievalLevel: level,
        isPrimarySource: false,
        match,
      };
    });
    // Array.prototype.sort is stable
    boosted.sort((a, b) => b.score - a.score);

    return { hits: boosted, truncated: hits.length >= limit, rejected: [] };
  }

  /**
   * Both orders of term and auxiliary word, each as an exact phrase
   */
  private async searchPair(
    level: RetrievalLevel,
    candidate: PairCandidate,
    limit: number,
    exclude: ReadonlySet<string>
  ): Promise<CandidateSearch> {
    const phrases = [`${candidate.term} ${candidate.auxiliary}`, `${candidate.auxiliary} ${candidate.term}`];
    const match: MatchTag = {
      kind: 'auxiliary_pair',
      term: candidate.term,
      termSource: candidate.fromSynonyms ? 'synonym' : 'keyword',
      magicWordUsed: candidate.auxiliary,
      ...(candidate.fromSynonyms ? { synonymUsed: candidate.term } : {}),
    };

    const hits: RetrievedSentence[] = [];
    const rejected: string[] = [];
    const collected = new Set<string>();
    let truncated = false;

    for (const phrase of phrases) {
      const phraseHits = await this.runSearch(`${level}:"${phrase}"`, () =>
        this.sentenceStore.phraseSearch({ phrase, slop: 0, limit, exclude })
      );
      truncated = truncated || phraseHits.length >= limit;

      for (const hit of phraseHits) {
        const text = hit.sentence.text;
        if (collected.has(text)) {
          continue;
        }
        collected.add(text);
        if (!containsPhrase(text, phrase, 0)) {
          rejected.push(text);
          continue;
        }
        hits.push({ ...hit.sentence, score: hit.score, retrievalLevel: level, isPrimarySource: false, match });
      }
    }

    return { hits, truncated, rejected };
  }

  private async runSearch(label: string, search: () => Promise<SentenceHit[]>): Promise<SentenceHit[]> {
    try {
      return await search();
    } catch (error) {
      this.logger.warn(`[LevelRetriever] Search ${label} failed, skipping: ${errorMessage(error)}`);
      return [];
    }
  }

  private async embedOptional(text: string): Promise<number[] | undefined> {
    const cached = this.embeddingCache.get(text);
    if (cached) {
      return cached;
    }
    try {
      const [vector] = await this.llmService.generateEmbeddings([text], this.embeddingModel);
      if (!vector || vector.length === 0) {
        return undefined;
      }
      if (this.embeddingCache.size >= MAX_CACHED_EMBEDDINGS) {
        const oldestKey = this.embeddingCache.keys().next().value;
        if (oldestKey !== undefined) {
          this.embeddingCache.delete(oldestKey);
        }
      }
      this.embeddingCache.set(text, vector);
      return vector;
    } catch (error) {
      this.logger.warn(`[LevelRetriever] Embedding failed for "${text.substring(0, 50)}": ${errorMessage(error)}`);
      return undefined;
    }
  }
}
