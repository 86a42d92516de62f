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
 * Keyword and synonym extraction for the retrieval cascade
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IKeywordExtractor, ILLMService } from '../interfaces';
import { ChatMessage } from '../models';
import { errorMessage } from '../errors';
import { FillerWordList } from './FillerWords';
import { Result, err, ok, orElse } from './result';

const VERY_COMMON_WORDS = new Set(['is', 'are', 'was', 'were', 'the', 'a', 'an', 'of', 'to', 'in']);

const MAX_SYNONYMS = 3;

export const DEFAULT_MAX_KEYWORDS = 6;

const KEYWORD_PROMPT = (query: string) => `Extract ONLY the meaningful keywords from this question.

RULES:
1. Keep nouns, proper names and key concepts
2. DO NOT include question words (where, what, when, who, why, how, which),
   common verbs (is, are, was, were, be, do, does, did, have, has),
   prepositions (in, on, at, to, for, with, about, between) or articles (the, a, an)
3. DO NOT add implied words such as "location", "place", "reason", "time" or "person"
4. Multi-word names stay together

Question: "${query}"

Example 1: "Where is heaven?" -> ["heaven"]
Example 2: "Who is the Holy Spirit?" -> ["holy spirit"]
Example 3: "Why did the bridge collapse in winter?" -> ["bridge", "collapse", "winter"]

Return a JSON array only, no explanation.`;

const SYNONYM_PROMPT = (term: string) => `Give 2-3 synonyms or closely related terms for the word "${term}".
Return a JSON array only.

Example for "grace": ["mercy", "blessing", "favor"]`;

export type ExtractionError =
  | { kind: 'llm_failed'; message: string }
  | { kind: 'unparseable'; content: string }
  | { kind: 'empty' };

export interface KeywordExtractorDependencies {
  logger: Logger;
  llmService: ILLMService;
  fillerWords: FillerWordList;
  /** Terms kept even when they are filler words */
  protectedTerms?: string[];
  /** Level 0 searches every subset of the keywords, so their number is bounded */
  maxKeywords?: number;
  chatModel?: string;
}

/**
 * Parse a JSON string array out of an LLM reply: the whole reply first,
 * then the first bracketed array found in it. Non-string entries are dropped.
 */
export function parseJsonStringArray(content: string): string[] | undefined {
  const candidates = [content.trim()];
  const bracketed = content.match(/\[[\s\S]*?\]/);
  if (bracketed) {
    candidates.push(bracketed[0]);
  }

  for (const candidate of candidates) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (Array.isArray(parsed)) {
        return parsed.filter((value): value is string => typeof value === 'string');
      }
    } catch {
      // try the next candidate
    }
  }
  return undefined;
}

function normalizeTerms(terms: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const term of terms) {
    const normalized = term.toLowerCase().trim().replace(/\s+/g, ' ');
    if (normalized && !seen.has(normalized)) {
      seen.add(normalized);
      result.push(normalized);
    }
  }
  return result;
}

/**
 * Extracts search keywords from questions with an LLM, falling back to a
 * word-list heuristic when the model is unavailable or unhelpful
 */
export class KeywordExtractor implements IKeywordExtractor {
  private readonly logger: Logger;
  private readonly llmService: ILLMService;
  private readonly fillerWords: FillerWordList;
  private readonly protectedTerms: Set<string>;
  private readonly maxKeywords: number;
  private readonly chatModel?: string;

  constructor(dependencies: KeywordExtractorDependencies) {
    this.logger = dependencies.logger;
    this.llmService = dependencies.llmService;
    this.fillerWords = dependencies.fillerWords;
    this.protectedTerms = new Set(normalizeTerms(dependencies.protectedTerms ?? []));
    this.maxKeywords = Math.max(1, dependencies.maxKeywords ?? DEFAULT_MAX_KEYWORDS);
    this.chatModel = dependencies.chatModel;
  }

  async extractKeywords(query: string): Promise<string[]> {
    const extracted = await this.extractWithLLM(query);
    const all = orElse(extracted, error => {
      this.logger.warn(`[KeywordExtractor] Using heuristic keywords (${error.kind})`);
      return this.heuristicKeywords(query);
    });
    if (all.length > this.maxKeywords) {
      this.logger.debug(`[KeywordExtractor] Keeping the first ${this.maxKeywords} of ${all.length} keywords`);
    }
    const keywords = all.slice(0, this.maxKeywords);
    this.logger.info(`[KeywordExtractor] Keywords for "${query.substring(0, 50)}": ${JSON.stringify(keywords)}`);
    return keywords;
  }

  async generateSynonyms(term: string): Promise<string[]> {
    try {
      const reply = await this.llmService.chat(
        [
          { role: 'system', content: 'You are a thesaurus. Return only a JSON array.' },
          { role: 'user', content: SYNONYM_PROMPT(term) },
        ],
        { model: this.chatModel, temperature: 0.5, maxTokens: 100 }
      );
      const self = term.toLowerCase().trim();
      const synonyms = normalizeTerms(parseJsonStringArray(reply) ?? []).filter(s => s !== self);
      this.logger.debug(`[KeywordExtractor] Synonyms for "${term}": ${JSON.stringify(synonyms)}`);
      return synonyms.slice(0, MAX_SYNONYMS);
    } catch (error) {
      this.logger.warn(`[KeywordExtractor] Synonym generation failed for "${term}": ${errorMessage(error)}`);
      return [];
    }
  }

  getPriorityOrderedFillerWords(): string[] {
    return this.fillerWords.inPriorityOrder();
  }

  /**
   * Drop filler words unless protected. When that removes everything,
   * only the very common words go.
   */
  filterKeywords(raw: readonly string[]): string[] {
    const terms = normalizeTerms(raw);
    const filtered = terms.filter(term => this.protectedTerms.has(term) || !this.fillerWords.has(term));
    if (filtered.length === 0 && terms.length > 0) {
      return terms.filter(term => !VERY_COMMON_WORDS.has(term));
    }
    return filtered;
  }

  /**
   * Split the query into words and keep the ones that look meaningful
   */
  heuristicKeywords(query: string): string[] {
    const words = query
      .toLowerCase()
      .split(/\s+/)
      .map(word => word.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ''))
      .filter(word => word.length > 0);

    const filtered = words.filter(word => word.length > 2 && !this.fillerWords.has(word));
    return normalizeTerms(filtered.length > 0 ? filtered : words.filter(word => word.length > 3));
  }

  private async extractWithLLM(query: string): Promise<Result<string[], ExtractionError>> {
    const messages: ChatMessage[] = [
      { role: 'system', content: 'You are a keyword extractor. Return only a JSON array.' },
      { role: 'user', content: KEYWORD_PROMPT(query) },
    ];

    let reply: string;
    try {
      reply = await this.llmService.chat(messages, { model: this.chatModel, temperature: 0.3, maxTokens: 200 });
    } catch (error) {
      return err({ kind: 'llm_failed', message: errorMessage(error) });
    }

    const raw = parseJsonStringArray(reply);
    if (raw === undefined) {
      return err({ kind: 'unparseable', content: reply });
    }
    const keywords = this.filterKeywords(raw);
    return keywords.length > 0 ? ok(keywords) : err({ kind: 'empty' });
  }
}
