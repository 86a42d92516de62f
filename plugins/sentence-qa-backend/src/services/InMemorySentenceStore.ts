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
 * In-memory sentence store implementation
 * Provides phrase, term and vector search over indexed sentences
 *
 * @packageDocumentation
 */

import { ISentenceStore, KnnQuery, PhraseQuery, TermQuery } from '../interfaces';
import { SentenceHit, SentenceRecord, StoredSentence } from '../models';
import { minimalOrderedGap, tokenize } from '../rag/textMatching';
import type { Logger } from 'winston';

interface IndexedSentence {
  record: SentenceRecord;
  tokens: string[];
}

function toStored(record: SentenceRecord): StoredSentence {
  const { embedding: _embedding, ...stored } = record;
  return stored;
}

/**
 * Sorts by score, highest first; equal scores keep insertion order
 */
function rank(hits: SentenceHit[], limit: number): SentenceHit[] {
  return hits.sort((a, b) => b.score - a.score).slice(0, Math.max(0, limit));
}

/**
 * In-memory sentence store using token matching and cosine similarity
 * Follows Single Responsibility Principle
 *
 * Note: For large corpora use the PostgreSQL store
 */
export class InMemorySentenceStore implements ISentenceStore {
  private readonly logger: Logger;
  private readonly sentences: Map<string, IndexedSentence> = new Map();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async storeBatch(records: SentenceRecord[]): Promise<void> {
    records.forEach(record => {
      this.sentences.set(record.id, { record, tokens: tokenize(record.text) });
    });
    this.logger.info(`[InMemorySentenceStore] Stored batch of ${records.length} sentences`);
  }

  /**
   * Sentences containing the phrase words in order with at most `slop`
   * words in between; tighter matches score higher
   */
  async phraseSearch(query: PhraseQuery): Promise<SentenceHit[]> {
    const words = tokenize(query.phrase);
    if (words.length === 0) {
      return [];
    }

    const hits: SentenceHit[] = [];
    for (const entry of this.candidates(query.exclude)) {
      const gaps = minimalOrderedGap(entry.tokens, words);
      if (gaps !== undefined && gaps <= query.slop) {
        hits.push({ sentence: toStored(entry.record), score: 1 / (1 + gaps) });
      }
    }
    return rank(hits, query.limit);
  }

  /**
   * Sentences matching all (`and`) or any (`or`) of the terms. A multi-word
   * term must appear as a consecutive phrase. With a query vector the score
   * is cosine similarity + 1, otherwise the number of matched terms.
   */
  async termSearch(query: TermQuery): Promise<SentenceHit[]> {
    const terms = query.terms.map(term => tokenize(term)).filter(words => words.length > 0);
    if (terms.length === 0) {
      return [];
    }

    const hits: SentenceHit[] = [];
    for (const entry of this.candidates(query.exclude)) {
      const matched = terms.filter(words => minimalOrderedGap(entry.tokens, words) === 0).length;
      const matches = query.operator === 'and' ? matched === terms.length : matched > 0;
      if (!matches) {
        continue;
      }
      const score = query.queryVector
        ? this.cosineSimilarity(query.queryVector, entry.record.embedding) + 1
        : matched;
      hits.push({ sentence: toStored(entry.record), score });
    }
    return rank(hits, query.limit);
  }

  async knnSearch(query: KnnQuery): Promise<SentenceHit[]> {
    const hits: SentenceHit[] = [];
    for (const entry of this.candidates(query.exclude)) {
      hits.push({
        sentence: toStored(entry.record),
        score: this.cosineSimilarity(query.vector, entry.record.embedding),
      });
    }

    const top = rank(hits, query.k);
    this.logger.debug(`[InMemorySentenceStore] kNN returned ${top.length} of ${hits.length} candidates`);
    return top;
  }

  async clear(): Promise<void> {
    const count = this.sentences.size;
    this.sentences.clear();
    this.logger.info(`[InMemorySentenceStore] Cleared ${count} sentences from store`);
  }

  async count(): Promise<number> {
    return this.sentences.size;
  }

  async maxLevel(): Promise<number> {
    let max = 0;
    for (const { record } of this.sentences.values()) {
      max = Math.max(max, record.level);
    }
    return max;
  }

  private *candidates(exclude?: ReadonlySet<string>): Iterable<IndexedSentence> {
    for (const entry of this.sentences.values()) {
      if (!exclude || !exclude.has(entry.record.text)) {
        yield entry;
      }
    }
  }

  /**
   * Calculate cosine similarity between two vectors
   */
  private cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) {
      throw new Error('Vectors must have the same length');
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
      dotProduct += a[i] * b[i];
      normA += a[i] * a[i];
      normB += b[i] * b[i];
    }

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);

    if (denominator === 0) {
      return 0;
    }

    return dotProduct / denominator;
  }
}
