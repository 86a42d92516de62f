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
 * Candidate lists for each retrieval level
 *
 * A level's candidate list is a pure function of the ordered keywords, the
 * frozen synonym list and the auxiliary words, so a session offset always
 * points at the same candidate across calls.
 *
 * @packageDocumentation
 */

import { RetrievalLevel } from '../models';
import { generateKeywordCombinations } from './combinations';
import { LevelCandidate } from './types';

export interface PlanInput {
  keywords: readonly string[];
  synonyms: readonly string[];
  auxiliaryWords: readonly string[];
}

const MAX_CACHED_PLANS = 256;

function combos(terms: readonly string[], fromSynonyms: boolean): LevelCandidate[] {
  return generateKeywordCombinations(terms).map(combo => ({ kind: 'combo', terms: combo, fromSynonyms }));
}

/**
 * Auxiliary-major order: every term with the first auxiliary word, then
 * every term with the second, and so on
 */
function pairs(terms: readonly string[], auxiliaryWords: readonly string[], fromSynonyms: boolean): LevelCandidate[] {
  const result: LevelCandidate[] = [];
  for (const auxiliary of auxiliaryWords) {
    for (const term of terms) {
      result.push({ kind: 'pair', term, auxiliary, fromSynonyms });
    }
  }
  return result;
}

/**
 * Builds and caches candidate lists keyed by the ordered term tuple
 */
export class CandidatePlanner {
  private readonly cache = new Map<string, LevelCandidate[]>();

  /**
   * Candidates for a text level. Level 0 is empty for a single keyword;
   * level 4 has no candidate list.
   */
  candidatesFor(level: RetrievalLevel, input: PlanInput): LevelCandidate[] {
    const key = JSON.stringify([level, input.keywords, input.synonyms, input.auxiliaryWords]);
    const cached = this.cache.get(key);
    if (cached) {
      // refresh recency
      this.cache.delete(key);
      this.cache.set(key, cached);
      return cached;
    }

    const candidates = this.build(level, input);
    if (this.cache.size >= MAX_CACHED_PLANS) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey !== undefined) {
        this.cache.delete(oldestKey);
      }
    }
    this.cache.set(key, candidates);
    return candidates;
  }

  get cachedPlans(): number {
    return this.cache.size;
  }

  private build(level: RetrievalLevel, input: PlanInput): LevelCandidate[] {
    switch (level) {
      case 0:
        return input.keywords.length > 1 ? combos(input.keywords, false) : [];
      case 1:
        return pairs(input.keywords, input.auxiliaryWords, false);
      case 2:
        return combos(input.synonyms, true);
      case 3:
        return pairs(input.synonyms, input.auxiliaryWords, true);
      case 4:
        return [];
    }
  }
}
