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
 * Retrieval pipeline types
 *
 * @packageDocumentation
 */

import { RetrievalLevel, RetrievalSessionState, RetrievedSentence } from '../models';

/**
 * All listed terms must match (levels 0 and 2)
 */
export interface ComboCandidate {
  kind: 'combo';
  terms: string[];
  fromSynonyms: boolean;
}

/**
 * A term next to an auxiliary word (levels 1 and 3)
 */
export interface PairCandidate {
  kind: 'pair';
  term: string;
  auxiliary: string;
  fromSynonyms: boolean;
}

export type LevelCandidate = ComboCandidate | PairCandidate;

/**
 * What a level is searched for
 */
export interface LevelQuery {
  originalQuery: string;
  keywords: string[];
  synonyms: string[];
}

/**
 * One page of a level
 */
export interface LevelFetchResult {
  results: RetrievedSentence[];
  newOffset: number;
  exhausted: boolean;
}

/**
 * Outcome of a semantic search
 */
export interface SemanticSearchResult {
  results: RetrievedSentence[];
  /** False when embedding the query or the backend search failed */
  complete: boolean;
}

export interface BatchRequest {
  batchSize: number;
  semanticQuota?: number;
  enabledLevels?: readonly RetrievalLevel[];
}

export interface BatchResult {
  results: RetrievedSentence[];
  state: RetrievalSessionState;
  /** Highest level that contributed, or the resulting current level when none did */
  levelUsed: number;
  /** A completed semantic pass came back short, otherwise the cascade finished */
  exhausted: boolean;
}
