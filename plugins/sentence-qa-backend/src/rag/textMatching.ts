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
 * Word-level text helpers shared by the in-memory store and the retriever
 *
 * @packageDocumentation
 */

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * Lower-cased words of a text, punctuation dropped
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}

/**
 * Smallest number of extra words needed to find `words` in order inside
 * `tokens`, or undefined when they do not all occur in that order.
 */
export function minimalOrderedGap(tokens: readonly string[], words: readonly string[]): number | undefined {
  if (words.length === 0) {
    return undefined;
  }

  let best: number | undefined;
  for (let start = 0; start < tokens.length; start++) {
    if (tokens[start] !== words[0]) {
      continue;
    }
    let position = start;
    let matched = 1;
    for (let cursor = start + 1; cursor < tokens.length && matched < words.length; cursor++) {
      if (tokens[cursor] === words[matched]) {
        position = cursor;
        matched++;
      }
    }
    if (matched < words.length) {
      // later starts cannot complete either
      break;
    }
    const gaps = position - start + 1 - words.length;
    if (best === undefined || gaps < best) {
      best = gaps;
    }
    if (best === 0) {
      break;
    }
  }

  return best;
}

/**
 * Whether `phrase` occurs in `text` with at most `slop` words inserted
 * between its words in total
 */
export function containsPhrase(text: string, phrase: string, slop = 0): boolean {
  const words = tokenize(phrase);
  if (words.length === 0) {
    return false;
  }
  const gaps = minimalOrderedGap(tokenize(text), words);
  return gaps !== undefined && gaps <= slop;
}

/**
 * Proximity boost for a multi-term match: `maxBoost` when the words are
 * consecutive and in order, `maxBoost / (1 + gaps)` with gaps in between,
 * 0 when they do not all appear in order.
 */
export function phraseProximityBoost(text: string, terms: readonly string[], maxBoost = 1): number {
  const words = terms.flatMap(term => tokenize(term));
  const gaps = minimalOrderedGap(tokenize(text), words);
  if (gaps === undefined) {
    return 0;
  }
  return maxBoost / (1 + gaps);
}
