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
 * Fuzzy sentence deduplication
 *
 * Two sentences are duplicates when they are equal, or when their lengths
 * are within the length tolerance and their character similarity ratio
 * reaches the threshold. Comparison is on raw strings: case and
 * punctuation count.
 *
 * @packageDocumentation
 */

export const DEFAULT_DEDUP_THRESHOLD = 0.95;
export const DEFAULT_LENGTH_TOLERANCE = 0.15;

export interface DuplicateCheckOptions {
  /** Max relative length difference still worth comparing */
  lengthTolerance?: number;
  /** Upper bound on similarity computations for one check */
  maxComparisons?: number;
}

/**
 * Similarity ratio `2 * M / (|a| + |b|)` where M is the number of characters
 * in the longest-matching-blocks decomposition of the two strings.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }
  return (2 * countMatchingCharacters(a, b)) / total;
}

function countMatchingCharacters(a: string, b: string): number {
  const b2j = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const positions = b2j.get(b[j]);
    if (positions) {
      positions.push(j);
    } else {
      b2j.set(b[j], [j]);
    }
  }

  let matched = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) {
      break;
    }
    const [alo, ahi, blo, bhi] = next;
    const [i, j, size] = findLongestMatch(a, b2j, alo, ahi, blo, bhi);
    if (size === 0) {
      continue;
    }
    matched += size;
    if (alo < i && blo < j) {
      queue.push([alo, i, blo, j]);
    }
    if (i + size < ahi && j + size < bhi) {
      queue.push([i + size, ahi, j + size, bhi]);
    }
  }

  return matched;
}

function findLongestMatch(
  a: string,
  b2j: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): [number, number, number] {
  let bestI = alo;
  let bestJ = blo;
  let bestSize = 0;
  let j2len = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const nextJ2len = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < blo) {
        continue;
      }
      if (j >= bhi) {
        break;
      }
      const k = (j2len.get(j - 1) ?? 0) + 1;
      nextJ2len.set(j, k);
      if (k > bestSize) {
        bestI = i - k + 1;
        bestJ = j - k + 1;
        bestSize = k;
      }
    }
    j2len = nextJ2len;
  }

  return [bestI, bestJ, bestSize];
}

function lengthsCompatible(a: string, b: string, tolerance: number): boolean {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) {
    return true;
  }
  return Math.abs(a.length - b.length) / longest <= tolerance;
}

/**
 * Check whether `candidate` is (nearly) one of the `seen` texts
 */
export function isDuplicate(
  candidate: string,
  seen: ReadonlySet<string>,
  threshold: number = DEFAULT_DEDUP_THRESHOLD,
  options: DuplicateCheckOptions = {}
): boolean {
  if (!candidate || seen.size === 0) {
    return false;
  }
  if (seen.has(candidate)) {
    return true;
  }

  const tolerance = options.lengthTolerance ?? DEFAULT_LENGTH_TOLERANCE;
  const budget = options.maxComparisons ?? Number.POSITIVE_INFINITY;
  let comparisons = 0;

  for (const other of seen) {
    if (!lengthsCompatible(candidate, other, tolerance)) {
      continue;
    }
    if (comparisons >= budget) {
      return false;
    }
    comparisons++;
    if (similarityRatio(candidate, other) >= threshold) {
      return true;
    }
  }

  return false;
}

export interface DeduplicationResult<T> {
  unique: T[];
  seen: Set<string>;
}

/**
 * Filter items in order, keeping the first of each group of near-duplicates.
 * `existing` is not modified; the returned `seen` holds it plus every kept text.
 */
export function deduplicate<T extends { text: string }>(
  items: readonly T[],
  existing: ReadonlySet<string> = new Set<string>(),
  threshold: number = DEFAULT_DEDUP_THRESHOLD,
  options: DuplicateCheckOptions = {}
): DeduplicationResult<T> {
  const seen = new Set(existing);
  const unique: T[] = [];

  for (const item of items) {
    if (!item.text) {
      continue;
    }
    if (isDuplicate(item.text, seen, threshold, options)) {
      continue;
    }
    seen.add(item.text);
    unique.push(item);
  }

  return { unique, seen };
}
