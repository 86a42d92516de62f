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
 * All non-empty subsets of `keywords`, largest first; subsets of the same
 * size come in lexicographic order of their indices.
 *
 * `["grace", "freedom", "salvation"]` gives
 * `[grace freedom salvation] [grace freedom] [grace salvation]
 * [freedom salvation] [grace] [freedom] [salvation]`.
 */
export function generateKeywordCombinations(keywords: readonly string[]): string[][] {
  const result: string[][] = [];
  for (let size = keywords.length; size >= 1; size--) {
    collect(keywords, size, 0, [], result);
  }
  return result;
}

function collect(
  keywords: readonly string[],
  size: number,
  start: number,
  current: string[],
  out: string[][]
): void {
  if (current.length === size) {
    out.push([...current]);
    return;
  }
  for (let i = start; i <= keywords.length - (size - current.length); i++) {
    current.push(keywords[i]);
    collect(keywords, size, i + 1, current, out);
    current.pop();
  }
}
