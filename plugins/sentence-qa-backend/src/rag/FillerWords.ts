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

import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from 'winston';

export const DEFAULT_FILLER_WORDS_PATH = path.resolve(__dirname, '../../data/filler-words.txt');

const FALLBACK_WORDS = ['is', 'are', 'was', 'were', 'be', 'been', 'being'];

/**
 * Parse a filler word list: comma or newline separated, `#` starts a
 * comment line. Words are lower-cased; the first occurrence keeps its place.
 */
export function parseFillerWords(content: string): string[] {
  const ordered: string[] = [];
  const seen = new Set<string>();

  for (const line of content.split(/\r?\n/)) {
    if (line.trim().startsWith('#')) {
      continue;
    }
    for (const raw of line.split(',')) {
      const word = raw.trim().toLowerCase();
      if (word && !seen.has(word)) {
        seen.add(word);
        ordered.push(word);
      }
    }
  }

  return ordered;
}

/**
 * Stopwords, auxiliary verbs, prepositions and articles, in priority order
 */
export class FillerWordList {
  private readonly ordered: string[];
  private readonly lookup: Set<string>;

  constructor(words: string[]) {
    this.ordered = parseFillerWords(words.join('\n'));
    this.lookup = new Set(this.ordered);
  }

  static fromFile(filePath: string, logger: Logger): FillerWordList {
    try {
      const words = parseFillerWords(fs.readFileSync(filePath, 'utf8'));
      logger.debug(`[FillerWords] Loaded ${words.length} words from ${filePath}`);
      return new FillerWordList(words);
    } catch (error) {
      logger.warn(`[FillerWords] Could not load ${filePath}, using built-in list: ${error}`);
      return new FillerWordList(FALLBACK_WORDS);
    }
  }

  has(word: string): boolean {
    return this.lookup.has(word.toLowerCase());
  }

  /**
   * Words in file order
   */
  inPriorityOrder(): string[] {
    return [...this.ordered];
  }

  get size(): number {
    return this.ordered.length;
  }
}
