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
 * Text splitter for sentence indexing
 * Cleans uploaded text and splits it into sentences
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { ITextSplitter, SplitMode } from '../interfaces';

const REPLACEMENTS: Array<[RegExp, string]> = [
  [/[\u201C\u201D\u201E\u0093\u0094]/g, '"'],
  [/[\u2018\u2019\u201A\u0091\u0092]/g, "'"],
  [/[\u2013\u2014\u0096\u0097]/g, '-'],
  [/\u2026/g, '...'],
  [/\u00A0/g, ' '],
];

/** Line mode is picked for more lines than this ... */
const LINE_MODE_MIN_LINES = 100;
/** ... when they average fewer characters than this */
const LINE_MODE_MAX_AVG_LENGTH = 200;

const SENTENCE_BOUNDARY = /(?<=[.!?]["')\]]*)\s+/;

/**
 * Strip the BOM, normalize line endings, map typographic quotes and dashes
 * to ASCII and drop control characters other than newline and tab
 */
export function cleanText(text: string): string {
  let cleaned = text.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
  for (const [pattern, replacement] of REPLACEMENTS) {
    cleaned = cleaned.replace(pattern, replacement);
  }
  // eslint-disable-next-line no-control-regex
  return cleaned.replace(/[\x00-\x08\x0b\x0c\x0e-\x1f\x7f-\x9f]/g, '');
}

function cleanSentence(sentence: string): string {
  return sentence.replace(/\s+/g, ' ').trim();
}

function isIndexable(sentence: string): boolean {
  return sentence.length >= 3 && /\p{L}/u.test(sentence);
}

/**
 * Service for splitting uploaded text into sentences
 * Follows Single Responsibility Principle
 */
export class TextSplitter implements ITextSplitter {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Split text into indexable sentences.
   *
   * `line` treats every line as a sentence, `sentence` splits paragraphs on
   * terminal punctuation, `auto` picks line mode for files made of many
   * short lines.
   */
  splitIntoSentences(text: string, mode: SplitMode = 'auto'): string[] {
    if (!text || !text.trim()) {
      return [];
    }

    const cleaned = cleanText(text);
    const lines = cleaned.split('\n').map(line => line.trim()).filter(line => line.length > 0);

    let effectiveMode = mode;
    if (mode === 'auto') {
      const averageLength = lines.reduce((sum, line) => sum + line.length, 0) / Math.max(1, lines.length);
      effectiveMode = lines.length > LINE_MODE_MIN_LINES && averageLength < LINE_MODE_MAX_AVG_LENGTH ? 'line' : 'sentence';
      this.logger.debug(
        `[TextSplitter] ${lines.length} lines, average ${averageLength.toFixed(0)} chars, using ${effectiveMode} mode`
      );
    }

    const raw = effectiveMode === 'line' ? lines : this.splitParagraphs(cleaned);
    const sentences = raw.map(cleanSentence).filter(isIndexable);

    this.logger.info(`[TextSplitter] Split text into ${sentences.length} sentences (${effectiveMode} mode)`);
    return sentences;
  }

  private splitParagraphs(text: string): string[] {
    return text
      .split(/\n\s*\n/)
      .map(paragraph => paragraph.replace(/\n/g, ' '))
      .flatMap(paragraph => paragraph.split(SENTENCE_BOUNDARY));
  }
}
