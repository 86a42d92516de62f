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

import { describe, expect, it } from '@jest/globals';
import { createTestLogger } from '../testUtils';
import { TextSplitter, cleanText } from './TextSplitter';

describe('cleanText', () => {
  it('maps typographic punctuation to ASCII', () => {
    expect(cleanText('\u201cHi\u201d \u2014 it\u2019s\u2026')).toBe('"Hi" - it\'s...');
  });

  it('drops the BOM and normalizes line endings', () => {
    expect(cleanText('\ufeffOne line.\r\nTwo line.\rThree.')).toBe('One line.\nTwo line.\nThree.');
  });

  it('removes control characters but keeps tabs', () => {
    expect(cleanText('a\u0000b\tc\u0007')).toBe('ab\tc');
  });
});

describe('TextSplitter', () => {
  const splitter = new TextSplitter(createTestLogger());

  it('splits paragraphs on terminal punctuation', () => {
    const text = 'Grace abounds. Freedom rings!\nIt is "so" true.\n\nNew paragraph here? Yes.';

    expect(splitter.splitIntoSentences(text, 'sentence')).toEqual([
      'Grace abounds.',
      'Freedom rings!',
      'It is "so" true.',
      'New paragraph here?',
      'Yes.',
    ]);
  });

  it('keeps closing quotes with their sentence', () => {
    expect(splitter.splitIntoSentences('He said "Go." Then he left.')).toEqual(['He said "Go."', 'Then he left.']);
  });

  it('drops fragments without letters or shorter than three characters', () => {
    expect(splitter.splitIntoSentences('12. ?! Real sentence.')).toEqual(['Real sentence.']);
  });

  it('collapses whitespace', () => {
    expect(splitter.splitIntoSentences('Grace   is\tgood.')).toEqual(['Grace is good.']);
  });

  it('treats every line as a sentence in line mode', () => {
    expect(splitter.splitIntoSentences('first line\n\nsecond line. still second', 'line')).toEqual([
      'first line',
      'second line. still second',
    ]);
  });

  it('picks line mode for many short lines', () => {
    const text = Array.from({ length: 101 }, (_, i) => `Verse ${i} speaks. Of things`).join('\n');

    const sentences = splitter.splitIntoSentences(text);

    expect(sentences).toHaveLength(101);
    expect(sentences[0]).toBe('Verse 0 speaks. Of things');
  });

  it('stays in sentence mode for a short file', () => {
    const text = Array.from({ length: 100 }, (_, i) => `Verse ${i} speaks. Of things`).join('\n');

    expect(splitter.splitIntoSentences(text)).toHaveLength(101);
  });

  it('returns nothing for blank input', () => {
    expect(splitter.splitIntoSentences('')).toEqual([]);
    expect(splitter.splitIntoSentences(' \n\t ')).toEqual([]);
  });
});
