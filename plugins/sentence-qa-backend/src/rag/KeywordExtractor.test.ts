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
import { LLMServiceError } from '../errors';
import { ChatHandler, FakeLLMService, createTestLogger } from '../testUtils';
import { DEFAULT_FILLER_WORDS_PATH, FillerWordList } from './FillerWords';
import { KeywordExtractor, parseJsonStringArray } from './KeywordExtractor';

const logger = createTestLogger();
const fillerWords = FillerWordList.fromFile(DEFAULT_FILLER_WORDS_PATH, logger);

const buildExtractor = (chatHandler: ChatHandler, protectedTerms: string[] = []) => {
  const llmService = new FakeLLMService(chatHandler);
  const extractor = new KeywordExtractor({ logger, llmService, fillerWords, protectedTerms, chatModel: 'test-chat' });
  return { extractor, llmService };
};

const failing: ChatHandler = () => {
  throw new LLMServiceError('model unavailable', true);
};

describe('parseJsonStringArray', () => {
  it('parses a bare array', () => {
    expect(parseJsonStringArray(' ["grace", "freedom"] ')).toEqual(['grace', 'freedom']);
  });

  it('finds an array inside surrounding prose', () => {
    expect(parseJsonStringArray('Keywords: ["grace", "freedom"]. Hope this helps!')).toEqual(['grace', 'freedom']);
  });

  it('drops entries that are not strings', () => {
    expect(parseJsonStringArray('[1, "grace", null]')).toEqual(['grace']);
  });

  it('returns undefined when there is no array', () => {
    expect(parseJsonStringArray('no idea')).toBeUndefined();
    expect(parseJsonStringArray('{"keywords": "grace"}')).toBeUndefined();
  });
});

describe('KeywordExtractor', () => {
  describe('extractKeywords', () => {
    it('normalizes model keywords and drops filler words', async () => {
      const { extractor, llmService } = buildExtractor(() => '["Heaven", "the", " heaven "]');

      await expect(extractor.extractKeywords('Where is heaven?')).resolves.toEqual(['heaven']);
      expect(llmService.chatCalls[0].options).toEqual({ model: 'test-chat', temperature: 0.3, maxTokens: 200 });
    });

    it('keeps multi-word names together', async () => {
      const { extractor } = buildExtractor(() => '["Holy  Spirit"]');

      await expect(extractor.extractKeywords('Who is the Holy Spirit?')).resolves.toEqual(['holy spirit']);
    });

    it('keeps protected terms even when they are filler words', async () => {
      const { extractor } = buildExtractor(() => '["will", "testament"]', ['Will']);

      await expect(extractor.extractKeywords('What does the will say?')).resolves.toEqual(['will', 'testament']);
    });

    it('keeps less common words when filtering would remove everything', async () => {
      const { extractor } = buildExtractor(() => '["is", "the", "being"]');

      await expect(extractor.extractKeywords('What is being?')).resolves.toEqual(['being']);
    });

    it('falls back to the heuristic when the model fails', async () => {
      const { extractor } = buildExtractor(failing);

      await expect(extractor.extractKeywords('Where is heaven?')).resolves.toEqual(['heaven']);
    });

    it('falls back to the heuristic when the reply cannot be parsed', async () => {
      const { extractor } = buildExtractor(() => 'I think the keyword is grace');

      await expect(extractor.extractKeywords('Why does grace matter, really?')).resolves.toEqual([
        'grace',
        'matter',
        'really',
      ]);
    });

    it('falls back to the heuristic when the model returns no keywords', async () => {
      const { extractor } = buildExtractor(() => '[]');

      await expect(extractor.extractKeywords('How did freedom spread?')).resolves.toEqual(['freedom', 'spread']);
    });

    it('keeps only the first keywords of a long question', async () => {
      const { extractor } = buildExtractor(failing);
      const question = 'grace freedom mercy river mountain harvest lantern meadow thunder orchard kindness compass '.repeat(3);

      await expect(extractor.extractKeywords(question)).resolves.toEqual([
        'grace',
        'freedom',
        'mercy',
        'river',
        'mountain',
        'harvest',
      ]);
    });

    it('caps the model keywords at the configured limit', async () => {
      const llmService = new FakeLLMService(() => '["grace", "freedom", "mercy", "river"]');
      const extractor = new KeywordExtractor({ logger, llmService, fillerWords, maxKeywords: 2 });

      await expect(extractor.extractKeywords('Tell me everything.')).resolves.toEqual(['grace', 'freedom']);
    });
  });

  describe('heuristicKeywords', () => {
    it('uses longer words when every word is a filler word', () => {
      const { extractor } = buildExtractor(failing);

      expect(extractor.heuristicKeywords('Tell me about this')).toEqual(['tell', 'about', 'this']);
    });

    it('returns nothing for a query of short filler words', () => {
      const { extractor } = buildExtractor(failing);

      expect(extractor.heuristicKeywords('Who is he?')).toEqual([]);
    });
  });

  describe('generateSynonyms', () => {
    it('returns at most three related terms without the term itself', async () => {
      const { extractor, llmService } = buildExtractor(() => '["Mercy", "grace", "Favor", "blessing", "kindness"]');

      await expect(extractor.generateSynonyms('grace')).resolves.toEqual(['mercy', 'favor', 'blessing']);
      expect(llmService.chatCalls[0].options).toEqual({ model: 'test-chat', temperature: 0.5, maxTokens: 100 });
    });

    it('returns an empty list when the model fails', async () => {
      const { extractor } = buildExtractor(failing);

      await expect(extractor.generateSynonyms('grace')).resolves.toEqual([]);
    });
  });

  it('exposes the filler words in priority order', () => {
    const { extractor } = buildExtractor(failing);

    expect(extractor.getPriorityOrderedFillerWords().slice(0, 4)).toEqual(['is', 'are', 'was', 'were']);
  });
});
