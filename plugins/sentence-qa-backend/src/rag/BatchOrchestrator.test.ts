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
import { IKeywordExtractor } from '../interfaces';
import { RetrievalLevel, RetrievalSessionState, SingleKeywordPolicy } from '../models';
import { InMemorySentenceStore } from '../services/InMemorySentenceStore';
import { FakeLLMService, createTestLogger, sentenceRecords } from '../testUtils';
import { BatchOrchestrator } from './BatchOrchestrator';
import { LevelRetriever } from './LevelRetriever';

const logger = createTestLogger();
const constantEmbedding = (): number[] => [1, 0];

const GRACE_CORPUS = [
  'Grace and freedom walk together.',
  'Grace freedom united.',
  'Freedom is the fruit of grace.',
  'Grace abounds.',
  'Freedom rings.',
  'The river runs to the sea.',
  'Mountains stand tall.',
  'Stars shine at night.',
  'Bread is warm.',
];

function sessionState(
  keywords: string[],
  enabledLevels: RetrievalLevel[] = [0, 1, 2, 3, 4]
): RetrievalSessionState {
  return {
    sessionId: 'session-1',
    originalQuery: `Tell me about ${keywords.join(' and ')}`,
    extractedKeywords: keywords,
    currentLevel: 0,
    levelOffsets: {},
    usedSentenceTexts: new Set(),
    enabledLevels,
    continueCount: 0,
    usedQuestionVariants: [],
    createdAt: 0,
    lastAccessedAt: 0,
  };
}

async function buildOrchestrator(
  texts: string[],
  synonyms: Record<string, string[]> = {},
  singleKeywordPolicy: SingleKeywordPolicy = 'stop'
) {
  const store = new InMemorySentenceStore(logger);
  await store.storeBatch(sentenceRecords(texts, constantEmbedding));
  const synonymRequests: string[] = [];
  const keywordExtractor: IKeywordExtractor = {
    extractKeywords: async () => [],
    generateSynonyms: async keyword => {
      synonymRequests.push(keyword);
      return synonyms[keyword] ?? [];
    },
    getPriorityOrderedFillerWords: () => ['is', 'are', 'was'],
  };
  const llmService = new FakeLLMService(() => '[]', constantEmbedding);
  const retriever = new LevelRetriever({
    logger,
    llmService,
    sentenceStore: store,
    keywordExtractor,
  });
  const orchestrator = new BatchOrchestrator({
    logger,
    retriever,
    keywordExtractor,
    options: { singleKeywordPolicy },
  });
  return { orchestrator, synonymRequests, llmService };
}

describe('BatchOrchestrator', () => {
  it('puts the semantic quota first, then the cascade', async () => {
    const { orchestrator } = await buildOrchestrator(GRACE_CORPUS);
    const state = sessionState(['grace', 'freedom']);

    const batch = await orchestrator.getNextBatch(state, state.extractedKeywords, { batchSize: 8 });

    expect(batch.results.map(result => result.text)).toEqual([
      'Grace abounds.',
      'Freedom rings.',
      'The river runs to the sea.',
      'Mountains stand tall.',
      'Stars shine at night.',
      'Grace freedom united.',
      'Grace and freedom walk together.',
      'Freedom is the fruit of grace.',
    ]);
    expect(batch.results.filter(result => result.isPrimarySource)).toHaveLength(5);
    expect(batch.results.slice(0, 5).every(result => result.isPrimarySource)).toBe(true);
    expect(batch.results.slice(5).map(result => result.retrievalLevel)).toEqual([0, 0, 0]);
    expect(batch.levelUsed).toBe(0);
    expect(batch.exhausted).toBe(false);
    expect(batch.state.currentLevel).toBe(0);
    expect(batch.state.levelOffsets).toEqual({ 0: 1 });
    expect(batch.state.usedSentenceTexts.size).toBe(8);
  });

  it('does not mutate the input state', async () => {
    const { orchestrator } = await buildOrchestrator(GRACE_CORPUS);
    const state = sessionState(['grace', 'freedom']);

    await orchestrator.getNextBatch(state, state.extractedKeywords, { batchSize: 8 });

    expect(state.usedSentenceTexts.size).toBe(0);
    expect(state.levelOffsets).toEqual({});
    expect(state.currentLevel).toBe(0);
  });

  it('never repeats a sentence and ends in a stable exhausted state', async () => {
    const { orchestrator } = await buildOrchestrator(GRACE_CORPUS);
    const first = await orchestrator.getNextBatch(sessionState(['grace', 'freedom']), ['grace', 'freedom'], {
      batchSize: 8,
    });

    const second = await orchestrator.getNextBatch(first.state, ['grace', 'freedom'], { batchSize: 8 });

    expect(second.results.map(result => result.text)).toEqual(['Bread is warm.']);
    expect(second.results[0].retrievalLevel).toBe(4);
    expect(second.levelUsed).toBe(4);
    expect(second.exhausted).toBe(true);
    expect(second.state.currentLevel).toBe(5);
    expect(second.state.synonyms).toEqual([]);

    const third = await orchestrator.getNextBatch(second.state, ['grace', 'freedom'], { batchSize: 8 });
    const fourth = await orchestrator.getNextBatch(third.state, ['grace', 'freedom'], { batchSize: 8 });

    expect(third.results).toEqual([]);
    expect(third.exhausted).toBe(true);
    expect(third.levelUsed).toBe(5);
    expect(fourth.results).toEqual([]);
    expect(fourth.state.currentLevel).toBe(5);
    expect(fourth.state.levelOffsets).toEqual(third.state.levelOffsets);

    const texts = [...first.results, ...second.results].map(result => result.text);
    expect(new Set(texts).size).toBe(texts.length);
    expect(texts).toHaveLength(GRACE_CORPUS.length);
  });

  it('only moves the current level forward', async () => {
    const { orchestrator } = await buildOrchestrator(GRACE_CORPUS);
    let state = sessionState(['grace', 'freedom']);
    const levels: number[] = [];

    for (let call = 0; call < 4; call++) {
      const batch = await orchestrator.getNextBatch(state, state.extractedKeywords, {
        batchSize: 5,
        semanticQuota: 2,
      });
      levels.push(batch.state.currentLevel);
      state = batch.state;
    }

    levels.forEach((level, index) => {
      expect(level).toBeGreaterThanOrEqual(index === 0 ? 0 : levels[index - 1]);
    });
    expect(levels[levels.length - 1]).toBe(5);
  });

  it('stops after level 1 for a single keyword', async () => {
    const { orchestrator, synonymRequests } = await buildOrchestrator(
      ['Heaven is high.', 'Heaven was quiet.', 'Rain falls.', 'Paradise is near.'],
      { heaven: ['paradise'] }
    );
    const state = sessionState(['heaven']);

    const batch = await orchestrator.getNextBatch(state, ['heaven'], { batchSize: 5, semanticQuota: 0 });

    expect(batch.results.map(result => result.text)).toEqual(['Heaven is high.', 'Heaven was quiet.']);
    expect(batch.results.map(result => result.retrievalLevel)).toEqual([1, 1]);
    expect(batch.state.currentLevel).toBe(5);
    expect(batch.exhausted).toBe(true);
    expect(synonymRequests).toEqual([]);
  });

  it('falls through to the synonym pairs and the semantic level for a single keyword', async () => {
    const { orchestrator, synonymRequests } = await buildOrchestrator(
      ['Heaven is high.', 'Heaven was quiet.', 'Rain falls.', 'Paradise is near.'],
      { heaven: ['paradise', 'heaven'] },
      'fall-through'
    );

    const batch = await orchestrator.getNextBatch(sessionState(['heaven']), ['heaven'], {
      batchSize: 5,
      semanticQuota: 0,
    });

    expect(batch.results.map(result => [result.text, result.retrievalLevel])).toEqual([
      ['Heaven is high.', 1],
      ['Heaven was quiet.', 1],
      ['Paradise is near.', 3],
      ['Rain falls.', 4],
    ]);
    expect(batch.state.synonyms).toEqual(['paradise']);
    expect(synonymRequests).toEqual(['heaven']);
    expect(batch.levelUsed).toBe(4);
    expect(batch.exhausted).toBe(true);
  });

  it('skips levels that are not enabled', async () => {
    const { orchestrator } = await buildOrchestrator(GRACE_CORPUS);
    const state = sessionState(['grace', 'freedom'], [1]);

    const batch = await orchestrator.getNextBatch(state, state.extractedKeywords, { batchSize: 10 });

    expect(batch.results.map(result => result.text)).toEqual(['Freedom is the fruit of grace.']);
    expect(batch.results[0].retrievalLevel).toBe(1);
    expect(batch.state.currentLevel).toBe(5);
    expect(batch.exhausted).toBe(true);
  });

  it('reports exhaustion when the whole batch goes to the semantic quota', async () => {
    const { orchestrator } = await buildOrchestrator(['Grace abounds.', 'Freedom rings.', 'Rain falls.']);
    const state = sessionState(['grace', 'freedom']);

    const batch = await orchestrator.getNextBatch(state, state.extractedKeywords, { batchSize: 5 });

    expect(batch.results).toHaveLength(3);
    expect(batch.results.every(result => result.isPrimarySource)).toBe(true);
    expect(batch.state.currentLevel).toBe(0);
    expect(batch.exhausted).toBe(true);
  });

  it('keeps paging the cascade when the semantic pass fails', async () => {
    const { orchestrator, llmService } = await buildOrchestrator([
      'Grace is light.',
      'Grace is patient with the weary.',
      'Grace is older than the hills.',
      'Grace is a gift.',
      'Grace is found in small things.',
      'Grace is enough today.',
    ]);
    llmService.embed = () => {
      throw new Error('embedding service down');
    };

    const batch = await orchestrator.getNextBatch(sessionState(['grace']), ['grace'], {
      batchSize: 5,
      semanticQuota: 2,
    });

    expect(batch.results).toHaveLength(3);
    expect(batch.results.every(result => result.retrievalLevel === 1)).toBe(true);
    expect(batch.state.currentLevel).toBe(1);
    expect(batch.exhausted).toBe(false);
  });
});
