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
 * Unit tests for PgSentenceStore
 * Tests query building and store operations with a mocked PostgreSQL client
 */

import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { Pool } from 'pg';
import { createTestLogger } from '../testUtils';
import { PgSentenceStore, buildKnnQuery, buildPhraseQuery, buildTermQuery, toSloppyPhraseRegex, toTsQuery } from './PgSentenceStore';

interface MockResult {
  rows: Array<Record<string, unknown>>;
  rowCount?: number;
}

const mockQuery = jest.fn<(text: string, values?: unknown[]) => Promise<MockResult>>();

const mockClient = {
  query: mockQuery,
  release: jest.fn(),
};

const mockPool = {
  connect: jest.fn(async () => mockClient),
  end: jest.fn(async () => undefined),
  on: jest.fn(),
};

// Mock pg Pool
jest.mock('pg', () => ({
  Pool: jest.fn(() => mockPool),
}));

const COLUMNS = 'id, text, level, sentence_index, source_file_id';

async function schemaReady(text: string): Promise<MockResult> {
  if (text.includes("extname = 'vector'")) {
    return { rows: [{ installed: true }] };
  }
  if (text.includes('information_schema.tables')) {
    return { rows: [{ exists: true }] };
  }
  return { rows: [] };
}

describe('query builders', () => {
  it('joins terms into a tsquery with adjacent multi-word terms', () => {
    expect(toTsQuery(['grace', 'Holy Spirit'], 'and')).toBe('grace & (holy <-> spirit)');
    expect(toTsQuery(['grace', 'Holy Spirit'], 'or')).toBe('grace | (holy <-> spirit)');
    expect(toTsQuery(['!!'], 'and')).toBe('');
  });

  it('bounds every gap of a sloppy phrase', () => {
    expect(toSloppyPhraseRegex(['heaven', 'is'], 2)).toBe(String.raw`\mheaven\M(?:\W+\w+){0,2}\W+\mis\M`);
  });

  it('builds an exact phrase query with exclusions', () => {
    expect(buildPhraseQuery({ phrase: 'Heaven is', slop: 0, limit: 5, exclude: new Set(['Heaven is high.']) })).toEqual({
      text: `SELECT ${COLUMNS}, ts_rank(text_tsv, to_tsquery('simple', $1)) AS score FROM sentences WHERE text_tsv @@ to_tsquery('simple', $1) AND NOT (text = ANY($2::text[])) ORDER BY score DESC, sentence_index ASC LIMIT $3`,
      values: ['heaven <-> is', ['Heaven is high.'], 5],
    });
  });

  it('builds a regex query for a sloppy phrase', () => {
    expect(buildPhraseQuery({ phrase: 'heaven is', slop: 1, limit: 5 })).toEqual({
      text: `SELECT ${COLUMNS}, 1 AS score FROM sentences WHERE text ~* $1 ORDER BY score DESC, sentence_index ASC LIMIT $2`,
      values: [String.raw`\mheaven\M(?:\W+\w+){0,1}\W+\mis\M`, 5],
    });
  });

  it('has no query for a phrase without words', () => {
    expect(buildPhraseQuery({ phrase: '...', slop: 0, limit: 5 })).toBeUndefined();
    expect(buildTermQuery({ terms: ['?'], operator: 'and', limit: 5 })).toBeUndefined();
  });

  it('orders term matches by vector distance when a query vector is given', () => {
    expect(buildTermQuery({ terms: ['grace', 'freedom'], operator: 'and', limit: 10, queryVector: [1, 0] })).toEqual({
      text: `SELECT ${COLUMNS}, 2 - (embedding <=> $2::vector) AS score FROM sentences WHERE text_tsv @@ to_tsquery('simple', $1) ORDER BY embedding <=> $2::vector ASC, sentence_index ASC LIMIT $3`,
      values: ['grace & freedom', '[1,0]', 10],
    });
  });

  it('builds a nearest neighbour query', () => {
    expect(buildKnnQuery({ vector: [0.5, 0.25], k: 3, exclude: new Set(['x']) })).toEqual({
      text: `SELECT ${COLUMNS}, 1 - (embedding <=> $1::vector) AS score FROM sentences WHERE TRUE AND NOT (text = ANY($2::text[])) ORDER BY embedding <=> $1::vector ASC, sentence_index ASC LIMIT $3`,
      values: ['[0.5,0.25]', ['x'], 3],
    });
  });
});

describe('PgSentenceStore', () => {
  const logger = createTestLogger();
  const config = {
    host: 'localhost',
    port: 5432,
    database: 'test_db',
    user: 'test_user',
    password: 'test-password',
    ssl: false,
    maxConnections: 10,
  };

  beforeEach(() => {
    jest.clearAllMocks();
    mockQuery.mockReset();
    mockQuery.mockImplementation(schemaReady);
  });

  async function initializedStore(): Promise<PgSentenceStore> {
    const store = new PgSentenceStore(logger, config);
    await store.initialize();
    mockQuery.mockClear();
    return store;
  }

  describe('initialize', () => {
    it('creates the pool from the configuration', () => {
      new PgSentenceStore(logger, config);

      expect(Pool).toHaveBeenCalledWith({
        host: 'localhost',
        port: 5432,
        database: 'test_db',
        user: 'test_user',
        password: 'test-password',
        ssl: false,
        max: 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
      });
      expect(mockPool.on).toHaveBeenCalledWith('error', expect.any(Function));
    });

    it('checks the connection, the extension and the table', async () => {
      await new PgSentenceStore(logger, config).initialize();

      expect(mockQuery).toHaveBeenCalledTimes(3);
      expect(mockQuery.mock.calls[0][0]).toBe('SELECT 1');
      expect(mockClient.release).toHaveBeenCalledTimes(1);
    });

    it('fails without the pgvector extension', async () => {
      mockQuery.mockImplementation(async text =>
        text.includes("extname = 'vector'") ? { rows: [{ installed: false }] } : schemaReady(text)
      );

      await expect(new PgSentenceStore(logger, config).initialize()).rejects.toThrow(
        'PgSentenceStore initialization failed: pgvector extension is not installed. Please run: CREATE EXTENSION vector;'
      );
    });

    it('fails without the sentences table', async () => {
      mockQuery.mockImplementation(async text =>
        text.includes('information_schema.tables') ? { rows: [{ exists: false }] } : schemaReady(text)
      );

      await expect(new PgSentenceStore(logger, config).initialize()).rejects.toThrow(
        'PgSentenceStore initialization failed: Sentences table not found. Run migrations first.'
      );
    });

    it('only initializes once', async () => {
      const store = await initializedStore();

      await store.initialize();

      expect(mockQuery).not.toHaveBeenCalled();
    });

    it('refuses to work before initialization', async () => {
      const store = new PgSentenceStore(logger, config);

      await expect(store.count()).rejects.toThrow('PgSentenceStore not initialized. Call initialize() first.');
    });
  });

  describe('storeBatch', () => {
    const records = [
      { id: 'id-1', text: 'Grace abounds.', embedding: [0.1, 0.2], level: 0, sentenceIndex: 0, sourceFileId: 'file-1' },
      { id: 'id-2', text: 'Freedom rings.', embedding: [0.3, 0.4], level: 0, sentenceIndex: 1 },
    ];

    it('inserts every record in one transaction', async () => {
      const store = await initializedStore();

      await store.storeBatch(records);

      const statements = mockQuery.mock.calls.map(([text]) => text.trim().split(/\s+/)[0]);
      expect(statements).toEqual(['BEGIN', 'INSERT', 'INSERT', 'COMMIT']);
      expect(mockQuery.mock.calls[1][1]).toEqual(['id-1', 'Grace abounds.', '[0.1,0.2]', 0, 0, 'file-1']);
      expect(mockQuery.mock.calls[2][1]).toEqual(['id-2', 'Freedom rings.', '[0.3,0.4]', 0, 1, null]);
    });

    it('rolls back when an insert fails', async () => {
      const store = await initializedStore();
      mockQuery.mockImplementation(async text => {
        if (text.includes('INSERT')) {
          throw new Error('duplicate key');
        }
        return { rows: [] };
      });

      await expect(store.storeBatch(records)).rejects.toThrow('duplicate key');
      expect(mockQuery.mock.calls.map(([text]) => text.trim().split(/\s+/)[0])).toEqual(['BEGIN', 'INSERT', 'ROLLBACK']);
      expect(mockClient.release).toHaveBeenCalled();
    });

    it('does nothing for an empty batch', async () => {
      const store = await initializedStore();

      await store.storeBatch([]);

      expect(mockQuery).not.toHaveBeenCalled();
    });
  });

  describe('searches', () => {
    it('maps rows to hits', async () => {
      const store = await initializedStore();
      mockQuery.mockResolvedValueOnce({
        rows: [
          { id: 's-3', text: 'Heaven is good.', level: 0, sentence_index: 3, source_file_id: null, score: '0.5' },
          { id: 's-9', text: 'Is heaven near?', level: 1, sentence_index: 9, source_file_id: 'file-1', score: 0.25 },
        ],
      });

      const hits = await store.phraseSearch({ phrase: 'heaven is', slop: 0, limit: 5 });

      expect(hits).toEqual([
        { sentence: { id: 's-3', text: 'Heaven is good.', level: 0, sentenceIndex: 3 }, score: 0.5 },
        {
          sentence: { id: 's-9', text: 'Is heaven near?', level: 1, sentenceIndex: 9, sourceFileId: 'file-1' },
          score: 0.25,
        },
      ]);
    });

    it('drops sloppy phrase matches whose gaps add up past the slop', async () => {
      const store = await initializedStore();
      mockQuery.mockResolvedValueOnce({
        rows: [
          { id: 'a', text: 'Heaven truly is good.', level: 0, sentence_index: 0, source_file_id: null, score: 1 },
          { id: 'b', text: 'Heaven truly is very good.', level: 0, sentence_index: 1, source_file_id: null, score: 1 },
        ],
      });

      const hits = await store.phraseSearch({ phrase: 'heaven is good', slop: 1, limit: 5 });

      expect(hits.map(hit => hit.sentence.id)).toEqual(['a']);
    });

    it('sends the built query for term and vector searches', async () => {
      const store = await initializedStore();

      await store.termSearch({ terms: ['grace'], operator: 'or', limit: 3 });
      await store.knnSearch({ vector: [1, 0], k: 2 });

      expect(mockQuery.mock.calls[0][1]).toEqual(['grace', 3]);
      expect(mockQuery.mock.calls[1][1]).toEqual(['[1,0]', 2]);
    });

    it('skips the database for a query without words', async () => {
      const store = await initializedStore();

      await expect(store.termSearch({ terms: [''], operator: 'and', limit: 3 })).resolves.toEqual([]);
      expect(mockQuery).not.toHaveBeenCalled();
    });
  });

  describe('maintenance', () => {
    it('counts sentences', async () => {
      const store = await initializedStore();
      mockQuery.mockResolvedValueOnce({ rows: [{ count: '42' }] });

      await expect(store.count()).resolves.toBe(42);
    });

    it('reports level 0 for an empty table', async () => {
      const store = await initializedStore();
      mockQuery.mockResolvedValueOnce({ rows: [{ max_level: null }] });

      await expect(store.maxLevel()).resolves.toBe(0);
    });

    it('deletes every sentence', async () => {
      const store = await initializedStore();
      mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 7 });

      await store.clear();

      expect(mockQuery).toHaveBeenCalledWith('DELETE FROM sentences');
    });

    it('closes the pool', async () => {
      const store = await initializedStore();

      await store.close();

      expect(mockPool.end).toHaveBeenCalledTimes(1);
    });
  });
});
