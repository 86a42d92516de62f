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
 * PostgreSQL sentence store implementation with pgvector
 * Provides persistent full-text and similarity search
 *
 * @packageDocumentation
 */

import { Pool, PoolClient } from 'pg';
import type { Logger } from 'winston';
import { ISentenceStore, KnnQuery, PhraseQuery, TermQuery } from '../interfaces';
import { PostgresConfig, SentenceHit, SentenceRecord } from '../models';
import { minimalOrderedGap, tokenize } from '../rag/textMatching';

interface SentenceRow {
  id: string;
  text: string;
  level: number;
  sentence_index: number;
  source_file_id: string | null;
  score: number | string;
}

export interface SqlQuery {
  text: string;
  values: unknown[];
}

const SELECT_COLUMNS = 'id, text, level, sentence_index, source_file_id';

/**
 * tsquery for a list of terms; words of a multi-word term must be adjacent
 */
export function toTsQuery(terms: readonly string[], operator: 'and' | 'or'): string {
  return terms
    .map(term => tokenize(term))
    .filter(words => words.length > 0)
    .map(words => (words.length === 1 ? words[0] : `(${words.join(' <-> ')})`))
    .join(operator === 'and' ? ' & ' : ' | ');
}

/**
 * Case-insensitive regex for the phrase words in order with at most `slop`
 * words in each gap
 */
export function toSloppyPhraseRegex(words: readonly string[], slop: number): string {
  return `\\m${words.join(`\\M(?:\\W+\\w+){0,${slop}}\\W+\\m`)}\\M`;
}

function exclusionClause(values: unknown[], exclude?: ReadonlySet<string>): string {
  if (!exclude || exclude.size === 0) {
    return '';
  }
  values.push([...exclude]);
  return ` AND NOT (text = ANY($${values.length}::text[]))`;
}

function vectorToSql(vector: readonly number[]): string {
  return `[${vector.join(',')}]`;
}

export function buildPhraseQuery(query: PhraseQuery): SqlQuery | undefined {
  const words = tokenize(query.phrase);
  if (words.length === 0) {
    return undefined;
  }

  const values: unknown[] = [];
  let where: string;
  let score: string;
  if (query.slop === 0) {
    values.push(words.join(' <-> '));
    where = `text_tsv @@ to_tsquery('simple', $1)`;
    score = `ts_rank(text_tsv, to_tsquery('simple', $1))`;
  } else {
    values.push(toSloppyPhraseRegex(words, query.slop));
    where = 'text ~* $1';
    score = '1';
  }
  where += exclusionClause(values, query.exclude);
  values.push(query.limit);

  return {
    text: `SELECT ${SELECT_COLUMNS}, ${score} AS score FROM sentences WHERE ${where} ORDER BY score DESC, sentence_index ASC LIMIT $${values.length}`,
    values,
  };
}

export function buildTermQuery(query: TermQuery): SqlQuery | undefined {
  const tsQuery = toTsQuery(query.terms, query.operator);
  if (!tsQuery) {
    return undefined;
  }

  const values: unknown[] = [tsQuery];
  let score = `ts_rank(text_tsv, to_tsquery('simple', $1))`;
  let order = 'score DESC, sentence_index ASC';
  if (query.queryVector) {
    values.push(vectorToSql(query.queryVector));
    score = `2 - (embedding <=> $2::vector)`;
    order = `embedding <=> $2::vector ASC, sentence_index ASC`;
  }
  const where = `text_tsv @@ to_tsquery('simple', $1)${exclusionClause(values, query.exclude)}`;
  values.push(query.limit);

  return {
    text: `SELECT ${SELECT_COLUMNS}, ${score} AS score FROM sentences WHERE ${where} ORDER BY ${order} LIMIT $${values.length}`,
    values,
  };
}

export function buildKnnQuery(query: KnnQuery): SqlQuery {
  const values: unknown[] = [vectorToSql(query.vector)];
  const where = `TRUE${exclusionClause(values, query.exclude)}`;
  values.push(query.k);

  return {
    text: `SELECT ${SELECT_COLUMNS}, 1 - (embedding <=> $1::vector) AS score FROM sentences WHERE ${where} ORDER BY embedding <=> $1::vector ASC, sentence_index ASC LIMIT $${values.length}`,
    values,
  };
}

function toHit(row: SentenceRow): SentenceHit {
  return {
    sentence: {
      id: row.id,
      text: row.text,
      level: row.level,
      sentenceIndex: row.sentence_index,
      ...(row.source_file_id ? { sourceFileId: row.source_file_id } : {}),
    },
    score: Number(row.score),
  };
}

/**
 * PostgreSQL sentence store using a 'simple' tsvector for text queries
 * and the pgvector extension for cosine similarity
 *
 * Features:
 * - Exact phrase queries through tsquery `<->`
 * - Sloppy phrases through word-boundary regexes
 * - Transaction support for batch inserts
 * - Connection pooling
 */
export class PgSentenceStore implements ISentenceStore {
  private readonly logger: Logger;
  private readonly pool: Pool;
  private initialized: boolean = false;

  constructor(logger: Logger, config: PostgresConfig) {
    this.logger = logger;

    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: config.maxConnections || 10,
      idleTimeoutMillis: config.idleTimeoutMillis || 30000,
      connectionTimeoutMillis: config.connectionTimeoutMillis || 5000,
    });

    this.pool.on('error', (err) => {
      this.logger.error(`[PgSentenceStore] Unexpected PostgreSQL pool error: ${err.message}`);
    });
  }

  /**
   * Verify the connection, the pgvector extension and the schema
   * Should be called after construction
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      this.logger.debug('[PgSentenceStore] Already initialized');
      return;
    }

    try {
      this.logger.info('[PgSentenceStore] Initializing...');
      await this.withClient(async client => {
        await client.query('SELECT 1');

        const extension = await client.query<{ installed: boolean }>(
          "SELECT EXISTS(SELECT 1 FROM pg_extension WHERE extname = 'vector') AS installed"
        );
        if (!extension.rows[0]?.installed) {
          throw new Error('pgvector extension is not installed. Please run: CREATE EXTENSION vector;');
        }

        const table = await client.query<{ exists: boolean }>(
          "SELECT EXISTS(SELECT 1 FROM information_schema.tables WHERE table_name = 'sentences') AS exists"
        );
        if (!table.rows[0]?.exists) {
          throw new Error('Sentences table not found. Run migrations first.');
        }
      });

      this.initialized = true;
      this.logger.info('[PgSentenceStore] Initialized successfully');
    } catch (error) {
      this.logger.error(`[PgSentenceStore] Initialization failed: ${error}`);
      throw new Error(`PgSentenceStore initialization failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Store sentences in one transaction
   */
  async storeBatch(records: SentenceRecord[]): Promise<void> {
    this.ensureInitialized();

    if (records.length === 0) {
      return;
    }

    await this.withClient(async client => {
      try {
        await client.query('BEGIN');

        const query = `
          INSERT INTO sentences (id, text, embedding, level, sentence_index, source_file_id)
          VALUES ($1, $2, $3::vector, $4, $5, $6)
          ON CONFLICT (id)
          DO UPDATE SET
            text = EXCLUDED.text,
            embedding = EXCLUDED.embedding,
            level = EXCLUDED.level,
            sentence_index = EXCLUDED.sentence_index,
            source_file_id = EXCLUDED.source_file_id
        `;

        for (const record of records) {
          await client.query(query, [
            record.id,
            record.text,
            vectorToSql(record.embedding),
            record.level,
            record.sentenceIndex,
            record.sourceFileId ?? null,
          ]);
        }

        await client.query('COMMIT');
        this.logger.info(`[PgSentenceStore] Stored batch of ${records.length} sentences`);
      } catch (error) {
        await client.query('ROLLBACK');
        this.logger.error(`[PgSentenceStore] Failed to store sentence batch: ${error}`);
        throw error;
      }
    });
  }

  async phraseSearch(query: PhraseQuery): Promise<SentenceHit[]> {
    const sql = buildPhraseQuery(query);
    if (!sql) {
      return [];
    }

    const hits = await this.search(sql);
    if (query.slop === 0) {
      return hits;
    }
    // the regex bounds each gap; the slop is a bound on all gaps together
    const words = tokenize(query.phrase);
    return hits.filter(hit => {
      const gaps = minimalOrderedGap(tokenize(hit.sentence.text), words);
      return gaps !== undefined && gaps <= query.slop;
    });
  }

  async termSearch(query: TermQuery): Promise<SentenceHit[]> {
    const sql = buildTermQuery(query);
    return sql ? this.search(sql) : [];
  }

  async knnSearch(query: KnnQuery): Promise<SentenceHit[]> {
    return this.search(buildKnnQuery(query));
  }

  async clear(): Promise<void> {
    this.ensureInitialized();
    await this.withClient(async client => {
      const result = await client.query('DELETE FROM sentences');
      this.logger.info(`[PgSentenceStore] Cleared ${result.rowCount ?? 0} sentences`);
    });
  }

  async count(): Promise<number> {
    this.ensureInitialized();
    return this.withClient(async client => {
      const result = await client.query<{ count: string }>('SELECT COUNT(*) AS count FROM sentences');
      return parseInt(result.rows[0]?.count ?? '0', 10);
    });
  }

  async maxLevel(): Promise<number> {
    this.ensureInitialized();
    return this.withClient(async client => {
      const result = await client.query<{ max_level: number | null }>(
        'SELECT MAX(level) AS max_level FROM sentences'
      );
      return result.rows[0]?.max_level ?? 0;
    });
  }

  /**
   * Close the connection pool
   * Should be called on application shutdown
   */
  async close(): Promise<void> {
    await this.pool.end();
    this.logger.info('[PgSentenceStore] Connection pool closed');
  }

  private async search(sql: SqlQuery): Promise<SentenceHit[]> {
    this.ensureInitialized();
    return this.withClient(async client => {
      const result = await client.query<SentenceRow>(sql.text, sql.values);
      return result.rows.map(toHit);
    });
  }

  private async withClient<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await work(client);
    } finally {
      client.release();
    }
  }

  /**
   * Ensure the store is initialized
   */
  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('PgSentenceStore not initialized. Call initialize() first.');
    }
  }
}
