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
 * Ingestion service
 * Splits uploaded text, embeds the sentences and stores them with their document level
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { v4 as uuidv4 } from 'uuid';
import {
  IIngestionService,
  ILLMService,
  ISentenceStore,
  ITextSplitter,
  ServiceDependencies,
} from '../interfaces';
import { SentenceRecord, UploadResult } from '../models';
import { InputError } from '../errors';

export interface IngestionServiceDependencies extends ServiceDependencies {
  llmService: ILLMService;
  sentenceStore: ISentenceStore;
  textSplitter: ITextSplitter;
}

/**
 * Service that turns an uploaded text file into indexed sentences
 * Follows Single Responsibility Principle
 */
export class IngestionService implements IIngestionService {
  private readonly logger: Logger;
  private readonly llmService: ILLMService;
  private readonly sentenceStore: ISentenceStore;
  private readonly textSplitter: ITextSplitter;
  private readonly sentencesPerLevel: number;
  private readonly embeddingBatchSize: number;

  constructor(dependencies: IngestionServiceDependencies) {
    const ingestion = dependencies.config.getConfig().ingestion;
    this.logger = dependencies.logger;
    this.llmService = dependencies.llmService;
    this.sentenceStore = dependencies.sentenceStore;
    this.textSplitter = dependencies.textSplitter;
    this.sentencesPerLevel = Math.max(1, ingestion.sentencesPerLevel);
    this.embeddingBatchSize = Math.max(1, ingestion.embeddingBatchSize);
  }

  /**
   * Index one file. Sentence `i` gets document level `floor(i / sentencesPerLevel)`.
   */
  async indexText(text: string, filename: string): Promise<UploadResult> {
    const sentences = this.textSplitter.splitIntoSentences(text);
    if (sentences.length === 0) {
      throw new InputError('No valid sentences found in file. Make sure the file contains readable text.');
    }

    const fileId = uuidv4();
    this.logger.info(`[IngestionService] Indexing ${sentences.length} sentences from ${filename} (${fileId})`);

    let maxLevel = 0;
    for (let start = 0; start < sentences.length; start += this.embeddingBatchSize) {
      const batch = sentences.slice(start, start + this.embeddingBatchSize);
      const embeddings = await this.llmService.generateEmbeddings(batch);

      const records: SentenceRecord[] = batch.map((sentence, i) => {
        const sentenceIndex = start + i;
        const level = Math.floor(sentenceIndex / this.sentencesPerLevel);
        maxLevel = Math.max(maxLevel, level);
        return {
          id: uuidv4(),
          text: sentence,
          embedding: embeddings[i],
          level,
          sentenceIndex,
          sourceFileId: fileId,
        };
      });

      await this.sentenceStore.storeBatch(records);
      this.logger.debug(
        `[IngestionService] Stored ${Math.min(start + batch.length, sentences.length)}/${sentences.length} sentences`
      );
    }

    return {
      fileId,
      filename,
      totalSentences: sentences.length,
      maxLevel,
      message: `File processed successfully. ${sentences.length} sentences indexed across ${maxLevel + 1} levels.`,
    };
  }

  /**
   * Remove every stored sentence, returning how many there were
   */
  async deleteAll(): Promise<number> {
    const count = await this.sentenceStore.count();
    await this.sentenceStore.clear();
    this.logger.info(`[IngestionService] Deleted ${count} sentences`);
    return count;
  }
}
