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
 * Factory for creating sentence store implementations
 * Implements Factory Pattern for search backend selection
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { ISentenceStore } from '../interfaces';
import { SentenceStoreConfig } from '../models';
import { InMemorySentenceStore } from './InMemorySentenceStore';
import { PgSentenceStore } from './PgSentenceStore';

/**
 * Factory class for creating sentence store instances
 *
 * Usage:
 * ```typescript
 * const store = await SentenceStoreFactory.create(configService.getConfig().sentenceStore, logger);
 * ```
 */
export class SentenceStoreFactory {
  /**
   * Create a sentence store from configuration, falling back to memory
   * when PostgreSQL cannot be initialized
   */
  static async create(config: SentenceStoreConfig, logger: Logger): Promise<ISentenceStore> {
    logger.info(`Creating sentence store: ${config.type}`);

    if (config.type === 'postgresql' && config.postgresql) {
      const store = new PgSentenceStore(logger, config.postgresql);
      try {
        await store.initialize();
        logger.info('PostgreSQL sentence store initialized successfully');
        return store;
      } catch (error) {
        logger.error(`Failed to initialize PostgreSQL sentence store: ${error}`);
        logger.warn('Falling back to in-memory sentence store');
        await store.close().catch(closeError => {
          logger.warn(`Failed to close PostgreSQL pool: ${closeError}`);
        });
        return new InMemorySentenceStore(logger);
      }
    }

    logger.info('Using in-memory sentence store');
    return new InMemorySentenceStore(logger);
  }
}
