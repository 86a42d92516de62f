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

import type { Logger } from 'winston';
import { LLMServiceError, errorMessage } from '../errors';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  logger: Logger;
  /** Prefix for log lines, e.g. `OllamaLLMService.chat` */
  label: string;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export function isRetryable(error: unknown): boolean {
  return error instanceof LLMServiceError && error.retryable;
}

/**
 * Run `fn`, retrying retryable failures with exponential backoff
 * (`baseDelayMs * 2^attempt`, capped at `maxDelayMs`)
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const attempts = Math.max(1, options.maxAttempts);

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryable(error) || attempt >= attempts - 1) {
        throw error;
      }
      const delay = Math.min(options.baseDelayMs * Math.pow(2, attempt), options.maxDelayMs);
      options.logger.warn(
        `[${options.label}] Attempt ${attempt + 1}/${attempts} failed: ${errorMessage(error)}. Retrying in ${delay}ms...`
      );
      await sleep(delay);
    }
  }
}
