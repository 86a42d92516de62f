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
 * Error taxonomy surfaced to HTTP callers
 *
 * @packageDocumentation
 */

/**
 * Base class for errors that carry an HTTP status
 */
export class SentenceQaError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class InputError extends SentenceQaError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NoDocumentsError extends SentenceQaError {
  constructor() {
    super('No documents found. Please upload a file first using POST /upload', 404);
  }
}

export class NoMatchesError extends SentenceQaError {
  constructor() {
    super('No source sentences found matching your query. Try rephrasing your question.', 404);
  }
}

export class SessionNotFoundError extends SentenceQaError {
  constructor(sessionId: string) {
    super(
      `Session ${sessionId} not found or expired. Please ask a new question with POST /ask`,
      404
    );
  }
}

/**
 * Failure of a language model call. `retryable` marks timeouts,
 * rate limits, server errors and dropped connections.
 */
export class LLMServiceError extends SentenceQaError {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean) {
    super(message, 502);
    this.retryable = retryable;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
