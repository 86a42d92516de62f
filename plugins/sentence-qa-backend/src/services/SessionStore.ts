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
 * In-memory retrieval session registry
 *
 * @packageDocumentation
 */

import { v4 as uuidv4 } from 'uuid';
import { ISessionStore } from '../interfaces';
import { RetrievalLevel, RetrievalSessionState } from '../models';

export type Clock = () => number;

/**
 * Sessions kept in process memory, evicted after an idle timeout.
 * Expired sessions disappear on access and on `create`/`count` sweeps.
 */
export class InMemorySessionStore implements ISessionStore {
  private readonly sessions = new Map<string, RetrievalSessionState>();
  private readonly timeoutMs: number;
  private readonly clock: Clock;

  constructor(timeoutMinutes = 30, clock: Clock = Date.now) {
    this.timeoutMs = timeoutMinutes * 60 * 1000;
    this.clock = clock;
  }

  create(query: string, keywords: string[], enabledLevels: RetrievalLevel[]): RetrievalSessionState {
    this.sweepExpired();

    const now = this.clock();
    const state: RetrievalSessionState = {
      sessionId: uuidv4(),
      originalQuery: query,
      extractedKeywords: [...keywords],
      currentLevel: 0,
      levelOffsets: {},
      usedSentenceTexts: new Set(),
      enabledLevels: [...enabledLevels],
      continueCount: 0,
      usedQuestionVariants: [],
      createdAt: now,
      lastAccessedAt: now,
    };
    this.sessions.set(state.sessionId, state);
    return state;
  }

  get(sessionId: string): RetrievalSessionState | undefined {
    const state = this.sessions.get(sessionId);
    if (!state) {
      return undefined;
    }

    const now = this.clock();
    if (this.isExpired(state, now)) {
      this.sessions.delete(sessionId);
      return undefined;
    }

    state.lastAccessedAt = now;
    return state;
  }

  /**
   * Replace the stored state. Texts already used stay used, whatever the
   * new state carries.
   */
  update(sessionId: string, newUsedTexts: Iterable<string>, newState: RetrievalSessionState): void {
    const previous = this.sessions.get(sessionId);
    if (!previous) {
      return;
    }

    const used = new Set(previous.usedSentenceTexts);
    for (const text of newState.usedSentenceTexts) {
      used.add(text);
    }
    for (const text of newUsedTexts) {
      used.add(text);
    }

    this.sessions.set(sessionId, {
      ...newState,
      sessionId,
      originalQuery: previous.originalQuery,
      extractedKeywords: previous.extractedKeywords,
      currentLevel: Math.max(previous.currentLevel, newState.currentLevel),
      usedSentenceTexts: used,
      createdAt: previous.createdAt,
      lastAccessedAt: this.clock(),
    });
  }

  delete(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  sweepExpired(): number {
    const now = this.clock();
    let removed = 0;
    for (const [sessionId, state] of this.sessions) {
      if (this.isExpired(state, now)) {
        this.sessions.delete(sessionId);
        removed++;
      }
    }
    return removed;
  }

  clearAll(): void {
    this.sessions.clear();
  }

  count(): number {
    this.sweepExpired();
    return this.sessions.size;
  }

  private isExpired(state: RetrievalSessionState, now: number): boolean {
    return now - state.lastAccessedAt > this.timeoutMs;
  }
}

/**
 * Serializes work per session id. A second request on the same session
 * waits for the first to settle; other sessions run freely.
 */
export class SessionLocks {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(sessionId, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(sessionId) === tail) {
        this.tails.delete(sessionId);
      }
    }
  }

  /**
   * Sessions with work queued or running
   */
  get size(): number {
    return this.tails.size;
  }
}
