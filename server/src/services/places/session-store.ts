/**
 * Search session storage
 * One session per user; a new search replaces the previous one wholesale.
 */

import type { Coordinates, PlaceRecord } from './types.js';

export interface SessionLocale {
  /** English street of the search origin */
  street: string;
  /** English city of the search origin */
  city: string;
}

export interface SearchSession {
  userId: string;
  places: PlaceRecord[];
  currentIndex: number;
  origin: Coordinates;
  locale: SessionLocale;
  createdAt: number;
}

export interface SessionStore {
  get(userId: string): SearchSession | undefined;
  /** Create or replace the user's session */
  create(session: SearchSession): void;
  replace(userId: string, update: Partial<Omit<SearchSession, 'userId'>>): SearchSession | undefined;
  evict(userId: string): boolean;
}

export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, SearchSession>();

  get(userId: string): SearchSession | undefined {
    return this.sessions.get(userId);
  }

  create(session: SearchSession): void {
    this.sessions.set(session.userId, session);
  }

  replace(userId: string, update: Partial<Omit<SearchSession, 'userId'>>): SearchSession | undefined {
    const existing = this.sessions.get(userId);
    if (!existing) {
      return undefined;
    }
    const next: SearchSession = { ...existing, ...update, userId };
    this.sessions.set(userId, next);
    return next;
  }

  evict(userId: string): boolean {
    return this.sessions.delete(userId);
  }

  size(): number {
    return this.sessions.size;
  }
}
