/**
 * Session Registry — in-memory StyleConfigStores keyed by session id.
 *
 * Sessions idle for `ttlMs` or longer are dropped on the next access to
 * the registry. When `maxSessions` is reached, creating a session evicts
 * the least recently used one.
 */

import { v4 as uuidv4 } from "uuid";
import type { StyleConfigStore } from "../style/store.js";

export interface SessionRegistryOptions {
  ttlMs: number;
  maxSessions: number;
  /** Clock in epoch milliseconds; Date.now when omitted. */
  now?: () => number;
}

interface SessionEntry {
  store: StyleConfigStore;
  lastAccess: number;
}

export class SessionRegistry {
  // Map iteration order doubles as recency order: touched entries are re-inserted.
  private entries = new Map<string, SessionEntry>();
  private readonly now: () => number;

  constructor(private readonly options: SessionRegistryOptions) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    this.sweep();
    return this.entries.size;
  }

  create(store: StyleConfigStore): string {
    this.sweep();
    while (this.entries.size >= this.options.maxSessions) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    const sessionId = uuidv4();
    this.entries.set(sessionId, { store, lastAccess: this.now() });
    return sessionId;
  }

  get(sessionId: string): StyleConfigStore | undefined {
    this.sweep();
    const entry = this.entries.get(sessionId);
    if (!entry) return undefined;

    this.entries.delete(sessionId);
    this.entries.set(sessionId, { store: entry.store, lastAccess: this.now() });
    return entry.store;
  }

  delete(sessionId: string): boolean {
    this.sweep();
    return this.entries.delete(sessionId);
  }

  /** Drop every session idle for the TTL or longer. */
  sweep(): void {
    const cutoff = this.now() - this.options.ttlMs;
    for (const [sessionId, entry] of this.entries) {
      if (entry.lastAccess > cutoff) break;
      this.entries.delete(sessionId);
    }
  }
}
