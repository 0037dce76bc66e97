/**
 * Conversation-scoped memory with idle expiry
 *
 * Explicit map from session key to per-conversation state (registration
 * progress, checkout drafts). Entries untouched for longer than the idle
 * timeout are treated as absent and removed by a periodic sweep.
 */

import pino from 'pino';
import { logger } from '../observability/logger';

interface Entry<T> {
  value: T;
  touchedAt: number;
}

export type ExpiryListener<T> = (sessionKey: string, value: T) => void;

export class SessionMemory<T> {
  private entries = new Map<string, Entry<T>>();
  private sweepInterval: NodeJS.Timeout | null = null;
  private readonly log: pino.Logger;

  constructor(
    name: string,
    private readonly idleTimeoutMs: number,
    private readonly now: () => number = Date.now,
    private readonly onExpire?: ExpiryListener<T>,
  ) {
    this.log = logger.child({ component: 'session-memory', memory: name });
  }

  /** Current value; reading counts as activity */
  get(sessionKey: string): T | undefined {
    const entry = this.entries.get(sessionKey);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.expire(sessionKey, entry);
      return undefined;
    }
    entry.touchedAt = this.now();
    return entry.value;
  }

  set(sessionKey: string, value: T): void {
    this.entries.set(sessionKey, { value, touchedAt: this.now() });
  }

  delete(sessionKey: string): boolean {
    return this.entries.delete(sessionKey);
  }

  /** Remove every idle entry; returns how many were dropped */
  sweep(): number {
    let expired = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.expire(key, entry);
        expired++;
      }
    }
    if (expired > 0) {
      this.log.info({ expired, remaining: this.entries.size }, 'Idle sessions swept');
    }
    return expired;
  }

  startSweeper(intervalMs: number): void {
    if (this.sweepInterval) return;
    this.sweepInterval = setInterval(() => this.sweep(), intervalMs);
    // Don't keep process alive just for sweeper
    this.sweepInterval.unref();
  }

  stopSweeper(): void {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: Entry<T>): boolean {
    return this.now() - entry.touchedAt > this.idleTimeoutMs;
  }

  private expire(sessionKey: string, entry: Entry<T>): void {
    this.entries.delete(sessionKey);
    this.onExpire?.(sessionKey, entry.value);
  }
}
