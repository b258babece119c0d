import { z } from 'zod';
import { SessionContext, SessionKey, SessionState } from '../types';

/**
 * Key-value store for per-conversation context. Entries past their expiry
 * are reported as absent even if the backing store still holds them.
 */
export interface SessionStore {
  get(key: SessionKey): Promise<SessionContext | undefined>;
  /** Writes the state and renews the expiry to now + ttlSeconds. */
  put(key: SessionKey, state: SessionState, ttlSeconds: number): Promise<SessionContext>;
  delete(key: SessionKey): Promise<void>;
}

export const MAX_INTERACTIONS = 50;

export const SessionStateSchema = z.object({
  interactions: z.array(z.object({
    tool_result_id: z.string(),
    tool_name: z.string(),
    input: z.record(z.unknown()),
    output_summary: z.record(z.unknown()),
    at: z.string()
  })).default([]),
  list_emails_cursor: z.object({
    query: z.string().nullable(),
    page_token: z.string().nullable(),
    next_page_token: z.string().nullable()
  }).optional()
});

export function emptySessionState(): SessionState {
  return { interactions: [] };
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export class InMemorySessionStore implements SessionStore {
  private entries = new Map<string, SessionContext>();

  constructor(private now: () => Date = () => new Date()) {}

  async get(key: SessionKey): Promise<SessionContext | undefined> {
    const id = this.keyOf(key);
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    if (entry.expires_at <= toEpochSeconds(this.now())) {
      this.entries.delete(id);
      return undefined;
    }
    return structuredClone(entry);
  }

  /** Number of stored entries, expired ones included until the next sweep. */
  get size(): number {
    return this.entries.size;
  }

  async put(key: SessionKey, state: SessionState, ttlSeconds: number): Promise<SessionContext> {
    const now = this.now();
    this.sweep(toEpochSeconds(now));
    const context: SessionContext = {
      owner_id: key.ownerId,
      session_id: key.sessionId,
      state: structuredClone(state),
      updated_at: now.toISOString(),
      expires_at: toEpochSeconds(now) + ttlSeconds
    };
    this.entries.set(this.keyOf(key), context);
    return structuredClone(context);
  }

  async delete(key: SessionKey): Promise<void> {
    this.entries.delete(this.keyOf(key));
  }

  private sweep(nowSeconds: number): void {
    for (const [id, entry] of this.entries) {
      if (entry.expires_at <= nowSeconds) this.entries.delete(id);
    }
  }

  private keyOf(key: SessionKey): string {
    return JSON.stringify([key.ownerId, key.sessionId]);
  }
}
