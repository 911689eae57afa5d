import { randomBytes } from "node:crypto";
import type { CollectionHolder } from "./collection-session.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface SessionRecord extends CollectionHolder {
  id: string;
  createdAt: number;
  lastSeenAt: number;
}

const SESSION_IDLE_MS = 24 * 60 * 60 * 1000; // 24 hours
const SESSION_ID_PATTERN = /^[a-f0-9]{48}$/;

// ─── Session store ───────────────────────────────────────────────────────────

/**
 * In-memory browser sessions keyed by an opaque cookie value.
 * Sessions idle for longer than the expiry are dropped on access.
 */
export class SessionStore {
  private sessions = new Map<string, SessionRecord>();
  private idleMs: number;
  private now: () => number;

  constructor(options: { idleMs?: number; now?: () => number } = {}) {
    this.idleMs = options.idleMs ?? SESSION_IDLE_MS;
    this.now = options.now ?? Date.now;
  }

  /** Session for the given id, or null when it is unknown or expired */
  get(id: string | null | undefined): SessionRecord | null {
    if (!id || !SESSION_ID_PATTERN.test(id)) return null;
    const session = this.sessions.get(id);
    if (!session) return null;
    const now = this.now();
    if (now - session.lastSeenAt > this.idleMs) {
      this.sessions.delete(id);
      return null;
    }
    session.lastSeenAt = now;
    return session;
  }

  create(): SessionRecord {
    const now = this.now();
    const session: SessionRecord = {
      id: randomBytes(24).toString("hex"),
      createdAt: now,
      lastSeenAt: now,
    };
    this.sessions.set(session.id, session);
    return session;
  }

  /** Drop expired sessions; returns how many were removed */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (now - session.lastSeenAt > this.idleMs) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
