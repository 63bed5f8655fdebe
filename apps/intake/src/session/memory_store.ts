import type { VerificationSessionV1 } from "@trial-intake/contracts";

import { nowMs } from "../util";
import type { ClaimResultV1, VerificationSessionStore } from "./types";

/**
 * Process-local store. Every operation completes synchronously before its promise
 * resolves, so no other request can interleave inside a claim.
 */
export class InMemorySessionStore implements VerificationSessionStore {
  private readonly sessions = new Map<string, VerificationSessionV1>();

  constructor(private readonly clock: () => number = nowMs) {}

  async create(session: VerificationSessionV1): Promise<string> {
    if (this.sessions.has(session.session_id)) {
      throw new Error(`SESSION_ID_CONFLICT: ${session.session_id}`);
    }
    this.sessions.set(session.session_id, session);
    return session.session_id;
  }

  async get(sessionId: string): Promise<VerificationSessionV1 | undefined> {
    return this.live(sessionId);
  }

  async claim(sessionId: string, code: string): Promise<ClaimResultV1> {
    const session = this.live(sessionId);
    if (!session) return { status: "not_found" };
    if (session.code !== code) return { status: "mismatched" };
    this.sessions.delete(sessionId);
    return { status: "matched", session };
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async sweepExpired(nowTs: number): Promise<number> {
    let removed = 0;
    for (const [id, s] of this.sessions) {
      if (s.expires_at_ts <= nowTs) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  close(): void {
    this.sessions.clear();
  }

  // Lazy expiry on access.
  private live(sessionId: string): VerificationSessionV1 | undefined {
    const s = this.sessions.get(sessionId);
    if (!s) return undefined;
    if (s.expires_at_ts <= this.clock()) {
      this.sessions.delete(sessionId);
      return undefined;
    }
    return s;
  }
}
