import type { VerificationSessionV1 } from "@trial-intake/contracts";

export type ClaimResultV1 =
  | { status: "matched"; session: VerificationSessionV1 }
  | { status: "mismatched" }
  | { status: "not_found" };

/**
 * Pending verifications keyed by opaque session id.
 *
 * Expired sessions behave as absent on every read. `claim` is a compare-and-delete:
 * for one id, at most one caller ever receives `matched`.
 */
export interface VerificationSessionStore {
  create(session: VerificationSessionV1): Promise<string>;
  get(sessionId: string): Promise<VerificationSessionV1 | undefined>;
  claim(sessionId: string, code: string): Promise<ClaimResultV1>;
  delete(sessionId: string): Promise<boolean>;
  sweepExpired(nowTs: number): Promise<number>;
  close(): void;
}
