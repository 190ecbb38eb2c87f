import { AttendanceRecord, ConsumeResult, Session, Token } from '../types/attendance';

export interface SessionStore {
  get(sessionId: string): Promise<Session | null>;
  put(session: Session): Promise<void>;
  // Open -> Closed; returns the stored session, or null when it does not exist
  close(sessionId: string, closedAt: Date): Promise<Session | null>;
  listOpenPastDeadline(now: Date): Promise<Session[]>;
  listByOwner(ownerIdentity: string): Promise<Session[]>;
}

export interface TokenStore {
  get(tokenId: string): Promise<Token | null>;
  put(token: Token): Promise<void>;
  // Active -> Revoked; other states are left as they are
  revoke(tokenId: string): Promise<Token | null>;
  /**
   * Checks status, expiry and membership of `attendeeIdentity` in
   * `consumedBy`, and appends the identity when eligible, as one
   * indivisible step.
   */
  tryConsume(tokenId: string, attendeeIdentity: string, now: Date): Promise<ConsumeResult>;
  findActiveForSession(sessionId: string, now: Date): Promise<Token | null>;
  // Active tokens past their expiry -> Expired; returns how many moved
  expireDue(now: Date): Promise<number>;
}

export interface AttendanceStore {
  // false when a record for (sessionId, attendeeIdentity) already exists
  insert(record: AttendanceRecord): Promise<boolean>;
  find(sessionId: string, attendeeIdentity: string): Promise<AttendanceRecord | null>;
  listBySession(sessionId: string): Promise<AttendanceRecord[]>;
  listByAttendee(attendeeIdentity: string): Promise<AttendanceRecord[]>;
}

export interface AttendanceStores {
  sessions: SessionStore;
  tokens: TokenStore;
  attendance: AttendanceStore;
}

export class DuplicateTokenIdError extends Error {
  constructor(tokenId: string) {
    super(`Token id already exists: ${tokenId}`);
    this.name = 'DuplicateTokenIdError';
  }
}
