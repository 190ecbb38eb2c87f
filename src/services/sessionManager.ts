/**
 * Attendance session lifecycle and token issuance.
 *
 * Mutations of one session (issuing, closing, manual marks) are serialized
 * per session id; different sessions never wait on each other.
 */

import { v4 as uuidv4 } from 'uuid';
import { AttendanceRecord, GeoPoint, Session, Token } from '../types/attendance';
import { AttendanceStores } from '../stores/types';
import { Clock } from './clock';
import { isUsableFix } from './geoValidator';
import { encodePayload, generateTokenId } from './tokenPayload';
import { AttendanceError } from '../utils/errors';
import { KeyedMutex } from '../utils/keyedMutex';
import { logAction } from '../utils/auditLogger';

export interface SessionPolicy {
  // null (or 0) disables rotation: one token valid until the session closes
  tokenTtlMs: number | null;
  maxSessionDurationMs: number;
  maxRadiusMeters: number;
}

export interface OpenSessionInput {
  owner: string;
  radiusMeters: number;
  origin: GeoPoint;
  durationMs: number;
  label?: string | null;
}

export interface SweepResult {
  closedSessions: number;
  expiredTokens: number;
}

export interface TokenIssue {
  created: boolean;
  token: Token;
}

export interface ManualMarkResult {
  created: boolean;
  record: AttendanceRecord;
}

export const DEFAULT_SESSION_POLICY: SessionPolicy = {
  tokenTtlMs: null,
  maxSessionDurationMs: 4 * 60 * 60 * 1000,
  maxRadiusMeters: 5000,
};

export class SessionManager {
  private readonly locks = new KeyedMutex();
  private readonly policy: SessionPolicy;

  constructor(
    private readonly stores: AttendanceStores,
    private readonly clock: Clock,
    private readonly signingSecret: string,
    policy: Partial<SessionPolicy> = {}
  ) {
    this.policy = { ...DEFAULT_SESSION_POLICY, ...policy };
  }

  get rotationEnabled(): boolean {
    return this.policy.tokenTtlMs !== null && this.policy.tokenTtlMs > 0;
  }

  async openSession(input: OpenSessionInput): Promise<Session> {
    const { owner, radiusMeters, origin, durationMs } = input;

    if (typeof owner !== 'string' || owner.trim() === '') {
      throw new AttendanceError('INVALID_CONFIG', 'Session owner is required.');
    }
    if (!Number.isFinite(radiusMeters) || radiusMeters <= 0) {
      throw new AttendanceError('INVALID_CONFIG', 'Allowed radius must be greater than 0 meters.');
    }
    if (radiusMeters > this.policy.maxRadiusMeters) {
      throw new AttendanceError(
        'INVALID_CONFIG',
        `Allowed radius cannot exceed ${this.policy.maxRadiusMeters} meters.`
      );
    }
    if (!Number.isFinite(durationMs) || durationMs <= 0) {
      throw new AttendanceError('INVALID_CONFIG', 'Session duration must be greater than 0.');
    }
    if (durationMs > this.policy.maxSessionDurationMs) {
      throw new AttendanceError(
        'INVALID_CONFIG',
        `Session duration cannot exceed ${Math.floor(this.policy.maxSessionDurationMs / 60000)} minutes.`
      );
    }
    if (!isUsableFix(origin)) {
      throw new AttendanceError('INVALID_CONFIG', 'Session location must be a valid latitude/longitude pair.');
    }

    const now = this.clock.now();
    const session: Session = {
      id: uuidv4(),
      ownerIdentity: owner,
      label: input.label?.trim() || null,
      opensAt: now,
      closesAt: new Date(now.getTime() + durationMs),
      closedAt: null,
      allowedRadiusMeters: radiusMeters,
      originLatitude: origin.latitude,
      originLongitude: origin.longitude,
      status: 'Open',
    };

    await this.stores.sessions.put(session);

    console.log('[SESSION] Opened:', {
      sessionId: session.id,
      owner,
      radiusMeters,
      closesAt: session.closesAt.toISOString(),
    });
    await logAction('SESSION_OPENED', {
      actor: owner,
      sessionId: session.id,
      details: { radiusMeters, durationMs },
    });

    return session;
  }

  async getSession(sessionId: string): Promise<Session> {
    const session = await this.stores.sessions.get(sessionId);
    if (!session) {
      throw new AttendanceError('SESSION_NOT_FOUND', 'Session not found.');
    }
    return session;
  }

  async issueToken(sessionId: string): Promise<Token> {
    const { token } = await this.acquireToken(sessionId);
    return token;
  }

  /**
   * Same as issueToken, also telling whether the token was created by this
   * call or is the session's existing one (rotation off).
   */
  async acquireToken(sessionId: string): Promise<TokenIssue> {
    return this.locks.runExclusive(sessionId, async () => {
      const session = await this.getSession(sessionId);
      const now = this.clock.now();

      if (session.status !== 'Open' || now.getTime() >= session.closesAt.getTime()) {
        throw new AttendanceError('SESSION_NOT_OPEN', 'Attendance session is not open.');
      }

      if (!this.rotationEnabled) {
        const current = await this.stores.tokens.findActiveForSession(sessionId, now);
        if (current) {
          return { created: false, token: current };
        }
      }

      const ttl = this.rotationEnabled && this.policy.tokenTtlMs !== null ? this.policy.tokenTtlMs : Infinity;
      const expiresAt = new Date(Math.min(now.getTime() + ttl, session.closesAt.getTime()));
      const id = generateTokenId();
      const token: Token = {
        id,
        sessionId,
        payload: encodePayload(this.signingSecret, id),
        issuedAt: now,
        expiresAt,
        consumedBy: [],
        status: 'Active',
      };

      await this.stores.tokens.put(token);

      console.log('[SESSION] Token issued:', {
        sessionId,
        expiresAt: expiresAt.toISOString(),
        rotating: this.rotationEnabled,
      });
      await logAction('TOKEN_ISSUED', {
        actor: session.ownerIdentity,
        sessionId,
        details: { expiresAt: expiresAt.toISOString() },
      });

      return { created: true, token };
    });
  }

  /**
   * Stops new issuance. Tokens already handed out stay valid until their own
   * expiresAt.
   */
  async closeSession(sessionId: string): Promise<Session> {
    return this.locks.runExclusive(sessionId, async () => {
      const closed = await this.stores.sessions.close(sessionId, this.clock.now());
      if (!closed) {
        throw new AttendanceError('SESSION_NOT_FOUND', 'Session not found.');
      }

      console.log('[SESSION] Closed:', { sessionId, closedAt: closed.closedAt?.toISOString() });
      await logAction('SESSION_CLOSED', { actor: closed.ownerIdentity, sessionId });
      return closed;
    });
  }

  async revokeToken(tokenId: string, actor: string | null = null): Promise<Token> {
    const token = await this.stores.tokens.revoke(tokenId);
    if (!token) {
      throw new AttendanceError('TOKEN_NOT_FOUND', 'Token not found.');
    }

    console.log('[SESSION] Token revoked:', { sessionId: token.sessionId, status: token.status });
    await logAction('TOKEN_REVOKED', { actor, sessionId: token.sessionId });
    return token;
  }

  async getToken(tokenId: string): Promise<Token> {
    const token = await this.stores.tokens.get(tokenId);
    if (!token) {
      throw new AttendanceError('TOKEN_NOT_FOUND', 'Token not found.');
    }
    return token;
  }

  async closeExpiredSessions(): Promise<SweepResult> {
    const now = this.clock.now();
    const due = await this.stores.sessions.listOpenPastDeadline(now);

    let closedSessions = 0;
    for (const session of due) {
      await this.locks.runExclusive(session.id, async () => {
        const closed = await this.stores.sessions.close(session.id, now);
        if (closed) closedSessions++;
      });
    }
    const expiredTokens = await this.stores.tokens.expireDue(now);

    if (closedSessions > 0 || expiredTokens > 0) {
      console.log('[SESSION] Sweep:', { closedSessions, expiredTokens });
    }
    return { closedSessions, expiredTokens };
  }

  /**
   * Instructor override for attendees who could not scan. Goes through the
   * same unique insert as a scan, so it can never create a second record.
   */
  async markPresentManually(
    sessionId: string,
    attendeeIdentity: string,
    markedBy: string
  ): Promise<ManualMarkResult> {
    if (typeof attendeeIdentity !== 'string' || attendeeIdentity.trim() === '') {
      throw new AttendanceError('INVALID_CONFIG', 'Attendee identity is required.');
    }

    return this.locks.runExclusive(sessionId, async () => {
      await this.getSession(sessionId);

      const record: AttendanceRecord = {
        sessionId,
        attendeeIdentity,
        tokenId: null,
        verifiedAt: this.clock.now(),
        distanceMeters: null,
        method: 'manual',
        markedBy,
      };

      const created = await this.stores.attendance.insert(record);
      if (!created) {
        const existing = await this.stores.attendance.find(sessionId, attendeeIdentity);
        if (!existing) {
          // The insert was refused as a duplicate, yet no record can be read back
          throw new Error(`Attendance for ${attendeeIdentity} in session ${sessionId} could not be read back`);
        }
        return { created: false, record: existing };
      }

      await logAction('MANUAL_ATTENDANCE', {
        actor: markedBy,
        sessionId,
        details: { attendeeIdentity, created },
      });
      return { created, record };
    });
  }

  async listAttendance(sessionId: string): Promise<AttendanceRecord[]> {
    await this.getSession(sessionId);
    return this.stores.attendance.listBySession(sessionId);
  }

  async listAttendanceFor(attendeeIdentity: string): Promise<AttendanceRecord[]> {
    return this.stores.attendance.listByAttendee(attendeeIdentity);
  }

  async listSessionsFor(ownerIdentity: string): Promise<Session[]> {
    return this.stores.sessions.listByOwner(ownerIdentity);
  }
}
