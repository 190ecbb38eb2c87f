/**
 * Process-local stores (tests, local runs, single-instance deployments).
 *
 * Every state transition below runs without an `await` between its check and
 * its write, so on the event loop it cannot interleave with another request.
 */

import { AttendanceRecord, ConsumeResult, Session, Token } from '../types/attendance';
import {
  AttendanceStore,
  AttendanceStores,
  DuplicateTokenIdError,
  SessionStore,
  TokenStore,
} from './types';

interface TokenState {
  token: Token;
  consumedBy: Set<string>;
}

const snapshotToken = ({ token, consumedBy }: TokenState): Token =>
  Object.freeze({ ...token, consumedBy: Object.freeze([...consumedBy]) });

export function createMemorySessionStore(): SessionStore {
  const sessions = new Map<string, Session>();

  return {
    async get(sessionId) {
      return sessions.get(sessionId) ?? null;
    },
    async put(session) {
      sessions.set(session.id, Object.freeze({ ...session }));
    },
    async close(sessionId, closedAt) {
      const current = sessions.get(sessionId);
      if (!current) return null;
      if (current.status === 'Closed') return current;

      const closed: Session = { ...current, status: 'Closed', closedAt };
      sessions.set(sessionId, Object.freeze(closed));
      return closed;
    },
    async listOpenPastDeadline(now) {
      return [...sessions.values()].filter(
        (s) => s.status === 'Open' && s.closesAt.getTime() < now.getTime()
      );
    },
    async listByOwner(ownerIdentity) {
      return [...sessions.values()]
        .filter((s) => s.ownerIdentity === ownerIdentity)
        .sort((a, b) => b.opensAt.getTime() - a.opensAt.getTime());
    },
  };
}

export function createMemoryTokenStore(): TokenStore {
  const tokens = new Map<string, TokenState>();

  const isLive = (token: Token, now: Date) =>
    token.status === 'Active' && now.getTime() <= token.expiresAt.getTime();

  return {
    async get(tokenId) {
      const state = tokens.get(tokenId);
      return state ? snapshotToken(state) : null;
    },
    async put(token) {
      if (tokens.has(token.id)) {
        throw new DuplicateTokenIdError(token.id);
      }
      tokens.set(token.id, { token: { ...token }, consumedBy: new Set(token.consumedBy) });
    },
    async revoke(tokenId) {
      const state = tokens.get(tokenId);
      if (!state) return null;
      if (state.token.status === 'Active') {
        state.token = { ...state.token, status: 'Revoked' };
      }
      return snapshotToken(state);
    },
    async tryConsume(tokenId, attendeeIdentity, now): Promise<ConsumeResult> {
      const state = tokens.get(tokenId);
      if (!state || !isLive(state.token, now)) {
        return 'TokenInvalid';
      }
      if (state.consumedBy.has(attendeeIdentity)) {
        return 'AlreadyConsumedByThisAttendee';
      }
      state.consumedBy.add(attendeeIdentity);
      return 'Accepted';
    },
    async findActiveForSession(sessionId, now) {
      let latest: TokenState | null = null;
      for (const state of tokens.values()) {
        if (state.token.sessionId !== sessionId || !isLive(state.token, now)) continue;
        if (!latest || state.token.issuedAt.getTime() >= latest.token.issuedAt.getTime()) {
          latest = state;
        }
      }
      return latest ? snapshotToken(latest) : null;
    },
    async expireDue(now) {
      let expired = 0;
      for (const state of tokens.values()) {
        if (state.token.status === 'Active' && state.token.expiresAt.getTime() < now.getTime()) {
          state.token = { ...state.token, status: 'Expired' };
          expired++;
        }
      }
      return expired;
    },
  };
}

export function createMemoryAttendanceStore(): AttendanceStore {
  // sessionId -> attendeeIdentity -> record
  const bySession = new Map<string, Map<string, AttendanceRecord>>();

  const newestFirst = (a: AttendanceRecord, b: AttendanceRecord) =>
    b.verifiedAt.getTime() - a.verifiedAt.getTime();

  return {
    async insert(record) {
      let attendees = bySession.get(record.sessionId);
      if (!attendees) {
        attendees = new Map();
        bySession.set(record.sessionId, attendees);
      }
      if (attendees.has(record.attendeeIdentity)) {
        return false;
      }
      attendees.set(record.attendeeIdentity, Object.freeze({ ...record }));
      return true;
    },
    async find(sessionId, attendeeIdentity) {
      return bySession.get(sessionId)?.get(attendeeIdentity) ?? null;
    },
    async listBySession(sessionId) {
      return [...(bySession.get(sessionId)?.values() ?? [])].sort(newestFirst);
    },
    async listByAttendee(attendeeIdentity) {
      const records: AttendanceRecord[] = [];
      for (const attendees of bySession.values()) {
        const record = attendees.get(attendeeIdentity);
        if (record) records.push(record);
      }
      return records.sort(newestFirst);
    },
  };
}

export function createMemoryStores(): AttendanceStores {
  return {
    sessions: createMemorySessionStore(),
    tokens: createMemoryTokenStore(),
    attendance: createMemoryAttendanceStore(),
  };
}
