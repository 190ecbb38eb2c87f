/**
 * MongoDB-backed stores.
 *
 * - tryConsume is a single conditional findOneAndUpdate: the filter carries the
 *   whole eligibility check, $addToSet is the write, and MongoDB applies both to
 *   the one document atomically.
 * - One record per (sessionId, attendeeIdentity) is the unique index on the
 *   attendance collection; a losing insert surfaces as a duplicate key error.
 */

import { Model } from 'mongoose';
import createSessionModel, { ISession, SessionLean } from '../models/Session';
import createTokenModel, { IToken, TokenLean } from '../models/Token';
import createAttendanceRecordModel, {
  AttendanceRecordLean,
  IAttendanceRecord,
} from '../models/AttendanceRecord';
import { AttendanceRecord, ConsumeResult, Session, Token } from '../types/attendance';
import {
  AttendanceStore,
  AttendanceStores,
  DuplicateTokenIdError,
  SessionStore,
  TokenStore,
} from './types';

const DUPLICATE_KEY = 11000;

export const isDuplicateKeyError = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === DUPLICATE_KEY;

const toSession = (doc: SessionLean): Session => ({
  id: doc._id,
  ownerIdentity: doc.ownerIdentity,
  label: doc.label ?? null,
  opensAt: doc.opensAt,
  closesAt: doc.closesAt,
  closedAt: doc.closedAt ?? null,
  allowedRadiusMeters: doc.allowedRadiusMeters,
  originLatitude: doc.origin.latitude,
  originLongitude: doc.origin.longitude,
  status: doc.status,
});

const toToken = (doc: TokenLean): Token => ({
  id: doc._id,
  sessionId: doc.sessionId,
  payload: doc.payload,
  issuedAt: doc.issuedAt,
  expiresAt: doc.expiresAt,
  consumedBy: [...(doc.consumedBy ?? [])],
  status: doc.status,
});

const toRecord = (doc: AttendanceRecordLean): AttendanceRecord => ({
  sessionId: doc.sessionId,
  attendeeIdentity: doc.attendeeIdentity,
  tokenId: doc.tokenId ?? null,
  verifiedAt: doc.verifiedAt,
  distanceMeters: doc.distanceMeters ?? null,
  method: doc.method,
  markedBy: doc.markedBy ?? null,
});

export class MongoSessionStore implements SessionStore {
  constructor(private readonly Sessions: Model<ISession> = createSessionModel()) {}

  async get(sessionId: string): Promise<Session | null> {
    const doc = await this.Sessions.findById(sessionId).lean<SessionLean>();
    return doc ? toSession(doc) : null;
  }

  async put(session: Session): Promise<void> {
    await this.Sessions.create({
      _id: session.id,
      ownerIdentity: session.ownerIdentity,
      label: session.label,
      opensAt: session.opensAt,
      closesAt: session.closesAt,
      closedAt: session.closedAt,
      allowedRadiusMeters: session.allowedRadiusMeters,
      origin: { latitude: session.originLatitude, longitude: session.originLongitude },
      status: session.status,
    });
  }

  async close(sessionId: string, closedAt: Date): Promise<Session | null> {
    const updated = await this.Sessions.findOneAndUpdate(
      { _id: sessionId, status: 'Open' },
      { $set: { status: 'Closed', closedAt } },
      { new: true }
    ).lean<SessionLean>();
    if (updated) return toSession(updated);

    // Already closed, or missing
    return this.get(sessionId);
  }

  async listOpenPastDeadline(now: Date): Promise<Session[]> {
    const docs = await this.Sessions.find({ status: 'Open', closesAt: { $lt: now } }).lean<SessionLean[]>();
    return docs.map(toSession);
  }

  async listByOwner(ownerIdentity: string): Promise<Session[]> {
    const docs = await this.Sessions.find({ ownerIdentity }).sort({ opensAt: -1 }).lean<SessionLean[]>();
    return docs.map(toSession);
  }
}

export class MongoTokenStore implements TokenStore {
  constructor(private readonly Tokens: Model<IToken> = createTokenModel()) {}

  async get(tokenId: string): Promise<Token | null> {
    const doc = await this.Tokens.findById(tokenId).lean<TokenLean>();
    return doc ? toToken(doc) : null;
  }

  async put(token: Token): Promise<void> {
    try {
      await this.Tokens.create({
        _id: token.id,
        sessionId: token.sessionId,
        payload: token.payload,
        issuedAt: token.issuedAt,
        expiresAt: token.expiresAt,
        consumedBy: [...token.consumedBy],
        status: token.status,
      });
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new DuplicateTokenIdError(token.id);
      }
      throw err;
    }
  }

  async revoke(tokenId: string): Promise<Token | null> {
    const updated = await this.Tokens.findOneAndUpdate(
      { _id: tokenId, status: 'Active' },
      { $set: { status: 'Revoked' } },
      { new: true }
    ).lean<TokenLean>();
    if (updated) return toToken(updated);
    return this.get(tokenId);
  }

  async tryConsume(tokenId: string, attendeeIdentity: string, now: Date): Promise<ConsumeResult> {
    const consumed = await this.Tokens.findOneAndUpdate(
      {
        _id: tokenId,
        status: 'Active',
        expiresAt: { $gte: now },
        consumedBy: { $ne: attendeeIdentity },
      },
      { $addToSet: { consumedBy: attendeeIdentity } },
      { new: true }
    ).lean<TokenLean>();

    if (consumed) {
      return 'Accepted';
    }

    // The conditional update matched nothing: classify from the current state.
    // consumedBy only grows and status never returns to Active, so this read
    // cannot turn a rejection into an acceptance.
    const current = await this.get(tokenId);
    if (
      current &&
      current.status === 'Active' &&
      now.getTime() <= current.expiresAt.getTime() &&
      current.consumedBy.includes(attendeeIdentity)
    ) {
      return 'AlreadyConsumedByThisAttendee';
    }
    return 'TokenInvalid';
  }

  async findActiveForSession(sessionId: string, now: Date): Promise<Token | null> {
    const doc = await this.Tokens.findOne({ sessionId, status: 'Active', expiresAt: { $gte: now } })
      .sort({ issuedAt: -1 })
      .lean<TokenLean>();
    return doc ? toToken(doc) : null;
  }

  async expireDue(now: Date): Promise<number> {
    const result = await this.Tokens.updateMany(
      { status: 'Active', expiresAt: { $lt: now } },
      { $set: { status: 'Expired' } }
    );
    return result.modifiedCount;
  }
}

export class MongoAttendanceStore implements AttendanceStore {
  constructor(
    private readonly Records: Model<IAttendanceRecord> = createAttendanceRecordModel()
  ) {}

  async insert(record: AttendanceRecord): Promise<boolean> {
    try {
      await this.Records.create({ ...record });
      return true;
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        return false;
      }
      throw err;
    }
  }

  async find(sessionId: string, attendeeIdentity: string): Promise<AttendanceRecord | null> {
    const doc = await this.Records.findOne({ sessionId, attendeeIdentity }).lean<AttendanceRecordLean>();
    return doc ? toRecord(doc) : null;
  }

  async listBySession(sessionId: string): Promise<AttendanceRecord[]> {
    const docs = await this.Records.find({ sessionId }).sort({ verifiedAt: -1 }).lean<AttendanceRecordLean[]>();
    return docs.map(toRecord);
  }

  async listByAttendee(attendeeIdentity: string): Promise<AttendanceRecord[]> {
    const docs = await this.Records.find({ attendeeIdentity })
      .sort({ verifiedAt: -1 })
      .lean<AttendanceRecordLean[]>();
    return docs.map(toRecord);
  }
}

export function createMongoStores(): AttendanceStores {
  return {
    sessions: new MongoSessionStore(),
    tokens: new MongoTokenStore(),
    attendance: new MongoAttendanceStore(),
  };
}
