/**
 * Check-in verification pipeline.
 *
 *   1. token lookup                 -> TokenNotFound
 *   2. expiry / status              -> TokenExpired
 *   3. geofence (fail-closed)       -> OutOfRange
 *   4. atomic consume on the token  -> TokenExpired if it went stale meanwhile
 *   5. unique attendance insert     -> DuplicateCheckIn if a record exists
 *
 * Steps 1-3 only read. The first failing step decides the outcome.
 */

import {
  AttendanceRecord,
  CheckInRequest,
  VerificationOutcome,
  sessionOrigin,
} from '../types/attendance';
import { AttendanceStores } from '../stores/types';
import { Clock } from './clock';
import { measureGeofence } from './geoValidator';
import { parsePayload } from './tokenPayload';
import { logAction } from '../utils/auditLogger';

export interface VerifierOptions {
  maxGpsAccuracyMeters?: number;
}

export interface PayloadCheckIn {
  payload: string;
  attendeeIdentity: string;
  claimedLatitude: number | null;
  claimedLongitude: number | null;
  submittedAt: Date | null;
  accuracyMeters?: number | null;
}

export class CheckInVerifier {
  constructor(
    private readonly stores: AttendanceStores,
    private readonly clock: Clock,
    private readonly signingSecret: string,
    private readonly options: VerifierOptions = {}
  ) {}

  async verify(request: CheckInRequest): Promise<VerificationOutcome> {
    const { tokenId, attendeeIdentity } = request;

    // 1. Token lookup
    const token = await this.stores.tokens.get(tokenId);
    if (!token) {
      await logAction('TOKEN_NOT_FOUND', {
        actor: attendeeIdentity,
        details: { submittedAt: request.submittedAt?.toISOString() ?? null },
      });
      return { status: 'TokenNotFound' };
    }

    // 2. Expiry and status, against the server clock only
    const readAt = this.clock.now();
    const session = await this.stores.sessions.get(token.sessionId);
    if (!session || token.status !== 'Active' || readAt.getTime() > token.expiresAt.getTime()) {
      return this.reject(attendeeIdentity, token.sessionId, { status: 'TokenExpired' }, {
        tokenStatus: token.status,
        expiresAt: token.expiresAt.toISOString(),
      });
    }

    // 3. Geofence
    const fence = measureGeofence(
      sessionOrigin(session),
      { latitude: request.claimedLatitude, longitude: request.claimedLongitude },
      session.allowedRadiusMeters,
      { accuracyMeters: request.accuracyMeters, maxAccuracyMeters: this.options.maxGpsAccuracyMeters }
    );
    if (!fence.within || fence.distanceMeters === null) {
      return this.reject(
        attendeeIdentity,
        session.id,
        {
          status: 'OutOfRange',
          distanceMeters: fence.distanceMeters,
          allowedRadiusMeters: session.allowedRadiusMeters,
          reason: fence.reason ?? 'INVALID_FIX',
        },
        { distanceMeters: fence.distanceMeters, reason: fence.reason }
      );
    }

    // 4. Atomic consume; re-checks status and expiry at write time
    const now = this.clock.now();
    const consumed = await this.stores.tokens.tryConsume(tokenId, attendeeIdentity, now);
    if (consumed === 'TokenInvalid') {
      return this.reject(attendeeIdentity, session.id, { status: 'TokenExpired' }, {
        stage: 'consume',
      });
    }

    // 5. Record. Also attempted on AlreadyConsumedByThisAttendee so a consume
    // whose insert never happened can still complete; the unique insert
    // decides which request wins.
    const record: AttendanceRecord = {
      sessionId: session.id,
      attendeeIdentity,
      tokenId,
      verifiedAt: now,
      distanceMeters: fence.distanceMeters,
      method: 'scan',
      markedBy: null,
    };
    const inserted = await this.stores.attendance.insert(record);
    if (!inserted) {
      return this.reject(attendeeIdentity, session.id, { status: 'DuplicateCheckIn' }, {
        consumeResult: consumed,
      });
    }

    console.log('[ATTENDANCE_SCAN] SUCCESS: Attendance recorded:', {
      sessionId: session.id,
      attendeeIdentity,
      distanceMeters: record.distanceMeters,
    });
    await logAction('CHECK_IN_ACCEPTED', {
      actor: attendeeIdentity,
      sessionId: session.id,
      details: {
        distanceMeters: record.distanceMeters,
        submittedAt: request.submittedAt?.toISOString() ?? null,
      },
    });

    return { status: 'Accepted', record };
  }

  /**
   * Same pipeline, starting from the raw string scanned out of the QR code.
   * A payload that does not parse or whose tag does not match is treated like
   * an unknown token.
   */
  async verifyPayload(input: PayloadCheckIn): Promise<VerificationOutcome> {
    const tokenId = parsePayload(this.signingSecret, input.payload);
    if (!tokenId) {
      await logAction('TAMPERED_PAYLOAD', {
        actor: input.attendeeIdentity,
        details: { payloadLength: input.payload.length },
      });
      return { status: 'TokenNotFound' };
    }

    return this.verify({
      tokenId,
      attendeeIdentity: input.attendeeIdentity,
      claimedLatitude: input.claimedLatitude,
      claimedLongitude: input.claimedLongitude,
      submittedAt: input.submittedAt,
      accuracyMeters: input.accuracyMeters,
    });
  }

  private async reject(
    attendeeIdentity: string,
    sessionId: string,
    outcome: VerificationOutcome,
    details: Record<string, unknown>
  ): Promise<VerificationOutcome> {
    console.log(`[ATTENDANCE_SCAN] REJECTED: ${outcome.status}`, { sessionId, attendeeIdentity, ...details });
    await logAction('CHECK_IN_REJECTED', {
      actor: attendeeIdentity,
      sessionId,
      details: { outcome: outcome.status, ...details },
    });
    return outcome;
  }
}
