export interface GeoPoint {
  latitude: number;
  longitude: number;
}

// A fix reported by a device; either value may be missing or garbage
export interface ClaimedFix {
  latitude: number | null;
  longitude: number | null;
}

export type SessionStatus = 'Open' | 'Closed';

export type Session = Readonly<{
  id: string;
  ownerIdentity: string;
  label: string | null;
  opensAt: Date;
  closesAt: Date;
  closedAt: Date | null;
  allowedRadiusMeters: number;
  originLatitude: number;
  originLongitude: number;
  status: SessionStatus;
}>;

export type TokenStatus = 'Active' | 'Expired' | 'Revoked';

export type Token = Readonly<{
  id: string;
  sessionId: string;
  payload: string; // Opaque string rendered into the QR code
  issuedAt: Date;
  expiresAt: Date;
  consumedBy: readonly string[];
  status: TokenStatus;
}>;

export interface CheckInRequest {
  tokenId: string;
  attendeeIdentity: string;
  claimedLatitude: number | null;
  claimedLongitude: number | null;
  submittedAt: Date | null;
  accuracyMeters?: number | null;
}

export type AttendanceMethod = 'scan' | 'manual';

export type AttendanceRecord = Readonly<{
  sessionId: string;
  attendeeIdentity: string;
  tokenId: string | null;
  verifiedAt: Date;
  distanceMeters: number | null;
  method: AttendanceMethod;
  markedBy: string | null;
}>;

export type ConsumeResult = 'Accepted' | 'AlreadyConsumedByThisAttendee' | 'TokenInvalid';

export type GeofenceRejection = 'INVALID_FIX' | 'LOW_ACCURACY' | 'INVALID_RADIUS' | 'OUTSIDE_RADIUS';

export type VerificationOutcome =
  | { status: 'Accepted'; record: AttendanceRecord }
  | { status: 'TokenNotFound' }
  | { status: 'TokenExpired' }
  | {
      status: 'OutOfRange';
      distanceMeters: number | null;
      allowedRadiusMeters: number;
      reason: GeofenceRejection;
    }
  | { status: 'DuplicateCheckIn' };

export type VerificationStatus = VerificationOutcome['status'];

export const sessionOrigin = (session: Session): GeoPoint => ({
  latitude: session.originLatitude,
  longitude: session.originLongitude,
});
