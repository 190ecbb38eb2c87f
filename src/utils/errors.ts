export type AttendanceErrorReason =
  | 'INVALID_CONFIG'
  | 'SESSION_NOT_FOUND'
  | 'SESSION_NOT_OPEN'
  | 'TOKEN_NOT_FOUND'
  | 'FORBIDDEN'
  | 'UNAUTHENTICATED';

const STATUS_BY_REASON: Record<AttendanceErrorReason, number> = {
  INVALID_CONFIG: 400,
  SESSION_NOT_FOUND: 404,
  SESSION_NOT_OPEN: 409,
  TOKEN_NOT_FOUND: 404,
  FORBIDDEN: 403,
  UNAUTHENTICATED: 401,
};

/**
 * Definitive rejection raised by session and token operations. Controllers
 * turn it into `{ msg, reason }` with the matching HTTP status.
 */
export class AttendanceError extends Error {
  readonly reason: AttendanceErrorReason;
  readonly status: number;

  constructor(reason: AttendanceErrorReason, message: string) {
    super(message);
    this.name = 'AttendanceError';
    this.reason = reason;
    this.status = STATUS_BY_REASON[reason];
  }
}

export const isAttendanceError = (err: unknown): err is AttendanceError =>
  err instanceof AttendanceError;

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
