import { Request, Response } from 'express';
import { validationResult } from 'express-validator';
import { AttendanceEngine } from '../services/attendanceEngine';
import { VerificationOutcome } from '../types/attendance';
import { requireUser } from '../middleware/identityMiddleware';
import { sendError, toNullableDate, toNullableNumber } from './controllerUtils';

const INVALID_TOKEN_BODY = { msg: 'Invalid or expired token.', reason: 'INVALID_TOKEN' };

const respondWithOutcome = (res: Response, outcome: VerificationOutcome) => {
  switch (outcome.status) {
    case 'Accepted':
      return res.status(201).json({ msg: 'Attendance marked successfully.', attendance: outcome.record });

    // Unknown and expired tokens share one answer so ids cannot be probed
    case 'TokenNotFound':
    case 'TokenExpired':
      return res.status(400).json(INVALID_TOKEN_BODY);

    case 'OutOfRange': {
      const msg =
        outcome.reason === 'OUTSIDE_RADIUS'
          ? `You are ${Math.round(outcome.distanceMeters ?? 0)} meters away from the session location. Please move within ${outcome.allowedRadiusMeters} meters and try again.`
          : 'Your location could not be verified. Please enable GPS and try again.';
      return res.status(403).json({
        msg,
        reason: 'OUT_OF_RANGE',
        distance: outcome.distanceMeters,
        requiredRadius: outcome.allowedRadiusMeters,
      });
    }

    case 'DuplicateCheckIn':
      return res.status(200).json({
        msg: 'Attendance already recorded.',
        alreadyRecorded: true,
        reason: 'DUPLICATE_CHECK_IN',
      });
  }
};

export const createAttendanceController = (engine: AttendanceEngine) => {
  // @route   POST /api/attendance/scan
  // @desc    Check in by scanning a session's QR code
  // @access  Private
  const markAttendance = async (req: Request, res: Response) => {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      return res.status(400).json({ errors: errors.array() });
    }

    try {
      const user = requireUser(req);
      const { payload, tokenId } = req.body;

      const hasPayload = typeof payload === 'string' && payload.trim() !== '';
      const hasTokenId = typeof tokenId === 'string' && tokenId.trim() !== '';
      if (!hasPayload && !hasTokenId) {
        console.log('[ATTENDANCE_SCAN] REJECTED: Missing token');
        return res.status(400).json({
          msg: 'QR code data is required. Please scan the code again.',
          reason: 'MISSING_TOKEN',
        });
      }

      const fix = {
        attendeeIdentity: user.id,
        claimedLatitude: toNullableNumber(req.body.latitude),
        claimedLongitude: toNullableNumber(req.body.longitude),
        accuracyMeters: toNullableNumber(req.body.accuracy),
        submittedAt: toNullableDate(req.body.timestamp),
      };

      const outcome = hasPayload
        ? await engine.verifier.verifyPayload({ payload, ...fix })
        : await engine.verifier.verify({ tokenId: tokenId.trim(), ...fix });

      return respondWithOutcome(res, outcome);
    } catch (err) {
      return sendError(res, err, 'ATTENDANCE_SCAN');
    }
  };

  // @route   GET /api/attendance/me
  // @desc    The caller's own attendance records
  // @access  Private
  const getMyAttendance = async (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      res.json(await engine.sessions.listAttendanceFor(user.id));
    } catch (err) {
      return sendError(res, err, 'ATTENDANCE');
    }
  };

  return { markAttendance, getMyAttendance };
};

export type AttendanceController = ReturnType<typeof createAttendanceController>;
