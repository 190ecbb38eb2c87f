import { Request, Response } from 'express';
import { validationResult } from 'express-validator';
import { AttendanceEngine } from '../services/attendanceEngine';
import { renderPayloadQr } from '../services/qrService';
import { Session, Token } from '../types/attendance';
import { requireUser } from '../middleware/identityMiddleware';
import { extractCoordinatesFromGoogleMapsLink } from '../utils/mapsParser';
import { AttendanceError } from '../utils/errors';
import { toCsv } from '../utils/csv';
import { sendError, toNullableNumber } from './controllerUtils';

const MINUTE_MS = 60 * 1000;

const presentToken = (token: Token) => ({
  id: token.id,
  sessionId: token.sessionId,
  payload: token.payload,
  issuedAt: token.issuedAt,
  expiresAt: token.expiresAt,
  status: token.status,
  checkIns: token.consumedBy.length,
});

export const createSessionController = (engine: AttendanceEngine) => {
  const { sessions } = engine;

  // Only the instructor who opened a session may manage it
  const loadOwnedSession = async (req: Request, sessionId: string): Promise<Session> => {
    const user = requireUser(req);
    const session = await sessions.getSession(sessionId);
    if (session.ownerIdentity !== user.id) {
      throw new AttendanceError('FORBIDDEN', 'Not authorized to manage this session');
    }
    return session;
  };

  // @route   POST /api/sessions
  // @desc    Open an attendance session at a location
  // @access  Private (Instructor)
  const openSession = async (req: Request, res: Response) => {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      return res.status(400).json({ errors: errors.array() });
    }

    try {
      const user = requireUser(req);
      const { locationLink, label } = req.body;

      let latitude = toNullableNumber(req.body.latitude);
      let longitude = toNullableNumber(req.body.longitude);

      if ((latitude === null || longitude === null) && locationLink) {
        const coords = await extractCoordinatesFromGoogleMapsLink(locationLink);
        if (!coords) {
          return res.status(400).json({
            msg: 'Could not read coordinates from the location link. Please enter them manually.',
            reason: 'INVALID_LOCATION_LINK',
          });
        }
        latitude = coords.latitude;
        longitude = coords.longitude;
      }

      if (latitude === null || longitude === null) {
        return res.status(400).json({
          msg: 'Session location is required.',
          reason: 'INVALID_CONFIG',
        });
      }

      const durationMinutes = toNullableNumber(req.body.durationMinutes);
      const session = await sessions.openSession({
        owner: user.id,
        radiusMeters: toNullableNumber(req.body.radiusMeters) ?? NaN,
        durationMs: durationMinutes === null ? NaN : durationMinutes * MINUTE_MS,
        origin: { latitude, longitude },
        label: typeof label === 'string' ? label : null,
      });

      res.status(201).json({ msg: 'Attendance session opened.', session });
    } catch (err) {
      return sendError(res, err, 'SESSION');
    }
  };

  // @route   GET /api/sessions
  // @access  Private (Instructor)
  const listMySessions = async (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      res.json(await sessions.listSessionsFor(user.id));
    } catch (err) {
      return sendError(res, err, 'SESSION');
    }
  };

  // @route   GET /api/sessions/:id
  // @access  Private (Session owner)
  const getSession = async (req: Request, res: Response) => {
    try {
      res.json(await loadOwnedSession(req, req.params.id));
    } catch (err) {
      return sendError(res, err, 'SESSION');
    }
  };

  // @route   POST /api/sessions/:id/tokens
  // @desc    Issue (or, without rotation, re-fetch) the session's QR token
  // @access  Private (Session owner)
  const issueToken = async (req: Request, res: Response) => {
    try {
      const session = await loadOwnedSession(req, req.params.id);
      const { created, token } = await sessions.acquireToken(session.id);
      const qrCode = await renderPayloadQr(token.payload);

      res.status(created ? 201 : 200).json({ token: presentToken(token), qrCode });
    } catch (err) {
      return sendError(res, err, 'SESSION');
    }
  };

  // @route   POST /api/sessions/:id/close
  // @access  Private (Session owner)
  const closeSession = async (req: Request, res: Response) => {
    try {
      const session = await loadOwnedSession(req, req.params.id);
      const closed = await sessions.closeSession(session.id);
      res.json({ msg: 'Attendance session closed.', session: closed });
    } catch (err) {
      return sendError(res, err, 'SESSION');
    }
  };

  // @route   POST /api/tokens/:tokenId/revoke
  // @desc    Invalidate a token, e.g. when a photo of the QR code is being shared
  // @access  Private (Owner of the token's session)
  const revokeToken = async (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      const token = await sessions.getToken(req.params.tokenId);
      await loadOwnedSession(req, token.sessionId);

      const revoked = await sessions.revokeToken(token.id, user.id);
      res.json({ msg: 'Token revoked.', token: presentToken(revoked) });
    } catch (err) {
      return sendError(res, err, 'SESSION');
    }
  };

  // @route   GET /api/sessions/:id/attendance
  // @access  Private (Session owner)
  const getSessionAttendance = async (req: Request, res: Response) => {
    try {
      const session = await loadOwnedSession(req, req.params.id);
      res.json(await sessions.listAttendance(session.id));
    } catch (err) {
      return sendError(res, err, 'SESSION');
    }
  };

  // @route   GET /api/sessions/:id/attendance/export
  // @desc    Download the session's attendance as CSV
  // @access  Private (Session owner)
  const exportSessionAttendance = async (req: Request, res: Response) => {
    try {
      const session = await loadOwnedSession(req, req.params.id);
      const records = await sessions.listAttendance(session.id);

      const csv = toCsv(
        ['Attendee', 'Checked In At', 'Distance (m)', 'Method', 'Marked By'],
        records.map((record) => ({
          Attendee: record.attendeeIdentity,
          'Checked In At': record.verifiedAt.toISOString(),
          'Distance (m)': record.distanceMeters,
          Method: record.method,
          'Marked By': record.markedBy,
        }))
      );

      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="attendance_${session.id}.csv"`);
      res.send(csv);
    } catch (err) {
      return sendError(res, err, 'SESSION');
    }
  };

  // @route   POST /api/sessions/:id/attendance/manual
  // @desc    Mark an attendee present without a scan
  // @access  Private (Session owner)
  const markPresentManually = async (req: Request, res: Response) => {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      return res.status(400).json({ errors: errors.array() });
    }

    try {
      const user = requireUser(req);
      const session = await loadOwnedSession(req, req.params.id);
      const { created, record } = await sessions.markPresentManually(
        session.id,
        String(req.body.attendeeIdentity),
        user.id
      );

      res.status(created ? 201 : 200).json({
        msg: created ? 'Attendee marked present.' : 'Attendance already recorded.',
        alreadyRecorded: !created,
        attendance: record,
      });
    } catch (err) {
      return sendError(res, err, 'SESSION');
    }
  };

  return {
    openSession,
    listMySessions,
    getSession,
    issueToken,
    closeSession,
    revokeToken,
    getSessionAttendance,
    exportSessionAttendance,
    markPresentManually,
  };
};

export type SessionController = ReturnType<typeof createSessionController>;
