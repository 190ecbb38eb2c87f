import { Router } from 'express';
import { body } from 'express-validator';
import { protect, authorize } from '../middleware/identityMiddleware';
import { SessionController } from '../controllers/sessionController';

export const createSessionRoutes = (controller: SessionController): Router => {
  const router = Router();

  router.use(protect, authorize('instructor'));

  // @route   POST /api/sessions
  // @desc    Open an attendance session
  // @access  Private (Instructor)
  router.post(
    '/',
    [
      body('radiusMeters', 'Allowed radius must be a number of meters').isFloat({ gt: 0 }),
      body('durationMinutes', 'Duration must be a number of minutes').isFloat({ gt: 0 }),
      body('latitude').optional().isFloat({ min: -90, max: 90 }).withMessage('Latitude must be between -90 and 90'),
      body('longitude').optional().isFloat({ min: -180, max: 180 }).withMessage('Longitude must be between -180 and 180'),
      body('locationLink').optional().isString().withMessage('Location link must be a string'),
      body('label').optional().isString().isLength({ max: 200 }).withMessage('Label must be at most 200 characters'),
    ],
    controller.openSession
  );

  // @route   GET /api/sessions
  // @access  Private (Instructor)
  router.get('/', controller.listMySessions);

  // @route   GET /api/sessions/:id
  // @access  Private (Session owner)
  router.get('/:id', controller.getSession);

  // @route   POST /api/sessions/:id/tokens
  // @access  Private (Session owner)
  router.post('/:id/tokens', controller.issueToken);

  // @route   POST /api/sessions/:id/close
  // @access  Private (Session owner)
  router.post('/:id/close', controller.closeSession);

  // @route   GET /api/sessions/:id/attendance/export
  // @access  Private (Session owner)
  router.get('/:id/attendance/export', controller.exportSessionAttendance);

  // @route   GET /api/sessions/:id/attendance
  // @access  Private (Session owner)
  router.get('/:id/attendance', controller.getSessionAttendance);

  // @route   POST /api/sessions/:id/attendance/manual
  // @access  Private (Session owner)
  router.post(
    '/:id/attendance/manual',
    [
      body('attendeeIdentity', 'Attendee identity is required').isString().trim().notEmpty(),
    ],
    controller.markPresentManually
  );

  return router;
};

export const createTokenRoutes = (controller: SessionController): Router => {
  const router = Router();

  // @route   POST /api/tokens/:tokenId/revoke
  // @desc    Revoke a token before it expires
  // @access  Private (Owner of the token's session)
  router.post('/:tokenId/revoke', protect, authorize('instructor'), controller.revokeToken);

  return router;
};
