import { Router } from 'express';
import { body } from 'express-validator';
import { protect } from '../middleware/identityMiddleware';
import { AttendanceController } from '../controllers/attendanceController';

export const createAttendanceRoutes = (controller: AttendanceController): Router => {
  const router = Router();

  // @route   POST /api/attendance/scan
  // @desc    Check in with a scanned QR payload (or a bare token id) and a GPS fix
  // @access  Private
  router.post(
    '/scan',
    protect,
    [
      body('payload').optional().isString().withMessage('QR payload must be a string'),
      body('tokenId').optional().isString().withMessage('Token id must be a string'),
      body('accuracy').optional({ values: 'null' }).isFloat().withMessage('Accuracy must be a number'),
      body('timestamp').optional({ values: 'null' }).isISO8601().withMessage('Timestamp must be an ISO 8601 date'),
    ],
    controller.markAttendance
  );

  // @route   GET /api/attendance/me
  // @desc    The caller's attendance history
  // @access  Private
  router.get('/me', protect, controller.getMyAttendance);

  return router;
};
