import { Response } from 'express';
import { errorMessage, isAttendanceError } from '../utils/errors';

/**
 * Sends a definitive AttendanceError as `{ msg, reason }`; anything else is
 * logged and answered with a plain 500.
 */
export const sendError = (res: Response, err: unknown, tag: string) => {
  if (isAttendanceError(err)) {
    return res.status(err.status).json({ msg: err.message, reason: err.reason });
  }
  console.error(`[${tag}] Unexpected error:`, errorMessage(err));
  return res.status(500).send('Server error');
};

// Accepts numbers and numeric strings; everything else is treated as missing
export const toNullableNumber = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

export const toNullableDate = (value: unknown): Date | null => {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date;
};
