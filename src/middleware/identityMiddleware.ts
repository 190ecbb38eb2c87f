import { NextFunction, Request, Response } from 'express';
import { AttendanceError } from '../utils/errors';

export type UserRole = 'instructor' | 'attendee';

export interface AuthenticatedUser {
  id: string;
  role: UserRole;
}

declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

const USER_HEADER = 'x-user-id';
const ROLE_HEADER = 'x-user-role';

const isRole = (value: string): value is UserRole => value === 'instructor' || value === 'attendee';

/**
 * Identity is established upstream (login is not handled here); the gateway
 * forwards the authenticated user id and role as headers.
 */
export const protect = (req: Request, res: Response, next: NextFunction) => {
  const id = req.header(USER_HEADER)?.trim();
  if (!id) {
    return res.status(401).json({ msg: 'Not authenticated', reason: 'UNAUTHENTICATED' });
  }

  const rawRole = req.header(ROLE_HEADER)?.trim().toLowerCase() ?? 'attendee';
  req.user = { id, role: isRole(rawRole) ? rawRole : 'attendee' };
  next();
};

export const authorize = (...roles: UserRole[]) => (req: Request, res: Response, next: NextFunction) => {
  if (!req.user || !roles.includes(req.user.role)) {
    return res.status(403).json({ msg: 'Not authorized for this action', reason: 'FORBIDDEN' });
  }
  next();
};

export const requireUser = (req: Request): AuthenticatedUser => {
  if (!req.user) {
    throw new AttendanceError('UNAUTHENTICATED', 'Not authenticated');
  }
  return req.user;
};
