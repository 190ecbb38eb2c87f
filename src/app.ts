import express, { NextFunction, Request, Response } from 'express';
import { AttendanceEngine } from './services/attendanceEngine';
import { createSessionController } from './controllers/sessionController';
import { createAttendanceController } from './controllers/attendanceController';
import { createSessionRoutes, createTokenRoutes } from './routes/sessionRoutes';
import { createAttendanceRoutes } from './routes/attendanceRoutes';

export interface ServerOptions {
  engine: AttendanceEngine;
}

export const createServer = ({ engine }: ServerOptions) => {
  const app = express();
  app.use(express.json({ limit: '100kb' }));

  const sessionController = createSessionController(engine);
  const attendanceController = createAttendanceController(engine);

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.use('/api/sessions', createSessionRoutes(sessionController));
  app.use('/api/tokens', createTokenRoutes(sessionController));
  app.use('/api/attendance', createAttendanceRoutes(attendanceController));

  app.use((_req, res) => {
    res.status(404).json({ msg: 'Not found' });
  });

  // Malformed JSON bodies and anything a handler let through
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ msg: 'Malformed JSON body', reason: 'INVALID_BODY' });
    }
    console.error('[SERVER] Unhandled error:', err);
    res.status(500).send('Server error');
  });

  return app;
};
