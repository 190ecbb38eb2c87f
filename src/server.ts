import mongoose from 'mongoose';
import { loadConfig } from './config';
import { createServer } from './app';
import { createAttendanceEngine } from './services/attendanceEngine';
import { errorMessage } from './utils/errors';

const start = async (): Promise<void> => {
  const config = loadConfig();

  if (config.storeDriver === 'mongo') {
    if (!config.mongoUri) {
      throw new Error('MONGO_URI environment variable is not set');
    }
    await mongoose.connect(config.mongoUri);
    console.log('[SERVER] Connected to MongoDB');
  } else {
    console.warn('[SERVER] Using in-memory stores; data is lost on restart');
  }

  const engine = createAttendanceEngine(config);
  const app = createServer({ engine });

  // Close sessions past their deadline and mark stale tokens Expired
  const sweep = setInterval(() => {
    engine.sessions.closeExpiredSessions().catch((err: unknown) => {
      console.error('[SERVER] Sweep failed:', errorMessage(err));
    });
  }, config.sweepIntervalMs);
  sweep.unref();

  app.listen(config.port, () => {
    console.log(`[SERVER] Listening on port ${config.port}`);
  });
};

start().catch((err: unknown) => {
  console.error('[SERVER] Failed to start:', errorMessage(err));
  process.exit(1);
});
