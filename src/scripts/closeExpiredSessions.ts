/**
 * Maintenance script: close every session past its deadline and mark stale
 * tokens Expired. The server runs the same sweep on an interval; this is for
 * cron-style deployments that run it on a schedule instead.
 *
 * Run with: npm run sweep (after npm run build)
 */

import mongoose from 'mongoose';
import { loadConfig } from '../config';
import { createAttendanceEngine } from '../services/attendanceEngine';
import { SweepResult } from '../services/sessionManager';

async function closeExpiredSessions(): Promise<SweepResult> {
  const config = loadConfig();
  if (config.storeDriver !== 'mongo' || !config.mongoUri) {
    throw new Error('STORE_DRIVER must be "mongo" to sweep persisted sessions');
  }

  await mongoose.connect(config.mongoUri);
  console.log('✅ Connected to MongoDB');

  try {
    const engine = createAttendanceEngine(config);
    const result = await engine.sessions.closeExpiredSessions();

    console.log('\n' + '='.repeat(60));
    console.log('📊 SWEEP SUMMARY');
    console.log('='.repeat(60));
    console.log(`✅ Closed sessions: ${result.closedSessions}`);
    console.log(`⏭️  Expired tokens: ${result.expiredTokens}`);
    return result;
  } finally {
    await mongoose.connection.close();
    console.log('✅ Database connection closed');
  }
}

if (require.main === module) {
  closeExpiredSessions()
    .then(() => {
      console.log('✅ Script completed successfully');
      process.exit(0);
    })
    .catch((error: unknown) => {
      console.error('❌ Script failed:', error);
      process.exit(1);
    });
}

export default closeExpiredSessions;
