import { AppConfig } from '../config';
import { createMemoryStores } from '../stores/memoryStores';
import { createMongoStores } from '../stores/mongoStores';
import { AttendanceStores } from '../stores/types';
import { CheckInVerifier } from './checkInVerifier';
import { Clock, createSystemClock } from './clock';
import { SessionManager } from './sessionManager';

export interface AttendanceEngine {
  stores: AttendanceStores;
  clock: Clock;
  sessions: SessionManager;
  verifier: CheckInVerifier;
}

export type EngineConfig = Pick<
  AppConfig,
  'storeDriver' | 'tokenSigningSecret' | 'tokenTtlMs' | 'maxSessionDurationMs' | 'maxRadiusMeters' | 'maxGpsAccuracyMeters'
>;

export interface EngineOverrides {
  stores?: AttendanceStores;
  clock?: Clock;
}

export const createAttendanceEngine = (
  config: EngineConfig,
  overrides: EngineOverrides = {}
): AttendanceEngine => {
  const stores =
    overrides.stores ?? (config.storeDriver === 'mongo' ? createMongoStores() : createMemoryStores());
  const clock = overrides.clock ?? createSystemClock();

  const sessions = new SessionManager(stores, clock, config.tokenSigningSecret, {
    tokenTtlMs: config.tokenTtlMs,
    maxSessionDurationMs: config.maxSessionDurationMs,
    maxRadiusMeters: config.maxRadiusMeters,
  });
  const verifier = new CheckInVerifier(stores, clock, config.tokenSigningSecret, {
    maxGpsAccuracyMeters: config.maxGpsAccuracyMeters,
  });

  return { stores, clock, sessions, verifier };
};
