import dotenv from 'dotenv';

dotenv.config();

export type StoreDriver = 'memory' | 'mongo';

export interface AppConfig {
  port: number;
  storeDriver: StoreDriver;
  mongoUri: string | null;
  tokenSigningSecret: string;
  // null disables QR rotation: one token lives for the whole session
  tokenTtlMs: number | null;
  maxSessionDurationMs: number;
  maxRadiusMeters: number;
  maxGpsAccuracyMeters: number;
  sweepIntervalMs: number;
}

const readNumber = (env: NodeJS.ProcessEnv, name: string, fallback: number): number => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative number, got "${raw}"`);
  }
  return value;
};

const readPositive = (env: NodeJS.ProcessEnv, name: string, fallback: number): number => {
  const value = readNumber(env, name, fallback);
  if (value === 0) {
    throw new Error(`${name} must be greater than 0, got "${env[name]}"`);
  }
  return value;
};

const readPort = (env: NodeJS.ProcessEnv): number => {
  const port = readPositive(env, 'PORT', 5000);
  if (!Number.isInteger(port) || port > 65535) {
    throw new Error(`PORT must be an integer between 1 and 65535, got "${env.PORT}"`);
  }
  return port;
};

/**
 * Reads and validates configuration from the environment. Throws on the first
 * invalid value; there are no silent fallbacks for malformed input.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const driver = env.STORE_DRIVER?.trim() || 'memory';
  if (driver !== 'memory' && driver !== 'mongo') {
    throw new Error(`STORE_DRIVER must be "memory" or "mongo", got "${driver}"`);
  }

  const mongoUri = env.MONGO_URI?.trim() || null;
  if (driver === 'mongo' && !mongoUri) {
    throw new Error('MONGO_URI environment variable is not set');
  }

  let tokenSigningSecret = env.TOKEN_SIGNING_SECRET?.trim() || '';
  if (!tokenSigningSecret) {
    if (env.NODE_ENV !== 'test') {
      throw new Error('TOKEN_SIGNING_SECRET environment variable is not set');
    }
    tokenSigningSecret = 'test-secret';
  }

  const tokenTtlSeconds = readNumber(env, 'TOKEN_TTL_SECONDS', 0);

  return {
    port: readPort(env),
    storeDriver: driver,
    mongoUri,
    tokenSigningSecret,
    tokenTtlMs: tokenTtlSeconds > 0 ? tokenTtlSeconds * 1000 : null,
    maxSessionDurationMs: readPositive(env, 'MAX_SESSION_DURATION_MINUTES', 240) * 60 * 1000,
    maxRadiusMeters: readPositive(env, 'MAX_RADIUS_METERS', 5000),
    maxGpsAccuracyMeters: readPositive(env, 'MAX_GPS_ACCURACY_METERS', 100),
    sweepIntervalMs: readPositive(env, 'SWEEP_INTERVAL_SECONDS', 60) * 1000,
  };
};
