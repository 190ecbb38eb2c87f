import { describe, test, expect } from '@jest/globals';
import { loadConfig } from '..';

describe('loadConfig', () => {
  test('falls back to defaults under test', () => {
    expect(loadConfig({ NODE_ENV: 'test' })).toEqual({
      port: 5000,
      storeDriver: 'memory',
      mongoUri: null,
      tokenSigningSecret: 'test-secret',
      tokenTtlMs: null,
      maxSessionDurationMs: 4 * 60 * 60 * 1000,
      maxRadiusMeters: 5000,
      maxGpsAccuracyMeters: 100,
      sweepIntervalMs: 60 * 1000,
    });
  });

  test('reads rotation and limits from the environment', () => {
    const config = loadConfig({
      TOKEN_SIGNING_SECRET: 'local-secret',
      TOKEN_TTL_SECONDS: '30',
      MAX_RADIUS_METERS: '250',
      MAX_SESSION_DURATION_MINUTES: '90',
      STORE_DRIVER: 'mongo',
      MONGO_URI: 'mongodb://localhost:27017/attendance',
    });

    expect(config.tokenTtlMs).toBe(30_000);
    expect(config.maxRadiusMeters).toBe(250);
    expect(config.maxSessionDurationMs).toBe(90 * 60 * 1000);
    expect(config.storeDriver).toBe('mongo');
    expect(config.tokenSigningSecret).toBe('local-secret');
  });

  test('a TTL of 0 turns rotation off', () => {
    expect(loadConfig({ NODE_ENV: 'test', TOKEN_TTL_SECONDS: '0' }).tokenTtlMs).toBeNull();
  });

  test('requires a signing secret outside tests', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow('TOKEN_SIGNING_SECRET');
  });

  test('requires MONGO_URI for the mongo driver', () => {
    expect(() => loadConfig({ NODE_ENV: 'test', STORE_DRIVER: 'mongo' })).toThrow('MONGO_URI');
  });

  test.each<[NodeJS.ProcessEnv, string]>([
    [{ STORE_DRIVER: 'redis' }, 'STORE_DRIVER'],
    [{ PORT: 'eighty' }, 'PORT'],
    [{ TOKEN_TTL_SECONDS: '-5' }, 'TOKEN_TTL_SECONDS'],
    [{ PORT: '1.5' }, 'PORT'],
    [{ PORT: '0' }, 'PORT'],
    [{ PORT: '70000' }, 'PORT'],
    [{ SWEEP_INTERVAL_SECONDS: '0' }, 'SWEEP_INTERVAL_SECONDS'],
    [{ MAX_RADIUS_METERS: '0' }, 'MAX_RADIUS_METERS'],
    [{ MAX_SESSION_DURATION_MINUTES: '0' }, 'MAX_SESSION_DURATION_MINUTES'],
    [{ MAX_GPS_ACCURACY_METERS: '0' }, 'MAX_GPS_ACCURACY_METERS'],
  ])('rejects %p', (env, name) => {
    expect(() => loadConfig({ NODE_ENV: 'test', ...env })).toThrow(name);
  });
});
