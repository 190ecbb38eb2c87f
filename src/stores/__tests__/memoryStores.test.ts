import { describe, test, expect } from '@jest/globals';
import {
  createMemoryAttendanceStore,
  createMemorySessionStore,
  createMemoryTokenStore,
} from '../memoryStores';
import { DuplicateTokenIdError } from '../types';
import { AttendanceRecord, Session, Token } from '../../types/attendance';

const T0 = new Date('2025-03-03T09:00:00.000Z');
const at = (ms: number) => new Date(T0.getTime() + ms);

const makeSession = (overrides: Partial<Session> = {}): Session => ({
  id: 'session-1',
  ownerIdentity: 'instructor-1',
  label: null,
  opensAt: T0,
  closesAt: at(3_600_000),
  closedAt: null,
  allowedRadiusMeters: 100,
  originLatitude: 28.6139,
  originLongitude: 77.209,
  status: 'Open',
  ...overrides,
});

const makeToken = (overrides: Partial<Token> = {}): Token => ({
  id: 'token-1',
  sessionId: 'session-1',
  payload: 'attendance_token:token-1.tag',
  issuedAt: T0,
  expiresAt: at(60_000),
  consumedBy: [],
  status: 'Active',
  ...overrides,
});

const makeRecord = (overrides: Partial<AttendanceRecord> = {}): AttendanceRecord => ({
  sessionId: 'session-1',
  attendeeIdentity: 'student-1',
  tokenId: 'token-1',
  verifiedAt: T0,
  distanceMeters: 12.5,
  method: 'scan',
  markedBy: null,
  ...overrides,
});

describe('memory session store', () => {
  test('close moves Open to Closed once', async () => {
    const store = createMemorySessionStore();
    await store.put(makeSession());

    const closed = await store.close('session-1', at(1000));
    const again = await store.close('session-1', at(2000));

    expect(closed).toMatchObject({ status: 'Closed', closedAt: at(1000) });
    expect(again?.closedAt).toEqual(at(1000));
    expect(await store.close('missing', at(1000))).toBeNull();
  });

  test('lists only open sessions past their deadline', async () => {
    const store = createMemorySessionStore();
    await store.put(makeSession({ id: 'due', closesAt: at(1000) }));
    await store.put(makeSession({ id: 'later', closesAt: at(10_000) }));
    await store.put(makeSession({ id: 'closed', closesAt: at(1000), status: 'Closed', closedAt: at(500) }));

    const due = await store.listOpenPastDeadline(at(5000));
    expect(due.map((s) => s.id)).toEqual(['due']);
  });

  test('returned sessions cannot be mutated', async () => {
    const store = createMemorySessionStore();
    await store.put(makeSession());
    const session = await store.get('session-1');
    expect(Object.isFrozen(session)).toBe(true);
  });
});

describe('memory token store', () => {
  test('rejects a reused token id', async () => {
    const store = createMemoryTokenStore();
    await store.put(makeToken());
    await expect(store.put(makeToken())).rejects.toBeInstanceOf(DuplicateTokenIdError);
  });

  test('tryConsume accepts once per attendee', async () => {
    const store = createMemoryTokenStore();
    await store.put(makeToken());

    expect(await store.tryConsume('token-1', 'student-1', at(1000))).toBe('Accepted');
    expect(await store.tryConsume('token-1', 'student-1', at(2000))).toBe('AlreadyConsumedByThisAttendee');
    expect(await store.tryConsume('token-1', 'student-2', at(3000))).toBe('Accepted');
    expect((await store.get('token-1'))?.consumedBy).toEqual(['student-1', 'student-2']);
  });

  test('tryConsume refuses missing, expired and revoked tokens', async () => {
    const store = createMemoryTokenStore();
    await store.put(makeToken());
    await store.put(makeToken({ id: 'token-2' }));
    await store.revoke('token-2');

    expect(await store.tryConsume('missing', 'student-1', at(0))).toBe('TokenInvalid');
    expect(await store.tryConsume('token-1', 'student-1', at(60_000))).toBe('Accepted');
    expect(await store.tryConsume('token-1', 'student-2', at(60_001))).toBe('TokenInvalid');
    expect(await store.tryConsume('token-2', 'student-1', at(0))).toBe('TokenInvalid');
  });

  test('snapshots do not change when the token is consumed later', async () => {
    const store = createMemoryTokenStore();
    await store.put(makeToken());

    const before = await store.get('token-1');
    await store.tryConsume('token-1', 'student-1', at(0));

    expect(before?.consumedBy).toEqual([]);
  });

  test('revoke only affects active tokens', async () => {
    const store = createMemoryTokenStore();
    await store.put(makeToken({ status: 'Expired' }));

    expect((await store.revoke('token-1'))?.status).toBe('Expired');
    expect(await store.revoke('missing')).toBeNull();
  });

  test('findActiveForSession returns the newest live token', async () => {
    const store = createMemoryTokenStore();
    await store.put(makeToken({ id: 'old', issuedAt: T0 }));
    await store.put(makeToken({ id: 'new', issuedAt: at(1000) }));
    await store.put(makeToken({ id: 'other-session', sessionId: 'session-2', issuedAt: at(2000) }));

    expect((await store.findActiveForSession('session-1', at(1500)))?.id).toBe('new');
    expect(await store.findActiveForSession('session-1', at(60_001))).toBeNull();
  });

  test('expireDue moves stale active tokens to Expired', async () => {
    const store = createMemoryTokenStore();
    await store.put(makeToken({ id: 'stale', expiresAt: at(1000) }));
    await store.put(makeToken({ id: 'live', expiresAt: at(10_000) }));
    await store.put(makeToken({ id: 'revoked', expiresAt: at(1000), status: 'Revoked' }));

    expect(await store.expireDue(at(5000))).toBe(1);
    expect((await store.get('stale'))?.status).toBe('Expired');
    expect((await store.get('live'))?.status).toBe('Active');
    expect((await store.get('revoked'))?.status).toBe('Revoked');
  });
});

describe('memory attendance store', () => {
  test('keeps one record per attendee per session', async () => {
    const store = createMemoryAttendanceStore();

    expect(await store.insert(makeRecord())).toBe(true);
    expect(await store.insert(makeRecord({ tokenId: 'token-2', verifiedAt: at(1000) }))).toBe(false);
    expect(await store.insert(makeRecord({ sessionId: 'session-2' }))).toBe(true);

    expect(await store.find('session-1', 'student-1')).toEqual(makeRecord());
    expect(await store.find('session-1', 'student-9')).toBeNull();
  });

  test('lists newest first', async () => {
    const store = createMemoryAttendanceStore();
    await store.insert(makeRecord({ attendeeIdentity: 'a', verifiedAt: at(1000) }));
    await store.insert(makeRecord({ attendeeIdentity: 'b', verifiedAt: at(3000) }));
    await store.insert(makeRecord({ sessionId: 'session-2', attendeeIdentity: 'a', verifiedAt: at(2000) }));

    expect((await store.listBySession('session-1')).map((r) => r.attendeeIdentity)).toEqual(['b', 'a']);
    expect((await store.listByAttendee('a')).map((r) => r.sessionId)).toEqual(['session-2', 'session-1']);
    expect(await store.listBySession('session-3')).toEqual([]);
  });
});
