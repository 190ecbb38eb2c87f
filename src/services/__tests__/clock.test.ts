import { describe, test, expect } from '@jest/globals';
import { ManualClock, createSystemClock } from '../clock';

describe('createSystemClock', () => {
  test('never goes backwards when the source steps back', () => {
    const readings = [1_000, 500, 2_000];
    const clock = createSystemClock(() => readings.shift() ?? 0);

    expect(clock.now().getTime()).toBe(1_000);
    expect(clock.now().getTime()).toBe(1_000);
    expect(clock.now().getTime()).toBe(2_000);
  });
});

describe('ManualClock', () => {
  test('moves only when told to', () => {
    const clock = new ManualClock(new Date('2025-03-03T09:00:00.000Z'));
    expect(clock.now().toISOString()).toBe('2025-03-03T09:00:00.000Z');

    clock.advance(61_000);
    expect(clock.now().toISOString()).toBe('2025-03-03T09:01:01.000Z');

    clock.set(0);
    expect(clock.now().getTime()).toBe(0);
  });
});
