/**
 * Wall-clock source shared by the session manager and the verifier.
 * Everything that compares against an expiry reads time from here, never from
 * a timestamp supplied by the client.
 */
export interface Clock {
  now(): Date;
}

/**
 * System clock that never runs backwards: if the host clock steps back (NTP
 * correction, VM resume) the last returned instant is repeated instead.
 */
export const createSystemClock = (source: () => number = Date.now): Clock => {
  let last = Number.NEGATIVE_INFINITY;
  return {
    now() {
      last = Math.max(last, source());
      return new Date(last);
    },
  };
};

export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date | number) {
    this.current = typeof start === 'number' ? start : start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  set(instant: Date | number): void {
    this.current = typeof instant === 'number' ? instant : instant.getTime();
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
