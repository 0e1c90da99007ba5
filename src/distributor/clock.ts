/**
 * Source of "now" in unix seconds. Accrual is computed lazily from this
 * value at the start of each operation; nothing runs on a timer.
 */
export interface Clock {
  now(): number;
}

export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/** Clock for tests and replays: time only moves when told to. */
export class ManualClock implements Clock {
  constructor(private current: number = 0) {}

  now(): number {
    return this.current;
  }

  set(time: number): void {
    if (time < this.current) {
      throw new Error(`ManualClock cannot go backwards: ${time} < ${this.current}`);
    }
    this.current = time;
  }

  advance(seconds: number): number {
    this.set(this.current + seconds);
    return this.current;
  }
}
