/**
 * Time source in unix seconds
 */

export interface Clock {
  now(): number;
}

export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * Clock advanced explicitly (simulations and tests)
 */
export class ManualClock implements Clock {
  constructor(private current: number = 1_700_000_000) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): number {
    if (seconds < 0) {
      throw new RangeError('Clock cannot move backwards');
    }
    this.current += seconds;
    return this.current;
  }

  set(seconds: number): void {
    if (seconds < this.current) {
      throw new RangeError('Clock cannot move backwards');
    }
    this.current = seconds;
  }
}
