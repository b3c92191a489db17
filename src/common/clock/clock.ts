export const CLOCK = Symbol("CLOCK");

/** Source of "now" in unix seconds. */
export interface Clock {
  now(): number;
}

export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/** Manually advanced clock for tests and simulations. */
export class FixedClock implements Clock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}
