export interface ClockPort {
  nowMs(): number;
}

/**
 * Create a system clock adapter that uses Date.now()
 *
 * Only composition roots (CLI context, default constructor arguments) should
 * reach for this; tests inject a fixed or stepping clock.
 *
 * @returns ClockPort that delegates to Date.now()
 */
export function createSystemClock(): ClockPort {
  return { nowMs: () => Date.now() };
}

/**
 * Create a clock that returns `startMs` and advances by `stepMs` on every read
 */
export function createSteppingClock(startMs: number, stepMs: number = 0): ClockPort {
  let current = startMs;
  return {
    nowMs: () => {
      const value = current;
      current += stepMs;
      return value;
    },
  };
}
