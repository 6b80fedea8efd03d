/**
 * Clock Types
 *
 * All time-dependent rules (staleness windows, epoch boundaries, timelocks)
 * read the current time through a Clock so that tests can control it.
 *
 * Time is integer unix seconds.
 */

export interface Clock {
  /** Current time in unix seconds. */
  now(): number;
}

/**
 * Wall-clock time, truncated to whole seconds.
 */
export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private _now: number;

  constructor(start: number) {
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  /** Move forward by `seconds`. */
  advance(seconds: number): number {
    this._now += seconds;
    return this._now;
  }

  /** Jump to an absolute time. Time never runs backwards. */
  set(timestamp: number): number {
    if (timestamp < this._now) {
      throw new RangeError(`Clock cannot move backwards: ${timestamp} < ${this._now}`);
    }
    this._now = timestamp;
    return this._now;
  }
}

/** Render a unix-seconds timestamp as ISO 8601. */
export function toIsoTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}
