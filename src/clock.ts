/**
 * Source of "now" for the command layer.
 *
 * Commands default their as-of date to `today()`; tests pin it with a
 * FixedClock.
 */

import { formatDateYMD } from './dates.js';

export interface Clock {
  now(): Date;
  /** Current UTC calendar date, "YYYY-MM-DD". */
  today(): string;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  today(): string {
    return formatDateYMD(this.now());
  }
}

/** Clock frozen at one instant. */
export class FixedClock implements Clock {
  private readonly instant: number;

  constructor(now: Date | string) {
    this.instant = new Date(now).getTime();
  }

  now(): Date {
    return new Date(this.instant);
  }

  today(): string {
    return formatDateYMD(this.now());
  }
}
