import { describe, it, expect } from 'vitest';
import { SystemClock, FixedClock, type Clock } from './clock.js';

describe('SystemClock', () => {
  it('now() returns approximately the current time', () => {
    const clock: Clock = new SystemClock();
    const before = Date.now();
    const now = clock.now();
    const after = Date.now();
    expect(now.getTime()).toBeGreaterThanOrEqual(before);
    expect(now.getTime()).toBeLessThanOrEqual(after);
  });

  it('today() returns a YYYY-MM-DD string', () => {
    expect(new SystemClock().today()).toMatch(/^\d{4}-\d{2}-\d{2}$/);
  });
});

describe('FixedClock', () => {
  it('returns the fixed instant on every call', () => {
    const clock = new FixedClock(new Date('2024-06-15T12:30:00Z'));
    expect(clock.now().toISOString()).toBe('2024-06-15T12:30:00.000Z');
    expect(clock.now().toISOString()).toBe('2024-06-15T12:30:00.000Z');
  });

  it('accepts an ISO string', () => {
    expect(new FixedClock('2024-03-01T08:00:00Z').today()).toBe('2024-03-01');
  });

  it('today() uses the UTC date', () => {
    expect(new FixedClock(new Date('2024-06-15T23:59:59Z')).today()).toBe('2024-06-15');
  });

  it('hands out copies that callers cannot mutate', () => {
    const clock = new FixedClock(new Date('2024-06-15T12:30:00Z'));
    clock.now().setUTCFullYear(2000);
    expect(clock.today()).toBe('2024-06-15');
  });
});
