/**
 * Date grids for history series.
 *
 * Every grid is strictly ascending, contains no duplicates, and ends on the
 * requested end date even when that date is off the regular cadence.
 */

import {
  addDays,
  dayOfWeek,
  monthEnd,
  parseYmdOrThrow,
  yearEnd,
} from '../dates.js';

export type Frequency = 'daily' | 'business' | 'weekly' | 'monthly' | 'yearly';

export const FREQUENCIES: readonly Frequency[] = ['daily', 'business', 'weekly', 'monthly', 'yearly'];

export function isFrequency(value: string): value is Frequency {
  return FREQUENCIES.some((f) => f === value);
}

/**
 * @throws {Error} for an unknown frequency name.
 */
export function parseFrequency(value: string): Frequency {
  const trimmed = value.trim().toLowerCase();
  if (!isFrequency(trimmed)) {
    throw new Error(`Invalid frequency: ${value}. Expected one of: ${FREQUENCIES.join(', ')}`);
  }
  return trimmed;
}

function alignStart(date: string, frequency: Frequency): string {
  switch (frequency) {
    case 'business': {
      let d = date;
      while (isWeekend(d)) d = addDays(d, 1);
      return d;
    }
    case 'monthly':
      return monthEnd(date);
    case 'yearly':
      return yearEnd(date);
    default:
      return date;
  }
}

function advance(date: string, frequency: Frequency): string {
  switch (frequency) {
    case 'daily':
      return addDays(date, 1);
    case 'business': {
      let d = addDays(date, 1);
      while (isWeekend(d)) d = addDays(d, 1);
      return d;
    }
    case 'weekly':
      return addDays(date, 7);
    case 'monthly':
      return monthEnd(addDays(date, 1));
    case 'yearly':
      return yearEnd(addDays(date, 1));
  }
}

function isWeekend(date: string): boolean {
  const dow = dayOfWeek(date);
  return dow === 0 || dow === 6;
}

/**
 * Build the sequence of query dates between `start` and `end` inclusive.
 *
 * @throws {Error} when a date is invalid or `start` is after `end`.
 */
export function buildDateGrid(start: string, end: string, frequency: Frequency): string[] {
  const from = parseYmdOrThrow(start, 'start');
  const to = parseYmdOrThrow(end, 'end');
  if (from > to) {
    throw new Error('Start date must be on or before end date');
  }

  const dates: string[] = [];
  for (let d = alignStart(from, frequency); d <= to; d = advance(d, frequency)) {
    dates.push(d);
  }
  if (dates.length === 0 || dates[dates.length - 1] !== to) {
    dates.push(to);
  }
  return dates;
}
