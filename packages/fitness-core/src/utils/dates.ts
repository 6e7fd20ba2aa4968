import { differenceInCalendarDays, format, isValid, parseISO, startOfDay } from 'date-fns';
import type { DayKey } from '@fitledger/shared';
import { ValidationError } from '../errors.js';

const DAY_FORMAT = 'yyyy-MM-dd';

/**
 * Normalize a Date or ISO string to its local calendar day.
 */
export function toDayKey(value: Date | string): DayKey {
  const date = typeof value === 'string' ? parseISO(value) : value;
  if (!isValid(date)) {
    throw new ValidationError(`Invalid date: ${String(value)}`);
  }
  return format(startOfDay(date), DAY_FORMAT);
}

export function today(): DayKey {
  return toDayKey(new Date());
}

export function daysBetween(from: DayKey, to: DayKey): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

export function laterDay(a: DayKey | undefined, b: DayKey): DayKey {
  return a !== undefined && a > b ? a : b;
}
