import { PreconditionError } from './errors';
import type { MonthDay, TemperatureRecord } from '../types';

/**
 * Month/day of `date` on the process's local calendar: "today" is the day the
 * host observes. Archive records are matched on their own UTC fields.
 */
export function dayOfYear(date: Date): MonthDay {
  return { month: date.getMonth() + 1, day: date.getDate() };
}

const utcDayOf = (date: Date): MonthDay => ({ month: date.getUTCMonth() + 1, day: date.getUTCDate() });

const dateKey = (date: Date): string => date.toISOString().slice(0, 10);

function assertWindowInput(series: ReadonlyArray<TemperatureRecord>, target: MonthDay): void {
  if (series.length === 0) {
    throw new PreconditionError('temperature series is empty');
  }
  if (!Number.isInteger(target.month) || target.month < 1 || target.month > 12) {
    throw new PreconditionError(`target month out of range: ${target.month}`);
  }
  if (!Number.isInteger(target.day) || target.day < 1 || target.day > 31) {
    throw new PreconditionError(`target day out of range: ${target.day}`);
  }
}

/**
 * Every record that falls on `target` (month/day) in any year of `series`,
 * plus the record just before and just after each matched calendar date, so a
 * consumer can interpolate at the day boundaries. Brackets never wrap past
 * either end of the series.
 *
 * `series` must hold a single station's records sorted by timestamp.
 */
export function extractDayWindow(
  series: ReadonlyArray<TemperatureRecord>,
  target: MonthDay
): TemperatureRecord[] {
  assertWindowInput(series, target);

  const groups = new Map<string, { first: number; last: number }>();
  const selected = new Set<number>();
  let previousTime = Number.NEGATIVE_INFINITY;

  series.forEach((record, index) => {
    const time = record.timestamp.getTime();
    if (Number.isNaN(time)) {
      throw new PreconditionError(`invalid timestamp at index ${index}`);
    }
    if (time < previousTime) {
      throw new PreconditionError(`temperature series is not sorted at index ${index}`);
    }
    previousTime = time;

    const { month, day } = utcDayOf(record.timestamp);
    if (month !== target.month || day !== target.day) return;

    selected.add(index);
    const key = dateKey(record.timestamp);
    const group = groups.get(key);
    if (group) {
      group.last = index;
    } else {
      groups.set(key, { first: index, last: index });
    }
  });

  for (const { first, last } of groups.values()) {
    if (first > 0) selected.add(first - 1);
    if (last < series.length - 1) selected.add(last + 1);
  }

  return Array.from(selected)
    .sort((a, b) => a - b)
    .flatMap((index) => {
      const record = series[index];
      return record ? [record] : [];
    });
}
