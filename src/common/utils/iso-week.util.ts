import { addWeeks, format, getISOWeek, getISOWeekYear, startOfISOWeek, subWeeks } from 'date-fns';

// ISO-8601 calendar weeks: Monday start, week 1 holds the year's first Thursday.
// All helpers work in local time, same as the dates they receive.

export interface IsoWeek {
  year: number;  // ISO week-numbering year, not always the calendar year
  week: number;  // 1..53
}

export function isoWeekOf(date: Date): IsoWeek {
  return { year: getISOWeekYear(date), week: getISOWeek(date) };
}

/** Stable key such as "2021-W01" for grouping dates by ISO week. */
export function isoWeekKey(date: Date): string {
  const { year, week } = isoWeekOf(date);
  return `${year}-W${String(week).padStart(2, '0')}`;
}

/** Monday 00:00 of the week before the one containing `date`. */
export function previousWeekStart(date: Date): Date {
  return subWeeks(startOfISOWeek(date), 1);
}

/**
 * Every Monday-aligned week start from the week of `from` to the week of `to`, inclusive.
 * Empty when `to` falls in an earlier week than `from`.
 */
export function weekStartsBetween(from: Date, to: Date): Date[] {
  const last = startOfISOWeek(to);
  const weeks: Date[] = [];
  for (let cursor = startOfISOWeek(from); cursor <= last; cursor = addWeeks(cursor, 1)) {
    weeks.push(cursor);
  }
  return weeks;
}

/** yyyy-MM-dd of the Monday starting the week of `date`. */
export function weekStartLabel(date: Date): string {
  return format(startOfISOWeek(date), 'yyyy-MM-dd');
}
