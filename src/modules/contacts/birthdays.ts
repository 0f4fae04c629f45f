/**
 * Upcoming-birthday window arithmetic. Only month and day take part in the
 * comparison; dates are read in UTC.
 */

export const UPCOMING_BIRTHDAY_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Inclusive month-day range, both ends formatted `MM-DD`.
 * `wraps` is set when the range runs past Dec-31 into January.
 */
export interface BirthdayWindow {
  start: string;
  end: string;
  wraps: boolean;
}

export const toMonthDay = (date: Date): string => date.toISOString().slice(5, 10);

export const birthdayWindow = (today: Date, days: number = UPCOMING_BIRTHDAY_DAYS): BirthdayWindow => {
  const start = toMonthDay(today);
  const end = toMonthDay(new Date(today.getTime() + days * DAY_MS));
  return { start, end, wraps: end < start };
};

/** Inclusive `MM-DD` bounds, compared as text. */
export interface MonthDayRange {
  from: string;
  to: string;
}

/**
 * The window as plain ranges, earliest-first: one range inside a year,
 * or the tail of December followed by the head of January. A birthday's
 * position in this list is also its sort rank.
 */
export const monthDayRanges = (window: BirthdayWindow): MonthDayRange[] =>
  window.wraps
    ? [
        { from: window.start, to: '12-31' },
        { from: '01-01', to: window.end },
      ]
    : [{ from: window.start, to: window.end }];
