/**
 * CALENDAR STATE
 *
 * Day/month/year triple with Gregorian month lengths. The season is never
 * stored: it is derived from the month every time it is asked for.
 */

import type { CalendarDate, DateField, Season } from './types.ts';

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
] as const;

const DAYS_PER_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

export function isLeapYear(year: number): boolean {
  return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

export function daysInMonth(month: number, year: number): number {
  if (month < 1 || month > 12) return 31;
  if (month === 2 && isLeapYear(year)) return 29;
  return DAYS_PER_MONTH[month - 1];
}

// Winter: Dec-Feb, Spring: Mar-May, Summer: Jun-Aug, Autumn: Sep-Nov
export function seasonOf(month: number): Season {
  if (month >= 3 && month <= 5) return 'spring';
  if (month >= 6 && month <= 8) return 'summer';
  if (month >= 9 && month <= 11) return 'autumn';
  return 'winter';
}

export function getMonthName(month: number): string {
  return MONTH_NAMES[(((month - 1) % 12) + 12) % 12];
}

export function formatDate(date: CalendarDate): string {
  return `${date.day} ${getMonthName(date.month)} ${date.year}`;
}

export function isValidDate(date: CalendarDate): boolean {
  return (
    Number.isInteger(date.day) &&
    Number.isInteger(date.month) &&
    Number.isInteger(date.year) &&
    date.year >= 1 &&
    date.month >= 1 &&
    date.month <= 12 &&
    date.day >= 1 &&
    date.day <= daysInMonth(date.month, date.year)
  );
}

export class CalendarState {
  private day: number;
  private month: number;
  private year: number;

  constructor(initial: CalendarDate = { day: 1, month: 1, year: 1 }) {
    this.day = initial.day;
    this.month = initial.month;
    this.year = initial.year;
  }

  get current(): CalendarDate {
    return { day: this.day, month: this.month, year: this.year };
  }

  get season(): Season {
    return seasonOf(this.month);
  }

  get monthLength(): number {
    return daysInMonth(this.month, this.year);
  }

  advance(): CalendarDate {
    this.day += 1;
    if (this.day > daysInMonth(this.month, this.year)) {
      this.day = 1;
      this.month += 1;
      if (this.month > 12) {
        this.month = 1;
        this.year += 1;
      }
    }
    return this.current;
  }

  advanceBy(days: number): CalendarDate {
    for (let i = 0; i < days; i++) {
      this.advance();
    }
    return this.current;
  }

  /**
   * Range-checks only the field being set. Other fields are left alone, so
   * moving to a shorter month can leave the day past the end of it; callers
   * re-derive whatever depends on the date afterwards.
   */
  set(field: DateField, value: number): boolean {
    if (!Number.isSafeInteger(value)) return false;
    switch (field) {
      case 'day':
        if (value < 1 || value > this.monthLength) return false;
        this.day = value;
        return true;
      case 'month':
        if (value < 1 || value > 12) return false;
        this.month = value;
        return true;
      case 'year':
        if (value < 1) return false;
        this.year = value;
        return true;
      default: {
        const unreachable: never = field;
        return unreachable;
      }
    }
  }

  restore(date: CalendarDate): void {
    this.day = date.day;
    this.month = date.month;
    this.year = date.year;
  }
}
