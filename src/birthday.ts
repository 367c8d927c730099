import { ValidationError } from './errors';
import { Field, FieldRule } from './fields';
import { CalendarDate } from './types';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const INVALID_DATE_MESSAGE = 'invalid date format, expected YYYY-MM-DD';

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function parseCalendarDate(input: string): CalendarDate {
  const match = input.match(ISO_DATE);
  if (!match) {
    throw new ValidationError('birthday', INVALID_DATE_MESSAGE);
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  if (year < 1 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    throw new ValidationError('birthday', INVALID_DATE_MESSAGE);
  }

  return Object.freeze({ year, month, day });
}

export function formatCalendarDate(date: CalendarDate): string {
  return [
    String(date.year).padStart(4, '0'),
    String(date.month).padStart(2, '0'),
    String(date.day).padStart(2, '0'),
  ].join('-');
}

/**
 * The date a birthday falls on in `year`.
 * Feb 29 birthdays are celebrated on Mar 1 when `year` is not a leap year.
 */
export function birthdayInYear(birthday: CalendarDate, year: number): CalendarDate {
  if (birthday.month === 2 && birthday.day === 29 && !isLeapYear(year)) {
    return { year, month: 3, day: 1 };
  }
  return { year, month: birthday.month, day: birthday.day };
}

function dayNumber(date: CalendarDate): number {
  const utc = new Date(Date.UTC(2000, date.month - 1, date.day));
  utc.setUTCFullYear(date.year);
  return Math.round(utc.getTime() / MS_PER_DAY);
}

export function localCalendarDate(date: Date): CalendarDate {
  return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
}

/**
 * Next occurrence of the birthday on or after `referenceDate` (local calendar day).
 */
export function getNextBirthdayDate(birthday: CalendarDate, referenceDate?: Date): CalendarDate {
  const ref = referenceDate || new Date();
  const today = localCalendarDate(ref);

  const thisYear = birthdayInYear(birthday, today.year);
  if (dayNumber(thisYear) < dayNumber(today)) {
    return birthdayInYear(birthday, today.year + 1);
  }
  return thisYear;
}

export function daysUntilBirthday(birthday: CalendarDate, referenceDate?: Date): number {
  const ref = referenceDate || new Date();
  const today = localCalendarDate(ref);
  return dayNumber(getNextBirthdayDate(birthday, ref)) - dayNumber(today);
}

export const birthdayRule: FieldRule<CalendarDate> = {
  kind: 'birthday',
  parse: parseCalendarDate,
  format: formatCalendarDate,
};

export class Birthday extends Field<CalendarDate> {
  constructor(input: string) {
    super(birthdayRule, input);
  }

  override get value(): CalendarDate {
    return this.required();
  }
}
