import { addDays, differenceInCalendarDays, format, isValid, parse, parseISO, startOfDay } from 'date-fns';
import type { IsoDate } from '../types.js';

export const DISPLAY_DATE_FORMAT = 'dd.MM.yyyy';
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function toIsoDate(date: Date): IsoDate {
  return format(date, 'yyyy-MM-dd');
}

export function isIsoDate(value: string): value is IsoDate {
  return ISO_DATE_PATTERN.test(value) && isValid(parseISO(value));
}

/** Локальная полночь для даты 'YYYY-MM-DD' */
export function fromIsoDate(value: IsoDate): Date {
  return startOfDay(parseISO(value));
}

/**
 * Сегодняшняя дата. С timeZone — календарный день в этой зоне
 * (en-CA форматирует как YYYY-MM-DD), иначе в зоне процесса.
 */
export function todayIso(clock: Clock, timeZone?: string): IsoDate {
  if (!timeZone) return toIsoDate(clock());
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
  return formatter.format(clock());
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/** Даты для быстрого выбора: завтра и ещё шесть дней */
export function upcomingDates(from: Date, count = 7): IsoDate[] {
  return Array.from({ length: count }, (_, i) => toIsoDate(addDays(from, i + 1)));
}

/** Разбор даты в формате ДД.ММ.ГГГГ; null если строка не дата */
export function parseDisplayDate(text: string, reference: Date): IsoDate | null {
  const parsed = parse(text.trim(), DISPLAY_DATE_FORMAT, reference);
  return isValid(parsed) ? toIsoDate(parsed) : null;
}

export function formatDisplayDate(value: IsoDate): string {
  return format(fromIsoDate(value), DISPLAY_DATE_FORMAT);
}

export function daysUntil(value: IsoDate, now: Date): number {
  return differenceInCalendarDays(fromIsoDate(value), now);
}
