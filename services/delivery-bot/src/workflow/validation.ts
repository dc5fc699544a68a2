import { ValidationError } from '../lib/errors.js';
import { parseDisplayDate, toIsoDate } from '../lib/dates.js';
import { TIME_OF_DAY_PATTERN } from '../config.js';
import type { IsoDate } from '../types.js';

// Самый длинный токен с ключом: "paid:insurance:<key>", он должен влезть в 64 байта
export const MAX_KEY_BYTES = 48;

export function parseKey(text: string): string {
  const key = text.trim();
  if (!key) {
    throw new ValidationError('empty_key', 'Key must not be empty');
  }
  if (Buffer.byteLength(key, 'utf8') > MAX_KEY_BYTES) {
    throw new ValidationError('key_too_long', `Key exceeds ${MAX_KEY_BYTES} bytes`);
  }
  return key;
}

/** Дата вручную: ДД.ММ.ГГГГ, не раньше сегодняшнего дня */
export function parseFreeFormDate(text: string, now: Date): IsoDate {
  const date = parseDisplayDate(text, now);
  if (!date) {
    throw new ValidationError('bad_date_format', `Not a DD.MM.YYYY date: ${text}`);
  }
  if (date < toIsoDate(now)) {
    throw new ValidationError('date_in_past', `Date ${date} is in the past`);
  }
  return date;
}

// Только десятичная запись: Number() принял бы и 0x10, 0b11, 1e3
const DECIMAL_PATTERN = /^-?\d+(?:\.\d+)?$/;

function parseNumber(text: string): number {
  const normalized = text.trim().replace(',', '.');
  const value = Number(normalized);
  if (!DECIMAL_PATTERN.test(normalized) || !Number.isFinite(value)) {
    throw new ValidationError('not_a_number', `Not a number: ${text}`);
  }
  return value;
}

export function parseAmount(text: string): number {
  const value = parseNumber(text);
  if (value <= 0) {
    throw new ValidationError('not_positive', `Amount must be positive: ${text}`);
  }
  return value;
}

export function parseProductCount(text: string): number {
  const value = parseNumber(text);
  if (value <= 0) {
    throw new ValidationError('not_positive', `Count must be positive: ${text}`);
  }
  if (!Number.isInteger(value)) {
    throw new ValidationError('not_an_integer', `Count must be a whole number: ${text}`);
  }
  return value;
}

export function parseTimeOfDay(text: string): string {
  const value = text.trim();
  const match = /^(\d{1,2}):(\d{2})$/.exec(value);
  const normalized = match ? `${match[1].padStart(2, '0')}:${match[2]}` : value;
  if (!TIME_OF_DAY_PATTERN.test(normalized)) {
    throw new ValidationError('bad_time_format', `Not a HH:MM time: ${text}`);
  }
  return normalized;
}
