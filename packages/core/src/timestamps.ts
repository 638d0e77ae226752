import type { TimestampFormat } from './schema';

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const DMY_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const SERIAL_PATTERN = /^\d+(?:[.,]\d+)?$/;

const DAY_MS = 24 * 60 * 60 * 1000;
// Spreadsheet day zero, accounting for the 1900 leap-year bug.
const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);
const MAX_SERIAL_DAY = 2_958_465;

const fromParts = (
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  offsetMinutes: number
): Date | null => {
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const ms = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(ms);
  if (check.getUTCDate() !== day || check.getUTCMonth() !== month - 1) {
    return null;
  }
  return new Date(ms - offsetMinutes * 60_000);
};

const parseOffset = (raw: string | undefined): number => {
  if (!raw || raw.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = raw.startsWith('-') ? -1 : 1;
  const digits = raw.slice(1).replace(':', '');
  const hours = Number.parseInt(digits.slice(0, 2), 10);
  const minutes = Number.parseInt(digits.slice(2, 4), 10);
  return sign * (hours * 60 + minutes);
};

const toInt = (value: string | undefined): number => (value ? Number.parseInt(value, 10) : 0);

const parseIso = (text: string): Date | null => {
  const match = ISO_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute, second, offset] = match;
  return fromParts(toInt(year), toInt(month), toInt(day), toInt(hour), toInt(minute), toInt(second), parseOffset(offset));
};

const parseDayMonthYear = (text: string): Date | null => {
  const match = DMY_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const [, day, month, year, hour, minute, second] = match;
  return fromParts(toInt(year), toInt(month), toInt(day), toInt(hour), toInt(minute), toInt(second), 0);
};

const parseSerial = (serial: number): Date | null => {
  if (!Number.isFinite(serial) || serial <= 0 || serial > MAX_SERIAL_DAY) {
    return null;
  }
  // Round to the second so fractional days such as 0.5416666 land on whole minutes.
  const seconds = Math.round(serial * (DAY_MS / 1000));
  return new Date(SERIAL_EPOCH_MS + seconds * 1000);
};

/**
 * Parses a source timestamp in one of the accepted formats. Timestamps without an
 * explicit offset are read as UTC wall-clock time. Returns `null` when no accepted
 * format matches.
 */
export function parseTimestamp(
  value: unknown,
  formats: readonly TimestampFormat[] = ['iso', 'dmy', 'spreadsheet-serial']
): Date | null {
  if (value instanceof Date) {
    return Number.isFinite(value.getTime()) ? value : null;
  }

  if (typeof value === 'number') {
    return formats.includes('spreadsheet-serial') ? parseSerial(value) : null;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (!text) {
    return null;
  }

  for (const format of formats) {
    let parsed: Date | null = null;
    switch (format) {
      case 'iso':
        parsed = parseIso(text);
        break;
      case 'dmy':
        parsed = parseDayMonthYear(text);
        break;
      case 'spreadsheet-serial':
        parsed = SERIAL_PATTERN.test(text) ? parseSerial(Number(text.replace(',', '.'))) : null;
        break;
    }
    if (parsed) {
      return parsed;
    }
  }

  return null;
}
