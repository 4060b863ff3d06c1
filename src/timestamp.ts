import timezoneOffsets from './data/timezone-offsets.json';
import { RecoverableParseError } from './errors.js';

export const INVALID_TIMESTAMP = '0001:01:01 00:00:00+00:00';

const TIMEZONE_OFFSETS: Record<string, string> = timezoneOffsets;

const CANONICAL_PATTERN = /^(\d{4}):(\d{2}):(\d{2}) (\d{2}):(\d{2}):(\d{2})([+-])(\d{2}):(\d{2})$/;
const EXPLICIT_OFFSET_PATTERN = /^(.*\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:\s?[AaPp][Mm])?)\s*([+-])(\d{2}):?(\d{2})$/;
const ABBREVIATION_PATTERN = /^(.*?)\s*\b([A-Za-z]{2,4})$/;

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

export interface DateTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

interface TimestampFormat {
  name: string;
  pattern: RegExp;
  build: (match: RegExpMatchArray) => DateTimeParts | null;
}

function toInt(value: string | undefined): number {
  return value === undefined ? 0 : Number.parseInt(value, 10);
}

function monthFromName(name: string): number | null {
  return MONTHS[name.slice(0, 3).toLowerCase()] ?? null;
}

function to24Hour(hour: number, meridiem: string): number {
  const upper = meridiem.toUpperCase();

  if (upper === 'AM') {
    return hour === 12 ? 0 : hour;
  }

  return hour === 12 ? 12 : hour + 12;
}

function ymdhms(m: RegExpMatchArray): DateTimeParts {
  return {
    year: toInt(m[1]),
    month: toInt(m[2]),
    day: toInt(m[3]),
    hour: toInt(m[4]),
    minute: toInt(m[5]),
    second: toInt(m[6]),
  };
}

const TIMESTAMP_FORMATS: TimestampFormat[] = [
  {
    name: 'yyyy:MM:dd HH:mm:ss',
    pattern: /^(\d{4}):(\d{2}):(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?$/,
    build: ymdhms,
  },
  {
    name: 'yyyy-MM-dd HH:mm:ss',
    pattern: /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?$/,
    build: ymdhms,
  },
  {
    name: 'yyyy/MM/dd HH:mm:ss',
    pattern: /^(\d{4})\/(\d{2})\/(\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/,
    build: ymdhms,
  },
  {
    name: 'yyyy-MM-dd HH:mm',
    pattern: /^(\d{4})[-:](\d{2})[-:](\d{2})[ T](\d{2}):(\d{2})$/,
    build: ymdhms,
  },
  {
    name: 'yyyyMMdd HHmmss',
    pattern: /^(\d{4})(\d{2})(\d{2})[ _T](\d{2})(\d{2})(\d{2})$/,
    build: ymdhms,
  },
  {
    name: 'dd-MM-yyyy HH:mm:ss',
    pattern: /^(\d{2})-(\d{2})-(\d{4}) (\d{2}):(\d{2}):(\d{2})$/,
    build: (m) => ({
      year: toInt(m[3]),
      month: toInt(m[2]),
      day: toInt(m[1]),
      hour: toInt(m[4]),
      minute: toInt(m[5]),
      second: toInt(m[6]),
    }),
  },
  {
    name: 'MMM d, yyyy, h:mm:ss a',
    pattern: /^([A-Za-z]{3,9})\.? (\d{1,2}), (\d{4}),? (\d{1,2}):(\d{2}):(\d{2}) ?([AaPp][Mm])$/,
    build: (m) => {
      const month = monthFromName(m[1]);

      if (month === null) {
        return null;
      }

      return {
        year: toInt(m[3]),
        month,
        day: toInt(m[2]),
        hour: to24Hour(toInt(m[4]), m[7]),
        minute: toInt(m[5]),
        second: toInt(m[6]),
      };
    },
  },
  {
    name: 'd MMM yyyy, HH:mm:ss',
    pattern: /^(\d{1,2}) ([A-Za-z]{3,9})\.? (\d{4}),? (\d{1,2}):(\d{2}):(\d{2})$/,
    build: (m) => {
      const month = monthFromName(m[2]);

      if (month === null) {
        return null;
      }

      return {
        year: toInt(m[3]),
        month,
        day: toInt(m[1]),
        hour: toInt(m[4]),
        minute: toInt(m[5]),
        second: toInt(m[6]),
      };
    },
  },
  {
    name: 'EEE MMM d HH:mm:ss yyyy',
    pattern: /^[A-Za-z]{3},? ([A-Za-z]{3}) +(\d{1,2}) (\d{2}):(\d{2}):(\d{2}) (\d{4})$/,
    build: (m) => {
      const month = monthFromName(m[1]);

      if (month === null) {
        return null;
      }

      return {
        year: toInt(m[6]),
        month,
        day: toInt(m[2]),
        hour: toInt(m[3]),
        minute: toInt(m[4]),
        second: toInt(m[5]),
      };
    },
  },
  {
    name: 'yyyy:MM:dd',
    pattern: /^(\d{4}):(\d{2}):(\d{2})$/,
    build: ymdhms,
  },
  {
    name: 'yyyy-MM-dd',
    pattern: /^(\d{4})[-/](\d{2})[-/](\d{2})$/,
    build: ymdhms,
  },
  {
    name: 'yyyyMMdd',
    pattern: /^(\d{4})(\d{2})(\d{2})$/,
    build: ymdhms,
  },
  {
    name: 'MMM d, yyyy',
    pattern: /^([A-Za-z]{3,9})\.? (\d{1,2}), (\d{4})$/,
    build: (m) => {
      const month = monthFromName(m[1]);

      if (month === null) {
        return null;
      }

      return { year: toInt(m[3]), month, day: toInt(m[2]), hour: 0, minute: 0, second: 0 };
    },
  },
  {
    name: 'epoch seconds',
    pattern: /^(\d{9,11})(?:\.\d+)?$/,
    build: (m) => {
      const date = new Date(toInt(m[1]) * 1000);

      return {
        year: date.getUTCFullYear(),
        month: date.getUTCMonth() + 1,
        day: date.getUTCDate(),
        hour: date.getUTCHours(),
        minute: date.getUTCMinutes(),
        second: date.getUTCSeconds(),
      };
    },
  },
];

function daysInMonth(year: number, month: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  const days = [31, leap ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

  return days[month - 1];
}

export function isValidDateTime(parts: DateTimeParts): boolean {
  if (parts.month < 1 || parts.month > 12) {
    return false;
  }

  if (parts.day < 1 || parts.day > daysInMonth(parts.year, parts.month)) {
    return false;
  }

  return parts.hour <= 23 && parts.minute <= 59 && parts.second <= 59;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);

  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

export function formatTimestamp(parts: DateTimeParts, offsetMinutes = 0): string {
  const date = `${pad(parts.year, 4)}:${pad(parts.month)}:${pad(parts.day)}`;
  const time = `${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}`;

  return `${date} ${time}${formatOffset(offsetMinutes)}`;
}

function parseOffset(sign: string, hours: string, minutes: string): number | null {
  const h = toInt(hours);
  const m = toInt(minutes);

  if (h > 14 || m > 59) {
    return null;
  }

  const total = h * 60 + m;

  return sign === '-' ? -total : total;
}

interface CleanedTimestamp {
  body: string;
  offsetMinutes: number;
}

function cleanTimestamp(raw: string): CleanedTimestamp {
  let value = raw
    .replace(/[^\x00-\x7F]/g, '')
    .replace(/\s+/g, ' ')
    .trim();

  if (/\d[Zz]$/.test(value)) {
    value = `${value.slice(0, -1)}+00:00`;
  }

  const explicit = EXPLICIT_OFFSET_PATTERN.exec(value);

  if (explicit) {
    const offset = parseOffset(explicit[2], explicit[3], explicit[4]);

    if (offset === null) {
      throw new RecoverableParseError(`Offset out of range in "${raw}"`, raw);
    }

    return { body: explicit[1].trim(), offsetMinutes: offset };
  }

  const abbreviation = ABBREVIATION_PATTERN.exec(value);

  if (abbreviation) {
    const offset = TIMEZONE_OFFSETS[abbreviation[2].toUpperCase()];

    if (offset) {
      const parsed = /^([+-])(\d{2}):(\d{2})$/.exec(offset);

      if (parsed) {
        return {
          body: abbreviation[1].replace(/,$/, '').trim(),
          offsetMinutes: parseOffset(parsed[1], parsed[2], parsed[3]) ?? 0,
        };
      }
    }
  }

  return { body: value, offsetMinutes: 0 };
}

/**
 * Converts a raw timestamp from any source into `yyyy:MM:dd HH:mm:ss±HH:MM`.
 * Values without an offset are taken as UTC. An all-zero year is returned as
 * a canonical string so callers can record it, but it never passes
 * {@link isValidTimestamp}.
 */
export function standardizeTimestamp(raw: string): string {
  const { body, offsetMinutes } = cleanTimestamp(raw);

  if (body === '') {
    throw new RecoverableParseError('Empty timestamp', raw);
  }

  for (const format of TIMESTAMP_FORMATS) {
    const match = body.match(format.pattern);

    if (!match) {
      continue;
    }

    const parts = format.build(match);

    if (!parts) {
      continue;
    }

    if (parts.year === 0) {
      return formatTimestamp({ year: 0, month: 0, day: 0, hour: 0, minute: 0, second: 0 });
    }

    if (!isValidDateTime(parts)) {
      throw new RecoverableParseError(`Date out of range in "${raw}" (${format.name})`, raw);
    }

    return formatTimestamp(parts, offsetMinutes);
  }

  throw new RecoverableParseError(`Unrecognized timestamp format "${raw}"`, raw);
}

export function tryStandardizeTimestamp(raw: string): string | null {
  try {
    return standardizeTimestamp(raw);
  } catch (error) {
    if (error instanceof RecoverableParseError) {
      return null;
    }

    throw error;
  }
}

/**
 * Year 1 is the sentinel year whatever offset it carries.
 */
export function isValidTimestamp(value: string | null | undefined): value is string {
  if (!value || value === INVALID_TIMESTAMP) {
    return false;
  }

  const match = CANONICAL_PATTERN.exec(value);

  if (!match || toInt(match[1]) <= 1) {
    return false;
  }

  return isValidDateTime(ymdhms(match));
}

/**
 * Milliseconds since the epoch for a canonical timestamp, with its offset applied.
 */
export function timestampToInstant(value: string): number {
  const match = CANONICAL_PATTERN.exec(value);

  if (!match) {
    throw new RecoverableParseError(`Not a canonical timestamp "${value}"`, value);
  }

  const date = new Date(0);
  date.setUTCFullYear(toInt(match[1]), toInt(match[2]) - 1, toInt(match[3]));
  date.setUTCHours(toInt(match[4]), toInt(match[5]), toInt(match[6]), 0);

  const offset = parseOffset(match[7], match[8], match[9]) ?? 0;

  return date.getTime() - offset * 60_000;
}

export function compareTimestamps(a: string, b: string): number {
  return timestampToInstant(a) - timestampToInstant(b);
}

export function earliestTimestamp(values: Array<string | null>): string | null {
  let earliest: string | null = null;

  for (const value of values) {
    if (!isValidTimestamp(value)) {
      continue;
    }

    if (earliest === null || compareTimestamps(value, earliest) < 0) {
      earliest = value;
    }
  }

  return earliest;
}
