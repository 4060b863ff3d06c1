import { basename, extname } from 'node:path';
import { geotagCandidate, timestampCandidate } from './candidates.js';
import { standardizeGeotag } from './geotag.js';
import type { GeotagCandidate, TimestampCandidate } from './types.js';

interface FilenamePattern {
  format: string;
  pattern: RegExp;
  toRaw: (match: RegExpMatchArray) => string;
}

const colons = (value: string): string => value.replace(/[-_]/g, ':');

function dayFirst(date: string): string {
  const [day, month, year] = date.split('-');
  return `${year}:${month}:${day}`;
}

function dashedDate(date: string): string {
  return /^(19|20)/.test(date) ? colons(date) : dayFirst(date);
}

const FILENAME_PATTERNS: FilenamePattern[] = [
  {
    format: 'yyyy-MM-dd_HH-mm-ss_-N',
    pattern: /(\d{4}-\d{2}-\d{2})_(\d{2}-\d{2}-\d{2})_-\d+/,
    toRaw: (m) => `${dashedDate(m[1])} ${colons(m[2])}`,
  },
  {
    format: 'yyyy-MM-dd_HH-mm-ss',
    pattern: /(\d{4}-\d{2}-\d{2})_(\d{2}-\d{2}-\d{2})/,
    toRaw: (m) => `${dashedDate(m[1])} ${colons(m[2])}`,
  },
  {
    format: 'dd-MM-yyyy@HH-mm-ss',
    pattern: /(\d{2}-\d{2}-\d{4})@(\d{2}-\d{2}-\d{2})/,
    toRaw: (m) => `${dayFirst(m[1])} ${colons(m[2])}`,
  },
  {
    format: 'yyyy_MMdd_HHmmss',
    pattern: /(\d{4})_(\d{2})(\d{2})_(\d{6})/,
    toRaw: (m) => `${m[1]}${m[2]}${m[3]} ${m[4]}`,
  },
  {
    format: 'yyyyMMdd_HHmmss-suffix',
    pattern: /(\d{8})_(\d{6})-\w+/,
    toRaw: (m) => `${m[1]} ${m[2]}`,
  },
  {
    format: 'yyyyMMdd_HHmmss',
    pattern: /(\d{8})_(\d{6})/,
    toRaw: (m) => `${m[1]} ${m[2]}`,
  },
  {
    format: 'yyyyMMdd',
    pattern: /(\d{8})/,
    toRaw: (m) => m[1],
  },
  {
    format: 'yyyy-MM-dd(N)',
    pattern: /(\d{4}-\d{2}-\d{2})\(\d+\)/,
    toRaw: (m) => dashedDate(m[1]),
  },
  {
    format: 'MMM d, yyyy, h:mm:ssAM',
    pattern: /([A-Za-z]{3} \d{1,2}, \d{4}), (\d{1,2}:\d{2}:\d{2}(?:AM|PM))/,
    toRaw: (m) => `${m[1]}, ${m[2]}`,
  },
  {
    format: 'yyyyMMdd HH:mm:ss',
    pattern: /(\d{8}) (\d{2}:\d{2}:\d{2})/,
    toRaw: (m) => `${m[1]} ${m[2]}`,
  },
  {
    format: 'yyyy-MM-dd HH:mm:ss.fff',
    pattern: /(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2}\.\d{3})/,
    toRaw: (m) => `${m[1]} ${m[2]}`,
  },
  {
    format: '@dd-MM-yyyy_HH-mm-ss',
    pattern: /@(\d{2}-\d{2}-\d{4})_(\d{2}-\d{2}-\d{2})/,
    toRaw: (m) => `${dayFirst(m[1])} ${colons(m[2])}`,
  },
  {
    format: 'yyyy:MM:dd HH:mm:ss',
    pattern: /(\d{4}:\d{2}:\d{2}) (\d{2}:\d{2}:\d{2}(?:\.\d{1,3})?(?:[+-]\d{2}:\d{2})?)/,
    toRaw: (m) => `${m[1]} ${m[2]}`,
  },
  {
    format: 'prefix_yyyyMMdd_HHmmss',
    pattern: /[A-Za-z]+_(\d{8})_(\d{6})/,
    toRaw: (m) => `${m[1]} ${m[2]}`,
  },
  {
    format: '_dd-MM-yyyy_HH-mm-ss',
    pattern: /_(\d{2}-\d{2}-\d{4})_(\d{2}-\d{2}-\d{2})/,
    toRaw: (m) => `${dayFirst(m[1])} ${colons(m[2])}`,
  },
];

function stem(filePath: string): string {
  return basename(filePath, extname(filePath));
}

const FILENAME_POSITION_PATTERN = /([+-]\d{1,2}\.\d+[+-]\d{1,3}\.\d+)/;

/**
 * Reads a capture time out of a file name, extension excluded. Only the
 * first pattern that matches is used; if it names an impossible date the
 * candidate comes back invalid instead of falling through to a looser pattern.
 */
export function extractFilenameTimestamp(filePath: string): TimestampCandidate | null {
  const name = stem(filePath);

  for (const { format, pattern, toRaw } of FILENAME_PATTERNS) {
    const match = name.match(pattern);

    if (match) {
      return { ...timestampCandidate('filename', format, toRaw(match)), rawValue: match[0] };
    }
  }

  return null;
}

export function extractFilenameGeotag(filePath: string): GeotagCandidate | null {
  const match = stem(filePath).match(FILENAME_POSITION_PATTERN);

  if (!match) {
    return null;
  }

  const position = match[1];

  return geotagCandidate('filename', 'ISO 6709', position, () => standardizeGeotag(position));
}
