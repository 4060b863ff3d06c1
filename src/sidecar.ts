import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { geotagCandidate, timestampCandidate } from './candidates.js';
import { RecoverableParseError, describeError } from './errors.js';
import { geotagFromSigned } from './geotag.js';
import type { GeotagCandidate, SidecarGeoData, SidecarRecord, SidecarTime, TimestampCandidate } from './types.js';

const SidecarTimeSchema = z.object({
  timestamp: z.coerce.string().optional(),
  formatted: z.string().optional(),
});

const SidecarGeoDataSchema = z.object({
  latitude: z.number().optional(),
  longitude: z.number().optional(),
  altitude: z.number().optional(),
});

const SidecarObjectSchema = z.record(z.unknown());

const KNOWN_FIELDS = new Set(['title', 'photoTakenTime', 'creationTime', 'geoData', 'geoDataExif']);

function parseField<T>(schema: z.ZodType<T>, value: unknown): T | null {
  if (value === undefined || value === null) {
    return null;
  }

  const result = schema.safeParse(value);
  return result.success ? result.data : null;
}

/**
 * Types the fields the resolver reads and keeps everything else in `extra`.
 * A malformed known field is treated as absent rather than failing the record.
 */
export function parseSidecar(path: string, raw: unknown): SidecarRecord {
  const result = SidecarObjectSchema.safeParse(raw);

  if (!result.success) {
    throw new RecoverableParseError(`Sidecar ${path} is not a JSON object`, path);
  }

  const data = result.data;
  const extra: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (!KNOWN_FIELDS.has(key)) {
      extra[key] = value;
    }
  }

  return {
    path,
    title: typeof data.title === 'string' ? data.title : null,
    photoTakenTime: parseField<SidecarTime>(SidecarTimeSchema, data.photoTakenTime),
    creationTime: parseField<SidecarTime>(SidecarTimeSchema, data.creationTime),
    geoData: parseField<SidecarGeoData>(SidecarGeoDataSchema, data.geoData),
    geoDataExif: parseField<SidecarGeoData>(SidecarGeoDataSchema, data.geoDataExif),
    extra,
  };
}

export async function readSidecar(path: string): Promise<SidecarRecord> {
  const text = await readFile(path, 'utf-8');
  let raw: unknown;

  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new RecoverableParseError(`Sidecar ${path} is not valid JSON: ${describeError(error)}`, path);
  }

  return parseSidecar(path, raw);
}

export async function readSidecarTitle(path: string): Promise<string | null> {
  try {
    const record = await readSidecar(path);
    return record.title;
  } catch (error) {
    if (error instanceof RecoverableParseError) {
      return null;
    }

    throw error;
  }
}

function timeCandidate(field: string, time: SidecarTime | null): TimestampCandidate | null {
  if (!time) {
    return null;
  }

  if (time.timestamp !== undefined && time.timestamp !== '') {
    return timestampCandidate('json', `${field}.timestamp`, time.timestamp);
  }

  if (time.formatted !== undefined && time.formatted !== '') {
    return timestampCandidate('json', `${field}.formatted`, time.formatted);
  }

  return null;
}

export function sidecarTimestampCandidates(record: SidecarRecord): TimestampCandidate[] {
  const candidates = [
    timeCandidate('photoTakenTime', record.photoTakenTime),
    timeCandidate('creationTime', record.creationTime),
  ];

  return candidates.filter((candidate): candidate is TimestampCandidate => candidate !== null);
}

function geoCandidate(field: string, geo: SidecarGeoData | null): GeotagCandidate | null {
  if (!geo || geo.latitude === undefined || geo.longitude === undefined) {
    return null;
  }

  const { latitude, longitude } = geo;
  const rawValue = `${latitude}, ${longitude}`;

  if (latitude === 0 && longitude === 0) {
    return { source: 'json', field, rawValue, parsedValue: null, isValid: false, reason: 'no location' };
  }

  return geotagCandidate('json', field, rawValue, () => geotagFromSigned(latitude, longitude));
}

/**
 * `geoData` first, then `geoDataExif`. Exports write 0.0/0.0 when a photo has
 * no location, so that pair never counts as a position.
 */
export function sidecarGeotagCandidates(record: SidecarRecord): GeotagCandidate[] {
  const candidates = [geoCandidate('geoData', record.geoData), geoCandidate('geoDataExif', record.geoDataExif)];

  return candidates.filter((candidate): candidate is GeotagCandidate => candidate !== null);
}
