import { RecoverableParseError } from './errors.js';
import type { Geotag, LatitudeRef, LongitudeRef } from './types.js';

export const ABSENT_GEOTAG = '200,M,200,M';
export const EARTH_RADIUS_KM = 6371;

type Axis = 'latitude' | 'longitude';

const AXIS_LIMIT: Record<Axis, number> = { latitude: 90, longitude: 180 };
const AXIS_REFS: Record<Axis, { positive: string; negative: string }> = {
  latitude: { positive: 'N', negative: 'S' },
  longitude: { positive: 'E', negative: 'W' },
};

const DECIMAL_PATTERN = /^([+-]?)(\d+(?:\.\d+)?)$/;
const DMS_PATTERN = /^([+-]?)(\d+(?:\.\d+)?)\s*(?:deg|°)\s*(?:(\d+(?:\.\d+)?)\s*['′]?\s*)?(?:(\d+(?:\.\d+)?)\s*(?:"|''|″)?)?$/i;
const ISO6709_PATTERN = /^([+-]\d{1,2}(?:\.\d+)?)([+-]\d{1,3}(?:\.\d+)?)(?:[+-]\d+(?:\.\d+)?)?(?:CRS[A-Z0-9_]+)?\/?$/;
const CANONICAL_PATTERN = /^(-?\d+(?:\.\d+)?),([NS]),(-?\d+(?:\.\d+)?),([EW])$/;

function roundCoordinate(value: number): number {
  return Math.round(value * 1e8) / 1e8;
}

function splitReference(raw: string, axis: Axis): { body: string; ref: string | null } {
  const refs = AXIS_REFS[axis];
  const letters = `${refs.positive}${refs.negative}`;
  const suffix = new RegExp(`^(.*?)\\s*([${letters}])$`, 'i').exec(raw);

  if (suffix) {
    return { body: suffix[1].trim(), ref: suffix[2].toUpperCase() };
  }

  const prefix = new RegExp(`^([${letters}])\\s*(.*)$`, 'i').exec(raw);

  if (prefix) {
    return { body: prefix[2].trim(), ref: prefix[1].toUpperCase() };
  }

  return { body: raw, ref: null };
}

function applyReference(
  raw: string,
  sign: string,
  magnitude: number,
  ref: string | null,
  axis: Axis
): number {
  const refs = AXIS_REFS[axis];

  if (ref === null) {
    return sign === '-' ? -magnitude : magnitude;
  }

  if (ref !== refs.positive && ref !== refs.negative) {
    throw new RecoverableParseError(`Invalid ${axis} reference "${ref}" for "${raw}"`, raw);
  }

  const negativeRef = ref === refs.negative;

  if ((sign === '-' && !negativeRef) || (sign === '+' && negativeRef)) {
    throw new RecoverableParseError(`Sign of ${axis} "${raw}" contradicts reference ${ref}`, raw);
  }

  return negativeRef ? -magnitude : magnitude;
}

/**
 * Parses one latitude or longitude into signed decimal degrees.
 *
 * A reference may be embedded in the value (`12.3 N`, `S 12.3`) or passed
 * separately, as the discrete EXIF fields do. An explicit sign that contradicts
 * the reference is rejected rather than corrected.
 */
export function parseCoordinate(raw: string | number, axis: Axis, externalRef: string | null = null): number {
  const text = String(raw).replace(/\s+/g, ' ').trim();
  const split = splitReference(text, axis);

  if (split.ref !== null && externalRef !== null && split.ref !== externalRef.trim().toUpperCase()) {
    throw new RecoverableParseError(`Conflicting ${axis} references in "${text}" and "${externalRef}"`, text);
  }

  const ref = split.ref ?? (externalRef ? externalRef.trim().toUpperCase() : null);
  let sign = '';
  let magnitude: number;

  const decimal = DECIMAL_PATTERN.exec(split.body);
  const dms = decimal ? null : DMS_PATTERN.exec(split.body);

  if (decimal) {
    sign = decimal[1];
    magnitude = Number.parseFloat(decimal[2]);
  } else if (dms) {
    const minutes = dms[3] ? Number.parseFloat(dms[3]) : 0;
    const seconds = dms[4] ? Number.parseFloat(dms[4]) : 0;

    if (minutes >= 60 || seconds >= 60) {
      throw new RecoverableParseError(`Minutes or seconds out of range in "${text}"`, text);
    }

    sign = dms[1];
    magnitude = Number.parseFloat(dms[2]) + minutes / 60 + seconds / 3600;
  } else {
    throw new RecoverableParseError(`Unrecognized ${axis} format "${text}"`, text);
  }

  if (magnitude > AXIS_LIMIT[axis]) {
    throw new RecoverableParseError(`${axis} ${text} exceeds ±${AXIS_LIMIT[axis]}`, text);
  }

  return roundCoordinate(applyReference(text, sign, magnitude, ref, axis));
}

export function geotagFromSigned(latitude: number, longitude: number): Geotag {
  if (!Number.isFinite(latitude) || Math.abs(latitude) > 90) {
    throw new RecoverableParseError(`Latitude ${latitude} out of range`, String(latitude));
  }

  if (!Number.isFinite(longitude) || Math.abs(longitude) > 180) {
    throw new RecoverableParseError(`Longitude ${longitude} out of range`, String(longitude));
  }

  const latitudeRef: LatitudeRef = latitude < 0 ? 'S' : 'N';
  const longitudeRef: LongitudeRef = longitude < 0 ? 'W' : 'E';

  return {
    latitude: roundCoordinate(Math.abs(latitude)),
    latitudeRef,
    longitude: roundCoordinate(Math.abs(longitude)),
    longitudeRef,
  };
}

/**
 * Builds a geotag from the four discrete fields (value and reference per axis).
 */
export function geotagFromParts(
  latitude: string | number,
  latitudeRef: string | null,
  longitude: string | number,
  longitudeRef: string | null
): Geotag {
  return geotagFromSigned(
    parseCoordinate(latitude, 'latitude', latitudeRef),
    parseCoordinate(longitude, 'longitude', longitudeRef)
  );
}

function splitPosition(text: string): [string, string] | null {
  const commaParts = text.split(',').map((part) => part.trim());

  if (commaParts.length === 2) {
    return [commaParts[0], commaParts[1]];
  }

  if (commaParts.length === 1) {
    const tokens = text.split(' ');

    if (tokens.length === 2) {
      return [tokens[0], tokens[1]];
    }

    const cardinal = /^(.*?[NS])\s+(.*[EW])$/i.exec(text);

    if (cardinal) {
      return [cardinal[1].trim(), cardinal[2].trim()];
    }
  }

  return null;
}

/**
 * Parses a combined position string into a geotag. Returns null for the
 * absent sentinel and throws {@link RecoverableParseError} for anything else
 * that cannot be read.
 */
export function standardizeGeotag(raw: string): Geotag | null {
  const text = raw.replace(/\s+/g, ' ').trim();

  if (text === '' || text.replace(/\s/g, '') === ABSENT_GEOTAG) {
    return null;
  }

  const canonical = CANONICAL_PATTERN.exec(text.replace(/\s/g, ''));

  if (canonical) {
    return geotagFromParts(canonical[1], canonical[2], canonical[3], canonical[4]);
  }

  const iso = ISO6709_PATTERN.exec(text.replace(/\s/g, ''));

  if (iso) {
    return geotagFromSigned(
      parseCoordinate(iso[1], 'latitude'),
      parseCoordinate(iso[2], 'longitude')
    );
  }

  const parts = splitPosition(text);

  if (!parts) {
    throw new RecoverableParseError(`Unrecognized position format "${text}"`, text);
  }

  return geotagFromSigned(parseCoordinate(parts[0], 'latitude'), parseCoordinate(parts[1], 'longitude'));
}

export function formatGeotag(geotag: Geotag | null): string {
  if (!geotag) {
    return ABSENT_GEOTAG;
  }

  return `${geotag.latitude},${geotag.latitudeRef},${geotag.longitude},${geotag.longitudeRef}`;
}

export function signedLatitude(geotag: Geotag): number {
  return geotag.latitudeRef === 'S' ? -geotag.latitude : geotag.latitude;
}

export function signedLongitude(geotag: Geotag): number {
  return geotag.longitudeRef === 'W' ? -geotag.longitude : geotag.longitude;
}

export function isValidGeotag(geotag: Geotag | null | undefined): geotag is Geotag {
  if (!geotag) {
    return false;
  }

  return (
    Number.isFinite(geotag.latitude) &&
    Number.isFinite(geotag.longitude) &&
    geotag.latitude >= 0 &&
    geotag.latitude <= 90 &&
    geotag.longitude >= 0 &&
    geotag.longitude <= 180
  );
}

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function haversineKm(a: Geotag, b: Geotag): number {
  const lat1 = toRadians(signedLatitude(a));
  const lat2 = toRadians(signedLatitude(b));
  const dLat = lat2 - lat1;
  const dLon = toRadians(signedLongitude(b) - signedLongitude(a));

  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;

  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}
