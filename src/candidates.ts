import { RecoverableParseError } from './errors.js';
import { isValidGeotag } from './geotag.js';
import { isValidTimestamp, standardizeTimestamp } from './timestamp.js';
import type { CandidateSource, Geotag, GeotagCandidate, TimestampCandidate } from './types.js';

export function timestampCandidate(
  source: CandidateSource,
  field: string,
  rawValue: string
): TimestampCandidate {
  try {
    const parsedValue = standardizeTimestamp(rawValue);
    const isValid = isValidTimestamp(parsedValue);

    return {
      source,
      field,
      rawValue,
      parsedValue,
      isValid,
      ...(isValid ? {} : { reason: 'placeholder date' }),
    };
  } catch (error) {
    if (!(error instanceof RecoverableParseError)) {
      throw error;
    }

    return { source, field, rawValue, parsedValue: null, isValid: false, reason: error.message };
  }
}

export function geotagCandidate(
  source: CandidateSource,
  field: string,
  rawValue: string,
  parse: () => Geotag | null
): GeotagCandidate {
  try {
    const parsedValue = parse();

    if (!isValidGeotag(parsedValue)) {
      return { source, field, rawValue, parsedValue: null, isValid: false, reason: 'no location' };
    }

    return { source, field, rawValue, parsedValue, isValid: true };
  } catch (error) {
    if (!(error instanceof RecoverableParseError)) {
      throw error;
    }

    return { source, field, rawValue, parsedValue: null, isValid: false, reason: error.message };
  }
}
