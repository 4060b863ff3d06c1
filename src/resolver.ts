import { geotagCandidate, timestampCandidate } from './candidates.js';
import { ConflictingGeotagError, RecoverableParseError, describeError } from './errors.js';
import type { MetadataExtractor } from './extractor.js';
import { formatGeotag, geotagFromParts, standardizeGeotag } from './geotag.js';
import { LogBuffer } from './logger.js';
import { GPS_FIELDS, timestampFields } from './metadata.js';
import { extractFilenameGeotag, extractFilenameTimestamp } from './parser.js';
import { readSidecar, sidecarGeotagCandidates, sidecarTimestampCandidates } from './sidecar.js';
import { compareTimestamps } from './timestamp.js';
import type { MetadataEmbedder } from './writer.js';
import type {
  CandidateSource,
  Geotag,
  GeotagCandidate,
  ProvenanceEntry,
  SidecarRecord,
  TimestampCandidate,
} from './types.js';

export interface ResolverDependencies {
  extractor: MetadataExtractor;
  embedder?: MetadataEmbedder;
}

export interface FileResolution {
  timestamp: string | null;
  geotag: Geotag | null;
  provenance: ProvenanceEntry[];
  geotagConflict: boolean;
  embedded: boolean;
  sidecarRead: boolean;
}

export interface Selection<T> {
  value: T | null;
  provenance: ProvenanceEntry[];
}

/**
 * The earliest valid timestamp wins. Later values are usually re-saves or
 * export times.
 */
export function selectTimestamp(candidates: TimestampCandidate[]): Selection<string> {
  let winner: TimestampCandidate | null = null;

  for (const candidate of candidates) {
    if (!candidate.isValid || candidate.parsedValue === null) {
      continue;
    }

    if (winner === null || winner.parsedValue === null || compareTimestamps(candidate.parsedValue, winner.parsedValue) < 0) {
      winner = candidate;
    }
  }

  const provenance = candidates.map((candidate): ProvenanceEntry => {
    const accepted = candidate === winner;
    let reason = candidate.reason;

    if (!accepted && candidate.isValid && winner) {
      reason = `later than ${winner.source} ${winner.field}`;
    }

    return {
      kind: 'timestamp',
      source: candidate.source,
      field: candidate.field,
      rawValue: candidate.rawValue,
      parsedValue: candidate.parsedValue,
      accepted,
      ...(reason === undefined ? {} : { reason }),
    };
  });

  return { value: winner?.parsedValue ?? null, provenance };
}

/**
 * Candidates arrive in priority order; the first valid one wins and values
 * from different sources are never blended.
 */
export function selectGeotag(candidates: GeotagCandidate[]): Selection<Geotag> {
  const winner = candidates.find((candidate) => candidate.isValid && candidate.parsedValue !== null) ?? null;

  const provenance = candidates.map((candidate): ProvenanceEntry => {
    const accepted = candidate === winner;
    let reason = candidate.reason;

    if (!accepted && candidate.isValid && winner) {
      reason = `lower priority than ${winner.source} ${winner.field}`;
    }

    return {
      kind: 'geotag',
      source: candidate.source,
      field: candidate.field,
      rawValue: candidate.rawValue,
      parsedValue: candidate.parsedValue ? formatGeotag(candidate.parsedValue) : null,
      accepted,
      ...(reason === undefined ? {} : { reason }),
    };
  });

  return { value: winner?.parsedValue ?? null, provenance };
}

export function embeddedTimestampCandidates(
  source: CandidateSource,
  fields: string[],
  values: Record<string, string>
): TimestampCandidate[] {
  return fields
    .filter((field) => values[field] !== undefined)
    .map((field) => timestampCandidate(source, field, values[field]));
}

/**
 * GPS from embedded metadata may come as one position string, as four
 * discrete fields, or both. When both parse they must agree exactly.
 */
export function embeddedGeotagCandidates(
  file: string,
  source: CandidateSource,
  values: Record<string, string>
): GeotagCandidate[] {
  const candidates: GeotagCandidate[] = [];
  const position = values.GPSPosition;

  if (position !== undefined) {
    candidates.push(geotagCandidate(source, 'GPSPosition', position, () => standardizeGeotag(position)));
  }

  const { GPSLatitude: latitude, GPSLongitude: longitude } = values;

  if (latitude !== undefined && longitude !== undefined) {
    const latitudeRef = values.GPSLatitudeRef ?? null;
    const longitudeRef = values.GPSLongitudeRef ?? null;
    const rawValue = [latitude, latitudeRef ?? '', longitude, longitudeRef ?? ''].join(',');

    candidates.push(
      geotagCandidate(source, 'GPSLatitude/GPSLongitude', rawValue, () =>
        geotagFromParts(latitude, latitudeRef, longitude, longitudeRef)
      )
    );
  }

  const [combined, discrete] = candidates;

  if (
    combined?.parsedValue &&
    discrete?.parsedValue &&
    formatGeotag(combined.parsedValue) !== formatGeotag(discrete.parsedValue)
  ) {
    throw new ConflictingGeotagError(file, formatGeotag(combined.parsedValue), formatGeotag(discrete.parsedValue));
  }

  return candidates;
}

async function loadSidecar(path: string | null, log: LogBuffer, file: string): Promise<SidecarRecord | null> {
  if (path === null) {
    return null;
  }

  try {
    return await readSidecar(path);
  } catch (error) {
    if (error instanceof RecoverableParseError || (error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      log.warn(`Sidecar unusable: ${describeError(error)}`, file);
      return null;
    }

    throw error;
  }
}

/**
 * Picks one timestamp and one geotag for a media file from its name, its
 * sidecar and its embedded metadata, then writes them back when an embedder
 * is given. Every candidate ends up in the provenance list.
 */
export async function resolveMediaFile(
  file: string,
  sidecarPath: string | null,
  deps: ResolverDependencies,
  log: LogBuffer
): Promise<FileResolution> {
  const sidecar = await loadSidecar(sidecarPath, log, file);
  const fields = timestampFields(file);
  const extraction = await deps.extractor.extract(file, [...fields, ...GPS_FIELDS], log);

  const filenameTimestamp = extractFilenameTimestamp(file);
  const timestampCandidates: TimestampCandidate[] = [
    ...(filenameTimestamp ? [filenameTimestamp] : []),
    ...(sidecar ? sidecarTimestampCandidates(sidecar) : []),
    ...embeddedTimestampCandidates(extraction.source, fields, extraction.values),
  ];
  const timestamp = selectTimestamp(timestampCandidates);

  let geotag: Selection<Geotag> = { value: null, provenance: [] };
  let geotagConflict = false;

  try {
    const filenameGeotag = extractFilenameGeotag(file);

    geotag = selectGeotag([
      ...embeddedGeotagCandidates(file, extraction.source, extraction.values),
      ...(sidecar ? sidecarGeotagCandidates(sidecar) : []),
      ...(filenameGeotag ? [filenameGeotag] : []),
    ]);
  } catch (error) {
    if (!(error instanceof ConflictingGeotagError)) {
      throw error;
    }

    geotagConflict = true;
    geotag.provenance.push({
      kind: 'geotag',
      source: extraction.source,
      field: 'GPSPosition',
      rawValue: error.position,
      parsedValue: null,
      accepted: false,
      reason: error.message,
    });
    log.error(error.message, file);
  }

  const resolution = { timestamp: timestamp.value, geotag: geotag.value };
  let embedded = false;

  if (deps.embedder && (resolution.timestamp || resolution.geotag)) {
    try {
      embedded = await deps.embedder.embed(file, resolution, log);
    } catch (error) {
      log.warn(`${deps.embedder.name} could not embed: ${describeError(error)}`, file);
    }
  }

  log.info(
    `timestamp ${resolution.timestamp ?? 'unresolved'}, geotag ${resolution.geotag ? formatGeotag(resolution.geotag) : 'unresolved'}`,
    file
  );

  return {
    ...resolution,
    provenance: [...timestamp.provenance, ...geotag.provenance],
    geotagConflict,
    embedded,
    sidecarRead: sidecar !== null,
  };
}
