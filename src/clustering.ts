import { EARTH_RADIUS_KM, haversineKm, isValidGeotag, signedLatitude } from './geotag.js';
import { isValidTimestamp, timestampToInstant } from './timestamp.js';
import { UnionFind } from './union-find.js';
import type { ClusteringThresholds, Geotag, LedgerEntry, RelationshipSets } from './types.js';

export interface ClusterInput {
  path: string;
  timestamp: string | null;
  geotag: Geotag | null;
}

interface IndexedFile {
  index: number;
  instant: number | null;
  geotag: Geotag | null;
}

function linkTimePairs(
  files: IndexedFile[],
  thresholds: ClusteringThresholds,
  temporal: UnionFind,
  events: UnionFind
): { timePairs: number; eventPairs: number } {
  const timed = files
    .filter((file): file is IndexedFile & { instant: number } => file.instant !== null)
    .sort((a, b) => a.instant - b.instant || a.index - b.index);
  const limit = thresholds.timeThresholdSeconds * 1000;
  let timePairs = 0;
  let eventPairs = 0;

  for (let i = 0; i < timed.length; i++) {
    for (let j = i + 1; j < timed.length && timed[j].instant - timed[i].instant <= limit; j++) {
      temporal.union(timed[i].index, timed[j].index);
      timePairs++;

      const geoA = timed[i].geotag;
      const geoB = timed[j].geotag;

      if (geoA && geoB && haversineKm(geoA, geoB) <= thresholds.locationThresholdKm) {
        events.union(timed[i].index, timed[j].index);
        eventPairs++;
      }
    }
  }

  return { timePairs, eventPairs };
}

/**
 * Sweeps files ordered by latitude. The north-south distance alone is a lower
 * bound on the great-circle distance, so the inner loop stops once it exceeds
 * the threshold.
 */
function linkLocationPairs(files: IndexedFile[], thresholdKm: number, spatial: UnionFind): number {
  const located = files
    .filter((file): file is IndexedFile & { geotag: Geotag } => file.geotag !== null)
    .map((file) => ({ ...file, latitude: (signedLatitude(file.geotag) * Math.PI) / 180 }))
    .sort((a, b) => a.latitude - b.latitude || a.index - b.index);
  let pairs = 0;

  for (let i = 0; i < located.length; i++) {
    for (let j = i + 1; j < located.length; j++) {
      if (EARTH_RADIUS_KM * (located[j].latitude - located[i].latitude) > thresholdKm) {
        break;
      }

      if (haversineKm(located[i].geotag, located[j].geotag) <= thresholdKm) {
        spatial.union(located[i].index, located[j].index);
        pairs++;
      }
    }
  }

  return pairs;
}

/**
 * Builds the T′, L′ and E′ partitions. Pairs are unioned as the sweeps find
 * them and only counted, never stored. E′ links only pairs that are within
 * both thresholds directly, so a chain through files that meet just one of
 * the two never merges events.
 */
export function extractRelationships(
  inputs: ClusterInput[],
  thresholds: ClusteringThresholds,
  extractedAt = new Date()
): RelationshipSets {
  const fileIndex: Record<string, string> = {};
  const files: IndexedFile[] = [];

  for (const input of inputs) {
    const instant = isValidTimestamp(input.timestamp) ? timestampToInstant(input.timestamp) : null;
    const geotag = isValidGeotag(input.geotag) ? input.geotag : null;

    if (instant === null && geotag === null) {
      continue;
    }

    fileIndex[String(files.length)] = input.path;
    files.push({ index: files.length, instant, geotag });
  }

  const temporal = new UnionFind(files.length);
  const spatial = new UnionFind(files.length);
  const events = new UnionFind(files.length);

  const { timePairs, eventPairs } = linkTimePairs(files, thresholds, temporal, events);
  const locationPairs = linkLocationPairs(files, thresholds.locationThresholdKm, spatial);

  const tSets = temporal.sets();
  const lSets = spatial.sets();
  const eSets = events.sets();

  return {
    file_index: fileIndex,
    T_prime: tSets,
    L_prime: lSets,
    E_prime: eSets,
    thresholds: {
      time_seconds: thresholds.timeThresholdSeconds,
      location_km: thresholds.locationThresholdKm,
    },
    statistics: {
      total_files: files.length,
      files_with_timestamp: files.filter((file) => file.instant !== null).length,
      files_with_geotag: files.filter((file) => file.geotag !== null).length,
      T_prime_pairs_detected: timePairs,
      L_prime_pairs_detected: locationPairs,
      E_prime_pairs_detected: eventPairs,
      T_prime_sets: tSets.length,
      L_prime_sets: lSets.length,
      E_prime_sets: eSets.length,
    },
    extracted_at: extractedAt.toISOString(),
  };
}

export function clusterInputsFromLedger(entries: Array<[string, LedgerEntry]>): ClusterInput[] {
  return entries.map(([path, entry]) => ({ path, timestamp: entry.timestamp, geotag: entry.geotag }));
}
