export type LatitudeRef = 'N' | 'S';
export type LongitudeRef = 'E' | 'W';

export interface Geotag {
  latitude: number;
  latitudeRef: LatitudeRef;
  longitude: number;
  longitudeRef: LongitudeRef;
}

export type CandidateSource = 'filename' | 'exif' | 'json' | 'probe';

export type CandidateKind = 'timestamp' | 'geotag';

export interface ProvenanceEntry {
  kind: CandidateKind;
  source: CandidateSource;
  field: string;
  rawValue: string;
  parsedValue: string | null;
  accepted: boolean;
  reason?: string;
}

export interface TimestampCandidate {
  source: CandidateSource;
  field: string;
  rawValue: string;
  parsedValue: string | null;
  isValid: boolean;
  reason?: string;
}

export interface GeotagCandidate {
  source: CandidateSource;
  field: string;
  rawValue: string;
  parsedValue: Geotag | null;
  isValid: boolean;
  reason?: string;
}

export type MatchTier =
  | 'Exact'
  | 'SuffixStripped'
  | 'CopiedFromSibling'
  | 'TruncatedNameHeuristic'
  | 'TitleLookup'
  | 'Unmatched';

export interface MatchPair {
  mediaPath: string;
  sidecarPath: string | null;
  tier: MatchTier;
  copiedFrom?: string;
}

export interface SidecarRename {
  from: string;
  to: string;
}

export interface SidecarCopy {
  from: string;
  to: string;
}

export interface DirectoryReport {
  directory: string;
  files: string[];
}

export interface MatchResult {
  pairs: MatchPair[];
  renames: SidecarRename[];
  copies: SidecarCopy[];
  junkDirectories: DirectoryReport[];
  leftovers: DirectoryReport[];
  orphanedSidecars: string[];
}

export interface SidecarTime {
  timestamp?: string;
  formatted?: string;
}

export interface SidecarGeoData {
  latitude?: number;
  longitude?: number;
  altitude?: number;
}

export interface SidecarRecord {
  path: string;
  title: string | null;
  photoTakenTime: SidecarTime | null;
  creationTime: SidecarTime | null;
  geoData: SidecarGeoData | null;
  geoDataExif: SidecarGeoData | null;
  extra: Record<string, unknown>;
}

export interface LedgerEntry {
  name: string;
  extension: string;
  size: number | null;
  matchTier: MatchTier;
  sidecarPath: string | null;
  timestamp: string | null;
  geotag: Geotag | null;
  provenance: ProvenanceEntry[];
  resolvedAt: string | null;
}

export type LedgerData = Record<string, LedgerEntry>;

export type SidecarDisposal = 'trash' | 'delete' | 'keep';

export interface Config {
  rootDirectory: string;
  dataDirectory: string;
  tools: {
    exiftool: string;
    ffprobe: string;
    ffmpeg: string;
  };
  matcher: MatcherOptions;
  resolver: {
    workers: number;
    retryAttempts: number;
    retryBackoffMs: number;
    embed: boolean;
    ledgerFlushEvery: number;
  };
  clustering: ClusteringThresholds;
  sidecarDisposal: SidecarDisposal;
}

export interface MatcherOptions {
  sidecarSuffix: string;
  truncationGroupLength: number;
  truncationMargin: number;
}

export interface ClusteringThresholds {
  timeThresholdSeconds: number;
  locationThresholdKm: number;
}

export interface RelationshipStatistics {
  total_files: number;
  files_with_timestamp: number;
  files_with_geotag: number;
  T_prime_pairs_detected: number;
  L_prime_pairs_detected: number;
  E_prime_pairs_detected: number;
  T_prime_sets: number;
  L_prime_sets: number;
  E_prime_sets: number;
}

export interface RelationshipSets {
  file_index: Record<string, string>;
  T_prime: number[][];
  L_prime: number[][];
  E_prime: number[][];
  thresholds: {
    time_seconds: number;
    location_km: number;
  };
  statistics: RelationshipStatistics;
  extracted_at: string;
}
