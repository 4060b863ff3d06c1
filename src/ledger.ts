import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, extname } from 'node:path';
import { z } from 'zod';
import { LedgerCorruptError, LedgerWriteFailure } from './errors.js';
import type { LedgerData, LedgerEntry, MatchPair } from './types.js';

export type Serializer = (data: unknown) => string;

const defaultSerializer: Serializer = (data) => JSON.stringify(data, null, 2);

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => next);

    await previous;

    try {
      return await task();
    } finally {
      release();
    }
  }
}

/**
 * Writes JSON next to the target, re-reads and parses it, then renames it
 * into place. The target is left untouched if any step fails.
 */
export async function writeJsonAtomic(
  path: string,
  data: unknown,
  serialize: Serializer = defaultSerializer
): Promise<void> {
  const tempPath = `${path}.${process.pid}.tmp`;

  try {
    const text = serialize(data);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, text);
    JSON.parse(await readFile(tempPath, 'utf-8'));
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new LedgerWriteFailure(path, error);
  }
}

const GeotagSchema = z.object({
  latitude: z.number(),
  latitudeRef: z.enum(['N', 'S']),
  longitude: z.number(),
  longitudeRef: z.enum(['E', 'W']),
});

const ProvenanceEntrySchema = z.object({
  kind: z.enum(['timestamp', 'geotag']),
  source: z.enum(['filename', 'exif', 'json', 'probe']),
  field: z.string(),
  rawValue: z.string(),
  parsedValue: z.string().nullable(),
  accepted: z.boolean(),
  reason: z.string().optional(),
});

const LedgerEntrySchema = z.object({
  name: z.string(),
  extension: z.string(),
  size: z.number().nullable(),
  matchTier: z.enum(['Exact', 'SuffixStripped', 'CopiedFromSibling', 'TruncatedNameHeuristic', 'TitleLookup', 'Unmatched']),
  sidecarPath: z.string().nullable(),
  timestamp: z.string().nullable(),
  geotag: GeotagSchema.nullable(),
  provenance: z.array(ProvenanceEntrySchema),
  resolvedAt: z.string().nullable(),
});

const LedgerSchema = z.record(LedgerEntrySchema);

export interface LedgerOptions {
  serialize?: Serializer;
}

/**
 * Match and resolution state keyed by absolute media path. Reads and writes
 * go through one mutex so workers can update entries while a flush runs.
 */
export class Ledger {
  private readonly mutex = new Mutex();
  private readonly serialize: Serializer;

  private constructor(
    readonly path: string,
    private readonly data: LedgerData,
    options: LedgerOptions
  ) {
    this.serialize = options.serialize ?? defaultSerializer;
  }

  static empty(path: string, options: LedgerOptions = {}): Ledger {
    return new Ledger(path, {}, options);
  }

  static async load(path: string, options: LedgerOptions = {}): Promise<Ledger> {
    let text: string;

    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return Ledger.empty(path, options);
      }

      throw error;
    }

    try {
      return new Ledger(path, LedgerSchema.parse(JSON.parse(text)), options);
    } catch (error) {
      throw new LedgerCorruptError(path, error);
    }
  }

  get size(): number {
    return Object.keys(this.data).length;
  }

  get(path: string): LedgerEntry | undefined {
    return this.data[path];
  }

  paths(): string[] {
    return Object.keys(this.data);
  }

  entries(): Array<[string, LedgerEntry]> {
    return Object.entries(this.data);
  }

  async update<T>(mutate: (data: LedgerData) => T | Promise<T>): Promise<T> {
    return this.mutex.runExclusive(() => mutate(this.data));
  }

  async save(): Promise<void> {
    await this.mutex.runExclusive(() => writeJsonAtomic(this.path, this.data, this.serialize));
  }
}

export function createLedgerEntry(pair: MatchPair, size: number | null): LedgerEntry {
  return {
    name: basename(pair.mediaPath),
    extension: extname(pair.mediaPath).toLowerCase(),
    size,
    matchTier: pair.tier,
    sidecarPath: pair.sidecarPath,
    timestamp: null,
    geotag: null,
    provenance: [],
    resolvedAt: null,
  };
}

export interface RecordOutcome {
  newMatches: number;
  changedEntries: number;
}

/**
 * Merges a match result into the ledger. A media file that already has a
 * sidecar keeps it; only new files and previously unmatched ones change.
 */
export async function recordMatches(
  ledger: Ledger,
  pairs: MatchPair[],
  sizes: ReadonlyMap<string, number> = new Map()
): Promise<RecordOutcome> {
  return ledger.update((data) => {
    const outcome: RecordOutcome = { newMatches: 0, changedEntries: 0 };

    for (const pair of pairs) {
      const existing = data[pair.mediaPath];
      const matched = pair.tier !== 'Unmatched';

      if (!existing) {
        data[pair.mediaPath] = createLedgerEntry(pair, sizes.get(pair.mediaPath) ?? null);
        outcome.changedEntries++;
        outcome.newMatches += matched ? 1 : 0;
        continue;
      }

      if (existing.matchTier !== 'Unmatched' || !matched) {
        continue;
      }

      existing.matchTier = pair.tier;
      existing.sidecarPath = pair.sidecarPath;
      outcome.changedEntries++;
      outcome.newMatches++;
    }

    return outcome;
  });
}
