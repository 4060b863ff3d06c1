import { rm } from 'node:fs/promises';
import { join, sep } from 'node:path';
import trash from 'trash';
import { clusterInputsFromLedger, extractRelationships } from './clustering.js';
import { describeError } from './errors.js';
import {
  ChainedExtractor,
  ExifToolExtractor,
  FfprobeExtractor,
  execFileRunner,
  verifyTools,
  type MetadataExtractor,
  type RetryPolicy,
  type ToolRunner,
} from './extractor.js';
import { Ledger, recordMatches, writeJsonAtomic } from './ledger.js';
import { LogBuffer, RunLog } from './logger.js';
import { applyMatchPlan, isSidecarPath, matchSidecars, writeLeftoverReport } from './matcher.js';
import { fileSize } from './metadata.js';
import { runPool } from './pool.js';
import { resolveMediaFile, type FileResolution } from './resolver.js';
import { scanExtractionRoot } from './scanner.js';
import { readSidecarTitle } from './sidecar.js';
import { ChainedEmbedder, ExifToolEmbedder, FfmpegEmbedder, type MetadataEmbedder } from './writer.js';
import type { Config, MatchTier, RelationshipSets, SidecarDisposal } from './types.js';

export interface DataPaths {
  ledger: string;
  leftovers: string;
  relationships: string;
}

export function dataPaths(config: Config): DataPaths {
  return {
    ledger: join(config.dataDirectory, 'ledger.json'),
    leftovers: join(config.dataDirectory, 'leftovers.json'),
    relationships: join(config.dataDirectory, 'relationship_sets.json'),
  };
}

export interface StageContext {
  config: Config;
  ledger: Ledger;
  runLog: RunLog;
}

export async function openStageContext(config: Config): Promise<StageContext> {
  const ledger = await Ledger.load(dataPaths(config).ledger);
  const runLog = await RunLog.open(config.dataDirectory);

  return { config, ledger, runLog };
}

export interface MatchSummary {
  scanned: number;
  matched: number;
  unmatched: number;
  byTier: Record<MatchTier, number>;
  junkDirectories: number;
  leftoverDirectories: number;
  orphanedSidecars: number;
  renamed: number;
  copied: number;
  newMatches: number;
  ledgerChanges: number;
}

export interface MatchHooks {
  onScanProgress?: (found: number) => void;
}

function emptyTierCounts(): Record<MatchTier, number> {
  return {
    Exact: 0,
    SuffixStripped: 0,
    CopiedFromSibling: 0,
    TruncatedNameHeuristic: 0,
    TitleLookup: 0,
    Unmatched: 0,
  };
}

export async function runMatchStage(context: StageContext, hooks: MatchHooks = {}): Promise<MatchSummary> {
  const { config, ledger, runLog } = context;
  const log = new LogBuffer('match');
  const dataPrefix = config.dataDirectory + sep;
  let found = 0;

  const paths = (
    await scanExtractionRoot(config.rootDirectory, () => {
      found++;
      hooks.onScanProgress?.(found);
    })
  ).filter((path) => !path.startsWith(dataPrefix));

  const titles = new Map<string, string>();

  for (const path of paths.filter(isSidecarPath)) {
    const title = await readSidecarTitle(path);

    if (title !== null) {
      titles.set(path, title);
    }
  }

  const result = matchSidecars(paths, config.matcher, titles, log);
  const applied = await applyMatchPlan(result, log);

  const sizes = new Map<string, number>();

  for (const pair of result.pairs) {
    const size = await fileSize(pair.mediaPath);

    if (size !== null) {
      sizes.set(pair.mediaPath, size);
    }
  }

  const outcome = await recordMatches(ledger, result.pairs, sizes);
  await ledger.save();
  await writeLeftoverReport(dataPaths(config).leftovers, result);

  const byTier = emptyTierCounts();

  for (const pair of result.pairs) {
    byTier[pair.tier]++;
  }

  log.info(`${result.pairs.length} media files, ${byTier.Unmatched} unmatched, ${outcome.newMatches} new matches`);
  await runLog.merge([log]);

  return {
    scanned: paths.length,
    matched: result.pairs.length - byTier.Unmatched,
    unmatched: byTier.Unmatched,
    byTier,
    junkDirectories: result.junkDirectories.length,
    leftoverDirectories: result.leftovers.length,
    orphanedSidecars: result.orphanedSidecars.length,
    renamed: applied.renamed,
    copied: applied.copied,
    newMatches: outcome.newMatches,
    ledgerChanges: outcome.changedEntries,
  };
}

export interface ResolveDependencies {
  extractor?: MetadataExtractor;
  embedder?: MetadataEmbedder;
  runner?: ToolRunner;
}

export interface ResolveHooks {
  onStart?: (total: number) => void;
  onFileResolved?: (done: number, total: number) => void;
}

export interface ResolveOptions {
  force?: boolean;
}

export interface ResolveSummary {
  total: number;
  timestampsResolved: number;
  timestampsUnresolved: number;
  geotagsResolved: number;
  geotagsUnresolved: number;
  geotagConflicts: number;
  embedded: number;
  failures: number;
  sidecarsDisposed: number;
}

interface Collaborators {
  extractor: MetadataExtractor;
  embedder?: MetadataEmbedder;
}

/**
 * Injected collaborators are used as given. Otherwise the tools are checked
 * and chains are built from whichever of them can run.
 */
async function buildCollaborators(config: Config, deps: ResolveDependencies, log: LogBuffer): Promise<Collaborators> {
  if (deps.extractor) {
    return { extractor: deps.extractor, embedder: deps.embedder };
  }

  const run = deps.runner ?? execFileRunner;
  const availability = await verifyTools(config.tools, run);
  const policy: RetryPolicy = {
    attempts: config.resolver.retryAttempts,
    backoffMs: config.resolver.retryBackoffMs,
  };

  const extractors: MetadataExtractor[] = [new ExifToolExtractor(config.tools.exiftool, policy, run)];

  if (availability.ffprobe) {
    extractors.push(new FfprobeExtractor(config.tools.ffprobe, policy, run));
  } else {
    log.warn(`ffprobe not found at ${config.tools.ffprobe}, video fallback disabled`);
  }

  if (!config.resolver.embed) {
    return { extractor: new ChainedExtractor(extractors), embedder: deps.embedder };
  }

  const embedders: MetadataEmbedder[] = [new ExifToolEmbedder(config.tools.exiftool, run)];

  if (availability.ffmpeg) {
    embedders.push(new FfmpegEmbedder(config.tools.ffmpeg, run));
  }

  return {
    extractor: new ChainedExtractor(extractors),
    embedder: deps.embedder ?? new ChainedEmbedder(embedders),
  };
}

export async function disposeSidecars(paths: string[], mode: SidecarDisposal, log: LogBuffer): Promise<number> {
  if (paths.length === 0 || mode === 'keep') {
    return 0;
  }

  if (mode === 'trash') {
    await trash(paths);
    log.info(`Moved ${paths.length} sidecars to trash`);
    return paths.length;
  }

  for (const path of paths) {
    await rm(path, { force: true });
  }

  log.info(`Deleted ${paths.length} sidecars`);
  return paths.length;
}

interface ResolvedFile {
  path: string;
  sidecarPath: string | null;
  resolution: FileResolution | null;
}

export async function runResolveStage(
  context: StageContext,
  deps: ResolveDependencies = {},
  hooks: ResolveHooks = {},
  options: ResolveOptions = {}
): Promise<ResolveSummary> {
  const { config, ledger, runLog } = context;
  const log = new LogBuffer('resolve');
  const collaborators = await buildCollaborators(config, deps, log);
  const targets = ledger.entries().filter(([, entry]) => options.force || entry.resolvedAt === null);
  let done = 0;

  hooks.onStart?.(targets.length);

  const { results, buffers } = await runPool(
    targets,
    config.resolver.workers,
    async ([path, entry], workerLog): Promise<ResolvedFile> => {
      let resolution: FileResolution | null = null;

      try {
        resolution = await resolveMediaFile(path, entry.sidecarPath, collaborators, workerLog);
      } catch (error) {
        workerLog.error(`Resolution failed: ${describeError(error)}`, path);
      }

      if (resolution) {
        const { timestamp, geotag, provenance } = resolution;

        await ledger.update((data) => {
          data[path] = { ...data[path], timestamp, geotag, provenance, resolvedAt: new Date().toISOString() };
        });
      }

      done++;
      hooks.onFileResolved?.(done, targets.length);

      if (done % config.resolver.ledgerFlushEvery === 0) {
        await ledger.save();
      }

      return { path, sidecarPath: entry.sidecarPath, resolution };
    }
  );

  await ledger.save();

  const stillNeeded = new Set(
    ledger
      .entries()
      .filter(([, entry]) => entry.resolvedAt === null && entry.sidecarPath !== null)
      .map(([, entry]) => entry.sidecarPath)
  );
  const consumed = new Set<string>();

  for (const { sidecarPath, resolution } of results) {
    if (sidecarPath && resolution?.sidecarRead && !stillNeeded.has(sidecarPath)) {
      consumed.add(sidecarPath);
    }
  }

  let sidecarsDisposed = 0;

  try {
    sidecarsDisposed = await disposeSidecars([...consumed].sort(), config.sidecarDisposal, log);
  } catch (error) {
    log.error(`Sidecar disposal failed: ${describeError(error)}`);
  }

  const resolved = results.flatMap(({ resolution }) => (resolution ? [resolution] : []));
  const summary: ResolveSummary = {
    total: targets.length,
    timestampsResolved: resolved.filter((r) => r.timestamp !== null).length,
    timestampsUnresolved: resolved.filter((r) => r.timestamp === null).length,
    geotagsResolved: resolved.filter((r) => r.geotag !== null).length,
    geotagsUnresolved: resolved.filter((r) => r.geotag === null).length,
    geotagConflicts: resolved.filter((r) => r.geotagConflict).length,
    embedded: resolved.filter((r) => r.embedded).length,
    failures: targets.length - resolved.length,
    sidecarsDisposed,
  };

  log.info(
    `${summary.timestampsResolved}/${summary.total} timestamps, ${summary.geotagsResolved}/${summary.total} geotags resolved`
  );
  await runLog.merge([...buffers, log]);

  return summary;
}

export async function runClusterStage(context: StageContext): Promise<RelationshipSets> {
  const { config, ledger, runLog } = context;
  const log = new LogBuffer('cluster');
  const sets = extractRelationships(clusterInputsFromLedger(ledger.entries()), config.clustering);

  await writeJsonAtomic(dataPaths(config).relationships, sets);

  log.info(
    `${sets.statistics.T_prime_sets} T′, ${sets.statistics.L_prime_sets} L′, ${sets.statistics.E_prime_sets} E′ sets over ${sets.statistics.total_files} files`
  );
  await runLog.merge([log]);

  return sets;
}
