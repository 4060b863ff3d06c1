import { copyFile, mkdir, rename, writeFile, constants } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import levenshtein from 'fast-levenshtein';
import { LogBuffer } from './logger.js';
import type {
  DirectoryReport,
  MatchPair,
  MatchResult,
  MatcherOptions,
  SidecarCopy,
  SidecarRename,
} from './types.js';

const VARIANT_SUFFIX_PATTERN = /^(.*)-(edited|effects)$/i;
const PARENTHETICAL_PATTERN = /^(.*)\((\d+)\)$/;

function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function isSidecarPath(path: string): boolean {
  return path.toLowerCase().endsWith('.json');
}

/**
 * Every non-empty prefix of the sidecar suffix, longest first.
 */
export function suffixTruncations(suffix: string): string[] {
  const truncations: string[] = [];

  for (let length = suffix.length; length > 0; length--) {
    truncations.push(suffix.slice(0, length));
  }

  return truncations;
}

class MatchState {
  readonly paths: string[];
  readonly remaining = new Set<number>();
  private readonly byPath = new Map<string, number>();

  readonly pairs: MatchPair[] = [];
  readonly renames: SidecarRename[] = [];
  readonly copies: SidecarCopy[] = [];

  constructor(paths: string[]) {
    this.paths = [...new Set(paths)].sort();

    this.paths.forEach((path, index) => {
      this.remaining.add(index);
      this.byPath.set(path, index);
    });
  }

  has(path: string): boolean {
    return this.byPath.has(path);
  }

  /**
   * Index of a path that no earlier pass has consumed, or null.
   */
  available(path: string): number | null {
    const index = this.byPath.get(path);

    if (index === undefined || !this.remaining.has(index)) {
      return null;
    }

    return index;
  }

  remainingIndices(filter: (path: string) => boolean): number[] {
    return [...this.remaining].filter((index) => filter(this.paths[index])).sort((a, b) => a - b);
  }

  move(index: number, to: string): void {
    this.byPath.delete(this.paths[index]);
    this.paths[index] = to;
    this.byPath.set(to, index);
  }

  pair(mediaIndex: number, sidecarIndex: number | null, pair: MatchPair): void {
    this.remaining.delete(mediaIndex);

    if (sidecarIndex !== null) {
      this.remaining.delete(sidecarIndex);
    }

    this.pairs.push(pair);
  }
}

function canonicalizeSuffixes(state: MatchState, options: MatcherOptions, log: LogBuffer): void {
  const truncations = suffixTruncations(options.sidecarSuffix);

  for (const index of state.remainingIndices(isSidecarPath)) {
    const path = state.paths[index];
    const name = basename(path);

    for (const truncation of truncations) {
      const ending = `.${truncation}.json`;

      if (!name.toLowerCase().endsWith(ending.toLowerCase()) || name.length === ending.length) {
        continue;
      }

      const canonical = join(dirname(path), `${name.slice(0, -ending.length)}.json`);

      if (state.has(canonical)) {
        log.warn(`Not renaming, ${basename(canonical)} already exists`, path);
      } else {
        state.renames.push({ from: path, to: canonical });
        state.move(index, canonical);
      }

      break;
    }
  }
}

function propagateVariantSidecars(state: MatchState): void {
  for (const index of state.remainingIndices((path) => !isSidecarPath(path))) {
    const path = state.paths[index];
    const extension = extname(path);
    const stem = basename(path, extension);
    const variant = VARIANT_SUFFIX_PATTERN.exec(stem);

    if (!variant || state.has(`${path}.json`)) {
      continue;
    }

    const baseSidecar = join(dirname(path), `${variant[1]}${extension}.json`);

    if (state.available(baseSidecar) === null) {
      continue;
    }

    const sidecarPath = `${path}.json`;
    state.copies.push({ from: baseSidecar, to: sidecarPath });
    state.pair(index, null, {
      mediaPath: path,
      sidecarPath,
      tier: 'CopiedFromSibling',
      copiedFrom: baseSidecar,
    });
  }
}

function pairExact(state: MatchState): void {
  for (const index of state.remainingIndices((path) => !isSidecarPath(path))) {
    const path = state.paths[index];
    const sidecarIndex = state.available(`${path}.json`);

    if (sidecarIndex !== null) {
      state.pair(index, sidecarIndex, { mediaPath: path, sidecarPath: `${path}.json`, tier: 'Exact' });
    }
  }
}

function pairParenthetical(state: MatchState, options: MatcherOptions): void {
  const truncations = [...suffixTruncations(options.sidecarSuffix), ''];

  for (const index of state.remainingIndices((path) => !isSidecarPath(path))) {
    const path = state.paths[index];
    const extension = extname(path);
    const indexed = PARENTHETICAL_PATTERN.exec(basename(path, extension));

    if (!indexed) {
      continue;
    }

    const [, stripped, counter] = indexed;

    for (const truncation of truncations) {
      const middle = truncation === '' ? '' : `.${truncation}`;
      const candidate = join(dirname(path), `${stripped}${extension}${middle}(${counter}).json`);
      const sidecarIndex = state.available(candidate);

      if (sidecarIndex !== null) {
        state.pair(index, sidecarIndex, { mediaPath: path, sidecarPath: candidate, tier: 'SuffixStripped' });
        break;
      }
    }
  }
}

function groupByDirectory(state: MatchState, indices: number[]): Map<string, number[]> {
  const groups = new Map<string, number[]>();

  for (const index of indices) {
    const directory = dirname(state.paths[index]);
    const group = groups.get(directory) ?? [];
    group.push(index);
    groups.set(directory, group);
  }

  return groups;
}

/**
 * Long names are cut independently for the media file and its sidecar on
 * export. Within one directory, names sharing their first
 * `truncationGroupLength` characters are compared on the shorter name's
 * length minus `truncationMargin`.
 */
function pairTruncatedNames(state: MatchState, options: MatcherOptions): void {
  const byDirectory = groupByDirectory(state, state.remainingIndices(() => true));

  for (const indices of byDirectory.values()) {
    const groups = new Map<string, number[]>();

    for (const index of indices) {
      const key = basename(state.paths[index]).slice(0, options.truncationGroupLength);
      const group = groups.get(key) ?? [];
      group.push(index);
      groups.set(key, group);
    }

    for (const group of groups.values()) {
      const media = group.filter((index) => !isSidecarPath(state.paths[index]));
      const sidecars = group.filter((index) => isSidecarPath(state.paths[index]));

      for (const mediaIndex of media) {
        const mediaName = basename(state.paths[mediaIndex]);

        for (const sidecarIndex of sidecars) {
          if (!state.remaining.has(sidecarIndex)) {
            continue;
          }

          const sidecarName = basename(state.paths[sidecarIndex]).slice(0, -'.json'.length);
          const length = Math.min(mediaName.length, sidecarName.length) - options.truncationMargin;

          if (length <= 0 || mediaName.slice(0, length) !== sidecarName.slice(0, length)) {
            continue;
          }

          state.pair(mediaIndex, sidecarIndex, {
            mediaPath: state.paths[mediaIndex],
            sidecarPath: state.paths[sidecarIndex],
            tier: 'TruncatedNameHeuristic',
          });
          break;
        }
      }
    }
  }
}

function pairByTitle(state: MatchState, sidecarTitles: ReadonlyMap<string, string>): void {
  for (const sidecarIndex of state.remainingIndices(isSidecarPath)) {
    const sidecarPath = state.paths[sidecarIndex];
    const title = sidecarTitles.get(sidecarPath);

    if (!title || title.includes('/') || title.includes('\\')) {
      continue;
    }

    const mediaPath = join(dirname(sidecarPath), title);
    const mediaIndex = isSidecarPath(mediaPath) ? null : state.available(mediaPath);

    if (mediaIndex !== null) {
      state.pair(mediaIndex, sidecarIndex, { mediaPath, sidecarPath, tier: 'TitleLookup' });
    }
  }
}

function partitionResidue(state: MatchState): Pick<MatchResult, 'junkDirectories' | 'leftovers' | 'orphanedSidecars'> {
  const junkDirectories: DirectoryReport[] = [];
  const leftovers: DirectoryReport[] = [];
  const orphanedSidecars: string[] = [];
  const byDirectory = groupByDirectory(state, state.remainingIndices(() => true));

  for (const [directory, indices] of [...byDirectory.entries()].sort(([a], [b]) => comparePaths(a, b))) {
    const files = indices.map((index) => state.paths[index]).sort();
    const sidecarCount = files.filter(isSidecarPath).length;

    orphanedSidecars.push(...files.filter(isSidecarPath));

    if (sidecarCount === 0 || sidecarCount === files.length) {
      junkDirectories.push({ directory, files });
    } else {
      leftovers.push({ directory, files });
    }
  }

  for (const index of state.remainingIndices((path) => !isSidecarPath(path))) {
    state.pairs.push({ mediaPath: state.paths[index], sidecarPath: null, tier: 'Unmatched' });
  }

  return { junkDirectories, leftovers, orphanedSidecars };
}

/**
 * Pairs every media file in `paths` with its sidecar. Passes run in a fixed
 * order and each one sees only what earlier passes left unmatched. Nothing
 * is touched on disk; see {@link applyMatchPlan}.
 */
export function matchSidecars(
  paths: string[],
  options: MatcherOptions,
  sidecarTitles: ReadonlyMap<string, string> = new Map(),
  log: LogBuffer = new LogBuffer('matcher')
): MatchResult {
  const state = new MatchState(paths);

  canonicalizeSuffixes(state, options, log);
  propagateVariantSidecars(state);
  pairExact(state);
  pairParenthetical(state, options);
  pairTruncatedNames(state, options);
  pairByTitle(state, sidecarTitles);

  const residue = partitionResidue(state);
  const pairs = [...state.pairs].sort((a, b) => comparePaths(a.mediaPath, b.mediaPath));

  for (const pair of pairs) {
    if (pair.tier !== 'Exact' && pair.tier !== 'Unmatched') {
      log.debug(`${pair.tier} -> ${pair.sidecarPath ?? 'none'}`, pair.mediaPath);
    }
  }

  return {
    pairs,
    renames: state.renames,
    copies: state.copies,
    ...residue,
  };
}

export interface AppliedPlan {
  renamed: number;
  copied: number;
  skipped: number;
}

/**
 * Performs the renames and sidecar copies a match produced. Existing files
 * are never overwritten.
 */
export async function applyMatchPlan(result: MatchResult, log: LogBuffer): Promise<AppliedPlan> {
  const applied: AppliedPlan = { renamed: 0, copied: 0, skipped: 0 };

  for (const { from, to } of result.renames) {
    if (existsSync(to)) {
      log.warn(`Rename target ${to} already exists`, from);
      applied.skipped++;
      continue;
    }

    await rename(from, to);
    applied.renamed++;
  }

  for (const { from, to } of result.copies) {
    if (existsSync(to)) {
      log.warn(`Copy target ${to} already exists`, from);
      applied.skipped++;
      continue;
    }

    await copyFile(from, to, constants.COPYFILE_EXCL);
    applied.copied++;
  }

  return applied;
}

export interface LeftoverHint {
  mediaPath: string;
  closestSidecar: string | null;
  similarity: number;
}

export interface LeftoverReport {
  generatedAt: string;
  leftovers: DirectoryReport[];
  junkDirectories: DirectoryReport[];
  hints: LeftoverHint[];
}

function similarity(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length);

  if (maxLen === 0) {
    return 1;
  }

  return 1 - levenshtein.get(a, b) / maxLen;
}

/**
 * For each media file in a leftover directory, the remaining sidecar whose
 * name is closest. Hints only; nothing is paired from them.
 */
export function buildLeftoverHints(leftovers: DirectoryReport[]): LeftoverHint[] {
  const hints: LeftoverHint[] = [];

  for (const { files } of leftovers) {
    const sidecars = files.filter(isSidecarPath);

    for (const mediaPath of files.filter((path) => !isSidecarPath(path))) {
      let best: LeftoverHint = { mediaPath, closestSidecar: null, similarity: 0 };

      for (const sidecar of sidecars) {
        const score = similarity(basename(mediaPath), basename(sidecar, '.json'));

        if (score > best.similarity) {
          best = { mediaPath, closestSidecar: sidecar, similarity: Math.round(score * 1000) / 1000 };
        }
      }

      hints.push(best);
    }
  }

  return hints;
}

export async function writeLeftoverReport(path: string, result: MatchResult): Promise<LeftoverReport> {
  const report: LeftoverReport = {
    generatedAt: new Date().toISOString(),
    leftovers: result.leftovers,
    junkDirectories: result.junkDirectories,
    hints: buildLeftoverHints(result.leftovers),
  };

  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(report, null, 2));

  return report;
}
