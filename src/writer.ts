import { rename, rm } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { describeError } from './errors.js';
import { execFileRunner, type ToolRunner } from './extractor.js';
import { signedLatitude, signedLongitude } from './geotag.js';
import { LogBuffer } from './logger.js';
import { mediaKind } from './metadata.js';
import { timestampToInstant } from './timestamp.js';
import type { Geotag } from './types.js';

export interface Resolution {
  timestamp: string | null;
  geotag: Geotag | null;
}

export interface MetadataEmbedder {
  readonly name: string;
  /**
   * Resolves false when the strategy does not apply to this file.
   */
  embed(file: string, resolution: Resolution, log: LogBuffer): Promise<boolean>;
}

function splitTimestamp(timestamp: string): { local: string; offset: string } {
  return { local: timestamp.slice(0, 19), offset: timestamp.slice(19) };
}

export function exifToolArgs(file: string, resolution: Resolution): string[] {
  const args = ['-overwrite_original', '-n'];
  const video = mediaKind(file) === 'video';

  if (resolution.timestamp) {
    const { local, offset } = splitTimestamp(resolution.timestamp);

    if (video) {
      args.push(
        `-CreationDate=${resolution.timestamp}`,
        `-CreateDate=${local}`,
        `-MediaCreateDate=${local}`,
        `-TrackCreateDate=${local}`
      );
    } else {
      args.push(`-DateTimeOriginal=${local}`, `-CreateDate=${local}`, `-OffsetTimeOriginal=${offset}`);
    }
  }

  if (resolution.geotag) {
    const { geotag } = resolution;

    if (video) {
      args.push(`-GPSCoordinates=${signedLatitude(geotag)}, ${signedLongitude(geotag)}`);
    } else {
      args.push(
        `-GPSLatitude=${geotag.latitude}`,
        `-GPSLatitudeRef=${geotag.latitudeRef}`,
        `-GPSLongitude=${geotag.longitude}`,
        `-GPSLongitudeRef=${geotag.longitudeRef}`
      );
    }
  }

  args.push(file);
  return args;
}

export class ExifToolEmbedder implements MetadataEmbedder {
  readonly name = 'exiftool';

  constructor(
    private readonly executable: string,
    private readonly run: ToolRunner = execFileRunner
  ) {}

  async embed(file: string, resolution: Resolution): Promise<boolean> {
    await this.run(this.executable, exifToolArgs(file, resolution));
    return true;
  }
}

export function toIso6709(geotag: Geotag): string {
  const coordinate = (value: number, width: number): string => {
    const sign = value < 0 ? '-' : '+';
    return `${sign}${Math.abs(value).toFixed(4).padStart(width, '0')}`;
  };

  return `${coordinate(signedLatitude(geotag), 7)}${coordinate(signedLongitude(geotag), 8)}/`;
}

/**
 * Rewrites container tags with a stream copy into a temp file, then moves
 * it over the original.
 */
export class FfmpegEmbedder implements MetadataEmbedder {
  readonly name = 'ffmpeg';

  constructor(
    private readonly executable: string,
    private readonly run: ToolRunner = execFileRunner
  ) {}

  async embed(file: string, resolution: Resolution): Promise<boolean> {
    if (mediaKind(file) !== 'video') {
      return false;
    }

    const extension = extname(file);
    const tempPath = join(dirname(file), `${basename(file, extension)}.reconcile-tmp${extension}`);
    const metadataArgs: string[] = [];

    if (resolution.timestamp) {
      metadataArgs.push('-metadata', `creation_time=${new Date(timestampToInstant(resolution.timestamp)).toISOString()}`);
    }

    if (resolution.geotag) {
      metadataArgs.push('-metadata', `location=${toIso6709(resolution.geotag)}`);
    }

    try {
      await this.run(this.executable, ['-y', '-i', file, '-map', '0', '-c', 'copy', ...metadataArgs, tempPath]);
      await rename(tempPath, file);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }

    return true;
  }
}

export class ChainedEmbedder implements MetadataEmbedder {
  readonly name: string;

  constructor(private readonly strategies: MetadataEmbedder[]) {
    this.name = strategies.map((strategy) => strategy.name).join(' > ');
  }

  async embed(file: string, resolution: Resolution, log: LogBuffer): Promise<boolean> {
    if (!resolution.timestamp && !resolution.geotag) {
      return false;
    }

    for (const strategy of this.strategies) {
      try {
        if (await strategy.embed(file, resolution, log)) {
          log.debug(`Embedded with ${strategy.name}`, file);
          return true;
        }
      } catch (error) {
        log.warn(`${strategy.name} could not embed: ${describeError(error)}`, file);
      }
    }

    log.error('No embedder could write metadata', file);
    return false;
  }
}
