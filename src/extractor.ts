import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import { MissingToolError, describeError } from './errors.js';
import { LogBuffer } from './logger.js';
import type { CandidateSource, Config } from './types.js';

const execFileAsync = promisify(execFile);

export interface ToolOutput {
  stdout: string;
  stderr: string;
}

export type ToolRunner = (command: string, args: string[]) => Promise<ToolOutput>;

export const execFileRunner: ToolRunner = async (command, args) => {
  const { stdout, stderr } = await execFileAsync(command, args, {
    encoding: 'utf8',
    maxBuffer: 16 * 1024 * 1024,
  });

  return { stdout, stderr };
};

export type FieldValues = Record<string, string>;

export interface Extraction {
  source: CandidateSource;
  values: FieldValues;
}

export interface MetadataExtractor {
  readonly name: string;
  extract(file: string, fields: string[], log: LogBuffer): Promise<Extraction>;
}

export interface RetryPolicy {
  attempts: number;
  backoffMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs `operation` up to `policy.attempts` times with a fixed pause between
 * tries. Returns null once every attempt has failed.
 */
export async function withRetry<T>(
  label: string,
  policy: RetryPolicy,
  log: LogBuffer,
  file: string,
  operation: () => Promise<T>
): Promise<T | null> {
  const attempts = Math.max(1, policy.attempts);
  const pause = policy.sleep ?? sleep;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt === attempts) {
        log.error(`${label} failed after ${attempts} attempts: ${describeError(error)}`, file);
        return null;
      }

      log.warn(`${label} attempt ${attempt} failed: ${describeError(error)}`, file);
      await pause(policy.backoffMs);
    }
  }

  return null;
}

function toFieldValue(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }

  return null;
}

function pickFields(record: Record<string, unknown>, fields: string[]): FieldValues {
  const values: FieldValues = {};

  for (const field of fields) {
    const value = toFieldValue(record[field]);

    if (value !== null) {
      values[field] = value;
    }
  }

  return values;
}

const ExifToolOutputSchema = z.array(z.record(z.unknown()));

export class ExifToolExtractor implements MetadataExtractor {
  readonly name = 'exiftool';

  constructor(
    private readonly executable: string,
    private readonly policy: RetryPolicy,
    private readonly run: ToolRunner = execFileRunner
  ) {}

  async extract(file: string, fields: string[], log: LogBuffer): Promise<Extraction> {
    const args = ['-j', '-n', ...fields.map((field) => `-${field}`), file];

    const values = await withRetry('exiftool', this.policy, log, file, async () => {
      const { stdout } = await this.run(this.executable, args);
      const [record] = ExifToolOutputSchema.parse(JSON.parse(stdout));

      return record ? pickFields(record, fields) : {};
    });

    return { source: 'exif', values: values ?? {} };
  }
}

const FfprobeOutputSchema = z.object({
  format: z.object({ tags: z.record(z.unknown()).optional() }).optional(),
  streams: z.array(z.object({ tags: z.record(z.unknown()).optional() })).optional(),
});

const FFPROBE_TAG_ALIASES: Record<string, string[]> = {
  CreationDate: ['com.apple.quicktime.creationdate'],
  CreateDate: ['creation_time'],
  MediaCreateDate: ['creation_time'],
  TrackCreateDate: ['creation_time'],
  GPSPosition: ['com.apple.quicktime.location.ISO6709', 'location'],
};

/**
 * Reads container tags for videos exiftool could not read. Tag names are
 * mapped back onto the exiftool field names the resolver asks for.
 */
export class FfprobeExtractor implements MetadataExtractor {
  readonly name = 'ffprobe';

  constructor(
    private readonly executable: string,
    private readonly policy: RetryPolicy,
    private readonly run: ToolRunner = execFileRunner
  ) {}

  async extract(file: string, fields: string[], log: LogBuffer): Promise<Extraction> {
    const args = ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', file];

    const values = await withRetry('ffprobe', this.policy, log, file, async () => {
      const { stdout } = await this.run(this.executable, args);
      const output = FfprobeOutputSchema.parse(JSON.parse(stdout));
      const tags: Record<string, unknown> = {};

      for (const stream of output.streams ?? []) {
        Object.assign(tags, stream.tags ?? {});
      }

      Object.assign(tags, output.format?.tags ?? {});

      const lowerTags = new Map(Object.entries(tags).map(([key, value]) => [key.toLowerCase(), value]));
      const picked: FieldValues = {};

      for (const field of fields) {
        for (const alias of FFPROBE_TAG_ALIASES[field] ?? [field]) {
          const value = toFieldValue(lowerTags.get(alias.toLowerCase()));

          if (value !== null) {
            picked[field] = value;
            break;
          }
        }
      }

      return picked;
    });

    return { source: 'probe', values: values ?? {} };
  }
}

export class ChainedExtractor implements MetadataExtractor {
  readonly name: string;

  constructor(private readonly strategies: MetadataExtractor[]) {
    this.name = strategies.map((strategy) => strategy.name).join(' > ');
  }

  async extract(file: string, fields: string[], log: LogBuffer): Promise<Extraction> {
    let last: Extraction = { source: 'exif', values: {} };

    for (const strategy of this.strategies) {
      last = await strategy.extract(file, fields, log);
      const count = Object.keys(last.values).length;

      log.debug(`${strategy.name}: ${count} of ${fields.length} fields`, file);

      if (count > 0) {
        return last;
      }
    }

    return last;
  }
}

export interface ToolAvailability {
  exiftool: boolean;
  ffprobe: boolean;
  ffmpeg: boolean;
}

const VERSION_ARGS: Record<keyof ToolAvailability, string[]> = {
  exiftool: ['-ver'],
  ffprobe: ['-version'],
  ffmpeg: ['-version'],
};

async function canRun(run: ToolRunner, executable: string, args: string[]): Promise<boolean> {
  try {
    await run(executable, args);
    return true;
  } catch {
    return false;
  }
}

/**
 * exiftool is required; ffprobe and ffmpeg only widen the fallback chains.
 */
export async function verifyTools(
  tools: Config['tools'],
  run: ToolRunner = execFileRunner
): Promise<ToolAvailability> {
  const availability: ToolAvailability = {
    exiftool: await canRun(run, tools.exiftool, VERSION_ARGS.exiftool),
    ffprobe: await canRun(run, tools.ffprobe, VERSION_ARGS.ffprobe),
    ffmpeg: await canRun(run, tools.ffmpeg, VERSION_ARGS.ffmpeg),
  };

  if (!availability.exiftool) {
    throw new MissingToolError('exiftool', tools.exiftool);
  }

  return availability;
}
