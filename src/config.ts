import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';
import { defaultWorkerCount } from './pool.js';
import type { Config } from './types.js';

export const CONFIG_ENV_VAR = 'TAKEOUT_RECONCILER_CONFIG';

export const DEFAULT_CONFIG: Config = {
  rootDirectory: '.',
  dataDirectory: 'data',
  tools: {
    exiftool: 'exiftool',
    ffprobe: 'ffprobe',
    ffmpeg: 'ffmpeg',
  },
  matcher: {
    sidecarSuffix: 'supplemental-metadata',
    truncationGroupLength: 43,
    truncationMargin: 4,
  },
  resolver: {
    workers: defaultWorkerCount(),
    retryAttempts: 3,
    retryBackoffMs: 500,
    embed: true,
    ledgerFlushEvery: 50,
  },
  clustering: {
    timeThresholdSeconds: 300,
    locationThresholdKm: 0.1,
  },
  sidecarDisposal: 'trash',
};

const ConfigSchema = z.object({
  rootDirectory: z.string().min(1),
  dataDirectory: z.string().min(1),
  tools: z.object({
    exiftool: z.string().min(1),
    ffprobe: z.string().min(1),
    ffmpeg: z.string().min(1),
  }),
  matcher: z.object({
    sidecarSuffix: z.string().min(1),
    truncationGroupLength: z.number().int().positive(),
    truncationMargin: z.number().int().nonnegative(),
  }),
  resolver: z.object({
    workers: z.number().int().positive(),
    retryAttempts: z.number().int().positive(),
    retryBackoffMs: z.number().nonnegative(),
    embed: z.boolean(),
    ledgerFlushEvery: z.number().int().positive(),
  }),
  clustering: z.object({
    timeThresholdSeconds: z.number().nonnegative(),
    locationThresholdKm: z.number().nonnegative(),
  }),
  sidecarDisposal: z.enum(['trash', 'delete', 'keep']),
});

const PartialConfigSchema = z
  .object({
    rootDirectory: z.unknown(),
    dataDirectory: z.unknown(),
    tools: z.record(z.unknown()),
    matcher: z.record(z.unknown()),
    resolver: z.record(z.unknown()),
    clustering: z.record(z.unknown()),
    sidecarDisposal: z.unknown(),
  })
  .partial();

export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return path.replace('~', homedir());
  }

  return path;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Merges user settings over the defaults one section deep and validates the
 * result.
 */
export function resolveConfig(overrides: unknown, baseDir = process.cwd()): Config {
  const partial = PartialConfigSchema.safeParse(overrides ?? {});

  if (!partial.success) {
    throw new ConfigError(formatIssues(partial.error));
  }

  const user = partial.data;
  const merged = {
    ...DEFAULT_CONFIG,
    ...(user.rootDirectory === undefined ? {} : { rootDirectory: user.rootDirectory }),
    ...(user.dataDirectory === undefined ? {} : { dataDirectory: user.dataDirectory }),
    ...(user.sidecarDisposal === undefined ? {} : { sidecarDisposal: user.sidecarDisposal }),
    tools: { ...DEFAULT_CONFIG.tools, ...user.tools },
    matcher: { ...DEFAULT_CONFIG.matcher, ...user.matcher },
    resolver: { ...DEFAULT_CONFIG.resolver, ...user.resolver },
    clustering: { ...DEFAULT_CONFIG.clustering, ...user.clustering },
  };

  const result = ConfigSchema.safeParse(merged);

  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }

  const config = result.data;

  return {
    ...config,
    rootDirectory: resolve(baseDir, expandPath(config.rootDirectory)),
    dataDirectory: resolve(baseDir, expandPath(config.dataDirectory)),
    tools: {
      exiftool: expandPath(config.tools.exiftool),
      ffprobe: expandPath(config.tools.ffprobe),
      ffmpeg: expandPath(config.tools.ffmpeg),
    },
  };
}

export function configPath(cwd = process.cwd()): string {
  return process.env[CONFIG_ENV_VAR] ?? join(cwd, 'config.json');
}

export async function loadConfig(path = configPath()): Promise<Config> {
  let text: string;

  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return resolveConfig({});
    }

    throw error;
  }

  let parsed: unknown;

  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError([`${path}: ${describeError(error)}`]);
  }

  return resolveConfig(parsed);
}
