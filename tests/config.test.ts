import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { CONFIG_ENV_VAR, DEFAULT_CONFIG, configPath, loadConfig, resolveConfig } from '../src/config';
import { ConfigError } from '../src/errors';
import { TempDirectory } from './helpers/temp-directory';

function issuesOf(overrides: unknown): string[] {
  try {
    resolveConfig(overrides, '/base');
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }

    throw error;
  }

  return [];
}

describe('resolveConfig', () => {
  it('resolves directories against the base directory', () => {
    const config = resolveConfig({}, '/base');

    expect(config.rootDirectory).toBe(resolve('/base'));
    expect(config.dataDirectory).toBe(resolve('/base', 'data'));
    expect(config.matcher).toEqual(DEFAULT_CONFIG.matcher);
  });

  it('merges each section over its defaults', () => {
    const config = resolveConfig({ matcher: { truncationMargin: 2 }, sidecarDisposal: 'keep' }, '/base');

    expect(config.matcher).toEqual({ sidecarSuffix: 'supplemental-metadata', truncationGroupLength: 43, truncationMargin: 2 });
    expect(config.sidecarDisposal).toBe('keep');
    expect(config.clustering).toEqual({ timeThresholdSeconds: 300, locationThresholdKm: 0.1 });
  });

  it('expands a leading tilde', () => {
    expect(resolveConfig({ rootDirectory: '~/Takeout' }, '/base').rootDirectory).toBe(join(homedir(), 'Takeout'));
  });

  it('reports every invalid setting by path', () => {
    const issues = issuesOf({ resolver: { workers: 0 }, sidecarDisposal: 'shred' });

    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^resolver\.workers: /);
    expect(issues[1]).toMatch(/^sidecarDisposal: /);
  });

  it('rejects a section that is not an object', () => {
    expect(issuesOf({ matcher: 'fast' })).toHaveLength(1);
    expect(() => resolveConfig(null, '/base')).not.toThrow();
  });
});

describe('loadConfig', () => {
  let tempDir: TempDirectory;

  beforeEach(async () => {
    tempDir = new TempDirectory();
    await tempDir.create();
  });

  afterEach(async () => {
    await tempDir.cleanup();
    delete process.env[CONFIG_ENV_VAR];
  });

  it('falls back to the defaults when the file is missing', async () => {
    const config = await loadConfig(tempDir.resolve('config.json'));

    expect(config.resolver.retryAttempts).toBe(3);
    expect(config.sidecarDisposal).toBe('trash');
  });

  it('reads settings from the file', async () => {
    const path = await tempDir.writeJson('config.json', {
      rootDirectory: tempDir.resolve('takeout'),
      resolver: { workers: 2, embed: false },
    });

    const config = await loadConfig(path);

    expect(config.rootDirectory).toBe(tempDir.resolve('takeout'));
    expect(config.resolver).toEqual({ ...DEFAULT_CONFIG.resolver, workers: 2, embed: false });
  });

  it('rejects invalid JSON', async () => {
    const path = await tempDir.writeFile('config.json', '{ rootDirectory: ');

    await expect(loadConfig(path)).rejects.toThrow(ConfigError);
  });

  it('takes the config location from the environment', () => {
    process.env[CONFIG_ENV_VAR] = '/etc/reconciler.json';

    expect(configPath('/work')).toBe('/etc/reconciler.json');
  });
});
