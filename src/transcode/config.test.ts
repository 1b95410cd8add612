import { join, resolve } from 'node:path';
import fse from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_CONFIG,
  discoverRoot,
  getEnvOverrides,
  getRootCandidates,
  loadConfig,
  resolveConfig,
  validateConfig,
} from './config.ts';
import { RootNotFoundError } from './errors.ts';
import { makeTempDir } from './testing.ts';

describe('DEFAULT_CONFIG', () => {
  it('carries the documented thresholds', () => {
    expect(DEFAULT_CONFIG).toMatchObject({
      minFileSizeMB: 250,
      minBitrateKbps: 1500,
      minSavingsPercent: 10,
      trialDurationSeconds: 20,
      prefetchCount: 2,
      outputSuffix: '_av1',
      dryRun: false,
    });
  });
});

describe('getEnvOverrides', () => {
  it('reads numbers, paths and the dry-run flag', () => {
    expect(
      getEnvOverrides({
        SHRINK_ROOT: '/media',
        SHRINK_MIN_SIZE_MB: '500',
        SHRINK_MIN_SAVINGS_PERCENT: '15.5',
        SHRINK_PREFETCH: '0',
        SHRINK_DRY_RUN: '1',
        FFMPEG_PATH: '/opt/ffmpeg',
      }),
    ).toEqual({
      rootDir: '/media',
      minFileSizeMB: 500,
      minSavingsPercent: 15.5,
      prefetchCount: 0,
      dryRun: true,
      ffmpegPath: '/opt/ffmpeg',
    });
  });

  it('ignores blank and non-numeric values', () => {
    expect(getEnvOverrides({ SHRINK_MIN_BITRATE_KBPS: 'fast', SHRINK_TRIAL_SECONDS: ' ' })).toEqual({});
  });
});

describe('validateConfig', () => {
  it('accepts an empty object', () => {
    expect(validateConfig({})).toEqual([]);
  });

  it('reports each problem with its path', () => {
    expect(validateConfig({ minSavingsPercent: 150, encoder: { preferred: 'voodoo' } })).toHaveLength(2);
    expect(validateConfig({ prefetchCount: -1 })[0]).toMatch(/^prefetchCount: /);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fse.remove(dir);
  });

  it('layers CLI over environment over file over defaults', async () => {
    const path = join(dir, 'config.json');
    await fse.outputJson(path, { minBitrateKbps: 1000, minSavingsPercent: 20, prefetchCount: 4 });

    const config = await loadConfig(path, { prefetchCount: 1 }, { SHRINK_MIN_SAVINGS_PERCENT: '30' });

    expect(config.minBitrateKbps).toBe(1000);
    expect(config.minSavingsPercent).toBe(30);
    expect(config.prefetchCount).toBe(1);
    expect(config.trialDurationSeconds).toBe(20);
  });

  it('uses the defaults when no config file exists', async () => {
    const config = await loadConfig(undefined, {}, { HOME: dir });

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('finds the file named by CLOUD_SHRINK_CONFIG', async () => {
    const path = join(dir, 'custom.json');
    await fse.outputJson(path, { outputSuffix: '.small' });

    const config = await loadConfig(undefined, {}, { CLOUD_SHRINK_CONFIG: path, HOME: dir });

    expect(config.outputSuffix).toBe('.small');
  });

  it('rejects invalid values', async () => {
    const path = join(dir, 'config.json');
    await fse.outputJson(path, { diskSpaceFactor: 0.5 });

    await expect(loadConfig(path, {}, {})).rejects.toThrow(/Invalid configuration:\n {2}- diskSpaceFactor: /);
  });

  it('rejects a file that is not a JSON object', async () => {
    const path = join(dir, 'config.json');
    await fse.outputFile(path, '[1, 2]');

    await expect(loadConfig(path, {}, {})).rejects.toThrow(`Config file must contain a JSON object: ${path}`);
  });

  it('reports a missing explicit config file', async () => {
    const path = join(dir, 'missing.json');

    await expect(loadConfig(path, {}, {})).rejects.toThrow(`Config file not found: ${path}`);
  });
});

describe('root discovery', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fse.remove(dir);
  });

  it('lists the sync client folders before the home fallback', () => {
    expect(getRootCandidates({ OneDrive: '/od', OneDriveCommercial: '/odc', HOME: '/home/u' })).toEqual([
      '/od',
      '/odc',
      join('/home/u', 'OneDrive'),
    ]);
  });

  it('returns the first candidate that is a directory', async () => {
    await fse.ensureDir(join(dir, 'OneDrive'));

    expect(await discoverRoot(DEFAULT_CONFIG, { OneDrive: join(dir, 'missing'), HOME: dir })).toBe(
      resolve(dir, 'OneDrive'),
    );
  });

  it('uses only the configured root when one is set', async () => {
    await fse.ensureDir(join(dir, 'OneDrive'));

    await expect(
      discoverRoot({ ...DEFAULT_CONFIG, rootDir: join(dir, 'nope') }, { HOME: dir }),
    ).rejects.toBeInstanceOf(RootNotFoundError);
  });

  it('names every searched folder when nothing is found', async () => {
    const error = await discoverRoot(DEFAULT_CONFIG, { HOME: dir }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RootNotFoundError);
    expect(error instanceof RootNotFoundError && error.searched).toEqual([join(dir, 'OneDrive')]);
  });

  it('places state files under the home data directory', async () => {
    await fse.ensureDir(join(dir, 'OneDrive'));

    const resolved = await resolveConfig(DEFAULT_CONFIG, { HOME: dir });

    expect(resolved.historyPath).toBe(join(dir, '.cloud-shrink', 'history.json'));
    expect(resolved.logFilePath).toBe(join(dir, '.cloud-shrink', 'cloud-shrink.log'));
    expect(resolved.lockFilePath).toBe(join(dir, '.cloud-shrink', 'cloud-shrink.lock'));
  });
});
