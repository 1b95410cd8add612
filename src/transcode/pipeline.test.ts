import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import fse from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from './config.ts';
import { DownloadCoordinator } from './downloads.ts';
import { createEncoderProfile } from './encoder.ts';
import { ToolUnavailableError } from './errors.ts';
import { HistoryStore } from './history.ts';
import { AdmissionPipeline } from './pipeline.ts';
import { scanCandidates } from './scanner.ts';
import { EncoderConfigSchema } from './schemas.ts';
import {
  FakeCloudSync,
  FakeDiskSpace,
  FakeEncoder,
  FakeProber,
  fakeClock,
  makeSparseFile,
  makeTempDir,
} from './testing.ts';
import type { CandidateFile, MediaInfo, Prober } from './types.ts';

const GIB = 1024 * 1024 * 1024;
const MIB = 1024 * 1024;

/** 20 s at 3600 kbps: 55% below an 8000 kbps source */
const TRIAL_55_PERCENT = 9_000_000;
/** 20 s at 7520 kbps: 6% below an 8000 kbps source */
const TRIAL_6_PERCENT = 18_800_000;

const H264_8MBPS: MediaInfo = {
  codec: 'h264',
  bitrateKbps: 8000,
  bitrateSource: 'stream',
  durationSeconds: 1073.741824,
};

interface HarnessOptions {
  dryRun?: boolean;
  prefetchCount?: number;
  autoComplete?: boolean;
  free?: number;
  prober?: Prober;
}

interface Sizes {
  trial: { size: number } | { code: number };
  full: { size: number } | { code: number; partialSize?: number };
}

describe('AdmissionPipeline', () => {
  let root: string;
  let stateDir: string;
  let tempDir: string;
  let sizes: Sizes;

  beforeEach(async () => {
    root = await makeTempDir();
    stateDir = await makeTempDir();
    tempDir = await makeTempDir();
    sizes = { trial: { size: TRIAL_55_PERCENT }, full: { size: 420 * MIB } };
  });

  afterEach(async () => {
    await fse.remove(root);
    await fse.remove(stateDir);
    await fse.remove(tempDir);
  });

  function historyPath(): string {
    return join(stateDir, 'history.json');
  }

  function createHarness(options: HarnessOptions = {}, history = new HistoryStore(historyPath(), root)) {
    const prober = new FakeProber();
    const cloud = new FakeCloudSync(options.autoComplete ?? true);
    const encoder = new FakeEncoder((request) => (request.durationSeconds === undefined ? sizes.full : sizes.trial));
    const downloads = new DownloadCoordinator(cloud, {
      timeoutSeconds: 60,
      pollSeconds: 5,
      prefetchCount: options.prefetchCount ?? 2,
      ...fakeClock(),
    });
    const pipeline = new AdmissionPipeline({
      settings: { ...DEFAULT_CONFIG, tempDir, dryRun: options.dryRun ?? false },
      history,
      prober: options.prober ?? prober,
      cloud,
      downloads,
      encoder,
      diskSpace: new FakeDiskSpace(options.free),
      profile: createEncoderProfile('svt', EncoderConfigSchema.parse({})),
    });
    return { prober, cloud, encoder, downloads, pipeline, history };
  }

  async function candidate(relPath: string, size: number): Promise<CandidateFile> {
    const path = join(root, relPath);
    await makeSparseFile(path, size);
    return { path, size };
  }

  //═════════════════════════════════════════════════════════════════════════════
  // END-TO-END SCENARIOS
  //═════════════════════════════════════════════════════════════════════════════

  describe('scenarios', () => {
    it('converts a 1 GiB h264 file whose trial shows 55% savings', async () => {
      const { prober, cloud, encoder, pipeline, history } = createHarness();
      const file = await candidate('Videos/movie.mp4', GIB);
      prober.set(file.path, H264_8MBPS);

      const summary = await pipeline.run([file]);

      const output = join(root, 'Videos', 'movie.mp4_av1.mkv');
      expect(summary).toEqual({
        scanned: 1,
        converted: 1,
        keptOriginal: 0,
        skipped: 0,
        failed: 0,
        bytesSavedThisRun: 633339904,
        totalBytesSaved: 633339904,
        skipReasons: {},
      });
      expect(cloud.downloadRequests).toEqual([file.path]);
      expect(encoder.trialEncodes).toHaveLength(1);
      expect(encoder.fullEncodes).toHaveLength(1);
      expect(await fse.pathExists(file.path)).toBe(false);
      expect((await stat(output)).size).toBe(440401920);
      expect(cloud.released).toEqual([output]);

      expect(history.get(file.path)).toEqual({
        status: 'converted',
        timestamp: expect.any(String),
        bytesSaved: 633339904,
      });
      const onDisk = JSON.parse(await readFile(historyPath(), 'utf8'));
      expect(onDisk.totalBytesSaved).toBe(633339904);
      expect(onDisk.records['Videos/movie.mp4'].status).toBe('converted');
    });

    it('records a 300 MiB hevc file at 1200 kbps as low bitrate without downloading it', async () => {
      const { prober, cloud, encoder, pipeline, history } = createHarness();
      const file = await candidate('Videos/clip.mkv', 300 * MIB);
      prober.set(file.path, { codec: 'hevc', bitrateKbps: 1200, bitrateSource: 'stream', durationSeconds: 2097 });
      cloud.local.add(file.path);

      const outcome = await pipeline.processFile(file);

      expect(outcome).toEqual({
        kind: 'skipped',
        reason: 'low-bitrate',
        recorded: 'skipped-low-bitrate',
        detail: 'Bitrate 1.2 Mbps below 1.5 Mbps',
      });
      expect(history.get(file.path)?.status).toBe('skipped-low-bitrate');
      expect(history.get(file.path)?.bytesSaved).toBe(0);
      expect(cloud.downloadRequests).toEqual([]);
      expect(cloud.released).toEqual([file.path]);
      expect(encoder.requests).toEqual([]);
    });

    it('records a file whose trial shows only 6% savings and never runs the full transcode', async () => {
      sizes.trial = { size: TRIAL_6_PERCENT };
      const { prober, cloud, encoder, pipeline, history } = createHarness();
      const file = await candidate('Videos/movie.mp4', GIB);
      prober.set(file.path, H264_8MBPS);

      const outcome = await pipeline.processFile(file);

      expect(outcome).toMatchObject({
        kind: 'skipped',
        reason: 'test-low-savings',
        recorded: 'skipped-test-low-savings',
      });
      expect(encoder.trialEncodes).toHaveLength(1);
      expect(encoder.fullEncodes).toHaveLength(0);
      expect(history.get(file.path)?.status).toBe('skipped-test-low-savings');
      expect(cloud.released).toEqual([file.path]);
      expect(await fse.pathExists(file.path)).toBe(true);
      expect(await readdir(tempDir)).toEqual([]);
    });
  });

  //═════════════════════════════════════════════════════════════════════════════
  // GATES
  //═════════════════════════════════════════════════════════════════════════════

  describe('gates', () => {
    it('checks the bitrate floor before downloading, whatever the codec', async () => {
      const { prober, cloud, pipeline } = createHarness();
      const file = await candidate('a.mp4', GIB);
      prober.set(file.path, { codec: 'h264', bitrateKbps: 1000, bitrateSource: 'stream', durationSeconds: 8000 });

      const outcome = await pipeline.processFile(file);

      expect(outcome).toMatchObject({ kind: 'skipped', reason: 'low-bitrate' });
      expect(cloud.downloadRequests).toEqual([]);
      // Not local, so nothing to release
      expect(cloud.released).toEqual([]);
    });

    it('records low predicted savings for sources already in AV1', async () => {
      const { prober, cloud, pipeline, history } = createHarness();
      const file = await candidate('b.mkv', GIB);
      prober.set(file.path, { codec: 'av1', bitrateKbps: 5000, bitrateSource: 'stream', durationSeconds: 1700 });

      const outcome = await pipeline.processFile(file);

      expect(outcome).toMatchObject({ kind: 'skipped', reason: 'low-savings', recorded: 'skipped-low-savings' });
      expect(history.get(file.path)?.status).toBe('skipped-low-savings');
      expect(cloud.downloadRequests).toEqual([]);
    });

    it('sends a high-bitrate HEVC source on to the trial encode', async () => {
      const { prober, encoder, pipeline, history } = createHarness();
      const file = await candidate('hevc-remux.mkv', 2 * GIB);
      prober.set(file.path, { codec: 'hevc', bitrateKbps: 8000, bitrateSource: 'stream', durationSeconds: 2147.483648 });

      const outcome = await pipeline.processFile(file);

      expect(outcome).toMatchObject({ kind: 'converted', bytesSaved: 2 * GIB - 420 * MIB });
      expect(encoder.trialEncodes).toHaveLength(1);
      expect(history.get(file.path)?.status).toBe('converted');
    });

    it('skips without a record when the header cannot be read', async () => {
      const { cloud, pipeline, history } = createHarness();
      const file = await candidate('c.avi', GIB);

      const outcome = await pipeline.processFile(file);

      expect(outcome).toEqual({
        kind: 'skipped',
        reason: 'probe-failed',
        recorded: null,
        detail: 'Could not read media header',
      });
      expect(history.has(file.path)).toBe(false);
      expect(cloud.downloadRequests).toEqual([]);
    });

    it('converts a sibling that differs only by extension after the first one is done', async () => {
      const { prober, pipeline, history } = createHarness();
      const mp4 = await candidate('X.mp4', GIB);
      const mkv = await candidate('X.mkv', GIB);
      prober.set(mp4.path, H264_8MBPS);
      prober.set(mkv.path, H264_8MBPS);

      const summary = await pipeline.run([mp4, mkv]);

      expect(summary.converted).toBe(2);
      expect(history.get(mkv.path)?.status).toBe('converted');
      expect((await readdir(root)).sort()).toEqual(['X.mkv_av1.mkv', 'X.mp4_av1.mkv']);
    });

    it('skips files whose output already exists before probing them', async () => {
      const { prober, pipeline, history } = createHarness();
      const file = await candidate('d.mp4', GIB);
      await makeSparseFile(join(root, 'd.mp4_av1.mkv'), 100);

      const outcome = await pipeline.processFile(file);

      expect(outcome).toMatchObject({ kind: 'skipped', reason: 'output-exists', recorded: null });
      expect(prober.calls).toEqual([]);
      expect(history.has(file.path)).toBe(false);
    });

    it('skips files already in history without probing or downloading', async () => {
      const { prober, cloud, pipeline, history } = createHarness();
      const file = await candidate('e.mp4', GIB);
      history.recordOutcome(file.path, 'kept-original');

      const outcome = await pipeline.processFile(file);

      expect(outcome).toEqual({
        kind: 'skipped',
        reason: 'in-history',
        recorded: null,
        detail: 'Already processed (kept-original)',
      });
      expect(prober.calls).toEqual([]);
      expect(cloud.downloadRequests).toEqual([]);
    });

    it('leaves no record when the download times out', async () => {
      const { prober, cloud, encoder, pipeline, history } = createHarness({ autoComplete: false });
      const file = await candidate('f.mp4', GIB);
      prober.set(file.path, H264_8MBPS);

      const outcome = await pipeline.processFile(file);

      expect(outcome).toMatchObject({ kind: 'skipped', reason: 'download-timeout', recorded: null });
      expect(cloud.downloadRequests).toEqual([file.path]);
      expect(history.has(file.path)).toBe(false);
      expect(encoder.requests).toEqual([]);
    });

    it('leaves no record when there is not enough free space', async () => {
      const { prober, encoder, pipeline, history } = createHarness({ free: GIB });
      const file = await candidate('g.mp4', GIB);
      prober.set(file.path, H264_8MBPS);

      const outcome = await pipeline.processFile(file);

      expect(outcome).toMatchObject({ kind: 'skipped', reason: 'insufficient-space', recorded: null });
      expect(history.has(file.path)).toBe(false);
      expect(encoder.fullEncodes).toHaveLength(0);
    });

    it('goes ahead with the full transcode when the trial itself fails', async () => {
      sizes.trial = { code: 1 };
      const { prober, encoder, pipeline } = createHarness();
      const file = await candidate('h.mp4', GIB);
      prober.set(file.path, H264_8MBPS);

      const outcome = await pipeline.processFile(file);

      expect(outcome).toMatchObject({ kind: 'converted', bytesSaved: 633339904 });
      expect(encoder.fullEncodes).toHaveLength(1);
      expect(await readdir(tempDir)).toEqual([]);
    });

    it('stops the run when ffprobe cannot be started', async () => {
      const prober: Prober = {
        probe: async () => {
          throw new ToolUnavailableError('ffprobe', new Error('spawn ffprobe ENOENT'));
        },
      };
      const { pipeline } = createHarness({ prober });
      const file = await candidate('i.mp4', GIB);

      await expect(pipeline.run([file])).rejects.toBeInstanceOf(ToolUnavailableError);
    });
  });

  //═════════════════════════════════════════════════════════════════════════════
  // EXECUTOR OUTCOMES
  //═════════════════════════════════════════════════════════════════════════════

  describe('executor outcomes', () => {
    it('keeps the original when the output is not smaller', async () => {
      sizes.full = { size: GIB + 1 };
      const { prober, cloud, pipeline, history } = createHarness();
      const file = await candidate('j.mp4', GIB);
      prober.set(file.path, H264_8MBPS);

      const summary = await pipeline.run([file]);

      expect(summary.keptOriginal).toBe(1);
      expect(summary.bytesSavedThisRun).toBe(0);
      expect(history.get(file.path)?.status).toBe('kept-original');
      expect(await fse.pathExists(file.path)).toBe(true);
      expect(await fse.pathExists(join(root, 'j.mp4_av1.mkv'))).toBe(false);
      expect(cloud.released).toEqual([file.path]);
    });

    it('counts a failed transcode without recording it', async () => {
      sizes.full = { code: 1, partialSize: 4096 };
      const { prober, pipeline, history } = createHarness();
      const file = await candidate('k.mp4', GIB);
      prober.set(file.path, H264_8MBPS);

      const summary = await pipeline.run([file]);

      expect(summary.failed).toBe(1);
      expect(history.has(file.path)).toBe(false);
      expect(await fse.pathExists(file.path)).toBe(true);
      expect(await readdir(root)).toEqual(['k.mp4']);
    });
  });

  //═════════════════════════════════════════════════════════════════════════════
  // DRY RUN
  //═════════════════════════════════════════════════════════════════════════════

  describe('dry run', () => {
    it('reports would-convert without downloading, encoding or writing history', async () => {
      const { prober, cloud, encoder, pipeline } = createHarness({ dryRun: true });
      const file = await candidate('l.mp4', GIB);
      prober.set(file.path, H264_8MBPS);

      const outcome = await pipeline.processFile(file);

      expect(outcome).toEqual({ kind: 'skipped', reason: 'dry-run', recorded: null, detail: 'Would convert' });
      expect(cloud.downloadRequests).toEqual([]);
      expect(encoder.requests).toEqual([]);
      expect(await fse.pathExists(historyPath())).toBe(false);
    });

    it('neither records nor releases files that fail a cheap gate', async () => {
      const { prober, cloud, pipeline, history } = createHarness({ dryRun: true });
      const file = await candidate('m.mp4', GIB);
      prober.set(file.path, { codec: 'h264', bitrateKbps: 900, bitrateSource: 'stream', durationSeconds: 9000 });
      cloud.local.add(file.path);

      const outcome = await pipeline.processFile(file);

      expect(outcome).toMatchObject({ kind: 'skipped', reason: 'low-bitrate', recorded: null });
      expect(history.has(file.path)).toBe(false);
      expect(cloud.released).toEqual([]);
    });
  });

  //═════════════════════════════════════════════════════════════════════════════
  // PREFETCH
  //═════════════════════════════════════════════════════════════════════════════

  describe('prefetch', () => {
    async function threeFiles(prober: FakeProber): Promise<CandidateFile[]> {
      const files = [
        await candidate('1.mp4', GIB),
        await candidate('2.mp4', GIB),
        await candidate('3.mp4', GIB),
      ];
      for (const file of files) prober.set(file.path, H264_8MBPS);
      return files;
    }

    it('starts downloads for upcoming files while the current one transcodes', async () => {
      const { prober, cloud, pipeline } = createHarness();
      const [a, b, c] = await threeFiles(prober);

      await pipeline.processFile(a, [b, c]);

      expect(cloud.downloadRequests).toEqual([a.path, b.path, c.path]);
      expect(prober.calls).toEqual([a.path, b.path, c.path]);
    });

    it('reuses the prefetch probe and does not download again when the file comes up', async () => {
      const { prober, cloud, pipeline, downloads } = createHarness();
      const [a, b, c] = await threeFiles(prober);

      await pipeline.processFile(a, [b, c]);
      await pipeline.processFile(b, [c]);

      expect(cloud.downloadRequests).toEqual([a.path, b.path, c.path]);
      expect(prober.calls).toEqual([a.path, b.path, c.path]);
      expect(downloads.inFlightCount).toBe(0);
    });

    it('keeps the window to the configured size', async () => {
      const { prober, cloud, pipeline } = createHarness({ prefetchCount: 1 });
      const [a, b, c] = await threeFiles(prober);

      await pipeline.processFile(a, [b, c]);

      expect(cloud.downloadRequests).toEqual([a.path, b.path]);
    });

    it('does not prefetch files that fail the cheap gates, and records nothing for them yet', async () => {
      const { prober, cloud, pipeline, history } = createHarness();
      const [a, b, c] = await threeFiles(prober);
      prober.set(b.path, { codec: 'h264', bitrateKbps: 700, bitrateSource: 'stream', durationSeconds: 12000 });

      await pipeline.processFile(a, [b, c]);

      expect(cloud.downloadRequests).toEqual([a.path, c.path]);
      expect(history.has(b.path)).toBe(false);
    });

    it('does not check locality for upcoming files already in history', async () => {
      const { prober, cloud, pipeline, history } = createHarness();
      const current = await candidate('current.mp4', GIB);
      prober.set(current.path, H264_8MBPS);
      const upcoming: CandidateFile[] = [];
      for (let i = 0; i < 50; i++) {
        const file = await candidate(`done/${i}.mp4`, GIB);
        history.recordOutcome(file.path, 'skipped-low-bitrate');
        upcoming.push(file);
      }

      const outcome = await pipeline.processFile(current, upcoming);

      expect(outcome.kind).toBe('converted');
      expect(cloud.localityChecks.filter((path) => path !== current.path)).toEqual([]);
      expect(cloud.downloadRequests).toEqual([current.path]);
      expect(prober.calls).toEqual([current.path]);
    });
  });

  //═════════════════════════════════════════════════════════════════════════════
  // IDEMPOTENCE
  //═════════════════════════════════════════════════════════════════════════════

  it('does nothing on a second run over the same tree', async () => {
    const movie = join(root, 'Videos', 'movie.mp4');
    const clip = join(root, 'Videos', 'clip.mkv');
    await makeSparseFile(movie, GIB);
    await makeSparseFile(clip, 300 * MIB);
    const scanOptions = { ...DEFAULT_CONFIG, rootDir: root };

    const first = createHarness();
    first.prober.set(movie, H264_8MBPS);
    first.prober.set(clip, { codec: 'hevc', bitrateKbps: 1200, bitrateSource: 'stream', durationSeconds: 2097 });
    const firstSummary = await first.pipeline.run((await scanCandidates(scanOptions)).files);
    expect(firstSummary).toMatchObject({ scanned: 2, converted: 1, skipped: 1 });
    const historyAfterFirst = await readFile(historyPath(), 'utf8');

    const second = createHarness({}, await HistoryStore.load(historyPath(), root));
    const secondSummary = await second.pipeline.run((await scanCandidates(scanOptions)).files);

    expect(secondSummary).toEqual({
      scanned: 1,
      converted: 0,
      keptOriginal: 0,
      skipped: 1,
      failed: 0,
      bytesSavedThisRun: 0,
      totalBytesSaved: 633339904,
      skipReasons: { 'in-history': 1 },
    });
    expect(second.encoder.requests).toEqual([]);
    expect(second.prober.calls).toEqual([]);
    expect(await readFile(historyPath(), 'utf8')).toBe(historyAfterFirst);
  });
});
