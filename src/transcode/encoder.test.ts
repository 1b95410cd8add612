import { readdir } from 'node:fs/promises';
import fse from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  buildFFmpegArgs,
  createEncoderProfile,
  FFmpegEncoder,
  getCandidateProfiles,
  selectEncoder,
} from './encoder.ts';
import { ToolUnavailableError } from './errors.ts';
import { EncoderConfigSchema } from './schemas.ts';
import { FakeEncoder, makeTempDir } from './testing.ts';

const defaults = EncoderConfigSchema.parse({});

describe('encoder profiles', () => {
  it('builds NVENC parameters from the defaults', () => {
    expect(createEncoderProfile('nvidia', defaults).parameters).toEqual([
      '-preset', 'p5',
      '-tune', 'hq',
      '-rc', 'vbr',
      '-cq', '32',
      '-b:v', '0',
      '-rc-lookahead', '20',
      '-temporal-aq', '1',
      '-bf', '3',
      '-b_ref_mode', 'middle',
    ]);
  });

  it('omits the B-frame reference mode without B-frames', () => {
    const config = EncoderConfigSchema.parse({ nvidia: { bFrames: 0, lookahead: 0, temporalAq: false } });

    expect(createEncoderProfile('nvidia', config).parameters).toEqual([
      '-preset', 'p5', '-tune', 'hq', '-rc', 'vbr', '-cq', '32', '-b:v', '0', '-bf', '0',
    ]);
  });

  it('adds SVT-AV1 film grain only when it is set', () => {
    expect(createEncoderProfile('svt', defaults).parameters).toEqual(['-preset', '8', '-crf', '30']);

    const grainy = EncoderConfigSchema.parse({ svt: { filmGrain: 8, crf: 26 } });
    expect(createEncoderProfile('svt', grainy).parameters).toEqual([
      '-preset', '8', '-crf', '26', '-svtav1-params', 'film-grain=8',
    ]);
  });

  it('runs libaom in constant quality mode', () => {
    expect(createEncoderProfile('aom', defaults).parameters).toEqual([
      '-cpu-used', '6', '-crf', '30', '-b:v', '0', '-row-mt', '1',
    ]);
  });

  it('uses the AV1 constant QP scale for AMF', () => {
    expect(createEncoderProfile('amd', defaults).parameters).toEqual([
      '-quality', 'quality', '-rc', 'cqp', '-qp_i', '120', '-qp_p', '120',
    ]);
  });

  it('lists hardware AV1 encoders before the software ones', () => {
    const profiles = getCandidateProfiles(defaults);

    expect(profiles.map((p) => p.encoder)).toEqual(['av1_nvenc', 'av1_qsv', 'av1_amf', 'libsvtav1', 'libaom-av1']);
    expect(new Set(profiles.map((p) => p.codecFamily))).toEqual(new Set(['av1']));
  });

  it('narrows the candidates to the preferred profile', () => {
    const config = EncoderConfigSchema.parse({ preferred: 'intel' });

    expect(getCandidateProfiles(config).map((p) => p.id)).toEqual(['intel']);
  });
});

describe('buildFFmpegArgs', () => {
  const nvidia = createEncoderProfile('nvidia', defaults);
  const svt = createEncoderProfile('svt', defaults);

  it('builds a full transcode that keeps audio and subtitles', () => {
    const args = buildFFmpegArgs({
      input: { kind: 'file', path: '/in/a.mkv' },
      output: '/in/a_av1.partial.mkv',
      profile: svt,
      audio: 'copy',
      hwDecode: true,
      copySubtitles: true,
    });

    expect(args).toEqual([
      '-hide_banner', '-nostdin', '-y',
      '-hwaccel', 'auto',
      '-i', '/in/a.mkv',
      '-map', '0:v:0',
      '-map', '0:a?', '-c:a', 'copy',
      '-map', '0:s?', '-c:s', 'copy',
      '-c:v', 'libsvtav1', '-preset', '8', '-crf', '30',
      '-threads', '0', '-max_muxing_queue_size', '1024',
      '/in/a_av1.partial.mkv',
    ]);
  });

  it('seeks and limits a trial segment', () => {
    const args = buildFFmpegArgs({
      input: { kind: 'file', path: '/in/a.mp4' },
      output: '/tmp/trial.mkv',
      profile: nvidia,
      startSeconds: 268.4,
      durationSeconds: 20,
      audio: 'none',
      hwDecode: true,
    });

    expect(args.slice(0, 13)).toEqual([
      '-hide_banner', '-nostdin', '-y',
      '-hwaccel', 'cuda', '-hwaccel_output_format', 'cuda',
      '-ss', '268.400',
      '-i', '/in/a.mp4',
      '-t', '20',
    ]);
    expect(args).toContain('-an');
    expect(args).toContain('-sn');
  });

  it('reads a synthetic source without hardware decoding', () => {
    const args = buildFFmpegArgs({
      input: { kind: 'lavfi', source: 'color=c=black' },
      output: '/tmp/probe.mkv',
      profile: nvidia,
      audio: 'none',
      hwDecode: false,
    });

    expect(args.slice(0, 7)).toEqual(['-hide_banner', '-nostdin', '-y', '-f', 'lavfi', '-i', 'color=c=black']);
    expect(args).not.toContain('-hwaccel');
  });
});

describe('selectEncoder', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await fse.remove(tempDir);
  });

  it('picks the first profile that produces output', async () => {
    const encoder = new FakeEncoder((request) =>
      request.profile.id === 'amd' || request.profile.id === 'svt' ? { size: 2_048 } : { code: 1 },
    );

    const selected = await selectEncoder(encoder, getCandidateProfiles(defaults), tempDir);

    expect(selected?.id).toBe('amd');
    expect(encoder.requests.map((r) => r.profile.id)).toEqual(['nvidia', 'intel', 'amd']);
    expect(await readdir(tempDir)).toEqual([]);
  });

  it('rejects a profile that exits cleanly but writes nothing', async () => {
    const encoder = new FakeEncoder(() => ({ size: 0 }));

    const selected = await selectEncoder(encoder, [createEncoderProfile('svt', defaults)], tempDir);

    expect(selected).toBeNull();
  });

  it('returns null when nothing works', async () => {
    const encoder = new FakeEncoder(() => ({ code: 1, partialSize: 10 }));

    expect(await selectEncoder(encoder, getCandidateProfiles(defaults), tempDir)).toBeNull();
    expect(await readdir(tempDir)).toEqual([]);
  });
});

describe('FFmpegEncoder', () => {
  it('reports a binary that cannot be started as a fatal tool error', async () => {
    const encoder = new FFmpegEncoder('/nonexistent/cloud-shrink-ffmpeg');

    await expect(
      encoder.encode({
        input: { kind: 'lavfi', source: 'color=c=black' },
        output: '/nonexistent/out.mkv',
        profile: createEncoderProfile('svt', defaults),
        audio: 'none',
        hwDecode: false,
      }),
    ).rejects.toBeInstanceOf(ToolUnavailableError);
  });
});
