/**
 * Encoder profile registry for cloud-shrink
 * Provides hardware-specific FFmpeg configurations and picks the first one
 * that actually encodes in the current environment
 */

import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { ChildProcess } from 'node:child_process';
import fse from 'fs-extra';
import { getErrorMessage } from '../shared/errors.ts';
import { getLogger } from '../shared/logger.ts';
import { runCommand } from '../shared/process.ts';
import { ToolUnavailableError } from './errors.ts';
import type {
  AmdEncoderSettings,
  AomEncoderSettings,
  IntelEncoderSettings,
  NvidiaEncoderSettings,
  SvtEncoderSettings,
} from './schemas.ts';
import { EncoderIdSchema } from './schemas.ts';
import type { EncodeExit, EncodeRequest, Encoder, EncoderConfig, EncoderId, EncoderProfile } from './types.ts';

const logger = getLogger().child('encoder');

/** Synthetic clip used to check that an encoder works at all */
const CAPABILITY_PROBE_SOURCE = 'color=c=black:s=320x240:r=25:d=1';

//═══════════════════════════════════════════════════════════════════════════════
// NVIDIA NVENC PROFILE
//═══════════════════════════════════════════════════════════════════════════════

function createNvidiaProfile(settings: NvidiaEncoderSettings): EncoderProfile {
  const parameters: string[] = [
    '-preset', settings.preset,
    '-tune', settings.tune,
    '-rc', 'vbr',
    '-cq', String(settings.cq),
    '-b:v', '0',
  ];

  // Lookahead
  if (settings.lookahead > 0) {
    parameters.push('-rc-lookahead', String(settings.lookahead));
  }

  // Adaptive quantization
  if (settings.temporalAq) {
    parameters.push('-temporal-aq', '1');
  }

  // B-frames
  parameters.push('-bf', String(settings.bFrames));
  if (settings.bFrames > 0) {
    parameters.push('-b_ref_mode', settings.bRefMode);
  }

  return {
    id: 'nvidia',
    label: 'NVIDIA NVENC',
    encoder: 'av1_nvenc',
    parameters,
    codecFamily: 'av1',
    hwAccelInput: { hwaccel: 'cuda', hwaccelOutputFormat: 'cuda' },
  };
}

//═══════════════════════════════════════════════════════════════════════════════
// INTEL QSV / AMD AMF PROFILES
//═══════════════════════════════════════════════════════════════════════════════

function createIntelProfile(settings: IntelEncoderSettings): EncoderProfile {
  return {
    id: 'intel',
    label: 'Intel Quick Sync',
    encoder: 'av1_qsv',
    parameters: ['-preset', settings.preset, '-global_quality', String(settings.globalQuality)],
    codecFamily: 'av1',
    hwAccelInput: { hwaccel: 'qsv', hwaccelOutputFormat: 'qsv' },
  };
}

function createAmdProfile(settings: AmdEncoderSettings): EncoderProfile {
  const qp = String(settings.qp);
  return {
    id: 'amd',
    label: 'AMD AMF',
    encoder: 'av1_amf',
    parameters: ['-quality', settings.quality, '-rc', 'cqp', '-qp_i', qp, '-qp_p', qp],
    codecFamily: 'av1',
    hwAccelInput: { hwaccel: 'd3d11va' },
  };
}

//═══════════════════════════════════════════════════════════════════════════════
// SOFTWARE PROFILES (SVT-AV1, libaom)
//═══════════════════════════════════════════════════════════════════════════════

function createSvtProfile(settings: SvtEncoderSettings): EncoderProfile {
  const parameters: string[] = ['-preset', String(settings.preset), '-crf', String(settings.crf)];

  if (settings.filmGrain > 0) {
    parameters.push('-svtav1-params', `film-grain=${settings.filmGrain}`);
  }

  return {
    id: 'svt',
    label: 'Software (SVT-AV1)',
    encoder: 'libsvtav1',
    parameters,
    codecFamily: 'av1',
    // Let ffmpeg pick whatever decoder acceleration the host has
    hwAccelInput: { hwaccel: 'auto' },
  };
}

function createAomProfile(settings: AomEncoderSettings): EncoderProfile {
  return {
    id: 'aom',
    label: 'Software (libaom)',
    encoder: 'libaom-av1',
    // Constant quality needs a zero target bitrate
    parameters: ['-cpu-used', String(settings.cpuUsed), '-crf', String(settings.crf), '-b:v', '0', '-row-mt', '1'],
    codecFamily: 'av1',
    hwAccelInput: { hwaccel: 'auto' },
  };
}

//═══════════════════════════════════════════════════════════════════════════════
// REGISTRY
//═══════════════════════════════════════════════════════════════════════════════

/** Build one profile from its id and the configured tuning */
export function createEncoderProfile(id: EncoderId, config: EncoderConfig): EncoderProfile {
  switch (id) {
    case 'nvidia':
      return createNvidiaProfile(config.nvidia);
    case 'intel':
      return createIntelProfile(config.intel);
    case 'amd':
      return createAmdProfile(config.amd);
    case 'svt':
      return createSvtProfile(config.svt);
    case 'aom':
      return createAomProfile(config.aom);
  }
}

/**
 * Candidate profiles in probing order: hardware first, then SVT-AV1, libaom last.
 * A preferred profile narrows the list to that one entry.
 */
export function getCandidateProfiles(config: EncoderConfig): EncoderProfile[] {
  const ids = config.preferred === 'auto' ? EncoderIdSchema.options : [config.preferred];
  return ids.map((id) => createEncoderProfile(id, config));
}

//═══════════════════════════════════════════════════════════════════════════════
// FFMPEG INVOCATION
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Build complete FFmpeg arguments for an encode request
 */
export function buildFFmpegArgs(request: EncodeRequest): string[] {
  const { input, profile } = request;
  const args: string[] = ['-hide_banner', '-nostdin', '-y'];

  if (input.kind === 'file') {
    // Hardware acceleration input options
    if (request.hwDecode && profile.hwAccelInput.hwaccel) {
      args.push('-hwaccel', profile.hwAccelInput.hwaccel);
      if (profile.hwAccelInput.hwaccelOutputFormat) {
        args.push('-hwaccel_output_format', profile.hwAccelInput.hwaccelOutputFormat);
      }
    }
    // Input-side seek is fast and lands on the nearest keyframe
    if (request.startSeconds !== undefined && request.startSeconds > 0) {
      args.push('-ss', request.startSeconds.toFixed(3));
    }
    args.push('-i', input.path);
  } else {
    args.push('-f', 'lavfi', '-i', input.source);
  }

  if (request.durationSeconds !== undefined) {
    args.push('-t', String(request.durationSeconds));
  }

  // Streams: first video always, audio copied verbatim or dropped
  args.push('-map', '0:v:0');
  if (request.audio === 'copy') {
    args.push('-map', '0:a?', '-c:a', 'copy');
  } else {
    args.push('-an');
  }
  if (request.copySubtitles) {
    args.push('-map', '0:s?', '-c:s', 'copy');
  } else {
    args.push('-sn');
  }

  // Video encoder
  args.push('-c:v', profile.encoder, ...profile.parameters);

  // All available threads
  args.push('-threads', '0', '-max_muxing_queue_size', '1024');

  args.push(request.output);
  return args;
}

/** Encoder backed by the ffmpeg binary */
export class FFmpegEncoder implements Encoder {
  constructor(private readonly ffmpegPath: string) {}

  async encode(request: EncodeRequest, onSpawn?: (child: ChildProcess) => void): Promise<EncodeExit> {
    const args = buildFFmpegArgs(request);
    logger.debug(`FFmpeg command: ${this.ffmpegPath} ${args.join(' ')}`);

    try {
      const { code, stderr } = await runCommand(this.ffmpegPath, args, { onSpawn });
      return { code, stderr };
    } catch (error) {
      throw new ToolUnavailableError(this.ffmpegPath, error);
    }
  }
}

//═══════════════════════════════════════════════════════════════════════════════
// SELECTION
//═══════════════════════════════════════════════════════════════════════════════

async function producedOutput(path: string): Promise<boolean> {
  try {
    return (await stat(path)).size > 0;
  } catch {
    return false;
  }
}

/**
 * Pick the first profile whose one-second synthetic encode succeeds
 * Returns null when none works.
 */
export async function selectEncoder(
  encoder: Encoder,
  profiles: EncoderProfile[],
  tempDir: string,
): Promise<EncoderProfile | null> {
  await fse.ensureDir(tempDir);

  for (const profile of profiles) {
    const output = join(tempDir, `capability-${profile.id}-${process.pid}.mkv`);
    logger.debug(`Testing encoder: ${profile.label} (${profile.encoder})`);

    try {
      const { code, stderr } = await encoder.encode({
        input: { kind: 'lavfi', source: CAPABILITY_PROBE_SOURCE },
        output,
        profile,
        audio: 'none',
        hwDecode: false,
      });

      if (code === 0 && (await producedOutput(output))) {
        logger.info(`Using ${profile.label} encoder (${profile.encoder})`);
        return profile;
      }
      logger.debug(`${profile.label} unavailable (exit ${code}): ${stderr.trim().split('\n').pop() ?? ''}`);
    } catch (error) {
      logger.debug(`${profile.label} unavailable: ${getErrorMessage(error)}`);
    } finally {
      await fse.remove(output);
    }
  }

  return null;
}
