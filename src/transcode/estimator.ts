/**
 * Savings estimator
 * Two stages: a codec ratio lookup that needs only the header, and a short
 * trial encode of a segment from inside the file once it is local
 */

import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import fse from 'fs-extra';
import { TEMP_MARKER } from '../shared/constants.ts';
import { getErrorMessage } from '../shared/errors.ts';
import { getLogger } from '../shared/logger.ts';
import type { RunContext } from './run-context.ts';
import type { Encoder, EncoderProfile, MediaInfo } from './types.ts';

const logger = getLogger().child('estimator');

/**
 * Expected AV1 size as a fraction of the source size, per source codec.
 * Keys are ffprobe codec names.
 */
export const DEFAULT_CODEC_RATIOS: Readonly<Record<string, number>> = {
  mpeg1video: 0.3,
  mpeg2video: 0.3,
  mpeg4: 0.4,
  msmpeg4v2: 0.4,
  msmpeg4v3: 0.4,
  wmv2: 0.4,
  wmv3: 0.45,
  vc1: 0.45,
  h264: 0.4,
  vp8: 0.5,
  vp9: 0.7,
  hevc: 0.7,
  av1: 1.0,
};

/** Ratio for codecs missing from the table */
export const UNKNOWN_CODEC_RATIO = 0.8;

/** Where the trial segment starts, as a fraction of the duration */
const TRIAL_START_FRACTION = 0.25;

export interface StaticEstimate {
  ratio: number;
  predictedNewSize: number;
  /** 0-100 */
  predictedPercent: number;
}

export interface TrialResult {
  origKbps: number;
  newKbps: number;
  /** 0-100; negative when the trial came out larger */
  percent: number;
}

//═══════════════════════════════════════════════════════════════════════════════
// STATIC ESTIMATE
//═══════════════════════════════════════════════════════════════════════════════

export function getCodecRatio(codec: string, overrides: Record<string, number> = {}): number {
  const key = codec.toLowerCase();
  return overrides[key] ?? DEFAULT_CODEC_RATIOS[key] ?? UNKNOWN_CODEC_RATIO;
}

/** Predict the re-encoded size from the source codec alone */
export function estimate(
  codec: string,
  size: number,
  overrides: Record<string, number> = {},
): StaticEstimate {
  const ratio = getCodecRatio(codec, overrides);
  return {
    ratio,
    predictedNewSize: Math.round(size * ratio),
    predictedPercent: (1 - ratio) * 100,
  };
}

//═══════════════════════════════════════════════════════════════════════════════
// TRIAL ENCODE
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Segment to encode: a quarter of the way in, pulled back so the whole
 * segment fits, from zero when the file is shorter than the segment
 */
export function getTrialWindow(
  totalSeconds: number | null,
  durationSeconds: number,
): { startSeconds: number; lengthSeconds: number } {
  if (totalSeconds === null) {
    return { startSeconds: 0, lengthSeconds: durationSeconds };
  }
  if (totalSeconds <= durationSeconds) {
    return { startSeconds: 0, lengthSeconds: totalSeconds };
  }
  const startSeconds = Math.min(totalSeconds * TRIAL_START_FRACTION, totalSeconds - durationSeconds);
  return { startSeconds, lengthSeconds: durationSeconds };
}

export interface TrialOptions {
  /** Directory for the throwaway output */
  tempDir: string;
  /** Tracks the artifact and encoder process for interrupt cleanup */
  context?: RunContext;
}

/**
 * Encode a short segment and compare bitrates
 * The segment carries audio only when the source figure does. Returns null when the trial could not produce a measurement; the
 * artifact is always deleted.
 */
export async function trialEncode(
  encoder: Encoder,
  path: string,
  probe: MediaInfo,
  profile: EncoderProfile,
  durationSeconds: number,
  options: TrialOptions,
): Promise<TrialResult | null> {
  if (probe.bitrateKbps === null || probe.bitrateKbps <= 0) {
    logger.debug(`No source bitrate to compare against: ${path}`);
    return null;
  }

  const { startSeconds, lengthSeconds } = getTrialWindow(probe.durationSeconds, durationSeconds);
  // A container or size-derived figure includes audio, so the segment keeps it too
  const audio = probe.bitrateSource === 'stream' ? 'none' : 'copy';
  const output = join(options.tempDir, `trial-${process.pid}${TEMP_MARKER}.mkv`);
  const { context } = options;

  await fse.ensureDir(options.tempDir);
  context?.beginAttempt(output);

  try {
    const { code, stderr } = await encoder.encode(
      {
        input: { kind: 'file', path },
        output,
        profile,
        startSeconds,
        durationSeconds: lengthSeconds,
        audio,
        hwDecode: true,
      },
      (child) => context?.attachChild(child),
    );

    if (code !== 0) {
      logger.warn(`Trial encode exited with code ${code}: ${stderr.trim().split('\n').pop() ?? ''}`);
      return null;
    }

    const { size } = await stat(output);
    if (size === 0 || lengthSeconds <= 0) {
      return null;
    }

    const newKbps = (size * 8) / lengthSeconds / 1000;
    const percent = (1 - newKbps / probe.bitrateKbps) * 100;
    return { origKbps: probe.bitrateKbps, newKbps, percent };
  } catch (error) {
    logger.warn(`Trial encode failed: ${getErrorMessage(error)}`);
    return null;
  } finally {
    await fse.remove(output);
    context?.endAttempt();
  }
}
