/**
 * FFprobe module for cloud-shrink
 * Reads codec, bitrate and duration from container/stream headers only,
 * so probing works against cloud placeholders without a full download
 */

import { runCommand, type CommandResult } from '../shared/process.ts';
import { getLogger } from '../shared/logger.ts';
import { ToolUnavailableError } from './errors.ts';
import { FFProbeOutputSchema } from './schemas.ts';
import type { BitrateSource, FFProbeOutput, MediaInfo, Prober } from './types.ts';

const logger = getLogger().child('ffprobe');

/** Parse an ffprobe numeric string, rejecting "N/A" and non-positive values */
function positiveNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

/**
 * Extract MediaInfo from ffprobe output
 * Bitrate: video stream bit_rate, then container bit_rate, then size × 8 / duration.
 * Returns null when there is no video codec to report.
 */
export function parseProbeOutput(output: FFProbeOutput, fileSize: number): MediaInfo | null {
  const video = output.streams[0];
  const codec = video?.codec_name?.toLowerCase();
  if (!codec) {
    return null;
  }

  const durationSeconds = positiveNumber(output.format.duration) ?? positiveNumber(video.duration);

  let bitsPerSecond = positiveNumber(video.bit_rate);
  let bitrateSource: BitrateSource | null = bitsPerSecond === null ? null : 'stream';

  if (bitsPerSecond === null) {
    bitsPerSecond = positiveNumber(output.format.bit_rate);
    if (bitsPerSecond !== null) bitrateSource = 'container';
  }
  if (bitsPerSecond === null && durationSeconds !== null) {
    const size = positiveNumber(output.format.size) ?? (fileSize > 0 ? fileSize : null);
    if (size !== null) {
      bitsPerSecond = (size * 8) / durationSeconds;
      bitrateSource = 'file-size';
    }
  }

  return {
    codec,
    bitrateKbps: bitsPerSecond === null ? null : Math.round(bitsPerSecond / 1000),
    bitrateSource,
    durationSeconds,
  };
}

/** Prober backed by the ffprobe binary */
export class FFprobeProber implements Prober {
  constructor(private readonly ffprobePath: string) {}

  async probe(path: string, fileSize = 0): Promise<MediaInfo | null> {
    logger.debug(`Probing: ${path}`);

    let result: CommandResult;
    try {
      result = await runCommand(this.ffprobePath, [
        '-v',
        'error',
        '-select_streams',
        'v:0',
        '-show_entries',
        'stream=codec_name,bit_rate,duration:format=duration,size,bit_rate',
        '-of',
        'json',
        path,
      ]);
    } catch (error) {
      throw new ToolUnavailableError(this.ffprobePath, error);
    }

    if (result.code !== 0) {
      logger.debug(`ffprobe failed with code ${result.code}: ${result.stderr.trim()}`);
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch {
      logger.debug(`ffprobe returned unparseable output for: ${path}`);
      return null;
    }

    const parsed = FFProbeOutputSchema.safeParse(json);
    if (!parsed.success) {
      logger.debug(`ffprobe output did not match the expected shape for: ${path}`);
      return null;
    }
    return parseProbeOutput(parsed.data, fileSize);
  }
}

/** Codec name from the header, or null when unknown */
export async function probeCodec(prober: Prober, path: string): Promise<string | null> {
  return (await prober.probe(path))?.codec ?? null;
}

/** Bitrate in kbps from the header, or null when unknown */
export async function probeBitrate(prober: Prober, path: string): Promise<number | null> {
  return (await prober.probe(path))?.bitrateKbps ?? null;
}
