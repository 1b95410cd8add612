/**
 * Transcode executor for cloud-shrink
 * Runs the full encode into a temp sibling, then either swaps it in for
 * the original or throws it away, and records the permanent outcome
 */

import { rename, stat, unlink } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import fse from 'fs-extra';
import { TEMP_MARKER } from '../shared/constants.ts';
import { getErrorMessage } from '../shared/errors.ts';
import { formatBytes, formatDuration } from '../shared/format.ts';
import { getLogger } from '../shared/logger.ts';
import type { HistoryStore } from './history.ts';
import type { RunContext } from './run-context.ts';
import type { CandidateFile, CloudSync, EncodeExit, Encoder, EncoderProfile, FileOutcome } from './types.ts';

const logger = getLogger().child('transcoder');

export interface TranscodeDeps {
  encoder: Encoder;
  cloud: CloudSync;
  history: HistoryStore;
  /** Receives the temp path and encoder process for interrupt cleanup */
  context?: RunContext;
  outputSuffix: string;
}

/**
 * Final output: beside the input, Matroska container
 * The full source name is kept, so movie.mp4 and movie.mkv in one folder
 * map to different outputs.
 */
export function getOutputPath(inputPath: string, suffix: string): string {
  return join(dirname(inputPath), `${basename(inputPath)}${suffix}.mkv`);
}

/** In-progress output; never picked up as a candidate */
export function getTempOutputPath(inputPath: string, suffix: string): string {
  return join(dirname(inputPath), `${basename(inputPath)}${suffix}${TEMP_MARKER}.mkv`);
}

function lastLine(text: string): string {
  return text.trim().split('\n').pop() ?? '';
}

/**
 * Transcode a single media file
 * The original is deleted only after the new file has taken its final name.
 */
export async function transcodeFile(
  file: CandidateFile,
  profile: EncoderProfile,
  deps: TranscodeDeps,
): Promise<FileOutcome> {
  const { encoder, cloud, history, context } = deps;
  const tempPath = getTempOutputPath(file.path, deps.outputSuffix);
  const finalPath = getOutputPath(file.path, deps.outputSuffix);
  const startTime = Date.now();

  logger.info(`Starting transcode: ${file.path}`);
  if (file.probe) {
    logger.info(`  ${file.probe.codec} -> AV1 (${profile.label})`);
  }

  // Leftover from a killed run
  await fse.remove(tempPath);
  context?.beginAttempt(tempPath);

  const discardTemp = async () => {
    await fse.remove(tempPath);
    context?.endAttempt();
  };

  let exit: EncodeExit;
  try {
    exit = await encoder.encode(
      {
        input: { kind: 'file', path: file.path },
        output: tempPath,
        profile,
        audio: 'copy',
        hwDecode: true,
        copySubtitles: extname(file.path).toLowerCase() === '.mkv',
      },
      (child) => context?.attachChild(child),
    );
  } catch (error) {
    await discardTemp();
    const message = getErrorMessage(error);
    logger.error(`Transcode failed: ${file.path}`, message);
    return { kind: 'failed', error: message };
  }

  if (exit.code !== 0) {
    await discardTemp();
    const message = `FFmpeg exited with code ${exit.code}: ${lastLine(exit.stderr)}`;
    logger.error(`Transcode failed: ${file.path}`, message);
    return { kind: 'failed', error: message };
  }

  let originalSize: number;
  let newSize: number;
  try {
    originalSize = (await stat(file.path)).size;
    newSize = (await stat(tempPath)).size;
  } catch (error) {
    await discardTemp();
    return { kind: 'failed', error: getErrorMessage(error) };
  }
  if (newSize === 0) {
    await discardTemp();
    return { kind: 'failed', error: 'FFmpeg produced an empty file' };
  }

  const duration = (Date.now() - startTime) / 1000;
  const reduction = Math.round((1 - newSize / originalSize) * 100);
  logger.info(`Transcode complete: ${formatDuration(duration)}`);
  logger.info(
    `  Size: ${formatBytes(originalSize)} -> ${formatBytes(newSize)} ` +
      `(${reduction}% ${reduction >= 0 ? 'reduction' : 'increase'})`,
  );

  // Not smaller: keep the original untouched
  if (newSize >= originalSize) {
    logger.warn('Transcoded file is not smaller, keeping original');
    await discardTemp();
    history.recordOutcome(file.path, 'kept-original');
    await cloud.releaseToCloudOnly(file.path);
    return { kind: 'kept-original', originalSize, newSize };
  }

  try {
    await rename(tempPath, finalPath);
  } catch (error) {
    await discardTemp();
    const message = `Could not move output into place: ${getErrorMessage(error)}`;
    logger.error(message);
    return { kind: 'failed', error: message };
  }
  context?.endAttempt();
  logger.info(`  Output: ${finalPath}`);

  try {
    await unlink(file.path);
  } catch (error) {
    // Both files now exist; the output-exists check skips this file from here on
    const message = `Converted, but the original could not be deleted: ${getErrorMessage(error)}`;
    logger.error(message);
    return { kind: 'failed', error: message };
  }

  const bytesSaved = originalSize - newSize;
  history.recordOutcome(file.path, 'converted', bytesSaved);
  await cloud.releaseToCloudOnly(finalPath);

  return { kind: 'converted', originalSize, newSize, bytesSaved };
}
