/**
 * Run CLI Action
 * Scans the root, admits candidates through the gates and re-encodes them
 */

import { loadConfig, resolveConfig } from '../transcode/config.ts';
import { createCloudSync } from '../transcode/cloud.ts';
import { StatfsDiskSpace } from '../transcode/disk.ts';
import { DownloadCoordinator } from '../transcode/downloads.ts';
import { FFmpegEncoder, getCandidateProfiles, selectEncoder } from '../transcode/encoder.ts';
import { NoUsableEncoderError } from '../transcode/errors.ts';
import { FFprobeProber } from '../transcode/ffprobe.ts';
import { HistoryStore } from '../transcode/history.ts';
import { AdmissionPipeline } from '../transcode/pipeline.ts';
import { RunContext, registerInterruptHandler } from '../transcode/run-context.ts';
import { scanCandidates } from '../transcode/scanner.ts';
import { acquireLock, checkFFmpegDependencies, releaseLock } from '../shared/process.ts';
import { configureGlobalLogger, isLogLevel, type LogLevel, type Logger } from '../shared/logger.ts';
import { getErrorMessage } from '../shared/errors.ts';
import { formatBytes } from '../shared/format.ts';
import type { ConfigInput, ResolvedConfig, RunSummary, SkipReason } from '../transcode/types.ts';

/** Options shared by every command */
export interface CommonOptions {
  config?: string;
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
  logLevel?: string;
}

/** Options for the run command */
export interface TranscodeOptions extends CommonOptions {
  dryRun?: boolean;
  prefetch?: number;
  minSavings?: number;
  minBitrate?: number;
}

/** Skip reasons in gate order, with their summary labels */
const SKIP_LABELS: ReadonlyArray<[SkipReason, string]> = [
  ['output-exists', 'Output already exists'],
  ['in-history', 'Already in history'],
  ['probe-failed', 'Unreadable header'],
  ['low-bitrate', 'Bitrate below floor'],
  ['low-savings', 'Low predicted savings'],
  ['download-timeout', 'Download timed out'],
  ['test-low-savings', 'Low trial savings'],
  ['insufficient-space', 'Not enough disk space'],
];

export function resolveLogLevel(options: CommonOptions): LogLevel {
  if (options.quiet) return 'error';
  if (options.verbose) return 'debug';
  if (options.logLevel && isLogLevel(options.logLevel)) return options.logLevel;
  return 'info';
}

/**
 * Load, resolve and announce the configuration
 * Returns null after logging when it is unusable.
 */
export async function loadRunConfig(
  options: CommonOptions,
  overrides: ConfigInput,
  logger: Logger,
): Promise<ResolvedConfig | null> {
  try {
    const config = await loadConfig(options.config, options.root ? { ...overrides, rootDir: options.root } : overrides);
    const resolved = await resolveConfig(config);
    configureGlobalLogger({ logFile: resolved.logFilePath });
    logger.info(`Root: ${resolved.rootDir}`);
    return resolved;
  } catch (error) {
    logger.error(getErrorMessage(error));
    return null;
  }
}

/** Run action handler; resolves with the process exit code */
export async function transcodeAction(options: TranscodeOptions): Promise<number> {
  const logger = configureGlobalLogger({ level: resolveLogLevel(options) });
  logger.info('cloud-shrink starting...');

  const overrides: ConfigInput = {};
  if (options.dryRun) overrides.dryRun = true;
  if (options.prefetch !== undefined) overrides.prefetchCount = options.prefetch;
  if (options.minSavings !== undefined) overrides.minSavingsPercent = options.minSavings;
  if (options.minBitrate !== undefined) overrides.minBitrateKbps = options.minBitrate;

  const config = await loadRunConfig(options, overrides, logger);
  if (!config) return 1;

  // Check dependencies
  const deps = await checkFFmpegDependencies(config.ffmpegPath, config.ffprobePath);
  if (!deps.ffmpeg) {
    logger.error(`ffmpeg not found at: ${config.ffmpegPath}`);
    return 1;
  }
  if (!deps.ffprobe) {
    logger.error(`ffprobe not found at: ${config.ffprobePath}`);
    return 1;
  }

  // Acquire lock (singleton execution)
  if (!(await acquireLock(config.lockFilePath))) {
    logger.error('Another instance is already running');
    return 1;
  }

  let disposeSignals: (() => void) | undefined;
  try {
    const history = await HistoryStore.load(config.historyPath, config.rootDir);
    const context = new RunContext(history);
    disposeSignals = registerInterruptHandler(context);

    const stats = history.stats();
    logger.info(
      `History: ${stats.records} records, ${stats.byStatus.converted} converted, ` +
        `${formatBytes(stats.totalBytesSaved)} saved so far`,
    );

    const encoder = new FFmpegEncoder(config.ffmpegPath);
    const profiles = getCandidateProfiles(config.encoder);
    const profile = await selectEncoder(encoder, profiles, config.tempDir);
    if (!profile) {
      throw new NoUsableEncoderError(profiles.map((p) => p.encoder));
    }

    const scan = await scanCandidates(config);
    if (scan.files.length === 0) {
      logger.info('No candidate files found');
      return 0;
    }

    const cloud = createCloudSync();
    const downloads = new DownloadCoordinator(cloud, {
      timeoutSeconds: config.downloadTimeoutSeconds,
      pollSeconds: config.downloadPollSeconds,
      prefetchCount: config.prefetchCount,
    });

    const pipeline = new AdmissionPipeline({
      settings: config,
      history,
      prober: new FFprobeProber(config.ffprobePath),
      cloud,
      downloads,
      encoder,
      diskSpace: new StatfsDiskSpace(),
      profile,
      context,
    });

    const summary = await pipeline.run(scan.files);
    printSummary(summary, config.dryRun, logger);
    return 0;
  } catch (error) {
    logger.error(`Fatal error: ${getErrorMessage(error)}`);
    return 1;
  } finally {
    disposeSignals?.();
    releaseLock();
  }
}

/** Print the end-of-run summary */
export function printSummary(summary: RunSummary, dryRun: boolean, logger: Logger): void {
  logger.info('='.repeat(50));
  logger.info(dryRun ? 'Dry run complete - no changes were made' : 'Run complete!');
  const wouldConvert = summary.skipReasons['dry-run'] ?? 0;
  logger.info(`  Scanned:       ${summary.scanned}`);
  if (dryRun) {
    logger.info(`  Would convert: ${wouldConvert}`);
  } else {
    logger.info(`  Converted:     ${summary.converted}`);
    logger.info(`  Kept original: ${summary.keptOriginal}`);
  }
  logger.info(`  Skipped:       ${summary.skipped - wouldConvert}`);
  for (const [reason, label] of SKIP_LABELS) {
    const count = summary.skipReasons[reason];
    if (count) logger.info(`    ${label}: ${count}`);
  }
  logger.info(`  Failed:        ${summary.failed}`);
  logger.info(`  Saved this run: ${formatBytes(summary.bytesSavedThisRun)}`);
  logger.info(`  Saved in total: ${formatBytes(summary.totalBytesSaved)}`);
  logger.info('='.repeat(50));

  if (summary.failed > 0) {
    logger.warn(`${summary.failed} files failed; they will be retried on the next run`);
  }
}
