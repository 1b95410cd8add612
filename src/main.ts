#!/usr/bin/env tsx

/**
 * cloud-shrink - Resumable AV1 re-encoding for cloud-synced video folders
 *
 * Main entry point with CLI handling
 */

import { Command, InvalidArgumentError } from 'commander';
import { historyAction, type HistoryOptions } from './cli/history.ts';
import { transcodeAction, type TranscodeOptions } from './cli/transcode.ts';

const VERSION = '1.0.0';

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parseNonNegativeNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return parsed;
}

/** Options every command accepts */
function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'path to configuration file')
    .option('-r, --root <dir>', 'cloud-synced folder to process (discovered when omitted)')
    .option('--verbose', 'enable verbose output')
    .option('--quiet', 'suppress non-error output')
    .option('--log-level <level>', 'debug, info, warn or error');
}

const program = new Command();

program
  .name('cloud-shrink')
  .description('Re-encode large videos in a cloud-synced folder to AV1, resumably')
  .version(VERSION, '-v, --version');

withCommonOptions(program.command('run', { isDefault: true }))
  .description('scan the root and convert files that are worth it')
  .option('-n, --dry-run', 'evaluate the cheap checks only; change nothing')
  .option('--prefetch <n>', 'upcoming files to download while transcoding', parseNonNegativeInt)
  .option('--min-savings <pct>', 'minimum predicted/measured saving in percent', parseNonNegativeNumber)
  .option('--min-bitrate <kbps>', 'skip files below this video bitrate', parseNonNegativeNumber)
  .addHelpText(
    'after',
    `
Environment variables:
  SHRINK_ROOT, SHRINK_MIN_SIZE_MB, SHRINK_MIN_BITRATE_KBPS, SHRINK_MIN_SAVINGS_PERCENT,
  SHRINK_TRIAL_SECONDS, SHRINK_PREFETCH, SHRINK_HISTORY_PATH, SHRINK_LOG_PATH,
  SHRINK_DRY_RUN, FFMPEG_PATH, FFPROBE_PATH, CLOUD_SHRINK_CONFIG

Examples:
  # Dry run to see what would be converted
  cloud-shrink run --dry-run --verbose

  # Process a specific folder, prefetching three files ahead
  cloud-shrink run --root "D:\\OneDrive\\Videos" --prefetch 3`,
  )
  .action(async (options: TranscodeOptions) => {
    process.exitCode = await transcodeAction(options);
  });

withCommonOptions(program.command('history'))
  .description('list recorded outcomes or reset records so files are evaluated again')
  .option('--status <status>', 'only list records with this status')
  .option('--clear <relpath>', 'remove the record for one file (path relative to the root)')
  .option('--clear-status <status>', 'remove every record with this status')
  .action(async (options: HistoryOptions) => {
    process.exitCode = await historyAction(options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
