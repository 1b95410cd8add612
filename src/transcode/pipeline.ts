/**
 * Admission pipeline for cloud-shrink
 * Runs each candidate through the gates in order, applies the resulting
 * history records and releases, and hands admitted files to the executor
 * while the download window fills for the files that follow
 */

import { getErrorMessage } from '../shared/errors.ts';
import { formatBytes } from '../shared/format.ts';
import { getLogger } from '../shared/logger.ts';
import { FatalRunError } from './errors.ts';
import { ADMISSION_GATES, type Gate, type GateEnv, type GateResult } from './gates.ts';
import { transcodeFile } from './transcoder.ts';
import type { CandidateFile, FileOutcome, RunSummary } from './types.ts';

const logger = getLogger().child('pipeline');

export function createEmptySummary(): RunSummary {
  return {
    scanned: 0,
    converted: 0,
    keptOriginal: 0,
    skipped: 0,
    failed: 0,
    bytesSavedThisRun: 0,
    totalBytesSaved: 0,
    skipReasons: {},
  };
}

export class AdmissionPipeline {
  constructor(
    private readonly env: GateEnv,
    private readonly gates: readonly Gate[] = ADMISSION_GATES,
  ) {}

  /**
   * Run gates in order and stop at the first one that does not proceed
   * With `cheapOnly`, gates that download or encode are left out.
   */
  async evaluate(file: CandidateFile, cheapOnly = false): Promise<GateResult> {
    for (const gate of this.gates) {
      if (cheapOnly && gate.expensive) continue;

      const result = await gate.check(file, this.env);
      if (result.kind !== 'proceed') {
        logger.debug(`${gate.name}: ${result.kind} for ${file.path}`);
        return result;
      }
    }
    return { kind: 'proceed' };
  }

  /** Whether an upcoming file is worth downloading ahead of its turn */
  async screenForPrefetch(file: CandidateFile): Promise<boolean> {
    const result = await this.evaluate(file, true);
    return result.kind === 'proceed';
  }

  private async prefetchUpcoming(upcoming: CandidateFile[]): Promise<void> {
    try {
      await this.env.downloads.prefetch(upcoming, (file) => this.screenForPrefetch(file));
    } catch (error) {
      logger.warn(`Prefetch failed: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Decide on one file and carry the decision out
   * @throws FatalRunError when a gate reports a condition that stops the run
   */
  async processFile(file: CandidateFile, upcoming: CandidateFile[] = []): Promise<FileOutcome> {
    const { settings, history, cloud, downloads } = this.env;

    try {
      const result = await this.evaluate(file, settings.dryRun);

      if (result.kind === 'fatal') {
        throw result.error instanceof FatalRunError ? result.error : new FatalRunError(result.error.message);
      }

      if (result.kind === 'skip') {
        if (settings.dryRun) {
          return { kind: 'skipped', reason: result.reason, recorded: null, detail: result.detail };
        }

        const recorded = result.record ?? null;
        if (recorded) {
          history.recordOutcome(file.path, recorded);
        }
        if (result.release && (await cloud.isLocallyAvailable(file.path))) {
          await cloud.releaseToCloudOnly(file.path);
        }
        return { kind: 'skipped', reason: result.reason, recorded, detail: result.detail };
      }

      if (settings.dryRun) {
        return { kind: 'skipped', reason: 'dry-run', recorded: null, detail: 'Would convert' };
      }

      const [outcome] = await Promise.all([
        transcodeFile(file, this.env.profile, {
          encoder: this.env.encoder,
          cloud,
          history,
          context: this.env.context,
          outputSuffix: settings.outputSuffix,
        }),
        this.prefetchUpcoming(upcoming),
      ]);
      return outcome;
    } finally {
      downloads.consume(file.path);
    }
  }

  /**
   * Process all candidates one at a time
   * Per-file errors become `failed` outcomes; fatal errors end the run.
   */
  async run(files: CandidateFile[]): Promise<RunSummary> {
    const summary = createEmptySummary();
    summary.scanned = files.length;

    for (const [index, file] of files.entries()) {
      logger.progress(index + 1, files.length, file.path);

      let outcome: FileOutcome;
      try {
        outcome = await this.processFile(file, files.slice(index + 1));
      } catch (error) {
        if (error instanceof FatalRunError) throw error;
        logger.error(`Unexpected error processing ${file.path}:`, error);
        outcome = { kind: 'failed', error: getErrorMessage(error) };
      }

      tallyOutcome(summary, outcome);
      logOutcome(file, outcome);
    }

    summary.totalBytesSaved = this.env.history.totalBytesSaved;
    return summary;
  }
}

export function tallyOutcome(summary: RunSummary, outcome: FileOutcome): void {
  switch (outcome.kind) {
    case 'converted':
      summary.converted++;
      summary.bytesSavedThisRun += outcome.bytesSaved;
      break;
    case 'kept-original':
      summary.keptOriginal++;
      break;
    case 'skipped':
      summary.skipped++;
      summary.skipReasons[outcome.reason] = (summary.skipReasons[outcome.reason] ?? 0) + 1;
      break;
    case 'failed':
      summary.failed++;
      break;
  }
}

function logOutcome(file: CandidateFile, outcome: FileOutcome): void {
  switch (outcome.kind) {
    case 'converted':
      logger.info(`Converted, saved ${formatBytes(outcome.bytesSaved)}: ${file.path}`);
      break;
    case 'kept-original':
      logger.info(`Kept original (output not smaller): ${file.path}`);
      break;
    case 'skipped':
      logger.info(`Skipped [${outcome.reason}] ${outcome.detail}: ${file.path}`);
      break;
    case 'failed':
      logger.error(`Failed: ${file.path} (${outcome.error})`);
      break;
  }
}
