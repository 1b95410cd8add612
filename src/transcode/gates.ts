/**
 * Admission gates
 * Ordered checks run for every candidate, cheapest first. Only the last
 * three spend bandwidth, CPU or disk. A gate never writes history itself;
 * it describes the outcome and the pipeline applies it.
 */

import { dirname } from 'node:path';
import fse from 'fs-extra';
import { formatBytes, formatKbps, formatPercentage } from '../shared/format.ts';
import { getLogger } from '../shared/logger.ts';
import { hasRoomFor } from './disk.ts';
import type { DownloadCoordinator } from './downloads.ts';
import { ToolUnavailableError } from './errors.ts';
import { estimate, trialEncode } from './estimator.ts';
import type { HistoryStore } from './history.ts';
import type { RunContext } from './run-context.ts';
import { getOutputPath } from './transcoder.ts';
import type {
  CandidateFile,
  CloudSync,
  DiskSpace,
  Encoder,
  EncoderProfile,
  HistoryStatus,
  Prober,
  ResolvedConfig,
  SkipReason,
} from './types.ts';

const logger = getLogger().child('gates');

export type GateSettings = Pick<
  ResolvedConfig,
  | 'outputSuffix'
  | 'minBitrateKbps'
  | 'minSavingsPercent'
  | 'codecRatios'
  | 'trialDurationSeconds'
  | 'diskSpaceFactor'
  | 'tempDir'
  | 'dryRun'
>;

/** Collaborators the gates and the executor work with */
export interface GateEnv {
  settings: GateSettings;
  history: HistoryStore;
  prober: Prober;
  cloud: CloudSync;
  downloads: DownloadCoordinator;
  encoder: Encoder;
  diskSpace: DiskSpace;
  profile: EncoderProfile;
  context?: RunContext;
}

export type GateResult =
  | { kind: 'proceed' }
  | {
      kind: 'skip';
      reason: SkipReason;
      detail: string;
      /** Permanent record to write; absent for transient skips */
      record?: HistoryStatus;
      /** Hand the local copy back to the cloud if there is one */
      release?: boolean;
    }
  | { kind: 'fatal'; error: Error };

export interface Gate {
  name: string;
  /** Downloads, encodes or needs local content */
  expensive: boolean;
  check(file: CandidateFile, env: GateEnv): Promise<GateResult>;
}

const PROCEED: GateResult = { kind: 'proceed' };

//═══════════════════════════════════════════════════════════════════════════════
// CHEAP GATES (header and filesystem metadata only)
//═══════════════════════════════════════════════════════════════════════════════

const outputExistsGate: Gate = {
  name: 'output-exists',
  expensive: false,
  async check(file, env) {
    const output = getOutputPath(file.path, env.settings.outputSuffix);
    if (await fse.pathExists(output)) {
      return { kind: 'skip', reason: 'output-exists', detail: `Output already exists: ${output}` };
    }
    return PROCEED;
  },
};

const historyGate: Gate = {
  name: 'history',
  expensive: false,
  async check(file, env) {
    const record = env.history.get(file.path);
    if (record) {
      return { kind: 'skip', reason: 'in-history', detail: `Already processed (${record.status})` };
    }
    return PROCEED;
  },
};

const probeGate: Gate = {
  name: 'probe',
  expensive: false,
  async check(file, env) {
    if (file.probe) return PROCEED;

    try {
      const info = await env.prober.probe(file.path, file.size);
      if (!info) {
        return { kind: 'skip', reason: 'probe-failed', detail: 'Could not read media header' };
      }
      file.probe = info;
      return PROCEED;
    } catch (error) {
      if (error instanceof ToolUnavailableError) {
        return { kind: 'fatal', error };
      }
      throw error;
    }
  },
};

const bitrateGate: Gate = {
  name: 'bitrate',
  expensive: false,
  async check(file, env) {
    const bitrate = file.probe?.bitrateKbps ?? null;
    const floor = env.settings.minBitrateKbps;
    if (bitrate !== null && bitrate < floor) {
      return {
        kind: 'skip',
        reason: 'low-bitrate',
        detail: `Bitrate ${formatKbps(bitrate)} below ${formatKbps(floor)}`,
        record: 'skipped-low-bitrate',
        release: true,
      };
    }
    return PROCEED;
  },
};

const staticSavingsGate: Gate = {
  name: 'static-savings',
  expensive: false,
  async check(file, env) {
    const codec = file.probe?.codec ?? 'unknown';
    const { predictedPercent, predictedNewSize } = estimate(codec, file.size, env.settings.codecRatios);
    if (predictedPercent < env.settings.minSavingsPercent) {
      return {
        kind: 'skip',
        reason: 'low-savings',
        detail: `Predicted saving ${formatPercentage(predictedPercent)} for ${codec}`,
        record: 'skipped-low-savings',
        release: true,
      };
    }
    logger.debug(`Predicted ${formatBytes(predictedNewSize)} (${formatPercentage(predictedPercent)} saving)`);
    return PROCEED;
  },
};

//═══════════════════════════════════════════════════════════════════════════════
// EXPENSIVE GATES
//═══════════════════════════════════════════════════════════════════════════════

const materializeGate: Gate = {
  name: 'materialize',
  expensive: true,
  async check(file, env) {
    if (await env.downloads.ensureLocal(file.path)) {
      return PROCEED;
    }
    return { kind: 'skip', reason: 'download-timeout', detail: 'Download did not complete in time' };
  },
};

const trialGate: Gate = {
  name: 'trial',
  expensive: true,
  async check(file, env) {
    if (!file.probe) return PROCEED;

    const trial = await trialEncode(
      env.encoder,
      file.path,
      file.probe,
      env.profile,
      env.settings.trialDurationSeconds,
      { tempDir: env.settings.tempDir, context: env.context },
    );
    if (!trial) {
      logger.warn('Trial encode failed, attempting full transcode anyway');
      return PROCEED;
    }

    logger.info(
      `  Trial: ${formatKbps(trial.origKbps)} -> ${formatKbps(trial.newKbps)} ` +
        `(${formatPercentage(trial.percent)} saving)`,
    );
    if (trial.percent < env.settings.minSavingsPercent) {
      return {
        kind: 'skip',
        reason: 'test-low-savings',
        detail: `Trial saving ${formatPercentage(trial.percent)}`,
        record: 'skipped-test-low-savings',
        release: true,
      };
    }
    return PROCEED;
  },
};

const diskSpaceGate: Gate = {
  name: 'disk-space',
  expensive: true,
  async check(file, env) {
    const free = await env.diskSpace.freeBytes(dirname(file.path));
    if (!hasRoomFor(free, file.size, env.settings.diskSpaceFactor)) {
      return {
        kind: 'skip',
        reason: 'insufficient-space',
        detail: `Need ${formatBytes(file.size * env.settings.diskSpaceFactor)}, ${formatBytes(free)} free`,
      };
    }
    return PROCEED;
  },
};

/** Evaluation order */
export const ADMISSION_GATES: readonly Gate[] = [
  outputExistsGate,
  historyGate,
  probeGate,
  bitrateGate,
  staticSavingsGate,
  materializeGate,
  trialGate,
  diskSpaceGate,
];
