/**
 * Types and interfaces for the cloud-shrink pipeline
 *
 * Note: Runtime-validated types are in schemas.ts using Zod.
 * This file contains the in-memory model and collaborator contracts.
 */

import type { ChildProcess } from 'node:child_process';
import type { Config, EncoderId, HistoryStatus } from './schemas.ts';

export type {
  Config,
  ConfigInput,
  EncoderId,
  EncoderConfig,
  ExclusionRules,
  HistoryStatus,
  HistoryRecord,
  HistoryFile,
  FFProbeOutput,
} from './schemas.ts';

/** Config after locations have been resolved */
export interface ResolvedConfig extends Config {
  rootDir: string;
  historyPath: string;
  logFilePath: string;
  lockFilePath: string;
}

//═══════════════════════════════════════════════════════════════════════════════
// MEDIA MODEL
//═══════════════════════════════════════════════════════════════════════════════

/** Container/stream metadata read from the file header */
/** Where a bitrate figure came from; only the stream figure leaves audio out */
export type BitrateSource = 'stream' | 'container' | 'file-size';

export interface MediaInfo {
  codec: string;
  /** Bitrate in kbps; null when neither reported nor derivable */
  bitrateKbps: number | null;
  bitrateSource: BitrateSource | null;
  /** Duration in seconds; null when the container does not report one */
  durationSeconds: number | null;
}

/** One on-disk media file eligible for processing */
export interface CandidateFile {
  path: string;
  size: number;
  /** Attached by the probe gate; never persisted */
  probe?: MediaInfo;
}

//═══════════════════════════════════════════════════════════════════════════════
// ENCODER PROFILE TYPES
//═══════════════════════════════════════════════════════════════════════════════

/** FFmpeg arguments for hardware-accelerated decoding */
export interface HWAccelInputArgs {
  hwaccel?: string;
  hwaccelOutputFormat?: string;
}

/** Complete encoding profile for a specific hardware type */
export interface EncoderProfile {
  id: EncoderId;
  label: string;
  /** FFmpeg encoder name (e.g. av1_nvenc) */
  encoder: string;
  /** Encoder-specific parameters, in order */
  parameters: string[];
  /** Codec family the profile produces */
  codecFamily: 'av1';
  hwAccelInput: HWAccelInputArgs;
}

//═══════════════════════════════════════════════════════════════════════════════
// COLLABORATOR CONTRACTS
//═══════════════════════════════════════════════════════════════════════════════

/** Reads codec/bitrate from container headers only */
export interface Prober {
  /**
   * Resolves null when the header is unreadable.
   * Rejects only when the probing tool itself cannot be started.
   */
  probe(path: string, fileSize?: number): Promise<MediaInfo | null>;
}

/** Input of an encode: a file, or a lavfi source expression for capability probes */
export type EncodeInput = { kind: 'file'; path: string } | { kind: 'lavfi'; source: string };

export interface EncodeRequest {
  input: EncodeInput;
  output: string;
  profile: EncoderProfile;
  /** Seek before decoding (seconds) */
  startSeconds?: number;
  /** Stop after this many seconds of output */
  durationSeconds?: number;
  /** Keep audio (copied, never re-encoded) or drop it */
  audio: 'copy' | 'none';
  /** Decode on the profile's hardware */
  hwDecode: boolean;
  /** Carry subtitle streams over */
  copySubtitles?: boolean;
}

export interface EncodeExit {
  code: number;
  /** Tail of the tool's diagnostic output */
  stderr: string;
}

/** Runs the external encoder */
export interface Encoder {
  encode(request: EncodeRequest, onSpawn?: (child: ChildProcess) => void): Promise<EncodeExit>;
}

/** The two operations needed from the host's cloud-sync integration, plus a download trigger */
export interface CloudSync {
  isLocallyAvailable(path: string): Promise<boolean>;
  /** Drop the local copy, keep the placeholder. Resolves false if the request failed. */
  releaseToCloudOnly(path: string): Promise<boolean>;
  /** Ask the sync layer to materialize the file; does not wait for it */
  requestDownload(path: string): void;
}

/** Free-space lookup for the disk-space gate */
export interface DiskSpace {
  freeBytes(dir: string): Promise<number>;
}

//═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES
//═══════════════════════════════════════════════════════════════════════════════

/** Why a file was not converted this run */
export type SkipReason =
  | 'output-exists'
  | 'in-history'
  | 'probe-failed'
  | 'low-bitrate'
  | 'low-savings'
  | 'download-timeout'
  | 'test-low-savings'
  | 'insufficient-space'
  | 'dry-run';

/** Terminal result for one file */
export type FileOutcome =
  | { kind: 'converted'; originalSize: number; newSize: number; bytesSaved: number }
  | { kind: 'kept-original'; originalSize: number; newSize: number }
  | { kind: 'skipped'; reason: SkipReason; recorded: HistoryStatus | null; detail: string }
  | { kind: 'failed'; error: string };

/** Statistics for the run */
export interface RunSummary {
  scanned: number;
  converted: number;
  keptOriginal: number;
  skipped: number;
  failed: number;
  bytesSavedThisRun: number;
  totalBytesSaved: number;
  /** Skips broken down by reason */
  skipReasons: Partial<Record<SkipReason, number>>;
}
