/**
 * Zod schemas for configuration and the persisted history file
 * Provides runtime type checking and validation for everything read from disk
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { DEFAULT_EXCLUSION_DIRS, DEFAULT_EXCLUSION_PATTERNS, VIDEO_EXTENSIONS } from '../shared/constants.ts';

//═══════════════════════════════════════════════════════════════════════════════
// ENCODER SETTINGS
//═══════════════════════════════════════════════════════════════════════════════

/** Encoder profiles, in probing priority order (hardware first) */
export const EncoderIdSchema = z.enum(['nvidia', 'intel', 'amd', 'svt', 'aom']);

/** NVIDIA NVENC encoder settings */
export const NvidiaEncoderSettingsSchema = z.object({
  /** NVENC preset (p1=fastest, p7=slowest/best quality) */
  preset: z.enum(['p1', 'p2', 'p3', 'p4', 'p5', 'p6', 'p7']).default('p5'),
  /** Encoding tune mode */
  tune: z.enum(['hq', 'll', 'ull', 'lossless']).default('hq'),
  /** Constant quality target for VBR mode (0-51, lower = better) */
  cq: z.number().int().min(0).max(51).default(32),
  /** Number of lookahead frames (0-32) */
  lookahead: z.number().int().min(0).max(32).default(20),
  /** Enable temporal adaptive quantization */
  temporalAq: z.boolean().default(true),
  /** Number of B-frames (0-4) */
  bFrames: z.number().int().min(0).max(4).default(3),
  /** B-frame reference mode */
  bRefMode: z.enum(['disabled', 'each', 'middle']).default('middle'),
});

/** Intel Quick Sync encoder settings */
export const IntelEncoderSettingsSchema = z.object({
  preset: z.enum(['veryfast', 'faster', 'fast', 'medium', 'slow', 'slower', 'veryslow']).default('medium'),
  /** ICQ quality (1-51, lower = better) */
  globalQuality: z.number().int().min(1).max(51).default(28),
});

/** AMD AMF encoder settings */
export const AmdEncoderSettingsSchema = z.object({
  quality: z.enum(['speed', 'balanced', 'quality', 'high_quality']).default('quality'),
  /** Constant QP for I and P frames (0-255) */
  qp: z.number().int().min(0).max(255).default(120),
});

/** Software SVT-AV1 encoder settings */
export const SvtEncoderSettingsSchema = z.object({
  /** Speed preset (0=slowest/best, 13=fastest) */
  preset: z.number().int().min(0).max(13).default(8),
  /** CRF value (0-63, lower = better quality) */
  crf: z.number().int().min(0).max(63).default(30),
  /** Synthesized film grain level (0 = off) */
  filmGrain: z.number().int().min(0).max(50).default(0),
});

/** Software libaom encoder settings */
export const AomEncoderSettingsSchema = z.object({
  /** Speed (0=slowest/best, 8=fastest) */
  cpuUsed: z.number().int().min(0).max(8).default(6),
  /** CRF value (0-63, lower = better quality) */
  crf: z.number().int().min(0).max(63).default(30),
});

export const EncoderConfigSchema = z.object({
  /** Restrict probing to one profile, or try all of them in priority order */
  preferred: z.union([z.literal('auto'), EncoderIdSchema]).default('auto'),
  nvidia: NvidiaEncoderSettingsSchema.default({}),
  intel: IntelEncoderSettingsSchema.default({}),
  amd: AmdEncoderSettingsSchema.default({}),
  svt: SvtEncoderSettingsSchema.default({}),
  aom: AomEncoderSettingsSchema.default({}),
});

//═══════════════════════════════════════════════════════════════════════════════
// EXCLUSION RULES
//═══════════════════════════════════════════════════════════════════════════════

/** Exclusion rules for skipping files/directories */
export const ExclusionRulesSchema = z.object({
  /** Directory names to exclude (case-insensitive, matches any path component) */
  directories: z.array(z.string()).default([]),
  /** Patterns to match against filename only (regex strings) */
  filePatterns: z.array(z.string()).default([]),
});

//═══════════════════════════════════════════════════════════════════════════════
// MAIN CONFIGURATION SCHEMA
//═══════════════════════════════════════════════════════════════════════════════

/** Main configuration schema */
export const ConfigSchema = z.object({
  // ─── Locations ────────────────────────────────────────────────────────────
  /** Cloud-synced folder to walk (discovered when omitted) */
  rootDir: z.string().optional(),
  /** History file (defaults to ~/.cloud-shrink/history.json) */
  historyPath: z.string().optional(),
  /** Append-only log file (defaults to ~/.cloud-shrink/cloud-shrink.log) */
  logFilePath: z.string().optional(),
  /** Lock file for singleton execution */
  lockFilePath: z.string().optional(),
  /** Scratch directory for encoder capability probes */
  tempDir: z.string().default(join(tmpdir(), 'cloud-shrink')),

  // ─── Admission thresholds ─────────────────────────────────────────────────
  /** Files smaller than this are never candidates */
  minFileSizeMB: z.number().positive().default(250),
  /** Files below this video bitrate are not worth re-encoding */
  minBitrateKbps: z.number().min(0).default(1500),
  /** Minimum predicted/measured saving to go ahead */
  minSavingsPercent: z.number().min(0).max(100).default(10),
  /** Length of the trial segment encode */
  trialDurationSeconds: z.number().int().positive().default(20),
  /** Free space required at the destination, as a multiple of the input size */
  diskSpaceFactor: z.number().min(1).default(1.1),
  /** Overrides for the codec → output/input size ratio table */
  codecRatios: z.record(z.string(), z.number().positive().max(2)).default({}),

  // ─── Downloads ────────────────────────────────────────────────────────────
  /** Upcoming candidates downloaded while the current file transcodes */
  prefetchCount: z.number().int().min(0).default(2),
  /** Give up waiting for a cloud file after this long (retried next run) */
  downloadTimeoutSeconds: z.number().positive().default(1800),
  /** Interval between locality checks while waiting */
  downloadPollSeconds: z.number().positive().default(5),

  // ─── Output ───────────────────────────────────────────────────────────────
  /** Appended to the file stem of the re-encoded output */
  outputSuffix: z.string().min(1).default('_av1'),

  // ─── File Filtering ───────────────────────────────────────────────────────
  /** Video file extensions to process */
  videoExtensions: z.array(z.string()).default([...VIDEO_EXTENSIONS]),
  /** Exclusion rules for skipping files */
  exclusions: ExclusionRulesSchema.default({
    directories: [...DEFAULT_EXCLUSION_DIRS],
    filePatterns: [...DEFAULT_EXCLUSION_PATTERNS],
  }),

  // ─── FFmpeg Configuration ─────────────────────────────────────────────────
  /** Path to ffmpeg binary */
  ffmpegPath: z.string().default('ffmpeg'),
  /** Path to ffprobe binary */
  ffprobePath: z.string().default('ffprobe'),
  /** Encoder selection and per-vendor tuning */
  encoder: EncoderConfigSchema.default({}),

  // ─── Runtime Flags ────────────────────────────────────────────────────────
  /** Dry run mode - evaluate the cheap gates only, change nothing */
  dryRun: z.boolean().default(false),
});

//═══════════════════════════════════════════════════════════════════════════════
// HISTORY FILE SCHEMAS
//═══════════════════════════════════════════════════════════════════════════════

/** Permanent outcome of evaluating a file */
export const HistoryStatusSchema = z.enum([
  'converted',
  'kept-original',
  'skipped-low-bitrate',
  'skipped-low-savings',
  'skipped-test-low-savings',
]);

export const HistoryRecordSchema = z.object({
  status: HistoryStatusSchema,
  /** ISO-8601 time the outcome was recorded */
  timestamp: z.string(),
  /** Zero unless status is converted */
  bytesSaved: z.number().int().min(0),
});

/** Current on-disk layout */
export const HistoryFileSchema = z.object({
  version: z.literal(2),
  totalBytesSaved: z.number().int().min(0),
  records: z.record(z.string(), HistoryRecordSchema),
});

/** Untyped layout written before the schema was versioned */
export const LegacyHistoryFileSchema = z.object({
  files: z.record(
    z.string(),
    z
      .object({
        status: z.string(),
        time: z.string().optional(),
        saved: z.number().optional(),
      })
      .passthrough(),
  ),
  total_saved: z.number().optional(),
});

//═══════════════════════════════════════════════════════════════════════════════
// FFPROBE OUTPUT
//═══════════════════════════════════════════════════════════════════════════════

/** The subset of `ffprobe -of json` output that is read */
export const FFProbeOutputSchema = z.object({
  streams: z
    .array(
      z.object({
        codec_name: z.string().optional(),
        bit_rate: z.string().optional(),
        duration: z.string().optional(),
      }),
    )
    .default([]),
  format: z
    .object({
      duration: z.string().optional(),
      size: z.string().optional(),
      bit_rate: z.string().optional(),
    })
    .default({}),
});

//═══════════════════════════════════════════════════════════════════════════════
// TYPE EXPORTS
//═══════════════════════════════════════════════════════════════════════════════

export type EncoderId = z.infer<typeof EncoderIdSchema>;
export type NvidiaEncoderSettings = z.infer<typeof NvidiaEncoderSettingsSchema>;
export type IntelEncoderSettings = z.infer<typeof IntelEncoderSettingsSchema>;
export type AmdEncoderSettings = z.infer<typeof AmdEncoderSettingsSchema>;
export type SvtEncoderSettings = z.infer<typeof SvtEncoderSettingsSchema>;
export type AomEncoderSettings = z.infer<typeof AomEncoderSettingsSchema>;
export type EncoderConfig = z.infer<typeof EncoderConfigSchema>;
export type ExclusionRules = z.infer<typeof ExclusionRulesSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type HistoryStatus = z.infer<typeof HistoryStatusSchema>;
export type HistoryRecord = z.infer<typeof HistoryRecordSchema>;
export type HistoryFile = z.infer<typeof HistoryFileSchema>;
export type FFProbeOutput = z.infer<typeof FFProbeOutputSchema>;
