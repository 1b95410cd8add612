/**
 * Configuration module for cloud-shrink
 * Loads the config file, applies environment and CLI overrides, validates with Zod
 * and resolves the root folder and state file locations
 */

import { readFile, stat } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import type { ZodIssue } from 'zod';
import { DEFAULT_CONFIG_PATHS, DEFAULT_PATHS } from '../shared/constants.ts';
import { getErrorCode } from '../shared/errors.ts';
import { getLogger } from '../shared/logger.ts';
import { RootNotFoundError } from './errors.ts';
import { ConfigSchema } from './schemas.ts';
import type { Config, ConfigInput, ResolvedConfig } from './types.ts';

const logger = getLogger().child('config');

type Env = NodeJS.ProcessEnv;

/** Default configuration values */
export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

//═══════════════════════════════════════════════════════════════════════════════
// CONFIG FILE DISCOVERY
//═══════════════════════════════════════════════════════════════════════════════

/** Get default config file paths to check */
export function getDefaultConfigPaths(env: Env = process.env): string[] {
  const paths: string[] = [];
  const home = env.HOME ?? env.USERPROFILE;

  if (env.XDG_CONFIG_HOME) {
    paths.push(join(env.XDG_CONFIG_HOME, DEFAULT_CONFIG_PATHS.xdgDirName, DEFAULT_CONFIG_PATHS.configFile));
  }
  if (home) {
    paths.push(join(home, '.config', DEFAULT_CONFIG_PATHS.xdgDirName, DEFAULT_CONFIG_PATHS.configFile));
    paths.push(join(home, DEFAULT_CONFIG_PATHS.legacyConfigFile));
  }
  paths.push(...DEFAULT_CONFIG_PATHS.systemPaths);

  return paths;
}

/** Check if a path exists */
async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/** Find the first existing config file */
export async function findConfigFile(env: Env = process.env): Promise<string | undefined> {
  const envPath = env.CLOUD_SHRINK_CONFIG;
  if (envPath && (await pathExists(envPath))) {
    return envPath;
  }

  for (const path of getDefaultConfigPaths(env)) {
    if (await pathExists(path)) {
      return path;
    }
  }
  return undefined;
}

//═══════════════════════════════════════════════════════════════════════════════
// CONFIG LOADING
//═══════════════════════════════════════════════════════════════════════════════

/** Load raw JSON config from file */
export async function loadConfigFromFile(filePath: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      throw new Error(`Config file not found: ${filePath}`);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid JSON in config file: ${filePath}\n${error instanceof Error ? error.message : ''}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }
  return { ...parsed };
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** Environment variable overrides, applied on top of the config file */
export function getEnvOverrides(env: Env = process.env): ConfigInput {
  const overrides: ConfigInput = {};

  if (env.SHRINK_ROOT) overrides.rootDir = env.SHRINK_ROOT;
  if (env.SHRINK_HISTORY_PATH) overrides.historyPath = env.SHRINK_HISTORY_PATH;
  if (env.SHRINK_LOG_PATH) overrides.logFilePath = env.SHRINK_LOG_PATH;

  const minSize = parseNumber(env.SHRINK_MIN_SIZE_MB);
  if (minSize !== undefined) overrides.minFileSizeMB = minSize;

  const minBitrate = parseNumber(env.SHRINK_MIN_BITRATE_KBPS);
  if (minBitrate !== undefined) overrides.minBitrateKbps = minBitrate;

  const minSavings = parseNumber(env.SHRINK_MIN_SAVINGS_PERCENT);
  if (minSavings !== undefined) overrides.minSavingsPercent = minSavings;

  const trialSeconds = parseNumber(env.SHRINK_TRIAL_SECONDS);
  if (trialSeconds !== undefined) overrides.trialDurationSeconds = trialSeconds;

  const prefetch = parseNumber(env.SHRINK_PREFETCH);
  if (prefetch !== undefined) overrides.prefetchCount = prefetch;

  if (env.FFMPEG_PATH) overrides.ffmpegPath = env.FFMPEG_PATH;
  if (env.FFPROBE_PATH) overrides.ffprobePath = env.FFPROBE_PATH;

  const dryRun = env.SHRINK_DRY_RUN;
  if (dryRun !== undefined) overrides.dryRun = dryRun === 'true' || dryRun === '1';

  return overrides;
}

/** Turn Zod issues into one line per problem */
function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a raw configuration object
 * Returns a list of problems; empty when the config is usable
 */
export function validateConfig(raw: unknown): string[] {
  const result = ConfigSchema.safeParse(raw);
  return result.success ? [] : formatIssues(result.error.issues);
}

/**
 * Load configuration with priority: CLI overrides > environment > file > defaults
 * A missing config file is not an error; the defaults are used.
 */
export async function loadConfig(
  configFilePath?: string,
  cliOverrides: ConfigInput = {},
  env: Env = process.env,
): Promise<Config> {
  const actualPath = configFilePath ?? (await findConfigFile(env));

  let fileConfig: Record<string, unknown> = {};
  if (actualPath) {
    logger.info(`Loading config from: ${actualPath}`);
    fileConfig = await loadConfigFromFile(actualPath);
  } else {
    logger.debug('No config file found, using defaults');
  }

  const merged = { ...fileConfig, ...getEnvOverrides(env), ...cliOverrides };
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new Error(`Invalid configuration:\n${formatIssues(result.error.issues).map((l) => `  - ${l}`).join('\n')}`);
  }
  return result.data;
}

//═══════════════════════════════════════════════════════════════════════════════
// ROOT DISCOVERY & PATH RESOLUTION
//═══════════════════════════════════════════════════════════════════════════════

/** Folders checked, in order, when no root is configured */
export function getRootCandidates(env: Env = process.env): string[] {
  const candidates: string[] = [];
  for (const name of ['OneDrive', 'OneDriveConsumer', 'OneDriveCommercial']) {
    const value = env[name];
    if (value) candidates.push(value);
  }
  const home = env.USERPROFILE ?? env.HOME;
  if (home) candidates.push(join(home, 'OneDrive'));
  return candidates;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Locate the folder to walk
 * @throws RootNotFoundError when neither the configured nor a discovered folder exists
 */
export async function discoverRoot(config: Config, env: Env = process.env): Promise<string> {
  const candidates = config.rootDir ? [config.rootDir] : getRootCandidates(env);

  for (const candidate of candidates) {
    if (await isDirectory(candidate)) {
      return resolve(candidate);
    }
  }
  throw new RootNotFoundError(candidates);
}

/** Fill in root and state file locations */
export async function resolveConfig(config: Config, env: Env = process.env): Promise<ResolvedConfig> {
  const rootDir = await discoverRoot(config, env);
  const dataDir = join(env.USERPROFILE ?? env.HOME ?? homedir(), `.${DEFAULT_PATHS.dataDirName}`);

  return {
    ...config,
    rootDir,
    historyPath: config.historyPath ?? join(dataDir, DEFAULT_PATHS.historyFile),
    logFilePath: config.logFilePath ?? join(dataDir, DEFAULT_PATHS.logFile),
    lockFilePath: config.lockFilePath ?? join(dataDir, DEFAULT_PATHS.lockFile),
  };
}
