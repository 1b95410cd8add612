/**
 * Candidate scanner for cloud-shrink
 * Walks the root for video containers above the size floor. Reads directory
 * entries and stat data only, so cloud placeholders are never downloaded.
 */

import { stat } from 'node:fs/promises';
import { basename, extname, normalize, relative } from 'node:path';
import fg from 'fast-glob';
import { TEMP_MARKER } from '../shared/constants.ts';
import { formatBytes, megabytes } from '../shared/format.ts';
import { getLogger } from '../shared/logger.ts';
import type { CandidateFile, ExclusionRules, ResolvedConfig } from './types.ts';

const logger = getLogger().child('scanner');

export type ScanOptions = Pick<
  ResolvedConfig,
  'rootDir' | 'minFileSizeMB' | 'videoExtensions' | 'exclusions' | 'outputSuffix'
>;

//═══════════════════════════════════════════════════════════════════════════════
// EXCLUSION SYSTEM
//═══════════════════════════════════════════════════════════════════════════════

/** Result of checking exclusion rules */
export interface ExclusionCheck {
  excluded: boolean;
  reason?: string;
}

/**
 * Check if a file should be excluded based on configured rules
 */
export function checkExclusions(filePath: string, exclusions: ExclusionRules): ExclusionCheck {
  const fileName = basename(filePath);
  const pathParts = filePath.split(/[\\/]/).map((p) => p.toLowerCase());

  for (const dir of exclusions.directories) {
    if (pathParts.includes(dir.toLowerCase())) {
      return { excluded: true, reason: `Directory excluded: ${dir}` };
    }
  }

  for (const pattern of exclusions.filePatterns) {
    try {
      if (new RegExp(pattern, 'i').test(fileName)) {
        return { excluded: true, reason: `Filename matches pattern: ${pattern}` };
      }
    } catch {
      logger.warn(`Invalid regex pattern: ${pattern}`);
    }
  }

  return { excluded: false };
}

/** Output and in-progress files this tool wrote itself */
export function isOwnArtifact(filePath: string, outputSuffix: string): boolean {
  const name = basename(filePath);
  if (name.includes(TEMP_MARKER)) return true;
  const stem = basename(name, extname(name));
  return stem.toLowerCase().endsWith(outputSuffix.toLowerCase());
}

//═══════════════════════════════════════════════════════════════════════════════
// DISCOVERY
//═══════════════════════════════════════════════════════════════════════════════

export interface ScanResult {
  files: CandidateFile[];
  excluded: number;
  tooSmall: number;
  totalSize: number;
}

function buildPatterns(videoExtensions: readonly string[]): string[] {
  return videoExtensions.map((ext) => `**/*${fg.escapePath(ext.startsWith('.') ? ext : `.${ext}`)}`);
}

/**
 * Enumerate candidate files under the root, sorted by path
 */
export async function scanCandidates(options: ScanOptions): Promise<ScanResult> {
  const minSize = megabytes(options.minFileSizeMB);
  const result: ScanResult = { files: [], excluded: 0, tooSmall: 0, totalSize: 0 };

  logger.info(`Scanning: ${options.rootDir}`);

  const entries = await fg(buildPatterns(options.videoExtensions), {
    cwd: options.rootDir,
    absolute: true,
    onlyFiles: true,
    dot: true,
    stats: true,
    caseSensitiveMatch: false,
    followSymbolicLinks: false,
    suppressErrors: true,
    // Skip entire directory trees that match exclusion rules
    ignore: options.exclusions.directories.map((dir) => `**/${fg.escapePath(dir)}/**`),
  });

  for (const entry of entries) {
    const path = normalize(entry.path);

    if (isOwnArtifact(path, options.outputSuffix)) {
      continue;
    }

    const exclusion = checkExclusions(relative(options.rootDir, path), options.exclusions);
    if (exclusion.excluded) {
      logger.debug(`Excluded: ${path} (${exclusion.reason})`);
      result.excluded++;
      continue;
    }

    let size = entry.stats?.size;
    if (size === undefined) {
      try {
        size = (await stat(path)).size;
      } catch {
        logger.debug(`Cannot stat file: ${path}`);
        continue;
      }
    }

    if (size < minSize) {
      result.tooSmall++;
      continue;
    }

    result.files.push({ path, size });
    result.totalSize += size;
  }

  result.files.sort((a, b) => a.path.localeCompare(b.path));

  logger.info(
    `Scan complete: ${result.files.length} candidates (${formatBytes(result.totalSize)}), ` +
      `${result.tooSmall} below ${options.minFileSizeMB} MB, ${result.excluded} excluded`,
  );
  return result;
}
