/**
 * Cloud locality integration
 * Decides whether a file's content is on disk and asks the sync client to
 * download or dehydrate it. On Windows this works through the attribute
 * bits the OneDrive placeholder driver maintains.
 */

import { stat } from 'node:fs/promises';
import { getLogger } from '../shared/logger.ts';
import { FILE_ATTRIBUTE_OFFLINE, FILE_ATTRIBUTE_RECALL_ON_DATA_ACCESS } from '../shared/constants.ts';
import { getErrorMessage } from '../shared/errors.ts';
import { launchDetached, runCommand } from '../shared/process.ts';
import type { CloudSync } from './types.ts';

const logger = getLogger().child('cloud');

/** A file is local iff neither placeholder bit is set */
export function isLocalAttributes(attributes: number): boolean {
  return (attributes & (FILE_ATTRIBUTE_OFFLINE | FILE_ATTRIBUTE_RECALL_ON_DATA_ACCESS)) === 0;
}

/** Quote a path for a single-quoted PowerShell string */
function psQuote(path: string): string {
  return `'${path.replace(/'/g, "''")}'`;
}

//═══════════════════════════════════════════════════════════════════════════════
// WINDOWS (OneDrive Files On-Demand)
//═══════════════════════════════════════════════════════════════════════════════

export class WindowsCloudSync implements CloudSync {
  async readAttributes(path: string): Promise<number | null> {
    const { code, stdout, stderr } = await runCommand('powershell', [
      '-NoProfile',
      '-NonInteractive',
      '-Command',
      `[int](Get-Item -LiteralPath ${psQuote(path)} -Force).Attributes`,
    ]);
    if (code !== 0) {
      logger.debug(`Could not read attributes of ${path}: ${stderr.trim()}`);
      return null;
    }
    const attributes = parseInt(stdout.trim(), 10);
    return Number.isFinite(attributes) ? attributes : null;
  }

  async isLocallyAvailable(path: string): Promise<boolean> {
    try {
      const attributes = await this.readAttributes(path);
      return attributes !== null && isLocalAttributes(attributes);
    } catch (error) {
      logger.warn(`Locality check failed for ${path}: ${getErrorMessage(error)}`);
      return false;
    }
  }

  /** Unpin and mark online-only; the sync client drops the local content */
  async releaseToCloudOnly(path: string): Promise<boolean> {
    try {
      const { code } = await runCommand('attrib', ['-P', '+U', path]);
      if (code !== 0) {
        logger.warn(`Could not release to cloud-only (attrib exit ${code}): ${path}`);
        return false;
      }
      logger.debug(`Released to cloud-only: ${path}`);
      return true;
    } catch (error) {
      logger.warn(`Could not release to cloud-only: ${path}`, error);
      return false;
    }
  }

  /** Pin the file; the sync client starts downloading it */
  requestDownload(path: string): void {
    logger.debug(`Requesting download: ${path}`);
    launchDetached('attrib', ['+P', '-U', path]);
  }
}

//═══════════════════════════════════════════════════════════════════════════════
// LOCAL ONLY
//═══════════════════════════════════════════════════════════════════════════════

/** For hosts without placeholder support: everything that exists is local */
export class LocalCloudSync implements CloudSync {
  async isLocallyAvailable(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isFile();
    } catch {
      return false;
    }
  }

  async releaseToCloudOnly(path: string): Promise<boolean> {
    logger.debug(`No cloud-sync layer; keeping local copy: ${path}`);
    return false;
  }

  requestDownload(_path: string): void {
    // Nothing to fetch
  }
}

export function createCloudSync(platform: NodeJS.Platform = process.platform): CloudSync {
  return platform === 'win32' ? new WindowsCloudSync() : new LocalCloudSync();
}
