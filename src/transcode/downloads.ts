/**
 * Download coordinator
 * Blocking materialization with a timeout for the current file, and a
 * bounded look-ahead that starts downloads of upcoming candidates while
 * the current one transcodes
 */

import { getLogger } from '../shared/logger.ts';
import { formatDuration } from '../shared/format.ts';
import type { CandidateFile, CloudSync } from './types.ts';

const logger = getLogger().child('downloads');

export interface DownloadCoordinatorOptions {
  timeoutSeconds: number;
  pollSeconds: number;
  /** Upper bound on prefetched files in flight */
  prefetchCount: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/** Decides whether an upcoming file is worth downloading ahead of time */
export type PrefetchScreen = (file: CandidateFile) => Promise<boolean>;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class DownloadCoordinator {
  private readonly inFlight = new Set<string>();
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly cloud: CloudSync,
    private readonly options: DownloadCoordinatorOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  isInFlight(path: string): boolean {
    return this.inFlight.has(path);
  }

  /**
   * Wait until the file's content is on disk
   * Returns false when the timeout elapses first; the file is then
   * simply retried on the next run.
   */
  async ensureLocal(path: string): Promise<boolean> {
    try {
      if (await this.cloud.isLocallyAvailable(path)) {
        return true;
      }

      if (this.inFlight.has(path)) {
        logger.info(`Waiting for prefetched download to finish: ${path}`);
      } else {
        logger.info(`Downloading from cloud: ${path}`);
        this.cloud.requestDownload(path);
      }

      const timeoutMs = this.options.timeoutSeconds * 1000;
      const deadline = this.now() + timeoutMs;
      while (this.now() < deadline) {
        await this.sleep(this.options.pollSeconds * 1000);
        if (await this.cloud.isLocallyAvailable(path)) {
          return true;
        }
      }

      logger.warn(`Download did not finish within ${formatDuration(this.options.timeoutSeconds)}: ${path}`);
      return false;
    } finally {
      // The file's own turn has come; it no longer counts against the window
      this.inFlight.delete(path);
    }
  }

  /** Drop in-flight entries whose download has completed */
  async refresh(): Promise<void> {
    for (const path of [...this.inFlight]) {
      if (await this.cloud.isLocallyAvailable(path)) {
        logger.debug(`Prefetch complete: ${path}`);
        this.inFlight.delete(path);
      }
    }
  }

  /**
   * Trigger downloads for upcoming cloud-resident files that pass the screen,
   * until the window is full. Returns how many were triggered.
   */
  async prefetch(upcoming: CandidateFile[], screen: PrefetchScreen): Promise<number> {
    if (this.options.prefetchCount <= 0) return 0;
    await this.refresh();

    let triggered = 0;
    for (const file of upcoming) {
      if (this.inFlight.size >= this.options.prefetchCount) break;
      if (this.inFlight.has(file.path)) continue;
      // Screen before asking the sync client; a locality check may spawn a process
      if (!(await screen(file))) continue;
      if (await this.cloud.isLocallyAvailable(file.path)) continue;

      logger.info(`Prefetching: ${file.path}`);
      this.cloud.requestDownload(file.path);
      this.inFlight.add(file.path);
      triggered++;
    }
    return triggered;
  }

  /** Forget a file without waiting for it */
  consume(path: string): void {
    this.inFlight.delete(path);
  }
}
