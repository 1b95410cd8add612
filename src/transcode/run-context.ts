/**
 * Per-run state shared with the interrupt handler
 * Holds the history store, the single in-flight temp artifact and the
 * encoder child process, so a signal can clean up synchronously.
 */

import type { ChildProcess } from 'node:child_process';
import { rmSync } from 'node:fs';
import { getLogger } from '../shared/logger.ts';
import { INTERRUPTED_EXIT_CODE } from '../shared/constants.ts';
import { setupSignalHandlers } from '../shared/process.ts';
import type { HistoryStore } from './history.ts';

const logger = getLogger().child('run');

export class RunContext {
  private tempPath: string | null = null;
  private child: ChildProcess | null = null;

  constructor(readonly history: HistoryStore) {}

  /** Temp artifact that must not survive the process, if any */
  get inFlightTempPath(): string | null {
    return this.tempPath;
  }

  /** Start tracking an artifact; only one exists at a time */
  beginAttempt(tempPath: string): void {
    this.tempPath = tempPath;
  }

  /** Encoder process to kill on interrupt */
  attachChild(child: ChildProcess): void {
    this.child = child;
  }

  /** The artifact was renamed or deleted; nothing left to clean up */
  endAttempt(): void {
    this.tempPath = null;
    this.child = null;
  }

  /**
   * Synchronous cleanup for a signal: kill the encoder, delete the temp
   * artifact, flush history
   */
  interrupt(): void {
    if (this.child && this.child.exitCode === null) {
      this.child.kill('SIGKILL');
    }

    if (this.tempPath) {
      try {
        // The killed encoder may hold the file open for a moment on Windows
        rmSync(this.tempPath, { force: true, maxRetries: 5, retryDelay: 100 });
        logger.info(`Removed partial output: ${this.tempPath}`);
      } catch (error) {
        logger.error(`Could not remove partial output ${this.tempPath}:`, error);
      }
    }
    this.endAttempt();

    this.history.flush();
    logger.info('History flushed');
  }
}

/**
 * Route SIGINT/SIGTERM/SIGHUP to the context's cleanup, then exit 130
 * Returns a function that uninstalls the handlers.
 */
export function registerInterruptHandler(
  context: RunContext,
  exit?: (code: number) => void,
): () => void {
  return setupSignalHandlers(() => context.interrupt(), exit, INTERRUPTED_EXIT_CODE);
}
